import {
    LHSKind,
    makeBit,
    makeConcat,
    makeDot,
    makeIdent,
    makeLHSBit,
    makeLHSConcat,
    makeLHSDot,
    makeLHSIdent,
    makeLHSRange,
    makeLHSStream,
    makeRangeSelect,
    makeStream,
    type Expr,
    type LHS,
} from "./ast";
import { DeclTokenKind, type DeclToken } from "./decl_tokens";

// First token of an assignment target.
function startLHS(token: DeclToken): LHS | null {
    switch (token.kind) {
        case DeclTokenKind.Concat:
            return makeLHSConcat(token.items);
        case DeclTokenKind.Stream:
            return makeLHSStream(token.op, token.size, token.items);
        case DeclTokenKind.Ident:
            return makeLHSIdent(token.name);
        default:
            return null;
    }
}

// Selects and member accesses wrap the target built so far.
function extendLHS(curr: LHS, token: DeclToken): LHS | null {
    switch (token.kind) {
        case DeclTokenKind.BitSelect:
            return makeLHSBit(curr, token.expr);
        case DeclTokenKind.Range:
            return makeLHSRange(curr, token.mode, token.range);
        case DeclTokenKind.Dot:
            return makeLHSDot(curr, token.name);
        default:
            return null;
    }
}

/**
 * Fold tokens into an assignment target, or null when they do not form one.
 */
function takeLHS(tokens: readonly DeclToken[]): LHS | null {
    if (tokens.length === 0) {
        return null;
    }
    let lhs = startLHS(tokens[0]);
    for (let i = 1; i < tokens.length && lhs !== null; i++) {
        lhs = extendLHS(lhs, tokens[i]);
    }
    return lhs;
}

function lhsToExpr(lhs: LHS): Expr {
    switch (lhs.kind) {
        case LHSKind.Ident:
            return makeIdent(lhs.name);
        case LHSKind.Bit:
            return makeBit(lhsToExpr(lhs.base), lhs.index);
        case LHSKind.Range:
            return makeRangeSelect(lhsToExpr(lhs.base), lhs.mode, lhs.range);
        case LHSKind.Dot:
            return makeDot(lhsToExpr(lhs.base), lhs.name);
        case LHSKind.Concat:
            return makeConcat(lhs.items.map(lhsToExpr));
        case LHSKind.Stream:
            return makeStream(lhs.op, lhs.size, lhs.items.map(lhsToExpr));
    }
}

export { takeLHS, lhsToExpr };
