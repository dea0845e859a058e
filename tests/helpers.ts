import {
    BinaryOp,
    Direction,
    Lifetime,
    PartSelectMode,
    StreamOp,
    makeAsgnCompound,
    makeAsgnEq,
    makeAsgnNonBlocking,
    makeDelay,
    makeIdent,
    makeLHSIdent,
    makeNumber,
    makePortBinding,
    makePosition,
    makeRange,
    type Expr,
    type LHS,
    type ParamBinding,
    type Position,
    type PortBinding,
    type Range,
} from "../src/ast";
import {
    makeAsgnToken,
    makeAutoDimToken,
    makeBitSelectToken,
    makeCommaToken,
    makeConcatToken,
    makeDirToken,
    makeDotToken,
    makeIdentToken,
    makeInstanceArgsToken,
    makeLifetimeToken,
    makeParamBindingsToken,
    makeRangeToken,
    makeScopedIdentToken,
    makeSigningToken,
    makeStreamToken,
    makeTypeCtorToken,
    type DeclToken,
} from "../src/decl_tokens";
import {
    Signing,
    makeIntegerAtomBase,
    makeIntegerVectorBase,
    makeNonIntegerBase,
} from "../src/types";

// Token builders. Positions default to test.sv:1:1; `placed` spreads a
// sequence over consecutive columns when a test looks at positions.

export function pos(column: number = 1, line: number = 1): Position {
    return makePosition("test.sv", line, column);
}

export function placed(tokens: DeclToken[]): DeclToken[] {
    return tokens.map((t, i) => ({ ...t, pos: pos(i + 1) }));
}

export function num(n: number): Expr {
    return makeNumber(String(n));
}

export function range(left: number, right: number): Range {
    return makeRange(num(left), num(right));
}

export const comma = (): DeclToken => makeCommaToken(pos());
export const autoDim = (): DeclToken => makeAutoDimToken(pos());
export const ident = (name: string): DeclToken => makeIdentToken(pos(), name);
export const scoped = (scope: string, name: string): DeclToken =>
    makeScopedIdentToken(pos(), scope, name);
export const input = (): DeclToken => makeDirToken(pos(), Direction.Input);
export const output = (): DeclToken => makeDirToken(pos(), Direction.Output);
export const logic = (): DeclToken =>
    makeTypeCtorToken(pos(), makeIntegerVectorBase("logic"));
export const int = (): DeclToken =>
    makeTypeCtorToken(pos(), makeIntegerAtomBase("int"));
export const real = (): DeclToken =>
    makeTypeCtorToken(pos(), makeNonIntegerBase("real"));
export const signed = (): DeclToken => makeSigningToken(pos(), Signing.Signed);
export const automatic = (): DeclToken =>
    makeLifetimeToken(pos(), Lifetime.Automatic);
export const staticLifetime = (): DeclToken =>
    makeLifetimeToken(pos(), Lifetime.Static);
export const dims = (left: number, right: number): DeclToken =>
    makeRangeToken(pos(), PartSelectMode.NonIndexed, range(left, right));
export const indexed = (base: number, width: number): DeclToken =>
    makeRangeToken(pos(), PartSelectMode.IndexedPlus, range(base, width));
export const bit = (expr: Expr): DeclToken => makeBitSelectToken(pos(), expr);
export const dot = (name: string): DeclToken => makeDotToken(pos(), name);
export const concat = (...names: string[]): DeclToken =>
    makeConcatToken(pos(), names.map(makeLHSIdent));
export const stream = (size: Expr, items: LHS[]): DeclToken =>
    makeStreamToken(pos(), StreamOp.Left, size, items);

export const eq = (expr: Expr): DeclToken =>
    makeAsgnToken(pos(), makeAsgnEq(), null, expr);
export const plusEq = (expr: Expr): DeclToken =>
    makeAsgnToken(pos(), makeAsgnCompound(BinaryOp.Add), null, expr);
export const nonBlocking = (expr: Expr): DeclToken =>
    makeAsgnToken(pos(), makeAsgnNonBlocking(), null, expr);
export const delayedEq = (delay: number, expr: Expr): DeclToken =>
    makeAsgnToken(pos(), makeAsgnEq(), makeDelay(num(delay)), expr);

export const args = (...bindings: PortBinding[]): DeclToken =>
    makeInstanceArgsToken(pos(), bindings);
export const params = (...bindings: ParamBinding[]): DeclToken =>
    makeParamBindingsToken(pos(), bindings);

export function positional(name: string): PortBinding {
    return makePortBinding("", makeIdent(name));
}

export function named(port: string, name: string): PortBinding {
    return makePortBinding(port, makeIdent(name));
}
