/**
 * Advanced parser for declarations, port lists, module instantiations and
 * the statements that share a prefix with them.
 *
 * The declaration grammar has conflicts a single token of lookahead cannot
 * resolve. Consider:
 *
 *     module Test(one two, three [1:0], four);
 *     module Test(one two, three [1:0]  four);
 *
 * With `one two ,` consumed, `three` may be another port of type `one` or the
 * type of a new port. The primary grammar therefore hands over a flat list of
 * DeclTokens and the functions here group them using a deeper lookahead.
 *
 * The parser is liberal and accepts some invalid input; anything it cannot
 * classify is reported as an error rather than guessed at.
 */

import {
    AsgnOpKind,
    DeclKind,
    Direction,
    PartSelectMode,
    makeArgs,
    makeAsgnStmt,
    makeCommentStmt,
    makeIdent,
    makeInstance,
    makeMIDecl,
    makePSIdent,
    makeSubroutineStmt,
    type Args,
    type Decl,
    type Expr,
    type LHS,
    type ModuleItem,
    type ParamBinding,
    type PortBinding,
    type Range,
    type Stmt,
} from "./ast";
import {
    DEFAULT_DECL_PARSE_OPTIONS,
    finalize,
    parseComponents,
    traceText,
    type DeclParseOptions,
} from "./components";
import { makeCursor } from "./cursor";
import {
    DeclTokenKind,
    isAsgn,
    isComma,
    isIdent,
    isInstanceArgs,
    type AsgnToken,
    type DeclToken,
    type InstanceArgsToken,
} from "./decl_tokens";
import {
    type ParseDeclError,
    type Result,
    ParseDeclErrorKind,
    err,
    makeParseDeclError,
    map,
    ok,
} from "./diagnostics";
import { lhsToExpr, takeLHS } from "./lhs";
import { tripLookahead } from "./lookahead";
import { printToken, printTokens } from "./printer";
import { isInterfaceType } from "./types";

export type PortDecls = { names: string[]; items: ModuleItem[] };

// Exactly one of the two lists is non-empty.
export type DeclOrStmt = { decls: Decl[]; stmts: Stmt[] };

export type ForAsgn = { lhs: LHS; expr: Expr };
export type ForInit =
    | { kind: "decls"; decls: Decl[] }
    | { kind: "asgns"; asgns: ForAsgn[] };

type ParseResult<T> = Result<T, ParseDeclError>;

const ELAB_TASKS = ["$fatal", "$error", "$warning", "$info"];

// Placeholder module standing in for an elaboration-time task.
export const ELAB_TASK_MODULE = "__ElaborationTask";

function shapeError(message: string, tokens: readonly DeclToken[]): ParseDeclError {
    return makeParseDeclError(ParseDeclErrorKind.ShapeMismatch, message, null, tokens);
}

function isPlainAsgn(token: AsgnToken): boolean {
    return token.op.kind === AsgnOpKind.Eq && token.timing === null;
}

// Compound and non-blocking assignments and timing controls only belong in
// statements.
function forbidNonEqAsgn(tokens: readonly DeclToken[]): ParseResult<void> {
    const bad = tokens.find((t) => isAsgn(t) && !isPlainAsgn(t));
    if (bad === undefined) {
        return ok(undefined);
    }
    return err(
        makeParseDeclError(
            ParseDeclErrorKind.InvalidOperator,
            `decl tokens contain bad assignment operator \`${printToken(bad)}\`: \`${printTokens(tokens)}\``,
            bad.pos,
            [bad],
        ),
    );
}

// ============================================================================
// Declarations
// ============================================================================

/**
 * Parser for generic, comma-separated declarations.
 */
function parseDecls(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<Decl[]> {
    const forbidden = forbidNonEqAsgn(tokens);
    if (!forbidden.ok) return forbidden;
    return map(parseComponents(tokens), (components) =>
        components.flatMap((component) => finalize(component, options)),
    );
}

/**
 * Parser for a single declaration group, i.e. one sharing a single
 * direction/type prefix, as found outside of port lists.
 */
function parseDecl(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<Decl[]> {
    const forbidden = forbidNonEqAsgn(tokens);
    if (!forbidden.ok) return forbidden;
    const components = parseComponents(tokens);
    if (!components.ok) return components;
    if (components.value.length !== 1) {
        return err(
            makeParseDeclError(
                ParseDeclErrorKind.ArityMismatch,
                `expected exactly one declaration, found ${components.value.length}: \`${printTokens(tokens)}\``,
                null,
                tokens,
            ),
        );
    }
    return ok(finalize(components.value[0], options));
}

// ============================================================================
// Port lists
// ============================================================================

// `a, b, c`: names only, directions and types come from the module body
function isSimpleList(tokens: readonly DeclToken[]): boolean {
    return (
        tokens.length % 2 === 1 &&
        tokens.every((t, i) => (i % 2 === 0 ? isIdent(t) : isComma(t)))
    );
}

/**
 * Copy the last explicit direction onto following ports declared without
 * one. Interface ports neither take nor pass on a direction.
 */
function propagateDirections(decls: readonly Decl[]): Decl[] {
    let lastDir = Direction.Local;
    return decls.map((decl) => {
        if (decl.kind !== DeclKind.Variable || isInterfaceType(decl.type)) {
            return decl;
        }
        const dir = decl.dir === Direction.Local ? lastDir : decl.dir;
        lastDir = dir;
        return { ...decl, dir };
    });
}

/**
 * Parser for module port declarations, including interface ports.
 * Example: `input foo, bar, One inst`
 */
function parsePortDecls(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<PortDecls> {
    const forbidden = forbidNonEqAsgn(tokens);
    if (!forbidden.ok) return forbidden;
    if (isSimpleList(tokens)) {
        const names = tokens.flatMap((t) => (isIdent(t) ? [t.name] : []));
        return ok({ names, items: [] });
    }
    return map(parseDecls(tokens, options), (decls) => {
        const ports = propagateDirections(decls);
        // trace comments pass through without naming a port
        const names = ports.flatMap((d) =>
            d.kind === DeclKind.Variable ? [d.name] : [],
        );
        return { names, items: ports.map(makeMIDecl) };
    });
}

// ============================================================================
// Module items
// ============================================================================

// Elaboration tasks are approximated: `$info` is dropped, the others become
// an instance of a module that does not exist.
function asElabTask(
    name: string,
    tokens: readonly DeclToken[],
): ParseResult<ModuleItem[]> {
    const args = tokens[1];
    let bindings: PortBinding[];
    if (tokens.length === 1) {
        bindings = [];
    } else if (tokens.length === 2 && isInstanceArgs(args)) {
        bindings = args.bindings;
    } else {
        return err(
            shapeError(
                `could not parse elaboration system task: \`${printTokens(tokens)}\``,
                tokens,
            ),
        );
    }
    if (name === "$info") {
        return ok([]);
    }
    const instanceName = `__elab_${name.slice(1)}`;
    return ok([makeInstance(ELAB_TASK_MODULE, [], instanceName, [], bindings)]);
}

type InstanceShape = { name: string; ranges: Range[]; bindings: PortBinding[] };

// `name (...)` or `name [range] (...)`
function matchInstance(group: readonly DeclToken[]): InstanceShape | null {
    const first = group[0];
    const last = group[group.length - 1];
    if (group.length < 2 || !isIdent(first) || !isInstanceArgs(last)) {
        return null;
    }
    if (group.length === 2) {
        return { name: first.name, ranges: [], bindings: last.bindings };
    }
    const middle = group[1];
    if (
        group.length === 3 &&
        middle.kind === DeclTokenKind.Range &&
        middle.mode === PartSelectMode.NonIndexed
    ) {
        return { name: first.name, ranges: [middle.range], bindings: last.bindings };
    }
    return null;
}

function splitOnCommas(tokens: readonly DeclToken[]): DeclToken[][] {
    const groups: DeclToken[][] = [[]];
    for (const token of tokens) {
        if (isComma(token)) {
            groups.push([]);
        } else {
            groups[groups.length - 1].push(token);
        }
    }
    return groups;
}

/**
 * Parser for module instantiations:
 * `Mod #(params) a (...), b [3:0] (...)`
 */
function parseInstantiations(
    tokens: readonly DeclToken[],
): ParseResult<ModuleItem[]> {
    const head = tokens[0];
    if (head === undefined || !isIdent(head)) {
        return err(
            shapeError(
                `decl tokens contain instantiations, but start with non-ident: \`${printTokens(tokens)}\``,
                tokens,
            ),
        );
    }
    let rest = tokens.slice(1);
    let params: ParamBinding[] = [];
    const second = rest[0];
    if (second?.kind === DeclTokenKind.ParamBindings) {
        params = second.bindings;
        rest = rest.slice(1);
    }
    const items: ModuleItem[] = [];
    for (const group of splitOnCommas(rest)) {
        if (group.length === 0) {
            return err(
                shapeError(
                    `empty instance in instantiation list: \`${printTokens(tokens)}\``,
                    tokens,
                ),
            );
        }
        const inst = matchInstance(group);
        if (inst === null) {
            const message = group.some(isInstanceArgs)
                ? `unrecognized instance \`${printTokens(group)}\``
                : `instantiations mixed with other items: \`${printTokens(group)}\``;
            return err(shapeError(message, group));
        }
        items.push(makeInstance(head.name, params, inst.name, inst.ranges, inst.bindings));
    }
    return ok(items);
}

/**
 * Parser for single (semicolon-terminated) declarations and module
 * instantiations, including elaboration system tasks.
 */
function parseModuleItems(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<ModuleItem[]> {
    const forbidden = forbidNonEqAsgn(tokens);
    if (!forbidden.ok) return forbidden;
    const head = tokens[0];
    if (head !== undefined && isIdent(head) && ELAB_TASKS.includes(head.name)) {
        return asElabTask(head.name, tokens);
    }
    if (tokens.some(isInstanceArgs)) {
        return parseInstantiations(tokens);
    }
    return map(parseDecl(tokens, options), (decls) => decls.map(makeMIDecl));
}

// ============================================================================
// Declarations or statements
// ============================================================================

// Bindings with an empty name are positional arguments.
function bindingsToArgs(bindings: readonly PortBinding[]): Args {
    const positional = bindings.filter((b) => b.name === "").map((b) => b.expr);
    const keyword = bindings
        .filter((b) => b.name !== "")
        .map((b) => ({ name: b.name, expr: b.expr }));
    return makeArgs(positional, keyword);
}

// Prefix increments and decrements arrive with the assignment first.
function rotateLeadingAsgn(tokens: readonly DeclToken[]): readonly DeclToken[] {
    const head = tokens[0];
    if (tokens.length > 1 && head !== undefined && isAsgn(head)) {
        return [...tokens.slice(1), head];
    }
    return tokens;
}

function buildStmt(
    prefix: readonly DeclToken[],
    last: AsgnToken | InstanceArgsToken,
): Stmt | null {
    const only = prefix.length === 1 ? prefix[0] : undefined;
    if (
        last.kind === DeclTokenKind.InstanceArgs &&
        only?.kind === DeclTokenKind.ScopedIdent
    ) {
        return makeSubroutineStmt(
            makePSIdent(only.scope, only.name),
            bindingsToArgs(last.bindings),
        );
    }
    const lhs = takeLHS(prefix);
    if (lhs === null) {
        return null;
    }
    if (last.kind === DeclTokenKind.Asgn) {
        return makeAsgnStmt(last.op, last.timing, lhs, last.expr);
    }
    return makeSubroutineStmt(lhsToExpr(lhs), bindingsToArgs(last.bindings));
}

/**
 * Parser for a block item that is either a declaration, an assignment, or a
 * subroutine call statement.
 */
function parseDeclOrStmt(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<DeclOrStmt> {
    const first = tokens[0];
    if (first === undefined) {
        return err(shapeError("empty declaration or statement", tokens));
    }
    const { traceMarkers } = { ...DEFAULT_DECL_PARSE_OPTIONS, ...options };
    const asStmt = (stmt: Stmt): DeclOrStmt => ({
        decls: [],
        stmts: traceMarkers ? [makeCommentStmt(traceText(first.pos)), stmt] : [stmt],
    });

    const ordered = rotateLeadingAsgn(tokens);
    if (ordered.length === 1) {
        const only = ordered[0];
        if (only.kind === DeclTokenKind.Ident) {
            return ok(asStmt(makeSubroutineStmt(makeIdent(only.name), makeArgs([], []))));
        }
        if (only.kind === DeclTokenKind.ScopedIdent) {
            return ok(
                asStmt(makeSubroutineStmt(makePSIdent(only.scope, only.name), makeArgs([], []))),
            );
        }
    }

    const last = ordered[ordered.length - 1];
    if (last.kind === DeclTokenKind.Asgn || last.kind === DeclTokenKind.InstanceArgs) {
        const prefix = ordered.slice(0, -1);
        const stmt = buildStmt(prefix, last);
        if (stmt !== null) {
            return ok(asStmt(stmt));
        }
        // only a statement could carry these
        if (last.kind === DeclTokenKind.InstanceArgs || !isPlainAsgn(last)) {
            return err(
                makeParseDeclError(
                    ParseDeclErrorKind.UnrecoverableLhs,
                    `could not parse as LHS: \`${printTokens(prefix)}\``,
                    first.pos,
                    prefix,
                ),
            );
        }
    }

    return map(parseDecl(tokens, options), (decls) => ({ decls, stmts: [] }));
}

// ============================================================================
// For-loop initializers
// ============================================================================

// Tokens that can only appear in an assignment target or statement.
function isAsgnIndicator(token: DeclToken): boolean {
    switch (token.kind) {
        case DeclTokenKind.BitSelect:
        case DeclTokenKind.Concat:
        case DeclTokenKind.Stream:
        case DeclTokenKind.Dot:
            return true;
        case DeclTokenKind.Asgn:
            return token.op.kind !== AsgnOpKind.Eq;
        default:
            return false;
    }
}

function findAsgn(
    tokens: readonly DeclToken[],
    from: number,
): { index: number; token: AsgnToken } | null {
    for (let i = from; i < tokens.length; i++) {
        const token = tokens[i];
        if (isAsgn(token)) return { index: i, token };
    }
    return null;
}

function parseAsgns(tokens: readonly DeclToken[]): ParseResult<ForAsgn[]> {
    const asgns: ForAsgn[] = [];
    let start = 0;
    for (;;) {
        const found = findAsgn(tokens, start);
        if (found === null) {
            return err(
                shapeError(
                    `for loop assignment is missing \`=\`: \`${printTokens(tokens.slice(start))}\``,
                    tokens.slice(start),
                ),
            );
        }
        const lhsTokens = tokens.slice(start, found.index);
        const lhs = takeLHS(lhsTokens);
        if (lhs === null) {
            return err(
                makeParseDeclError(
                    ParseDeclErrorKind.UnrecoverableLhs,
                    `could not parse as LHS: \`${printTokens(lhsTokens)}\``,
                    found.token.pos,
                    lhsTokens,
                ),
            );
        }
        asgns.push({ lhs, expr: found.token.expr });

        const sepIndex = found.index + 1;
        if (sepIndex >= tokens.length) break;
        if (!isComma(tokens[sepIndex])) {
            return err(
                shapeError(
                    `bad for loop assignment: \`${printTokens(tokens.slice(start))}\``,
                    tokens.slice(sepIndex),
                ),
            );
        }
        start = sepIndex + 1;
        if (start >= tokens.length) {
            return err(shapeError("trailing `,` in for loop initialization", tokens));
        }
    }
    return ok(asgns);
}

/**
 * Parser for the initialization section of a for loop: either declarations
 * with initializers, or a list of plain assignments.
 */
function parseForInit(
    tokens: readonly DeclToken[],
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): ParseResult<ForInit> {
    const forbidden = forbidNonEqAsgn(tokens);
    if (!forbidden.ok) return forbidden;

    const commaAt = tokens.findIndex(isComma);
    const indicatorAt = tokens.findIndex(isAsgnIndicator);
    const hasLeadingAsgn =
        indicatorAt >= 0 && (commaAt < 0 || indicatorAt < commaAt);
    if (hasLeadingAsgn || tripLookahead(makeCursor(tokens))) {
        return map(parseAsgns(tokens), (asgns): ForInit => ({ kind: "asgns", asgns }));
    }

    const decls = parseDecls(tokens, options);
    if (!decls.ok) return decls;
    for (const decl of decls.value) {
        if (decl.kind === DeclKind.Variable && decl.init === null) {
            return err(
                shapeError(
                    `for loop declaration of \`${decl.name}\` is missing an initialization: \`${printTokens(tokens)}\``,
                    tokens,
                ),
            );
        }
    }
    const init: ForInit = { kind: "decls", decls: decls.value };
    return ok(init);
}

export {
    parsePortDecls,
    parseModuleItems,
    parseDecls,
    parseDecl,
    parseDeclOrStmt,
    parseForInit,
    propagateDirections,
};
