import type { Type } from "./types";

// ============================================================================
// Source Positions
// ============================================================================

export type Position = { file: string; line: number; column: number };

function makePosition(file: string, line: number, column: number): Position {
    return { file, line, column };
}

function showPosition(pos: Position): string {
    return `${pos.file}:${pos.line}:${pos.column}`;
}

// ============================================================================
// Operators and keywords
// ============================================================================

export enum BinaryOp {
    Add = 0,
    Sub = 1,
    Mul = 2,
    Div = 3,
    Mod = 4,
    BitAnd = 5,
    BitOr = 6,
    BitXor = 7,
    Shl = 8,
    Shr = 9,
    AShl = 10,
    AShr = 11,
    Eq = 12,
    Ne = 13,
    Lt = 14,
    Le = 15,
    Gt = 16,
    Ge = 17,
    LogAnd = 18,
    LogOr = 19,
}

export enum Direction {
    Local = 0,
    Input = 1,
    Output = 2,
    Inout = 3,
    Ref = 4,
}

export enum Lifetime {
    Static = 0,
    Automatic = 1,
}

export enum PartSelectMode {
    NonIndexed = 0,
    IndexedPlus = 1,
    IndexedMinus = 2,
}

export enum StreamOp {
    Left = 0,
    Right = 1,
}

export const AsgnOpKind = {
    Eq: 0,
    NonBlocking: 1,
    Compound: 2,
} as const satisfies Record<string, number>;

export type AsgnOp =
    | { kind: typeof AsgnOpKind.Eq }
    | { kind: typeof AsgnOpKind.NonBlocking }
    | { kind: typeof AsgnOpKind.Compound; op: BinaryOp };

function makeAsgnEq(): AsgnOp {
    return { kind: AsgnOpKind.Eq };
}

function makeAsgnNonBlocking(): AsgnOp {
    return { kind: AsgnOpKind.NonBlocking };
}

function makeAsgnCompound(op: BinaryOp): AsgnOp {
    return { kind: AsgnOpKind.Compound, op };
}

// ============================================================================
// Expressions
// ============================================================================

export const ExprKind = {
    Nil: 0,
    Ident: 1,
    PSIdent: 2,
    Number: 3,
    String: 4,
    Pattern: 5,
    Concat: 6,
    Stream: 7,
    Call: 8,
    Bit: 9,
    Range: 10,
    Dot: 11,
    Binary: 12,
} as const satisfies Record<string, number>;

export type ExprKindValue = (typeof ExprKind)[keyof typeof ExprKind];

// Array dimension or part-select bounds, `[left:right]`.
export type Range = { left: Expr; right: Expr };

// One entry of an assignment pattern `'{...}`; `key` is null when positional.
export type PatternItem = { key: string | null; value: Expr };

export type NilExpr = { kind: typeof ExprKind.Nil };
export type IdentExpr = { kind: typeof ExprKind.Ident; name: string };
export type PSIdentExpr = {
    kind: typeof ExprKind.PSIdent;
    scope: string;
    name: string;
};
export type NumberExpr = { kind: typeof ExprKind.Number; text: string };
export type StringExpr = { kind: typeof ExprKind.String; value: string };
export type PatternExpr = { kind: typeof ExprKind.Pattern; items: PatternItem[] };
export type ConcatExpr = { kind: typeof ExprKind.Concat; items: Expr[] };
export type StreamExpr = {
    kind: typeof ExprKind.Stream;
    op: StreamOp;
    size: Expr;
    items: Expr[];
};
export type CallExpr = { kind: typeof ExprKind.Call; callee: Expr; args: Args };
export type BitExpr = { kind: typeof ExprKind.Bit; base: Expr; index: Expr };
export type RangeExpr = {
    kind: typeof ExprKind.Range;
    base: Expr;
    mode: PartSelectMode;
    range: Range;
};
export type DotExpr = { kind: typeof ExprKind.Dot; base: Expr; name: string };
export type BinaryExpr = {
    kind: typeof ExprKind.Binary;
    op: BinaryOp;
    left: Expr;
    right: Expr;
};

export type Expr =
    | NilExpr
    | IdentExpr
    | PSIdentExpr
    | NumberExpr
    | StringExpr
    | PatternExpr
    | ConcatExpr
    | StreamExpr
    | CallExpr
    | BitExpr
    | RangeExpr
    | DotExpr
    | BinaryExpr;

// Subroutine arguments: positional first, then `.name(expr)` keyword ones.
export type Args = { positional: Expr[]; keyword: KeywordArg[] };
export type KeywordArg = { name: string; expr: Expr };

function makeNil(): Expr {
    return { kind: ExprKind.Nil };
}

function makeIdent(name: string): Expr {
    return { kind: ExprKind.Ident, name };
}

function makePSIdent(scope: string, name: string): Expr {
    return { kind: ExprKind.PSIdent, scope, name };
}

function makeNumber(text: string): Expr {
    return { kind: ExprKind.Number, text };
}

function makeString(value: string): Expr {
    return { kind: ExprKind.String, value };
}

function makePattern(items: PatternItem[]): Expr {
    return { kind: ExprKind.Pattern, items };
}

function makeConcat(items: Expr[]): Expr {
    return { kind: ExprKind.Concat, items };
}

function makeStream(op: StreamOp, size: Expr, items: Expr[]): Expr {
    return { kind: ExprKind.Stream, op, size, items };
}

function makeCall(callee: Expr, args: Args): Expr {
    return { kind: ExprKind.Call, callee, args };
}

function makeBit(base: Expr, index: Expr): Expr {
    return { kind: ExprKind.Bit, base, index };
}

function makeRangeSelect(base: Expr, mode: PartSelectMode, range: Range): Expr {
    return { kind: ExprKind.Range, base, mode, range };
}

function makeDot(base: Expr, name: string): Expr {
    return { kind: ExprKind.Dot, base, name };
}

function makeBinary(op: BinaryOp, left: Expr, right: Expr): Expr {
    return { kind: ExprKind.Binary, op, left, right };
}

function makeRange(left: Expr, right: Expr): Range {
    return { left, right };
}

function makeArgs(positional: Expr[], keyword: KeywordArg[]): Args {
    return { positional, keyword };
}

// ============================================================================
// Timing controls
// ============================================================================

export const TimingKind = {
    Delay: 0,
    Event: 1,
    Cycle: 2,
} as const satisfies Record<string, number>;

// `#expr`, `@(expr)` and `##expr`
export type Timing = {
    kind: (typeof TimingKind)[keyof typeof TimingKind];
    expr: Expr;
};

function makeDelay(expr: Expr): Timing {
    return { kind: TimingKind.Delay, expr };
}

function makeEventControl(expr: Expr): Timing {
    return { kind: TimingKind.Event, expr };
}

function makeCycleDelay(expr: Expr): Timing {
    return { kind: TimingKind.Cycle, expr };
}

// ============================================================================
// Assignment targets
// ============================================================================

export const LHSKind = {
    Ident: 0,
    Bit: 1,
    Range: 2,
    Dot: 3,
    Concat: 4,
    Stream: 5,
} as const satisfies Record<string, number>;

export type LHSIdent = { kind: typeof LHSKind.Ident; name: string };
export type LHSBit = { kind: typeof LHSKind.Bit; base: LHS; index: Expr };
export type LHSRange = {
    kind: typeof LHSKind.Range;
    base: LHS;
    mode: PartSelectMode;
    range: Range;
};
export type LHSDot = { kind: typeof LHSKind.Dot; base: LHS; name: string };
export type LHSConcat = { kind: typeof LHSKind.Concat; items: LHS[] };
export type LHSStream = {
    kind: typeof LHSKind.Stream;
    op: StreamOp;
    size: Expr;
    items: LHS[];
};

export type LHS = LHSIdent | LHSBit | LHSRange | LHSDot | LHSConcat | LHSStream;

function makeLHSIdent(name: string): LHS {
    return { kind: LHSKind.Ident, name };
}

function makeLHSBit(base: LHS, index: Expr): LHS {
    return { kind: LHSKind.Bit, base, index };
}

function makeLHSRange(base: LHS, mode: PartSelectMode, range: Range): LHS {
    return { kind: LHSKind.Range, base, mode, range };
}

function makeLHSDot(base: LHS, name: string): LHS {
    return { kind: LHSKind.Dot, base, name };
}

function makeLHSConcat(items: LHS[]): LHS {
    return { kind: LHSKind.Concat, items };
}

function makeLHSStream(op: StreamOp, size: Expr, items: LHS[]): LHS {
    return { kind: LHSKind.Stream, op, size, items };
}

// ============================================================================
// Bindings
// ============================================================================

// `.name(expr)`, or a positional binding when `name` is empty.
export type PortBinding = { name: string; expr: Expr };

// Parameter overrides may bind either a type or a value.
export type ParamValue =
    | { kind: "type"; type: Type }
    | { kind: "expr"; expr: Expr };
export type ParamBinding = { name: string; value: ParamValue };

function makePortBinding(name: string, expr: Expr): PortBinding {
    return { name, expr };
}

function makeParamBinding(name: string, value: ParamValue): ParamBinding {
    return { name, value };
}

// ============================================================================
// Declarations, statements and module items
// ============================================================================

export const DeclKind = {
    Variable: 0,
    Comment: 1,
} as const satisfies Record<string, number>;

export type VariableDecl = {
    kind: typeof DeclKind.Variable;
    dir: Direction;
    type: Type;
    name: string;
    ranges: Range[];
    init: Expr | null;
};
export type CommentDecl = { kind: typeof DeclKind.Comment; text: string };

export type Decl = VariableDecl | CommentDecl;

function makeVariable(
    dir: Direction,
    type: Type,
    name: string,
    ranges: Range[],
    init: Expr | null,
): Decl {
    return { kind: DeclKind.Variable, dir, type, name, ranges, init };
}

function makeCommentDecl(text: string): Decl {
    return { kind: DeclKind.Comment, text };
}

export const StmtKind = {
    Asgn: 0,
    Subroutine: 1,
    Comment: 2,
} as const satisfies Record<string, number>;

export type AsgnStmt = {
    kind: typeof StmtKind.Asgn;
    op: AsgnOp;
    timing: Timing | null;
    lhs: LHS;
    expr: Expr;
};
export type SubroutineStmt = {
    kind: typeof StmtKind.Subroutine;
    callee: Expr;
    args: Args;
};
export type CommentStmt = { kind: typeof StmtKind.Comment; text: string };

export type Stmt = AsgnStmt | SubroutineStmt | CommentStmt;

function makeAsgnStmt(
    op: AsgnOp,
    timing: Timing | null,
    lhs: LHS,
    expr: Expr,
): Stmt {
    return { kind: StmtKind.Asgn, op, timing, lhs, expr };
}

function makeSubroutineStmt(callee: Expr, args: Args): Stmt {
    return { kind: StmtKind.Subroutine, callee, args };
}

function makeCommentStmt(text: string): Stmt {
    return { kind: StmtKind.Comment, text };
}

export const ModuleItemKind = {
    Decl: 0,
    Instance: 1,
} as const satisfies Record<string, number>;

export type MIDecl = { kind: typeof ModuleItemKind.Decl; decl: Decl };
export type InstanceItem = {
    kind: typeof ModuleItemKind.Instance;
    moduleName: string;
    params: ParamBinding[];
    instanceName: string;
    ranges: Range[];
    bindings: PortBinding[];
};

export type ModuleItem = MIDecl | InstanceItem;

function makeMIDecl(decl: Decl): ModuleItem {
    return { kind: ModuleItemKind.Decl, decl };
}

function makeInstance(
    moduleName: string,
    params: ParamBinding[],
    instanceName: string,
    ranges: Range[],
    bindings: PortBinding[],
): ModuleItem {
    return {
        kind: ModuleItemKind.Instance,
        moduleName,
        params,
        instanceName,
        ranges,
        bindings,
    };
}

export {
    makePosition,
    showPosition,
    makeAsgnEq,
    makeAsgnNonBlocking,
    makeAsgnCompound,
    makeNil,
    makeIdent,
    makePSIdent,
    makeNumber,
    makeString,
    makePattern,
    makeConcat,
    makeStream,
    makeCall,
    makeBit,
    makeRangeSelect,
    makeDot,
    makeBinary,
    makeRange,
    makeArgs,
    makeDelay,
    makeEventControl,
    makeCycleDelay,
    makeLHSIdent,
    makeLHSBit,
    makeLHSRange,
    makeLHSDot,
    makeLHSConcat,
    makeLHSStream,
    makePortBinding,
    makeParamBinding,
    makeVariable,
    makeCommentDecl,
    makeAsgnStmt,
    makeSubroutineStmt,
    makeCommentStmt,
    makeMIDecl,
    makeInstance,
};
