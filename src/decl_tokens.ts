import type {
    AsgnOp,
    Direction,
    Expr,
    LHS,
    Lifetime,
    ParamBinding,
    PartSelectMode,
    PortBinding,
    Position,
    Range,
    StreamOp,
    Timing,
} from "./ast";
import type { Signing, TypeBase } from "./types";

/**
 * Tokens handed over by the primary grammar for anything that may be a
 * declaration. Nested lists (`#(...)`, `(...)`) arrive already parsed.
 */
export const DeclTokenKind = {
    Comma: 0,
    AutoDim: 1,
    Asgn: 2,
    Range: 3,
    Ident: 4,
    ScopedIdent: 5,
    Dir: 6,
    TypeCtor: 7,
    ParamBindings: 8,
    InstanceArgs: 9,
    BitSelect: 10,
    Concat: 11,
    Stream: 12,
    Dot: 13,
    Signing: 14,
    Lifetime: 15,
} as const satisfies Record<string, number>;

export type DeclTokenKindValue =
    (typeof DeclTokenKind)[keyof typeof DeclTokenKind];

export type CommaToken = { kind: typeof DeclTokenKind.Comma; pos: Position };
export type AutoDimToken = { kind: typeof DeclTokenKind.AutoDim; pos: Position };
export type AsgnToken = {
    kind: typeof DeclTokenKind.Asgn;
    pos: Position;
    op: AsgnOp;
    timing: Timing | null;
    expr: Expr;
};
export type RangeToken = {
    kind: typeof DeclTokenKind.Range;
    pos: Position;
    mode: PartSelectMode;
    range: Range;
};
export type IdentToken = {
    kind: typeof DeclTokenKind.Ident;
    pos: Position;
    name: string;
};
export type ScopedIdentToken = {
    kind: typeof DeclTokenKind.ScopedIdent;
    pos: Position;
    scope: string;
    name: string;
};
export type DirToken = {
    kind: typeof DeclTokenKind.Dir;
    pos: Position;
    dir: Direction;
};
export type TypeCtorToken = {
    kind: typeof DeclTokenKind.TypeCtor;
    pos: Position;
    base: TypeBase;
};
export type ParamBindingsToken = {
    kind: typeof DeclTokenKind.ParamBindings;
    pos: Position;
    bindings: ParamBinding[];
};
export type InstanceArgsToken = {
    kind: typeof DeclTokenKind.InstanceArgs;
    pos: Position;
    bindings: PortBinding[];
};
export type BitSelectToken = {
    kind: typeof DeclTokenKind.BitSelect;
    pos: Position;
    expr: Expr;
};
export type ConcatToken = {
    kind: typeof DeclTokenKind.Concat;
    pos: Position;
    items: LHS[];
};
export type StreamToken = {
    kind: typeof DeclTokenKind.Stream;
    pos: Position;
    op: StreamOp;
    size: Expr;
    items: LHS[];
};
export type DotToken = { kind: typeof DeclTokenKind.Dot; pos: Position; name: string };
export type SigningToken = {
    kind: typeof DeclTokenKind.Signing;
    pos: Position;
    signing: Signing;
};
export type LifetimeToken = {
    kind: typeof DeclTokenKind.Lifetime;
    pos: Position;
    lifetime: Lifetime;
};

export type DeclToken =
    | CommaToken
    | AutoDimToken
    | AsgnToken
    | RangeToken
    | IdentToken
    | ScopedIdentToken
    | DirToken
    | TypeCtorToken
    | ParamBindingsToken
    | InstanceArgsToken
    | BitSelectToken
    | ConcatToken
    | StreamToken
    | DotToken
    | SigningToken
    | LifetimeToken;

// ============================================================================
// Constructors
// ============================================================================

function makeCommaToken(pos: Position): DeclToken {
    return { kind: DeclTokenKind.Comma, pos };
}

function makeAutoDimToken(pos: Position): DeclToken {
    return { kind: DeclTokenKind.AutoDim, pos };
}

function makeAsgnToken(
    pos: Position,
    op: AsgnOp,
    timing: Timing | null,
    expr: Expr,
): DeclToken {
    return { kind: DeclTokenKind.Asgn, pos, op, timing, expr };
}

function makeRangeToken(
    pos: Position,
    mode: PartSelectMode,
    range: Range,
): DeclToken {
    return { kind: DeclTokenKind.Range, pos, mode, range };
}

function makeIdentToken(pos: Position, name: string): DeclToken {
    return { kind: DeclTokenKind.Ident, pos, name };
}

function makeScopedIdentToken(
    pos: Position,
    scope: string,
    name: string,
): DeclToken {
    return { kind: DeclTokenKind.ScopedIdent, pos, scope, name };
}

function makeDirToken(pos: Position, dir: Direction): DeclToken {
    return { kind: DeclTokenKind.Dir, pos, dir };
}

function makeTypeCtorToken(pos: Position, base: TypeBase): DeclToken {
    return { kind: DeclTokenKind.TypeCtor, pos, base };
}

function makeParamBindingsToken(
    pos: Position,
    bindings: ParamBinding[],
): DeclToken {
    return { kind: DeclTokenKind.ParamBindings, pos, bindings };
}

function makeInstanceArgsToken(
    pos: Position,
    bindings: PortBinding[],
): DeclToken {
    return { kind: DeclTokenKind.InstanceArgs, pos, bindings };
}

function makeBitSelectToken(pos: Position, expr: Expr): DeclToken {
    return { kind: DeclTokenKind.BitSelect, pos, expr };
}

function makeConcatToken(pos: Position, items: LHS[]): DeclToken {
    return { kind: DeclTokenKind.Concat, pos, items };
}

function makeStreamToken(
    pos: Position,
    op: StreamOp,
    size: Expr,
    items: LHS[],
): DeclToken {
    return { kind: DeclTokenKind.Stream, pos, op, size, items };
}

function makeDotToken(pos: Position, name: string): DeclToken {
    return { kind: DeclTokenKind.Dot, pos, name };
}

function makeSigningToken(pos: Position, signing: Signing): DeclToken {
    return { kind: DeclTokenKind.Signing, pos, signing };
}

function makeLifetimeToken(pos: Position, lifetime: Lifetime): DeclToken {
    return { kind: DeclTokenKind.Lifetime, pos, lifetime };
}

// ============================================================================
// Predicates
// ============================================================================

function isComma(token: DeclToken): token is CommaToken {
    return token.kind === DeclTokenKind.Comma;
}

function isIdent(token: DeclToken): token is IdentToken {
    return token.kind === DeclTokenKind.Ident;
}

function isAsgn(token: DeclToken): token is AsgnToken {
    return token.kind === DeclTokenKind.Asgn;
}

function isInstanceArgs(token: DeclToken): token is InstanceArgsToken {
    return token.kind === DeclTokenKind.InstanceArgs;
}

export {
    makeCommaToken,
    makeAutoDimToken,
    makeAsgnToken,
    makeRangeToken,
    makeIdentToken,
    makeScopedIdentToken,
    makeDirToken,
    makeTypeCtorToken,
    makeParamBindingsToken,
    makeInstanceArgsToken,
    makeBitSelectToken,
    makeConcatToken,
    makeStreamToken,
    makeDotToken,
    makeSigningToken,
    makeLifetimeToken,
    isComma,
    isIdent,
    isAsgn,
    isInstanceArgs,
};
