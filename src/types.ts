import type { Range } from "./ast";
import { type Result, ok, err } from "./diagnostics";

export const TypeKind = {
    // Integral types
    IntegerVector: 0,
    IntegerAtom: 1,

    // Everything else with a keyword
    NonInteger: 2,

    // No keyword at all, e.g. `input [7:0] a` or `signed b`
    Implicit: 3,

    // Named types (typedefs), resolved later
    Alias: 4,
    PSAlias: 5,

    // `intf.modport`
    Interface: 6,
} as const satisfies Record<string, number>;

export type TypeKindValue = (typeof TypeKind)[keyof typeof TypeKind];

export enum Signing {
    Unspecified = 0,
    Signed = 1,
    Unsigned = 2,
}

export type IntegerVectorKeyword = "logic" | "reg" | "bit";
export type IntegerAtomKeyword =
    | "byte"
    | "shortint"
    | "int"
    | "longint"
    | "integer"
    | "time";
export type NonIntegerKeyword =
    | "real"
    | "realtime"
    | "shortreal"
    | "string"
    | "event"
    | "chandle";

/**
 * Data types as they appear on a declaration. Every type carries its packed
 * dimensions; unpacked dimensions belong to the declared name.
 */
export type IntegerVectorType = {
    kind: typeof TypeKind.IntegerVector;
    keyword: IntegerVectorKeyword;
    signing: Signing;
    ranges: Range[];
};
export type IntegerAtomType = {
    kind: typeof TypeKind.IntegerAtom;
    keyword: IntegerAtomKeyword;
    signing: Signing;
    ranges: Range[];
};
export type NonIntegerType = {
    kind: typeof TypeKind.NonInteger;
    keyword: NonIntegerKeyword;
    ranges: Range[];
};
export type ImplicitType = {
    kind: typeof TypeKind.Implicit;
    signing: Signing;
    ranges: Range[];
};
export type AliasType = {
    kind: typeof TypeKind.Alias;
    name: string;
    ranges: Range[];
};
export type PSAliasType = {
    kind: typeof TypeKind.PSAlias;
    scope: string;
    name: string;
    ranges: Range[];
};
export type InterfaceType = {
    kind: typeof TypeKind.Interface;
    name: string;
    modport: string;
    ranges: Range[];
};

export type Type =
    | IntegerVectorType
    | IntegerAtomType
    | NonIntegerType
    | ImplicitType
    | AliasType
    | PSAliasType
    | InterfaceType;

// ============================================================================
// Unresolved types
// ============================================================================

// A base type still waiting for its trailing signing and packed ranges.
export type TypeBase =
    | { kind: typeof TypeKind.IntegerVector; keyword: IntegerVectorKeyword }
    | { kind: typeof TypeKind.IntegerAtom; keyword: IntegerAtomKeyword }
    | { kind: typeof TypeKind.NonInteger; keyword: NonIntegerKeyword }
    | { kind: typeof TypeKind.Implicit }
    | { kind: typeof TypeKind.Alias; name: string }
    | { kind: typeof TypeKind.PSAlias; scope: string; name: string }
    | { kind: typeof TypeKind.Interface; name: string; modport: string };

function makeIntegerVectorBase(keyword: IntegerVectorKeyword): TypeBase {
    return { kind: TypeKind.IntegerVector, keyword };
}

function makeIntegerAtomBase(keyword: IntegerAtomKeyword): TypeBase {
    return { kind: TypeKind.IntegerAtom, keyword };
}

function makeNonIntegerBase(keyword: NonIntegerKeyword): TypeBase {
    return { kind: TypeKind.NonInteger, keyword };
}

function makeImplicitBase(): TypeBase {
    return { kind: TypeKind.Implicit };
}

function makeAliasBase(name: string): TypeBase {
    return { kind: TypeKind.Alias, name };
}

function makePSAliasBase(scope: string, name: string): TypeBase {
    return { kind: TypeKind.PSAlias, scope, name };
}

function makeInterfaceBase(name: string, modport: string): TypeBase {
    return { kind: TypeKind.Interface, name, modport };
}

function isSignable(base: TypeBase): boolean {
    return (
        base.kind === TypeKind.IntegerVector ||
        base.kind === TypeKind.IntegerAtom ||
        base.kind === TypeKind.Implicit
    );
}

/**
 * Finalize a base type with the signing and packed ranges that followed it.
 * Signing on a type that cannot carry one is rejected; the error is the
 * message only, the caller knows which tokens were involved.
 */
function resolveType(
    base: TypeBase,
    signing: Signing,
    ranges: Range[],
): Result<Type, string> {
    if (signing !== Signing.Unspecified && !isSignable(base)) {
        return err(
            `signing qualifier \`${signingKeyword(signing)}\` cannot apply to type \`${typeBaseName(base)}\``,
        );
    }
    switch (base.kind) {
        case TypeKind.IntegerVector:
            return ok({ ...base, signing, ranges });
        case TypeKind.IntegerAtom:
            return ok({ ...base, signing, ranges });
        case TypeKind.Implicit:
            return ok({ kind: TypeKind.Implicit, signing, ranges });
        case TypeKind.NonInteger:
            return ok({ ...base, ranges });
        case TypeKind.Alias:
            return ok({ ...base, ranges });
        case TypeKind.PSAlias:
            return ok({ ...base, ranges });
        case TypeKind.Interface:
            return ok({ ...base, ranges });
    }
}

// ============================================================================
// Type Utilities
// ============================================================================

function signingKeyword(signing: Signing): string {
    switch (signing) {
        case Signing.Signed:
            return "signed";
        case Signing.Unsigned:
            return "unsigned";
        case Signing.Unspecified:
            return "";
    }
}

function typeBaseName(base: TypeBase): string {
    switch (base.kind) {
        case TypeKind.IntegerVector:
        case TypeKind.IntegerAtom:
        case TypeKind.NonInteger:
            return base.keyword;
        case TypeKind.Implicit:
            return "implicit";
        case TypeKind.Alias:
            return base.name;
        case TypeKind.PSAlias:
            return `${base.scope}::${base.name}`;
        case TypeKind.Interface:
            return `${base.name}.${base.modport}`;
    }
}

function isInterfaceType(type: Type): type is InterfaceType {
    return type.kind === TypeKind.Interface;
}

export {
    makeIntegerVectorBase,
    makeIntegerAtomBase,
    makeNonIntegerBase,
    makeImplicitBase,
    makeAliasBase,
    makePSAliasBase,
    makeInterfaceBase,
    isSignable,
    resolveType,
    signingKeyword,
    typeBaseName,
    isInterfaceType,
};
