// ============================================================================
// Diagnostics and Error Reporting
// ============================================================================

import type { Position } from "./ast";
import type { DeclToken } from "./decl_tokens";

// ============================================================================
// Result Type
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a successful result
 */
function ok$1<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Create an error result
 */
function err$1<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Map a result's value if successful
 */
export function map<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U,
): Result<U, E> {
    if (result.ok) {
        return ok$1(fn(result.value));
    }
    return result;
}

/**
 * Chain a result with another operation
 */
export function andThen<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>,
): Result<U, E> {
    if (result.ok) {
        return fn(result.value);
    }
    return result;
}

/**
 * Unwrap a result, throwing if it's an error
 */
export function unwrap<T>(result: Result<T, ParseDeclError>): T {
    if (result.ok) {
        return result.value;
    }
    throw new Error(result.error.message);
}

// ============================================================================
// Parse Errors
// ============================================================================

export const ParseDeclErrorKind = {
    // tokens that do not fit any recognized shape
    ShapeMismatch: 0,
    // compound/non-blocking assignment or timing control in a declaration
    InvalidOperator: 1,
    // wrong number of declaration components
    ArityMismatch: 2,
    // lifetime or signing that cannot apply
    InvalidQualifier: 3,
    // statement prefix that is not an assignment target
    UnrecoverableLhs: 4,
} as const satisfies Record<string, number>;

export type ParseDeclErrorKindValue =
    (typeof ParseDeclErrorKind)[keyof typeof ParseDeclErrorKind];

export type ParseDeclError = {
    kind: ParseDeclErrorKindValue;
    message: string;
    pos: Position | null;
    tokens: readonly DeclToken[];
};

/**
 * Create a parse error; the position defaults to that of the first
 * offending token.
 */
function makeParseDeclError(
    kind: ParseDeclErrorKindValue,
    message: string,
    pos: Position | null,
    tokens: readonly DeclToken[],
): ParseDeclError {
    return { kind, message, pos: pos ?? tokens[0]?.pos ?? null, tokens };
}

// ============================================================================
// Diagnostic Structure
// ============================================================================

type SourceLocation = {
    file?: string;
    line: number;
    column: number;
};

type SourceSpan = {
    start: SourceLocation;
    end: SourceLocation;
};

/**
 * Diagnostic severity level
 */
enum Level {
    Error,
    Warning,
    Note,
    Help,
}

type Diagnostic = {
    level: Level;
    message: string;
    span?: SourceSpan;
    code?: string;
    hint?: string;
};

const ERROR_KIND_CODES: Record<ParseDeclErrorKindValue, string> = {
    [ParseDeclErrorKind.ShapeMismatch]: "D0001",
    [ParseDeclErrorKind.InvalidOperator]: "D0002",
    [ParseDeclErrorKind.ArityMismatch]: "D0003",
    [ParseDeclErrorKind.InvalidQualifier]: "D0004",
    [ParseDeclErrorKind.UnrecoverableLhs]: "D0005",
};

const ERROR_KIND_HINTS: Partial<Record<ParseDeclErrorKindValue, string>> = {
    [ParseDeclErrorKind.InvalidOperator]:
        "only `=` without a timing control may initialize a declaration",
    [ParseDeclErrorKind.InvalidQualifier]:
        "declarations accept only the `automatic` lifetime",
};

function positionToSourceSpan(pos: Position): SourceSpan {
    return {
        start: { file: pos.file, line: pos.line, column: pos.column },
        end: { file: pos.file, line: pos.line, column: pos.column + 1 },
    };
}

/**
 * Convert a parse error into a diagnostic the host pipeline can render
 */
function toDiagnostic(error: ParseDeclError): Diagnostic {
    const diag: Diagnostic = {
        level: Level.Error,
        message: error.message,
        code: ERROR_KIND_CODES[error.kind],
    };
    if (error.pos) {
        diag.span = positionToSourceSpan(error.pos);
    }
    const hint = ERROR_KIND_HINTS[error.kind];
    if (hint !== undefined) {
        diag.hint = hint;
    }
    return diag;
}

export type { SourceLocation, SourceSpan, Diagnostic };

export {
    ok$1 as ok,
    err$1 as err,
    makeParseDeclError,
    Level,
    positionToSourceSpan,
    toDiagnostic,
};
