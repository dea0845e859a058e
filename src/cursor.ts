import {
    AsgnOpKind,
    Direction,
    ExprKind,
    PartSelectMode,
    makeNumber,
    makeRange,
    type Expr,
    type Range,
} from "./ast";
import { DeclTokenKind, type DeclToken } from "./decl_tokens";

/**
 * Read position over a token array. Cursors are never mutated; every step
 * returns a new one.
 */
export type Cursor = { readonly tokens: readonly DeclToken[]; readonly index: number };

// A value consumed from the front of a cursor, plus what is left.
export type Taken<T> = { value: T; next: Cursor };

function makeCursor(tokens: readonly DeclToken[]): Cursor {
    return { tokens, index: 0 };
}

function peek(cursor: Cursor, offset: number = 0): DeclToken | undefined {
    return cursor.tokens[cursor.index + offset];
}

function advance(cursor: Cursor, count: number = 1): Cursor {
    const index = Math.min(cursor.index + count, cursor.tokens.length);
    return { tokens: cursor.tokens, index };
}

function atEnd(cursor: Cursor): boolean {
    return cursor.index >= cursor.tokens.length;
}

function remaining(cursor: Cursor): readonly DeclToken[] {
    return cursor.tokens.slice(cursor.index);
}

/**
 * Offset (relative to the cursor) of the first remaining token matching the
 * predicate, or -1.
 */
function findAhead(
    cursor: Cursor,
    predicate: (token: DeclToken) => boolean,
): number {
    for (let i = cursor.index; i < cursor.tokens.length; i++) {
        if (predicate(cursor.tokens[i])) return i - cursor.index;
    }
    return -1;
}

// ============================================================================
// Shared take steps
// ============================================================================

function takeDir(cursor: Cursor): Taken<Direction> {
    const token = peek(cursor);
    if (token?.kind === DeclTokenKind.Dir) {
        return { value: token.dir, next: advance(cursor) };
    }
    return { value: Direction.Local, next: cursor };
}

// Element count of an unsized-array initializer, if it has one.
function autoDimCount(token: DeclToken | undefined): number | null {
    if (
        token?.kind !== DeclTokenKind.Asgn ||
        token.op.kind !== AsgnOpKind.Eq ||
        token.timing !== null
    ) {
        return null;
    }
    const expr = token.expr;
    if (expr.kind === ExprKind.Pattern || expr.kind === ExprKind.Concat) {
        return expr.items.length;
    }
    return null;
}

/**
 * Take the run of array dimensions at the cursor. An empty `[]` takes its
 * size from a following `= '{...}` or `= {...}` initializer, which is left
 * in place; otherwise it adds nothing.
 */
function takeRanges(cursor: Cursor): Taken<Range[]> {
    const ranges: Range[] = [];
    let next = cursor;
    for (;;) {
        const token = peek(next);
        if (
            token?.kind === DeclTokenKind.Range &&
            token.mode === PartSelectMode.NonIndexed
        ) {
            ranges.push(token.range);
        } else if (token?.kind === DeclTokenKind.AutoDim) {
            const count = autoDimCount(peek(next, 1));
            if (count !== null) {
                ranges.push(makeRange(makeNumber("0"), makeNumber(String(count - 1))));
            }
        } else {
            break;
        }
        next = advance(next);
    }
    return { value: ranges, next };
}

// Any assignment token is taken here; entry points reject bad operators.
function takeAsgn(cursor: Cursor): Taken<Expr | null> {
    const token = peek(cursor);
    if (token?.kind === DeclTokenKind.Asgn) {
        return { value: token.expr, next: advance(cursor) };
    }
    return { value: null, next: cursor };
}

export {
    makeCursor,
    peek,
    advance,
    atEnd,
    remaining,
    findAhead,
    takeDir,
    takeRanges,
    takeAsgn,
};
