import {
    Lifetime,
    makeCommentDecl,
    makeVariable,
    showPosition,
    type Decl,
    type Direction,
    type Expr,
    type Position,
    type Range,
} from "./ast";
import {
    type Cursor,
    type Taken,
    advance,
    atEnd,
    makeCursor,
    peek,
    remaining,
    takeAsgn,
    takeDir,
    takeRanges,
} from "./cursor";
import { DeclTokenKind, type DeclToken } from "./decl_tokens";
import {
    type ParseDeclError,
    type Result,
    ParseDeclErrorKind,
    err,
    makeParseDeclError,
    ok,
} from "./diagnostics";
import { couldBeTypename, tripLookahead } from "./lookahead";
import { printToken, printTokens } from "./printer";
import {
    Signing,
    makeAliasBase,
    makeImplicitBase,
    makeInterfaceBase,
    makePSAliasBase,
    resolveType,
    type Type,
    type TypeBase,
} from "./types";

// One declared name: `name [dims] = init`
export type Triplet = { name: string; ranges: Range[]; init: Expr | null };

// Declared names sharing one direction/type prefix.
export type Component = {
    pos: Position;
    dir: Direction;
    type: Type;
    triplets: Triplet[];
};

// Options understood by everything that emits declarations or statements.
export type DeclParseOptions = {
    // emit a `Trace: file:line:column` comment before each group
    traceMarkers?: boolean;
};

export const DEFAULT_DECL_PARSE_OPTIONS: Required<DeclParseOptions> = {
    traceMarkers: true,
};

// A base type with its signing, before packed ranges are known.
type PendingType = { base: TypeBase; signing: Signing };

type Step<T> = Result<Taken<T>, ParseDeclError>;

function shapeError(message: string, tokens: readonly DeclToken[]): ParseDeclError {
    return makeParseDeclError(ParseDeclErrorKind.ShapeMismatch, message, null, tokens);
}

function traceText(pos: Position): string {
    return `Trace: ${showPosition(pos)}`;
}

// ============================================================================
// Take steps
// ============================================================================

function takeLifetime(cursor: Cursor): Step<Lifetime | null> {
    const token = peek(cursor);
    if (token?.kind !== DeclTokenKind.Lifetime) {
        return ok({ value: null, next: cursor });
    }
    if (token.lifetime !== Lifetime.Automatic) {
        return err(
            makeParseDeclError(
                ParseDeclErrorKind.InvalidQualifier,
                `unexpected lifetime \`${printToken(token)}\` on declaration`,
                token.pos,
                [token],
            ),
        );
    }
    return ok({ value: token.lifetime, next: advance(cursor) });
}

function takeType(cursor: Cursor): Taken<PendingType> {
    const unsigned = (base: TypeBase, next: Cursor): Taken<PendingType> => ({
        value: { base, signing: Signing.Unspecified },
        next,
    });
    const first = peek(cursor);
    const second = peek(cursor, 1);
    if (first === undefined) {
        return unsigned(makeImplicitBase(), cursor);
    }
    switch (first.kind) {
        case DeclTokenKind.Ident:
            if (second?.kind === DeclTokenKind.Dot) {
                return unsigned(
                    makeInterfaceBase(first.name, second.name),
                    advance(cursor, 2),
                );
            }
            // a variable name stays in place for the triplets
            return couldBeTypename(advance(cursor))
                ? unsigned(makeAliasBase(first.name), advance(cursor))
                : unsigned(makeImplicitBase(), cursor);
        case DeclTokenKind.ScopedIdent:
            return couldBeTypename(advance(cursor))
                ? unsigned(makePSAliasBase(first.scope, first.name), advance(cursor))
                : unsigned(makeImplicitBase(), cursor);
        case DeclTokenKind.TypeCtor:
            if (second?.kind === DeclTokenKind.Signing) {
                return {
                    value: { base: first.base, signing: second.signing },
                    next: advance(cursor, 2),
                };
            }
            return unsigned(first.base, advance(cursor));
        case DeclTokenKind.Signing:
            return {
                value: { base: makeImplicitBase(), signing: first.signing },
                next: advance(cursor),
            };
        default:
            return unsigned(makeImplicitBase(), cursor);
    }
}

function takeIdent(cursor: Cursor): Step<string> {
    const token = peek(cursor);
    if (token?.kind === DeclTokenKind.Ident) {
        return ok({ value: token.name, next: advance(cursor) });
    }
    if (token === undefined) {
        return err(shapeError("incomplete declaration", cursor.tokens));
    }
    return err(
        shapeError(
            `expected a declared name, found \`${printToken(token)}\` in \`${printTokens(cursor.tokens)}\``,
            [token],
        ),
    );
}

// true when a comma was taken, false at the end of the tokens
function takeComma(cursor: Cursor): Step<boolean> {
    const token = peek(cursor);
    if (token === undefined) {
        return ok({ value: false, next: cursor });
    }
    if (token.kind === DeclTokenKind.Comma) {
        return ok({ value: true, next: advance(cursor) });
    }
    return err(
        shapeError(
            `expected \`,\` or end of declaration, found \`${printTokens(remaining(cursor))}\``,
            remaining(cursor),
        ),
    );
}

/**
 * Take the declared names of one component. The first is mandatory; more are
 * taken for as long as the lookahead says another name follows.
 */
function takeTriplets(cursor: Cursor): Step<Triplet[]> {
    if (atEnd(cursor)) {
        return err(shapeError("incomplete declaration", cursor.tokens));
    }
    const triplets: Triplet[] = [];
    let next = cursor;
    for (;;) {
        const name = takeIdent(next);
        if (!name.ok) return name;
        const ranges = takeRanges(name.value.next);
        const init = takeAsgn(ranges.next);
        const comma = takeComma(init.next);
        if (!comma.ok) return comma;
        triplets.push({ name: name.value.value, ranges: ranges.value, init: init.value });
        next = comma.value.next;

        if (!comma.value.value) break;
        if (atEnd(next)) {
            return err(shapeError("trailing `,` in declaration list", cursor.tokens));
        }
        if (!tripLookahead(next)) break;
    }
    return ok({ value: triplets, next });
}

// ============================================================================
// Components
// ============================================================================

function takeComponent(cursor: Cursor): Step<Component> {
    const first = peek(cursor);
    if (first === undefined) {
        return err(shapeError("incomplete declaration", cursor.tokens));
    }
    const dir = takeDir(cursor);
    const lifetime = takeLifetime(dir.next);
    if (!lifetime.ok) return lifetime;
    const typeStart = lifetime.value.next;
    const pending = takeType(typeStart);
    const ranges = takeRanges(pending.next);
    const type = resolveType(pending.value.base, pending.value.signing, ranges.value);
    if (!type.ok) {
        const consumed = typeStart.tokens.slice(typeStart.index, ranges.next.index);
        return err(
            makeParseDeclError(
                ParseDeclErrorKind.InvalidQualifier,
                type.error,
                consumed[0]?.pos ?? first.pos,
                consumed,
            ),
        );
    }
    const triplets = takeTriplets(ranges.next);
    if (!triplets.ok) return triplets;
    return ok({
        value: {
            pos: first.pos,
            dir: dir.value,
            type: type.value,
            triplets: triplets.value.value,
        },
        next: triplets.value.next,
    });
}

/**
 * Split a token stream into declaration components, front to back.
 */
function parseComponents(
    tokens: readonly DeclToken[],
): Result<Component[], ParseDeclError> {
    const components: Component[] = [];
    let cursor = makeCursor(tokens);
    while (!atEnd(cursor)) {
        const component = takeComponent(cursor);
        if (!component.ok) return component;
        components.push(component.value.value);
        cursor = component.value.next;
    }
    return ok(components);
}

/**
 * Expand a component into one variable per declared name, preceded by a trace
 * marker unless disabled.
 */
function finalize(
    component: Component,
    options: DeclParseOptions = DEFAULT_DECL_PARSE_OPTIONS,
): Decl[] {
    const { traceMarkers } = { ...DEFAULT_DECL_PARSE_OPTIONS, ...options };
    const decls = component.triplets.map((trip) =>
        makeVariable(component.dir, component.type, trip.name, trip.ranges, trip.init),
    );
    return traceMarkers ? [makeCommentDecl(traceText(component.pos)), ...decls] : decls;
}

export { traceText, parseComponents, finalize };
