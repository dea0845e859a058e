import {
    type Cursor,
    advance,
    atEnd,
    findAhead,
    peek,
    takeAsgn,
    takeRanges,
} from "./cursor";
import { isComma, isIdent } from "./decl_tokens";

/**
 * Does another declared name (triplet) start at the cursor, as opposed to the
 * end of the list or the type of a new declaration?
 */
function tripLookahead(cursor: Cursor): boolean {
    // every triplet must begin with an identifier
    const head = peek(cursor);
    if (head === undefined || !isIdent(head)) {
        return false;
    }
    const afterIdent = advance(cursor);
    if (atEnd(afterIdent)) {
        return true;
    }
    const ranges = takeRanges(afterIdent);
    const asgn = takeAsgn(ranges.next);
    // an initializer, or a trailing array declarator, completes a triplet
    if (asgn.value !== null || atEnd(ranges.next)) {
        return true;
    }
    // A type name is always followed by at least one declared name before any
    // comma, so a comma right here means the identifier was a name.
    const after = peek(asgn.next);
    return after !== undefined && isComma(after);
}

/**
 * Given the tokens after a leading identifier, could that identifier be a
 * type name? It is one when another identifier follows before the next comma.
 */
function couldBeTypename(rest: Cursor): boolean {
    const identAt = findAhead(rest, isIdent);
    const commaAt = findAhead(rest, isComma);
    if (identAt < 0) {
        // nothing left to declare
        return false;
    }
    if (commaAt < 0) {
        return true;
    }
    return identAt < commaAt;
}

export { tripLookahead, couldBeTypename };
