export * from "./ast";
export * from "./types";
export * from "./decl_tokens";
export {
    ParseDeclErrorKind,
    Level,
    ok,
    err,
    map,
    andThen,
    unwrap,
    makeParseDeclError,
    positionToSourceSpan,
    toDiagnostic,
    type Result,
    type ParseDeclError,
    type ParseDeclErrorKindValue,
    type Diagnostic,
    type SourceLocation,
    type SourceSpan,
} from "./diagnostics";
export { tripLookahead, couldBeTypename } from "./lookahead";
export {
    DEFAULT_DECL_PARSE_OPTIONS,
    parseComponents,
    finalize,
    type Component,
    type Triplet,
    type DeclParseOptions,
} from "./components";
export { takeLHS, lhsToExpr } from "./lhs";
export {
    ELAB_TASK_MODULE,
    parsePortDecls,
    parseModuleItems,
    parseDecls,
    parseDecl,
    parseDeclOrStmt,
    parseForInit,
    propagateDirections,
    type PortDecls,
    type DeclOrStmt,
    type ForAsgn,
    type ForInit,
} from "./parse_decl";
export * from "./printer";
export { makeCursor, type Cursor, type Taken } from "./cursor";
