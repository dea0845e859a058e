import { describe, test, expect } from "vitest";
import {
    DeclKind,
    Direction,
    ModuleItemKind,
    StmtKind,
    makeCommentStmt,
    makeIdent,
    makeParamBinding,
} from "../src/ast";
import type { DeclToken } from "../src/decl_tokens";
import { ParseDeclErrorKind } from "../src/diagnostics";
import {
    ELAB_TASK_MODULE,
    parseDecl,
    parseDeclOrStmt,
    parseDecls,
    parseForInit,
    parseModuleItems,
    parsePortDecls,
} from "../src/parse_decl";
import { printDecl, printExpr, printLHS, printModuleItem, printStmt } from "../src/printer";
import {
    args,
    bit,
    comma,
    concat,
    delayedEq,
    dims,
    dot,
    eq,
    ident,
    indexed,
    input,
    int,
    logic,
    named,
    nonBlocking,
    num,
    output,
    params,
    placed,
    plusEq,
    pos,
    positional,
    scoped,
} from "./helpers";

// ============================================================================
// Port lists
// ============================================================================

describe("parsePortDecls", () => {
    test("bare name list", () => {
        const result = parsePortDecls([ident("a"), comma(), ident("b"), comma(), ident("c")]);
        expect(result).toEqual({ ok: true, value: { names: ["a", "b", "c"], items: [] } });
    });

    test("single bare name", () => {
        const result = parsePortDecls([ident("clk")]);
        expect(result).toEqual({ ok: true, value: { names: ["clk"], items: [] } });
    });

    test("direction carries over to a later group", () => {
        // input logic a, b, logic c
        const tokens = placed([
            input(),
            logic(),
            ident("a"),
            comma(),
            ident("b"),
            comma(),
            logic(),
            ident("c"),
        ]);
        const result = parsePortDecls(tokens);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.names).toEqual(["a", "b", "c"]);
        expect(result.value.items.map(printModuleItem)).toEqual([
            "// Trace: test.sv:1:1",
            "input logic a;",
            "input logic b;",
            "// Trace: test.sv:1:7",
            "input logic c;",
        ]);
    });

    test("a later explicit direction takes over", () => {
        const tokens = [input(), ident("a"), comma(), output(), ident("b"), comma(), logic(), ident("c")];
        const result = parsePortDecls(tokens, { traceMarkers: false });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.items.map(printModuleItem)).toEqual([
            "input a;",
            "output b;",
            "output logic c;",
        ]);
    });

    test("interface ports neither take nor pass on a direction", () => {
        // input logic a, intf.mp bus, logic c
        const tokens = [
            input(),
            logic(),
            ident("a"),
            comma(),
            ident("intf"),
            dot("mp"),
            ident("bus"),
            comma(),
            logic(),
            ident("c"),
        ];
        const result = parsePortDecls(tokens, { traceMarkers: false });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.names).toEqual(["a", "bus", "c"]);
        const decls = result.value.items.map(printModuleItem);
        expect(decls).toEqual(["input logic a;", "intf.mp bus;", "input logic c;"]);
    });

    test("ports before any direction stay local", () => {
        const result = parsePortDecls([logic(), ident("a")], { traceMarkers: false });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const [item] = result.value.items;
        expect(item.kind).toBe(ModuleItemKind.Decl);
        if (item.kind !== ModuleItemKind.Decl || item.decl.kind !== DeclKind.Variable) return;
        expect(item.decl.dir).toBe(Direction.Local);
    });

    test("non-blocking assignment is rejected", () => {
        const tokens = placed([input(), ident("a"), nonBlocking(num(1))]);
        const result = parsePortDecls(tokens);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.InvalidOperator);
        expect(result.error.message).toBe(
            "decl tokens contain bad assignment operator `<= 1`: `input a <= 1`",
        );
        expect(result.error.pos).toEqual(pos(3));
    });
});

// ============================================================================
// Declarations
// ============================================================================

describe("parseDecls", () => {
    test("several groups", () => {
        const result = parseDecls(placed([logic(), ident("a"), comma(), int(), ident("b")]));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printDecl)).toEqual([
            "// Trace: test.sv:1:1",
            "logic a;",
            "// Trace: test.sv:1:4",
            "int b;",
        ]);
    });

    test("without trace markers", () => {
        const result = parseDecls([logic(), ident("a"), comma(), int(), ident("b")], {
            traceMarkers: false,
        });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printDecl)).toEqual(["logic a;", "int b;"]);
    });

    test("compound assignment is rejected", () => {
        const result = parseDecls([int(), ident("x"), plusEq(num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.InvalidOperator);
        expect(result.error.message).toBe(
            "decl tokens contain bad assignment operator `+= 1`: `int x += 1`",
        );
    });

    test("timing control is rejected", () => {
        const result = parseDecls([int(), ident("x"), delayedEq(2, num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.InvalidOperator);
        expect(result.error.message).toBe(
            "decl tokens contain bad assignment operator `= #2 1`: `int x = #2 1`",
        );
    });
});

describe("parseDecl", () => {
    test("single group with initializer", () => {
        const result = parseDecl([int(), ident("x"), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printDecl)).toEqual(["// Trace: test.sv:1:1", "int x = 1;"]);
    });

    test("two groups are an arity error", () => {
        const result = parseDecl([logic(), ident("a"), comma(), int(), ident("b")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ArityMismatch);
        expect(result.error.message).toBe(
            "expected exactly one declaration, found 2: `logic a , int b`",
        );
    });

    test("no groups are an arity error", () => {
        const result = parseDecl([]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ArityMismatch);
        expect(result.error.pos).toBeNull();
    });
});

// ============================================================================
// Module items
// ============================================================================

describe("parseModuleItems", () => {
    test("informational task contributes nothing", () => {
        const result = parseModuleItems([ident("$info"), args(positional("msg"))]);
        expect(result).toEqual({ ok: true, value: [] });
    });

    test("fatal task becomes one placeholder instance", () => {
        const result = parseModuleItems([ident("$fatal"), args(positional("msg"))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.length).toBe(1);
        expect(result.value.map(printModuleItem)).toEqual([
            `${ELAB_TASK_MODULE} __elab_fatal (msg);`,
        ]);
    });

    test("task without arguments", () => {
        const result = parseModuleItems([ident("$error")]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printModuleItem)).toEqual([
            "__ElaborationTask __elab_error ();",
        ]);
    });

    test("task with stray tokens", () => {
        const result = parseModuleItems([ident("$warning"), ident("x")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe("could not parse elaboration system task: `$warning x`");
    });

    test("instances with parameters and ranges", () => {
        const width = makeParamBinding("W", { kind: "expr", expr: num(8) });
        const result = parseModuleItems([
            ident("Mod"),
            params(width),
            ident("u0"),
            args(named("clk", "clk")),
            comma(),
            ident("u1"),
            dims(3, 0),
            args(),
        ]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printModuleItem)).toEqual([
            "Mod #(.W(8)) u0 (.clk(clk));",
            "Mod #(.W(8)) u1 [3:0] ();",
        ]);
    });

    test("instances mixed with a declaration", () => {
        const result = parseModuleItems([ident("Mod"), ident("u0"), args(), comma(), ident("x")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe("instantiations mixed with other items: `x`");
    });

    test("indexed select on an instance", () => {
        const result = parseModuleItems([ident("Mod"), ident("u0"), indexed(0, 4), args()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe("unrecognized instance `u0 [0+:4] ()`");
    });

    test("unrecognized instance shape", () => {
        const result = parseModuleItems([ident("Mod"), ident("u0"), ident("u1"), args()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe("unrecognized instance `u0 u1 ()`");
    });

    test("trailing comma after the last instance", () => {
        const result = parseModuleItems([ident("Mod"), ident("u0"), args(), comma()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe("empty instance in instantiation list: `Mod u0 () ,`");
    });

    test("instantiation must start with a module name", () => {
        const result = parseModuleItems([logic(), ident("u0"), args()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe(
            "decl tokens contain instantiations, but start with non-ident: `logic u0 ()`",
        );
    });

    test("plain declaration", () => {
        const result = parseModuleItems([logic(), dims(3, 0), ident("a")]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.map(printModuleItem)).toEqual([
            "// Trace: test.sv:1:1",
            "logic [3:0] a;",
        ]);
    });
});

// ============================================================================
// Declarations or statements
// ============================================================================

function stmts(tokens: DeclToken[]): string[] {
    const result = parseDeclOrStmt(tokens);
    expect(result.ok).toBe(true);
    if (!result.ok) return [];
    expect(result.value.decls).toEqual([]);
    return result.value.stmts.map(printStmt);
}

describe("parseDeclOrStmt", () => {
    test("assignment", () => {
        const result = parseDeclOrStmt([ident("x"), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.decls).toEqual([]);
        expect(result.value.stmts.length).toBe(2);
        expect(result.value.stmts[0]).toEqual(makeCommentStmt("Trace: test.sv:1:1"));
        const stmt = result.value.stmts[1];
        expect(stmt.kind).toBe(StmtKind.Asgn);
        if (stmt.kind !== StmtKind.Asgn) return;
        expect(printLHS(stmt.lhs)).toBe("x");
        expect(stmt.expr).toEqual(num(1));
    });

    test("declaration with initializer", () => {
        const result = parseDeclOrStmt([int(), ident("x"), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.stmts).toEqual([]);
        expect(result.value.decls.map(printDecl)).toEqual(["// Trace: test.sv:1:1", "int x = 1;"]);
    });

    const statements: [string, DeclToken[], string][] = [
        ["bare call", [ident("tick")], "tick();"],
        ["bare scoped call", [scoped("pkg", "reset")], "pkg::reset();"],
        ["call with arguments", [ident("f"), args(positional("a"), named("k", "b"))], "f(a, .k(b));"],
        ["scoped call with arguments", [scoped("pkg", "f"), args(positional("a"))], "pkg::f(a);"],
        ["method call", [ident("q"), dot("push"), args(positional("v"))], "q.push(v);"],
        ["non-blocking to a bit", [ident("a"), bit(num(0)), nonBlocking(num(1))], "a[0] <= 1;"],
        ["delayed assignment", [ident("x"), delayedEq(1, makeIdent("y"))], "x = #1 y;"],
        ["compound assignment", [ident("i"), plusEq(num(1))], "i += 1;"],
        ["leading assignment moves last", [plusEq(num(1)), ident("i")], "i += 1;"],
        ["concatenation target", [concat("a", "b"), eq(makeIdent("c"))], "{a, b} = c;"],
    ];
    for (const [name, tokens, expected] of statements) {
        test(name, () => {
            expect(stmts(tokens)).toEqual(["// Trace: test.sv:1:1", expected]);
        });
    }

    test("trace marks the first token", () => {
        const tokens = [plusEq(num(1)), { ...ident("i"), pos: pos(3, 2) }];
        expect(stmts(tokens)[0]).toBe("// Trace: test.sv:1:1");
    });

    test("without trace markers", () => {
        const result = parseDeclOrStmt([ident("x"), eq(num(1))], { traceMarkers: false });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.stmts.map(printStmt)).toEqual(["x = 1;"]);
    });

    test("call arguments split by name", () => {
        const result = parseDeclOrStmt([ident("f"), args(positional("a"), named("k", "b"))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const stmt = result.value.stmts[1];
        expect(stmt.kind).toBe(StmtKind.Subroutine);
        if (stmt.kind !== StmtKind.Subroutine) return;
        expect(stmt.args).toEqual({
            positional: [makeIdent("a")],
            keyword: [{ name: "k", expr: makeIdent("b") }],
        });
    });

    test("compound assignment to a non-target", () => {
        const result = parseDeclOrStmt([int(), ident("x"), plusEq(num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.UnrecoverableLhs);
        expect(result.error.message).toBe("could not parse as LHS: `int x`");
    });

    test("call on a non-target", () => {
        const result = parseDeclOrStmt([logic(), args()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.UnrecoverableLhs);
        expect(result.error.message).toBe("could not parse as LHS: `logic`");
    });

    test("two declaration groups", () => {
        const result = parseDeclOrStmt([logic(), ident("a"), comma(), int(), ident("b")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ArityMismatch);
    });

    test("empty input", () => {
        const result = parseDeclOrStmt([]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe("empty declaration or statement");
    });
});

// ============================================================================
// For-loop initializers
// ============================================================================

describe("parseForInit", () => {
    test("assignment list", () => {
        const result = parseForInit([ident("i"), eq(num(0)), comma(), ident("j"), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const init = result.value;
        expect(init.kind).toBe("asgns");
        if (init.kind !== "asgns") return;
        expect(init.asgns.map((a) => `${printLHS(a.lhs)} = ${printExpr(a.expr)}`)).toEqual([
            "i = 0",
            "j = 1",
        ]);
    });

    test("declaration list", () => {
        const result = parseForInit([int(), ident("i"), eq(num(0)), comma(), ident("j"), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const init = result.value;
        expect(init.kind).toBe("decls");
        if (init.kind !== "decls") return;
        expect(init.decls.map(printDecl)).toEqual([
            "// Trace: test.sv:1:1",
            "int i = 0;",
            "int j = 1;",
        ]);
    });

    test("bit select marks an assignment", () => {
        const result = parseForInit([ident("a"), bit(num(0)), eq(num(1))]);
        expect(result.ok).toBe(true);
        if (!result.ok || result.value.kind !== "asgns") return;
        expect(result.value.asgns.map((a) => printLHS(a.lhs))).toEqual(["a[0]"]);
    });

    test("concatenation marks an assignment", () => {
        const result = parseForInit([concat("a", "b"), eq(makeIdent("c"))]);
        expect(result.ok).toBe(true);
        if (!result.ok || result.value.kind !== "asgns") return;
        expect(result.value.asgns.map((a) => printLHS(a.lhs))).toEqual(["{a, b}"]);
    });

    test("declaration without initializer", () => {
        const result = parseForInit([int(), ident("i")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.ShapeMismatch);
        expect(result.error.message).toBe(
            "for loop declaration of `i` is missing an initialization: `int i`",
        );
    });

    test("compound assignment is rejected", () => {
        const result = parseForInit([ident("i"), plusEq(num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.InvalidOperator);
    });

    test("trailing comma", () => {
        const result = parseForInit([ident("i"), eq(num(0)), comma()]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe("trailing `,` in for loop initialization");
    });

    test("missing separator", () => {
        const result = parseForInit([ident("i"), eq(num(0)), ident("j"), eq(num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe("bad for loop assignment: `i = 0 j = 1`");
    });

    test("missing assignment", () => {
        const result = parseForInit([ident("i"), comma(), ident("j")]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe("for loop assignment is missing `=`: `i , j`");
    });

    test("target that is not an LHS", () => {
        const result = parseForInit([ident("a"), dot("f"), logic(), eq(num(1))]);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe(ParseDeclErrorKind.UnrecoverableLhs);
        expect(result.error.message).toBe("could not parse as LHS: `a .f logic`");
    });
});
