import {
    AsgnOpKind,
    BinaryOp,
    DeclKind,
    Direction,
    ExprKind,
    LHSKind,
    Lifetime,
    ModuleItemKind,
    PartSelectMode,
    StmtKind,
    StreamOp,
    TimingKind,
    type Args,
    type AsgnOp,
    type Decl,
    type Expr,
    type LHS,
    type ModuleItem,
    type ParamBinding,
    type PortBinding,
    type Range,
    type Stmt,
    type Timing,
} from "./ast";
import { DeclTokenKind, type DeclToken } from "./decl_tokens";
import { TypeKind, signingKeyword, typeBaseName, type Type } from "./types";

// ============================================================================
// Operators and keywords
// ============================================================================

const BINARY_OP_NAMES: Record<BinaryOp, string> = {
    [BinaryOp.Add]: "+",
    [BinaryOp.Sub]: "-",
    [BinaryOp.Mul]: "*",
    [BinaryOp.Div]: "/",
    [BinaryOp.Mod]: "%",
    [BinaryOp.BitAnd]: "&",
    [BinaryOp.BitOr]: "|",
    [BinaryOp.BitXor]: "^",
    [BinaryOp.Shl]: "<<",
    [BinaryOp.Shr]: ">>",
    [BinaryOp.AShl]: "<<<",
    [BinaryOp.AShr]: ">>>",
    [BinaryOp.Eq]: "==",
    [BinaryOp.Ne]: "!=",
    [BinaryOp.Lt]: "<",
    [BinaryOp.Le]: "<=",
    [BinaryOp.Gt]: ">",
    [BinaryOp.Ge]: ">=",
    [BinaryOp.LogAnd]: "&&",
    [BinaryOp.LogOr]: "||",
};

const DIRECTION_NAMES: Record<Direction, string> = {
    [Direction.Local]: "",
    [Direction.Input]: "input",
    [Direction.Output]: "output",
    [Direction.Inout]: "inout",
    [Direction.Ref]: "ref",
};

const LIFETIME_NAMES: Record<Lifetime, string> = {
    [Lifetime.Static]: "static",
    [Lifetime.Automatic]: "automatic",
};

function printBinaryOp(op: BinaryOp): string {
    return BINARY_OP_NAMES[op];
}

function printDirection(dir: Direction): string {
    return DIRECTION_NAMES[dir];
}

function printLifetime(lifetime: Lifetime): string {
    return LIFETIME_NAMES[lifetime];
}

function printAsgnOp(op: AsgnOp): string {
    switch (op.kind) {
        case AsgnOpKind.Eq:
            return "=";
        case AsgnOpKind.NonBlocking:
            return "<=";
        case AsgnOpKind.Compound:
            return `${printBinaryOp(op.op)}=`;
    }
}

function printStreamOp(op: StreamOp): string {
    return op === StreamOp.Left ? "<<" : ">>";
}

function printTiming(timing: Timing): string {
    switch (timing.kind) {
        case TimingKind.Delay:
            return `#${printExpr(timing.expr)}`;
        case TimingKind.Event:
            return `@(${printExpr(timing.expr)})`;
        case TimingKind.Cycle:
            return `##${printExpr(timing.expr)}`;
    }
}

// ============================================================================
// Expressions
// ============================================================================

function printRange(range: Range, mode = PartSelectMode.NonIndexed): string {
    const sep =
        mode === PartSelectMode.IndexedPlus
            ? "+:"
            : mode === PartSelectMode.IndexedMinus
              ? "-:"
              : ":";
    return `[${printExpr(range.left)}${sep}${printExpr(range.right)}]`;
}

function printRanges(ranges: readonly Range[]): string {
    return ranges.map((r) => printRange(r)).join("");
}

function printArgs(args: Args): string {
    const positional = args.positional.map(printExpr);
    const keyword = args.keyword.map((k) => `.${k.name}(${printExpr(k.expr)})`);
    return [...positional, ...keyword].join(", ");
}

// Nested binary operands are parenthesized; precedence is not tracked.
function printOperand(expr: Expr): string {
    const text = printExpr(expr);
    return expr.kind === ExprKind.Binary ? `(${text})` : text;
}

function printStreamBody(op: StreamOp, size: Expr, items: string[]): string {
    const sizeText = size.kind === ExprKind.Nil ? "" : ` ${printExpr(size)}`;
    return `{${printStreamOp(op)}${sizeText} {${items.join(", ")}}}`;
}

function printExpr(expr: Expr): string {
    switch (expr.kind) {
        case ExprKind.Nil:
            return "";
        case ExprKind.Ident:
            return expr.name;
        case ExprKind.PSIdent:
            return `${expr.scope}::${expr.name}`;
        case ExprKind.Number:
            return expr.text;
        case ExprKind.String:
            return JSON.stringify(expr.value);
        case ExprKind.Pattern: {
            const items = expr.items.map((item) =>
                item.key === null
                    ? printExpr(item.value)
                    : `${item.key}: ${printExpr(item.value)}`,
            );
            return `'{${items.join(", ")}}`;
        }
        case ExprKind.Concat:
            return `{${expr.items.map(printExpr).join(", ")}}`;
        case ExprKind.Stream:
            return printStreamBody(expr.op, expr.size, expr.items.map(printExpr));
        case ExprKind.Call:
            return `${printExpr(expr.callee)}(${printArgs(expr.args)})`;
        case ExprKind.Bit:
            return `${printExpr(expr.base)}[${printExpr(expr.index)}]`;
        case ExprKind.Range:
            return `${printExpr(expr.base)}${printRange(expr.range, expr.mode)}`;
        case ExprKind.Dot:
            return `${printExpr(expr.base)}.${expr.name}`;
        case ExprKind.Binary:
            return `${printOperand(expr.left)} ${printBinaryOp(expr.op)} ${printOperand(expr.right)}`;
    }
}

function printLHS(lhs: LHS): string {
    switch (lhs.kind) {
        case LHSKind.Ident:
            return lhs.name;
        case LHSKind.Bit:
            return `${printLHS(lhs.base)}[${printExpr(lhs.index)}]`;
        case LHSKind.Range:
            return `${printLHS(lhs.base)}${printRange(lhs.range, lhs.mode)}`;
        case LHSKind.Dot:
            return `${printLHS(lhs.base)}.${lhs.name}`;
        case LHSKind.Concat:
            return `{${lhs.items.map(printLHS).join(", ")}}`;
        case LHSKind.Stream:
            return printStreamBody(lhs.op, lhs.size, lhs.items.map(printLHS));
    }
}

// ============================================================================
// Types
// ============================================================================

function joinWords(words: string[]): string {
    return words.filter((w) => w !== "").join(" ");
}

function printType(type: Type): string {
    const ranges = printRanges(type.ranges);
    switch (type.kind) {
        case TypeKind.IntegerVector:
        case TypeKind.IntegerAtom:
            return joinWords([type.keyword, signingKeyword(type.signing), ranges]);
        case TypeKind.NonInteger:
            return joinWords([type.keyword, ranges]);
        case TypeKind.Implicit:
            return joinWords([signingKeyword(type.signing), ranges]);
        case TypeKind.Alias:
            return joinWords([type.name, ranges]);
        case TypeKind.PSAlias:
            return joinWords([`${type.scope}::${type.name}`, ranges]);
        case TypeKind.Interface:
            return joinWords([`${type.name}.${type.modport}`, ranges]);
    }
}

// ============================================================================
// Declarations, statements and module items
// ============================================================================

function printDecl(decl: Decl): string {
    if (decl.kind === DeclKind.Comment) {
        return `// ${decl.text}`;
    }
    const name = joinWords([decl.name, printRanges(decl.ranges)]);
    const init = decl.init === null ? "" : ` = ${printExpr(decl.init)}`;
    return `${joinWords([printDirection(decl.dir), printType(decl.type), name])}${init};`;
}

function printStmt(stmt: Stmt): string {
    switch (stmt.kind) {
        case StmtKind.Asgn: {
            const timing = stmt.timing === null ? "" : `${printTiming(stmt.timing)} `;
            return `${printLHS(stmt.lhs)} ${printAsgnOp(stmt.op)} ${timing}${printExpr(stmt.expr)};`;
        }
        case StmtKind.Subroutine:
            return `${printExpr(stmt.callee)}(${printArgs(stmt.args)});`;
        case StmtKind.Comment:
            return `// ${stmt.text}`;
    }
}

function printPortBinding(binding: PortBinding): string {
    if (binding.name === "") {
        return printExpr(binding.expr);
    }
    return `.${binding.name}(${printExpr(binding.expr)})`;
}

function printParamBinding(binding: ParamBinding): string {
    const value =
        binding.value.kind === "type"
            ? printType(binding.value.type)
            : printExpr(binding.value.expr);
    return binding.name === "" ? value : `.${binding.name}(${value})`;
}

function printModuleItem(item: ModuleItem): string {
    if (item.kind === ModuleItemKind.Decl) {
        return printDecl(item.decl);
    }
    const params =
        item.params.length === 0
            ? ""
            : ` #(${item.params.map(printParamBinding).join(", ")})`;
    const name = joinWords([item.instanceName, printRanges(item.ranges)]);
    const bindings = item.bindings.map(printPortBinding).join(", ");
    return `${item.moduleName}${params} ${name} (${bindings});`;
}

// ============================================================================
// Tokens
// ============================================================================

function printToken(token: DeclToken): string {
    switch (token.kind) {
        case DeclTokenKind.Comma:
            return ",";
        case DeclTokenKind.AutoDim:
            return "[]";
        case DeclTokenKind.Asgn: {
            const timing = token.timing === null ? "" : `${printTiming(token.timing)} `;
            return `${printAsgnOp(token.op)} ${timing}${printExpr(token.expr)}`;
        }
        case DeclTokenKind.Range:
            return printRange(token.range, token.mode);
        case DeclTokenKind.Ident:
            return token.name;
        case DeclTokenKind.ScopedIdent:
            return `${token.scope}::${token.name}`;
        case DeclTokenKind.Dir:
            return printDirection(token.dir);
        case DeclTokenKind.TypeCtor:
            return typeBaseName(token.base);
        case DeclTokenKind.ParamBindings:
            return `#(${token.bindings.map(printParamBinding).join(", ")})`;
        case DeclTokenKind.InstanceArgs:
            return `(${token.bindings.map(printPortBinding).join(", ")})`;
        case DeclTokenKind.BitSelect:
            return `[${printExpr(token.expr)}]`;
        case DeclTokenKind.Concat:
            return `{${token.items.map(printLHS).join(", ")}}`;
        case DeclTokenKind.Stream:
            return printStreamBody(token.op, token.size, token.items.map(printLHS));
        case DeclTokenKind.Dot:
            return `.${token.name}`;
        case DeclTokenKind.Signing:
            return signingKeyword(token.signing);
        case DeclTokenKind.Lifetime:
            return printLifetime(token.lifetime);
    }
}

function printTokens(tokens: readonly DeclToken[]): string {
    return tokens.map(printToken).join(" ");
}

export {
    printBinaryOp,
    printDirection,
    printAsgnOp,
    printTiming,
    printRange,
    printRanges,
    printArgs,
    printExpr,
    printLHS,
    printType,
    printDecl,
    printStmt,
    printModuleItem,
    printToken,
    printTokens,
};
