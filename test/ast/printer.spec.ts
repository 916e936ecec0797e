// test/ast/printer.spec.ts
// Tree dump, one-line expression rendering, visitor dispatch and result types

import { describe, it, expect } from "vitest";
import { AstPrinter, formatExpr, printAst } from "../../src/core/ast/printer";
import {
  binary,
  exprStmt,
  forStmt,
  grouping,
  identifier,
  literal,
  resultType,
  unary,
  type Expr,
} from "../../src/core/ast/nodes";
import { accept, isExpr, type AstVisitor } from "../../src/core/ast/visitor";
import { parse } from "../helpers/compiler";

function firstExpr(source: string): Expr {
  const [stmt] = parse(source).statements;
  if (stmt?.tag !== "ExpressionStmt") throw new Error("expected an expression statement");
  return stmt.expression;
}

describe("AstPrinter", () => {
  it("prints an indented tree", () => {
    const { statements } = parse(
      "func main() -> i32 { var x: i32 = 1 + 2; if (x > 2) return x; else return 0; }"
    );
    expect(printAst(statements).split("\n")).toEqual([
      "Function: main -> I32",
      "  Block:",
      "    VarDecl: x: I32",
      "      Binary: PLUS",
      "        Literal: INT_LITERAL 1",
      "        Literal: INT_LITERAL 2",
      "    If:",
      "      Binary: GREATER",
      "        Identifier: x",
      "        Literal: INT_LITERAL 2",
      "      Return:",
      "        Identifier: x",
      "      Else:",
      "        Return:",
      "          Literal: INT_LITERAL 0",
    ]);
  });

  it("prints parameters, constants, calls and postfix operators", () => {
    const { statements } = parse("func f(a: i32) { const k: f64 = 2.5; g(a++); }");
    expect(printAst(statements).split("\n")).toEqual([
      "Function: f -> VOID",
      "  Parameter: a: I32",
      "  Block:",
      "    ConstDecl: k: F64",
      "      Literal: FLOAT_LITERAL 2.5",
      "    ExpressionStmt:",
      "      Call:",
      "        Identifier: g",
      "        Unary: PLUS_PLUS (postfix)",
      "          Identifier: a",
    ]);
  });

  it("prints for nodes built directly", () => {
    const node = forStmt({
      condition: identifier("c"),
      body: exprStmt(identifier("x")),
    });
    const lines: string[] = [];
    new AstPrinter((l) => lines.push(l), "\t").print([node]);
    expect(lines).toEqual(["For:", "\tIdentifier: c", "\tExpressionStmt:", "\t\tIdentifier: x"]);
  });
});

describe("formatExpr", () => {
  it("renders expressions on one line", () => {
    expect(formatExpr(firstExpr("x = c ? f(a, 1) : -y++;"))).toBe("x = c ? f(a, 1) : -y++");
    expect(formatExpr(firstExpr("(a + b) * 2 >= !d;"))).toBe("(a + b) * 2 >= !d");
    expect(formatExpr(firstExpr("n += ++m;"))).toBe("n += ++m");
  });
});

describe("visitor dispatch", () => {
  class Counter implements AstVisitor<string> {
    visitBlock() { return "stmt"; }
    visitFunctionDecl() { return "stmt"; }
    visitVarDecl() { return "stmt"; }
    visitParameter() { return "stmt"; }
    visitIf() { return "stmt"; }
    visitWhile() { return "stmt"; }
    visitFor() { return "stmt"; }
    visitReturn() { return "stmt"; }
    visitExpressionStmt() { return "stmt"; }
    visitBinary() { return "binary"; }
    visitAssign() { return "expr"; }
    visitUnary() { return "expr"; }
    visitCall() { return "expr"; }
    visitIdentifier() { return "identifier"; }
    visitLiteral() { return "expr"; }
    visitGrouping() { return "expr"; }
  }

  it("routes statements and expressions to their methods", () => {
    const v = new Counter();
    expect(accept(identifier("a"), v)).toBe("identifier");
    expect(accept(binary("PLUS", identifier("a"), identifier("b")), v)).toBe("binary");
    expect(accept(exprStmt(identifier("a")), v)).toBe("stmt");
    expect(isExpr(exprStmt(identifier("a")))).toBe(false);
    expect(isExpr(grouping(identifier("a")))).toBe(true);
  });
});

describe("resultType", () => {
  it("derives types from literals and operators", () => {
    const one = literal("INT_LITERAL", "1");
    const half = literal("FLOAT_LITERAL", "0.5");
    expect(resultType(half)).toBe("FLOAT_LITERAL");
    expect(resultType(binary("PLUS", one, one))).toBe("I32");
    expect(resultType(binary("STAR", one, half))).toBe("F64");
    expect(resultType(grouping(literal("TRUE", "true")))).toBe("TRUE");
    expect(resultType(unary("MINUS", half))).toBe("FLOAT_LITERAL");
    expect(resultType(identifier("x"))).toBe("I32");
  });
});
