// test/parser/parser.spec.ts
// Recursive-descent parser: precedence, statements, for-desugaring, recovery

import { describe, it, expect } from "vitest";
import {
  assign,
  binary,
  block,
  call,
  exprStmt,
  functionDecl,
  grouping,
  identifier,
  ifStmt,
  literal,
  parameter,
  returnStmt,
  unary,
  varDecl,
  whileStmt,
} from "../../src/core/ast/nodes";
import { parse } from "../helpers/compiler";

const int = (v: string) => literal("INT_LITERAL", v);
const id = identifier;

function parseOk(source: string) {
  const result = parse(source);
  expect(result.ctx.errors()).toEqual([]);
  return result.statements;
}

describe("Parser", () => {
  describe("expressions", () => {
    it("binds * tighter than +", () => {
      expect(parseOk("1 + 2 * 3;")).toEqual([
        exprStmt(binary("PLUS", int("1"), binary("STAR", int("2"), int("3")))),
      ]);
    });

    it("groups binary operators to the left", () => {
      expect(parseOk("a - b - c;")).toEqual([
        exprStmt(binary("MINUS", binary("MINUS", id("a"), id("b")), id("c"))),
      ]);
    });

    it("groups assignment to the right", () => {
      expect(parseOk("a = b += 1;")).toEqual([
        exprStmt(assign("EQUAL", id("a"), assign("PLUS_EQUAL", id("b"), int("1")))),
      ]);
    });

    it("ranks || below && below equality below comparison", () => {
      expect(parseOk("a || b && c == d < e;")).toEqual([
        exprStmt(
          binary(
            "PIPE_PIPE",
            id("a"),
            binary("AMPERSAND_AMP", id("b"), binary("EQUAL_EQUAL", id("c"), binary("LESS", id("d"), id("e"))))
          )
        ),
      ]);
    });

    it("nests a ternary as QUESTION over COLON", () => {
      expect(parseOk("x = c ? 1 : 2;")).toEqual([
        exprStmt(assign("EQUAL", id("x"), binary("QUESTION", id("c"), binary("COLON", int("1"), int("2"))))),
      ]);
    });

    it("parses prefix and postfix unary operators", () => {
      expect(parseOk("-x; !y; ++i; i++;")).toEqual([
        exprStmt(unary("MINUS", id("x"))),
        exprStmt(unary("BANG", id("y"))),
        exprStmt(unary("PLUS_PLUS", id("i"), true)),
        exprStmt(unary("PLUS_PLUS", id("i"), false)),
      ]);
    });

    it("parses calls, nested calls and grouping", () => {
      expect(parseOk("f(1, g(x)); (1 + 2) * 3;")).toEqual([
        exprStmt(call(id("f"), [int("1"), call(id("g"), [id("x")])])),
        exprStmt(binary("STAR", grouping(binary("PLUS", int("1"), int("2"))), int("3"))),
      ]);
    });

    it("keeps every literal kind", () => {
      expect(parseOk("1.5; true; false; 'c'; \"s\";")).toEqual([
        exprStmt(literal("FLOAT_LITERAL", "1.5")),
        exprStmt(literal("TRUE", "true")),
        exprStmt(literal("FALSE", "false")),
        exprStmt(literal("CHAR_LITERAL", "'c'")),
        exprStmt(literal("STRING_LITERAL", '"s"')),
      ]);
    });
  });

  describe("declarations and statements", () => {
    it("parses a function with typed parameters and return type", () => {
      expect(parseOk("func add(a: i32, b: f64) -> i32 { return a; }")).toEqual([
        functionDecl("add", [parameter("a", "I32"), parameter("b", "F64")], "I32", block([returnStmt(id("a"))])),
      ]);
    });

    it("defaults the return type to void", () => {
      expect(parseOk("func f() { return; }")).toEqual([functionDecl("f", [], "VOID", block([returnStmt()]))]);
    });

    it("parses var and const declarations", () => {
      expect(parseOk("var x: i32 = 1; const y: bool = true; var z: f32;")).toEqual([
        varDecl("x", "I32", int("1")),
        varDecl("y", "BOOL", literal("TRUE", "true"), true),
        varDecl("z", "F32"),
      ]);
    });

    it("parses if/else and while", () => {
      expect(parseOk("if (a) b; else c; while (n) { n = n - 1; }")).toEqual([
        ifStmt(id("a"), exprStmt(id("b")), exprStmt(id("c"))),
        whileStmt(id("n"), block([exprStmt(assign("EQUAL", id("n"), binary("MINUS", id("n"), int("1"))))])),
      ]);
    });
  });

  describe("for loops", () => {
    it("desugars to the equivalent block and while", () => {
      const loop = parseOk("for (var i: i32 = 0; i < 10; i++) { f(i); }");
      const manual = parseOk("{ var i: i32 = 0; while (i < 10) { f(i); i++; } }");
      expect(loop).toEqual(manual);
    });

    it("uses a true condition and no wrapper when clauses are empty", () => {
      expect(parseOk("for (;;) x;")).toEqual([whileStmt(literal("TRUE", "true"), exprStmt(id("x")))]);
    });

    it("wraps a single-statement body with the increment", () => {
      expect(parseOk("for (; a; a++) b;")).toEqual([
        whileStmt(id("a"), block([exprStmt(id("b")), exprStmt(unary("PLUS_PLUS", id("a"), false))])),
      ]);
    });

    it("accepts an expression initializer", () => {
      expect(parseOk("for (i = 0; i < 2;) g();")).toEqual([
        block([
          exprStmt(assign("EQUAL", id("i"), int("0"))),
          whileStmt(binary("LESS", id("i"), int("2")), exprStmt(call(id("g"), []))),
        ]),
      ]);
    });
  });

  describe("errors and recovery", () => {
    it("reports a missing expression at the offending token", () => {
      const { statements, parser, ctx } = parse("var x: i32 = ;");
      expect(statements).toEqual([]);
      expect(parser.errorCount()).toBe(1);
      expect(ctx.errors()[0]).toMatchObject({
        code: "E0002",
        message: "Expect expression",
        span: { startLine: 1, startCol: 14 },
      });
    });

    it("resynchronizes at the next declaration", () => {
      const { statements, parser } = parse("var a: i32 = ;\nvar b: i32 = 2;");
      expect(parser.errorCount()).toBe(1);
      expect(statements).toEqual([varDecl("b", "I32", int("2"))]);
    });

    it("reports one error per panic", () => {
      const { statements, ctx } = parse("x = 1\ny = 2;");
      expect(ctx.errors().map((d) => d.message)).toEqual(["Expect ';' after expression"]);
      expect(statements).toEqual([exprStmt(assign("EQUAL", id("x"), int("1")))]);
    });

    it("keeps the closing brace after a missing semicolon", () => {
      const { statements, ctx } = parse("func f() { x = 1 }\nfunc g() -> i32 { return 0; }");
      expect(ctx.errors().map((d) => d.message)).toEqual(["Expect ';' after expression"]);
      expect(statements).toEqual([
        functionDecl("f", [], "VOID", block([exprStmt(assign("EQUAL", id("x"), int("1")))])),
        functionDecl("g", [], "I32", block([returnStmt(int("0"))])),
      ]);
    });

    it("marks unknown type names as ERROR", () => {
      const { statements, ctx } = parse("var x: foo = 1;");
      expect(ctx.errors().map((d) => d.message)).toEqual(["Unknown type: foo"]);
      expect(statements).toEqual([varDecl("x", "ERROR", int("1"))]);
    });

    it("rejects assignment to a non-identifier without unwinding", () => {
      const { statements, ctx } = parse("1 = 2;");
      expect(ctx.errors()[0]).toMatchObject({ message: "Invalid assignment target", span: { startCol: 3 } });
      expect(statements).toEqual([exprStmt(int("1"))]);
    });

    it("requires const initializers", () => {
      const { ctx } = parse("const k: i32;");
      expect(ctx.errors().map((d) => d.message)).toEqual(["Constant must be initialized"]);
    });

    it("reports lexical errors as E0001 and parses around them", () => {
      const { statements, ctx } = parse('"abc');
      expect(statements).toEqual([]);
      expect(ctx.errors()).toHaveLength(1);
      expect(ctx.errors()[0]).toMatchObject({ code: "E0001", message: "Unterminated string" });
    });

    it("reports a block left open at end of input", () => {
      const { statements, ctx } = parse("func f() { return 1;");
      expect(ctx.errors().map((d) => d.message)).toEqual(["Expect '}' after block"]);
      expect(statements).toHaveLength(1);
    });

    it("terminates on input made only of stray tokens", () => {
      const { statements, parser } = parse(") ) )");
      expect(statements).toEqual([]);
      expect(parser.errorCount()).toBe(1);
    });
  });
});
