// src/core/ast/printer.ts
// Indented tree dump of an AST, plus a one-line expression renderer

import type {
  Assign,
  AssignOp,
  Binary,
  BinaryOp,
  Block,
  Call,
  Expr,
  ExpressionStmt,
  For,
  FunctionDecl,
  Grouping,
  Identifier,
  If,
  Literal,
  Parameter,
  Return,
  Stmt,
  Unary,
  UnaryOp,
  VarDecl,
  While,
} from "./nodes";
import { acceptExpr, acceptStmt, type AstVisitor } from "./visitor";

export class AstPrinter implements AstVisitor<void> {
  private depth = 0;

  constructor(private readonly emit: (line: string) => void, private readonly indentUnit = "  ") {}

  print(statements: Stmt[]): void {
    for (const stmt of statements) acceptStmt(stmt, this);
  }

  private line(text: string): void {
    this.emit(`${this.indentUnit.repeat(this.depth)}${text}`);
  }

  private nested(fn: () => void): void {
    this.depth++;
    try {
      fn();
    } finally {
      this.depth--;
    }
  }

  private stmt(node: Stmt | Parameter): void {
    acceptStmt(node, this);
  }

  private expr(node: Expr): void {
    acceptExpr(node, this);
  }

  // ─── Statements ───

  visitBlock(node: Block): void {
    this.line("Block:");
    this.nested(() => node.statements.forEach((s) => this.stmt(s)));
  }

  visitFunctionDecl(node: FunctionDecl): void {
    this.line(`Function: ${node.name} -> ${node.returnType}`);
    this.nested(() => {
      node.params.forEach((p) => this.stmt(p));
      this.stmt(node.body);
    });
  }

  visitVarDecl(node: VarDecl): void {
    this.line(`${node.isConst ? "ConstDecl" : "VarDecl"}: ${node.name}: ${node.type}`);
    const init = node.initializer;
    if (init) this.nested(() => this.expr(init));
  }

  visitParameter(node: Parameter): void {
    this.line(`Parameter: ${node.name}: ${node.type}`);
  }

  visitIf(node: If): void {
    this.line("If:");
    this.nested(() => {
      this.expr(node.condition);
      this.stmt(node.thenBranch);
      const elseBranch = node.elseBranch;
      if (elseBranch) {
        this.line("Else:");
        this.nested(() => this.stmt(elseBranch));
      }
    });
  }

  visitWhile(node: While): void {
    this.line("While:");
    this.nested(() => {
      this.expr(node.condition);
      this.stmt(node.body);
    });
  }

  visitFor(node: For): void {
    this.line("For:");
    this.nested(() => {
      if (node.initializer) this.stmt(node.initializer);
      if (node.condition) this.expr(node.condition);
      if (node.increment) this.expr(node.increment);
      this.stmt(node.body);
    });
  }

  visitReturn(node: Return): void {
    this.line("Return:");
    const value = node.value;
    if (value) this.nested(() => this.expr(value));
  }

  visitExpressionStmt(node: ExpressionStmt): void {
    this.line("ExpressionStmt:");
    this.nested(() => this.expr(node.expression));
  }

  // ─── Expressions ───

  visitBinary(node: Binary): void {
    this.line(`Binary: ${node.op}`);
    this.nested(() => {
      this.expr(node.left);
      this.expr(node.right);
    });
  }

  visitAssign(node: Assign): void {
    this.line(`Assign: ${node.op}`);
    this.nested(() => {
      this.expr(node.target);
      this.expr(node.value);
    });
  }

  visitUnary(node: Unary): void {
    this.line(`Unary: ${node.op}${node.prefix ? "" : " (postfix)"}`);
    this.nested(() => this.expr(node.operand));
  }

  visitCall(node: Call): void {
    this.line("Call:");
    this.nested(() => {
      this.expr(node.callee);
      node.args.forEach((a) => this.expr(a));
    });
  }

  visitIdentifier(node: Identifier): void {
    this.line(`Identifier: ${node.name}`);
  }

  visitLiteral(node: Literal): void {
    this.line(`Literal: ${node.kind} ${node.value}`);
  }

  visitGrouping(node: Grouping): void {
    this.line("Grouping:");
    this.nested(() => this.expr(node.expression));
  }
}

export function printAst(statements: Stmt[]): string {
  const lines: string[] = [];
  new AstPrinter((line) => lines.push(line)).print(statements);
  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────
// One-line rendering (expression traces, diagnostics)
// ─────────────────────────────────────────────────────────────

const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  PLUS: "+",
  MINUS: "-",
  STAR: "*",
  SLASH: "/",
  PERCENT: "%",
  EQUAL_EQUAL: "==",
  BANG_EQUAL: "!=",
  LESS: "<",
  LESS_EQUAL: "<=",
  GREATER: ">",
  GREATER_EQUAL: ">=",
  AMPERSAND_AMP: "&&",
  PIPE_PIPE: "||",
  QUESTION: "?",
  COLON: ":",
};

const UNARY_SYMBOLS: Record<UnaryOp, string> = { BANG: "!", MINUS: "-", PLUS_PLUS: "++" };
const ASSIGN_SYMBOLS: Record<AssignOp, string> = { EQUAL: "=", PLUS_EQUAL: "+=" };

export function formatExpr(expr: Expr): string {
  switch (expr.tag) {
    case "Binary":
      return `${formatExpr(expr.left)} ${BINARY_SYMBOLS[expr.op]} ${formatExpr(expr.right)}`;
    case "Assign":
      return `${formatExpr(expr.target)} ${ASSIGN_SYMBOLS[expr.op]} ${formatExpr(expr.value)}`;
    case "Unary": {
      const sym = UNARY_SYMBOLS[expr.op];
      const operand = formatExpr(expr.operand);
      return expr.prefix ? `${sym}${operand}` : `${operand}${sym}`;
    }
    case "Call":
      return `${formatExpr(expr.callee)}(${expr.args.map(formatExpr).join(", ")})`;
    case "Identifier":
      return expr.name;
    case "Literal":
      return expr.value;
    case "Grouping":
      return `(${formatExpr(expr.expression)})`;
  }
}
