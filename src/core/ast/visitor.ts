// src/core/ast/visitor.ts
// Double-dispatch protocol over the closed set of AST nodes

import type {
  Assign,
  Binary,
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
  Node,
  Parameter,
  Return,
  Stmt,
  Unary,
  VarDecl,
  While,
} from "./nodes";

/**
 * One method per node kind. S is what statement visits produce, E what
 * expression visits produce; passes that need a single result use one type.
 */
export interface AstVisitor<S, E = S> {
  visitBlock(node: Block): S;
  visitFunctionDecl(node: FunctionDecl): S;
  visitVarDecl(node: VarDecl): S;
  visitParameter(node: Parameter): S;
  visitIf(node: If): S;
  visitWhile(node: While): S;
  visitFor(node: For): S;
  visitReturn(node: Return): S;
  visitExpressionStmt(node: ExpressionStmt): S;

  visitBinary(node: Binary): E;
  visitAssign(node: Assign): E;
  visitUnary(node: Unary): E;
  visitCall(node: Call): E;
  visitIdentifier(node: Identifier): E;
  visitLiteral(node: Literal): E;
  visitGrouping(node: Grouping): E;
}

export function acceptStmt<S, E>(stmt: Stmt | Parameter, visitor: AstVisitor<S, E>): S {
  switch (stmt.tag) {
    case "Block": return visitor.visitBlock(stmt);
    case "FunctionDecl": return visitor.visitFunctionDecl(stmt);
    case "VarDecl": return visitor.visitVarDecl(stmt);
    case "Parameter": return visitor.visitParameter(stmt);
    case "If": return visitor.visitIf(stmt);
    case "While": return visitor.visitWhile(stmt);
    case "For": return visitor.visitFor(stmt);
    case "Return": return visitor.visitReturn(stmt);
    case "ExpressionStmt": return visitor.visitExpressionStmt(stmt);
  }
}

export function acceptExpr<S, E>(expr: Expr, visitor: AstVisitor<S, E>): E {
  switch (expr.tag) {
    case "Binary": return visitor.visitBinary(expr);
    case "Assign": return visitor.visitAssign(expr);
    case "Unary": return visitor.visitUnary(expr);
    case "Call": return visitor.visitCall(expr);
    case "Identifier": return visitor.visitIdentifier(expr);
    case "Literal": return visitor.visitLiteral(expr);
    case "Grouping": return visitor.visitGrouping(expr);
  }
}

export function isExpr(node: Node): node is Expr {
  switch (node.tag) {
    case "Binary":
    case "Assign":
    case "Unary":
    case "Call":
    case "Identifier":
    case "Literal":
    case "Grouping":
      return true;
    default:
      return false;
  }
}

export function accept<S, E>(node: Node, visitor: AstVisitor<S, E>): S | E {
  return isExpr(node) ? acceptExpr(node, visitor) : acceptStmt(node, visitor);
}
