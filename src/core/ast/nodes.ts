// src/core/ast/nodes.ts
// AST node definitions for Bramble programs
//
// Nodes are plain tagged records. Each parent owns its children; nothing is
// shared and nothing points back up the tree.

import type { TypeKind } from "../lexer/token";

// ─────────────────────────────────────────────────────────────
// Types and operators
// ─────────────────────────────────────────────────────────────

/** A declared type; ERROR marks an annotation the parser could not read. */
export type DeclaredType = TypeKind | "ERROR";

export type LiteralKind =
  | "INT_LITERAL"
  | "FLOAT_LITERAL"
  | "STRING_LITERAL"
  | "CHAR_LITERAL"
  | "TRUE"
  | "FALSE";

/** What resultType() can answer: a declared type or a literal's own kind. */
export type ExprType = DeclaredType | LiteralKind;

export type BinaryOp =
  | "PLUS" | "MINUS" | "STAR" | "SLASH" | "PERCENT"
  | "EQUAL_EQUAL" | "BANG_EQUAL"
  | "LESS" | "LESS_EQUAL" | "GREATER" | "GREATER_EQUAL"
  | "AMPERSAND_AMP" | "PIPE_PIPE"
  // c ? a : b is Binary(QUESTION, c, Binary(COLON, a, b))
  | "QUESTION" | "COLON";

export type UnaryOp = "BANG" | "MINUS" | "PLUS_PLUS";

export type AssignOp = "EQUAL" | "PLUS_EQUAL";

// ─────────────────────────────────────────────────────────────
// Expressions
// ─────────────────────────────────────────────────────────────

export type Binary = { tag: "Binary"; op: BinaryOp; left: Expr; right: Expr };
export type Assign = { tag: "Assign"; op: AssignOp; target: Expr; value: Expr };
export type Unary = { tag: "Unary"; op: UnaryOp; operand: Expr; prefix: boolean };
export type Call = { tag: "Call"; callee: Expr; args: Expr[] };
export type Identifier = { tag: "Identifier"; name: string };
export type Literal = { tag: "Literal"; kind: LiteralKind; value: string };
export type Grouping = { tag: "Grouping"; expression: Expr };

export type Expr = Binary | Assign | Unary | Call | Identifier | Literal | Grouping;

// ─────────────────────────────────────────────────────────────
// Statements
// ─────────────────────────────────────────────────────────────

export type Parameter = { tag: "Parameter"; name: string; type: DeclaredType };

export type Block = { tag: "Block"; statements: Stmt[] };
export type FunctionDecl = {
  tag: "FunctionDecl";
  name: string;
  params: Parameter[];
  returnType: DeclaredType;
  body: Block;
};
export type VarDecl = {
  tag: "VarDecl";
  name: string;
  type: DeclaredType;
  isConst: boolean;
  initializer?: Expr;
};
export type If = { tag: "If"; condition: Expr; thenBranch: Stmt; elseBranch?: Stmt };
export type While = { tag: "While"; condition: Expr; body: Stmt };
/** Built by hand only: the parser lowers `for` into While and Block. */
export type For = {
  tag: "For";
  initializer?: Stmt;
  condition?: Expr;
  increment?: Expr;
  body: Stmt;
};
export type Return = { tag: "Return"; value?: Expr };
export type ExpressionStmt = { tag: "ExpressionStmt"; expression: Expr };

export type Stmt = Block | FunctionDecl | VarDecl | If | While | For | Return | ExpressionStmt;

export type Node = Stmt | Expr | Parameter;

// ─────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────

export const binary = (op: BinaryOp, left: Expr, right: Expr): Binary => ({ tag: "Binary", op, left, right });
export const assign = (op: AssignOp, target: Expr, value: Expr): Assign => ({ tag: "Assign", op, target, value });
export const unary = (op: UnaryOp, operand: Expr, prefix = true): Unary => ({ tag: "Unary", op, operand, prefix });
export const call = (callee: Expr, args: Expr[]): Call => ({ tag: "Call", callee, args });
export const identifier = (name: string): Identifier => ({ tag: "Identifier", name });
export const literal = (kind: LiteralKind, value: string): Literal => ({ tag: "Literal", kind, value });
export const grouping = (expression: Expr): Grouping => ({ tag: "Grouping", expression });

export const parameter = (name: string, type: DeclaredType): Parameter => ({ tag: "Parameter", name, type });
export const block = (statements: Stmt[]): Block => ({ tag: "Block", statements });
export const functionDecl = (
  name: string,
  params: Parameter[],
  returnType: DeclaredType,
  body: Block
): FunctionDecl => ({ tag: "FunctionDecl", name, params, returnType, body });

export function varDecl(name: string, type: DeclaredType, initializer?: Expr, isConst = false): VarDecl {
  const node: VarDecl = { tag: "VarDecl", name, type, isConst };
  if (initializer) node.initializer = initializer;
  return node;
}

export function ifStmt(condition: Expr, thenBranch: Stmt, elseBranch?: Stmt): If {
  const node: If = { tag: "If", condition, thenBranch };
  if (elseBranch) node.elseBranch = elseBranch;
  return node;
}

export const whileStmt = (condition: Expr, body: Stmt): While => ({ tag: "While", condition, body });

export function forStmt(parts: Omit<For, "tag">): For {
  return { tag: "For", ...parts };
}

export function returnStmt(value?: Expr): Return {
  const node: Return = { tag: "Return" };
  if (value) node.value = value;
  return node;
}

export const exprStmt = (expression: Expr): ExpressionStmt => ({ tag: "ExpressionStmt", expression });

// ─────────────────────────────────────────────────────────────
// Result types
// ─────────────────────────────────────────────────────────────

function isFloating(t: ExprType): boolean {
  return t === "F32" || t === "F64" || t === "FLOAT_LITERAL";
}

/**
 * Static result type of an expression. Identifiers and calls have no symbol
 * information to draw on and report I32.
 */
export function resultType(expr: Expr): ExprType {
  switch (expr.tag) {
    case "Literal":
      return expr.kind;
    case "Binary":
      return isFloating(resultType(expr.left)) || isFloating(resultType(expr.right)) ? "F64" : "I32";
    case "Unary":
      return resultType(expr.operand);
    case "Assign":
      return resultType(expr.target);
    case "Grouping":
      return resultType(expr.expression);
    case "Identifier":
    case "Call":
      return "I32";
  }
}
