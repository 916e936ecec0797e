// src/core/parser/parser.ts
// Recursive-descent parser with panic-mode recovery
//
// Tokens are pulled from the lexer one at a time. Errors are reported into
// the diagnostics context; only a missing expression unwinds (ParseError),
// and that unwinding stops at declaration(), which resynchronizes.

import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import { DiagnosticsContext } from "../../diagnostics/context";
import type { Lexer } from "../lexer/lexer";
import { isTypeKind, makeToken, type Token, type TokenKind } from "../lexer/token";
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
  type AssignOp,
  type BinaryOp,
  type Block,
  type DeclaredType,
  type Expr,
  type FunctionDecl,
  type Parameter,
  type Stmt,
  type VarDecl,
} from "../ast/nodes";

export class ParseError extends Error {
  constructor(message: string, readonly token: Token) {
    super(message);
    this.name = "ParseError";
  }
}

export type ParserOptions = {
  /** File name recorded in diagnostic spans. */
  file?: string;
};

/** Tokens that begin a declaration; synchronize() stops in front of them. */
const RESTART_KINDS: readonly TokenKind[] = ["FUNC", "VAR", "CONST", "FOR", "IF", "WHILE", "RETURN"];

const EQUALITY_OPS = ["EQUAL_EQUAL", "BANG_EQUAL"] as const;
const COMPARISON_OPS = ["LESS", "LESS_EQUAL", "GREATER", "GREATER_EQUAL"] as const;
const TERM_OPS = ["PLUS", "MINUS"] as const;
const FACTOR_OPS = ["STAR", "SLASH", "PERCENT"] as const;
const UNARY_OPS = ["BANG", "MINUS", "PLUS_PLUS"] as const;

export class Parser {
  private current: Token;
  private previous: Token;
  private panicMode = false;
  private readonly reported: Diagnostic[] = [];

  constructor(
    private readonly lexer: Lexer,
    private readonly diagnostics: DiagnosticsContext = new DiagnosticsContext(),
    private readonly options: ParserOptions = {}
  ) {
    this.previous = makeToken("END_OF_FILE", "", 1, 1);
    this.current = this.previous;
    this.current = this.nextToken();
  }

  // ─────────────────────────────────────────────────────────────
  // Public API
  // ─────────────────────────────────────────────────────────────

  parse(): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.check("END_OF_FILE")) {
      const before = this.current;
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
      if (this.current === before && !this.check("END_OF_FILE")) this.advance();
    }
    return statements;
  }

  hadError(): boolean {
    return this.reported.length > 0;
  }

  errorCount(): number {
    return this.reported.length;
  }

  errors(): readonly Diagnostic[] {
    return this.reported;
  }

  // ─────────────────────────────────────────────────────────────
  // Declarations
  // ─────────────────────────────────────────────────────────────

  private declaration(): Stmt | undefined {
    try {
      let stmt: Stmt;
      if (this.match("FUNC")) stmt = this.functionDeclaration();
      else if (this.match("VAR")) stmt = this.varDeclaration(false);
      else if (this.match("CONST")) stmt = this.varDeclaration(true);
      else stmt = this.statement();

      if (this.panicMode) this.synchronize();
      return stmt;
    } catch (e) {
      if (e instanceof ParseError) {
        this.synchronize();
        return undefined;
      }
      throw e;
    }
  }

  private functionDeclaration(): FunctionDecl {
    const name = this.consume("IDENTIFIER", "Expect function name");
    this.consume("LEFT_PAREN", "Expect '(' after function name");

    const params: Parameter[] = [];
    if (!this.check("RIGHT_PAREN")) {
      do {
        const paramName = this.consume("IDENTIFIER", "Expect parameter name");
        this.consume("COLON", "Expect ':' after parameter name");
        params.push(parameter(paramName.lexeme, this.typeAnnotation()));
      } while (this.match("COMMA"));
    }
    this.consume("RIGHT_PAREN", "Expect ')' after parameters");

    let returnType: DeclaredType = "VOID";
    if (this.match("ARROW")) returnType = this.typeAnnotation();

    this.consume("LEFT_BRACE", "Expect '{' before function body");
    return functionDecl(name.lexeme, params, returnType, this.block());
  }

  private varDeclaration(isConst: boolean): VarDecl {
    const name = this.consume("IDENTIFIER", "Expect variable name");
    this.consume("COLON", "Expect ':' after variable name");
    const type = this.typeAnnotation();

    let initializer: Expr | undefined;
    if (this.match("EQUAL")) {
      initializer = this.expression();
    } else if (isConst) {
      this.errorAtCurrent("Constant must be initialized");
    }

    this.consume("SEMICOLON", "Expect ';' after variable declaration");
    return varDecl(name.lexeme, type, initializer, isConst);
  }

  private typeAnnotation(): DeclaredType {
    const kind = this.current.kind;
    if (isTypeKind(kind)) {
      this.advance();
      return kind;
    }
    if (kind === "IDENTIFIER") {
      this.errorAtCurrent(`Unknown type: ${this.current.lexeme}`);
      this.advance();
      return "ERROR";
    }
    this.errorAtCurrent("Expect type");
    return "ERROR";
  }

  // ─────────────────────────────────────────────────────────────
  // Statements
  // ─────────────────────────────────────────────────────────────

  private statement(): Stmt {
    if (this.match("LEFT_BRACE")) return this.block();
    if (this.match("IF")) return this.ifStatement();
    if (this.match("WHILE")) return this.whileStatement();
    if (this.match("FOR")) return this.forStatement();
    if (this.match("RETURN")) return this.returnStatement();
    return this.expressionStatement();
  }

  /** Parses the rest of a block; the opening brace is already consumed. */
  private block(): Block {
    const statements: Stmt[] = [];
    while (!this.check("RIGHT_BRACE") && !this.check("END_OF_FILE")) {
      const before = this.current;
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
      if (this.current === before && !this.check("RIGHT_BRACE") && !this.check("END_OF_FILE")) {
        this.advance();
      }
    }
    this.consume("RIGHT_BRACE", "Expect '}' after block");
    return block(statements);
  }

  private ifStatement(): Stmt {
    this.consume("LEFT_PAREN", "Expect '(' after 'if'");
    const condition = this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after if condition");

    const thenBranch = this.statement();
    const elseBranch = this.match("ELSE") ? this.statement() : undefined;
    return ifStmt(condition, thenBranch, elseBranch);
  }

  private whileStatement(): Stmt {
    this.consume("LEFT_PAREN", "Expect '(' after 'while'");
    const condition = this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after condition");
    return whileStmt(condition, this.statement());
  }

  /**
   * for (init; cond; incr) body  =>  { init; while (cond) { body...; incr; } }
   */
  private forStatement(): Stmt {
    this.consume("LEFT_PAREN", "Expect '(' after 'for'");

    let initializer: Stmt | undefined;
    if (this.match("SEMICOLON")) {
      initializer = undefined;
    } else if (this.match("VAR")) {
      initializer = this.varDeclaration(false);
    } else {
      initializer = this.expressionStatement();
    }

    const condition = this.check("SEMICOLON") ? undefined : this.expression();
    this.consume("SEMICOLON", "Expect ';' after loop condition");

    const increment = this.check("RIGHT_PAREN") ? undefined : this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after for clauses");

    let body = this.statement();
    if (increment) {
      const step = exprStmt(increment);
      body = body.tag === "Block" ? block([...body.statements, step]) : block([body, step]);
    }

    const loop = whileStmt(condition ?? literal("TRUE", "true"), body);
    return initializer ? block([initializer, loop]) : loop;
  }

  private returnStatement(): Stmt {
    const value = this.check("SEMICOLON") ? undefined : this.expression();
    this.consume("SEMICOLON", "Expect ';' after return value");
    return returnStmt(value);
  }

  private expressionStatement(): Stmt {
    const expression = this.expression();
    this.consume("SEMICOLON", "Expect ';' after expression");
    return exprStmt(expression);
  }

  // ─────────────────────────────────────────────────────────────
  // Expressions, lowest precedence first
  // ─────────────────────────────────────────────────────────────

  private expression(): Expr {
    return this.assignment();
  }

  private assignment(): Expr {
    const expr = this.ternary();

    if (this.match("EQUAL") || this.match("PLUS_EQUAL")) {
      const opToken = this.previous;
      const op: AssignOp = opToken.kind === "PLUS_EQUAL" ? "PLUS_EQUAL" : "EQUAL";
      const value = this.assignment();

      if (expr.tag === "Identifier") return assign(op, expr, value);

      this.errorAt(opToken, "Invalid assignment target");
    }

    return expr;
  }

  private ternary(): Expr {
    const condition = this.logicOr();
    if (!this.match("QUESTION")) return condition;

    const whenTrue = this.expression();
    this.consume("COLON", "Expect ':' in ternary expression");
    const whenFalse = this.ternary();
    return binary("QUESTION", condition, binary("COLON", whenTrue, whenFalse));
  }

  private logicOr(): Expr {
    return this.leftAssociative(["PIPE_PIPE"], () => this.logicAnd());
  }

  private logicAnd(): Expr {
    return this.leftAssociative(["AMPERSAND_AMP"], () => this.equality());
  }

  private equality(): Expr {
    return this.leftAssociative(EQUALITY_OPS, () => this.comparison());
  }

  private comparison(): Expr {
    return this.leftAssociative(COMPARISON_OPS, () => this.term());
  }

  private term(): Expr {
    return this.leftAssociative(TERM_OPS, () => this.factor());
  }

  private factor(): Expr {
    return this.leftAssociative(FACTOR_OPS, () => this.unary());
  }

  private unary(): Expr {
    const op = this.matchAny(UNARY_OPS);
    if (op) return unary(op, this.unary(), true);
    return this.call();
  }

  private call(): Expr {
    let expr = this.primary();
    for (;;) {
      if (this.match("LEFT_PAREN")) {
        expr = this.finishCall(expr);
      } else if (this.match("PLUS_PLUS")) {
        expr = unary("PLUS_PLUS", expr, false);
      } else {
        return expr;
      }
    }
  }

  private finishCall(callee: Expr): Expr {
    const args: Expr[] = [];
    if (!this.check("RIGHT_PAREN")) {
      do {
        args.push(this.expression());
      } while (this.match("COMMA"));
    }
    this.consume("RIGHT_PAREN", "Expect ')' after arguments");
    return call(callee, args);
  }

  private primary(): Expr {
    if (this.match("TRUE")) return literal("TRUE", "true");
    if (this.match("FALSE")) return literal("FALSE", "false");
    if (this.match("INT_LITERAL")) return literal("INT_LITERAL", this.previous.lexeme);
    if (this.match("FLOAT_LITERAL")) return literal("FLOAT_LITERAL", this.previous.lexeme);
    if (this.match("STRING_LITERAL")) return literal("STRING_LITERAL", this.previous.lexeme);
    if (this.match("CHAR_LITERAL")) return literal("CHAR_LITERAL", this.previous.lexeme);
    if (this.match("IDENTIFIER")) return identifier(this.previous.lexeme);

    if (this.match("LEFT_PAREN")) {
      const expr = this.expression();
      this.consume("RIGHT_PAREN", "Expect ')' after expression");
      return grouping(expr);
    }

    this.errorAtCurrent("Expect expression");
    throw new ParseError("Expect expression", this.current);
  }

  private leftAssociative(ops: readonly BinaryOp[], operand: () => Expr): Expr {
    let expr = operand();
    for (let op = this.matchAny(ops); op; op = this.matchAny(ops)) {
      expr = binary(op, expr, operand());
    }
    return expr;
  }

  // ─────────────────────────────────────────────────────────────
  // Token stream
  // ─────────────────────────────────────────────────────────────

  /** Next non-error token; lexical errors are reported on the way. */
  private nextToken(): Token {
    for (;;) {
      const token = this.lexer.scanToken();
      if (token.kind !== "ERROR") return token;
      this.errorAt(token, token.lexeme, "E0001");
    }
  }

  private advance(): Token {
    this.previous = this.current;
    if (this.current.kind !== "END_OF_FILE") this.current = this.nextToken();
    return this.previous;
  }

  private check(kind: TokenKind): boolean {
    return this.current.kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private matchAny<K extends TokenKind>(kinds: readonly K[]): K | undefined {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return kind;
      }
    }
    return undefined;
  }

  private consume(kind: TokenKind, message: string): Token {
    if (this.check(kind)) return this.advance();
    this.errorAtCurrent(message);
    return this.current;
  }

  // ─────────────────────────────────────────────────────────────
  // Error reporting and recovery
  // ─────────────────────────────────────────────────────────────

  private errorAtCurrent(message: string): void {
    this.errorAt(this.current, message);
  }

  private errorAt(token: Token, message: string, code: DiagnosticCode = "E0002"): void {
    if (this.panicMode) return;
    this.panicMode = true;

    const diag = makeDiagnostic(code, { message }, {
      file: this.options.file,
      startLine: token.line,
      startCol: token.column,
    });
    this.reported.push(diag);
    this.diagnostics.report(diag);
  }

  private synchronize(): void {
    this.panicMode = false;

    while (!this.check("END_OF_FILE")) {
      if (this.previous.kind === "SEMICOLON") return;
      // The enclosing block still needs its closing brace
      if (this.check("RIGHT_BRACE")) return;
      if (RESTART_KINDS.includes(this.current.kind)) return;
      this.advance();
    }
  }
}

