// src/core/codegen/codegen.ts
// Tree-walking code generator: AST in, IR module out
//
// Generation is best-effort. Problems are reported into the diagnostics
// context and the walk continues; an expression that could not be generated
// yields undefined and its consumers skip their own work without adding
// further errors.

import * as fs from "fs";

import type {
  Assign,
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
  VarDecl,
  While,
} from "../ast/nodes";
import { formatExpr } from "../ast/printer";
import { acceptExpr, acceptStmt, type AstVisitor } from "../ast/visitor";
import { DiagnosticsContext } from "../../diagnostics/context";
import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import { IRBuilder } from "../ir/builder";
import { IRFunction, IRModule } from "../ir/module";
import { printModule } from "../ir/print";
import {
  constBool,
  constFloat,
  constInt,
  DOUBLE,
  FLOAT,
  I1,
  I32,
  isFloatType,
  isIntType,
  PTR,
  sameType,
  undef,
  type BinOpcode,
  type FloatPredicate,
  type IntPredicate,
  type IRType,
  type Reg,
  type Value,
} from "../ir/types";
import { charLiteralCode, parseFloatLiteral, parseIntLiteral } from "./literals";
import { irTypeFor } from "./typeMap";

/** Symbol the user's `main` is emitted under; `main` itself is the native entry. */
export const MAIN_SYMBOL = "bramble_main";

export type CodeGeneratorOptions = {
  moduleName?: string;
};

type Slot = { ptr: Reg; type: IRType };

const ARITHMETIC: Partial<Record<BinaryOp, { int: BinOpcode; float: BinOpcode; name: string }>> = {
  PLUS: { int: "add", float: "fadd", name: "addtmp" },
  MINUS: { int: "sub", float: "fsub", name: "subtmp" },
  STAR: { int: "mul", float: "fmul", name: "multmp" },
  SLASH: { int: "sdiv", float: "fdiv", name: "divtmp" },
  PERCENT: { int: "srem", float: "frem", name: "remtmp" },
};

const COMPARISON: Partial<Record<BinaryOp, { int: IntPredicate; float: FloatPredicate }>> = {
  EQUAL_EQUAL: { int: "eq", float: "oeq" },
  BANG_EQUAL: { int: "ne", float: "one" },
  LESS: { int: "slt", float: "olt" },
  LESS_EQUAL: { int: "sle", float: "ole" },
  GREATER: { int: "sgt", float: "ogt" },
  GREATER_EQUAL: { int: "sge", float: "oge" },
};

export class CodeGenerator implements AstVisitor<void, Value | undefined> {
  private readonly irModule: IRModule;
  private readonly builder = new IRBuilder();
  private readonly namedValues = new Map<string, Slot>();
  private readonly declared = new Map<FunctionDecl, IRFunction>();
  private currentDecl: FunctionDecl | undefined;
  private hasMain = false;
  private errorTotal = 0;

  constructor(
    private readonly diagnostics: DiagnosticsContext = new DiagnosticsContext(),
    options: CodeGeneratorOptions = {}
  ) {
    this.irModule = new IRModule(options.moduleName ?? "bramble");
  }

  // ─────────────────────────────────────────────────────────────
  // Public API
  // ─────────────────────────────────────────────────────────────

  /** Declares every function first so bodies can call each other in any order. */
  generate(statements: Stmt[]): IRModule {
    const functions: FunctionDecl[] = [];
    for (const stmt of statements) {
      if (stmt.tag === "FunctionDecl") {
        if (this.declareFunction(stmt)) functions.push(stmt);
      } else {
        this.fail("E0109", { kind: stmt.tag });
      }
    }

    for (const fn of functions) acceptStmt(fn, this);

    if (this.hasMain) this.emitEntryPoint();
    return this.irModule;
  }

  module(): IRModule {
    return this.irModule;
  }

  hadError(): boolean {
    return this.errorTotal > 0;
  }

  errorCount(): number {
    return this.errorTotal;
  }

  print(): string {
    return printModule(this.irModule);
  }

  /** Returns false, writing nothing, when the file cannot be opened. */
  writeToFile(filePath: string): boolean {
    try {
      fs.writeFileSync(filePath, this.print(), "utf8");
      return true;
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.diagnostics.logger.debug(`Could not write ${filePath}: ${msg}`);
      return false;
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Functions
  // ─────────────────────────────────────────────────────────────

  private declareFunction(decl: FunctionDecl): boolean {
    const symbol = symbolFor(decl.name);
    if (this.irModule.getFunction(symbol)) {
      this.fail("E0108", { name: decl.name });
      return false;
    }

    if (decl.name === "main") {
      if (decl.params.length > 0) {
        this.fail("E0111");
      } else {
        this.hasMain = true;
      }
    }

    const params = decl.params.map((p) => ({ name: p.name, type: irTypeFor(p.type) }));
    const fn = new IRFunction(symbol, irTypeFor(decl.returnType), params);
    this.irModule.addFunction(fn);
    this.declared.set(decl, fn);
    return true;
  }

  visitFunctionDecl(decl: FunctionDecl): void {
    const fn = this.declared.get(decl);
    if (!fn || this.currentDecl) {
      this.fail("E0109", { kind: "nested function" });
      return;
    }

    this.currentDecl = decl;
    this.namedValues.clear();
    this.builder.positionAtEnd(fn, fn.createBlock("entry"));

    decl.params.forEach((param, i) => {
      const arg = fn.argument(i);
      if (!arg) return;
      const slot = this.builder.alloca(arg.type, param.name);
      this.builder.store(arg, slot);
      this.namedValues.set(param.name, { ptr: slot, type: arg.type });
    });

    this.stmt(decl.body);

    if (!this.builder.currentBlock().isTerminated()) {
      if (fn.returnType.tag === "Void") {
        this.builder.ret();
      } else {
        this.fail("E0105", { name: decl.name });
        this.builder.unreachable();
      }
    }

    this.builder.clear();
    this.currentDecl = undefined;
  }

  visitParameter(_node: Parameter): void {
    // Bound to their slots when the enclosing function is entered.
  }

  private emitEntryPoint(): void {
    const user = this.irModule.getFunction(MAIN_SYMBOL);
    if (!user) return;

    const entry = new IRFunction("main", I32, [
      { name: "argc", type: I32 },
      { name: "argv", type: PTR },
    ]);
    this.irModule.addFunction(entry);
    this.builder.positionAtEnd(entry, entry.createBlock("entry"));

    const result = this.builder.call(user, [], "result");
    this.builder.ret(result ? this.convert(result, I32) : constInt(I32, 0));
    this.builder.clear();
  }

  // ─────────────────────────────────────────────────────────────
  // Statements
  // ─────────────────────────────────────────────────────────────

  visitBlock(node: Block): void {
    for (const stmt of node.statements) this.stmt(stmt);
  }

  visitVarDecl(node: VarDecl): void {
    const init = node.initializer;
    if (!init) {
      this.warn("W0001", { name: node.name });
      return;
    }

    const type = irTypeFor(node.type);
    const value = this.value(init);
    const slot = this.builder.alloca(type, node.name);
    if (value) this.builder.store(this.convert(value, type), slot);
    this.namedValues.set(node.name, { ptr: slot, type });
  }

  visitIf(node: If): void {
    const fn = this.builder.currentFunction();
    const cond = this.condition(node.condition);

    const thenBlock = fn.createBlock("then");
    const elseBlock = fn.createBlock("else");
    const merge = fn.createBlock("ifcont");
    this.builder.condBr(cond, thenBlock, elseBlock);

    this.builder.positionAtEnd(fn, thenBlock);
    this.stmt(node.thenBranch);
    this.builder.br(merge);

    this.builder.positionAtEnd(fn, elseBlock);
    if (node.elseBranch) this.stmt(node.elseBranch);
    this.builder.br(merge);

    this.builder.positionAtEnd(fn, merge);
  }

  visitWhile(node: While): void {
    this.loop(node.condition, node.body);
  }

  visitFor(node: For): void {
    if (node.initializer) this.stmt(node.initializer);
    this.loop(node.condition, node.body, node.increment);
  }

  private loop(condition: Expr | undefined, body: Stmt, increment?: Expr): void {
    const fn = this.builder.currentFunction();
    const condBlock = fn.createBlock("loop_cond");
    const bodyBlock = fn.createBlock("loop_body");
    const after = fn.createBlock("after_loop");

    this.builder.br(condBlock);
    this.builder.positionAtEnd(fn, condBlock);
    const cond = condition ? this.condition(condition) : constBool(true);
    this.builder.condBr(cond, bodyBlock, after);

    this.builder.positionAtEnd(fn, bodyBlock);
    this.stmt(body);
    if (increment) this.expr(increment);
    this.builder.br(condBlock);

    this.builder.positionAtEnd(fn, after);
  }

  visitReturn(node: Return): void {
    const fn = this.builder.currentFunction();

    if (!node.value) {
      if (fn.returnType.tag !== "Void") {
        this.fail("E0105", { name: this.currentDecl?.name ?? fn.name });
        this.builder.unreachable();
        return;
      }
      this.builder.ret();
      return;
    }

    if (fn.returnType.tag === "Void") {
      this.expr(node.value);
      this.fail("E0112", { name: this.currentDecl?.name ?? fn.name });
      this.builder.ret();
      return;
    }

    const value = this.value(node.value);
    if (!value) {
      this.builder.unreachable();
      return;
    }
    this.builder.ret(this.convert(value, fn.returnType));
  }

  visitExpressionStmt(node: ExpressionStmt): void {
    this.expr(node.expression);
  }

  // ─────────────────────────────────────────────────────────────
  // Expressions
  // ─────────────────────────────────────────────────────────────

  visitLiteral(node: Literal): Value | undefined {
    switch (node.kind) {
      case "INT_LITERAL":
        return constInt(I32, parseIntLiteral(node.value));
      case "FLOAT_LITERAL":
        return constFloat(DOUBLE, parseFloatLiteral(node.value));
      case "TRUE":
        return constBool(true);
      case "FALSE":
        return constBool(false);
      case "CHAR_LITERAL":
        return constInt(I32, charLiteralCode(node.value));
      case "STRING_LITERAL":
        this.warn("W0002");
        return constInt(I32, 0);
    }
  }

  visitIdentifier(node: Identifier): Value | undefined {
    const slot = this.namedValues.get(node.name);
    if (!slot) {
      this.fail("E0100", { name: node.name });
      return undefined;
    }
    return this.builder.load(slot.type, slot.ptr, node.name);
  }

  visitGrouping(node: Grouping): Value | undefined {
    return this.expr(node.expression);
  }

  visitAssign(node: Assign): Value | undefined {
    const target = node.target;
    if (target.tag !== "Identifier") {
      this.fail("E0107");
      return undefined;
    }

    const value = this.value(node.value);
    const slot = this.namedValues.get(target.name);
    if (!slot) {
      this.fail("E0101", { name: target.name });
      return undefined;
    }
    if (!value) return undefined;

    let result: Value | undefined = value;
    if (node.op === "PLUS_EQUAL") {
      const current = this.builder.load(slot.type, slot.ptr, target.name);
      result = this.arithmetic("PLUS", current, value);
      if (!result) return undefined;
    }

    const stored = this.convert(result, slot.type);
    this.builder.store(stored, slot.ptr);
    return stored;
  }

  visitUnary(node: Unary): Value | undefined {
    if (node.op === "PLUS_PLUS") return this.increment(node);

    const operand = this.value(node.operand);
    if (!operand) return undefined;

    if (node.op === "MINUS") {
      if (isFloatType(operand.type)) return this.builder.fneg(operand, "fnegtmp");
      if (isIntType(operand.type)) return this.builder.binOp("sub", constInt(operand.type, 0), operand, "negtmp");
      return undefined;
    }

    // BANG
    if (isFloatType(operand.type)) return this.builder.fcmp("oeq", operand, constFloat(operand.type, 0), "nottmp");
    if (isIntType(operand.type)) {
      if (operand.type.bits === 1) return this.builder.binOp("xor", operand, constBool(true), "nottmp");
      return this.builder.icmp("eq", operand, constInt(operand.type, 0), "nottmp");
    }
    return undefined;
  }

  private increment(node: Unary): Value | undefined {
    const target = node.operand;
    if (target.tag !== "Identifier") {
      this.fail("E0107");
      return undefined;
    }
    const slot = this.namedValues.get(target.name);
    if (!slot) {
      this.fail("E0100", { name: target.name });
      return undefined;
    }

    const old = this.builder.load(slot.type, slot.ptr, target.name);
    let updated: Value;
    if (isFloatType(slot.type)) {
      updated = this.builder.binOp("fadd", old, constFloat(slot.type, 1), "inctmp");
    } else if (isIntType(slot.type)) {
      updated = this.builder.binOp("add", old, constInt(slot.type, 1), "inctmp");
    } else {
      return undefined;
    }
    this.builder.store(updated, slot.ptr);
    return node.prefix ? updated : old;
  }

  visitBinary(node: Binary): Value | undefined {
    switch (node.op) {
      case "AMPERSAND_AMP":
      case "PIPE_PIPE":
        return this.shortCircuit(node.op, node.left, node.right);
      case "QUESTION":
        if (node.right.tag !== "Binary" || node.right.op !== "COLON") {
          this.fail("E0110", { op: "?" });
          return undefined;
        }
        return this.conditional(node.left, node.right.left, node.right.right);
      case "COLON":
        this.fail("E0110", { op: ":" });
        return undefined;
    }

    const left = this.value(node.left);
    const right = this.value(node.right);
    if (!left || !right) return undefined;

    if (ARITHMETIC[node.op]) return this.arithmetic(node.op, left, right);
    return this.compare(node.op, left, right);
  }

  visitCall(node: Call): Value | undefined {
    const args = node.args.map((a) => this.value(a));

    const callee = node.callee;
    if (callee.tag !== "Identifier") {
      this.expr(callee);
      this.fail("E0103");
      return undefined;
    }

    const fn = this.irModule.getFunction(symbolFor(callee.name));
    if (!fn) {
      if (this.namedValues.has(callee.name)) this.fail("E0103");
      else this.fail("E0102", { name: callee.name });
      return undefined;
    }

    if (args.length !== fn.params.length) {
      this.fail("E0104", { name: callee.name, expected: fn.params.length, actual: args.length });
      return undefined;
    }

    const values: Value[] = [];
    for (const [i, arg] of args.entries()) {
      const param = fn.params[i];
      if (!arg || !param) return undefined;
      values.push(this.convert(arg, param.type));
    }
    return this.builder.call(fn, values, "calltmp");
  }

  // ─────────────────────────────────────────────────────────────
  // Operators
  // ─────────────────────────────────────────────────────────────

  private arithmetic(op: BinaryOp, left: Value, right: Value): Value | undefined {
    const ops = ARITHMETIC[op];
    if (!ops) {
      this.fail("E0110", { op });
      return undefined;
    }
    const [l, r] = this.unify(left, right);
    if (isFloatType(l.type)) return this.builder.binOp(ops.float, l, r, `f${ops.name}`);
    return this.builder.binOp(ops.int, l, r, ops.name);
  }

  private compare(op: BinaryOp, left: Value, right: Value): Value | undefined {
    const ops = COMPARISON[op];
    if (!ops) {
      this.fail("E0110", { op });
      return undefined;
    }
    const [l, r] = this.unify(left, right);
    if (isFloatType(l.type)) return this.builder.fcmp(ops.float, l, r, "cmptmp");
    return this.builder.icmp(ops.int, l, r, "cmptmp");
  }

  private shortCircuit(op: "AMPERSAND_AMP" | "PIPE_PIPE", leftExpr: Expr, rightExpr: Expr): Value | undefined {
    const left = this.value(leftExpr);
    if (!left) return undefined;

    const fn = this.builder.currentFunction();
    const isAnd = op === "AMPERSAND_AMP";
    const rhsBlock = fn.createBlock(isAnd ? "and_rhs" : "or_rhs");
    const merge = fn.createBlock(isAnd ? "and_end" : "or_end");

    const lhsBool = this.toBool(left);
    if (isAnd) this.builder.condBr(lhsBool, rhsBlock, merge);
    else this.builder.condBr(lhsBool, merge, rhsBlock);
    const lhsEnd = this.builder.currentBlock();

    this.builder.positionAtEnd(fn, rhsBlock);
    const right = this.value(rightExpr);
    const rhsBool = right ? this.toBool(right) : undefined;
    this.builder.br(merge);
    const rhsEnd = this.builder.currentBlock();

    this.builder.positionAtEnd(fn, merge);
    if (!rhsBool) return undefined;
    return this.builder.phi(
      I1,
      [
        { value: constBool(!isAnd), block: lhsEnd.name },
        { value: rhsBool, block: rhsEnd.name },
      ],
      isAnd ? "andtmp" : "ortmp"
    );
  }

  /** c ? a : b, each arm converted to the common type inside its own block. */
  private conditional(condExpr: Expr, whenTrue: Expr, whenFalse: Expr): Value | undefined {
    const cond = this.value(condExpr);
    if (!cond) return undefined;

    const fn = this.builder.currentFunction();
    const trueBlock = fn.createBlock("cond_true");
    const falseBlock = fn.createBlock("cond_false");
    const merge = fn.createBlock("cond_end");
    this.builder.condBr(this.toBool(cond), trueBlock, falseBlock);

    this.builder.positionAtEnd(fn, trueBlock);
    const a = this.value(whenTrue);
    const trueEnd = this.builder.currentBlock();

    this.builder.positionAtEnd(fn, falseBlock);
    const b = this.value(whenFalse);

    if (!a || !b) {
      this.builder.br(merge);
      this.builder.positionAtEnd(fn, trueEnd);
      this.builder.br(merge);
      this.builder.positionAtEnd(fn, merge);
      return undefined;
    }

    const type = commonType(a.type, b.type);
    const bConv = this.convert(b, type);
    this.builder.br(merge);
    const falseEnd = this.builder.currentBlock();

    this.builder.positionAtEnd(fn, trueEnd);
    const aConv = this.convert(a, type);
    this.builder.br(merge);
    const trueEndFinal = this.builder.currentBlock();

    this.builder.positionAtEnd(fn, merge);
    return this.builder.phi(
      type,
      [
        { value: aConv, block: trueEndFinal.name },
        { value: bConv, block: falseEnd.name },
      ],
      "condtmp"
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Conversions
  // ─────────────────────────────────────────────────────────────

  private condition(expr: Expr): Value {
    const value = this.value(expr);
    return value ? this.toBool(value) : undef(I1);
  }

  private toBool(value: Value): Value {
    if (isIntType(value.type)) {
      if (value.type.bits === 1) return value;
      return this.builder.icmp("ne", value, constInt(value.type, 0), "tobool");
    }
    if (isFloatType(value.type)) {
      return this.builder.fcmp("one", value, constFloat(value.type, 0), "tobool");
    }
    return value;
  }

  private unify(left: Value, right: Value): [Value, Value] {
    const type = commonType(left.type, right.type);
    return [this.convert(left, type), this.convert(right, type)];
  }

  /** Coerces for stores, returns, call arguments and mixed operands. */
  private convert(value: Value, to: IRType): Value {
    const from = value.type;
    if (sameType(from, to)) return value;

    if (isIntType(from) && isIntType(to)) {
      if (to.bits === 1) return this.toBool(value);
      if (from.bits < to.bits) return this.builder.cast(from.bits === 1 ? "zext" : "sext", value, to, "conv");
      return this.builder.cast("trunc", value, to, "conv");
    }
    if (isIntType(from) && isFloatType(to)) {
      return this.builder.cast(from.bits === 1 ? "uitofp" : "sitofp", value, to, "conv");
    }
    if (isFloatType(from) && isIntType(to)) {
      if (to.bits === 1) return this.toBool(value);
      return this.builder.cast("fptosi", value, to, "conv");
    }
    if (isFloatType(from) && isFloatType(to)) {
      return this.builder.cast(from.bits < to.bits ? "fpext" : "fptrunc", value, to, "conv");
    }
    return value;
  }

  // ─────────────────────────────────────────────────────────────

  private stmt(node: Stmt): void {
    acceptStmt(node, this);
  }

  private expr(node: Expr): Value | undefined {
    this.diagnostics.trace.push(this.currentDecl?.name ?? "<module>", formatExpr(node));
    return acceptExpr(node, this);
  }

  /** Like expr(), for places that need a result; a void call there is an error. */
  private value(node: Expr): Value | undefined {
    const errorsBefore = this.errorTotal;
    const result = this.expr(node);
    if (!result && this.errorTotal === errorsBefore) {
      let inner = node;
      while (inner.tag === "Grouping") inner = inner.expression;
      this.fail("E0106", { name: inner.tag === "Call" ? formatExpr(inner.callee) : formatExpr(inner) });
    }
    return result;
  }

  private fail(code: DiagnosticCode, params?: Record<string, string | number>): void {
    this.errorTotal++;
    this.diagnostics.report(makeDiagnostic(code, this.withFunction(params)));
  }

  private warn(code: DiagnosticCode, params?: Record<string, string | number>): void {
    this.diagnostics.report(makeDiagnostic(code, this.withFunction(params)));
  }

  private withFunction(params?: Record<string, string | number>): Record<string, string | number> | undefined {
    const fnName = this.currentDecl?.name;
    if (!fnName) return params;
    return { function: fnName, ...params };
  }
}

function symbolFor(name: string): string {
  return name === "main" ? MAIN_SYMBOL : name;
}

/** Wider integer, or the floating type when either side is floating. */
function commonType(a: IRType, b: IRType): IRType {
  if (isFloatType(a) || isFloatType(b)) {
    const aBits = isFloatType(a) ? a.bits : 0;
    const bBits = isFloatType(b) ? b.bits : 0;
    return Math.max(aBits, bBits) === 64 ? DOUBLE : FLOAT;
  }
  if (isIntType(a) && isIntType(b)) return a.bits >= b.bits ? a : b;
  return a;
}
