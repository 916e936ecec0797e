// src/core/ir/builder.ts
// Instruction builder with an explicit insertion point

import { BasicBlock, IRFunction } from "./module";
import {
  I1,
  isFloatType,
  PTR,
  reg,
  type BinOpcode,
  type CastOpcode,
  type FloatPredicate,
  type Instruction,
  type IntPredicate,
  type IRType,
  type PhiIncoming,
  type Reg,
  type Value,
} from "./types";

export class IRBuilder {
  private fn: IRFunction | undefined;
  private block: BasicBlock | undefined;

  /** Moves the insertion point to the end of `block`, adding it to `fn`. */
  positionAtEnd(fn: IRFunction, block: BasicBlock): void {
    fn.appendBlock(block);
    this.fn = fn;
    this.block = block;
  }

  clear(): void {
    this.fn = undefined;
    this.block = undefined;
  }

  currentFunction(): IRFunction {
    if (!this.fn) throw new Error("IRBuilder has no insertion point");
    return this.fn;
  }

  currentBlock(): BasicBlock {
    if (!this.block) throw new Error("IRBuilder has no insertion point");
    return this.block;
  }

  // ─── Memory ───

  /** Allocas always go to the top of the entry block. */
  alloca(type: IRType, name: string): Reg {
    const fn = this.currentFunction();
    const entry = fn.entryBlock();
    if (!entry) throw new Error(`Function ${fn.name} has no entry block`);

    const result = fn.uniqueName(name);
    let at = 0;
    while (at < entry.instructions.length && entry.instructions[at]?.tag === "Alloca") at++;
    entry.instructions.splice(at, 0, { tag: "Alloca", result, allocated: type });
    return reg(PTR, result);
  }

  load(type: IRType, ptr: Value, name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "Load", result, type, ptr });
    return reg(type, result);
  }

  store(value: Value, ptr: Value): void {
    this.insert({ tag: "Store", value, ptr });
  }

  // ─── Arithmetic and comparison ───

  binOp(op: BinOpcode, lhs: Value, rhs: Value, name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "BinOp", result, op, lhs, rhs });
    return reg(lhs.type, result);
  }

  fneg(operand: Value, name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "FNeg", result, operand });
    return reg(operand.type, result);
  }

  icmp(pred: IntPredicate, lhs: Value, rhs: Value, name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "ICmp", result, pred, lhs, rhs });
    return reg(I1, result);
  }

  fcmp(pred: FloatPredicate, lhs: Value, rhs: Value, name: string): Reg {
    if (!isFloatType(lhs.type)) throw new Error("fcmp needs floating operands");
    const result = this.name(name);
    this.insert({ tag: "FCmp", result, pred, lhs, rhs });
    return reg(I1, result);
  }

  cast(op: CastOpcode, value: Value, to: IRType, name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "Cast", result, op, value, to });
    return reg(to, result);
  }

  // ─── Calls and phis ───

  /** Void calls produce no value. */
  call(callee: IRFunction, args: Value[], name: string): Reg | undefined {
    if (callee.returnType.tag === "Void") {
      this.insert({ tag: "Call", callee: callee.name, returnType: callee.returnType, args });
      return undefined;
    }
    const result = this.name(name);
    this.insert({ tag: "Call", result, callee: callee.name, returnType: callee.returnType, args });
    return reg(callee.returnType, result);
  }

  phi(type: IRType, incoming: PhiIncoming[], name: string): Reg {
    const result = this.name(name);
    this.insert({ tag: "Phi", result, type, incoming });
    return reg(type, result);
  }

  // ─── Terminators ───

  br(target: BasicBlock): void {
    this.insert({ tag: "Br", target: target.name });
  }

  condBr(cond: Value, ifTrue: BasicBlock, ifFalse: BasicBlock): void {
    this.insert({ tag: "CondBr", cond, ifTrue: ifTrue.name, ifFalse: ifFalse.name });
  }

  ret(value?: Value): void {
    this.insert(value ? { tag: "Ret", value } : { tag: "Ret" });
  }

  unreachable(): void {
    this.insert({ tag: "Unreachable" });
  }

  // ─────────────────────────────────────────────────────────────

  private name(base: string): string {
    return this.currentFunction().uniqueName(base);
  }

  /**
   * Code after a terminator (say, statements following a return) lands in a
   * fresh block with no predecessors so every block keeps one terminator.
   */
  private insert(inst: Instruction): void {
    const fn = this.currentFunction();
    let block = this.currentBlock();
    if (block.isTerminated()) {
      block = fn.createBlock("dead");
      this.positionAtEnd(fn, block);
    }
    block.instructions.push(inst);
  }
}
