// src/core/ir/types.ts
// IR types, values and instructions

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type IntBits = 1 | 8 | 16 | 32 | 64;
export type FloatBits = 32 | 64;

export type IntType = { tag: "Int"; bits: IntBits };
export type FloatType = { tag: "Float"; bits: FloatBits };
export type VoidType = { tag: "Void" };
/** Opaque pointer; allocas and the argv parameter. */
export type PtrType = { tag: "Ptr" };

export type IRType = IntType | FloatType | VoidType | PtrType;

export const I1: IntType = { tag: "Int", bits: 1 };
export const I8: IntType = { tag: "Int", bits: 8 };
export const I16: IntType = { tag: "Int", bits: 16 };
export const I32: IntType = { tag: "Int", bits: 32 };
export const I64: IntType = { tag: "Int", bits: 64 };
export const FLOAT: FloatType = { tag: "Float", bits: 32 };
export const DOUBLE: FloatType = { tag: "Float", bits: 64 };
export const VOID: VoidType = { tag: "Void" };
export const PTR: PtrType = { tag: "Ptr" };

export function typeToString(type: IRType): string {
  switch (type.tag) {
    case "Int": return `i${type.bits}`;
    case "Float": return type.bits === 32 ? "float" : "double";
    case "Void": return "void";
    case "Ptr": return "ptr";
  }
}

export function sameType(a: IRType, b: IRType): boolean {
  return typeToString(a) === typeToString(b);
}

export function isIntType(type: IRType): type is IntType {
  return type.tag === "Int";
}

export function isFloatType(type: IRType): type is FloatType {
  return type.tag === "Float";
}

// ─────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────

export type ConstInt = { tag: "ConstInt"; type: IntType; value: bigint };
export type ConstFloat = { tag: "ConstFloat"; type: FloatType; value: number };
export type Undef = { tag: "Undef"; type: IRType };
/** Named SSA value: a function argument or an instruction result. */
export type Reg = { tag: "Reg"; type: IRType; name: string };

export type Value = ConstInt | ConstFloat | Undef | Reg;

/** Wraps to the type's width, two's complement. */
export function constInt(type: IntType, value: bigint | number): ConstInt {
  const v = typeof value === "bigint" ? value : BigInt(value);
  return { tag: "ConstInt", type, value: type.bits === 1 ? BigInt.asUintN(1, v) : BigInt.asIntN(type.bits, v) };
}

export function constFloat(type: FloatType, value: number): ConstFloat {
  return { tag: "ConstFloat", type, value: type.bits === 32 ? Math.fround(value) : value };
}

export function constBool(value: boolean): ConstInt {
  return constInt(I1, value ? 1n : 0n);
}

export function undef(type: IRType): Undef {
  return { tag: "Undef", type };
}

export function reg(type: IRType, name: string): Reg {
  return { tag: "Reg", type, name };
}

// ─────────────────────────────────────────────────────────────
// Instructions
// ─────────────────────────────────────────────────────────────

export type BinOpcode =
  | "add" | "sub" | "mul" | "sdiv" | "srem"
  | "fadd" | "fsub" | "fmul" | "fdiv" | "frem"
  | "and" | "or" | "xor";

export type IntPredicate = "eq" | "ne" | "slt" | "sle" | "sgt" | "sge";
export type FloatPredicate = "oeq" | "one" | "olt" | "ole" | "ogt" | "oge";

export type CastOpcode = "sext" | "zext" | "trunc" | "sitofp" | "uitofp" | "fptosi" | "fpext" | "fptrunc";

export type PhiIncoming = { value: Value; block: string };

export type Instruction =
  | { tag: "Alloca"; result: string; allocated: IRType }
  | { tag: "Load"; result: string; type: IRType; ptr: Value }
  | { tag: "Store"; value: Value; ptr: Value }
  | { tag: "BinOp"; result: string; op: BinOpcode; lhs: Value; rhs: Value }
  | { tag: "FNeg"; result: string; operand: Value }
  | { tag: "ICmp"; result: string; pred: IntPredicate; lhs: Value; rhs: Value }
  | { tag: "FCmp"; result: string; pred: FloatPredicate; lhs: Value; rhs: Value }
  | { tag: "Cast"; result: string; op: CastOpcode; value: Value; to: IRType }
  | { tag: "Call"; result?: string; callee: string; returnType: IRType; args: Value[] }
  | { tag: "Phi"; result: string; type: IRType; incoming: PhiIncoming[] }
  | { tag: "Br"; target: string }
  | { tag: "CondBr"; cond: Value; ifTrue: string; ifFalse: string }
  | { tag: "Ret"; value?: Value }
  | { tag: "Unreachable" };

export type Terminator = Extract<Instruction, { tag: "Br" | "CondBr" | "Ret" | "Unreachable" }>;

export function isTerminator(inst: Instruction): inst is Terminator {
  return inst.tag === "Br" || inst.tag === "CondBr" || inst.tag === "Ret" || inst.tag === "Unreachable";
}
