// src/core/ir/print.ts
// Textual IR output in the format read by `opt` and `clang`

import type { BasicBlock, IRFunction, IRModule } from "./module";
import { typeToString, type Instruction, type Value } from "./types";

const PLAIN_NAME = /^[-a-zA-Z$._][-a-zA-Z$._0-9]*$/;

function quoteName(name: string): string {
  let out = "";
  for (const byte of Buffer.from(name, "utf8")) {
    const printable = byte >= 0x20 && byte < 0x7f && byte !== 0x22 && byte !== 0x5c;
    out += printable ? String.fromCharCode(byte) : `\\${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return `"${out}"`;
}

export function formatName(name: string): string {
  return PLAIN_NAME.test(name) ? name : quoteName(name);
}

export function formatLocal(name: string): string {
  return `%${formatName(name)}`;
}

export function formatGlobal(name: string): string {
  return `@${formatName(name)}`;
}

/** Floating constants are written as the 64-bit pattern of the value. */
export function formatFloatConstant(value: number): string {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return `0x${view.getBigUint64(0).toString(16).toUpperCase().padStart(16, "0")}`;
}

export function formatValue(value: Value): string {
  switch (value.tag) {
    case "ConstInt":
      if (value.type.bits === 1) return value.value === 0n ? "false" : "true";
      return value.value.toString();
    case "ConstFloat":
      return formatFloatConstant(value.value);
    case "Undef":
      return "undef";
    case "Reg":
      return formatLocal(value.name);
  }
}

function typed(value: Value): string {
  return `${typeToString(value.type)} ${formatValue(value)}`;
}

export function formatInstruction(inst: Instruction): string {
  switch (inst.tag) {
    case "Alloca":
      return `${formatLocal(inst.result)} = alloca ${typeToString(inst.allocated)}`;
    case "Load":
      return `${formatLocal(inst.result)} = load ${typeToString(inst.type)}, ${typed(inst.ptr)}`;
    case "Store":
      return `store ${typed(inst.value)}, ${typed(inst.ptr)}`;
    case "BinOp":
      return `${formatLocal(inst.result)} = ${inst.op} ${typed(inst.lhs)}, ${formatValue(inst.rhs)}`;
    case "FNeg":
      return `${formatLocal(inst.result)} = fneg ${typed(inst.operand)}`;
    case "ICmp":
      return `${formatLocal(inst.result)} = icmp ${inst.pred} ${typed(inst.lhs)}, ${formatValue(inst.rhs)}`;
    case "FCmp":
      return `${formatLocal(inst.result)} = fcmp ${inst.pred} ${typed(inst.lhs)}, ${formatValue(inst.rhs)}`;
    case "Cast":
      return `${formatLocal(inst.result)} = ${inst.op} ${typed(inst.value)} to ${typeToString(inst.to)}`;
    case "Call": {
      const call = `call ${typeToString(inst.returnType)} ${formatGlobal(inst.callee)}(${inst.args.map(typed).join(", ")})`;
      return inst.result === undefined ? call : `${formatLocal(inst.result)} = ${call}`;
    }
    case "Phi": {
      const incoming = inst.incoming.map((i) => `[ ${formatValue(i.value)}, ${formatLocal(i.block)} ]`);
      return `${formatLocal(inst.result)} = phi ${typeToString(inst.type)} ${incoming.join(", ")}`;
    }
    case "Br":
      return `br label ${formatLocal(inst.target)}`;
    case "CondBr":
      return `br ${typed(inst.cond)}, label ${formatLocal(inst.ifTrue)}, label ${formatLocal(inst.ifFalse)}`;
    case "Ret":
      return inst.value ? `ret ${typed(inst.value)}` : "ret void";
    case "Unreachable":
      return "unreachable";
  }
}

function printBlock(block: BasicBlock): string[] {
  return [`${formatName(block.name)}:`, ...block.instructions.map((i) => `  ${formatInstruction(i)}`)];
}

export function printFunction(fn: IRFunction): string {
  const ret = typeToString(fn.returnType);
  const name = formatGlobal(fn.name);

  if (fn.isDeclaration()) {
    return `declare ${ret} ${name}(${fn.params.map((p) => typeToString(p.type)).join(", ")})`;
  }

  const params = fn.params.map((p) => `${typeToString(p.type)} ${formatLocal(p.name)}`).join(", ");
  const body = fn.blocks.flatMap(printBlock);
  return [`define ${ret} ${name}(${params}) {`, ...body, "}"].join("\n");
}

export function printModule(module: IRModule): string {
  const header = [`; ModuleID = '${module.name}'`, `source_filename = "${module.name}"`];
  const functions = module.functions.map(printFunction);
  return [header.join("\n"), ...functions].join("\n\n") + "\n";
}
