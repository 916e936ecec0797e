// src/core/ir/verify.ts
// Structural checks over a finished module

import type { IRFunction, IRModule } from "./module";
import { isTerminator, sameType, typeToString } from "./types";

export function verifyFunction(fn: IRFunction): string[] {
  const problems: string[] = [];

  fn.blocks.forEach((block) => {
    const where = `block ${block.name} of ${fn.name}`;
    const insts = block.instructions;

    if (!block.isTerminated()) {
      problems.push(`${where} does not end with a terminator`);
    }
    insts.slice(0, -1).forEach((inst) => {
      if (isTerminator(inst)) problems.push(`${where} has instructions after its terminator`);
    });

    for (const inst of insts) {
      const targets =
        inst.tag === "Br" ? [inst.target] :
        inst.tag === "CondBr" ? [inst.ifTrue, inst.ifFalse] :
        inst.tag === "Phi" ? inst.incoming.map((i) => i.block) :
        [];
      for (const target of targets) {
        if (!fn.hasBlock(target)) problems.push(`${where} refers to unknown block ${target}`);
      }

      if (inst.tag === "Ret") {
        const got = inst.value ? inst.value.type : undefined;
        const ok = got ? sameType(got, fn.returnType) : fn.returnType.tag === "Void";
        if (!ok) {
          problems.push(`${where} returns ${got ? typeToString(got) : "void"}, expected ${typeToString(fn.returnType)}`);
        }
      }
    }
  });

  return problems;
}

export function verifyModule(module: IRModule): string[] {
  return module.functions.flatMap(verifyFunction);
}
