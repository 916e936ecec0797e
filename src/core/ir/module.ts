// src/core/ir/module.ts
// IR containers: module, function, basic block

import { isTerminator, reg, type Instruction, type IRType, type Reg } from "./types";

export class BasicBlock {
  readonly instructions: Instruction[] = [];

  constructor(readonly name: string) {}

  terminator(): Instruction | undefined {
    const last = this.instructions[this.instructions.length - 1];
    return last && isTerminator(last) ? last : undefined;
  }

  isTerminated(): boolean {
    return this.terminator() !== undefined;
  }
}

export type IRParam = { name: string; type: IRType };

export class IRFunction {
  readonly blocks: BasicBlock[] = [];
  readonly params: IRParam[];
  /** Labels and value names share one namespace per function. */
  private readonly taken = new Set<string>();

  constructor(readonly name: string, readonly returnType: IRType, params: IRParam[]) {
    this.params = params.map((p) => ({ name: this.uniqueName(p.name), type: p.type }));
  }

  uniqueName(base: string): string {
    const stem = base === "" ? "tmp" : base;
    let candidate = stem;
    for (let n = 1; this.taken.has(candidate); n++) {
      candidate = `${stem}${n}`;
    }
    this.taken.add(candidate);
    return candidate;
  }

  argument(index: number): Reg | undefined {
    const p = this.params[index];
    return p ? reg(p.type, p.name) : undefined;
  }

  /** Creates a detached block; it joins the function when positioned on. */
  createBlock(name: string): BasicBlock {
    return new BasicBlock(this.uniqueName(name));
  }

  appendBlock(block: BasicBlock): void {
    if (!this.blocks.includes(block)) this.blocks.push(block);
  }

  hasBlock(name: string): boolean {
    return this.blocks.some((b) => b.name === name);
  }

  entryBlock(): BasicBlock | undefined {
    return this.blocks[0];
  }

  isDeclaration(): boolean {
    return this.blocks.length === 0;
  }
}

export class IRModule {
  readonly functions: IRFunction[] = [];

  constructor(readonly name: string) {}

  addFunction(fn: IRFunction): IRFunction {
    if (this.getFunction(fn.name)) {
      throw new Error(`Function already defined in module ${this.name}: ${fn.name}`);
    }
    this.functions.push(fn);
    return fn;
  }

  getFunction(name: string): IRFunction | undefined {
    return this.functions.find((f) => f.name === name);
  }
}
