// src/core/ir/index.ts
// Public surface of the IR layer

export * from "./types";
export { BasicBlock, IRFunction, IRModule, type IRParam } from "./module";
export { IRBuilder } from "./builder";
export { printModule, printFunction, formatInstruction, formatValue, formatFloatConstant } from "./print";
export { verifyModule, verifyFunction } from "./verify";
