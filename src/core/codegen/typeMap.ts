// src/core/codegen/typeMap.ts
// Declared source types to IR types

import type { ExprType } from "../ast/nodes";
import { DOUBLE, FLOAT, I1, I16, I32, I64, I8, VOID, type IRType } from "../ir/types";

/** Anything without a dedicated mapping (string, char, ERROR, literal kinds) is i32. */
export function irTypeFor(type: ExprType): IRType {
  switch (type) {
    case "I8":
    case "U8":
      return I8;
    case "I16":
    case "U16":
      return I16;
    case "I32":
    case "U32":
      return I32;
    case "I64":
    case "U64":
      return I64;
    case "F32":
      return FLOAT;
    case "F64":
      return DOUBLE;
    case "BOOL":
      return I1;
    case "VOID":
      return VOID;
    default:
      return I32;
  }
}
