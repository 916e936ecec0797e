// src/outcome/codes.ts
// Diagnostic code table for every compiler stage

import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Lexical", template: "{message}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "{message}" },

  E0100: { code: "E0100", severity: "error", category: "Codegen", template: "Unknown variable: {name}" },
  E0101: { code: "E0101", severity: "error", category: "Codegen", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Codegen", template: "Function not declared: {name}" },
  E0103: { code: "E0103", severity: "error", category: "Codegen", template: "Call to non-function" },
  E0104: { code: "E0104", severity: "error", category: "Codegen", template: "Wrong number of arguments to {name}: expected {expected}, got {actual}" },
  E0105: { code: "E0105", severity: "error", category: "Codegen", template: "Function {name} does not return a value" },
  E0106: { code: "E0106", severity: "error", category: "Codegen", template: "Call to void function {name} used as a value" },
  E0107: { code: "E0107", severity: "error", category: "Codegen", template: "Invalid assignment target" },
  E0108: { code: "E0108", severity: "error", category: "Codegen", template: "Redefinition of function {name}" },
  E0109: { code: "E0109", severity: "error", category: "Codegen", template: "Statement not allowed here: {kind}" },
  E0110: { code: "E0110", severity: "error", category: "Codegen", template: "Unsupported operator: {op}" },
  E0111: { code: "E0111", severity: "error", category: "Codegen", template: "Function main must not declare parameters" },
  E0112: { code: "E0112", severity: "error", category: "Codegen", template: "Void function {name} cannot return a value" },

  E0200: { code: "E0200", severity: "error", category: "Backend", template: "Optimization failed for {path}" },
  E0201: { code: "E0201", severity: "error", category: "Backend", template: "Compilation failed for {path}" },
  E0202: { code: "E0202", severity: "error", category: "Backend", template: "Output file missing or empty: {path}" },
  E0203: { code: "E0203", severity: "error", category: "Backend", template: "Required tool not found: {tool}" },

  W0001: { code: "W0001", severity: "warning", category: "Codegen", template: "Variable {name} has no initializer and was not allocated" },
  W0002: { code: "W0002", severity: "warning", category: "Codegen", template: "String literals are not supported yet; using 0" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
