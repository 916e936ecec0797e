// src/outcome/diagnostic.ts
// Diagnostic records shared by the parser, the code generator and the backend

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, string | number>;
}

export function isError(diag: Diagnostic): boolean {
  return diag.severity === "error";
}

/** `[Line 3, Col 7] Error: Expect ';' after expression` */
export function formatDiagnostic(diag: Diagnostic): string {
  const label = isError(diag) ? "Error" : "Warning";
  const span = diag.span;
  if (span?.startLine !== undefined && span.startCol !== undefined) {
    const file = span.file ? `${span.file}: ` : "";
    return `${file}[Line ${span.startLine}, Col ${span.startCol}] ${label}: ${diag.message}`;
  }
  return `${label}: ${diag.message}`;
}
