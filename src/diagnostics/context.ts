// src/diagnostics/context.ts
// Diagnostics context passed explicitly through the compiler passes

import { formatDiagnostic, isError, type Diagnostic, type DiagnosticSeverity } from "../outcome/diagnostic";
import { Logger, type LogLevel, type LogSink } from "./logger";
import { ExpressionTrace } from "./trace";

export type DiagnosticsOptions = {
  level?: LogLevel;
  color?: boolean;
  sink?: LogSink;
  exit?: (code: number) => never;
  traceCapacity?: number;
  traceLimit?: number;
};

const LEVEL_FOR: Record<DiagnosticSeverity, LogLevel> = {
  error: "ERROR",
  warning: "WARNING",
};

export class DiagnosticsContext {
  readonly trace: ExpressionTrace;
  readonly logger: Logger;
  private readonly collected: Diagnostic[] = [];

  constructor(options: DiagnosticsOptions = {}) {
    this.trace = new ExpressionTrace(options.traceCapacity, options.traceLimit);
    this.logger = new Logger({
      level: options.level,
      color: options.color,
      sink: options.sink,
      exit: options.exit,
      trace: this.trace,
    });
  }

  report(diag: Diagnostic): void {
    this.collected.push(diag);
    this.logger.log(LEVEL_FOR[diag.severity], formatDiagnostic(diag));
  }

  diagnostics(): Diagnostic[] {
    return [...this.collected];
  }

  errors(): Diagnostic[] {
    return this.collected.filter(isError);
  }

  warnings(): Diagnostic[] {
    return this.collected.filter((d) => d.severity === "warning");
  }

  errorCount(): number {
    return this.errors().length;
  }

  hasErrors(): boolean {
    return this.collected.some(isError);
  }
}
