// src/diagnostics/logger.ts
// Leveled console logger for the compiler driver

import { ExpressionTrace } from "./trace";

export const LOG_LEVELS = ["NOTE", "DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export type MemorySink = LogSink & { lines: string[] };

/** Collects every line; used by tests and the explorer server. */
export function createMemorySink(): MemorySink {
  const lines: string[] = [];
  return {
    lines,
    out: (line) => { lines.push(line); },
    err: (line) => { lines.push(line); },
  };
}

const COLORS: Record<LogLevel, string> = {
  NOTE: "\x1b[36m",
  DEBUG: "\x1b[90m",
  INFO: "\x1b[32m",
  WARNING: "\x1b[33m",
  ERROR: "\x1b[31m",
  CRITICAL: "\x1b[1;31m",
};
const RESET = "\x1b[0m";

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export type LoggerOptions = {
  level?: LogLevel;
  color?: boolean;
  sink?: LogSink;
  trace?: ExpressionTrace;
  /** Called after a CRITICAL message; must not return. */
  exit?: (code: number) => never;
};

export class Logger {
  private level: LogLevel;
  private readonly color: boolean;
  private readonly sink: LogSink;
  private readonly trace: ExpressionTrace;
  private readonly exit: (code: number) => never;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "INFO";
    this.color = options.color ?? false;
    this.sink = options.sink ?? consoleSink;
    this.trace = options.trace ?? new ExpressionTrace();
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank(level) >= levelRank(this.level);
  }

  format(level: LogLevel, message: string): string {
    const line = `[BRAMBLEC :: ${level.padEnd(8, " ")}] ${message}`;
    return this.color ? `${COLORS[level]}${line}${RESET}` : line;
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const line = this.format(level, message);
    if (levelRank(level) >= levelRank("WARNING")) {
      this.sink.err(line);
    } else {
      this.sink.out(line);
    }
  }

  note(message: string): void { this.log("NOTE", message); }
  debug(message: string): void { this.log("DEBUG", message); }
  info(message: string): void { this.log("INFO", message); }
  warning(message: string): void { this.log("WARNING", message); }
  error(message: string): void { this.log("ERROR", message); }

  /** Logs regardless of level, dumps the expression traceback and exits. */
  critical(message: string): never {
    this.sink.err(this.format("CRITICAL", message));
    for (const line of this.trace.formatTraceback()) {
      this.sink.err(line);
    }
    return this.exit(1);
  }
}
