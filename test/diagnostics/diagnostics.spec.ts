// test/diagnostics/diagnostics.spec.ts
// Logger levels and format, expression trace ring buffer, diagnostic codes

import { describe, it, expect } from "vitest";
import { DiagnosticsContext } from "../../src/diagnostics/context";
import { Logger, createMemorySink, isLogLevel, type LogSink } from "../../src/diagnostics/logger";
import { ExpressionTrace } from "../../src/diagnostics/trace";
import { makeDiagnostic } from "../../src/outcome/codes";
import { formatDiagnostic, isError } from "../../src/outcome/diagnostic";

function splitSink(): LogSink & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: (l) => { outLines.push(l); },
    err: (l) => { errLines.push(l); },
  };
}

class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`exit(${code})`);
  }
}

const throwingExit = (code: number): never => {
  throw new ExitCalled(code);
};

describe("Logger", () => {
  it("formats lines with a padded level tag", () => {
    const sink = createMemorySink();
    const logger = new Logger({ sink });
    logger.info("Compiling");
    expect(sink.lines).toEqual(["[BRAMBLEC :: INFO    ] Compiling"]);
  });

  it("drops messages below the minimum level", () => {
    const sink = createMemorySink();
    const logger = new Logger({ level: "WARNING", sink });
    logger.note("n");
    logger.debug("d");
    logger.info("i");
    logger.warning("w");
    logger.error("e");
    expect(sink.lines).toEqual(["[BRAMBLEC :: WARNING ] w", "[BRAMBLEC :: ERROR   ] e"]);
    logger.setLevel("NOTE");
    expect(logger.getLevel()).toBe("NOTE");
    expect(logger.isEnabled("NOTE")).toBe(true);
  });

  it("routes warnings and above to the error stream", () => {
    const sink = splitSink();
    const logger = new Logger({ level: "DEBUG", sink });
    logger.debug("d");
    logger.info("i");
    logger.warning("w");
    logger.error("e");
    expect(sink.outLines).toEqual(["[BRAMBLEC :: DEBUG   ] d", "[BRAMBLEC :: INFO    ] i"]);
    expect(sink.errLines).toEqual(["[BRAMBLEC :: WARNING ] w", "[BRAMBLEC :: ERROR   ] e"]);
  });

  it("wraps lines in ANSI colors when enabled", () => {
    const sink = createMemorySink();
    new Logger({ sink, color: true }).error("bad");
    expect(sink.lines).toEqual(["\x1b[31m[BRAMBLEC :: ERROR   ] bad\x1b[0m"]);
  });

  it("prints the traceback and exits on critical", () => {
    const sink = splitSink();
    const trace = new ExpressionTrace(10, 2);
    trace.push("main", "a + 1");
    trace.push("main", "f(a)");
    trace.push("main", "b");
    const logger = new Logger({ level: "ERROR", sink, trace, exit: throwingExit });

    expect(() => logger.critical("Input file not found: x.bm")).toThrow(ExitCalled);
    expect(sink.errLines).toEqual([
      "[BRAMBLEC :: CRITICAL] Input file not found: x.bm",
      "Expressions traceback:",
      "  #1 [main] f(a)",
      "  #2 [main] b",
    ]);
  });

  it("recognizes level names", () => {
    expect(isLogLevel("CRITICAL")).toBe(true);
    expect(isLogLevel("info")).toBe(false);
  });
});

describe("ExpressionTrace", () => {
  it("keeps only the most recent entries", () => {
    const trace = new ExpressionTrace(3, 15);
    for (const e of ["a", "b", "c", "d", "e"]) trace.push("f", e);
    expect(trace.length).toBe(3);
    expect(trace.recent().map((t) => t.expression)).toEqual(["c", "d", "e"]);
    expect(trace.recent(2).map((t) => t.expression)).toEqual(["d", "e"]);
  });

  it("formats nothing when empty", () => {
    const trace = new ExpressionTrace();
    expect(trace.formatTraceback()).toEqual([]);
    trace.push("<module>", "x");
    trace.clear();
    expect(trace.length).toBe(0);
    expect(trace.formatTraceback()).toEqual([]);
  });

  it("rejects a capacity below one", () => {
    expect(() => new ExpressionTrace(0)).toThrow("Trace capacity must be at least 1, got 0");
  });
});

describe("diagnostic codes", () => {
  it("fills message templates and keeps the parameters", () => {
    const diag = makeDiagnostic("E0104", { name: "g", expected: 1, actual: 3 });
    expect(diag).toMatchObject({
      code: "E0104",
      severity: "error",
      message: "Wrong number of arguments to g: expected 1, got 3",
      data: { name: "g", expected: 1, actual: 3 },
    });
  });

  it("separates errors from warnings", () => {
    expect(isError(makeDiagnostic("E0106", { name: "f" }))).toBe(true);
    expect(isError(makeDiagnostic("W0002"))).toBe(false);
  });

  it("formats diagnostics with and without a position", () => {
    const located = makeDiagnostic("E0002", { message: "Expect ';' after expression" }, {
      file: "main.bm",
      startLine: 3,
      startCol: 7,
    });
    expect(formatDiagnostic(located)).toBe("main.bm: [Line 3, Col 7] Error: Expect ';' after expression");
    expect(formatDiagnostic(makeDiagnostic("W0001", { name: "t" }))).toBe(
      "Warning: Variable t has no initializer and was not allocated"
    );
  });
});

describe("DiagnosticsContext", () => {
  it("collects, counts and logs reported diagnostics", () => {
    const sink = createMemorySink();
    const ctx = new DiagnosticsContext({ sink, exit: throwingExit });
    ctx.report(makeDiagnostic("W0002"));
    ctx.report(makeDiagnostic("E0100", { name: "q" }));

    expect(ctx.errorCount()).toBe(1);
    expect(ctx.hasErrors()).toBe(true);
    expect(ctx.warnings().map((d) => d.code)).toEqual(["W0002"]);
    expect(ctx.diagnostics().map((d) => d.code)).toEqual(["W0002", "E0100"]);
    expect(sink.lines).toEqual([
      "[BRAMBLEC :: WARNING ] Warning: String literals are not supported yet; using 0",
      "[BRAMBLEC :: ERROR   ] Error: Unknown variable: q",
    ]);
  });

  it("hands out copies of the collected list", () => {
    const ctx = new DiagnosticsContext({ sink: createMemorySink() });
    ctx.diagnostics().push(makeDiagnostic("E0103"));
    expect(ctx.diagnostics()).toEqual([]);
  });
});
