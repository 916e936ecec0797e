// test/helpers/compiler.ts
// Quiet diagnostics and one-call front-end helpers for the specs

import { DiagnosticsContext } from "../../src/diagnostics/context";
import { createMemorySink, type MemorySink } from "../../src/diagnostics/logger";
import { Lexer } from "../../src/core/lexer/lexer";
import { Parser } from "../../src/core/parser/parser";
import { CodeGenerator } from "../../src/core/codegen/codegen";
import type { Stmt } from "../../src/core/ast/nodes";

export type QuietContext = { ctx: DiagnosticsContext; sink: MemorySink };

export function quietContext(level: "DEBUG" | "INFO" | "WARNING" = "DEBUG"): QuietContext {
  const sink = createMemorySink();
  const ctx = new DiagnosticsContext({
    level,
    sink,
    exit: (code: number): never => {
      throw new Error(`exit(${code})`);
    },
  });
  return { ctx, sink };
}

export function parse(source: string): { statements: Stmt[]; parser: Parser; ctx: DiagnosticsContext } {
  const { ctx } = quietContext();
  const parser = new Parser(new Lexer(source), ctx);
  return { statements: parser.parse(), parser, ctx };
}

/** Parses (expecting no syntax errors) and generates. */
export function generate(source: string): { generator: CodeGenerator; ctx: DiagnosticsContext; ir: string } {
  const { statements, parser, ctx } = parse(source);
  if (parser.hadError()) {
    throw new Error(`unexpected parse errors: ${ctx.errors().map((d) => d.message).join("; ")}`);
  }
  const generator = new CodeGenerator(ctx, { moduleName: "test" });
  generator.generate(statements);
  return { generator, ctx, ir: generator.print() };
}

/** Lines of one function's definition, `define` through `}`. */
export function functionText(ir: string, name: string): string[] {
  const lines = ir.split("\n");
  const start = lines.findIndex((l) => l.startsWith("define") && l.includes(`@${name}(`));
  if (start < 0) throw new Error(`no definition of @${name}`);
  const end = lines.indexOf("}", start);
  return lines.slice(start, end + 1);
}
