// src/core/pipeline/compile.ts
// Staged driver: source -> tokens -> AST -> IR -> native binary
//
// Each stage gates the next: parse errors stop before code generation and
// generation errors stop before anything is written.

import type { Diagnostic } from "../../outcome/diagnostic";
import { DiagnosticsContext } from "../../diagnostics/context";
import type { Stmt } from "../ast/nodes";
import { printAst } from "../ast/printer";
import { Backend, irPathFor } from "../backend/backend";
import { CodeGenerator } from "../codegen/codegen";
import type { IRModule } from "../ir/module";
import { verifyModule } from "../ir/verify";
import { Lexer, tokenize } from "../lexer/lexer";
import type { Token } from "../lexer/token";
import { Parser } from "../parser/parser";

export type Stage = "tokens" | "ast" | "ir";

export const STAGES: readonly Stage[] = ["tokens", "ast", "ir"];

export function isStage(value: string): value is Stage {
  return STAGES.some((s) => s === value);
}

export type CompileOptions = {
  /** Recorded in diagnostic spans */
  file?: string;
  moduleName?: string;
  diagnostics?: DiagnosticsContext;
};

export type ParseResult = {
  ok: boolean;
  statements: Stmt[];
  diagnostics: readonly Diagnostic[];
};

export type CompileResult = ParseResult & {
  generator?: CodeGenerator;
  module?: IRModule;
  /** Textual IR, present when generation succeeded */
  ir?: string;
  /** Structural problems found in the generated module */
  verification: string[];
};

export type BuildOptions = CompileOptions & {
  /** Output base name */
  output: string;
  /** Stop after writing `<output>.ll` */
  emitIr: boolean;
  backend: Backend;
};

export type BuildResult = {
  ok: boolean;
  artifacts: string[];
  diagnostics: readonly Diagnostic[];
};

// =========================================================================
// Front end
// =========================================================================

export function lexSource(source: string, limit?: number): Token[] {
  return tokenize(source, limit);
}

export function parseSource(source: string, options: CompileOptions = {}): ParseResult {
  const ctx = options.diagnostics ?? new DiagnosticsContext();
  const parser = new Parser(new Lexer(source), ctx, { file: options.file });
  const statements = parser.parse();
  return { ok: !parser.hadError(), statements, diagnostics: ctx.diagnostics() };
}

export function dumpAst(source: string, options: CompileOptions = {}): ParseResult & { text: string } {
  const parsed = parseSource(source, options);
  return { ...parsed, text: printAst(parsed.statements) };
}

export function compileSource(source: string, options: CompileOptions = {}): CompileResult {
  const ctx = options.diagnostics ?? new DiagnosticsContext();
  const parsed = parseSource(source, { ...options, diagnostics: ctx });
  if (!parsed.ok) {
    ctx.logger.error("Parsing failed; no code generated");
    return { ...parsed, verification: [] };
  }

  const generator = new CodeGenerator(ctx, { moduleName: options.moduleName });
  const module = generator.generate(parsed.statements);
  if (generator.hadError()) {
    ctx.logger.error(`Code generation failed with ${generator.errorCount()} error(s)`);
    return { ...parsed, ok: false, generator, module, diagnostics: ctx.diagnostics(), verification: [] };
  }

  const verification = verifyModule(module);
  for (const problem of verification) ctx.logger.warning(`IR check: ${problem}`);

  return {
    ...parsed,
    ok: true,
    generator,
    module,
    ir: generator.print(),
    diagnostics: ctx.diagnostics(),
    verification,
  };
}

// =========================================================================
// Whole build
// =========================================================================

export async function buildExecutable(source: string, options: BuildOptions): Promise<BuildResult> {
  const ctx = options.diagnostics ?? new DiagnosticsContext();
  const compiled = compileSource(source, { ...options, diagnostics: ctx });
  if (!compiled.ok || !compiled.generator) {
    return { ok: false, artifacts: [], diagnostics: ctx.diagnostics() };
  }

  const irPath = irPathFor(options.output);
  if (!compiled.generator.writeToFile(irPath)) {
    ctx.logger.error(`Could not write ${irPath}`);
    return { ok: false, artifacts: [], diagnostics: ctx.diagnostics() };
  }
  ctx.logger.debug(`Wrote ${irPath}`);

  if (options.emitIr) {
    return { ok: true, artifacts: [irPath], diagnostics: ctx.diagnostics() };
  }

  const built = await options.backend.build(irPath, options.output);
  options.backend.cleanup(options.output);

  if (!built.ok) return { ok: false, artifacts: [], diagnostics: ctx.diagnostics() };
  ctx.logger.info(`Built ${built.path}`);
  return { ok: true, artifacts: [built.path], diagnostics: ctx.diagnostics() };
}
