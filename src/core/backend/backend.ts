// src/core/backend/backend.ts
// External backend: IR file -> optimized IR -> native binary
//
// Each stage is a child process awaited to completion. A stage only counts
// as successful when the process exits cleanly and its output file exists
// and is non-empty.

import * as fs from "fs";

import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import type { DiagnosticsContext } from "../../diagnostics/context";
import { runCommand, type CommandResult, type CommandRunner } from "./commandRunner";

export type OptLevel = "O0" | "O1" | "O2" | "O3";

export type BackendConfig = {
  /** Optimizer executable, `opt` by default. */
  optimizer: string;
  /** Native compiler executable, `clang++` by default. */
  compiler: string;
  optLevel: OptLevel;
  /** Discard tool output unless a stage fails. */
  quiet: boolean;
  timeoutMs?: number;
};

export const DEFAULT_BACKEND_CONFIG: BackendConfig = {
  optimizer: "opt",
  compiler: "clang++",
  optLevel: "O3",
  quiet: true,
};

export type BackendResult =
  | { ok: true; path: string }
  | { ok: false; failure: Diagnostic };

// ─────────────────────────────────────────────────────────────
// Artifact names
// ─────────────────────────────────────────────────────────────

export function irPathFor(base: string): string {
  return `${base}.ll`;
}

export function optimizedPathFor(irPath: string): string {
  const stem = irPath.endsWith(".ll") ? irPath.slice(0, -3) : irPath;
  return `${stem}-opt.ll`;
}

export function binaryPathFor(optimizedPath: string): string {
  if (optimizedPath.endsWith("-opt.ll")) return optimizedPath.slice(0, -7);
  if (optimizedPath.endsWith(".ll")) return optimizedPath.slice(0, -3);
  return `${optimizedPath}.out`;
}

function isNonEmptyFile(filePath: string): boolean {
  try {
    const stat = fs.statSync(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

// ─────────────────────────────────────────────────────────────
// Backend
// ─────────────────────────────────────────────────────────────

export class Backend {
  constructor(
    private readonly config: BackendConfig,
    private readonly diagnostics: DiagnosticsContext,
    private readonly runner: CommandRunner = runCommand
  ) {}

  async optimize(irPath: string): Promise<BackendResult> {
    const output = optimizedPathFor(irPath);
    const argv = [this.config.optimizer, irPath, `-${this.config.optLevel}`, "-S", "-o", output];
    return this.runStage(argv, output, "E0200", irPath);
  }

  async compile(optimizedPath: string, binaryPath = binaryPathFor(optimizedPath)): Promise<BackendResult> {
    const argv = [this.config.compiler, `-${this.config.optLevel}`, optimizedPath, "-o", binaryPath];
    return this.runStage(argv, binaryPath, "E0201", optimizedPath);
  }

  /** optimize() then compile(); stops at the first failing stage. */
  async build(irPath: string, binaryPath?: string): Promise<BackendResult> {
    const optimized = await this.optimize(irPath);
    if (!optimized.ok) return optimized;
    return this.compile(optimized.path, binaryPath);
  }

  /** Names of the configured tools that could not be started. */
  async checkTools(): Promise<string[]> {
    const missing: string[] = [];
    for (const tool of [this.config.optimizer, this.config.compiler]) {
      const res = await this.runner([tool, "--version"], { timeoutMs: this.config.timeoutMs });
      if (res.ok) {
        this.diagnostics.logger.debug(`Found ${tool}`);
      } else {
        missing.push(tool);
        this.diagnostics.report(makeDiagnostic("E0203", { tool }));
      }
    }
    return missing;
  }

  /** Removes `<base>.ll` and `<base>-opt.ll`; returns the paths removed. */
  cleanup(base: string): string[] {
    const removed: string[] = [];
    const irPath = irPathFor(base);
    for (const file of [irPath, optimizedPathFor(irPath)]) {
      if (!fs.existsSync(file)) continue;
      try {
        fs.rmSync(file);
        removed.push(file);
        this.diagnostics.logger.debug(`Removed ${file}`);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        this.diagnostics.logger.warning(`Could not remove ${file}: ${msg}`);
      }
    }
    return removed;
  }

  // ─────────────────────────────────────────────────────────────

  private async runStage(
    argv: string[],
    output: string,
    failCode: DiagnosticCode,
    input: string
  ): Promise<BackendResult> {
    const logger = this.diagnostics.logger;
    logger.debug(`Running: ${argv.join(" ")}`);

    const res = await this.runner(argv, { timeoutMs: this.config.timeoutMs });
    if (!this.config.quiet) this.logOutput(res);

    if (!res.ok) {
      if (this.config.quiet) {
        logger.info(`${argv[0]} failed, re-running with output shown`);
        this.logOutput(await this.runner(argv, { timeoutMs: this.config.timeoutMs }));
      }
      return this.fail(failCode, { path: input });
    }

    if (!isNonEmptyFile(output)) return this.fail("E0202", { path: output });

    logger.debug(`Wrote ${output}`);
    return { ok: true, path: output };
  }

  private logOutput(res: CommandResult): void {
    const logger = this.diagnostics.logger;
    const level = res.ok ? "INFO" : "ERROR";
    for (const line of `${res.stdout}${res.stderr}`.split("\n")) {
      if (line.trim() !== "") logger.log(level, line);
    }
  }

  private fail(code: DiagnosticCode, params: Record<string, string>): BackendResult {
    const failure = makeDiagnostic(code, params);
    this.diagnostics.report(failure);
    return { ok: false, failure };
  }
}
