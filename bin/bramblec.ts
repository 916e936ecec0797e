#!/usr/bin/env npx tsx
// bin/bramblec.ts
// Bramble compiler CLI
//
// Modes: token dump, AST dump, tool check, explorer server and the default
// build (IR -> optimizer -> native compiler).
//
// Run:  npx tsx bin/bramblec.ts [options] [file]

import * as fs from "fs";

import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  formatTokenDump,
  type CliConfig,
} from "./bramblec-cli-lib";
import { loadConfig, validateConfig, type CompilerConfig } from "../src/core/config/config";
import { DiagnosticsContext } from "../src/diagnostics/context";
import { Backend } from "../src/core/backend/backend";
import { buildExecutable, dumpAst, lexSource } from "../src/core/pipeline/compile";
import { startExplorerServer } from "../src/server";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  if (cliArgs.errors.length > 0) {
    for (const err of cliArgs.errors) console.error(`bramblec: ${err}`);
    console.error("Try 'bramblec --help' for usage.");
    return 1;
  }

  const cli = buildConfig(cliArgs);
  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });

  const ctx = new DiagnosticsContext({
    level: config.logging.level,
    color: config.logging.color && process.stderr.isTTY === true,
    traceCapacity: config.trace.capacity,
    traceLimit: config.trace.limit,
  });

  const validation = validateConfig(config);
  for (const warning of validation.warnings) ctx.logger.warning(warning);
  if (!validation.valid) {
    for (const error of validation.errors) ctx.logger.error(error);
    return 1;
  }

  switch (cli.mode) {
    case "check":
      return checkMode(config, ctx);
    case "serve":
      return serveMode(config, ctx);
    case "lexer":
      return lexerMode(cli, config, ctx);
    case "ast":
      return astMode(cli, ctx);
    default:
      return buildMode(cli, config, ctx);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════════════════════

function readSource(cli: CliConfig, ctx: DiagnosticsContext): string {
  if (cli.file === undefined || cli.file === "-") {
    ctx.logger.debug("Reading source from stdin");
    return fs.readFileSync(0, "utf8");
  }
  if (!fs.existsSync(cli.file)) {
    ctx.logger.critical(`Input file not found: ${cli.file}`);
  }
  ctx.logger.debug(`Reading ${cli.file}`);
  return fs.readFileSync(cli.file, "utf8");
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODES
// ═══════════════════════════════════════════════════════════════════════════════

async function checkMode(config: CompilerConfig, ctx: DiagnosticsContext): Promise<number> {
  const missing = await new Backend(config.backend, ctx).checkTools();
  if (missing.length > 0) return 1;
  ctx.logger.info("All backend tools found");
  return 0;
}

async function serveMode(config: CompilerConfig, ctx: DiagnosticsContext): Promise<number> {
  const server = await startExplorerServer(config.server.port, {
    tokenLimit: config.tokenLimit,
    logger: ctx.logger,
  });

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  ctx.logger.info("Shutting down...");
  await server.stop();
  return 0;
}

function lexerMode(cli: CliConfig, config: CompilerConfig, ctx: DiagnosticsContext): number {
  const tokens = lexSource(readSource(cli, ctx), config.tokenLimit);
  console.log(formatTokenDump(tokens, config.tokenLimit));
  return tokens.some((t) => t.kind === "ERROR") ? 1 : 0;
}

function astMode(cli: CliConfig, ctx: DiagnosticsContext): number {
  const result = dumpAst(readSource(cli, ctx), { file: cli.file, diagnostics: ctx });
  if (!result.ok) {
    ctx.logger.error(`Parsing failed with ${ctx.errorCount()} error(s)`);
    return 1;
  }
  console.log(result.text);
  return 0;
}

async function buildMode(cli: CliConfig, config: CompilerConfig, ctx: DiagnosticsContext): Promise<number> {
  const source = readSource(cli, ctx);
  const result = await buildExecutable(source, {
    file: cli.file,
    diagnostics: ctx,
    output: config.output,
    emitIr: cli.emitIr,
    backend: new Backend(config.backend, ctx),
  });
  return result.ok ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error(`bramblec: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
);
