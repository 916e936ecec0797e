// bin/bramblec-cli-lib.ts
// Shared CLI utilities for the bramblec command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

import type { PartialCompilerConfig } from "../src/core/config/config";
import { formatToken, type Token } from "../src/core/lexer/token";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "help" | "version" | "check" | "lexer" | "ast" | "serve" | "build";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  checkUtils?: boolean;
  lexer?: boolean;
  ast?: boolean;
  output?: string;
  emitIr?: boolean;
  serve?: boolean;
  port?: number;
  config?: string;
  verbose?: boolean;
  file?: string;
  /** Problems found while parsing the arguments */
  errors: string[];
};

export type CliConfig = {
  mode: CliMode;
  file?: string;
  configFile?: string;
  emitIr: boolean;
  verbose: boolean;
  /** Highest-priority config layer */
  overrides: PartialCompilerConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function parsePort(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const port = parseInt(value, 10);
  return port <= 65535 ? port : undefined;
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--check-utils" || arg === "-c") {
      result.checkUtils = true;
    } else if (arg === "--lexer" || arg === "-l") {
      result.lexer = true;
    } else if (arg === "--parser" || arg === "-p" || arg === "--ast" || arg === "-a") {
      result.ast = true;
    } else if (arg === "--emit-llvm") {
      result.emitIr = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--output" || arg === "-o") {
      const value = args[i + 1];
      if (value === undefined) {
        result.errors.push(`${arg} requires a file name`);
      } else {
        result.output = value;
        i++;
      }
    } else if (arg === "--config") {
      const value = args[i + 1];
      if (value === undefined) {
        result.errors.push("--config requires a file name");
      } else {
        result.config = value;
        i++;
      }
    } else if (arg === "--serve") {
      result.serve = true;
      // Optional port
      const value = args[i + 1];
      if (value !== undefined && /^\d+$/.test(value)) {
        const port = parsePort(value);
        if (port === undefined) result.errors.push(`Invalid port: ${value}`);
        else result.port = port;
        i++;
      }
    } else if (arg.startsWith("-") && arg !== "-") {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (result.file === undefined) {
      // First non-flag argument is the file
      result.file = arg;
    } else {
      result.errors.push(`Unexpected argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
bramblec - Bramble compiler

USAGE:
  bramblec [options] [file]           Compile a file (stdin when omitted)

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -c, --check-utils                  Check that the backend tools are installed
  -l, --lexer                        Print the token stream
  -p, --parser, -a, --ast            Print the syntax tree
  -o, --output <file>                Output base name (default: a)
  --emit-llvm                        Write <output>.ll and stop
  --serve [port]                     Start the explorer server (default port: 3457)
  --config <file>                    Read settings from a JSON config file
  --verbose                          Debug logging and tool output

ENVIRONMENT:
  BRAMBLE_LOG_LEVEL                  NOTE, DEBUG, INFO, WARNING, ERROR or CRITICAL
  BRAMBLE_OPT, BRAMBLE_CC            Optimizer and native compiler
  BRAMBLE_OPT_LEVEL                  O0 to O3
  BRAMBLE_OUTPUT, BRAMBLE_PORT       Output base name and server port
  NO_COLOR                           Disable colored log lines

EXAMPLES:
  bramblec hello.bm                  # Build ./a
  bramblec -o hello hello.bm         # Build ./hello
  bramblec --emit-llvm hello.bm      # Write a.ll only
  bramblec -l < hello.bm             # Tokens from stdin
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `bramblec v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "bramblec v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.help) return "help";
  if (args.version) return "version";
  if (args.checkUtils) return "check";
  if (args.serve) return "serve";
  if (args.lexer) return "lexer";
  if (args.ast) return "ast";
  return "build";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const overrides: PartialCompilerConfig = {};

  if (args.output !== undefined) overrides.output = args.output;
  if (args.port !== undefined) overrides.server = { port: args.port };
  if (args.verbose) {
    overrides.logging = { level: "DEBUG" };
    overrides.backend = { quiet: false };
  }

  const config: CliConfig = {
    mode: detectMode(args),
    emitIr: args.emitIr ?? false,
    verbose: args.verbose ?? false,
    overrides,
  };

  if (args.file !== undefined) config.file = args.file;
  if (args.config !== undefined) config.configFile = args.config;

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOKEN DUMP
// ═══════════════════════════════════════════════════════════════════════════════

/** One line per token; a note follows when the limit cut the stream short. */
export function formatTokenDump(tokens: Token[], limit: number): string {
  const lines = tokens.map(formatToken);
  const last = tokens[tokens.length - 1];
  if (last !== undefined && last.kind !== "END_OF_FILE") {
    lines.push(`... stopped after ${limit} tokens`);
  }
  return lines.join("\n");
}
