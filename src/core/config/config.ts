// src/core/config/config.ts
// Configuration system for the bramblec compiler

import * as fs from "fs";
import * as path from "path";

import { isLogLevel, type LogLevel } from "../../diagnostics/logger";
import { DEFAULT_TRACE_CAPACITY, DEFAULT_TRACEBACK_LIMIT } from "../../diagnostics/trace";
import { DEFAULT_BACKEND_CONFIG, type BackendConfig, type OptLevel } from "../backend/backend";

// =========================================================================
// Configuration Types
// =========================================================================

export type LoggingConfig = {
  /** Lowest level that is printed */
  level: LogLevel;
  /** ANSI colors on log lines */
  color: boolean;
};

export type TraceConfig = {
  /** Expressions kept in the ring buffer */
  capacity: number;
  /** Expressions shown in a traceback */
  limit: number;
};

export type ServerConfig = {
  port: number;
};

export type CompilerConfig = {
  logging: LoggingConfig;
  trace: TraceConfig;
  backend: BackendConfig;
  /** Output base name; artifacts are `<output>.ll`, `<output>-opt.ll` and `<output>` */
  output: string;
  /** Maximum number of tokens printed by the token dump */
  tokenLimit: number;
  server: ServerConfig;
};

export type PartialCompilerConfig = {
  logging?: Partial<LoggingConfig>;
  trace?: Partial<TraceConfig>;
  backend?: Partial<BackendConfig>;
  output?: string;
  tokenLimit?: number;
  server?: Partial<ServerConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: "INFO",
  color: true,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  capacity: DEFAULT_TRACE_CAPACITY,
  limit: DEFAULT_TRACEBACK_LIMIT,
};

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3457,
};

export const DEFAULT_CONFIG: CompilerConfig = {
  logging: DEFAULT_LOGGING_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
  backend: DEFAULT_BACKEND_CONFIG,
  output: "a",
  tokenLimit: 500,
  server: DEFAULT_SERVER_CONFIG,
};

export const CONFIG_FILE_NAME = "bramble.config.json";

const OPT_LEVELS: readonly OptLevel[] = ["O0", "O1", "O2", "O3"];

function isOptLevel(value: string): value is OptLevel {
  return OPT_LEVELS.some((l) => l === value);
}

// =========================================================================
// Configuration Loading
// =========================================================================

function parseIntOr(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables. Only variables that are set
 * (and parse) appear in the result.
 */
export function configFromEnv(prefix = "BRAMBLE", env: NodeJS.ProcessEnv = process.env): PartialCompilerConfig {
  const config: PartialCompilerConfig = {};

  const logging: Partial<LoggingConfig> = {};
  const level = env[`${prefix}_LOG_LEVEL`]?.toUpperCase();
  if (level && isLogLevel(level)) logging.level = level;
  const color = env[`${prefix}_COLOR`];
  if (color !== undefined) logging.color = color !== "0" && color !== "false";
  if (env.NO_COLOR !== undefined) logging.color = false;
  if (Object.keys(logging).length > 0) config.logging = logging;

  const backend: Partial<BackendConfig> = {};
  const optimizer = env[`${prefix}_OPT`];
  if (optimizer) backend.optimizer = optimizer;
  const compiler = env[`${prefix}_CC`];
  if (compiler) backend.compiler = compiler;
  const optLevel = env[`${prefix}_OPT_LEVEL`]?.toUpperCase();
  if (optLevel && isOptLevel(optLevel)) backend.optLevel = optLevel;
  if (Object.keys(backend).length > 0) config.backend = backend;

  const output = env[`${prefix}_OUTPUT`];
  if (output) config.output = output;

  const port = parseIntOr(env[`${prefix}_PORT`]);
  if (port !== undefined) config.server = { port };

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialCompilerConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

/** First key holding a value of the wanted type; camelCase and snake_case both work. */
function read<T>(obj: Record<string, unknown>, guard: (v: unknown) => v is T, ...keys: string[]): T | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (guard(value)) return value;
  }
  return undefined;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

/**
 * Create configuration from a plain object (e.g., parsed JSON). Values of
 * the wrong type are skipped.
 */
export function configFromObject(data: Record<string, unknown>): PartialCompilerConfig {
  const config: PartialCompilerConfig = {};

  const loggingData = section(data, "logging");
  const logging: Partial<LoggingConfig> = {};
  const level = read(loggingData, isString, "level")?.toUpperCase();
  if (level && isLogLevel(level)) logging.level = level;
  const color = read(loggingData, isBoolean, "color");
  if (color !== undefined) logging.color = color;
  if (Object.keys(logging).length > 0) config.logging = logging;

  const traceData = section(data, "trace");
  const trace: Partial<TraceConfig> = {};
  const capacity = read(traceData, isNumber, "capacity");
  if (capacity !== undefined) trace.capacity = capacity;
  const limit = read(traceData, isNumber, "limit");
  if (limit !== undefined) trace.limit = limit;
  if (Object.keys(trace).length > 0) config.trace = trace;

  const backendData = section(data, "backend");
  const backend: Partial<BackendConfig> = {};
  const optimizer = read(backendData, isString, "optimizer");
  if (optimizer !== undefined) backend.optimizer = optimizer;
  const compiler = read(backendData, isString, "compiler");
  if (compiler !== undefined) backend.compiler = compiler;
  const optLevel = read(backendData, isString, "optLevel", "opt_level")?.toUpperCase();
  if (optLevel && isOptLevel(optLevel)) backend.optLevel = optLevel;
  const quiet = read(backendData, isBoolean, "quiet");
  if (quiet !== undefined) backend.quiet = quiet;
  const timeoutMs = read(backendData, isNumber, "timeoutMs", "timeout_ms");
  if (timeoutMs !== undefined) backend.timeoutMs = timeoutMs;
  if (Object.keys(backend).length > 0) config.backend = backend;

  const output = read(data, isString, "output");
  if (output !== undefined) config.output = output;
  const tokenLimit = read(data, isNumber, "tokenLimit", "token_limit");
  if (tokenLimit !== undefined) config.tokenLimit = tokenLimit;

  const port = read(section(data, "server"), isNumber, "port");
  if (port !== undefined) config.server = { port };

  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialCompilerConfig[]): CompilerConfig {
  const result: CompilerConfig = {
    ...DEFAULT_CONFIG,
    logging: { ...DEFAULT_CONFIG.logging },
    trace: { ...DEFAULT_CONFIG.trace },
    backend: { ...DEFAULT_CONFIG.backend },
    server: { ...DEFAULT_CONFIG.server },
  };

  for (const cfg of configs) {
    if (cfg.logging) result.logging = { ...result.logging, ...cfg.logging };
    if (cfg.trace) result.trace = { ...result.trace, ...cfg.trace };
    if (cfg.backend) result.backend = { ...result.backend, ...cfg.backend };
    if (cfg.server) result.server = { ...result.server, ...cfg.server };
    if (cfg.output !== undefined) result.output = cfg.output;
    if (cfg.tokenLimit !== undefined) result.tokenLimit = cfg.tokenLimit;
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialCompilerConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CompilerConfig {
  const layers: PartialCompilerConfig[] = [configFromEnv("BRAMBLE", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const defaultPath = path.join(options?.cwd ?? process.cwd(), CONFIG_FILE_NAME);
    if (fs.existsSync(defaultPath)) layers.push(configFromFile(defaultPath));
  }

  if (options?.overrides) layers.push(options.overrides);

  return mergeConfigs(...layers);
}

// =========================================================================
// Validation
// =========================================================================

const FORBIDDEN_OUTPUT_CHARS = /[\\:*?"<>|]/;

/** The file-name part of an output base must be non-empty and portable. */
export function isValidOutputName(output: string): boolean {
  const name = path.basename(output);
  return name !== "" && name !== "." && name !== ".." && !FORBIDDEN_OUTPUT_CHARS.test(name);
}

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CompilerConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidOutputName(config.output)) {
    errors.push(`Invalid output name: ${config.output}`);
  }
  if (config.backend.optimizer.trim() === "") errors.push("backend.optimizer must not be empty");
  if (config.backend.compiler.trim() === "") errors.push("backend.compiler must not be empty");

  if (!Number.isInteger(config.tokenLimit) || config.tokenLimit < 1) {
    errors.push("tokenLimit must be a positive integer");
  }
  if (!Number.isInteger(config.trace.capacity) || config.trace.capacity < 1) {
    errors.push("trace.capacity must be a positive integer");
  }
  if (config.trace.limit > config.trace.capacity) {
    warnings.push("trace.limit exceeds trace.capacity; tracebacks are capped at the capacity");
  }
  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`Invalid server port: ${config.server.port}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
