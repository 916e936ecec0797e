// src/core/config/index.ts
// Configuration system exports

export {
  type LoggingConfig,
  type TraceConfig,
  type ServerConfig,
  type CompilerConfig,
  type PartialCompilerConfig,
  type ConfigValidation,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  isValidOutputName,
  validateConfig,
} from "./config";
