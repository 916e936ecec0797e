// test/config/config.spec.ts
// Layered configuration: defaults, environment, JSON file, overrides

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  isValidOutputName,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/core/config";

describe("configFromEnv", () => {
  it("reads only the variables that are set", () => {
    expect(configFromEnv("BRAMBLE", {})).toEqual({});
    expect(
      configFromEnv("BRAMBLE", {
        BRAMBLE_LOG_LEVEL: "debug",
        BRAMBLE_OPT: "opt-17",
        BRAMBLE_OPT_LEVEL: "o1",
        BRAMBLE_PORT: "4000",
        BRAMBLE_OUTPUT: "build/prog",
        NO_COLOR: "1",
      })
    ).toEqual({
      logging: { level: "DEBUG", color: false },
      backend: { optimizer: "opt-17", optLevel: "O1" },
      output: "build/prog",
      server: { port: 4000 },
    });
  });

  it("ignores values that do not parse", () => {
    expect(configFromEnv("BRAMBLE", { BRAMBLE_LOG_LEVEL: "loud", BRAMBLE_PORT: "abc" })).toEqual({});
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys and skips wrong types", () => {
    expect(
      configFromObject({
        logging: { level: "warning", color: "yes" },
        backend: { compiler: "clang", opt_level: "O2", timeout_ms: 5000 },
        token_limit: 50,
        server: { port: "80" },
      })
    ).toEqual({
      logging: { level: "WARNING" },
      backend: { compiler: "clang", optLevel: "O2", timeoutMs: 5000 },
      tokenLimit: 50,
    });
  });
});

describe("mergeConfigs", () => {
  it("lets later layers override earlier ones field by field", () => {
    const merged = mergeConfigs(
      { logging: { level: "ERROR" }, backend: { compiler: "clang" } },
      { logging: { color: false }, output: "x" }
    );
    expect(merged.logging).toEqual({ level: "ERROR", color: false });
    expect(merged.backend.compiler).toBe("clang");
    expect(merged.backend.optimizer).toBe("opt");
    expect(merged.output).toBe("x");
    expect(DEFAULT_CONFIG.logging.level).toBe("INFO");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bramble-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("layers environment, the config file in cwd, then overrides", () => {
    fs.writeFileSync(
      path.join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ output: "from-file", logging: { level: "ERROR" }, tokenLimit: 20 })
    );
    const config = loadConfig({
      cwd: dir,
      env: { BRAMBLE_OUTPUT: "from-env", BRAMBLE_CC: "gcc" },
      overrides: { tokenLimit: 7 },
    });
    expect(config.output).toBe("from-file");
    expect(config.logging.level).toBe("ERROR");
    expect(config.backend.compiler).toBe("gcc");
    expect(config.tokenLimit).toBe(7);
  });

  it("uses defaults when nothing is configured", () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("reports a missing or non-JSON config file", () => {
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");
    const yaml = path.join(dir, "c.yaml");
    fs.writeFileSync(yaml, "output: a\n");
    expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");
    const list = path.join(dir, "list.json");
    fs.writeFileSync(list, "[1, 2]");
    expect(() => configFromFile(list)).toThrow("Config file must contain a JSON object");
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("flags bad output names, limits and ports", () => {
    const result = validateConfig(
      mergeConfigs({ output: "out/a*b", tokenLimit: 0, server: { port: 70000 }, trace: { capacity: 5, limit: 10 } })
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Invalid output name: out/a*b",
      "tokenLimit must be a positive integer",
      "Invalid server port: 70000",
    ]);
    expect(result.warnings).toEqual([
      "trace.limit exceeds trace.capacity; tracebacks are capped at the capacity",
    ]);
  });

  it("checks only the file-name part of the output", () => {
    expect(isValidOutputName("build/prog")).toBe(true);
    expect(isValidOutputName("build/")).toBe(true);
    expect(isValidOutputName("..")).toBe(false);
    expect(isValidOutputName("a:b")).toBe(false);
  });
});
