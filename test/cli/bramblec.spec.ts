// test/cli/bramblec.spec.ts
// Argument parsing and config building for the bramblec command

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  formatTokenDump,
} from "../../bin/bramblec-cli-lib";
import { makeToken } from "../../src/core/lexer/token";

describe("bramblec CLI", () => {
  describe("parseCliArgs", () => {
    it("reads flags and the input file", () => {
      expect(parseCliArgs(["-l", "--verbose", "main.bm"])).toEqual({
        errors: [],
        lexer: true,
        verbose: true,
        file: "main.bm",
      });
    });

    it("accepts every spelling of the AST flag", () => {
      for (const flag of ["-p", "--parser", "-a", "--ast"]) {
        expect(parseCliArgs([flag]).ast).toBe(true);
      }
    });

    it("reads option values", () => {
      const parsed = parseCliArgs(["-o", "hello", "--config", "b.json", "--emit-llvm", "x.bm"]);
      expect(parsed).toMatchObject({ output: "hello", config: "b.json", emitIr: true, file: "x.bm" });
      expect(parsed.errors).toEqual([]);
    });

    it("reports options missing their value", () => {
      expect(parseCliArgs(["--output"]).errors).toEqual(["--output requires a file name"]);
      expect(parseCliArgs(["--config"]).errors).toEqual(["--config requires a file name"]);
    });

    it("takes an optional port after --serve", () => {
      expect(parseCliArgs(["--serve", "8080"])).toEqual({ errors: [], serve: true, port: 8080 });
      expect(parseCliArgs(["--serve", "prog.bm"])).toEqual({ errors: [], serve: true, file: "prog.bm" });
      expect(parseCliArgs(["--serve", "70000"]).errors).toEqual(["Invalid port: 70000"]);
    });

    it("treats a lone dash as stdin", () => {
      expect(parseCliArgs(["-"]).file).toBe("-");
    });

    it("reports unknown options and extra files", () => {
      expect(parseCliArgs(["--fast", "a.bm", "b.bm"]).errors).toEqual([
        "Unknown option: --fast",
        "Unexpected argument: b.bm",
      ]);
    });
  });

  describe("detectMode", () => {
    it("ranks help and version above everything", () => {
      expect(detectMode({ help: true, version: true, lexer: true })).toBe("help");
      expect(detectMode({ version: true, serve: true })).toBe("version");
    });

    it("picks serve before the dump modes", () => {
      expect(detectMode({ serve: true, lexer: true })).toBe("serve");
      expect(detectMode({ lexer: true, ast: true })).toBe("lexer");
      expect(detectMode({ checkUtils: true, ast: true })).toBe("check");
    });

    it("builds by default", () => {
      expect(detectMode({})).toBe("build");
    });
  });

  describe("buildConfig", () => {
    it("turns flags into config overrides", () => {
      expect(buildConfig(parseCliArgs(["-o", "out", "--serve", "9000", "--verbose", "m.bm"]))).toEqual({
        mode: "serve",
        file: "m.bm",
        emitIr: false,
        verbose: true,
        overrides: {
          output: "out",
          server: { port: 9000 },
          logging: { level: "DEBUG" },
          backend: { quiet: false },
        },
      });
    });

    it("leaves overrides empty without flags", () => {
      expect(buildConfig({ config: "c.json", emitIr: true })).toEqual({
        mode: "build",
        configFile: "c.json",
        emitIr: true,
        verbose: false,
        overrides: {},
      });
    });
  });

  describe("help and version", () => {
    it("documents the options", () => {
      const help = getHelpText();
      expect(help.startsWith("bramblec - Bramble compiler")).toBe(true);
      expect(help).toContain("--emit-llvm");
      expect(help).toContain("BRAMBLE_LOG_LEVEL");
    });

    it("reports the package version", () => {
      expect(getVersion()).toBe("bramblec v0.1.0");
    });
  });

  describe("formatTokenDump", () => {
    it("prints one line per token", () => {
      const dump = formatTokenDump([makeToken("INT", "42", 1, 5), makeToken("END_OF_FILE", "", 1, 7)], 10);
      expect(dump.split("\n")).toEqual([
        `[  1:  5] ${"INT".padEnd(20)} '42'`,
        `[  1:  7] ${"END_OF_FILE".padEnd(20)} ''`,
      ]);
    });

    it("notes a stream cut at the limit", () => {
      const dump = formatTokenDump([makeToken("IDENTIFIER", "a", 1, 1)], 1);
      expect(dump.split("\n")[1]).toBe("... stopped after 1 tokens");
    });
  });
});
