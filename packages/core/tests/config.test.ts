/**
 * Tests for the configuration system
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { config, defineConfig } from "@tokenloom/core";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("should provide the default log level and engine settings", () => {
      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "warn");
      config.reset();

      expect(config.get("logLevel")).toBe("warn");
      expect(config.get("engine.trace")).toBe(false);
    });

    it("should return undefined for unknown paths", () => {
      expect(config.get("engine.nothing")).toBeUndefined();
      expect(config.get("nothing.at.all")).toBeUndefined();
    });
  });

  describe("environment variables", () => {
    it("should map single underscores to camelCase", () => {
      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "info");
      config.reset();

      expect(config.get("logLevel")).toBe("info");
    });

    it("should map double underscores to nesting", () => {
      vi.stubEnv("TOKENLOOM_ENGINE__TRACE", "true");
      config.reset();

      expect(config.get("engine.trace")).toBe(true);
    });

    it("should parse booleans and integers", () => {
      vi.stubEnv("TOKENLOOM_DEBUG", "1");
      vi.stubEnv("TOKENLOOM_MAX_DEPTH", "12");
      vi.stubEnv("TOKENLOOM_ENGINE__TRACE", "0");
      config.reset();

      expect(config.get("debug")).toBe(true);
      expect(config.get("maxDepth")).toBe(12);
      expect(config.get("engine.trace")).toBe(false);
    });

    it("should only be read again after reset", () => {
      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "info");
      config.reset();
      expect(config.get("logLevel")).toBe("info");

      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "error");
      expect(config.get("logLevel")).toBe("info");

      config.reset();
      expect(config.get("logLevel")).toBe("error");
    });
  });

  describe("programmatic configuration", () => {
    it("should take precedence over environment variables", () => {
      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "info");
      config.reset();

      config.set({ logLevel: "error" });
      expect(config.get("logLevel")).toBe("error");
    });

    it("should deep merge nested values", () => {
      vi.stubEnv("TOKENLOOM_LOG_LEVEL", "info");
      config.reset();

      config.set({ engine: { trace: true } });
      expect(config.get("engine.trace")).toBe(true);
      expect(config.get("logLevel")).toBe("info");
      expect(config.getAll().engine).toEqual({ trace: true });
    });

    it("should accept custom keys", () => {
      config.set({ custom: { depth: 3 } });
      expect(config.get<number>("custom.depth")).toBe(3);
    });
  });

  describe("has", () => {
    it("should report truthy values only", () => {
      config.set({ debug: false, engine: { trace: true } });

      expect(config.has("engine.trace")).toBe(true);
      expect(config.has("debug")).toBe(false);
      expect(config.has("missing")).toBe(false);
    });
  });

  describe("config files", () => {
    const originalCwd = process.cwd();
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "tokenloom-config-"));
      process.chdir(dir);
      config.reset();
    });

    afterEach(() => {
      process.chdir(originalCwd);
      fs.rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it("should fall back to defaults when no config file exists", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(config.get("engine.trace")).toBe(false);
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(warn).not.toHaveBeenCalled();
    });

    it("should load an rc file from the working directory", () => {
      fs.writeFileSync(path.join(dir, ".tokenloomrc.json"), JSON.stringify({ engine: { trace: true } }));
      config.reset();

      expect(config.get("engine.trace")).toBe(true);
      expect(config.get("debug")).toBe(false);
      expect(path.basename(config.getConfigFilePath() ?? "")).toBe(".tokenloomrc.json");
    });

    it("should warn about an unreadable config file and keep the defaults", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      fs.writeFileSync(path.join(dir, ".tokenloomrc.json"), "{ not json");
      config.reset();

      expect(config.get("engine.trace")).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0][0])).toMatch(/^\[tokenloom:config\] ignoring unreadable config file: /);
    });
  });

  describe("defineConfig", () => {
    it("should return its argument", () => {
      const cfg = { logLevel: "debug" as const, engine: { trace: true } };
      expect(defineConfig(cfg)).toBe(cfg);
    });
  });
});
