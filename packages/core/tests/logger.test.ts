/**
 * Tests for scoped logging
 */

import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { config, createLogger, currentLogLevel } from "@tokenloom/core";

describe("createLogger", () => {
  beforeEach(() => {
    vi.stubEnv("TOKENLOOM_LOG_LEVEL", "warn");
    vi.stubEnv("TOKENLOOM_DEBUG", "0");
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should prefix messages with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("engine").warn("no active rules");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[tokenloom:engine] no active rules");
  });

  it("should drop messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const log = createLogger("rules");

    log.debug("hidden");
    log.info("hidden");

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it("should not build lazy messages for disabled levels", () => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    const message = vi.fn(() => "expensive");

    createLogger("rules").debug(message);

    expect(message).not.toHaveBeenCalled();
  });

  it("should build lazy messages for enabled levels", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("grammar").error(() => "built");

    expect(error).toHaveBeenCalledWith("[tokenloom:grammar] built");
  });

  it("should follow the configured log level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ logLevel: "debug" });

    createLogger("engine").debug("visible");

    expect(debug).toHaveBeenCalledWith("[tokenloom:engine] visible");
  });

  it("should write nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    config.set({ logLevel: "silent" });

    createLogger("engine").error("dropped");

    expect(error).not.toHaveBeenCalled();
  });

  it("should report enabled levels", () => {
    config.set({ logLevel: "info" });
    const log = createLogger("engine");

    expect(log.scope).toBe("engine");
    expect(log.isEnabled("debug")).toBe(false);
    expect(log.isEnabled("info")).toBe(true);
    expect(log.isEnabled("error")).toBe(true);
  });
});

describe("currentLogLevel", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should be debug whenever debug mode is on", () => {
    vi.stubEnv("TOKENLOOM_LOG_LEVEL", "error");
    vi.stubEnv("TOKENLOOM_DEBUG", "true");
    config.reset();

    expect(currentLogLevel()).toBe("debug");
  });

  it("should fall back to warn for an unknown level", () => {
    vi.stubEnv("TOKENLOOM_LOG_LEVEL", "loud");
    vi.stubEnv("TOKENLOOM_DEBUG", "0");
    config.reset();

    expect(currentLogLevel()).toBe("warn");
  });
});
