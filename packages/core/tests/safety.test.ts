/**
 * Tests for contract errors and runtime safety primitives
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  config,
  ContractError,
  ConstructionError,
  PreconditionError,
  InvariantError,
  requires,
  ensures,
  invariant,
  unreachable,
  debugOnly,
} from "@tokenloom/core";

describe("contract errors", () => {
  it("should carry their name and contract type", () => {
    const construction = new ConstructionError("bad bounds");
    const precondition = new PreconditionError("bad index");
    const broken = new InvariantError("broken");

    expect(construction).toBeInstanceOf(ContractError);
    expect(construction.name).toBe("ConstructionError");
    expect(construction.contractType).toBe("construction");
    expect(precondition.name).toBe("PreconditionError");
    expect(precondition.contractType).toBe("precondition");
    expect(broken.contractType).toBe("invariant");
    expect(broken.message).toBe("broken");
  });
});

describe("requires / ensures / invariant", () => {
  it("should do nothing when the condition holds", () => {
    expect(() => requires(true, "unused")).not.toThrow();
    expect(() => ensures(true, "unused")).not.toThrow();
    expect(() => invariant(true)).not.toThrow();
  });

  it("should throw the matching error class", () => {
    expect(() => requires(false, "index out of range")).toThrow(PreconditionError);
    expect(() => requires(false, "index out of range")).toThrow("index out of range");
    expect(() => ensures(false, "max < min")).toThrow(ConstructionError);
    expect(() => invariant(false)).toThrow(InvariantError);
    expect(() => invariant(false)).toThrow("Invariant violation");
  });

  it("should throw from unreachable", () => {
    expect(() => unreachable()).toThrow("Unreachable code reached");
  });
});

describe("debugOnly", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should run only in debug mode", () => {
    vi.stubEnv("TOKENLOOM_DEBUG", "0");
    config.reset();
    const fn = vi.fn();

    debugOnly(fn);
    expect(fn).not.toHaveBeenCalled();

    config.set({ debug: true });
    debugOnly(fn);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
