import { describe, it, expect, vi } from "vitest";
import { ConstructionError, PreconditionError } from "@tokenloom/core";
import { TokenRuleContext } from "../context.js";
import { WORD_DEFINITION } from "../definition.js";
import { simpleToken, tokenValues } from "../tokens.js";
import { pattern, value } from "../rules/index.js";

const words = (...values: string[]) => values.map((v) => simpleToken(WORD_DEFINITION, v));

describe("TokenRuleContext", () => {
  describe("rule bindings", () => {
    it("assigns ids in definition order", () => {
      const context = new TokenRuleContext();
      const a = value("a");
      const digits = pattern("\\d+");

      expect(context.defineRule("a", a)).toBe(0);
      expect(context.defineRule("digits", digits)).toBe(1);

      expect(context.ruleId("digits")).toBe(1);
      expect(context.ruleAt(1)).toBe(digits);
      expect(context.resolveRule("a")).toBe(a);
      expect(context.hasRule("a")).toBe(true);
      expect(context.ruleNames()).toEqual(["a", "digits"]);
    });

    it("returns undefined for unknown names", () => {
      const context = new TokenRuleContext();
      expect(context.resolveRule("missing")).toBeUndefined();
      expect(context.ruleId("missing")).toBeUndefined();
      expect(context.hasRule("missing")).toBe(false);
    });

    it("rejects unknown ids", () => {
      expect(() => new TokenRuleContext().ruleAt(0)).toThrow(PreconditionError);
    });

    it("rejects empty and duplicate names", () => {
      const context = new TokenRuleContext();
      context.defineRule("a", value("a"));

      expect(() => context.defineRule("a", value("b"))).toThrow(ConstructionError);
      expect(() => context.defineRule("", value("b"))).toThrow(ConstructionError);
      expect(() => context.defineDynamic("a", () => undefined)).toThrow(ConstructionError);
    });

    it("rejects definitions after seal", () => {
      const context = new TokenRuleContext().seal();
      expect(context.sealed).toBe(true);
      expect(() => context.defineRule("a", value("a"))).toThrow(ConstructionError);
      expect(() => context.defineDynamic("b", () => undefined)).toThrow(ConstructionError);
    });
  });

  describe("dynamic bindings", () => {
    it("calls the resolver on every lookup", () => {
      const context = new TokenRuleContext();
      const resolver = vi.fn(() => words("let"));
      context.defineDynamic("keyword", resolver);

      context.resolveDynamic("keyword");
      const resolved = context.resolveDynamic("keyword");

      expect(resolver).toHaveBeenCalledTimes(2);
      expect(resolver).toHaveBeenCalledWith(context);
      expect(Array.isArray(resolved)).toBe(true);
      expect(context.hasDynamic("keyword")).toBe(true);
      expect(context.resolveDynamic("missing")).toBeUndefined();
    });
  });

  describe("captures", () => {
    it("overwrites earlier captures", () => {
      const context = new TokenRuleContext();
      context.captureTokens("q", words("'"));
      context.captureTokens("q", words("\""));

      expect(tokenValues(context.capturedTokens("q") ?? [])).toEqual(["\""]);
      expect(context.hasCapture("q")).toBe(true);

      context.clearCaptures();
      expect(context.capturedTokens("q")).toBeUndefined();
    });
  });

  describe("fork", () => {
    it("shares bindings with a fresh capture scope", () => {
      const context = new TokenRuleContext();
      const a = value("a");
      context.defineRule("a", a);
      context.captureTokens("q", words("x"));

      const fork = context.fork();

      expect(fork.resolveRule("a")).toBe(a);
      expect(fork.capturedTokens("q")).toBeUndefined();

      fork.captureTokens("r", words("y"));
      expect(context.capturedTokens("r")).toBeUndefined();
    });

    it("sees bindings sealed on the original", () => {
      const context = new TokenRuleContext();
      const fork = context.fork();
      context.defineRule("late", value("late"));
      context.seal();

      expect(fork.hasRule("late")).toBe(true);
      expect(fork.sealed).toBe(true);
    });
  });
});
