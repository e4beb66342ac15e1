import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "@tokenloom/core";
import { grouping, identity, transform } from "../actions.js";
import { TokenRuleContext } from "../context.js";
import { WORD_DEFINITION, charDefinition } from "../definition.js";
import { TokenRuleEngine } from "../engine.js";
import { shadow, simpleToken, tokenValues, type Token } from "../tokens.js";
import { alwaysMatch, capture, lookahead, pattern, reference, sequence, value } from "../rules/index.js";

const words = (...values: string[]): Token[] => values.map((v) => simpleToken(WORD_DEFINITION, v));

const bar = simpleToken(charDefinition("|"), "|");

describe("TokenRuleEngine", () => {
  beforeEach(() => {
    vi.stubEnv("TOKENLOOM_LOG_LEVEL", "warn");
    vi.stubEnv("TOKENLOOM_DEBUG", "0");
    vi.stubEnv("TOKENLOOM_ENGINE__TRACE", "0");
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    config.reset();
  });

  it("returns a frozen copy of the input without rules", () => {
    const tokens = words("a", "b");
    const result = new TokenRuleEngine().process(tokens);

    expect(result).toEqual(tokens);
    expect(result).not.toBe(tokens);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("handles empty input", () => {
    expect(new TokenRuleEngine().addRule(alwaysMatch(), transform(() => [bar])).process([])).toEqual([]);
  });

  it("replaces each matched span with the action output", () => {
    const engine = new TokenRuleEngine().addRule(sequence(value("a"), value("b")), grouping());
    const result = engine.process(words("a", "b", "c", "a", "b"));

    expect(tokenValues(result)).toEqual(["ab", "c", "ab"]);
    expect(result.map((t) => t.kind)).toEqual(["group", "simple", "group"]);
  });

  it("uses the first rule that matches", () => {
    const engine = new TokenRuleEngine()
      .addRule(value("a"), transform(() => [bar]))
      .addRule(pattern("[a-z]"), grouping());
    const second = new TokenRuleEngine().addRule(value("b"), transform(() => []));

    expect(tokenValues(engine.process(words("a", "b")))).toEqual(["|", "b"]);
    expect(tokenValues(second.process(words("a", "b", "c")))).toEqual(["a", "c"]);
  });

  it("does not rescan action output", () => {
    const engine = new TokenRuleEngine().addRule(value("a"), transform((tokens) => [...tokens, ...tokens]));
    expect(tokenValues(engine.process(words("a", "b")))).toEqual(["a", "a", "b"]);
  });

  it("inserts output before the current token on a zero-width match", () => {
    const engine = new TokenRuleEngine().addRule(lookahead(value("a")), transform(() => [bar]));
    expect(tokenValues(engine.process(words("a", "b")))).toEqual(["|", "a", "b"]);
  });

  it("makes progress when a rule matches zero-width everywhere", () => {
    const engine = new TokenRuleEngine().addRule(alwaysMatch(), transform(() => [bar]));
    expect(tokenValues(engine.process(words("a", "b")))).toEqual(["|", "a", "|", "b"]);
  });

  it("copies shadow tokens through without matching them", () => {
    const [a, b, first, last] = words("a", "b", "first", "last");
    const hiddenFirst = shadow(first);
    const hiddenLast = shadow(last);
    const engine = new TokenRuleEngine().addRule(sequence(value("a"), value("b")), grouping());
    const result = engine.process([hiddenFirst, a, b, hiddenLast]);

    expect(result.map((t) => t.kind)).toEqual(["shadow", "group", "shadow"]);
    expect(result[0]).toBe(hiddenFirst);
    expect(result[2]).toBe(hiddenLast);
  });

  it("replaces shadow tokens inside a matched span with the rest of the span", () => {
    const [a, note, b] = words("a", "note", "b");
    const engine = new TokenRuleEngine().addRule(sequence(value("a"), value("b")), grouping());
    const result = engine.process([a, shadow(note), b]);

    expect(tokenValues(result)).toEqual(["ab"]);
  });

  it("inserts zero-width output after leading shadow tokens", () => {
    const [note, a] = words("note", "a");
    const hidden = shadow(note);
    const result = new TokenRuleEngine().addRule(alwaysMatch(), transform(() => [bar])).process([hidden, a]);

    expect(result).toEqual([hidden, bar, a]);
  });

  it("shares captures within one pass only", () => {
    const context = new TokenRuleContext();
    const fenced = sequence(capture("fence", pattern("=+")), value("x"), reference("fence", "tokens"));
    const engine = new TokenRuleEngine([], context).addRule(fenced, grouping());

    expect(tokenValues(engine.process(words("==", "x", "==", "y")))).toEqual(["==x==", "y"]);
    expect(tokenValues(engine.process(words("==", "x", "=")))).toEqual(["==", "x", "="]);
    expect(context.hasCapture("fence")).toBe(false);
  });

  it("exposes its bindings in order", () => {
    const a = value("a");
    const engine = new TokenRuleEngine().addRule(a);

    expect(engine.rules).toHaveLength(1);
    expect(engine.rules[0].rule).toBe(a);
    expect(engine.rules[0].action.kind).toBe("identity");
  });

  it("traces matches when configured", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ logLevel: "debug", engine: { trace: true } });

    new TokenRuleEngine().addRule(value("a"), identity()).process(words("a", "b"));

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[tokenloom:engine] value matched [0, 1) with identity");
  });

  it("does not trace by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ logLevel: "debug" });

    new TokenRuleEngine().addRule(value("a")).process(words("a"));

    expect(debug).not.toHaveBeenCalled();
  });
});
