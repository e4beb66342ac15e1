import { describe, it, expect } from "vitest";
import { ConstructionError } from "@tokenloom/core";
import {
  annotate,
  classify,
  convert,
  extract,
  filter,
  grouping,
  identity,
  index,
  isGroupingAction,
  skip,
  split,
  transform,
  wrap,
} from "../actions.js";
import { TokenRuleContext } from "../context.js";
import { WORD_DEFINITION, charDefinition, definition } from "../definition.js";
import { createMatch } from "../match.js";
import { tokenPosition } from "../position.js";
import { alwaysMatch } from "../rules/index.js";
import { tokenType } from "../token-type.js";
import { simpleToken, tokenGroup, tokenValues, withTypes, type Token } from "../tokens.js";

const words = (...values: string[]): Token[] => values.map((v) => simpleToken(WORD_DEFINITION, v));

const matchOf = (tokens: Token[]) => createMatch(0, tokens.length, tokens, alwaysMatch());

const context = new TokenRuleContext();

describe("identity", () => {
  it("returns a frozen copy of the matched tokens", () => {
    const match = matchOf(words("a", "b"));
    const result = identity().apply(match, context);

    expect(tokenValues(result)).toEqual(["a", "b"]);
    expect(result).not.toBe(match.matchedTokens);
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe("transform / convert", () => {
  it("transform replaces the whole list", () => {
    const reverse = transform((tokens) => [...tokens].reverse());
    expect(tokenValues(reverse.apply(matchOf(words("a", "b")), context))).toEqual(["b", "a"]);
  });

  it("convert maps token by token", () => {
    const upper = convert((t) => simpleToken(WORD_DEFINITION, t.value.toUpperCase(), t.position));
    expect(tokenValues(upper.apply(matchOf(words("a", "b")), context))).toEqual(["A", "B"]);
  });
});

describe("filter / skip / extract", () => {
  const isComma = (t: Token) => t.value === ",";

  it("filter keeps accepted tokens in order", () => {
    expect(tokenValues(filter(isComma).apply(matchOf(words("a", ",", "b", ",")), context))).toEqual([",", ","]);
  });

  it("skip drops accepted tokens", () => {
    expect(tokenValues(skip(isComma).apply(matchOf(words("a", ",", "b")), context))).toEqual(["a", "b"]);
  });

  it("extract removes accepted tokens and hands them to the sink", () => {
    const removed: Token[] = [];
    const action = extract(isComma, (t) => removed.push(t));

    expect(tokenValues(action.apply(matchOf(words("a", ",", "b")), context))).toEqual(["a", "b"]);
    expect(tokenValues(removed)).toEqual([","]);
  });
});

describe("grouping", () => {
  it("merges the matched tokens into one group", () => {
    const result = grouping().apply(matchOf(words("a", "b")), context);

    expect(result).toHaveLength(1);
    expect(result[0].kind).toBe("group");
    expect(result[0].value).toBe("ab");
  });

  it("returns fewer than two tokens unchanged", () => {
    const tokens = words("a");
    const result = grouping().apply(matchOf(tokens), context);
    expect(result).toEqual(tokens);
  });

  it("keeps nested groups in matched mode and flattens them in all mode", () => {
    const [a, b, c] = words("a", "b", "c");
    const match = matchOf([tokenGroup([a, b]), c]);

    const matched = grouping("matched").apply(match, context)[0];
    const all = grouping("all").apply(match, context)[0];

    expect(matched.kind === "group" && matched.tokens.length).toBe(2);
    expect(all.kind === "group" && all.tokens).toEqual([a, b, c]);
  });

  it("regroups a single group's leaves in all mode", () => {
    const group = tokenGroup(words("a", "b"));
    expect(grouping("matched").apply(matchOf([group]), context)[0]).toBe(group);
    expect(grouping("all").apply(matchOf([group]), context)[0]).not.toBe(group);
  });

  it("groups tokens with empty values", () => {
    const any = definition("any", () => true);
    const result = grouping().apply(matchOf([simpleToken(any, ""), simpleToken(any, "")]), context);

    expect(result).toHaveLength(1);
    expect(result[0].kind).toBe("group");
    expect(result[0].value).toBe("");
  });

  it("uses a supplied definition", () => {
    const pair = definition("pair", (w) => w.length === 2);
    expect(grouping("matched", pair).apply(matchOf(words("a", "b")), context)[0].definition).toBe(pair);
  });

  it("is recognised by isGroupingAction", () => {
    expect(isGroupingAction(grouping())).toBe(true);
    expect(isGroupingAction(identity())).toBe(false);
  });
});

describe("wrap", () => {
  it("surrounds the matched tokens", () => {
    const open = simpleToken(charDefinition("["), "[");
    const close = simpleToken(charDefinition("]"), "]");
    expect(tokenValues(wrap(open, close).apply(matchOf(words("a")), context))).toEqual(["[", "a", "]"]);
  });
});

describe("split", () => {
  it("splits values and positions the parts by offset", () => {
    const token = simpleToken(WORD_DEFINITION, "a,b,,c", tokenPosition(2, 4, 20));
    const result = split(",").apply(matchOf([token]), context);

    expect(tokenValues(result)).toEqual(["a", "b", "c"]);
    expect(result.map((t) => t.position)).toEqual([
      { line: 2, characterInLine: 4, absoluteCharacter: 20 },
      { line: 2, characterInLine: 6, absoluteCharacter: 22 },
      { line: 2, characterInLine: 9, absoluteCharacter: 25 },
    ]);
  });

  it("counts offsets in code points", () => {
    const token = simpleToken(WORD_DEFINITION, "\u{1F600},b", tokenPosition(0, 0, 0));
    const result = split(",").apply(matchOf([token]), context);

    expect(tokenValues(result)).toEqual(["\u{1F600}", "b"]);
    expect(result[1].position).toEqual({ line: 0, characterInLine: 2, absoluteCharacter: 2 });
  });

  it("keeps tokens without a separator and drops separator-only tokens", () => {
    const [plain, comma] = words("abc", ",");
    const result = split(/,/).apply(matchOf([plain, comma]), context);
    expect(result).toEqual([plain]);
  });

  it("rejects an empty or malformed separator", () => {
    expect(() => split("")).toThrow(ConstructionError);
    expect(() => split("(")).toThrow(ConstructionError);
  });
});

describe("annotate / index", () => {
  it("annotate wraps every token with the metadata", () => {
    const result = annotate({ role: "name" }).apply(matchOf(words("a", "b")), context);
    expect(result.map((t) => t.kind)).toEqual(["annotated", "annotated"]);
    expect(result.map((t) => (t.kind === "annotated" ? t.metadata.role : undefined))).toEqual(["name", "name"]);
  });

  it("index numbers tokens from the start value", () => {
    const result = index(1).apply(matchOf(words("a", "b")), context);
    expect(result.map((t) => (t.kind === "indexed" ? t.ordinal : -1))).toEqual([1, 2]);
    expect(tokenValues(result)).toEqual(["a", "b"]);
  });

  it("index rejects a negative start", () => {
    expect(() => index(-1)).toThrow(ConstructionError);
  });
});

describe("classify", () => {
  const keyword = tokenType("Keyword");
  const name = tokenType("Name");
  const kinds = classify((token) => (token.value === "let" ? [keyword] : [name]));

  it("attaches the classifier's types to each token", () => {
    const result = kinds.apply(matchOf(words("let", "x")), context);

    expect(tokenValues(result)).toEqual(["let", "x"]);
    expect(result.map((t) => [...t.types])).toEqual([[keyword], [name]]);
  });

  it("keeps tokens that already carry the types", () => {
    const typed = withTypes(simpleToken(WORD_DEFINITION, "let"), keyword);
    expect(kinds.apply(matchOf([typed]), context)[0]).toBe(typed);
  });

  it("keeps tokens the classifier gives no types", () => {
    const [plain] = words("x");
    expect(classify(() => []).apply(matchOf([plain]), context)[0]).toBe(plain);
  });
});
