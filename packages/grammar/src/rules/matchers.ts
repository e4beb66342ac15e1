/**
 * Single-token matchers.
 *
 * Each consumes exactly one token when its test accepts the token's value.
 * Negating a matcher gives a rule that consumes one token the test rejects;
 * neither matches at the end of input.
 */

import { ConstructionError, ensures } from "@tokenloom/core";
import { createMatch, emptyMatch, type TokenRuleMatch } from "../match.js";
import type { TokenStream } from "../stream.js";
import { isTypeOf, type TokenType } from "../token-type.js";
import type { Token } from "../tokens.js";
import type { TokenRule } from "../types.js";
import { mkRule, type Rule } from "./rule.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function consumeIf(
  stream: TokenStream,
  accepts: (token: Token) => boolean,
  rule: TokenRule
): TokenRuleMatch | null {
  if (!stream.hasMore()) return null;
  const start = stream.index;
  const token = stream.read();
  return accepts(token) ? createMatch(start, stream.index, [token], rule) : null;
}

type Matcher<K extends string, P extends object> = Rule<K, P & { readonly negated: boolean }>;

function tokenMatcher<K extends string, P extends object>(
  kind: K,
  props: P,
  accepts: (token: Token) => boolean
): Matcher<K, P> {
  return mkRule(
    kind,
    { ...props, negated: false },
    (stream, _context, self) => consumeIf(stream, accepts, self),
    (self) =>
      mkRule(
        kind,
        { ...props, negated: true },
        (stream, _context, negation) => consumeIf(stream, (token) => !accepts(token), negation),
        () => self
      )
  );
}

// ---------------------------------------------------------------------------
// Trivial rules
// ---------------------------------------------------------------------------

const ALWAYS: Rule<"always", object> = mkRule(
  "always",
  {},
  (stream, _context, self) => emptyMatch(stream.index, self),
  () => NEVER
);

const NEVER: Rule<"never", object> = mkRule("never", {}, () => null, () => ALWAYS);

/** Zero-width success at any position. Negates to {@link neverMatch}. */
export function alwaysMatch(): TokenRule {
  return ALWAYS;
}

/** Never matches. Negates to {@link alwaysMatch}. */
export function neverMatch(): TokenRule {
  return NEVER;
}

// ---------------------------------------------------------------------------
// Value matchers
// ---------------------------------------------------------------------------

export type ValueRule = Matcher<"value", { readonly text: string; readonly ignoreCase: boolean }>;

/** Match one token whose value equals `text`. */
export function value(text: string, ignoreCase = false): ValueRule {
  ensures(text.length > 0, "Value rule text must not be empty");
  const lowered = text.toLowerCase();
  return tokenMatcher("value", { text, ignoreCase }, (token) =>
    ignoreCase ? token.value.toLowerCase() === lowered : token.value === text
  );
}

export type PatternRule = Matcher<"pattern", { readonly regex: RegExp }>;

/**
 * Match one token whose whole value matches the pattern. The `g` and `y`
 * flags of a RegExp argument are dropped.
 */
export function pattern(regex: RegExp | string): PatternRule {
  const source = typeof regex === "string" ? regex : regex.source;
  const flags = typeof regex === "string" ? "" : regex.flags.replace(/[gy]/g, "");
  ensures(source.length > 0, "Pattern must not be empty");

  let compiled: RegExp;
  try {
    compiled = new RegExp(`^(?:${source})$`, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConstructionError(`Invalid pattern ${JSON.stringify(source)}: ${reason}`);
  }
  return tokenMatcher("pattern", { regex: compiled }, (token) => compiled.test(token.value));
}

export type LengthRule = Matcher<"length", { readonly min: number; readonly max: number }>;

/** Match one token whose value has between `min` and `max` code points, inclusive. */
export function lengthBetween(min: number, max: number): LengthRule {
  ensures(Number.isInteger(min) && min >= 0, `Minimum length must be a non-negative integer, got ${min}`);
  ensures(
    max === Infinity || (Number.isInteger(max) && max >= 0),
    `Maximum length must be a non-negative integer, got ${max}`
  );
  ensures(max >= min, `Maximum length ${max} is less than the minimum ${min}`);
  return tokenMatcher("length", { min, max }, (token) => {
    const length = [...token.value].length;
    return length >= min && length <= max;
  });
}

export function minLength(min: number): LengthRule {
  return lengthBetween(min, Infinity);
}

export function maxLength(max: number): LengthRule {
  return lengthBetween(0, max);
}

export function exactLength(length: number): LengthRule {
  return lengthBetween(length, length);
}

export type CustomRule = Matcher<"custom", { readonly description: string }>;

/** Match one token accepted by `predicate`. */
export function custom(predicate: (token: Token) => boolean, description = "custom"): CustomRule {
  return tokenMatcher("custom", { description }, predicate);
}

export type TypeRule = Matcher<"type", { readonly types: readonly TokenType[] }>;

/**
 * Match one token that carries every one of `types`, or a subtype of it.
 *
 * @example
 * ```typescript
 * const literal = tokenType("Literal");
 * const integer = tokenType("Integer", literal);
 * type(literal); // accepts tokens typed Integer as well
 * ```
 */
export function type(...types: TokenType[]): TypeRule {
  ensures(types.length > 0, "Type rule needs at least one token type");
  const required = Object.freeze([...types]);
  return tokenMatcher("type", { types: required }, (token) =>
    required.every((wanted) => [...token.types].some((actual) => isTypeOf(actual, wanted)))
  );
}
