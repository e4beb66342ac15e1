/**
 * Quantified rules: optional and bounded repetition.
 */

import { ensures } from "@tokenloom/core";
import type { TokenRuleContext } from "../context.js";
import { createMatch, emptyMatch, isZeroWidth } from "../match.js";
import type { TokenStream } from "../stream.js";
import type { Token } from "../tokens.js";
import type { TokenRule } from "../types.js";
import { mkRule, type Rule } from "./rule.js";

// ---------------------------------------------------------------------------
// Optional
// ---------------------------------------------------------------------------

export type OptionalRule = Rule<"optional", { readonly rule: TokenRule }>;

function mkOptional(rule: TokenRule, negation?: () => TokenRule): OptionalRule {
  return mkRule(
    "optional",
    { rule },
    (stream, context, self) => {
      const start = stream.index;
      const result = rule.match(stream, context);
      return result === null
        ? emptyMatch(start, self)
        : createMatch(start, result.endIndex, result.matchedTokens, self);
    },
    (self) => (negation ? negation() : mkOptional(rule.not(), () => self))
  );
}

/** Match `rule` if possible, otherwise succeed without consuming. Never fails. */
export function optional(rule: TokenRule): OptionalRule {
  return mkOptional(rule);
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

export type RepeatedRule = Rule<
  "repeated",
  { readonly rule: TokenRule; readonly min: number; readonly max: number; readonly negated: boolean }
>;

interface Repetitions {
  readonly count: number;
  readonly tokens: Token[];
}

/**
 * Match `rule` greedily, at most `limit` times. A zero-width match ends the
 * loop and counts as every remaining required repetition.
 */
function countRepetitions(
  rule: TokenRule,
  min: number,
  limit: number,
  stream: TokenStream,
  context: TokenRuleContext
): Repetitions {
  let count = 0;
  const tokens: Token[] = [];
  while (count < limit) {
    const result = rule.match(stream, context);
    if (result === null) break;
    if (isZeroWidth(result)) {
      count = Math.max(count + 1, min);
      break;
    }
    count++;
    tokens.push(...result.matchedTokens);
  }
  return { count, tokens };
}

function mkRepeated(
  rule: TokenRule,
  min: number,
  max: number,
  negated: boolean,
  negation?: () => TokenRule
): RepeatedRule {
  return mkRule(
    "repeated",
    { rule, min, max, negated },
    (stream, context, self) => {
      const start = stream.index;
      // The negation looks one repetition past the maximum to detect an excess.
      const { count, tokens } = countRepetitions(rule, min, negated ? max + 1 : max, stream, context);
      const inRange = count >= min && count <= max;
      return inRange !== negated ? createMatch(start, stream.index, tokens, self) : null;
    },
    (self) => (negation ? negation() : mkRepeated(rule, min, max, !negated, () => self))
  );
}

/**
 * Match `rule` between `min` and `max` times (inclusive), greedily. On
 * success the tokens of every repetition are consumed.
 *
 * Negated, it succeeds exactly when the greedy count falls outside
 * `[min, max]`, consuming the repetitions it counted.
 */
export function repeated(rule: TokenRule, min: number, max = Infinity): RepeatedRule {
  ensures(Number.isInteger(min) && min >= 0, `Minimum repetitions must be a non-negative integer, got ${min}`);
  ensures(
    max === Infinity || (Number.isInteger(max) && max >= 0),
    `Maximum repetitions must be a non-negative integer, got ${max}`
  );
  ensures(max >= min, `Maximum repetitions ${max} is less than the minimum ${min}`);
  ensures(max > 0, "Repetition bounds must not both be zero");
  return mkRepeated(rule, min, max, false);
}

export function atLeast(rule: TokenRule, min: number): RepeatedRule {
  return repeated(rule, min, Infinity);
}

export function atMost(rule: TokenRule, max: number): RepeatedRule {
  return repeated(rule, 0, max);
}

export function exactly(rule: TokenRule, count: number): RepeatedRule {
  return repeated(rule, count, count);
}

export function zeroOrMore(rule: TokenRule): RepeatedRule {
  return repeated(rule, 0, Infinity);
}

export function oneOrMore(rule: TokenRule): RepeatedRule {
  return repeated(rule, 1, Infinity);
}
