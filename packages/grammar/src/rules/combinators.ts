/**
 * Rule combinators: sequence, ordered choice and conjunction.
 *
 * PEG semantics: `anyOf` is ordered choice, first match wins.
 */

import { ensures } from "@tokenloom/core";
import { createMatch, type TokenRuleMatch } from "../match.js";
import type { Token } from "../tokens.js";
import type { TokenRule } from "../types.js";
import { mkRule, type Rule } from "./rule.js";

export type SequenceRule = Rule<"sequence", { readonly rules: readonly TokenRule[] }>;

/**
 * Match each rule at consecutive positions. Atomic: if any rule fails, the
 * whole sequence fails and nothing is consumed.
 */
export function sequence(...rules: TokenRule[]): SequenceRule {
  ensures(rules.length > 0, "A sequence needs at least one rule");
  return mkRule("sequence", { rules: Object.freeze(rules) }, (stream, context, self) => {
    const start = stream.index;
    const tokens: Token[] = [];
    for (const rule of rules) {
      const result = rule.match(stream, context);
      if (result === null) return null;
      tokens.push(...result.matchedTokens);
    }
    return createMatch(start, stream.index, tokens, self);
  });
}

export type AnyOfRule = Rule<"anyOf", { readonly alternatives: readonly TokenRule[] }>;

/** Ordered choice: the first alternative that matches, returned as is. */
export function anyOf(...alternatives: TokenRule[]): AnyOfRule {
  ensures(alternatives.length > 0, "anyOf needs at least one alternative");
  return mkRule("anyOf", { alternatives: Object.freeze(alternatives) }, (stream, context) => {
    for (const alternative of alternatives) {
      const result = alternative.match(stream.lookahead(), context);
      if (result !== null) return result;
    }
    return null;
  });
}

export function isAnyOfRule(rule: TokenRule): rule is AnyOfRule {
  return rule.kind === "anyOf" && "alternatives" in rule && Array.isArray(rule.alternatives);
}

export type AllOfRule = Rule<"allOf", { readonly rules: readonly TokenRule[] }>;

/**
 * Every rule must match at the current position. The longest of their
 * matches is returned (the first one on a tie).
 */
export function allOf(...rules: TokenRule[]): AllOfRule {
  ensures(rules.length > 0, "allOf needs at least one rule");
  return mkRule("allOf", { rules: Object.freeze(rules) }, (stream, context) => {
    let longest: TokenRuleMatch | null = null;
    for (const rule of rules) {
      const result = rule.match(stream.lookahead(), context);
      if (result === null) return null;
      if (longest === null || result.endIndex > longest.endIndex) {
        longest = result;
      }
    }
    return longest;
  });
}
