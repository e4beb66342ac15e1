/**
 * Rule construction helpers shared by every built-in rule.
 */

import { invariant } from "@tokenloom/core";
import type { TokenRuleContext } from "../context.js";
import { emptyMatch, type TokenRuleMatch } from "../match.js";
import type { TokenStream } from "../stream.js";
import type { TokenRule } from "../types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** A built-in rule: its kind plus the properties it exposes for inspection. */
export type Rule<K extends string, P extends object> = TokenRule & P & { readonly kind: K };

/**
 * The body of a rule. It receives a private copy of the caller's stream,
 * which it may move freely; the caller's stream only advances on success.
 */
export type MatchFn<R extends TokenRule> = (
  stream: TokenStream,
  context: TokenRuleContext,
  self: R
) => TokenRuleMatch | null;

/**
 * Create a rule of `kind` carrying `props`.
 *
 * `negate` builds the negation once, on the first `not()` call; without it
 * the rule negates to the generic {@link not} assertion. A negation built
 * here must itself negate back to `self` for `r.not().not() === r` to hold.
 */
export function mkRule<K extends string, P extends object>(
  kind: K,
  props: P,
  matchFn: MatchFn<Rule<K, P>>,
  negate?: (self: Rule<K, P>) => TokenRule
): Rule<K, P> {
  let negated: TokenRule | undefined;
  const rule: Rule<K, P> = {
    ...props,
    kind,
    match(stream: TokenStream, context: TokenRuleContext): TokenRuleMatch | null {
      const result = matchFn(stream.lookahead(), context, rule);
      if (result === null) return null;
      invariant(
        result.startIndex === stream.index,
        `Rule "${kind}" returned a match starting at ${result.startIndex}, expected ${stream.index}`
      );
      stream.advanceTo(result.endIndex);
      return result;
    },
    not(): TokenRule {
      negated ??= negate ? negate(rule) : negativeAssertion(rule);
      return negated;
    },
  };
  return rule;
}

// ---------------------------------------------------------------------------
// Generic negation
// ---------------------------------------------------------------------------

export interface NotRule extends TokenRule {
  readonly kind: "not";
  readonly rule: TokenRule;
}

export function isNotRule(rule: TokenRule): rule is NotRule {
  return rule.kind === "not" && "rule" in rule;
}

function negativeAssertion(rule: TokenRule): NotRule {
  return mkRule(
    "not",
    { rule },
    (stream, context, self) => {
      if (!stream.hasMore()) return null;
      return rule.match(stream.lookahead(), context) === null ? emptyMatch(stream.index, self) : null;
    },
    () => rule
  );
}

/**
 * Zero-width assertion that succeeds where `rule` does not match. Fails at
 * the end of input. Negating a `not` rule gives back the inner rule.
 */
export function not(rule: TokenRule): TokenRule {
  return isNotRule(rule) ? rule.rule : negativeAssertion(rule);
}
