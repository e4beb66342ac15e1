/**
 * Result of a successful rule match.
 */

import { ensures } from "@tokenloom/core";
import type { Token } from "./tokens.js";
import type { TokenRule } from "./types.js";

export interface TokenRuleMatch {
  readonly startIndex: number;
  /** Index just past the last consumed token; equal to `startIndex` for zero-width matches. */
  readonly endIndex: number;
  readonly matchedTokens: readonly Token[];
  readonly matchingRule: TokenRule;
}

export function createMatch(
  startIndex: number,
  endIndex: number,
  matchedTokens: readonly Token[],
  matchingRule: TokenRule
): TokenRuleMatch {
  ensures(startIndex >= 0, `Match start ${startIndex} must not be negative`);
  ensures(endIndex >= startIndex, `Match end ${endIndex} is before its start ${startIndex}`);
  return Object.freeze({
    startIndex,
    endIndex,
    matchedTokens: Object.freeze([...matchedTokens]),
    matchingRule,
  });
}

export function emptyMatch(index: number, matchingRule: TokenRule): TokenRuleMatch {
  return createMatch(index, index, [], matchingRule);
}

export function isZeroWidth(match: TokenRuleMatch): boolean {
  return match.startIndex === match.endIndex;
}
