/**
 * Core interfaces for @tokenloom/grammar
 *
 * Rules and actions are plain objects implementing these interfaces; callers
 * may supply their own implementations alongside the built-in ones.
 */

import type { TokenRuleContext } from "./context.js";
import type { TokenRuleMatch } from "./match.js";
import type { TokenStream } from "./stream.js";
import type { Token } from "./tokens.js";

/** Kinds of the built-in rules. Custom rules may use any other string. */
export type BuiltinRuleKind =
  | "always"
  | "never"
  | "value"
  | "pattern"
  | "length"
  | "custom"
  | "type"
  | "sequence"
  | "anyOf"
  | "allOf"
  | "optional"
  | "repeated"
  | "lookahead"
  | "lookbehind"
  | "anchor"
  | "boundary"
  | "recursive"
  | "lazy"
  | "group"
  | "capture"
  | "reference"
  | "not";

/** A matcher over a token stream. */
export interface TokenRule {
  readonly kind: string;
  /**
   * Attempt a match at the stream's current index. On success the stream is
   * advanced to the match's `endIndex`; on failure it is left untouched and
   * `null` is returned.
   */
  match(stream: TokenStream, context: TokenRuleContext): TokenRuleMatch | null;
  /** The negated rule; `rule.not().not()` is `rule` itself. */
  not(): TokenRule;
}

/** Kinds of the built-in actions. */
export type BuiltinActionKind =
  | "identity"
  | "transform"
  | "filter"
  | "skip"
  | "grouping"
  | "wrap"
  | "extract"
  | "convert"
  | "split"
  | "annotate"
  | "classify"
  | "index";

/** A rewrite applied to a successful match, producing the replacement tokens. */
export interface TokenAction {
  readonly kind: string;
  apply(match: TokenRuleMatch, context: TokenRuleContext): readonly Token[];
}
