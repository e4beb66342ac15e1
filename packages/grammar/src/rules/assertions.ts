/**
 * Zero-width assertions: lookaround and anchors.
 *
 * None of these consume tokens. Each negates to the same assertion with the
 * opposite polarity.
 */

import { emptyMatch } from "../match.js";
import { isPositioned } from "../position.js";
import type { TokenStream } from "../stream.js";
import type { TokenRule } from "../types.js";
import { mkRule, type Rule } from "./rule.js";

// ---------------------------------------------------------------------------
// Lookaround
// ---------------------------------------------------------------------------

export type LookaroundRule<K extends "lookahead" | "lookbehind"> = Rule<
  K,
  { readonly rule: TokenRule; readonly negative: boolean }
>;

function mkLookaround<K extends "lookahead" | "lookbehind">(
  kind: K,
  rule: TokenRule,
  negative: boolean,
  view: (stream: TokenStream) => TokenStream,
  negation?: () => TokenRule
): LookaroundRule<K> {
  return mkRule(
    kind,
    { rule, negative },
    (stream, context, self) => {
      const matched = rule.match(view(stream), context) !== null;
      return matched !== negative ? emptyMatch(stream.index, self) : null;
    },
    (self) => (negation ? negation() : mkLookaround(kind, rule, !negative, view, () => self))
  );
}

const ahead = (stream: TokenStream): TokenStream => stream.lookahead();
const behind = (stream: TokenStream): TokenStream => stream.lookbehind();

/** Succeeds, without consuming, when `rule` matches at the current position. */
export function lookahead(rule: TokenRule): LookaroundRule<"lookahead"> {
  return mkLookaround("lookahead", rule, false, ahead);
}

export function negativeLookahead(rule: TokenRule): LookaroundRule<"lookahead"> {
  return mkLookaround("lookahead", rule, true, ahead);
}

/**
 * Succeeds, without consuming, when `rule` matches the preceding tokens.
 * The rule sees them nearest first, so `sequence(value("b"), value("a"))`
 * checks that the stream is preceded by `a b`.
 */
export function lookbehind(rule: TokenRule): LookaroundRule<"lookbehind"> {
  return mkLookaround("lookbehind", rule, false, behind);
}

export function negativeLookbehind(rule: TokenRule): LookaroundRule<"lookbehind"> {
  return mkLookaround("lookbehind", rule, true, behind);
}

// ---------------------------------------------------------------------------
// Anchors
// ---------------------------------------------------------------------------

export type AnchorPosition = "start" | "end";
export type AnchorScope = "document" | "line";

export type AnchorRule = Rule<
  "anchor",
  { readonly position: AnchorPosition; readonly scope: AnchorScope; readonly negated: boolean }
>;

function holds(position: AnchorPosition, scope: AnchorScope, stream: TokenStream): boolean {
  if (scope === "document") {
    return position === "start" ? stream.previous() === undefined : !stream.hasMore();
  }
  return position === "start" ? atLineStart(stream) : atLineEnd(stream);
}

function atLineStart(stream: TokenStream): boolean {
  const previous = stream.previous();
  if (previous === undefined) return true;
  if (previous.value.includes("\n")) return true;

  const current = stream.peek();
  return (
    current !== undefined &&
    isPositioned(previous.endPosition) &&
    isPositioned(current.position) &&
    current.position.line > previous.endPosition.line
  );
}

function atLineEnd(stream: TokenStream): boolean {
  const current = stream.peek();
  if (current === undefined) return true;
  if (current.value.includes("\n")) return true;

  const next = stream.peek(1);
  return (
    next !== undefined &&
    isPositioned(current.endPosition) &&
    isPositioned(next.position) &&
    next.position.line > current.endPosition.line
  );
}

function mkAnchor(
  position: AnchorPosition,
  scope: AnchorScope,
  negated: boolean,
  negation?: () => TokenRule
): AnchorRule {
  return mkRule(
    "anchor",
    { position, scope, negated },
    (stream, _context, self) =>
      holds(position, scope, stream) !== negated ? emptyMatch(stream.index, self) : null,
    (self) => (negation ? negation() : mkAnchor(position, scope, !negated, () => self))
  );
}

/** Before the first visible token, or on an empty stream. */
export function startDocument(): AnchorRule {
  return mkAnchor("start", "document", false);
}

/** Past the last token. */
export function endDocument(): AnchorRule {
  return mkAnchor("end", "document", false);
}

/**
 * At the start of the stream, after a token containing a line feed, or on a
 * token positioned on a later line than the previous one.
 */
export function startLine(): AnchorRule {
  return mkAnchor("start", "line", false);
}

/**
 * Past the last token, on a token containing a line feed, or before a token
 * positioned on a later line.
 */
export function endLine(): AnchorRule {
  return mkAnchor("end", "line", false);
}
