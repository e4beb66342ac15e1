/**
 * Rules over delimited spans and grouped tokens.
 */

import { createMatch, isZeroWidth } from "../match.js";
import { TokenStream } from "../stream.js";
import { unwrapToken, type Token } from "../tokens.js";
import type { TokenRule } from "../types.js";
import { alwaysMatch } from "./matchers.js";
import { mkRule, type Rule } from "./rule.js";

// ---------------------------------------------------------------------------
// Boundary
// ---------------------------------------------------------------------------

export type BoundaryRule = Rule<
  "boundary",
  { readonly open: TokenRule; readonly body: TokenRule; readonly close: TokenRule }
>;

/**
 * Match `open`, then `body` repeatedly until `close` matches, then `close`.
 * Without a body every token up to `close` is accepted. An explicit body
 * must consume a token on each step; a zero-width body match fails the
 * boundary. Fails when the input ends before `close`.
 *
 * @example
 * ```typescript
 * // a markup comment spanning any tokens
 * const comment = boundary(value("<!--"), value("-->"));
 * ```
 */
export function boundary(open: TokenRule, close: TokenRule): BoundaryRule;
export function boundary(open: TokenRule, body: TokenRule, close: TokenRule): BoundaryRule;
export function boundary(open: TokenRule, bodyOrClose: TokenRule, close?: TokenRule): BoundaryRule {
  const anyBody = close === undefined;
  const body = anyBody ? alwaysMatch() : bodyOrClose;
  const end = close ?? bodyOrClose;

  return mkRule("boundary", { open, body, close: end }, (stream, context, self) => {
    const start = stream.index;
    const opened = open.match(stream, context);
    if (opened === null) return null;
    const tokens: Token[] = [...opened.matchedTokens];

    for (;;) {
      const closed = end.match(stream, context);
      if (closed !== null) {
        tokens.push(...closed.matchedTokens);
        return createMatch(start, stream.index, tokens, self);
      }
      if (!stream.hasMore()) return null;

      const content = body.match(stream, context);
      if (content === null) return null;
      if (!isZeroWidth(content)) {
        tokens.push(...content.matchedTokens);
      } else if (anyBody) {
        tokens.push(stream.read());
      } else {
        return null;
      }
    }
  });
}

// ---------------------------------------------------------------------------
// Group
// ---------------------------------------------------------------------------

export type GroupRule = Rule<"group", { readonly rule: TokenRule }>;

/**
 * Match one token group whose sub-tokens `rule` matches, starting at the
 * group's first sub-token. The group token is consumed as a whole.
 */
export function group(rule: TokenRule): GroupRule {
  return mkRule("group", { rule }, (stream, context, self) => {
    const token = stream.peek();
    if (token === undefined) return null;
    const inner = unwrapToken(token);
    if (inner.kind !== "group") return null;
    if (rule.match(TokenStream.of(inner.tokens), context) === null) return null;

    const start = stream.index;
    stream.advance();
    return createMatch(start, stream.index, [token], self);
  });
}

export function isGroupRule(rule: TokenRule): rule is GroupRule {
  return rule.kind === "group" && "rule" in rule;
}
