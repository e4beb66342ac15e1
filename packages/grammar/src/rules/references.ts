/**
 * Rules resolved through the rule context: recursion, late binding,
 * captures and back-references.
 */

import { createLogger, ensures } from "@tokenloom/core";
import type { TokenRuleContext } from "../context.js";
import { createMatch, emptyMatch, type TokenRuleMatch } from "../match.js";
import type { TokenStream } from "../stream.js";
import type { Token } from "../tokens.js";
import type { TokenRule } from "../types.js";
import { sequence } from "./combinators.js";
import { mkRule, type Rule } from "./rule.js";

const log = createLogger("rules");

/** Re-attribute an inner match to the rule that delegated to it. */
function delegate(
  rule: TokenRule,
  stream: TokenStream,
  context: TokenRuleContext,
  self: TokenRule
): TokenRuleMatch | null {
  const start = stream.index;
  const result = rule.match(stream, context);
  return result === null ? null : createMatch(start, result.endIndex, result.matchedTokens, self);
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

export type RecursiveRule = Rule<"recursive", { readonly name: string | null }>;

/**
 * A rule that refers to itself or to other named rules.
 *
 * - `recursive(name)` looks `name` up in the context each time it matches;
 *   an unbound name does not match.
 * - `recursive(factory)` passes the rule being built to `factory` and
 *   matches whatever rule the factory returns.
 * - `recursive(open, content, close)` matches `open`, `content`, `close`
 *   in sequence; `content` may itself refer back by name.
 * - `recursive(open, close, contentFactory)` is the factory form wrapped in
 *   `open` and `close`.
 *
 * @example
 * ```typescript
 * // ( ( x ) )
 * const nested = recursive((self) =>
 *   anyOf(sequence(value("("), self, value(")")), value("x"))
 * );
 * const list = recursive(value("("), value(")"), (self) => zeroOrMore(anyOf(self, value("x"))));
 * ```
 */
export function recursive(name: string): RecursiveRule;
export function recursive(factory: (self: TokenRule) => TokenRule): RecursiveRule;
export function recursive(open: TokenRule, content: TokenRule, close: TokenRule): RecursiveRule;
export function recursive(
  open: TokenRule,
  close: TokenRule,
  contentFactory: (self: TokenRule) => TokenRule
): RecursiveRule;
export function recursive(
  target: string | TokenRule | ((self: TokenRule) => TokenRule),
  middle?: TokenRule,
  last?: TokenRule | ((self: TokenRule) => TokenRule)
): RecursiveRule {
  if (typeof target === "string") {
    const name = target;
    ensures(name.length > 0, "Recursive rule name must not be empty");
    return mkRule("recursive", { name }, (stream, context, self) => {
      const rule = context.resolveRule(name);
      if (rule === undefined) {
        log.debug(() => `recursive rule "${name}" is not defined`);
        return null;
      }
      return delegate(rule, stream, context, self);
    });
  }
  if (typeof target === "function") return selfReferencing(target);

  ensures(
    middle !== undefined && last !== undefined,
    "Recursive rule needs an opening rule, a closing rule and content"
  );
  const open = target;
  if (typeof last === "function") {
    const close = middle;
    const contentFactory = last;
    return selfReferencing((self) => sequence(open, contentFactory(self), close));
  }
  const body = sequence(open, middle, last);
  return selfReferencing(() => body);
}

function selfReferencing(factory: (self: TokenRule) => TokenRule): RecursiveRule {
  let body: TokenRule | undefined;
  const rule = mkRule("recursive", { name: null }, (stream, context, self) =>
    body === undefined ? null : delegate(body, stream, context, self)
  );
  body = factory(rule);
  return rule;
}

// ---------------------------------------------------------------------------
// Late binding
// ---------------------------------------------------------------------------

export type LazyRule = Rule<
  "lazy",
  {
    /** Bind the rule; allowed once. */
    set(rule: TokenRule): void;
    isSet(): boolean;
  }
>;

/** Placeholder for a rule supplied later with `set`. Does not match until then. */
export function lazy(): LazyRule {
  let target: TokenRule | undefined;
  return mkRule<"lazy", { set(rule: TokenRule): void; isSet(): boolean }>(
    "lazy",
    {
      set(rule: TokenRule): void {
        ensures(target === undefined, "Lazy rule is already set");
        target = rule;
      },
      isSet: () => target !== undefined,
    },
    (stream, context, self) => (target === undefined ? null : delegate(target, stream, context, self))
  );
}

// ---------------------------------------------------------------------------
// Captures and references
// ---------------------------------------------------------------------------

export type CaptureRule = Rule<"capture", { readonly key: string; readonly rule: TokenRule }>;

/** Match `rule` and store its matched tokens in the context under `key`. */
export function capture(key: string, rule: TokenRule): CaptureRule {
  ensures(key.length > 0, "Capture key must not be empty");
  return mkRule("capture", { key, rule }, (stream, context, self) => {
    const result = delegate(rule, stream, context, self);
    if (result !== null) {
      context.captureTokens(key, result.matchedTokens);
    }
    return result;
  });
}

/**
 * How a reference resolves its key:
 * - `"rule"`: a named rule, matched in place
 * - `"tokens"`: captured tokens, matched again by value
 * - `"dynamic"`: a named rule, else a dynamic binding, else captured tokens
 */
export type ReferenceType = "rule" | "tokens" | "dynamic";

export type ReferenceRule = Rule<"reference", { readonly key: string; readonly type: ReferenceType }>;

/** Match the next tokens against `expected` by value. An empty list matches zero-width. */
function matchValues(
  expected: readonly Token[],
  stream: TokenStream,
  self: TokenRule
): TokenRuleMatch | null {
  const start = stream.index;
  if (expected.length === 0) return emptyMatch(start, self);

  const tokens: Token[] = [];
  for (const token of expected) {
    const next = stream.peek();
    if (next === undefined || next.value !== token.value) return null;
    tokens.push(stream.read());
  }
  return createMatch(start, stream.index, tokens, self);
}

export function reference(key: string, type: ReferenceType = "dynamic"): ReferenceRule {
  ensures(key.length > 0, "Reference key must not be empty");
  return mkRule("reference", { key, type }, (stream, context, self) => {
    if (type !== "tokens") {
      const rule = context.resolveRule(key);
      if (rule !== undefined) return delegate(rule, stream, context, self);
    }
    if (type === "dynamic") {
      const binding = context.resolveDynamic(key);
      if (binding !== undefined) {
        return isTokenList(binding)
          ? matchValues(binding, stream, self)
          : delegate(binding, stream, context, self);
      }
    }
    if (type !== "rule") {
      const captured = context.capturedTokens(key);
      if (captured !== undefined) return matchValues(captured, stream, self);
    }
    log.debug(() => `reference "${key}" (${type}) is not bound`);
    return null;
  });
}

function isTokenList(binding: TokenRule | readonly Token[]): binding is readonly Token[] {
  return Array.isArray(binding);
}
