/**
 * Token actions: rewrites applied to the tokens of a successful match.
 *
 * Every action returns a new frozen array; the match is never modified.
 */

import { ConstructionError, ensures } from "@tokenloom/core";
import type { TokenRuleContext } from "./context.js";
import { WORD_DEFINITION, type TokenDefinition } from "./definition.js";
import type { TokenRuleMatch } from "./match.js";
import { shiftPosition } from "./position.js";
import type { TokenType } from "./token-type.js";
import {
  annotatedToken,
  flattenToken,
  indexedToken,
  simpleToken,
  tokenGroup,
  withTypes,
  type Token,
} from "./tokens.js";
import type { TokenAction } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export type Action<K extends string, P extends object> = TokenAction & P & { readonly kind: K };

function mkAction<K extends string, P extends object>(
  kind: K,
  props: P,
  applyFn: (tokens: readonly Token[], match: TokenRuleMatch, context: TokenRuleContext) => readonly Token[]
): Action<K, P> {
  const action: Action<K, P> = {
    ...props,
    kind,
    apply(match: TokenRuleMatch, context: TokenRuleContext): readonly Token[] {
      return Object.freeze([...applyFn(match.matchedTokens, match, context)]);
    },
  };
  return action;
}

// ---------------------------------------------------------------------------
// Pass-through and mapping
// ---------------------------------------------------------------------------

/** The matched tokens, unchanged. */
export function identity(): Action<"identity", object> {
  return mkAction("identity", {}, (tokens) => tokens);
}

export type TokenTransformer = (
  tokens: readonly Token[],
  match: TokenRuleMatch,
  context: TokenRuleContext
) => readonly Token[];

/** Replace the matched tokens with whatever `fn` returns. */
export function transform(fn: TokenTransformer): Action<"transform", object> {
  return mkAction("transform", {}, fn);
}

/** Replace each matched token with `converter(token)`. */
export function convert(converter: (token: Token) => Token): Action<"convert", object> {
  return mkAction("convert", {}, (tokens) => tokens.map((token) => converter(token)));
}

/** Keep the matched tokens accepted by `predicate`, in order. */
export function filter(predicate: (token: Token) => boolean): Action<"filter", object> {
  return mkAction("filter", {}, (tokens) => tokens.filter((token) => predicate(token)));
}

/** Drop the matched tokens accepted by `predicate`. */
export function skip(predicate: (token: Token) => boolean): Action<"skip", object> {
  return mkAction("skip", {}, (tokens) => tokens.filter((token) => !predicate(token)));
}

/**
 * Remove the tokens accepted by `predicate` from the output, handing each
 * one to `sink` in order.
 *
 * @example
 * ```typescript
 * const comments: Token[] = [];
 * builder.addRule(comment, extract(() => true, (t) => comments.push(t)));
 * ```
 */
export function extract(
  predicate: (token: Token) => boolean,
  sink: (token: Token) => void
): Action<"extract", object> {
  return mkAction("extract", {}, (tokens) => {
    const kept: Token[] = [];
    for (const token of tokens) {
      if (predicate(token)) {
        sink(token);
      } else {
        kept.push(token);
      }
    }
    return kept;
  });
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

/**
 * - `"matched"`: group the matched tokens as they are
 * - `"all"`: group the leaf tokens, flattening nested groups first
 */
export type GroupingMode = "matched" | "all";

export type GroupingAction = Action<
  "grouping",
  { readonly mode: GroupingMode; readonly definition: TokenDefinition | undefined }
>;

/**
 * Merge the matched tokens into one token group. Fewer than two tokens are
 * returned unchanged.
 */
export function grouping(mode: GroupingMode = "matched", definition?: TokenDefinition): GroupingAction {
  return mkAction("grouping", { mode, definition }, (tokens) => {
    const members = mode === "all" ? tokens.flatMap(flattenToken) : tokens;
    return members.length < 2 ? tokens : [tokenGroup(members, definition)];
  });
}

export function isGroupingAction(action: TokenAction): action is GroupingAction {
  return action.kind === "grouping" && "mode" in action;
}

/** Surround the matched tokens with `prefix` and `suffix`. */
export function wrap(
  prefix: Token,
  suffix: Token
): Action<"wrap", { readonly prefix: Token; readonly suffix: Token }> {
  return mkAction("wrap", { prefix, suffix }, (tokens) => [prefix, ...tokens, suffix]);
}

/**
 * Split every matched token at each match of `separator`. Empty parts are
 * dropped; each part keeps the token's definition when it accepts the part,
 * otherwise it becomes a word. Parts are positioned at their offset in the
 * original token. A token that does not split is kept as is.
 */
export function split(separator: RegExp | string): Action<"split", { readonly separator: RegExp }> {
  const source = typeof separator === "string" ? separator : separator.source;
  const flags = typeof separator === "string" ? "g" : `${separator.flags.replace(/[gy]/g, "")}g`;
  ensures(source.length > 0, "Split separator must not be empty");

  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConstructionError(`Invalid split separator ${JSON.stringify(source)}: ${reason}`);
  }

  return mkAction("split", { separator: regex }, (tokens) =>
    tokens.flatMap((token) => splitToken(token, regex))
  );
}

function splitToken(token: Token, separator: RegExp): Token[] {
  const parts: { text: string; offset: number }[] = [];
  let last = 0;
  for (const found of token.value.matchAll(separator)) {
    const at = found.index ?? 0;
    if (found[0].length === 0) continue;
    if (at > last) parts.push({ text: token.value.slice(last, at), offset: last });
    last = at + found[0].length;
  }
  if (last < token.value.length) parts.push({ text: token.value.slice(last), offset: last });

  if (parts.length === 1 && parts[0].text === token.value) return [token];
  return parts.map(({ text, offset }) =>
    simpleToken(
      token.definition.matches(text) ? token.definition : WORD_DEFINITION,
      text,
      shiftPosition(token.position, token.value, [...token.value.slice(0, offset)].length)
    )
  );
}

// ---------------------------------------------------------------------------
// Decoration
// ---------------------------------------------------------------------------

/** Attach `metadata` to every matched token. */
export function annotate(
  metadata: Readonly<Record<string, unknown>>
): Action<"annotate", { readonly metadata: Readonly<Record<string, unknown>> }> {
  const frozen = Object.freeze({ ...metadata });
  return mkAction("annotate", { metadata: frozen }, (tokens) =>
    tokens.map((token) => annotatedToken(token, frozen))
  );
}

/**
 * Attach the types `classifier` returns to each matched token. A token
 * with no new types is kept as is.
 */
export function classify(
  classifier: (token: Token) => Iterable<TokenType>
): Action<"classify", object> {
  return mkAction("classify", {}, (tokens) =>
    tokens.map((token) => withTypes(token, ...classifier(token)))
  );
}

/** Number the matched tokens, starting at `start`. */
export function index(start = 0): Action<"index", { readonly start: number }> {
  ensures(Number.isInteger(start) && start >= 0, `Index start must be a non-negative integer, got ${start}`);
  return mkAction("index", { start }, (tokens) => tokens.map((token, i) => indexedToken(token, start + i)));
}
