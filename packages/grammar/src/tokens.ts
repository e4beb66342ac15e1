/**
 * Token model
 *
 * Tokens are immutable. Every variant carries the definition that classifies
 * it, and construction fails when that definition rejects the token's value.
 *
 * @example
 * ```typescript
 * const open = simpleToken(charDefinition("("), "(");
 * const word = simpleToken(WORD_DEFINITION, "call", tokenPosition(0, 1, 1));
 * const call = tokenGroup([open, word]);      // value "(call"
 * ```
 */

import { ensures } from "@tokenloom/core";
import { escapedDefinition, type TokenDefinition } from "./definition.js";
import { UNPOSITIONED, endPositionOf, type TokenPosition } from "./position.js";
import type { TokenType } from "./token-type.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface TokenBase {
  readonly definition: TokenDefinition;
  readonly value: string;
  /** Position of the first character, or `UNPOSITIONED`. */
  readonly position: TokenPosition;
  /** Position of the last character, or `UNPOSITIONED`. */
  readonly endPosition: TokenPosition;
  /** Classifications attached by {@link withTypes}; wrappers report their inner token's. */
  readonly types: ReadonlySet<TokenType>;
}

export interface SimpleToken extends TokenBase {
  readonly kind: "simple";
}

/** A backslash followed by exactly one character. */
export interface EscapedToken extends TokenBase {
  readonly kind: "escaped";
  /** The character after the backslash. */
  readonly escaped: string;
}

/** Composite of two or more tokens; its value is their concatenation. */
export interface TokenGroup extends TokenBase {
  readonly kind: "group";
  readonly tokens: readonly Token[];
}

export interface AnnotatedToken extends TokenBase {
  readonly kind: "annotated";
  readonly token: Token;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface IndexedToken extends TokenBase {
  readonly kind: "indexed";
  readonly token: Token;
  readonly ordinal: number;
}

/**
 * A token kept in the list but skipped by token streams, so rules never see
 * it. Comments and whitespace are typical shadow tokens.
 */
export interface ShadowToken extends TokenBase {
  readonly kind: "shadow";
  readonly token: Token;
}

export type Token =
  | SimpleToken
  | EscapedToken
  | TokenGroup
  | AnnotatedToken
  | IndexedToken
  | ShadowToken;

export type TokenKind = Token["kind"];

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

const NO_TYPES: ReadonlySet<TokenType> = new Set();

function checkAccepted(definition: TokenDefinition, value: string): void {
  ensures(
    definition.matches(value),
    `Token value ${JSON.stringify(value)} is not accepted by its definition (${definition.description})`
  );
}

export function simpleToken(
  definition: TokenDefinition,
  value: string,
  position: TokenPosition = UNPOSITIONED
): SimpleToken {
  checkAccepted(definition, value);
  return Object.freeze({
    kind: "simple" as const,
    definition,
    value,
    position,
    endPosition: endPositionOf(position, value),
    types: NO_TYPES,
  });
}

/**
 * Create an escaped token from its full value (`"\\x"`).
 * The definition defaults to `escapedDefinition` of the escaped character.
 */
export function escapedToken(
  value: string,
  position: TokenPosition = UNPOSITIONED,
  definition?: TokenDefinition
): EscapedToken {
  const chars = [...value];
  ensures(
    chars.length === 2 && chars[0] === "\\",
    `Escaped token must be a backslash followed by one character, got ${JSON.stringify(value)}`
  );
  const def = definition ?? escapedDefinition(chars[1]);
  checkAccepted(def, value);
  return Object.freeze({
    kind: "escaped" as const,
    escaped: chars[1],
    definition: def,
    value,
    position,
    endPosition: endPositionOf(position, value),
    types: NO_TYPES,
  });
}

/**
 * Group two or more tokens. Without a definition, the group is classified by
 * a definition accepting exactly its concatenated value.
 */
export function tokenGroup(tokens: readonly Token[], definition?: TokenDefinition): TokenGroup {
  ensures(tokens.length >= 2, `A token group needs at least two tokens, got ${tokens.length}`);
  const value = tokens.map((t) => t.value).join("");
  const def: TokenDefinition = definition ?? {
    description: `group ${JSON.stringify(value)}`,
    matches: (word: string) => word === value,
  };
  checkAccepted(def, value);
  return Object.freeze({
    kind: "group" as const,
    tokens: Object.freeze([...tokens]),
    definition: def,
    value,
    position: tokens[0].position,
    endPosition: tokens[tokens.length - 1].endPosition,
    types: NO_TYPES,
  });
}

/** Attach metadata to a token; definition, value and positions are the inner token's. */
export function annotatedToken(
  token: Token,
  metadata: Readonly<Record<string, unknown>>
): AnnotatedToken {
  return Object.freeze({
    kind: "annotated" as const,
    token,
    metadata: Object.freeze({ ...metadata }),
    definition: token.definition,
    value: token.value,
    position: token.position,
    endPosition: token.endPosition,
    types: token.types,
  });
}

export function indexedToken(token: Token, ordinal: number): IndexedToken {
  ensures(
    Number.isInteger(ordinal) && ordinal >= 0,
    `Token ordinal must be a non-negative integer, got ${ordinal}`
  );
  return Object.freeze({
    kind: "indexed" as const,
    token,
    ordinal,
    definition: token.definition,
    value: token.value,
    position: token.position,
    endPosition: token.endPosition,
    types: token.types,
  });
}

/** Hide `token` from token streams. Shadowing a shadow token returns it unchanged. */
export function shadow(token: Token): ShadowToken {
  if (token.kind === "shadow") return token;
  return Object.freeze({
    kind: "shadow" as const,
    token,
    definition: token.definition,
    value: token.value,
    position: token.position,
    endPosition: token.endPosition,
    types: token.types,
  });
}

/** The token a shadow token hides; any other token unchanged. */
export function unshadow(token: Token): Token {
  return token.kind === "shadow" ? token.token : token;
}

/** A copy of `token` that also carries `types`. */
export function withTypes(token: Token, ...types: TokenType[]): Token {
  if (types.every((type) => token.types.has(type))) return token;
  const merged: ReadonlySet<TokenType> = new Set([...token.types, ...types]);
  return Object.freeze({ ...token, types: merged });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isShadowToken(token: Token): token is ShadowToken {
  return token.kind === "shadow";
}

export function isTokenGroup(token: Token): token is TokenGroup {
  return token.kind === "group";
}

/** Strip annotation and index wrappers. */
export function unwrapToken(token: Token): Token {
  let current = token;
  while (current.kind === "annotated" || current.kind === "indexed") {
    current = current.token;
  }
  return current;
}

/** Leaf tokens of `token`, descending through groups and wrappers. */
export function flattenToken(token: Token): Token[] {
  const inner = unwrapToken(token);
  if (inner.kind !== "group") return [token];
  return inner.tokens.flatMap(flattenToken);
}

export function tokenValues(tokens: readonly Token[]): string[] {
  return tokens.map((t) => t.value);
}
