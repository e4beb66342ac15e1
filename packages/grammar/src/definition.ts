/**
 * Token definitions: the classifying predicate every token carries.
 *
 * A token can only be created with a definition that accepts its value, so a
 * definition doubles as the token's type.
 */

import { ensures } from "@tokenloom/core";

export interface TokenDefinition {
  /** Human-readable description, used in error messages. */
  readonly description: string;
  /** Whether `word` belongs to this definition. */
  matches(word: string): boolean;
}

export interface CharTokenDefinition extends TokenDefinition {
  readonly type: "char";
  readonly token: string;
}

export interface StringTokenDefinition extends TokenDefinition {
  readonly type: "string";
  readonly token: string;
  readonly ignoreCase: boolean;
}

export interface EscapedTokenDefinition extends TokenDefinition {
  readonly type: "escaped";
  readonly token: string;
}

/** Definitions that accept exactly one literal word. */
export type LiteralTokenDefinition =
  | CharTokenDefinition
  | StringTokenDefinition
  | EscapedTokenDefinition;

/** Matches exactly the single character `c`. */
export function charDefinition(c: string): CharTokenDefinition {
  ensures([...c].length === 1, `Char definition needs exactly one character, got ${JSON.stringify(c)}`);
  return Object.freeze({
    type: "char" as const,
    token: c,
    description: `char ${JSON.stringify(c)}`,
    matches: (word: string) => word === c,
  });
}

/** Matches the string `s`, optionally ignoring case. */
export function stringDefinition(s: string, ignoreCase = false): StringTokenDefinition {
  ensures(s.length > 0, "String definition must not be empty");
  const lowered = s.toLowerCase();
  return Object.freeze({
    type: "string" as const,
    token: s,
    ignoreCase,
    description: `string ${JSON.stringify(s)}${ignoreCase ? " (ignore case)" : ""}`,
    matches: (word: string) => (ignoreCase ? word.toLowerCase() === lowered : word === s),
  });
}

/** Matches the escape sequence of `c`, i.e. a backslash followed by `c`. */
export function escapedDefinition(c: string): EscapedTokenDefinition {
  ensures([...c].length === 1, `Escaped definition needs exactly one character, got ${JSON.stringify(c)}`);
  const escaped = `\\${c}`;
  return Object.freeze({
    type: "escaped" as const,
    token: c,
    description: `escaped ${JSON.stringify(escaped)}`,
    matches: (word: string) => word === escaped,
  });
}

/** Any non-empty word; the definition the reader gives to plain words. */
export const WORD_DEFINITION: TokenDefinition = Object.freeze({
  description: "word",
  matches: (word: string) => word.length > 0,
});

/** A definition backed by an arbitrary predicate. */
export function definition(description: string, predicate: (word: string) => boolean): TokenDefinition {
  return Object.freeze({ description, matches: predicate });
}

export function isLiteralDefinition(value: TokenDefinition): value is LiteralTokenDefinition {
  return "type" in value && (value.type === "char" || value.type === "string" || value.type === "escaped");
}

function literalOf(def: LiteralTokenDefinition): string {
  switch (def.type) {
    case "char":
    case "string":
      return def.token;
    case "escaped":
      return `\\${def.token}`;
  }
}

/**
 * Combine literal definitions into one that matches their concatenation.
 * A single definition is returned unchanged.
 */
export function combineDefinitions(...definitions: TokenDefinition[]): TokenDefinition {
  ensures(definitions.length > 0, "At least one definition is required");
  if (definitions.length === 1) {
    return definitions[0];
  }

  let combined = "";
  for (const def of definitions) {
    ensures(
      isLiteralDefinition(def),
      `Cannot combine non-literal definition (${def.description})`
    );
    combined += literalOf(def);
  }
  return stringDefinition(combined, false);
}
