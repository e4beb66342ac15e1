/**
 * Source positions attached to tokens by a reader.
 */

import { ensures } from "@tokenloom/core";

/**
 * Zero-based location of a token's first character. Both character counts
 * are in code points, so a character outside the Basic Multilingual Plane
 * counts once.
 */
export interface TokenPosition {
  readonly line: number;
  readonly characterInLine: number;
  readonly absoluteCharacter: number;
}

/** Sentinel for tokens that were not read from source text. */
export const UNPOSITIONED: TokenPosition = Object.freeze({
  line: -1,
  characterInLine: -1,
  absoluteCharacter: -1,
});

/** Create a position; every coordinate must be a non-negative integer. */
export function tokenPosition(
  line: number,
  characterInLine: number,
  absoluteCharacter: number
): TokenPosition {
  ensures(Number.isInteger(line) && line >= 0, `Line must be a non-negative integer, got ${line}`);
  ensures(
    Number.isInteger(characterInLine) && characterInLine >= 0,
    `Character in line must be a non-negative integer, got ${characterInLine}`
  );
  ensures(
    Number.isInteger(absoluteCharacter) && absoluteCharacter >= 0,
    `Absolute character must be a non-negative integer, got ${absoluteCharacter}`
  );
  return Object.freeze({ line, characterInLine, absoluteCharacter });
}

export function isPositioned(position: TokenPosition): boolean {
  return position !== UNPOSITIONED && position.absoluteCharacter >= 0;
}

export function samePosition(a: TokenPosition, b: TokenPosition): boolean {
  return (
    a.line === b.line &&
    a.characterInLine === b.characterInLine &&
    a.absoluteCharacter === b.absoluteCharacter
  );
}

/**
 * Position of the character `offset` code points after `start`, walking over
 * `text` (the characters starting at `start`). `\n` moves to the next line.
 */
export function shiftPosition(start: TokenPosition, text: string, offset: number): TokenPosition {
  if (!isPositioned(start)) return UNPOSITIONED;

  const chars = [...text];
  let line = start.line;
  let column = start.characterInLine;
  for (let i = 0; i < offset && i < chars.length; i++) {
    if (chars[i] === "\n") {
      line++;
      column = 0;
    } else {
      column++;
    }
  }
  return tokenPosition(line, column, start.absoluteCharacter + offset);
}

/** Position of the last character of `value` when it starts at `start`. */
export function endPositionOf(start: TokenPosition, value: string): TokenPosition {
  return shiftPosition(start, value, Math.max(0, [...value].length - 1));
}
