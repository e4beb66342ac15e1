/**
 * Token types: named, optionally hierarchical classifications attached to
 * tokens after reading, e.g. by the `classify` action.
 *
 * @example
 * ```typescript
 * const literal = tokenType("Literal");
 * const integer = tokenType("Integer", literal);
 *
 * isTypeOf(integer, literal);   // true
 * typePath(integer);            // "Literal/Integer"
 * ```
 */

import { ensures } from "@tokenloom/core";

export interface TokenType {
  readonly name: string;
  readonly superType: TokenType | undefined;
}

export function tokenType(name: string, superType?: TokenType): TokenType {
  ensures(name.length > 0, "Token type name must not be empty");
  return Object.freeze({ name, superType });
}

/** Whether `type` is `ancestor` or one of its subtypes. */
export function isTypeOf(type: TokenType, ancestor: TokenType): boolean {
  for (let current: TokenType | undefined = type; current !== undefined; current = current.superType) {
    if (current === ancestor) return true;
  }
  return false;
}

/** The chain from the root type down to `type`. */
export function typeHierarchy(type: TokenType): TokenType[] {
  const chain: TokenType[] = [];
  for (let current: TokenType | undefined = type; current !== undefined; current = current.superType) {
    chain.unshift(current);
  }
  return chain;
}

export function typePath(type: TokenType): string {
  return typeHierarchy(type)
    .map((t) => t.name)
    .join("/");
}
