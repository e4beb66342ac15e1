/**
 * Token stream: a cursor over an immutable token list.
 *
 * The engine mutates one stream across a whole pass; rules match on copies
 * from `lookahead()` and only move the caller's stream once they succeed, so
 * a failed attempt never needs to be rolled back.
 *
 * Shadow tokens stay in the list and count towards `size` and `index`, but
 * every read skips them: `current`, `read`, `peek` and `hasMore` only see
 * the other tokens.
 */

import { PreconditionError, requires } from "@tokenloom/core";
import type { Token } from "./tokens.js";

/** Thrown when reading past the last token of a stream. */
export class EndOfTokenStreamError extends PreconditionError {
  /** Index at which the read was attempted. */
  readonly index: number;

  constructor(index: number, size: number) {
    super(`No token at index ${index} (stream size ${size})`);
    this.name = "EndOfTokenStreamError";
    this.index = index;
  }
}

export class TokenStream {
  readonly tokens: readonly Token[];
  private position: number;

  private constructor(tokens: readonly Token[], index: number) {
    this.tokens = tokens;
    this.position = index;
  }

  /** Create a stream at `index`, which must lie in `[0, tokens.length]`. */
  static of(tokens: readonly Token[], index = 0): TokenStream {
    requires(
      Number.isInteger(index) && index >= 0 && index <= tokens.length,
      `Stream index ${index} is outside [0, ${tokens.length}]`
    );
    return new TokenStream(Object.isFrozen(tokens) ? tokens : Object.freeze([...tokens]), index);
  }

  get size(): number {
    return this.tokens.length;
  }

  get index(): number {
    return this.position;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  /** First index at or after `from` that does not hold a shadow token. */
  private visibleFrom(from: number): number {
    let i = from;
    while (i < this.tokens.length && this.tokens[i].kind === "shadow") i++;
    return i;
  }

  /** Last index at or before `from` that does not hold a shadow token, or -1. */
  private visibleBefore(from: number): number {
    let i = from;
    while (i >= 0 && this.tokens[i].kind === "shadow") i--;
    return i;
  }

  hasMore(): boolean {
    return this.visibleFrom(this.position) < this.tokens.length;
  }

  current(): Token {
    const i = this.visibleFrom(this.position);
    if (i >= this.tokens.length) {
      throw new EndOfTokenStreamError(this.position, this.tokens.length);
    }
    return this.tokens[i];
  }

  /** Return the current token and move past it and any shadow tokens before it. */
  read(): Token {
    const token = this.current();
    this.position = this.visibleFrom(this.position) + 1;
    return token;
  }

  /**
   * Token `offset` places from the current one, counting only tokens that
   * are not shadowed, or `undefined` outside the stream.
   */
  peek(offset = 0): Token | undefined {
    let i: number;
    if (offset >= 0) {
      i = this.visibleFrom(this.position);
      for (let n = 0; n < offset && i < this.tokens.length; n++) i = this.visibleFrom(i + 1);
    } else {
      i = this.position;
      for (let n = 0; n > offset && i >= 0; n--) i = this.visibleBefore(i - 1);
    }
    return i >= 0 && i < this.tokens.length ? this.tokens[i] : undefined;
  }

  previous(): Token | undefined {
    return this.peek(-1);
  }

  /** Read `n` tokens. */
  advance(n = 1): void {
    requires(Number.isInteger(n) && n >= 0, `Cannot advance by ${n}`);
    let target = this.position;
    for (let read = 0; read < n; read++) {
      const i = this.visibleFrom(target);
      requires(
        i < this.tokens.length,
        `Cannot advance by ${n} from index ${this.position} (stream size ${this.tokens.length})`
      );
      target = i + 1;
    }
    this.position = target;
  }

  /** Move past the shadow tokens at the current index and return them. */
  skipShadows(): readonly Token[] {
    const end = this.visibleFrom(this.position);
    const skipped = this.slice(this.position, end);
    this.position = end;
    return skipped;
  }

  /** Move forward to an index, or to another stream's index. */
  advanceTo(target: number | TokenStream): void {
    const index = typeof target === "number" ? target : target.index;
    requires(
      Number.isInteger(index) && index >= this.position && index <= this.tokens.length,
      `Cannot move from index ${this.position} to ${index} (stream size ${this.tokens.length})`
    );
    this.position = index;
  }

  /** Independent cursor over the same tokens at the same index. */
  lookahead(): TokenStream {
    return new TokenStream(this.tokens, this.position);
  }

  /**
   * Stream over the tokens before the current index, nearest first. A rule
   * matched against it sees the preceding tokens in reverse order.
   */
  lookbehind(): TokenStream {
    return new TokenStream(Object.freeze(this.tokens.slice(0, this.position).reverse()), 0);
  }

  copyWithIndex(index: number): TokenStream {
    return TokenStream.of(this.tokens, index);
  }

  resetToStart(): void {
    this.position = 0;
  }

  /** Tokens from `start` up to, not including, `end`. */
  slice(start: number, end: number): readonly Token[] {
    return Object.freeze(this.tokens.slice(start, end));
  }
}
