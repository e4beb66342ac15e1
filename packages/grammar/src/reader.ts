/**
 * Token reader: splits text into positioned tokens for the rule engine.
 *
 * Separator characters end the current word. A separator becomes a token of
 * its own when one of the reader's definitions accepts it and is dropped
 * otherwise; the backslash escapes the character after it.
 *
 * @example
 * ```typescript
 * const reader = new TokenReader({
 *   definitions: [charDefinition("("), charDefinition(")")],
 *   allowedChars: /[a-z0-9]/,
 *   separators: " ()",
 * });
 * reader.read("(add 1 2)"); // "(", "add", "1", "2", ")"
 * ```
 */

import { ensures } from "@tokenloom/core";
import { WORD_DEFINITION, type TokenDefinition } from "./definition.js";
import { tokenPosition, type TokenPosition } from "./position.js";
import { escapedToken, simpleToken, type Token } from "./tokens.js";

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Input character the reader does not accept, with its location. */
export class TokenReadError extends Error {
  /** Zero-based code-point offset of the offending character. */
  readonly pos: number;
  /** One-based line and column, for messages. */
  readonly line: number;
  readonly col: number;

  constructor(input: string, position: TokenPosition, problem: string) {
    const line = position.line + 1;
    const col = position.characterInLine + 1;
    const at = position.absoluteCharacter;
    const snippet = [...input].slice(Math.max(0, at - 10), at + 10).join("");
    super(`Read error at line ${line}, col ${col}: ${problem}\n  ...${snippet}...`);
    this.name = "TokenReadError";
    this.pos = at;
    this.line = line;
    this.col = col;
  }
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export interface TokenReaderOptions {
  /** Definitions tried, in order, for separator characters. */
  readonly definitions: readonly TokenDefinition[];
  /** Characters allowed inside words, as a single-character pattern or a predicate. */
  readonly allowedChars: RegExp | ((char: string) => boolean);
  /** Characters that end a word. `\` and `\n` always do. */
  readonly separators: string | Iterable<string>;
}

const ALWAYS_SEPARATORS = ["\\", "\n"];

export class TokenReader {
  private readonly definitions: readonly TokenDefinition[];
  private readonly allowed: (char: string) => boolean;
  private readonly separators: ReadonlySet<string>;

  constructor(options: TokenReaderOptions) {
    const { allowedChars } = options;
    this.definitions = [...options.definitions];
    if (typeof allowedChars === "function") {
      this.allowed = allowedChars;
    } else {
      const single = new RegExp(`^(?:${allowedChars.source})$`, allowedChars.flags.replace(/[gy]/g, ""));
      this.allowed = (char) => single.test(char);
    }
    this.separators = new Set([...options.separators, ...ALWAYS_SEPARATORS]);
    for (const separator of this.separators) {
      ensures([...separator].length === 1, `Separator must be a single character, got ${JSON.stringify(separator)}`);
    }
  }

  read(input: string): Token[] {
    const chars = [...input];
    const tokens: Token[] = [];

    let line = 0;
    let column = 0;
    let offset = 0;
    let word = "";
    let wordStart: TokenPosition | undefined;

    const here = (): TokenPosition => tokenPosition(line, column, offset);
    const step = (char: string): void => {
      if (char === "\n") {
        line++;
        column = 0;
      } else {
        column++;
      }
      offset++;
    };
    const flush = (): void => {
      if (wordStart !== undefined) {
        tokens.push(simpleToken(WORD_DEFINITION, word, wordStart));
      }
      word = "";
      wordStart = undefined;
    };

    for (let i = 0; i < chars.length; i++) {
      const char = chars[i];

      if (char === "\\") {
        flush();
        const start = here();
        if (i + 1 >= chars.length) {
          throw new TokenReadError(input, start, "escape character at end of input");
        }
        const escaped = chars[++i];
        tokens.push(escapedToken(`\\${escaped}`, start));
        step(char);
        step(escaped);
        continue;
      }

      if (this.separators.has(char)) {
        flush();
        const definition = this.definitions.find((d) => d.matches(char));
        if (definition !== undefined) {
          tokens.push(simpleToken(definition, char, here()));
        }
        step(char);
        continue;
      }

      if (!this.allowed(char)) {
        throw new TokenReadError(input, here(), `unexpected character ${JSON.stringify(char)}`);
      }
      wordStart ??= here();
      word += char;
      step(char);
    }
    flush();

    return tokens;
  }
}
