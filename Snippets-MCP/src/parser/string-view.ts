/**
 * Cursor over a message used to pull out words and quoted phrases.
 *
 * Quoting follows chat-bot conventions: a double quote or one of the
 * typographic pairs below opens a phrase, a backslash escapes the quote
 * characters of that phrase, and any other backslash is kept as-is.
 * Single quotes are ordinary characters.
 */

import {
  ExpectedClosingQuoteError,
  InvalidEndOfQuotedStringError,
  UnexpectedQuoteError,
} from './errors.js';

/** Opening quote → closing quote. */
export const QUOTE_PAIRS: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['‘', '’'],
  ['‚', '‛'],
  ['“', '”'],
  ['„', '‟'],
  ['⹂', '⹂'],
  ['「', '」'],
  ['『', '』'],
  ['〝', '〞'],
  ['﹁', '﹂'],
  ['﹃', '﹄'],
  ['＂', '＂'],
  ['｢', '｣'],
  ['«', '»'],
  ['‹', '›'],
  ['《', '》'],
  ['〈', '〉'],
]);

export const ALL_QUOTES: ReadonlySet<string> = new Set([...QUOTE_PAIRS.keys(), ...QUOTE_PAIRS.values()]);

const WHITESPACE = /^\s$/u;

export function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

export class StringView {
  index = 0;
  previous = 0;
  readonly end: number;

  constructor(readonly buffer: string) {
    this.end = buffer.length;
  }

  get eof(): boolean {
    return this.index >= this.end;
  }

  get current(): string | null {
    return this.eof ? null : this.buffer[this.index];
  }

  undo(): void {
    this.index = this.previous;
  }

  /** @returns whether the cursor moved */
  skipWhitespace(): boolean {
    let pos = 0;
    while (this.index + pos < this.end && isWhitespace(this.buffer[this.index + pos])) {
      pos++;
    }
    this.previous = this.index;
    this.index += pos;
    return this.previous !== this.index;
  }

  skipString(value: string): boolean {
    if (!this.buffer.startsWith(value, this.index)) return false;
    this.previous = this.index;
    this.index += value.length;
    return true;
  }

  /** Everything from the cursor to the end; moves the cursor to the end. */
  readRest(): string {
    const result = this.buffer.slice(this.index);
    this.previous = this.index;
    this.index = this.end;
    return result;
  }

  read(n: number): string {
    const result = this.buffer.slice(this.index, this.index + n);
    this.previous = this.index;
    this.index += n;
    return result;
  }

  /**
   * Advance one character and return the character now under the cursor,
   * or null when that runs past the end.
   */
  get(): string | null {
    const result = this.index + 1 < this.end ? this.buffer[this.index + 1] : null;
    this.previous = this.index;
    this.index += 1;
    return result;
  }

  /** Maximal run of non-whitespace from the cursor (empty when on whitespace). */
  getWord(): string {
    let pos = 0;
    while (this.index + pos < this.end && !isWhitespace(this.buffer[this.index + pos])) {
      pos++;
    }
    this.previous = this.index;
    const result = this.buffer.slice(this.index, this.index + pos);
    this.index += pos;
    return result;
  }

  /**
   * Read one argument: a quoted phrase or a bare word.
   *
   * @returns null at end of input
   * @throws ExpectedClosingQuoteError | InvalidEndOfQuotedStringError | UnexpectedQuoteError
   */
  getQuotedWord(): string | null {
    let current = this.current;
    if (current === null) return null;

    const closeQuote = QUOTE_PAIRS.get(current);
    const result: string[] = [];
    let escapable: ReadonlySet<string>;
    if (closeQuote !== undefined) {
      escapable = new Set([current, closeQuote]);
    } else {
      result.push(current);
      escapable = ALL_QUOTES;
    }

    while (!this.eof) {
      current = this.get();
      if (current === null) {
        if (closeQuote !== undefined) throw new ExpectedClosingQuoteError(closeQuote);
        return result.join('');
      }

      if (current === '\\') {
        const next = this.get();
        if (next === null) {
          if (closeQuote !== undefined) throw new ExpectedClosingQuoteError(closeQuote);
          return result.join('');
        }
        if (escapable.has(next)) {
          result.push(next);
        } else {
          // not an escape we know: keep the backslash, re-read the next char
          this.undo();
          result.push(current);
        }
        continue;
      }

      if (closeQuote === undefined && ALL_QUOTES.has(current)) {
        throw new UnexpectedQuoteError(current);
      }

      if (closeQuote !== undefined && current === closeQuote) {
        const next = this.get();
        if (next !== null && !isWhitespace(next)) {
          throw new InvalidEndOfQuotedStringError(next);
        }
        return result.join('');
      }

      if (closeQuote === undefined && isWhitespace(current)) {
        return result.join('');
      }

      result.push(current);
    }

    return result.join('');
  }

  toString(): string {
    return `<StringView pos: ${this.index} prev: ${this.previous} end: ${this.end} eof: ${this.eof}>`;
  }
}
