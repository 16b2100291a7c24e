/**
 * Token streams: cursors over a fixed token sequence.
 *
 * Reads skip shadow tokens: `current()` and `next()` look at the first
 * visible token at or after the cursor. Two realizations share that logic:
 *
 * - MutableTokenStream advances in place (`read()`, `advanceTo()` return it).
 * - ImmutableTokenStream never changes; every advance returns a new stream.
 *
 * Code that only uses the TokenStream interface and the streams returned
 * from `next()` / `advanceTo()` works with either.
 */

import { type Token } from './token.js';
import { StreamExhaustedError, TokenStreamError } from './errors.js';

export interface ReadResult {
  token: Token;
  /** The stream positioned after `token`. */
  stream: TokenStream;
}

export interface TokenStream {
  readonly tokens: readonly Token[];
  readonly size: number;
  readonly currentIndex: number;
  readonly mutable: boolean;
  isEmpty(): boolean;
  hasMore(): boolean;
  current(): Token;
  next(): ReadResult;
  advanceTo(index: number): TokenStream;
  copyWithIndex(index: number): TokenStream;
  reversed(): TokenStream;
  lookaheadView(): TokenStream;
  lookbehindView(): TokenStream;
}

function checkIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new TokenStreamError(`Stream index must be a non-negative integer, got ${index}`);
  }
}

abstract class BaseTokenStream implements TokenStream {
  readonly tokens: readonly Token[];
  abstract readonly mutable: boolean;
  protected index: number;

  constructor(tokens: readonly Token[], index: number) {
    checkIndex(index);
    this.tokens = Object.isFrozen(tokens) ? tokens : Object.freeze([...tokens]);
    this.index = index;
  }

  get size(): number {
    return this.tokens.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  /** Index of the first non-shadow token at or after the cursor, or `size`. */
  protected nextVisibleIndex(): number {
    let i = this.index;
    while (i < this.tokens.length && this.tokens[i].shadow) i++;
    return i;
  }

  hasMore(): boolean {
    return this.nextVisibleIndex() < this.tokens.length;
  }

  current(): Token {
    const i = this.nextVisibleIndex();
    if (i >= this.tokens.length) throw new StreamExhaustedError(this.index);
    return this.tokens[i];
  }

  next(): ReadResult {
    const i = this.nextVisibleIndex();
    if (i >= this.tokens.length) throw new StreamExhaustedError(this.index);
    return { token: this.tokens[i], stream: this.atIndex(i + 1) };
  }

  advanceTo(index: number): TokenStream {
    return this.atIndex(Math.min(Math.max(index, 0), this.tokens.length));
  }

  copyWithIndex(index: number): TokenStream {
    checkIndex(index);
    return this.create(this.tokens, index);
  }

  reversed(): TokenStream {
    const reversedTokens = Object.freeze([...this.tokens].reverse());
    return this.create(reversedTokens, Math.max(0, this.tokens.length - 1 - this.index));
  }

  lookaheadView(): TokenStream {
    return this.create(Object.freeze(this.tokens.slice(this.index)), 0);
  }

  lookbehindView(): TokenStream {
    const end = Math.min(this.index, this.tokens.length);
    return this.create(Object.freeze(this.tokens.slice(0, end).reverse()), 0);
  }

  toString(): string {
    return `${this.constructor.name}(${this.index}/${this.tokens.length})`;
  }

  /** The stream at `index`: itself when mutable, a new stream otherwise. */
  protected abstract atIndex(index: number): TokenStream;
  protected abstract create(tokens: readonly Token[], index: number): TokenStream;
}

export class MutableTokenStream extends BaseTokenStream {
  readonly mutable = true;

  /** Consume and return the next visible token. */
  read(): Token {
    return this.next().token;
  }

  moveBy(offset: number): this {
    this.advanceTo(this.index + offset);
    return this;
  }

  reset(): this {
    this.index = 0;
    return this;
  }

  protected atIndex(index: number): TokenStream {
    this.index = index;
    return this;
  }

  protected create(tokens: readonly Token[], index: number): TokenStream {
    return new MutableTokenStream(tokens, index);
  }
}

export class ImmutableTokenStream extends BaseTokenStream {
  readonly mutable = false;

  protected atIndex(index: number): TokenStream {
    return index === this.index ? this : new ImmutableTokenStream(this.tokens, index);
  }

  protected create(tokens: readonly Token[], index: number): TokenStream {
    return new ImmutableTokenStream(tokens, index);
  }
}

export function createMutableStream(tokens: readonly Token[], index = 0): MutableTokenStream {
  return new MutableTokenStream(tokens, index);
}

export function createImmutableStream(tokens: readonly Token[], index = 0): ImmutableTokenStream {
  return new ImmutableTokenStream(tokens, index);
}

export const EMPTY_STREAM: TokenStream = new ImmutableTokenStream([], 0);
