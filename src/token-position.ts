/**
 * Token positions: where a token sits in the text it was lexed from.
 *
 * Lines and characters are 0-indexed. `offset` is the absolute character
 * offset from the start of the text.
 */

import { TokenError } from './errors.js';

export interface TokenPosition {
  readonly positioned: true;
  readonly line: number;
  readonly character: number;
  readonly offset: number;
}

export interface Unpositioned {
  readonly positioned: false;
}

export type Position = TokenPosition | Unpositioned;

export const UNPOSITIONED: Unpositioned = Object.freeze({ positioned: false });

/** Create a position. All components must be non-negative integers. */
export function position(line: number, character: number, offset: number): TokenPosition {
  for (const [label, n] of [['line', line], ['character', character], ['offset', offset]] as const) {
    if (!Number.isInteger(n) || n < 0) {
      throw new TokenError(`Position ${label} must be a non-negative integer, got ${n}`);
    }
  }
  return Object.freeze({ positioned: true, line, character, offset });
}

export function isPositioned(p: Position): p is TokenPosition {
  return p.positioned;
}

export function positionEquals(a: Position, b: Position): boolean {
  if (!a.positioned || !b.positioned) return a.positioned === b.positioned;
  return a.line === b.line && a.character === b.character && a.offset === b.offset;
}

/**
 * Compute the position reached after reading `text` starting at `from`.
 * An unpositioned start stays unpositioned.
 */
export function advancePosition(from: Position, text: string): Position {
  if (!from.positioned) return UNPOSITIONED;
  let { line, character } = from;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      line++;
      character = 0;
    } else {
      character++;
    }
  }
  return position(line, character, from.offset + text.length);
}

/**
 * Position of the last character of `text` read from `from`.
 * Empty text ends where it starts.
 */
export function endPosition(from: Position, text: string): Position {
  if (!from.positioned || text.length === 0) return from;
  return advancePosition(from, text.slice(0, -1));
}

export function positionToString(p: Position): string {
  return p.positioned ? `${p.line + 1}:${p.character + 1}` : '?';
}
