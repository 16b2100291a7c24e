/**
 * Token actions: what the processor puts in place of a matched span.
 *
 * An action gets the match and the state of the pass and returns the
 * tokens to splice in. Returning the match's tokens leaves the span as it
 * was; returning [] deletes it.
 */

import {
  type Token, type Metadata, type TokenDefinition,
  createToken, annotate as annotateToken, withIndex, groupTokens,
} from './token.js';
import { advancePosition } from './token-position.js';
import { type TokenStream } from './token-stream.js';
import { type TokenRuleContext } from './rule-context.js';
import { type TokenRuleMatch } from './rule-match.js';
import { ActionError } from './errors.js';

export interface TokenActionContext {
  /** Immutable stream over the processor input, at the match start. */
  readonly stream: TokenStream;
  /** The context the match was made in, captures included. */
  readonly context: TokenRuleContext;
  readonly input: readonly Token[];
}

export type TokenAction = (match: TokenRuleMatch, ctx: TokenActionContext) => readonly Token[];

export type TokenFilter = (token: Token) => boolean;

/** Keep the matched span, shadow tokens inside it included. */
export const identity: TokenAction = (match, ctx) => ctx.input.slice(match.startIndex, match.endIndex);

export const remove: TokenAction = () => [];

/** Replace the span with `tokens`, whatever its length. */
export function replace(tokens: readonly Token[]): TokenAction {
  const replacement = Object.freeze([...tokens]);
  return () => replacement;
}

export function annotate(metadata: Metadata): TokenAction {
  return match => match.tokens.map(t => annotateToken(t, metadata));
}

/**
 * Number the matched tokens from `start`. A token that already carries an
 * index keeps it; the counter still moves past it.
 */
export function index(start = 0): TokenAction {
  if (!Number.isInteger(start) || start < 0) {
    throw new ActionError('index', `start must be a non-negative integer, got ${start}`);
  }
  return match => match.tokens.map((t, i) => (t.index !== undefined ? t : withIndex(t, start + i)));
}

/** Keep only the tokens `filter` accepts. */
export function filter(filter: TokenFilter): TokenAction {
  return match => match.tokens.filter(t => filter(t));
}

/** Drop the tokens `filter` accepts. */
export function skip(filter: TokenFilter): TokenAction {
  return match => match.tokens.filter(t => !filter(t));
}

/** Drop the tokens `filter` accepts, handing each one to `extractor`. */
export function extract(filter: TokenFilter, extractor: (token: Token) => void): TokenAction {
  return match => {
    const kept: Token[] = [];
    for (const t of match.tokens) {
      if (filter(t)) extractor(t);
      else kept.push(t);
    }
    return kept;
  };
}

export function convert(converter: (token: Token) => Token): TokenAction {
  return match => match.tokens.map(t => converter(t));
}

function splitToken(token: Token, separator: RegExp): Token[] {
  const parts: Token[] = [];
  const push = (from: number, to: number): void => {
    if (to <= from) return;
    parts.push(createToken(token.value.slice(from, to), {
      position: advancePosition(token.position, token.value.slice(0, from)),
      types: token.types,
    }));
  };
  let last = 0;
  for (const m of token.value.matchAll(separator)) {
    const at = m.index ?? 0;
    push(last, at);
    last = at + m[0].length;
  }
  push(last, token.value.length);
  return parts;
}

/**
 * Split every token's value on `separator`. Empty parts are dropped; the
 * parts keep the token's types and get positions inside it.
 */
export function split(separator: RegExp | string): TokenAction {
  const source = typeof separator === 'string' ? separator : separator.source;
  const flags = typeof separator === 'string' ? 'g' : `${separator.flags.replace(/[gy]/g, '')}g`;
  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (err) {
    throw new ActionError('split', `invalid separator /${source}/: ${err instanceof Error ? err.message : String(err)}`);
  }
  return match => match.tokens.flatMap(t => splitToken(t, regex));
}

/** Rewrite the whole span at once. */
export function transform(transformer: (tokens: readonly Token[]) => readonly Token[]): TokenAction {
  return match => transformer(match.tokens);
}

export function wrap(prefix: Token, suffix: Token): TokenAction {
  return match => (match.tokens.length === 0 ? [] : [prefix, ...match.tokens, suffix]);
}

/** Collapse the span into a single group token. */
export function grouping(definition?: TokenDefinition): TokenAction {
  return match => {
    if (match.tokens.length === 0) {
      throw new ActionError('grouping', 'cannot group an empty match');
    }
    return [groupTokens(match.tokens, definition)];
  };
}
