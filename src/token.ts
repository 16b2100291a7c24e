/**
 * Tokens, the immutable units rules match against.
 *
 * A token is a single flat record: the core (value, start/end position,
 * definition, types) plus optional decorations (metadata, index, shadow,
 * children). Decorating never mutates; it returns a new token whose
 * `backing` field points at the token it was made from, so the original
 * can always be recovered with `unwrap` / `unshadow`.
 */

import { type Position, UNPOSITIONED, isPositioned, endPosition } from './token-position.js';
import { type TokenType, hasType } from './token-type.js';
import { TokenError } from './errors.js';

/** Predicate a token value satisfies, supplied by the lexer. */
export type TokenDefinition = (value: string) => boolean;

export type Metadata = Readonly<Record<string, unknown>>;

export type Decoration = 'simple' | 'annotated' | 'indexed' | 'shadow' | 'group';

export interface Token {
  readonly value: string;
  readonly position: Position;
  readonly end: Position;
  readonly definition?: TokenDefinition;
  readonly types: ReadonlySet<TokenType>;
  readonly decoration: Decoration;
  readonly metadata?: Metadata;
  readonly index?: number;
  /** Shadow tokens stay in the sequence but are invisible to stream reads. */
  readonly shadow: boolean;
  /** Present only on group tokens. */
  readonly children?: readonly Token[];
  readonly backing?: Token;
}

export interface GroupToken extends Token {
  readonly decoration: 'group';
  readonly children: readonly Token[];
}

export interface TokenOptions {
  position?: Position;
  end?: Position;
  definition?: TokenDefinition;
  types?: Iterable<TokenType>;
}

const NO_TYPES: ReadonlySet<TokenType> = new Set();

// --- Creation ---

/**
 * Create a plain token. Without an explicit `end`, the end position is
 * computed from the start position and the value.
 */
export function createToken(value: string, options: TokenOptions = {}): Token {
  const position = options.position ?? UNPOSITIONED;
  return Object.freeze({
    value,
    position,
    end: options.end ?? endPosition(position, value),
    definition: options.definition,
    types: options.types ? new Set(options.types) : NO_TYPES,
    decoration: 'simple',
    shadow: false,
  });
}

/** Shorthand for a token with no position information. */
export function unpositioned(value: string, ...types: TokenType[]): Token {
  return createToken(value, { types });
}

// --- Decoration ---

function decorate(token: Token, decoration: Decoration, fields: Partial<Token>): Token {
  return Object.freeze({ ...token, ...fields, decoration, backing: token });
}

/** Attach metadata. Annotating an annotated token merges, new keys win. */
export function annotate(token: Token, metadata: Metadata): Token {
  return decorate(token, 'annotated', { metadata: Object.freeze({ ...token.metadata, ...metadata }) });
}

export function withIndex(token: Token, index: number): Token {
  if (!Number.isInteger(index) || index < 0) {
    throw new TokenError(`Token index must be a non-negative integer, got ${index}`);
  }
  return decorate(token, 'indexed', { index });
}

export function shadow(token: Token): Token {
  if (token.decoration === 'shadow') return token;
  return decorate(token, 'shadow', { shadow: true });
}

/**
 * Remove shadow status. A token that is not shadowed is returned as is;
 * a shadow layer returns the token it was applied to.
 */
export function unshadow(token: Token): Token {
  if (!token.shadow) return token;
  if (token.decoration === 'shadow' && token.backing) return token.backing;
  return decorate(token, token.decoration, { shadow: false });
}

/**
 * Group a sequence of tokens into one token. The group's value is the
 * concatenation of the children's values; it is positioned only if every
 * child is.
 */
export function groupTokens(tokens: readonly Token[], definition?: TokenDefinition, types?: Iterable<TokenType>): GroupToken {
  if (tokens.length === 0) {
    throw new TokenError('Cannot group an empty token list');
  }
  const children = Object.freeze([...tokens]);
  const allPositioned = children.every(t => isPositioned(t.position) && isPositioned(t.end));
  const first = children[0];
  const last = children[children.length - 1];
  const groupToken: GroupToken = Object.freeze({
    value: children.map(t => t.value).join(''),
    position: allPositioned ? first.position : UNPOSITIONED,
    end: allPositioned ? last.end : UNPOSITIONED,
    definition,
    types: types ? new Set(types) : NO_TYPES,
    decoration: 'group',
    shadow: false,
    children,
  });
  return groupToken;
}

// --- Inspection ---

export function isGroup(token: Token): token is GroupToken {
  return token.children !== undefined;
}

/** Follow `backing` to the innermost undecorated token. */
export function unwrap(token: Token): Token {
  let t = token;
  while (t.backing) t = t.backing;
  return t;
}

export function getMetadata(token: Token, key: string): unknown {
  return token.metadata?.[key];
}

export function tokenHasType(token: Token, type: TokenType): boolean {
  return hasType(token.types, type);
}

export function isTokenPositioned(token: Token): boolean {
  return isPositioned(token.position);
}

/** Value-level equality: same value and, when both carry one, same start position. */
export function sameToken(a: Token, b: Token): boolean {
  if (a.value !== b.value) return false;
  if (!isPositioned(a.position) || !isPositioned(b.position)) return true;
  return a.position.offset === b.position.offset;
}

export function tokenToString(token: Token): string {
  const flags: string[] = [];
  if (token.shadow) flags.push('shadow');
  if (token.index !== undefined) flags.push(`#${token.index}`);
  if (token.children) flags.push(`group(${token.children.length})`);
  return flags.length > 0 ? `'${token.value}'[${flags.join(',')}]` : `'${token.value}'`;
}

export function tokensToValues(tokens: readonly Token[]): string[] {
  return tokens.map(t => t.value);
}
