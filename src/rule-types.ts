/**
 * Rule variants.
 *
 * A rule is a plain frozen record discriminated by `kind`; evaluation is a
 * single dispatch over the tag (see rule-match.ts). Build rules through the
 * factories in rules.ts, which validate their arguments.
 */

import { type Token, type TokenDefinition } from './token.js';
import { type TokenType } from './token-type.js';

export type LookMode = 'positive' | 'negative';
export type LookDirection = 'ahead' | 'behind';
export type AnchorKind = 'startDocument' | 'endDocument' | 'startLine' | 'endLine';
export type ReferenceType = 'dynamic' | 'rule' | 'tokens';

export type TokenPredicate = (token: Token) => boolean;

// --- Single-token matchers ---
// `negated` inverts the test while still consuming the one token.

export interface AnyRule {
  readonly kind: 'any';
  readonly negated: boolean;
}

export interface ValueRule {
  readonly kind: 'value';
  readonly literal: string;
  readonly ignoreCase: boolean;
  readonly negated: boolean;
}

export interface PatternRule {
  readonly kind: 'pattern';
  /** The pattern as given. */
  readonly source: string;
  /** `source` anchored at both ends. */
  readonly regex: RegExp;
  readonly negated: boolean;
}

export interface TypeRule {
  readonly kind: 'type';
  readonly types: readonly TokenType[];
  readonly negated: boolean;
}

export interface LengthRule {
  readonly kind: 'length';
  readonly min: number;
  readonly max: number;
  readonly negated: boolean;
}

export interface CustomRule {
  readonly kind: 'custom';
  readonly predicate: TokenPredicate;
  readonly negated: boolean;
}

/** A token made from `definition`, or whose value satisfies it. */
export interface DefinitionRule {
  readonly kind: 'definition';
  readonly definition: TokenDefinition;
  readonly negated: boolean;
}

export type SingleTokenRule = AnyRule | ValueRule | PatternRule | TypeRule | LengthRule | CustomRule | DefinitionRule;

// --- Constants ---

export interface AlwaysRule {
  readonly kind: 'always';
}

export interface NeverRule {
  readonly kind: 'never';
}

// --- Combinators ---

export interface SequenceRule {
  readonly kind: 'sequence';
  readonly rules: readonly TokenRule[];
}

export interface AnyOfRule {
  readonly kind: 'anyOf';
  readonly rules: readonly TokenRule[];
}

export interface AllOfRule {
  readonly kind: 'allOf';
  readonly rules: readonly TokenRule[];
}

export interface OptionalRule {
  readonly kind: 'optional';
  readonly rule: TokenRule;
}

export interface RepeatedRule {
  readonly kind: 'repeated';
  readonly rule: TokenRule;
  readonly min: number;
  /** May be Infinity. */
  readonly max: number;
}

export interface BoundaryRule {
  readonly kind: 'boundary';
  readonly start: TokenRule;
  readonly between: TokenRule;
  readonly end: TokenRule;
}

/**
 * Self-referencing rule. Allocated with no body, then patched once the
 * factory has built the body around the node itself.
 */
export interface RecursiveRule {
  readonly kind: 'recursive';
  body?: TokenRule;
}

/** Indirection cell, bound at most once through `bindLazy`. */
export interface LazyRule {
  readonly kind: 'lazy';
  target?: TokenRule;
}

export interface GroupRule {
  readonly kind: 'group';
  readonly rule: TokenRule;
}

// --- Assertions ---

export interface AnchorRule {
  readonly kind: 'anchor';
  readonly anchor: AnchorKind;
  readonly negated: boolean;
}

export interface LookaroundRule {
  readonly kind: 'lookaround';
  readonly direction: LookDirection;
  readonly mode: LookMode;
  readonly rule: TokenRule;
}

export interface NotRule {
  readonly kind: 'not';
  readonly rule: TokenRule;
}

// --- Captures ---

export interface CaptureRule {
  readonly kind: 'capture';
  readonly key: string;
  readonly rule: TokenRule;
}

export interface ReferenceRule {
  readonly kind: 'reference';
  readonly key: string;
  readonly referenceType: ReferenceType;
}

export type TokenRule =
  | AlwaysRule
  | NeverRule
  | SingleTokenRule
  | SequenceRule
  | AnyOfRule
  | AllOfRule
  | OptionalRule
  | RepeatedRule
  | BoundaryRule
  | RecursiveRule
  | LazyRule
  | GroupRule
  | AnchorRule
  | LookaroundRule
  | NotRule
  | CaptureRule
  | ReferenceRule;

export type RuleKind = TokenRule['kind'];

const SINGLE_TOKEN_KINDS: ReadonlySet<RuleKind> = new Set<RuleKind>(['any', 'value', 'pattern', 'type', 'length', 'custom', 'definition']);

export function isSingleTokenRule(rule: TokenRule): rule is SingleTokenRule {
  return SINGLE_TOKEN_KINDS.has(rule.kind);
}
