/**
 * Rule factories.
 *
 * Every factory validates its arguments and throws RuleConstructionError
 * on bad input, so a rule value that exists is always usable. Rules are
 * frozen once built; recursive and lazy nodes are frozen when patched.
 */

import { type TokenDefinition } from './token.js';
import { type TokenType } from './token-type.js';
import {
  type TokenRule, type TokenPredicate, type AnchorKind, type LookDirection,
  type LookMode, type ReferenceType, type RecursiveRule, type LazyRule,
  type AlwaysRule, type NeverRule, isSingleTokenRule,
} from './rule-types.js';
import { canMatchEmpty, ruleToString } from './rule-analysis.js';
import { RuleConstructionError, ZeroWidthRepetitionError } from './errors.js';

const ALWAYS: AlwaysRule = Object.freeze({ kind: 'always' });
const NEVER: NeverRule = Object.freeze({ kind: 'never' });

function freeze<T extends TokenRule>(rule: T): T {
  return Object.freeze(rule);
}

function requireRules(name: string, rules: readonly TokenRule[], min: number): readonly TokenRule[] {
  if (rules.length < min) {
    throw new RuleConstructionError(name, `expected at least ${min} rule${min === 1 ? '' : 's'}, got ${rules.length}`);
  }
  return Object.freeze([...rules]);
}

function requireKey(name: string, key: string): string {
  if (key.length === 0) throw new RuleConstructionError(name, 'key must not be empty');
  return key;
}

function isCount(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

function isBound(n: number): boolean {
  return isCount(n) || n === Infinity;
}

// ---- Constants ----

/** Zero-width match at the current index. */
export function alwaysMatch(): TokenRule {
  return ALWAYS;
}

export function neverMatch(): TokenRule {
  return NEVER;
}

// ---- Single-token matchers ----

/** Any one visible token. */
export function anyToken(): TokenRule {
  return freeze({ kind: 'any', negated: false });
}

export function value(literal: string, ignoreCase = false): TokenRule {
  return freeze({ kind: 'value', literal, ignoreCase, negated: false });
}

/**
 * A token whose whole value matches `pattern`. Global and sticky flags
 * are dropped; other flags are kept.
 */
export function pattern(pattern: RegExp | string): TokenRule {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${source})$`, flags);
  } catch (err) {
    throw new RuleConstructionError('pattern', `invalid pattern /${source}/: ${err instanceof Error ? err.message : String(err)}`);
  }
  return freeze({ kind: 'pattern', source, regex, negated: false });
}

/** A token carrying every one of `types` (or a subtype of each). */
export function ofType(...types: TokenType[]): TokenRule {
  if (types.length === 0) throw new RuleConstructionError('type', 'at least one token type is required');
  return freeze({ kind: 'type', types: Object.freeze([...types]), negated: false });
}

/** A token whose value length lies in [min, max]. */
export function lengthBetween(min: number, max: number): TokenRule {
  if (!isCount(min)) throw new RuleConstructionError('length', `min must be a non-negative integer, got ${min}`);
  if (!isBound(max) || max < min) throw new RuleConstructionError('length', `max must be an integer >= min (${min}), got ${max}`);
  return freeze({ kind: 'length', min, max, negated: false });
}

export function minLength(min: number): TokenRule {
  return lengthBetween(min, Infinity);
}

export function maxLength(max: number): TokenRule {
  return lengthBetween(0, max);
}

export function exactLength(length: number): TokenRule {
  return lengthBetween(length, length);
}

export function custom(predicate: TokenPredicate): TokenRule {
  return freeze({ kind: 'custom', predicate, negated: false });
}

/** A token created with `def`, or any token whose value `def` accepts. */
export function definition(def: TokenDefinition): TokenRule {
  return freeze({ kind: 'definition', definition: def, negated: false });
}

// ---- Combinators ----

export function sequence(...rules: TokenRule[]): TokenRule {
  return freeze({ kind: 'sequence', rules: requireRules('sequence', rules, 1) });
}

/** First alternative that matches wins. */
export function anyOf(...rules: TokenRule[]): TokenRule {
  return freeze({ kind: 'anyOf', rules: requireRules('anyOf', rules, 1) });
}

/** Every rule must match exactly the current token, which is consumed once. */
export function allOf(...rules: TokenRule[]): TokenRule {
  return freeze({ kind: 'allOf', rules: requireRules('allOf', rules, 2) });
}

export function optional(rule: TokenRule): TokenRule {
  return freeze({ kind: 'optional', rule });
}

/**
 * Greedy repetition between `min` and `max` times (inclusive). There is no
 * re-trial with fewer repetitions when a following rule fails.
 */
export function repeated(rule: TokenRule, min: number, max: number): TokenRule {
  if (!isCount(min)) throw new RuleConstructionError('repeated', `min must be a non-negative integer, got ${min}`);
  if (!isBound(max) || max < min) throw new RuleConstructionError('repeated', `max must be an integer >= min (${min}), got ${max}`);
  if (max === 0) throw new RuleConstructionError('repeated', 'min and max cannot both be zero');
  if (max === Infinity && canMatchEmpty(rule)) throw new ZeroWidthRepetitionError(ruleToString(rule));
  return freeze({ kind: 'repeated', rule, min, max });
}

export function atLeast(rule: TokenRule, min: number): TokenRule {
  return repeated(rule, min, Infinity);
}

export function atMost(rule: TokenRule, max: number): TokenRule {
  return repeated(rule, 0, max);
}

export function exactly(rule: TokenRule, count: number): TokenRule {
  return repeated(rule, count, count);
}

export function zeroOrMore(rule: TokenRule): TokenRule {
  return repeated(rule, 0, Infinity);
}

export function oneOrMore(rule: TokenRule): TokenRule {
  return repeated(rule, 1, Infinity);
}

/**
 * `start`, then `between` repeatedly until `end` matches. Without a
 * `between` rule any token is skipped.
 */
export function boundary(start: TokenRule, end: TokenRule): TokenRule;
export function boundary(start: TokenRule, between: TokenRule, end: TokenRule): TokenRule;
export function boundary(start: TokenRule, second: TokenRule, third?: TokenRule): TokenRule {
  const [between, end] = third ? [second, third] : [anyToken(), second];
  return freeze({ kind: 'boundary', start, between, end });
}

// ---- Recursion ----

export type RuleFactory = (self: TokenRule) => TokenRule | undefined;

/**
 * A rule that may refer to itself. The factory runs exactly once, with the
 * rule under construction as its argument.
 *
 *   recursive(self => ...)                     body built by the factory
 *   recursive(open, content, close)            open content? close
 *   recursive(open, close, self => content)    open content(self)? close
 *
 * In the open/close forms the content may be absent, so `()` matches.
 */
export function recursive(factory: RuleFactory): TokenRule;
export function recursive(open: TokenRule, content: TokenRule, close: TokenRule): TokenRule;
export function recursive(open: TokenRule, close: TokenRule, contentFactory: RuleFactory): TokenRule;
export function recursive(
  first: TokenRule | RuleFactory,
  second?: TokenRule,
  third?: TokenRule | RuleFactory,
): TokenRule {
  if (typeof first === 'function') return buildRecursive(first);
  if (!second || !third) throw new RuleConstructionError('recursive', 'expected opening, content and closing rules');
  const open = first;
  if (typeof third === 'function') {
    const close = second;
    const contentFactory = third;
    return buildRecursive(self => {
      const content = contentFactory(self);
      return content && sequence(open, optional(content), close);
    });
  }
  const content = second;
  const close = third;
  return buildRecursive(() => sequence(open, optional(content), close));
}

function buildRecursive(factory: RuleFactory): TokenRule {
  const node: RecursiveRule = { kind: 'recursive' };
  const body = factory(node);
  if (!body) throw new RuleConstructionError('recursive', 'factory returned no rule');
  if (body === node) throw new RuleConstructionError('recursive', 'factory returned the recursive rule itself');
  node.body = body;
  return Object.freeze(node);
}

/** Placeholder to be bound later with `bindLazy`. */
export function lazy(): LazyRule {
  return { kind: 'lazy' };
}

export function bindLazy(rule: LazyRule, target: TokenRule): LazyRule {
  if (rule.target) throw new RuleConstructionError('lazy', 'rule is already bound');
  if (target === rule) throw new RuleConstructionError('lazy', 'rule cannot be bound to itself');
  rule.target = target;
  return Object.freeze(rule);
}

export function isLazyBound(rule: LazyRule): boolean {
  return rule.target !== undefined;
}

// ---- Structure ----

/** The current token is a group whose children `rule` matches completely. */
export function group(rule: TokenRule): TokenRule {
  return freeze({ kind: 'group', rule });
}

// ---- Anchors ----

function anchor(kind: AnchorKind): TokenRule {
  return freeze({ kind: 'anchor', anchor: kind, negated: false });
}

export function startDocument(): TokenRule {
  return anchor('startDocument');
}

export function endDocument(): TokenRule {
  return anchor('endDocument');
}

export function startLine(): TokenRule {
  return anchor('startLine');
}

export function endLine(): TokenRule {
  return anchor('endLine');
}

// ---- Lookaround ----

function lookaround(direction: LookDirection, mode: LookMode, rule: TokenRule): TokenRule {
  return freeze({ kind: 'lookaround', direction, mode, rule });
}

export function lookahead(rule: TokenRule): TokenRule {
  return lookaround('ahead', 'positive', rule);
}

export function negativeLookahead(rule: TokenRule): TokenRule {
  return lookaround('ahead', 'negative', rule);
}

/** `rule` is matched against the preceding tokens, nearest first. */
export function lookbehind(rule: TokenRule): TokenRule {
  return lookaround('behind', 'positive', rule);
}

export function negativeLookbehind(rule: TokenRule): TokenRule {
  return lookaround('behind', 'negative', rule);
}

// ---- Negation ----

/**
 * Negate a rule.
 *
 * Single-token matchers keep consuming one token, with the test inverted.
 * Anchors and lookarounds flip polarity. Anything else is wrapped in a
 * zero-width assertion that succeeds where `rule` fails.
 * `not(not(rule))` returns `rule` for a wrapped rule and an equivalent
 * rule otherwise.
 */
export function not(rule: TokenRule): TokenRule {
  if (isSingleTokenRule(rule)) return freeze({ ...rule, negated: !rule.negated });
  switch (rule.kind) {
    case 'always':
      return NEVER;
    case 'never':
      return ALWAYS;
    case 'anchor':
      return freeze({ ...rule, negated: !rule.negated });
    case 'lookaround': {
      const mode: LookMode = rule.mode === 'positive' ? 'negative' : 'positive';
      return freeze({ ...rule, mode });
    }
    case 'not':
      return rule.rule;
    default:
      return freeze({ kind: 'not', rule });
  }
}

// ---- Captures ----

/** Match `rule` and store its tokens under `key`. */
export function capture(key: string, rule: TokenRule): TokenRule {
  return freeze({ kind: 'capture', key: requireKey('capture', key), rule });
}

function referenceOf(key: string, referenceType: ReferenceType): TokenRule {
  return freeze({ kind: 'reference', key: requireKey('reference', key), referenceType });
}

/** Match whatever is bound under `key`: the rule if defined, else the captured tokens. */
export function reference(key: string): TokenRule {
  return referenceOf(key, 'dynamic');
}

export function referenceRule(key: string): TokenRule {
  return referenceOf(key, 'rule');
}

export function referenceTokens(key: string): TokenRule {
  return referenceOf(key, 'tokens');
}
