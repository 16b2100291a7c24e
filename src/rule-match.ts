/**
 * Rule evaluation.
 *
 * `evaluate` is the single dispatch over rule kinds. It works on an
 * immutable view of the caller's stream, so the caller's cursor never
 * moves; `matchRule` commits a successful match by advancing the stream.
 * Captures written during an evaluation that fails are rolled back.
 */

import { type Token, isGroup } from './token.js';
import { hasType } from './token-type.js';
import { isPositioned } from './token-position.js';
import { type TokenStream, createImmutableStream } from './token-stream.js';
import { TokenRuleContext } from './rule-context.js';
import {
  type TokenRule, type SingleTokenRule, type AnchorKind, type ReferenceRule,
  isSingleTokenRule,
} from './rule-types.js';
import { RuleConstructionError, UnboundLazyRuleError } from './errors.js';

export interface TokenRuleMatch {
  readonly startIndex: number;
  readonly endIndex: number;
  readonly tokens: readonly Token[];
  /** The rule that produced the match. */
  readonly rule: TokenRule;
}

export function createMatch(startIndex: number, endIndex: number, tokens: readonly Token[], rule: TokenRule): TokenRuleMatch {
  if (endIndex < startIndex) {
    throw new RangeError(`Match end ${endIndex} precedes start ${startIndex}`);
  }
  return Object.freeze({
    startIndex,
    endIndex,
    tokens: Object.isFrozen(tokens) ? tokens : Object.freeze([...tokens]),
    rule,
  });
}

export function emptyMatch(index: number, rule: TokenRule): TokenRuleMatch {
  return createMatch(index, index, [], rule);
}

export function isZeroWidth(match: TokenRuleMatch): boolean {
  return match.startIndex === match.endIndex;
}

export function matchedValues(match: TokenRuleMatch): string[] {
  return match.tokens.map(t => t.value);
}

function relabel(match: TokenRuleMatch | undefined, rule: TokenRule): TokenRuleMatch | undefined {
  return match && createMatch(match.startIndex, match.endIndex, match.tokens, rule);
}

/**
 * Evaluate `rule` at the stream's current index. Never moves `stream`,
 * mutable or not. Returns undefined when the rule does not match.
 */
export function evaluate(
  rule: TokenRule,
  stream: TokenStream,
  context: TokenRuleContext = TokenRuleContext.empty(),
): TokenRuleMatch | undefined {
  const probe = stream.mutable ? createImmutableStream(stream.tokens, stream.currentIndex) : stream;
  return run(rule, probe, context);
}

/**
 * Evaluate `rule` and, on success, advance `stream` to the end of the
 * match. An immutable stream is left as is; continue from `endIndex`.
 */
export function matchRule(
  rule: TokenRule,
  stream: TokenStream,
  context: TokenRuleContext = TokenRuleContext.empty(),
): TokenRuleMatch | undefined {
  const match = evaluate(rule, stream, context);
  if (match) stream.advanceTo(match.endIndex);
  return match;
}

// `stream` is always immutable from here on.
function run(rule: TokenRule, stream: TokenStream, ctx: TokenRuleContext): TokenRuleMatch | undefined {
  const checkpoint = ctx.checkpoint();
  const match = dispatch(rule, stream, ctx);
  if (!match) ctx.rollback(checkpoint);
  return match;
}

function dispatch(rule: TokenRule, stream: TokenStream, ctx: TokenRuleContext): TokenRuleMatch | undefined {
  if (isSingleTokenRule(rule)) return matchSingle(rule, stream);

  switch (rule.kind) {
    case 'always':
      return emptyMatch(stream.currentIndex, rule);

    case 'never':
      return undefined;

    case 'sequence': {
      const tokens: Token[] = [];
      let cur = stream;
      for (const r of rule.rules) {
        const m = run(r, cur, ctx);
        if (!m) return undefined;
        tokens.push(...m.tokens);
        cur = cur.advanceTo(m.endIndex);
      }
      return createMatch(stream.currentIndex, cur.currentIndex, tokens, rule);
    }

    case 'anyOf':
      for (const r of rule.rules) {
        const m = run(r, stream, ctx);
        if (m) return relabel(m, rule);
      }
      return undefined;

    case 'allOf': {
      if (!stream.hasMore()) return undefined;
      const { token, stream: after } = stream.next();
      for (const r of rule.rules) {
        const m = run(r, stream, ctx);
        if (!m || m.tokens.length !== 1 || m.tokens[0] !== token) return undefined;
      }
      return createMatch(stream.currentIndex, after.currentIndex, [token], rule);
    }

    case 'optional':
      return relabel(run(rule.rule, stream, ctx), rule) ?? emptyMatch(stream.currentIndex, rule);

    case 'repeated': {
      const tokens: Token[] = [];
      let cur = stream;
      let count = 0;
      let stalled = false;
      while (count < rule.max) {
        const m = run(rule.rule, cur, ctx);
        if (!m) break;
        count++;
        // A zero-width iteration would repeat forever, and every further
        // iteration would match too.
        if (m.endIndex === cur.currentIndex) {
          stalled = true;
          break;
        }
        tokens.push(...m.tokens);
        cur = cur.advanceTo(m.endIndex);
      }
      if (count < rule.min && !stalled) return undefined;
      return createMatch(stream.currentIndex, cur.currentIndex, tokens, rule);
    }

    case 'boundary': {
      const start = run(rule.start, stream, ctx);
      if (!start) return undefined;
      const tokens: Token[] = [...start.tokens];
      let cur = stream.advanceTo(start.endIndex);
      for (;;) {
        const end = run(rule.end, cur, ctx);
        if (end) {
          tokens.push(...end.tokens);
          return createMatch(stream.currentIndex, end.endIndex, tokens, rule);
        }
        if (!cur.hasMore()) return undefined;
        const between = run(rule.between, cur, ctx);
        if (!between || between.endIndex === cur.currentIndex) return undefined;
        tokens.push(...between.tokens);
        cur = cur.advanceTo(between.endIndex);
      }
    }

    case 'recursive':
      if (!rule.body) throw new RuleConstructionError('recursive', 'rule has no body');
      return relabel(run(rule.body, stream, ctx), rule);

    case 'lazy':
      if (!rule.target) throw new UnboundLazyRuleError();
      return relabel(run(rule.target, stream, ctx), rule);

    case 'group': {
      if (!stream.hasMore()) return undefined;
      const { token, stream: after } = stream.next();
      if (!isGroup(token)) return undefined;
      const children = createImmutableStream(token.children);
      const m = run(rule.rule, children, ctx);
      if (!m || children.advanceTo(m.endIndex).hasMore()) return undefined;
      return createMatch(stream.currentIndex, after.currentIndex, [token], rule);
    }

    case 'anchor': {
      const holds = anchorHolds(rule.anchor, stream);
      if (holds === undefined || holds === rule.negated) return undefined;
      return emptyMatch(stream.currentIndex, rule);
    }

    case 'lookaround': {
      const view = rule.direction === 'ahead' ? stream.lookaheadView() : stream.lookbehindView();
      const matched = run(rule.rule, view, ctx) !== undefined;
      if (matched !== (rule.mode === 'positive')) return undefined;
      return emptyMatch(stream.currentIndex, rule);
    }

    case 'not':
      return run(rule.rule, stream, ctx) ? undefined : emptyMatch(stream.currentIndex, rule);

    case 'capture': {
      const m = run(rule.rule, stream, ctx);
      if (m) ctx.captureTokens(rule.key, m.tokens);
      return m;
    }

    case 'reference':
      return matchReference(rule, stream, ctx);
  }
}

// ---- Single tokens ----

function testToken(rule: SingleTokenRule, token: Token): boolean {
  switch (rule.kind) {
    case 'any':
      return true;
    case 'value':
      return rule.ignoreCase
        ? token.value.toLowerCase() === rule.literal.toLowerCase()
        : token.value === rule.literal;
    case 'pattern':
      return rule.regex.test(token.value);
    case 'type':
      return rule.types.every(t => hasType(token.types, t));
    case 'length':
      return token.value.length >= rule.min && token.value.length <= rule.max;
    case 'custom':
      return rule.predicate(token);
    case 'definition':
      return token.definition === rule.definition || rule.definition(token.value);
  }
}

function matchSingle(rule: SingleTokenRule, stream: TokenStream): TokenRuleMatch | undefined {
  if (!stream.hasMore()) return undefined;
  const { token, stream: after } = stream.next();
  if (testToken(rule, token) === rule.negated) return undefined;
  return createMatch(stream.currentIndex, after.currentIndex, [token], rule);
}

// ---- Anchors ----

function previousVisible(stream: TokenStream): Token | undefined {
  for (let i = Math.min(stream.currentIndex, stream.size) - 1; i >= 0; i--) {
    const token = stream.tokens[i];
    if (!token.shadow) return token;
  }
  return undefined;
}

function endsWithLineBreak(value: string): boolean {
  return value.endsWith('\n') || value.endsWith('\r');
}

function hasLineBreak(value: string): boolean {
  return value.includes('\n') || value.includes('\r');
}

/** True or false where decidable; undefined when positions are missing. */
function anchorHolds(anchor: AnchorKind, stream: TokenStream): boolean | undefined {
  switch (anchor) {
    case 'startDocument':
      return stream.currentIndex === 0;
    case 'endDocument':
      return !stream.hasMore();
    case 'startLine': {
      if (stream.currentIndex === 0) return true;
      const prev = previousVisible(stream);
      if (!prev || endsWithLineBreak(prev.value)) return true;
      if (!stream.hasMore()) return false;
      const current = stream.current();
      if (!isPositioned(prev.end) || !isPositioned(current.position)) return undefined;
      return prev.end.line !== current.position.line;
    }
    case 'endLine': {
      if (!stream.hasMore()) return true;
      const { token: current, stream: rest } = stream.next();
      if (hasLineBreak(current.value)) return true;
      if (!rest.hasMore()) return false;
      const next = rest.current();
      if (!isPositioned(current.end) || !isPositioned(next.position)) return undefined;
      return current.end.line !== next.position.line;
    }
  }
}

// ---- References ----

function matchTokens(expected: readonly Token[], stream: TokenStream, rule: TokenRule): TokenRuleMatch | undefined {
  const matched: Token[] = [];
  let cur = stream;
  for (const e of expected) {
    if (!cur.hasMore()) return undefined;
    const { token, stream: after } = cur.next();
    if (token.value !== e.value) return undefined;
    matched.push(token);
    cur = after;
  }
  return createMatch(stream.currentIndex, cur.currentIndex, matched, rule);
}

/**
 * A dynamic reference needs exactly one bound slot; a key bound to both a
 * rule and tokens is ambiguous and does not match.
 */
function matchReference(rule: ReferenceRule, stream: TokenStream, ctx: TokenRuleContext): TokenRuleMatch | undefined {
  const { rule: bound, tokens } = ctx.binding(rule.key);
  switch (rule.referenceType) {
    case 'rule':
      return bound && relabel(run(bound, stream, ctx), rule);
    case 'tokens':
      return tokens && matchTokens(tokens, stream, rule);
    case 'dynamic':
      if (bound && tokens) return undefined;
      if (bound) return relabel(run(bound, stream, ctx), rule);
      return tokens && matchTokens(tokens, stream, rule);
  }
}
