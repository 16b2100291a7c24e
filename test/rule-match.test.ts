import { describe, it, expect } from 'vitest';
import { type Token, createToken, unpositioned, shadow, groupTokens } from '../src/token.js';
import { position } from '../src/token-position.js';
import { createImmutableStream, createMutableStream } from '../src/token-stream.js';
import { TokenRuleContext } from '../src/rule-context.js';
import { type TokenRule } from '../src/rule-types.js';
import {
  anyToken, value, pattern, ofType, lengthBetween, custom, definition,
  sequence, anyOf, allOf, optional, repeated, zeroOrMore, boundary,
  recursive, lazy, bindLazy, group,
  startDocument, endDocument, startLine, endLine,
  lookahead, negativeLookahead, lookbehind, negativeLookbehind,
  not, capture, reference, referenceRule, referenceTokens,
} from '../src/rules.js';
import { evaluate, matchRule, matchedValues, createMatch, isZeroWidth } from '../src/rule-match.js';
import { StandardTokenTypes as T } from '../src/standard-types.js';
import { UnboundLazyRuleError } from '../src/errors.js';

function toks(...values: string[]): Token[] {
  return values.map(v => unpositioned(v));
}

function chars(text: string): Token[] {
  return toks(...text.split(''));
}

function tok(v: string, line: number, character: number, offset: number): Token {
  return createToken(v, { position: position(line, character, offset) });
}

function at(rule: TokenRule, tokens: readonly Token[], index = 0, ctx = TokenRuleContext.empty()) {
  return evaluate(rule, createImmutableStream(tokens, index), ctx);
}

function span(rule: TokenRule, tokens: readonly Token[], index = 0) {
  const m = at(rule, tokens, index);
  return m && { start: m.startIndex, end: m.endIndex, values: matchedValues(m) };
}

describe('single-token rules', () => {
  it('matches values exactly or ignoring case', () => {
    expect(span(value('a'), toks('a', 'b'))).toEqual({ start: 0, end: 1, values: ['a'] });
    expect(span(value('a'), toks('A'))).toBeUndefined();
    expect(span(value('IF', true), toks('if'))).toEqual({ start: 0, end: 1, values: ['if'] });
    expect(span(value(''), toks(''))).toEqual({ start: 0, end: 1, values: [''] });
  });

  it('matches whole values against patterns', () => {
    expect(span(pattern('\\d+'), toks('123'))?.end).toBe(1);
    expect(span(pattern('\\d+'), toks('12a'))).toBeUndefined();
    expect(span(pattern(/[a-z]+/i), toks('Name'))?.end).toBe(1);
  });

  it('requires every type, respecting the hierarchy', () => {
    const one = [unpositioned('1', T.INTEGER)];
    expect(span(ofType(T.NUMBER, T.LITERAL), one)?.end).toBe(1);
    expect(span(ofType(T.NUMBER, T.KEYWORD), one)).toBeUndefined();
  });

  it('checks value length', () => {
    expect(span(lengthBetween(2, 3), toks('ab'))?.end).toBe(1);
    expect(span(lengthBetween(2, 3), toks('abcd'))).toBeUndefined();
  });

  it('applies custom predicates to the token', () => {
    const dollar = custom(t => t.value.startsWith('$'));
    expect(span(dollar, toks('$x'))?.end).toBe(1);
    expect(span(dollar, toks('x'))).toBeUndefined();
  });

  it('needs a visible token', () => {
    expect(span(anyToken(), [])).toBeUndefined();
    expect(span(anyToken(), [shadow(unpositioned('ws'))])).toBeUndefined();
  });

  it('skips shadow tokens before the match', () => {
    expect(span(value('a'), [shadow(unpositioned(' ')), unpositioned('a')])).toEqual({ start: 0, end: 2, values: ['a'] });
  });

  it('consumes one token when negated', () => {
    expect(span(not(value('a')), toks('b', 'c'))).toEqual({ start: 0, end: 1, values: ['b'] });
    expect(span(not(value('a')), toks('a'))).toBeUndefined();
    expect(span(not(value('a')), [])).toBeUndefined();
  });
});

describe('sequence', () => {
  it('matches contiguously and concatenates tokens', () => {
    expect(span(sequence(value('a'), value('b'), value('c')), toks('a', 'b', 'c', 'd')))
      .toEqual({ start: 0, end: 3, values: ['a', 'b', 'c'] });
  });

  it('counts the tokens of every part', () => {
    const rule = sequence(repeated(value('a'), 1, 3), value('b'));
    expect(span(rule, toks('a', 'a', 'b'))).toEqual({ start: 0, end: 3, values: ['a', 'a', 'b'] });
  });

  it('leaves the cursor where it was on failure', () => {
    const stream = createMutableStream(toks('a', 'b', 'x'));
    expect(matchRule(sequence(value('a'), value('b'), value('c')), stream)).toBeUndefined();
    expect(stream.currentIndex).toBe(0);
  });

  it('spans shadow tokens between parts', () => {
    const input = [unpositioned('a'), shadow(unpositioned(' ')), unpositioned('b')];
    expect(span(sequence(value('a'), value('b')), input)).toEqual({ start: 0, end: 3, values: ['a', 'b'] });
  });
});

describe('anyOf', () => {
  it('returns the first alternative that matches', () => {
    const rule = anyOf(sequence(value('a')), sequence(value('a'), value('b')));
    const m = at(rule, toks('a', 'b'));
    expect(m?.endIndex).toBe(1);
    expect(m?.rule).toBe(rule);
  });

  it('falls through to later alternatives', () => {
    expect(span(anyOf(value('x'), value('b')), toks('b'))?.values).toEqual(['b']);
    expect(span(anyOf(value('x'), value('y')), toks('b'))).toBeUndefined();
  });
});

describe('definition', () => {
  const isA = (v: string) => v === 'a';

  it('matches a token made from the definition', () => {
    const made = createToken('a', { definition: isA });
    const m = at(definition(isA), [made, unpositioned('b')]);
    expect(m?.endIndex).toBe(1);
    expect(m?.tokens).toEqual([made]);
  });

  it('matches by definition identity even when the value disagrees', () => {
    expect(span(definition(isA), [createToken('A', { definition: isA })])?.end).toBe(1);
  });

  it('matches plain tokens whose value satisfies the definition', () => {
    expect(span(definition(isA), toks('b', 'a'), 1)).toEqual({ start: 1, end: 2, values: ['a'] });
    expect(span(definition(isA), toks('b', 'c'))).toBeUndefined();
    expect(span(definition(isA), [])).toBeUndefined();
  });

  it('inverts under not', () => {
    expect(span(not(definition(isA)), toks('b'))?.end).toBe(1);
    expect(span(not(definition(isA)), toks('a'))).toBeUndefined();
  });
});

describe('allOf', () => {
  const ident = [unpositioned('x', T.IDENTIFIER)];

  it('consumes the current token when every rule accepts it', () => {
    expect(span(allOf(ofType(T.IDENTIFIER), value('x')), ident)).toEqual({ start: 0, end: 1, values: ['x'] });
  });

  it('composes inside a sequence', () => {
    const rule = sequence(allOf(value('a'), pattern('a')), value('b'));
    expect(span(rule, toks('a', 'b'))).toEqual({ start: 0, end: 2, values: ['a', 'b'] });
  });

  it('fails when any rule rejects it', () => {
    expect(span(allOf(ofType(T.IDENTIFIER), value('y')), ident)).toBeUndefined();
    expect(span(allOf(anyToken(), value('x')), [])).toBeUndefined();
  });

  it('fails when a rule matches more than the one token', () => {
    expect(span(allOf(value('a'), sequence(value('a'), value('b'))), toks('a', 'b'))).toBeUndefined();
  });
});

describe('optional', () => {
  it('returns the inner match', () => {
    expect(span(optional(value('a')), toks('a'))).toEqual({ start: 0, end: 1, values: ['a'] });
  });

  it('never fails and never advances on an inner failure', () => {
    const stream = createMutableStream(toks('b'));
    const m = matchRule(optional(value('a')), stream);
    expect(m?.tokens).toEqual([]);
    expect(stream.currentIndex).toBe(0);
  });
});

describe('repeated', () => {
  const twoOrMore = repeated(value('x'), 2, Infinity);

  it('fails with fewer than min repetitions', () => {
    expect(span(twoOrMore, toks('x'))).toBeUndefined();
  });

  it('consumes greedily', () => {
    expect(span(twoOrMore, toks('x', 'x', 'x'))).toEqual({ start: 0, end: 3, values: ['x', 'x', 'x'] });
    expect(span(repeated(value('x'), 1, 2), toks('x', 'x', 'x'))?.end).toBe(2);
  });

  it('does not give repetitions back to a following rule', () => {
    expect(span(sequence(zeroOrMore(value('a')), value('a')), toks('a', 'a'))).toBeUndefined();
  });

  it('stops on a zero-width iteration', () => {
    expect(span(repeated(optional(value('a')), 2, 3), toks('b'))).toEqual({ start: 0, end: 0, values: [] });
  });

  it('counts a zero-width iteration towards min', () => {
    const rule = repeated(optional(value('maybe')), 1, 3);
    expect(span(rule, toks('maybe', 'other'))).toEqual({ start: 0, end: 1, values: ['maybe'] });
  });
});

describe('boundary', () => {
  const quoted = boundary(value('"'), value('"'));

  it('matches from start to the first end', () => {
    expect(span(quoted, toks('"', 'a', 'b', '"', 'c', '"'))).toEqual({ start: 0, end: 4, values: ['"', 'a', 'b', '"'] });
    expect(span(quoted, toks('"', '"'))?.end).toBe(2);
  });

  it('fails when the end never comes', () => {
    expect(span(quoted, toks('"', 'a', 'b'))).toBeUndefined();
  });

  it('requires the between rule for every skipped token', () => {
    const letters = boundary(value('"'), value('a'), value('"'));
    expect(span(letters, toks('"', 'a', 'a', '"'))?.end).toBe(4);
    expect(span(letters, toks('"', 'a', 'b', '"'))).toBeUndefined();
  });
});

describe('recursive', () => {
  const parens = recursive(value('('), value(')'), self => anyOf(self, value('x')));

  it('matches balanced nesting', () => {
    expect(span(parens, chars('(((x)))'))).toEqual({ start: 0, end: 7, values: chars('(((x)))').map(t => t.value) });
  });

  it('fails on unbalanced input', () => {
    expect(span(parens, chars('(((x))'))).toBeUndefined();
  });

  it('fails without the opening rule', () => {
    expect(span(parens, chars('x'))).toBeUndefined();
  });

  it('matches empty nestings', () => {
    expect(span(parens, chars('()'))?.end).toBe(2);
    expect(span(parens, chars('(())'))?.end).toBe(4);
    expect(span(recursive(value('['), value('x'), value(']')), chars('[]'))?.end).toBe(2);
  });

  it('supports self reference in the factory form', () => {
    const list = recursive(self => sequence(value('a'), optional(sequence(value(','), self))));
    expect(span(list, chars('a,a,a'))?.end).toBe(5);
    expect(span(list, chars('a,a,'))?.end).toBe(3);
  });
});

describe('lazy', () => {
  it('throws when evaluated before binding', () => {
    expect(() => at(lazy(), toks('a'))).toThrow(UnboundLazyRuleError);
  });

  it('closes cycles once bound', () => {
    const items = lazy();
    bindLazy(items, sequence(value('a'), optional(items)));
    expect(span(items, toks('a', 'a', 'a', 'b'))?.end).toBe(3);
  });
});

describe('group', () => {
  const call = groupTokens(toks('f', '(', ')'));

  it('matches a group whose children match completely', () => {
    const m = at(group(sequence(value('f'), value('('), value(')'))), [call, unpositioned('x')]);
    expect(m?.startIndex).toBe(0);
    expect(m?.endIndex).toBe(1);
    expect(m?.tokens).toEqual([call]);
  });

  it('fails when children are left over', () => {
    expect(at(group(value('f')), [call])).toBeUndefined();
  });

  it('fails on a plain token', () => {
    expect(at(group(value('f')), toks('f'))).toBeUndefined();
  });
});

describe('anchors', () => {
  it('matches document boundaries', () => {
    expect(span(startDocument(), toks('a'), 0)).toEqual({ start: 0, end: 0, values: [] });
    expect(span(startDocument(), toks('a'), 1)).toBeUndefined();
    expect(span(endDocument(), toks('a', 'b'), 2)?.end).toBe(2);
    expect(span(endDocument(), [unpositioned('a'), shadow(unpositioned('b'))], 1)?.end).toBe(1);
    expect(span(endDocument(), toks('a'), 0)).toBeUndefined();
  });

  it('finds line starts from line breaks and positions', () => {
    const lines = [tok('a', 0, 0, 0), tok('\n', 0, 1, 1), tok('b', 1, 0, 2)];
    expect(span(startLine(), lines, 2)?.end).toBe(2);
    expect(span(startLine(), [tok('a', 0, 0, 0), tok('b', 1, 0, 5)], 1)?.end).toBe(1);
    expect(span(startLine(), [tok('a', 0, 0, 0), tok('b', 0, 2, 2)], 1)).toBeUndefined();
    expect(span(not(startLine()), [tok('a', 0, 0, 0), tok('b', 0, 2, 2)], 1)?.end).toBe(1);
  });

  it('finds line ends', () => {
    expect(span(endLine(), [tok('a', 0, 0, 0), tok('b', 1, 0, 5)], 0)?.end).toBe(0);
    expect(span(endLine(), [tok('a', 0, 0, 0), tok('\n', 0, 1, 1)], 1)?.end).toBe(1);
    expect(span(endLine(), toks('a'), 1)?.end).toBe(1);
    expect(span(endLine(), [tok('a', 0, 0, 0), tok('b', 0, 2, 2)], 0)).toBeUndefined();
  });

  it('does not match either way without positions', () => {
    expect(span(startLine(), toks('a', 'b'), 1)).toBeUndefined();
    expect(span(not(startLine()), toks('a', 'b'), 1)).toBeUndefined();
    expect(span(endLine(), toks('a', 'b'), 0)).toBeUndefined();
    expect(span(not(endLine()), toks('a', 'b'), 0)).toBeUndefined();
  });
});

describe('lookaround', () => {
  it('asserts what follows without consuming it', () => {
    expect(span(sequence(value('a'), lookahead(value('b'))), toks('a', 'b'))).toEqual({ start: 0, end: 1, values: ['a'] });
    expect(span(sequence(value('a'), negativeLookahead(value('b'))), toks('a', 'b'))).toBeUndefined();
    expect(span(sequence(value('a'), negativeLookahead(value('b'))), toks('a', 'c'))?.end).toBe(1);
  });

  it('matches lookbehind rules nearest token first', () => {
    expect(span(lookbehind(value('a')), toks('a', 'b'), 1)).toEqual({ start: 1, end: 1, values: [] });
    expect(span(lookbehind(sequence(value('b'), value('a'))), toks('a', 'b', 'c'), 2)?.end).toBe(2);
    expect(span(negativeLookbehind(value('a')), toks('a', 'b'), 0)?.end).toBe(0);
  });

  it('never moves the cursor', () => {
    const rules = [
      lookahead(value('b')), lookahead(value('z')),
      negativeLookahead(value('b')), negativeLookahead(value('z')),
      lookbehind(value('a')), lookbehind(value('z')),
      negativeLookbehind(value('a')), negativeLookbehind(value('z')),
    ];
    for (const rule of rules) {
      const stream = createMutableStream(toks('a', 'b', 'c'), 1);
      matchRule(rule, stream);
      expect(stream.currentIndex).toBe(1);
    }
  });
});

describe('not', () => {
  it('succeeds zero-width where a composite rule fails', () => {
    const notAB = not(sequence(value('a'), value('b')));
    expect(span(notAB, toks('a', 'c'))).toEqual({ start: 0, end: 0, values: [] });
    expect(span(notAB, toks('a', 'b'))).toBeUndefined();
  });
});

describe('capture and reference', () => {
  const ab = sequence(value('a'), value('b'));

  it('round-trips captured tokens', () => {
    const input = toks('a', 'b', 'a', 'b');
    const ctx = TokenRuleContext.empty();
    at(capture('k', ab), input, 0, ctx);
    expect(ctx.getCapturedTokens('k')?.map(t => t.value)).toEqual(['a', 'b']);
    const m = at(reference('k'), input, 2, ctx);
    expect(m?.startIndex).toBe(2);
    expect(m?.endIndex).toBe(4);
    expect(m?.tokens).toEqual([input[2], input[3]]);
  });

  it('references a capture later in the same rule', () => {
    expect(span(sequence(capture('k', ab), reference('k')), toks('a', 'b', 'a', 'b'))?.end).toBe(4);
    expect(span(sequence(capture('k', ab), reference('k')), toks('a', 'b', 'a', 'c'))).toBeUndefined();
  });

  it('returns the inner match from a capture', () => {
    const m = at(capture('k', ab), toks('a', 'b'));
    expect(m?.rule).toBe(ab);
  });

  it('does not leak captures from failed attempts', () => {
    const ctx = TokenRuleContext.empty();
    expect(at(sequence(capture('k', value('a')), value('b')), toks('a', 'c'), 0, ctx)).toBeUndefined();
    expect(ctx.captureKeys()).toEqual([]);

    const alt = anyOf(sequence(capture('j', value('a')), value('b')), value('a'));
    expect(at(alt, toks('a', 'c'), 0, ctx)?.endIndex).toBe(1);
    expect(ctx.captureKeys()).toEqual([]);
  });

  it('resolves rule definitions', () => {
    const ctx = new TokenRuleContext(new Map([['num', pattern('\\d+')]]));
    expect(at(referenceRule('num'), toks('42'), 0, ctx)?.endIndex).toBe(1);
    expect(at(referenceRule('num'), toks('x'), 0, ctx)).toBeUndefined();
  });

  it('fails on an absent key', () => {
    expect(at(reference('missing'), toks('a'))).toBeUndefined();
    expect(at(referenceTokens('missing'), toks('a'))).toBeUndefined();
  });

  it('resolves a dynamic reference through whichever slot is bound', () => {
    const ruleOnly = new TokenRuleContext(new Map([['k', value('test')]]));
    expect(at(reference('k'), toks('test'), 0, ruleOnly)?.endIndex).toBe(1);

    const tokensOnly = TokenRuleContext.empty();
    tokensOnly.captureTokens('k', toks('tokens'));
    expect(at(reference('k'), toks('tokens'), 0, tokensOnly)?.endIndex).toBe(1);
  });

  it('does not match a dynamic reference bound to both a rule and tokens', () => {
    const ctx = new TokenRuleContext(new Map([['k', value('test')]]));
    ctx.captureTokens('k', toks('tokens'));
    expect(at(reference('k'), toks('test'), 0, ctx)).toBeUndefined();
    expect(at(reference('k'), toks('tokens'), 0, ctx)).toBeUndefined();
    expect(at(referenceRule('k'), toks('test'), 0, ctx)?.endIndex).toBe(1);
    expect(at(referenceTokens('k'), toks('tokens'), 0, ctx)?.endIndex).toBe(1);
  });

  it('matches an empty capture zero-width', () => {
    const ctx = TokenRuleContext.empty();
    ctx.captureTokens('k', []);
    expect(at(referenceTokens('k'), toks('a'), 0, ctx)).toMatchObject({ startIndex: 0, endIndex: 0 });
  });
});

describe('matchRule', () => {
  it('advances a mutable stream on success', () => {
    const stream = createMutableStream(toks('a', 'b'));
    expect(matchRule(value('a'), stream)?.endIndex).toBe(1);
    expect(stream.currentIndex).toBe(1);
  });

  it('leaves an immutable stream alone', () => {
    const stream = createImmutableStream(toks('a', 'b'));
    expect(matchRule(value('a'), stream)?.endIndex).toBe(1);
    expect(stream.currentIndex).toBe(0);
  });

  it('does not move a mutable stream through evaluate', () => {
    const stream = createMutableStream(toks('a', 'b'));
    evaluate(sequence(value('a'), value('b')), stream);
    expect(stream.currentIndex).toBe(0);
  });
});

describe('TokenRuleMatch', () => {
  it('is frozen', () => {
    const m = at(value('a'), toks('a'));
    expect(m).toBeDefined();
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m?.tokens)).toBe(true);
  });

  it('rejects an end before the start', () => {
    expect(() => createMatch(2, 1, [], value('a'))).toThrow(RangeError);
  });

  it('reports zero width', () => {
    expect(isZeroWidth(createMatch(1, 1, [], value('a')))).toBe(true);
    expect(isZeroWidth(createMatch(1, 2, toks('a'), value('a')))).toBe(false);
  });
});
