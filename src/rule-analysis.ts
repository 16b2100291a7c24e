/**
 * Static analysis over rule graphs: zero-width detection and rendering.
 *
 * Rule graphs may be cyclic through recursive and lazy nodes, so both walks
 * keep the set of nodes on the current path.
 */

import { type TokenRule } from './rule-types.js';

/**
 * True if `rule` may succeed without consuming a token.
 *
 * A cycle back into a node already on the path counts as "cannot match
 * empty". Unbound lazy rules and references are unknown until match time
 * and are treated the same way.
 */
export function canMatchEmpty(rule: TokenRule, visiting: Set<TokenRule> = new Set()): boolean {
  if (visiting.has(rule)) return false;
  visiting.add(rule);
  try {
    return zeroWidth(rule, visiting);
  } finally {
    visiting.delete(rule);
  }
}

function zeroWidth(rule: TokenRule, visiting: Set<TokenRule>): boolean {
  switch (rule.kind) {
    case 'always':
    case 'optional':
    case 'anchor':
    case 'lookaround':
    case 'not':
      return true;
    case 'never':
    case 'allOf':
    case 'any':
    case 'value':
    case 'pattern':
    case 'type':
    case 'length':
    case 'custom':
    case 'definition':
    case 'group':
    case 'reference':
      return false;
    case 'sequence':
      return rule.rules.every(r => canMatchEmpty(r, visiting));
    case 'anyOf':
      return rule.rules.some(r => canMatchEmpty(r, visiting));
    case 'repeated':
      return rule.min === 0 || canMatchEmpty(rule.rule, visiting);
    case 'boundary':
      return canMatchEmpty(rule.start, visiting) && canMatchEmpty(rule.end, visiting);
    case 'recursive':
      return rule.body !== undefined && canMatchEmpty(rule.body, visiting);
    case 'lazy':
      return rule.target !== undefined && canMatchEmpty(rule.target, visiting);
    case 'capture':
      return canMatchEmpty(rule.rule, visiting);
  }
}

function quote(s: string): string {
  return JSON.stringify(s);
}

function range(min: number, max: number): string {
  if (min === max) return `${min}`;
  return max === Infinity ? `${min}..` : `${min}..${max}`;
}

/** Compact textual form of a rule, for logs and error messages. */
export function ruleToString(rule: TokenRule, visiting: Set<TokenRule> = new Set()): string {
  if (visiting.has(rule)) return `<${rule.kind}>`;
  visiting.add(rule);
  try {
    return render(rule, visiting);
  } finally {
    visiting.delete(rule);
  }
}

function render(rule: TokenRule, visiting: Set<TokenRule>): string {
  const str = (r: TokenRule): string => ruleToString(r, visiting);
  const list = (rules: readonly TokenRule[]): string => rules.map(str).join(', ');
  const neg = (negated: boolean): string => (negated ? '!' : '');

  switch (rule.kind) {
    case 'always':
    case 'never':
      return rule.kind;
    case 'any':
      return `${neg(rule.negated)}any`;
    case 'value':
      return `${neg(rule.negated)}value(${quote(rule.literal)}${rule.ignoreCase ? ', ignoreCase' : ''})`;
    case 'pattern':
      return `${neg(rule.negated)}pattern(/${rule.source}/)`;
    case 'type':
      return `${neg(rule.negated)}type(${rule.types.map(t => t.name).join(', ')})`;
    case 'length':
      return `${neg(rule.negated)}length(${range(rule.min, rule.max)})`;
    case 'custom':
    case 'definition':
      return `${neg(rule.negated)}${rule.kind}`;
    case 'sequence':
    case 'anyOf':
    case 'allOf':
      return `${rule.kind}(${list(rule.rules)})`;
    case 'optional':
    case 'group':
    case 'not':
      return `${rule.kind}(${str(rule.rule)})`;
    case 'repeated':
      return `repeated(${str(rule.rule)}, ${range(rule.min, rule.max)})`;
    case 'boundary':
      return `boundary(${list([rule.start, rule.between, rule.end])})`;
    case 'recursive':
      return `recursive(${rule.body ? str(rule.body) : '?'})`;
    case 'lazy':
      return `lazy(${rule.target ? str(rule.target) : 'unbound'})`;
    case 'anchor':
      return `${neg(rule.negated)}${rule.anchor}`;
    case 'lookaround':
      return `${rule.mode === 'negative' ? '!' : ''}look${rule.direction}(${str(rule.rule)})`;
    case 'capture':
      return `capture(${quote(rule.key)}, ${str(rule.rule)})`;
    case 'reference': {
      const name = rule.referenceType === 'dynamic' ? 'reference'
        : rule.referenceType === 'rule' ? 'referenceRule' : 'referenceTokens';
      return `${name}(${quote(rule.key)})`;
    }
  }
}
