/**
 * Grammar builder: named rule definitions plus ordered (rule, action)
 * registrations, packaged as a reusable processor factory.
 *
 *   const g = grammar()
 *     .defineRule('number', pattern(/\d+/))
 *     .addRule(sequence(referenceRule('number'), value('+'), referenceRule('number')), grouping())
 *     .build();
 *   g.process(tokens);
 */

import { type Token } from './token.js';
import { type TokenRule } from './rule-types.js';
import { TokenRuleContext } from './rule-context.js';
import { type TokenAction, identity } from './actions.js';
import { type Registration, TokenRuleProcessor } from './processor.js';
import { type Logger } from './logger.js';
import { RuleConstructionError } from './errors.js';

export interface Grammar {
  readonly rules: readonly Registration[];
  /** Definitions reference rules resolve against. */
  readonly definitions: ReadonlyMap<string, TokenRule>;
  processor(logger?: Logger): TokenRuleProcessor;
  process(tokens: readonly Token[]): readonly Token[];
}

export class GrammarBuilder {
  private readonly definitions = new Map<string, TokenRule>();
  private readonly registrations: Registration[] = [];

  defineRule(name: string, rule: TokenRule): this {
    if (name.length === 0) throw new RuleConstructionError('definition', 'name must not be empty');
    if (this.definitions.has(name)) {
      throw new RuleConstructionError('definition', `a rule named '${name}' is already defined`);
    }
    this.definitions.set(name, rule);
    return this;
  }

  addRule(rule: TokenRule, action: TokenAction = identity): this {
    this.registrations.push(Object.freeze({ rule, action }));
    return this;
  }

  build(): Grammar {
    const definitions: ReadonlyMap<string, TokenRule> = new Map(this.definitions);
    const rules = Object.freeze([...this.registrations]);

    const processor = (logger?: Logger): TokenRuleProcessor => {
      const p = new TokenRuleProcessor({ context: new TokenRuleContext(definitions), logger });
      for (const { rule, action } of rules) p.addRule(rule, action);
      return p;
    };

    return Object.freeze({
      rules,
      definitions,
      processor,
      process: (tokens: readonly Token[]) => processor().process(tokens),
    });
  }
}

export function grammar(): GrammarBuilder {
  return new GrammarBuilder();
}
