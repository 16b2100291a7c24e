/**
 * Single left-to-right rewriting pass over a token sequence.
 *
 * At each index the registered rules are tried in registration order. The
 * first match is handed to its action and the action's tokens replace the
 * matched span; reading resumes at the end of the original span. Where
 * nothing matches, the token is copied through. Shadow tokens are copied
 * through without trying any rule.
 */

import { type Token } from './token.js';
import { type TokenStream, createImmutableStream } from './token-stream.js';
import { type TokenRuleContext } from './rule-context.js';
import { type TokenRule } from './rule-types.js';
import { type TokenRuleMatch, evaluate, isZeroWidth } from './rule-match.js';
import { type TokenAction, identity } from './actions.js';
import { type Logger } from './logger.js';
import { type ProcessorOptions, resolveProcessorOptions } from './config.js';

export interface Registration {
  readonly rule: TokenRule;
  readonly action: TokenAction;
}

interface Hit {
  registration: Registration;
  match: TokenRuleMatch;
  context: TokenRuleContext;
}

export class TokenRuleProcessor {
  private readonly registrations: Registration[] = [];
  private readonly context: TokenRuleContext;
  private readonly logger: Logger;

  constructor(options: ProcessorOptions = {}) {
    const resolved = resolveProcessorOptions(options);
    this.context = resolved.context;
    this.logger = resolved.logger.child({ component: 'processor' });
  }

  /** Register `rule`; without an action the matched span is kept as is. */
  addRule(rule: TokenRule, action: TokenAction = identity): this {
    this.registrations.push(Object.freeze({ rule, action }));
    return this;
  }

  get rules(): readonly Registration[] {
    return [...this.registrations];
  }

  /** Run one pass over `tokens`. The input is not modified. */
  process(tokens: readonly Token[]): readonly Token[] {
    const input = Object.freeze([...tokens]);
    const output: Token[] = [];
    let index = 0;
    let rewrites = 0;

    while (index < input.length) {
      const token = input[index];
      const stream = createImmutableStream(input, index);
      const hit = token.shadow ? undefined : this.firstMatch(stream);
      if (!hit) {
        output.push(token);
        index++;
        continue;
      }

      const { registration, match, context } = hit;
      const replacement = registration.action(match, { stream, context, input });
      output.push(...replacement);
      rewrites++;
      this.logger.debug('rule_matched', {
        rule: registration.rule.kind,
        start_index: match.startIndex,
        end_index: match.endIndex,
        replaced: match.endIndex - match.startIndex,
        inserted: replacement.length,
      });

      // A zero-width match would match again at the same index.
      if (isZeroWidth(match)) {
        output.push(token);
        index++;
      } else {
        index = match.endIndex;
      }
    }

    this.logger.debug('process_completed', {
      input_size: input.length,
      output_size: output.length,
      rewrites,
    });
    return Object.freeze(output);
  }

  private firstMatch(stream: TokenStream): Hit | undefined {
    for (const registration of this.registrations) {
      const context = this.context.fork();
      const match = evaluate(registration.rule, stream, context);
      if (match) return { registration, match, context };
    }
    return undefined;
  }
}
