/**
 * Error classes.
 *
 * Construction problems, stream misuse and unbound lazy rules are thrown.
 * A rule that simply does not match returns `undefined` and never throws.
 */

export class TokrexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokrexError';
  }
}

/** Invalid arguments given to a rule factory. */
export class RuleConstructionError extends TokrexError {
  constructor(readonly rule: string, message: string) {
    super(`Cannot construct ${rule} rule: ${message}`);
    this.name = 'RuleConstructionError';
  }
}

/** An unbounded repetition over a body that can match without consuming. */
export class ZeroWidthRepetitionError extends RuleConstructionError {
  constructor(body: string) {
    super('repeated', `body ${body} can match zero tokens, unbounded repetition would never terminate`);
    this.name = 'ZeroWidthRepetitionError';
  }
}

export class UnboundLazyRuleError extends TokrexError {
  constructor() {
    super('Lazy rule was evaluated before it was bound to a target rule');
    this.name = 'UnboundLazyRuleError';
  }
}

/** Reading past the last visible token. */
export class StreamExhaustedError extends TokrexError {
  constructor(readonly index: number) {
    super(`No visible token at or after index ${index}`);
    this.name = 'StreamExhaustedError';
  }
}

export class TokenStreamError extends TokrexError {
  constructor(message: string) {
    super(message);
    this.name = 'TokenStreamError';
  }
}

export class TokenError extends TokrexError {
  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

export class ActionError extends TokrexError {
  constructor(readonly action: string, message: string) {
    super(`Action '${action}' failed: ${message}`);
    this.name = 'ActionError';
  }
}
