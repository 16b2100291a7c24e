/**
 * Per-attempt registry of captures and named rules.
 *
 * Captures are written by capture rules when they succeed (last write
 * wins). Rule definitions are installed by the caller (or a grammar) and
 * resolved by reference rules. A context belongs to one top-level
 * matching attempt; `fork()` hands a fresh capture scope to the next one.
 */

import { type Token } from './token.js';
import { type TokenRule } from './rule-types.js';

/** Opaque snapshot of a context's captures. */
export type CaptureCheckpoint = ReadonlyMap<string, readonly Token[]>;

/** Everything bound under one key. Either slot may be empty. */
export interface Binding {
  readonly rule?: TokenRule;
  readonly tokens?: readonly Token[];
}

export class TokenRuleContext {
  // Replaced, never mutated, so a checkpoint is just the current map.
  private captures: CaptureCheckpoint = new Map();
  private readonly rules: Map<string, TokenRule>;

  constructor(rules?: ReadonlyMap<string, TokenRule>) {
    this.rules = new Map(rules);
  }

  static empty(): TokenRuleContext {
    return new TokenRuleContext();
  }

  /** Define (or redefine) a named rule for reference rules to resolve. */
  defineRule(key: string, rule: TokenRule): this {
    this.rules.set(key, rule);
    return this;
  }

  getRule(key: string): TokenRule | undefined {
    return this.rules.get(key);
  }

  /** Store captured tokens under `key`, replacing any earlier capture. */
  captureTokens(key: string, tokens: readonly Token[]): this {
    const next = new Map(this.captures);
    next.set(key, Object.freeze([...tokens]));
    this.captures = next;
    return this;
  }

  getCapturedTokens(key: string): readonly Token[] | undefined {
    return this.captures.get(key);
  }

  binding(key: string): Binding {
    return { rule: this.rules.get(key), tokens: this.captures.get(key) };
  }

  hasBinding(key: string): boolean {
    return this.rules.has(key) || this.captures.has(key);
  }

  captureKeys(): string[] {
    return [...this.captures.keys()];
  }

  ruleKeys(): string[] {
    return [...this.rules.keys()];
  }

  /** Snapshot of every capture, keyed by name. */
  capturesSnapshot(): Record<string, readonly Token[]> {
    return Object.fromEntries(this.captures);
  }

  clearCaptures(): void {
    this.captures = new Map();
  }

  checkpoint(): CaptureCheckpoint {
    return this.captures;
  }

  /** Discard every capture written since `checkpoint` was taken. */
  rollback(checkpoint: CaptureCheckpoint): void {
    this.captures = checkpoint;
  }

  /** A new context sharing these rule definitions, with no captures. */
  fork(): TokenRuleContext {
    return new TokenRuleContext(this.rules);
  }

  /** A new context with the same definitions and the same captures. */
  copy(): TokenRuleContext {
    const copy = this.fork();
    copy.captures = this.captures;
    return copy;
  }
}
