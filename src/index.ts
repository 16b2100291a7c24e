/**
 * tokrex: grammar matching and rewriting over token sequences.
 *
 * Public API surface.
 */

// --- Tokens ---
export {
  type TokenPosition, type Unpositioned, type Position,
  UNPOSITIONED, position, isPositioned, positionEquals,
  advancePosition, endPosition, positionToString,
} from './token-position.js';
export {
  type TokenType,
  tokenType, isInstanceOf, baseType, typeHierarchy, hierarchyPath, hasType,
} from './token-type.js';
export { StandardTokenTypes, TokenTypeRegistry, createStandardRegistry } from './standard-types.js';
export {
  type Token, type GroupToken, type TokenDefinition, type TokenOptions, type Metadata, type Decoration,
  createToken, unpositioned, annotate, withIndex, shadow, unshadow, groupTokens,
  isGroup, unwrap, getMetadata, tokenHasType, isTokenPositioned, sameToken,
  tokenToString, tokensToValues,
} from './token.js';

// --- Streams ---
export {
  type TokenStream, type ReadResult,
  MutableTokenStream, ImmutableTokenStream,
  createMutableStream, createImmutableStream, EMPTY_STREAM,
} from './token-stream.js';

// --- Rules ---
export { TokenRuleContext, type Binding, type CaptureCheckpoint } from './rule-context.js';
export type {
  TokenRule, RuleKind, SingleTokenRule, LazyRule, RecursiveRule, TokenPredicate,
  LookMode, LookDirection, AnchorKind, ReferenceType,
} from './rule-types.js';
export {
  type RuleFactory,
  alwaysMatch, neverMatch, anyToken, value, pattern, ofType,
  lengthBetween, minLength, maxLength, exactLength, custom, definition,
  sequence, anyOf, allOf, optional,
  repeated, atLeast, atMost, exactly, zeroOrMore, oneOrMore,
  boundary, recursive, lazy, bindLazy, isLazyBound, group,
  startDocument, endDocument, startLine, endLine,
  lookahead, negativeLookahead, lookbehind, negativeLookbehind,
  not, capture, reference, referenceRule, referenceTokens,
} from './rules.js';
export { canMatchEmpty, ruleToString } from './rule-analysis.js';
export {
  type TokenRuleMatch,
  evaluate, matchRule, createMatch, emptyMatch, isZeroWidth, matchedValues,
} from './rule-match.js';

// --- Rewriting ---
export type { TokenAction, TokenActionContext, TokenFilter } from './actions.js';
export * as TokenActions from './actions.js';
export { TokenRuleProcessor, type Registration } from './processor.js';
export { grammar, GrammarBuilder, type Grammar } from './grammar.js';

// --- Ambient ---
export {
  TokrexError, RuleConstructionError, ZeroWidthRepetitionError, UnboundLazyRuleError,
  StreamExhaustedError, TokenStreamError, TokenError, ActionError,
} from './errors.js';
export {
  type Logger, type LoggerConfig, type LogLevel, type LogEntry, type LogMetadata, type Environment,
  createLogger, createSilentLogger, isLogLevel,
} from './logger.js';
export {
  type Env, type ProcessorOptions, type ResolvedProcessorOptions,
  resolveEnvironment, resolveLogLevel, createDefaultLogger, resolveProcessorOptions,
} from './config.js';
