/**
 * Built-in token types and a registry for resolving types by name.
 */

import { type TokenType, tokenType, hierarchyPath } from './token-type.js';
import { TokenError } from './errors.js';

const LITERAL = tokenType('Literal');
const NUMBER = tokenType('NumericLiteral', LITERAL);
const SYNTAX = tokenType('Syntax');
const IDENTIFIER = tokenType('Identifier');
const OPERATOR = tokenType('Operator');
const DELIMITER = tokenType('Delimiter');
const COMMENT = tokenType('Comment');
const WHITESPACE = tokenType('Whitespace');
const SPECIAL = tokenType('Special');

export const StandardTokenTypes = {
  // Literals
  LITERAL,
  NUMBER,
  INTEGER:   tokenType('Integer', NUMBER),
  FLOAT:     tokenType('Float', NUMBER),
  STRING:    tokenType('String', LITERAL),
  CHARACTER: tokenType('Character', LITERAL),
  BOOLEAN:   tokenType('Boolean', LITERAL),
  NULL:      tokenType('Null', LITERAL),
  // Syntax
  SYNTAX,
  KEYWORD:  tokenType('Keyword', SYNTAX),
  MODIFIER: tokenType('Modifier', SYNTAX),
  // Identifiers
  IDENTIFIER,
  TYPE_IDENTIFIER:     tokenType('TypeIdentifier', IDENTIFIER),
  FUNCTION_IDENTIFIER: tokenType('FunctionIdentifier', IDENTIFIER),
  // Operators
  OPERATOR,
  ARITHMETIC_OPERATOR: tokenType('ArithmeticOperator', OPERATOR),
  ASSIGNMENT_OPERATOR: tokenType('AssignmentOperator', OPERATOR),
  COMPARISON_OPERATOR: tokenType('ComparisonOperator', OPERATOR),
  LOGICAL_OPERATOR:    tokenType('LogicalOperator', OPERATOR),
  BITWISE_OPERATOR:    tokenType('BitwiseOperator', OPERATOR),
  ACCESS_OPERATOR:     tokenType('AccessOperator', OPERATOR),
  // Delimiters
  DELIMITER,
  PARENTHESIS:   tokenType('Parenthesis', DELIMITER),
  BRACKET:       tokenType('Bracket', DELIMITER),
  BRACE:         tokenType('Brace', DELIMITER),
  ANGLE_BRACKET: tokenType('AngleBracket', DELIMITER),
  SEPARATOR:     tokenType('Separator', DELIMITER),
  // Comments
  COMMENT,
  SINGLE_LINE_COMMENT:   tokenType('SingleLineComment', COMMENT),
  MULTI_LINE_COMMENT:    tokenType('MultiLineComment', COMMENT),
  DOCUMENTATION_COMMENT: tokenType('DocumentationComment', COMMENT),
  // Whitespace
  WHITESPACE,
  SPACE:   tokenType('Space', WHITESPACE),
  TAB:     tokenType('Tab', WHITESPACE),
  NEWLINE: tokenType('Newline', WHITESPACE),
  // Special
  SPECIAL,
  EOF:   tokenType('EndOfFile', SPECIAL),
  ERROR: tokenType('Error', SPECIAL),
} as const;

export class TokenTypeRegistry {
  private types = new Map<string, TokenType>();

  /** Register an existing type under its own name. Re-registering the same object is a no-op. */
  register(type: TokenType): TokenType {
    const existing = this.types.get(type.name);
    if (existing && existing !== type) {
      throw new TokenError(`Token type '${type.name}' is already registered as ${hierarchyPath(existing)}`);
    }
    this.types.set(type.name, type);
    return type;
  }

  /** Define and register a new type. The parent, if named, must already be registered. */
  define(name: string, parent?: TokenType | string): TokenType {
    const parentType = typeof parent === 'string' ? this.byName(parent) : parent;
    if (typeof parent === 'string' && !parentType) {
      throw new TokenError(`Unknown parent token type '${parent}'`);
    }
    return this.register(tokenType(name, parentType));
  }

  byName(name: string): TokenType | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  all(): TokenType[] {
    return [...this.types.values()];
  }
}

/** Create a registry pre-loaded with the standard types. */
export function createStandardRegistry(): TokenTypeRegistry {
  const registry = new TokenTypeRegistry();
  for (const type of Object.values(StandardTokenTypes)) {
    registry.register(type);
  }
  return registry;
}
