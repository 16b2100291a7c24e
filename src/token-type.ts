/**
 * Classification tags carried by tokens.
 *
 * Types form a single-parent hierarchy: a token typed INTEGER is also
 * a NUMBER and a LITERAL. Identity is by object reference.
 */

export interface TokenType {
  readonly name: string;
  readonly parent?: TokenType;
}

export function tokenType(name: string, parent?: TokenType): TokenType {
  return Object.freeze(parent ? { name, parent } : { name });
}

/** True if `type` is `other` or one of its descendants. */
export function isInstanceOf(type: TokenType, other: TokenType): boolean {
  let t: TokenType | undefined = type;
  while (t) {
    if (t === other) return true;
    t = t.parent;
  }
  return false;
}

export function baseType(type: TokenType): TokenType {
  let t = type;
  while (t.parent) t = t.parent;
  return t;
}

/** Root first, `type` last. */
export function typeHierarchy(type: TokenType): TokenType[] {
  const chain: TokenType[] = [];
  let t: TokenType | undefined = type;
  while (t) {
    chain.unshift(t);
    t = t.parent;
  }
  return chain;
}

export function hierarchyPath(type: TokenType): string {
  return typeHierarchy(type).map(t => t.name).join('/');
}

/** True if any of `types` is an instance of `required`. */
export function hasType(types: ReadonlySet<TokenType>, required: TokenType): boolean {
  for (const t of types) {
    if (isInstanceOf(t, required)) return true;
  }
  return false;
}
