/**
 * Immutable, insertion-ordered set of HTTP tokens (header names, methods)
 * with ASCII case-insensitive membership.
 *
 * Lookups go through a lower-cased key map, so methods, header names and
 * `Vary` tokens are all compared the same way. The first spelling seen for a
 * token is the one emitted.
 *
 * @example
 * const headers = TokenSet.of(['Content-Type', 'x-requested-with']);
 * headers.has('content-type');             // true
 * headers.difference(['X-Requested-With', 'X-Other']); // ['X-Other']
 * headers.join();                           // "Content-Type, x-requested-with"
 */
export class TokenSet implements Iterable<string> {
  static readonly EMPTY = new TokenSet(new Map());

  private constructor(private readonly byKey: ReadonlyMap<string, string>) {
    Object.freeze(this);
  }

  /**
   * Build a set from raw tokens. Entries are trimmed and blank ones dropped.
   * @param normalize - Applied to the first spelling of each token before it is stored
   */
  static of(tokens: Iterable<string>, normalize?: (token: string) => string): TokenSet {
    const byKey = new Map<string, string>();
    for (const raw of tokens) {
      const token = raw.trim();
      if (token.length === 0) {
        continue;
      }
      const key = toKey(token);
      if (!byKey.has(key)) {
        byKey.set(key, normalize !== undefined ? normalize(token) : token);
      }
    }
    return new TokenSet(byKey);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(token: string): boolean {
    return this.byKey.has(toKey(token.trim()));
  }

  /**
   * The stored spelling of a token, if present
   */
  canonical(token: string): string | undefined {
    return this.byKey.get(toKey(token.trim()));
  }

  /**
   * Tokens from `tokens` that are not members of this set, in their given order
   */
  difference(tokens: Iterable<string>): string[] {
    const missing: string[] = [];
    for (const token of tokens) {
      if (!this.has(token)) {
        missing.push(token);
      }
    }
    return missing;
  }

  /**
   * A new set holding this set's tokens followed by any new ones
   */
  union(tokens: Iterable<string>): TokenSet {
    return TokenSet.of([...this, ...tokens]);
  }

  toArray(): string[] {
    return [...this.byKey.values()];
  }

  join(separator = ', '): string {
    return this.toArray().join(separator);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.byKey.values();
  }
}

function toKey(token: string): string {
  return token.toLowerCase();
}
