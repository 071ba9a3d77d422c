/**
 * Token cache for bearer tokens, keyed by (registry id, scope)
 *
 * Expired entries are dropped on read. The table is bounded: once it
 * holds `maxEntries` tokens the least recently used one is evicted.
 */

import { AuthToken } from '../../types';

export class TokenCache {
  // Map iteration order doubles as recency order
  private readonly tokens: Map<string, AuthToken> = new Map();

  constructor(
    private readonly maxEntries: number = 1000,
    private readonly now: () => number = Date.now
  ) {}

  static key(registryId: string, scope: string): string {
    return `${registryId}|${scope}`;
  }

  /**
   * Get a valid token, or undefined when absent or expired
   */
  get(registryId: string, scope: string): AuthToken | undefined {
    const key = TokenCache.key(registryId, scope);
    const token = this.tokens.get(key);
    if (!token) {
      return undefined;
    }

    if (this.isExpired(token)) {
      this.tokens.delete(key);
      return undefined;
    }

    this.tokens.delete(key);
    this.tokens.set(key, token);
    return token;
  }

  set(token: AuthToken): void {
    const key = TokenCache.key(token.registryId, token.scope);
    this.tokens.delete(key);
    this.tokens.set(key, token);

    while (this.tokens.size > this.maxEntries) {
      const oldest = this.tokens.keys().next();
      if (oldest.done) break;
      this.tokens.delete(oldest.value);
    }
  }

  invalidate(registryId: string, scope: string): void {
    this.tokens.delete(TokenCache.key(registryId, scope));
  }

  isExpired(token: AuthToken): boolean {
    return token.expiresAt !== undefined && this.now() >= token.expiresAt;
  }

  clear(): void {
    this.tokens.clear();
  }

  get size(): number {
    return this.tokens.size;
  }
}
