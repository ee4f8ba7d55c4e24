import { LRUCache } from 'lru-cache';
import type { CredentialPair } from './credentials/index.js';
import { logger } from './logging/index.js';
import type { TrelloBoard } from './trello-client.js';

// ============================================
// BOARD DIRECTORY CACHE (per credential pair)
// ============================================

export interface BoardCacheStats {
  enabled: boolean;
  ttl_seconds: number;
  size: number;
  max: number;
}

/**
 * Short-lived cache of the open boards visible to a credential pair, used by
 * the search fan-out. A TTL of 0 disables it.
 *
 * Visibility follows the token, and one app key is shared by many users, so
 * entries are keyed by key and token together.
 */
function cacheKey(auth: CredentialPair): string {
  return `${auth.apiKey}:${auth.token}`;
}

export class BoardCache {
  private boards: LRUCache<string, TrelloBoard[]> | null;
  private readonly ttlMs: number;

  constructor(ttlMs: number, max = 100) {
    this.ttlMs = ttlMs;
    this.boards = ttlMs > 0
      ? new LRUCache<string, TrelloBoard[]>({
          max,
          ttl: ttlMs,
          updateAgeOnGet: false,
          updateAgeOnHas: false,
        })
      : null;

    logger.info(
      this.boards ? 'Board cache enabled' : 'Board cache disabled (TTL = 0)',
      { ttl_ms: ttlMs, max },
      'cache'
    );
  }

  get(auth: CredentialPair): TrelloBoard[] | undefined {
    const entry = this.boards?.get(cacheKey(auth));
    if (entry) {
      logger.debug('Cache hit: boards', { count: entry.length }, 'cache');
    }
    return entry;
  }

  set(auth: CredentialPair, boards: TrelloBoard[]): void {
    this.boards?.set(cacheKey(auth), boards);
  }

  /** Drops one pair's entry, or every entry when called without one. */
  invalidate(auth?: CredentialPair): void {
    if (!this.boards) return;
    if (auth === undefined) {
      this.boards.clear();
    } else {
      this.boards.delete(cacheKey(auth));
    }
    logger.debug('Invalidated boards cache', { scope: auth === undefined ? 'all' : 'pair' }, 'cache');
  }

  getStats(): BoardCacheStats {
    return {
      enabled: this.boards !== null,
      ttl_seconds: Math.round(this.ttlMs / 1000),
      size: this.boards?.size ?? 0,
      max: this.boards?.max ?? 0,
    };
  }
}
