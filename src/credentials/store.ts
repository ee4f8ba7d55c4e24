import { registerSecret } from '../logging/index.js';
import type { CachedCredential, CredentialPair } from './types.js';

export const DEFAULT_CREDENTIAL_TTL_MS = 8 * 60 * 60 * 1000;

/**
 * The single cached credential slot. Only the resolver writes to it; reads
 * treat an entry as absent once `now - acquiredAt >= ttlMs`.
 */
export class CredentialStore {
  private entry: CachedCredential | null = null;

  constructor(private readonly ttlMs: number = DEFAULT_CREDENTIAL_TTL_MS) {}

  get(now: number = Date.now()): CachedCredential | null {
    if (!this.entry) return null;

    if (now - this.entry.acquiredAt >= this.ttlMs) {
      this.entry = null;
      return null;
    }

    return this.entry;
  }

  set(pair: CredentialPair, source: CachedCredential['source'], now: number = Date.now()): CachedCredential {
    registerSecret(pair.apiKey);
    registerSecret(pair.token);
    this.entry = { pair, acquiredAt: now, source };
    return this.entry;
  }

  clear(): void {
    this.entry = null;
  }

  getTtlMs(): number {
    return this.ttlMs;
  }
}
