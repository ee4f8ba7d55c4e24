import { default as PQueue } from 'p-queue';
import { ErrorKind, ToolError } from '../errors.js';
import { logger } from '../logging/index.js';
import { CredentialStore } from './store.js';
import {
  CachedCredentialStrategy,
  type CredentialStrategy,
  ExplicitCredentialStrategy,
  InteractiveCredentialStrategy,
  ProvisionedCredentialStrategy,
} from './strategies.js';
import {
  type CredentialPair,
  type CredentialPolicy,
  type CredentialPrompter,
  type CredentialSource,
  DEFAULT_CREDENTIAL_POLICY,
} from './types.js';

export interface CredentialResolverOptions {
  store: CredentialStore;
  prompter: CredentialPrompter;
  loginUrl: string;
  provisioned?: CredentialPair;
  policy?: CredentialPolicy;
}

export interface ResolvedCredentials {
  pair: CredentialPair;
  source: CredentialSource;
}

export interface SessionInfo {
  has_cached_credentials: boolean;
  source: string | null;
  acquired_at: string | null;
  cache_duration_minutes: number;
  login_url: string;
}

/**
 * Resolves the credential pair for one operation:
 * explicit → cached → pre-provisioned → interactive.
 *
 * Everything after the explicit step runs inside a single-concurrency queue,
 * so at most one interactive prompt is open and concurrent callers pick up
 * whatever it cached.
 */
export class CredentialResolver {
  private readonly store: CredentialStore;
  private readonly loginUrl: string;
  private readonly explicit: CredentialStrategy;
  private readonly chain: CredentialStrategy[];
  private readonly lock = new PQueue({ concurrency: 1 });

  constructor(options: CredentialResolverOptions) {
    const policy = options.policy ?? DEFAULT_CREDENTIAL_POLICY;
    this.store = options.store;
    this.loginUrl = options.loginUrl;
    this.explicit = new ExplicitCredentialStrategy(policy);
    this.chain = [
      new CachedCredentialStrategy(options.store),
      new ProvisionedCredentialStrategy(options.store, policy, options.provisioned),
      new InteractiveCredentialStrategy(options.store, policy, options.prompter, options.loginUrl),
    ];
  }

  async resolve(explicit?: CredentialPair): Promise<CredentialPair> {
    return (await this.resolveWithSource(explicit)).pair;
  }

  async resolveWithSource(explicit?: CredentialPair): Promise<ResolvedCredentials> {
    const direct = await this.explicit.resolve(explicit, Date.now());
    if (direct) {
      return { pair: direct, source: this.explicit.source };
    }

    return this.lock.add(() => this.runChain(), { throwOnTimeout: true });
  }

  private async runChain(): Promise<ResolvedCredentials> {
    for (const strategy of this.chain) {
      const pair = await strategy.resolve(undefined, Date.now());
      if (pair) {
        logger.debug('Resolved credentials', { source: strategy.source }, 'credentials');
        return { pair, source: strategy.source };
      }
    }

    throw new ToolError(ErrorKind.AUTHENTICATION_REQUIRED, 'No Trello credentials available', {
      login_url: this.loginUrl,
    });
  }

  /** Drops the cached pair; the next resolve re-runs the chain. */
  clear(): void {
    this.store.clear();
    logger.info('Cached credentials cleared', undefined, 'credentials');
  }

  getSessionInfo(): SessionInfo {
    const cached = this.store.get();
    return {
      has_cached_credentials: cached !== null,
      source: cached?.source ?? null,
      acquired_at: cached ? new Date(cached.acquiredAt).toISOString() : null,
      cache_duration_minutes: Math.round(this.store.getTtlMs() / 60000),
      login_url: this.loginUrl,
    };
  }
}
