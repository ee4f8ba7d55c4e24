import { ErrorKind, ToolError } from '../errors.js';
import { logger, registerSecret } from '../logging/index.js';
import type { CredentialStore } from './store.js';
import {
  type CredentialPair,
  type CredentialPolicy,
  type CredentialPrompter,
  type CredentialSource,
  isValidPair,
  normalizePair,
} from './types.js';

/**
 * One step of the resolution chain. Returns a pair when this step applies,
 * `undefined` to hand over to the next step.
 */
export interface CredentialStrategy {
  readonly source: CredentialSource;
  resolve(explicit: CredentialPair | undefined, now: number): Promise<CredentialPair | undefined>;
}

export class ExplicitCredentialStrategy implements CredentialStrategy {
  readonly source = 'explicit' as const;

  constructor(private readonly policy: CredentialPolicy) {}

  async resolve(explicit: CredentialPair | undefined): Promise<CredentialPair | undefined> {
    if (!explicit) return undefined;

    if (!isValidPair(explicit, this.policy)) {
      logger.warning('Ignoring explicit credentials that fail the length policy', {
        min_length: this.policy.minLength,
      }, 'credentials');
      return undefined;
    }

    // used as-is; the cached pair is left alone
    const pair = normalizePair(explicit);
    registerSecret(pair.apiKey);
    registerSecret(pair.token);
    return pair;
  }
}

export class CachedCredentialStrategy implements CredentialStrategy {
  readonly source = 'cache' as const;

  constructor(private readonly store: CredentialStore) {}

  async resolve(_explicit: CredentialPair | undefined, now: number): Promise<CredentialPair | undefined> {
    return this.store.get(now)?.pair;
  }
}

export class ProvisionedCredentialStrategy implements CredentialStrategy {
  readonly source = 'environment' as const;

  constructor(
    private readonly store: CredentialStore,
    private readonly policy: CredentialPolicy,
    private readonly provisioned: CredentialPair | undefined
  ) {}

  async resolve(_explicit: CredentialPair | undefined, now: number): Promise<CredentialPair | undefined> {
    if (!this.provisioned) return undefined;

    if (!isValidPair(this.provisioned, this.policy)) {
      logger.warning('Pre-provisioned credentials fail the length policy, skipping', {
        min_length: this.policy.minLength,
      }, 'credentials');
      return undefined;
    }

    const pair = normalizePair(this.provisioned);
    this.store.set(pair, 'environment', now);
    logger.info('Cached pre-provisioned credentials', { source: this.source }, 'credentials');
    return pair;
  }
}

export class InteractiveCredentialStrategy implements CredentialStrategy {
  readonly source = 'interactive' as const;

  constructor(
    private readonly store: CredentialStore,
    private readonly policy: CredentialPolicy,
    private readonly prompter: CredentialPrompter,
    private readonly loginUrl: string
  ) {}

  async resolve(_explicit: CredentialPair | undefined): Promise<CredentialPair> {
    logger.notice('No usable credentials, starting interactive login', { login_url: this.loginUrl }, 'credentials');

    const outcome = await this.prompter.promptForPair(this.loginUrl);

    if (outcome.status === 'unavailable') {
      throw new ToolError(
        ErrorKind.AUTHENTICATION_REQUIRED,
        `Trello credentials required: ${outcome.reason}`,
        { login_url: this.loginUrl },
        'Pass api_key and token arguments, or set TRELLO_API_KEY and TRELLO_TOKEN'
      );
    }

    if (outcome.status === 'aborted') {
      throw new ToolError(
        ErrorKind.AUTHENTICATION_REQUIRED,
        'Trello login was cancelled',
        { login_url: this.loginUrl }
      );
    }

    if (!isValidPair(outcome.pair, this.policy)) {
      throw new ToolError(
        ErrorKind.AUTHENTICATION_REQUIRED,
        `API key and token must each be at least ${this.policy.minLength} characters`,
        { login_url: this.loginUrl }
      );
    }

    // acquiredAt is taken once the human has answered
    const pair = normalizePair(outcome.pair);
    this.store.set(pair, 'interactive', Date.now());
    logger.info('Cached interactively acquired credentials', { source: this.source }, 'credentials');
    return pair;
  }
}
