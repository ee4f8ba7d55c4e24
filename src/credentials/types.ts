export interface CredentialPair {
  apiKey: string;
  token: string;
}

export type CredentialSource = 'explicit' | 'cache' | 'environment' | 'interactive';

export interface CachedCredential {
  pair: CredentialPair;
  acquiredAt: number;
  source: Exclude<CredentialSource, 'explicit' | 'cache'>;
}

export type PromptOutcome =
  | { status: 'provided'; pair: CredentialPair }
  | { status: 'aborted' }
  | { status: 'unavailable'; reason: string };

/**
 * Interactive channel used when no other credential source applies.
 * Production code talks to a terminal; tests substitute a scripted responder.
 */
export interface CredentialPrompter {
  promptForPair(loginUrl: string): Promise<PromptOutcome>;
}

export interface CredentialPolicy {
  minLength: number;
}

export const DEFAULT_CREDENTIAL_POLICY: CredentialPolicy = { minLength: 32 };

export function normalizePair(pair: CredentialPair): CredentialPair {
  return { apiKey: pair.apiKey.trim(), token: pair.token.trim() };
}

export function isValidPair(pair: CredentialPair, policy: CredentialPolicy = DEFAULT_CREDENTIAL_POLICY): boolean {
  const { apiKey, token } = normalizePair(pair);
  return apiKey.length >= policy.minLength && token.length >= policy.minLength;
}
