export { CredentialResolver, type CredentialResolverOptions, type ResolvedCredentials, type SessionInfo } from './resolver.js';
export { CredentialStore, DEFAULT_CREDENTIAL_TTL_MS } from './store.js';
export {
  type CredentialStrategy,
  ExplicitCredentialStrategy,
  CachedCredentialStrategy,
  ProvisionedCredentialStrategy,
  InteractiveCredentialStrategy,
} from './strategies.js';
export { TerminalPrompter, type TerminalPrompterOptions } from './prompter.js';
export {
  type CredentialPair,
  type CachedCredential,
  type CredentialPrompter,
  type CredentialPolicy,
  type CredentialSource,
  type PromptOutcome,
  DEFAULT_CREDENTIAL_POLICY,
  isValidPair,
  normalizePair,
} from './types.js';
