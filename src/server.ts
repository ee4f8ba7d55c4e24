import type { AxiosAdapter } from 'axios';
import { BoardCache } from './cache.js';
import type { AppConfig } from './config.js';
import {
  type CredentialPrompter,
  CredentialResolver,
  CredentialStore,
  TerminalPrompter,
} from './credentials/index.js';
import { ToolDispatcher } from './dispatcher.js';
import { ProtocolHandler } from './protocol.js';
import { RateLimiter } from './rate-limiter.js';
import { ToolRegistry } from './registry.js';
import { type TrelloApi, TrelloClient } from './trello-client.js';

export interface ServerComponents {
  registry: ToolRegistry;
  resolver: CredentialResolver;
  rateLimiter: RateLimiter;
  boards: BoardCache;
  api: TrelloApi;
  dispatcher: ToolDispatcher;
  handler: ProtocolHandler;
}

export interface ServerOverrides {
  prompter?: CredentialPrompter;
  api?: TrelloApi;
  adapter?: AxiosAdapter;
}

export function createServer(config: AppConfig, overrides: ServerOverrides = {}): ServerComponents {
  const registry = new ToolRegistry();
  const rateLimiter = new RateLimiter({
    maxCalls: config.rateLimit.maxCalls,
    windowMs: config.rateLimit.windowMs,
  });
  const boards = new BoardCache(config.boardCacheTtlMs);

  const resolver = new CredentialResolver({
    store: new CredentialStore(config.credentialTtlMs),
    // stdin belongs to the protocol under the stdio transport
    prompter: overrides.prompter ?? new TerminalPrompter({
      minLength: config.credentialMinLength,
      enabled: config.transport !== 'stdio',
    }),
    loginUrl: config.loginUrl,
    provisioned: config.provisioned,
    policy: { minLength: config.credentialMinLength },
  });

  const api = overrides.api ?? new TrelloClient({
    baseUrl: config.apiUrl,
    timeoutMs: config.requestTimeoutMs,
    rateLimiter,
    retryBackoffMs: config.rateLimit.backoffMs,
    adapter: overrides.adapter,
  });

  const dispatcher = new ToolDispatcher({ registry, resolver, api, boards });
  const handler = new ProtocolHandler({ registry, dispatcher });

  return { registry, resolver, rateLimiter, boards, api, dispatcher, handler };
}
