import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CredentialResolver, CredentialStore, isValidPair, TerminalPrompter } from '../credentials/index.js';
import { ErrorKind, ToolError } from '../errors.js';
import { OTHER_KEY, OTHER_TOKEN, ScriptedPrompter, TEST_KEY, TEST_PAIR, TEST_TOKEN } from './helpers.js';

const LOGIN_URL = 'https://trello.test/app-key';
const OTHER_PAIR = { apiKey: OTHER_KEY, token: OTHER_TOKEN };

function createResolver(options: {
  prompter?: ScriptedPrompter;
  provisioned?: { apiKey: string; token: string };
  ttlMs?: number;
} = {}) {
  const store = new CredentialStore(options.ttlMs ?? 60_000);
  const prompter = options.prompter ?? new ScriptedPrompter([{ status: 'unavailable', reason: 'no terminal' }]);
  const resolver = new CredentialResolver({
    store,
    prompter,
    loginUrl: LOGIN_URL,
    provisioned: options.provisioned,
  });
  return { store, prompter, resolver };
}

describe('CredentialStore', () => {
  it('expires an entry exactly at the TTL', () => {
    const store = new CredentialStore(1_000);
    store.set(TEST_PAIR, 'interactive', 5_000);

    expect(store.get(5_999)?.pair).toEqual(TEST_PAIR);
    expect(store.get(6_000)).toBeNull();
    expect(store.get(5_500)).toBeNull();
  });
});

describe('isValidPair', () => {
  it('requires both values to reach the minimum length after trimming', () => {
    expect(isValidPair(TEST_PAIR)).toBe(true);
    expect(isValidPair({ apiKey: 'short', token: TEST_TOKEN })).toBe(false);
    expect(isValidPair({ apiKey: `  ${TEST_KEY.slice(0, 31)}  `, token: TEST_TOKEN })).toBe(false);
    expect(isValidPair({ apiKey: 'abcd', token: 'efgh' }, { minLength: 4 })).toBe(true);
  });
});

describe('CredentialResolver', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('uses a valid explicit pair without touching the cache', async () => {
    const { resolver, store, prompter } = createResolver({ provisioned: OTHER_PAIR });

    const resolved = await resolver.resolveWithSource({ apiKey: ` ${TEST_KEY} `, token: TEST_TOKEN });

    expect(resolved).toEqual({ pair: TEST_PAIR, source: 'explicit' });
    expect(store.get()).toBeNull();
    expect(prompter.calls).toBe(0);
  });

  it('passes an explicit pair that fails the length policy to the next step', async () => {
    const { resolver } = createResolver({ provisioned: OTHER_PAIR });

    const resolved = await resolver.resolveWithSource({ apiKey: 'too-short', token: TEST_TOKEN });

    expect(resolved).toEqual({ pair: OTHER_PAIR, source: 'environment' });
  });

  it('caches pre-provisioned credentials on first use without prompting', async () => {
    const { resolver, store, prompter } = createResolver({ provisioned: TEST_PAIR });

    expect((await resolver.resolveWithSource()).source).toBe('environment');
    expect(store.get()?.acquiredAt).toBe(Date.now());
    expect((await resolver.resolveWithSource()).source).toBe('cache');
    expect(prompter.calls).toBe(0);
  });

  it('skips pre-provisioned credentials that fail the length policy', async () => {
    const { resolver } = createResolver({ provisioned: { apiKey: 'short', token: 'short' } });

    await expect(resolver.resolve()).rejects.toMatchObject({
      kind: ErrorKind.AUTHENTICATION_REQUIRED,
      message: 'Trello credentials required: no terminal',
    });
  });

  it('raises AUTHENTICATION_REQUIRED when the interactive channel is unavailable', async () => {
    const { resolver, prompter } = createResolver();

    const error = await resolver.resolve().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({
      kind: ErrorKind.AUTHENTICATION_REQUIRED,
      details: { login_url: LOGIN_URL },
    });
    expect(prompter.calls).toBe(1);
  });

  it('raises AUTHENTICATION_REQUIRED when the user cancels the prompt', async () => {
    const { resolver } = createResolver({ prompter: new ScriptedPrompter([{ status: 'aborted' }]) });

    await expect(resolver.resolve()).rejects.toMatchObject({
      kind: ErrorKind.AUTHENTICATION_REQUIRED,
      message: 'Trello login was cancelled',
    });
  });

  it('never caches an interactively supplied pair that fails validation', async () => {
    const prompter = new ScriptedPrompter([{ status: 'provided', pair: { apiKey: 'abc', token: 'def' } }]);
    const { resolver, store } = createResolver({ prompter });

    await expect(resolver.resolve()).rejects.toMatchObject({ kind: ErrorKind.AUTHENTICATION_REQUIRED });
    expect(store.get()).toBeNull();
  });

  it('prompts once for concurrent requests and shares the result', async () => {
    const prompter = new ScriptedPrompter([{ status: 'provided', pair: TEST_PAIR }]);
    const { resolver } = createResolver({ prompter });

    const results = await Promise.all([resolver.resolveWithSource(), resolver.resolveWithSource(), resolver.resolveWithSource()]);

    expect(prompter.calls).toBe(1);
    expect(results.map((r) => r.source)).toEqual(['interactive', 'cache', 'cache']);
    expect(results.every((r) => r.pair.apiKey === TEST_KEY)).toBe(true);
  });

  it('prompts again once the cached pair reaches its TTL', async () => {
    const prompter = new ScriptedPrompter([{ status: 'provided', pair: TEST_PAIR }]);
    const { resolver } = createResolver({ prompter, ttlMs: 60_000 });

    await resolver.resolve();
    vi.advanceTimersByTime(59_999);
    expect((await resolver.resolveWithSource()).source).toBe('cache');

    vi.advanceTimersByTime(1);
    expect((await resolver.resolveWithSource()).source).toBe('interactive');
    expect(prompter.calls).toBe(2);
  });

  it('clear() forgets the cached pair and reports the session without values', async () => {
    const { resolver } = createResolver({ provisioned: TEST_PAIR });
    await resolver.resolve();

    expect(resolver.getSessionInfo()).toEqual({
      has_cached_credentials: true,
      source: 'environment',
      acquired_at: '2024-01-01T00:00:00.000Z',
      cache_duration_minutes: 1,
      login_url: LOGIN_URL,
    });

    resolver.clear();
    expect(resolver.getSessionInfo().has_cached_credentials).toBe(false);
    expect(JSON.stringify(resolver.getSessionInfo())).not.toContain(TEST_TOKEN);
  });
});

describe('TerminalPrompter', () => {
  it('reports itself unavailable when disabled for the stdio transport', async () => {
    const prompter = new TerminalPrompter({ minLength: 32, enabled: false });

    await expect(prompter.promptForPair(LOGIN_URL)).resolves.toEqual({
      status: 'unavailable',
      reason: 'interactive login is not possible over the stdio transport',
    });
  });
});
