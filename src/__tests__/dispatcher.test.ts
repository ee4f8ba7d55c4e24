import type { AxiosAdapter } from 'axios';
import { describe, expect, it } from 'vitest';
import { toToolError } from '../dispatcher.js';
import { ErrorKind, ToolError } from '../errors.js';
import { createServer } from '../server.js';
import { TrelloApiError, TrelloErrorType, type TrelloParams } from '../trello-client.js';
import {
  FakeTrello,
  fakeAdapter,
  Gate,
  OTHER_KEY,
  OTHER_TOKEN,
  type RecordedRequest,
  ScriptedPrompter,
  TEST_KEY,
  TEST_PAIR,
  testConfig,
} from './helpers.js';

function setup(options: { provisioned?: boolean } = {}) {
  const api = new FakeTrello();
  const prompter = new ScriptedPrompter([{ status: 'unavailable', reason: 'no terminal' }]);
  const server = createServer(
    testConfig({ provisioned: options.provisioned === false ? undefined : TEST_PAIR }),
    { api, prompter }
  );
  return { ...server, api, prompter };
}

/** Runs against the real Trello client, holding each request at the adapter until released. */
function setupGated() {
  const gate = new Gate();
  const requests: RecordedRequest[] = [];
  const respond = fakeAdapter(() => ({ status: 200, data: { id: 'c1', name: 'Ship', idList: 'l1' } }), requests);
  const adapter: AxiosAdapter = async (config) => {
    await gate.pass();
    return respond(config);
  };
  const prompter = new ScriptedPrompter([{ status: 'unavailable', reason: 'no terminal' }]);
  const { dispatcher } = createServer(testConfig({ provisioned: TEST_PAIR }), { adapter, prompter });
  return { dispatcher, gate, requests };
}

function failure(error: ToolError | undefined) {
  if (!error) throw new Error('expected a failure');
  return error;
}

describe('ToolDispatcher', () => {
  it('rejects unknown tools with the list of available ones', async () => {
    const { dispatcher, api } = setup();

    const result = await dispatcher.invoke({ name: 'delete_card', arguments: {} });

    expect(result.ok).toBe(false);
    const error = failure(result.ok ? undefined : result.error);
    expect(error.kind).toBe(ErrorKind.UNKNOWN_OPERATION);
    expect(error.message).toBe('Unknown tool: delete_card');
    expect(error.rpcCode).toBe(-32602);
    expect(api.calls).toEqual([]);
  });

  it('rejects invalid arguments before any outbound call', async () => {
    const { dispatcher, api } = setup();

    const result = await dispatcher.invoke({ name: 'create_card', arguments: { name: 'Ship' } });

    const error = failure(result.ok ? undefined : result.error);
    expect(error.kind).toBe(ErrorKind.INVALID_ARGUMENTS);
    expect(error.details).toEqual({ missingFields: ['list_id'], typeErrors: [] });
    expect(api.calls).toEqual([]);
  });

  it('raises AUTHENTICATION_REQUIRED when no credentials can be obtained', async () => {
    const { dispatcher, api } = setup({ provisioned: false });

    const result = await dispatcher.invoke({ name: 'list_boards', arguments: {} });

    const error = failure(result.ok ? undefined : result.error);
    expect(error.kind).toBe(ErrorKind.AUTHENTICATION_REQUIRED);
    expect(error.rpcCode).toBe(-32001);
    expect(api.calls).toEqual([]);
  });

  it('uses explicit credentials for the call', async () => {
    const { dispatcher, api } = setup();
    const explicit = { apiKey: OTHER_KEY, token: OTHER_TOKEN };

    const result = await dispatcher.invoke({ name: 'get_lists', arguments: { board_id: 'b1' }, credentials: explicit });

    expect(result).toEqual({
      ok: true,
      title: 'Lists (1)',
      data: { board_id: 'b1', count: 1, lists: [{ id: 'l1', name: 'To Do', pos: 1, closed: false }] },
    });
    expect(api.calls).toEqual([{ method: 'getLists', auth: explicit, target: 'b1' }]);
  });

  it('clears cached credentials when Trello rejects them', async () => {
    const { dispatcher, api, resolver } = setup();
    api.failWith = new TrelloApiError(TrelloErrorType.AUTH_ERROR, 'Trello rejected the credentials', 401);

    const result = await dispatcher.invoke({ name: 'get_lists', arguments: { board_id: 'b1' } });

    const error = failure(result.ok ? undefined : result.error);
    expect(error.kind).toBe(ErrorKind.UNAUTHORIZED);
    expect(error.message).toBe('Trello rejected the credentials; cached credentials were cleared');
    expect(error.details).toEqual({ status: 401, trello_error: 'AUTH_ERROR' });
    expect(resolver.getSessionInfo().has_cached_credentials).toBe(false);
  });

  describe('cancellation', () => {
    it('lets a request that already left finish when the caller aborts', async () => {
      const { dispatcher, gate, requests } = setupGated();
      const controller = new AbortController();

      const pending = dispatcher.invoke({ name: 'create_card', arguments: { name: 'Ship', list_id: 'l1' } }, controller.signal);
      await gate.entered;
      controller.abort();
      gate.release();

      await expect(pending).resolves.toEqual({
        ok: true,
        title: 'Card created: Ship',
        data: { card: expect.objectContaining({ id: 'c1', name: 'Ship' }) },
      });
      expect(requests).toHaveLength(1);
    });

    it('reports CANCELLED without sending anything when aborted before admission', async () => {
      const { dispatcher, requests } = setupGated();

      const result = await dispatcher.invoke(
        { name: 'create_card', arguments: { name: 'Ship', list_id: 'l1' } },
        AbortSignal.abort()
      );

      const error = failure(result.ok ? undefined : result.error);
      expect(error.kind).toBe(ErrorKind.CANCELLED);
      expect(error.rpcCode).toBe(-32800);
      expect(error.message).toBe('Request cancelled before it was sent to Trello');
      expect(requests).toEqual([]);
    });
  });

  describe('parameter mapping', () => {
    it('sends card fields under Trello names', async () => {
      const { dispatcher, api } = setup();

      await dispatcher.invoke({
        name: 'create_card',
        arguments: {
          name: 'Ship',
          list_id: 'l1',
          pos: 'top',
          due: '2024-03-01T12:00:00Z',
          labels: ['lab1', 'lab2'],
          members: ['m1'],
        },
      });

      expect(api.calls[0].params).toEqual({
        name: 'Ship',
        idList: 'l1',
        pos: 'top',
        due: '2024-03-01T12:00:00Z',
        idLabels: 'lab1,lab2',
        idMembers: 'm1',
      });
    });

    it('clears a due date with an explicit null', async () => {
      const { dispatcher, api } = setup();

      const result = await dispatcher.invoke({ name: 'update_card', arguments: { card_id: 'c1', due: null } });

      expect(api.calls[0]).toMatchObject({ method: 'updateCard', target: 'c1', params: { due: 'null' } });
      expect(result.ok && result.data.updated_fields).toEqual(['due']);
    });

    it('spells board preferences per endpoint', async () => {
      const { dispatcher, api } = setup();

      await dispatcher.invoke({ name: 'create_board', arguments: { name: 'Q3', prefs: { voting: 'members' } } });
      await dispatcher.invoke({
        name: 'update_board',
        arguments: { board_id: 'b1', closed: true, prefs: { permissionLevel: 'public' } },
      });

      expect(api.calls[0].params).toEqual({ name: 'Q3', defaultLists: true, prefs_voting: 'members' });
      expect(api.calls[1].params).toEqual({ closed: true, 'prefs/permissionLevel': 'public' });
    });

    it('prefers list_id over board_id for get_cards', async () => {
      const { dispatcher, api } = setup();

      await dispatcher.invoke({ name: 'get_cards', arguments: { board_id: 'b1', list_id: 'l1' } });

      expect(api.calls.map((call) => [call.method, call.target])).toEqual([['getListCards', 'l1']]);
    });
  });

  describe('search_cards', () => {
    function withBoards(api: FakeTrello, failing: Record<string, TrelloApiError> = {}) {
      api.boards = [
        { id: 'b1', name: 'One' },
        { id: 'b2', name: 'Two' },
        { id: 'b3', name: 'Three' },
        { id: 'b4', name: 'Archived', closed: true },
      ];
      api.search = async (params: TrelloParams) => {
        const boardId = String(params.idBoards);
        const error = failing[boardId];
        if (error) throw error;
        return [
          { id: `${boardId}-c1`, name: 'Bug one' },
          { id: `${boardId}-c2`, name: 'Bug two' },
        ];
      };
    }

    it('searches every open board and merges the results', async () => {
      const { dispatcher, api } = setup();
      withBoards(api);

      const result = await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' } });

      expect(result.ok && result.title).toBe('Search results for "bug" (6)');
      expect(result.ok && result.data.complete).toBe(true);
      expect(api.calls.filter((call) => call.method === 'searchCards').map((call) => call.params)).toEqual([
        { query: 'bug', idBoards: 'b1', cards_limit: 50 },
        { query: 'bug', idBoards: 'b2', cards_limit: 50 },
        { query: 'bug', idBoards: 'b3', cards_limit: 50 },
      ]);
    });

    it('caps merged results at the limit', async () => {
      const { dispatcher, api } = setup();
      withBoards(api);

      const result = await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug', limit: 3 } });

      expect(result.ok && result.data.count).toBe(3);
    });

    it('reuses the board directory between searches', async () => {
      const { dispatcher, api } = setup();
      withBoards(api);

      await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' } });
      await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'fix' } });

      expect(api.calls.filter((call) => call.method === 'listBoards')).toHaveLength(1);
    });

    it('keeps board directories apart for tokens sharing an API key', async () => {
      const { dispatcher, api } = setup();
      const searched: string[] = [];
      api.search = async (params: TrelloParams) => {
        searched.push(String(params.idBoards));
        return [];
      };

      api.boards = [{ id: 'alice-board', name: 'Alice' }];
      await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' }, credentials: TEST_PAIR });
      api.boards = [{ id: 'bob-board', name: 'Bob' }];
      await dispatcher.invoke({
        name: 'search_cards',
        arguments: { query: 'bug' },
        credentials: { apiKey: TEST_KEY, token: OTHER_TOKEN },
      });

      expect(searched).toEqual(['alice-board', 'bob-board']);
      expect(api.calls.filter((call) => call.method === 'listBoards')).toHaveLength(2);
    });

    it('returns a partial result naming the boards that failed', async () => {
      const { dispatcher, api } = setup();
      withBoards(api, { b2: new TrelloApiError(TrelloErrorType.API_ERROR, 'Trello server error', 500) });

      const result = await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' } });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data).toMatchObject({
        query: 'bug',
        count: 4,
        complete: false,
        incomplete_board_ids: ['b2'],
        summary: 'Searched 2 of 3 boards; 1 could not be searched: b2',
      });
    });

    it('fails the whole search when one board rejects the credentials', async () => {
      const { dispatcher, api } = setup();
      withBoards(api, { b3: new TrelloApiError(TrelloErrorType.AUTH_ERROR, 'Insufficient permissions', 403) });

      const result = await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' } });

      expect(failure(result.ok ? undefined : result.error).kind).toBe(ErrorKind.UNAUTHORIZED);
    });

    it('fails when every board fails', async () => {
      const { dispatcher, api } = setup();
      const outage = new TrelloApiError(TrelloErrorType.API_ERROR, 'Trello server error', 502);
      withBoards(api, { b1: outage, b2: outage, b3: outage });

      const result = await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug' } });

      const error = failure(result.ok ? undefined : result.error);
      expect(error.kind).toBe(ErrorKind.EXTERNAL_ERROR);
      expect(error.message).toBe('Trello server error');
    });

    it('sends one scoped request when board_ids is given', async () => {
      const { dispatcher, api } = setup();
      withBoards(api);

      await dispatcher.invoke({ name: 'search_cards', arguments: { query: 'bug', board_ids: ['b1', 'b2'] } });

      expect(api.calls).toEqual([
        {
          method: 'searchCards',
          auth: TEST_PAIR,
          params: { query: 'bug', idBoards: 'b1,b2', cards_limit: 50 },
        },
      ]);
    });
  });
});

describe('toToolError', () => {
  it('maps Trello failures onto the tool taxonomy', () => {
    expect(toToolError(new TrelloApiError(TrelloErrorType.NOT_FOUND, 'Resource not found', 404)).kind)
      .toBe(ErrorKind.NOT_FOUND);
    expect(toToolError(new TrelloApiError(TrelloErrorType.RATE_LIMITED, 'Rate limit exceeded', 429))).toMatchObject({
      kind: ErrorKind.RATE_LIMITED,
      message: 'Trello rate limit exceeded after retry',
    });
    expect(toToolError(new TrelloApiError(TrelloErrorType.TIMEOUT, 'Request timeout after 5000ms')).kind)
      .toBe(ErrorKind.EXTERNAL_ERROR);
  });

  it('reports aborts as CANCELLED', () => {
    expect(toToolError(new DOMException('This operation was aborted', 'AbortError'))).toMatchObject({
      kind: ErrorKind.CANCELLED,
      rpcCode: -32800,
    });
    expect(toToolError(new TrelloApiError(TrelloErrorType.ABORTED, 'Request aborted')).kind)
      .toBe(ErrorKind.CANCELLED);
  });

  it('wraps unexpected errors', () => {
    expect(toToolError(new Error('boom'))).toMatchObject({
      kind: ErrorKind.EXTERNAL_ERROR,
      message: 'Unexpected error: boom',
    });
  });
});
