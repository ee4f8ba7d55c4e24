import { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import type { AppConfig } from '../config.js';
import type { CredentialPair, CredentialPrompter, PromptOutcome } from '../credentials/index.js';
import type {
  TrelloApi,
  TrelloBoard,
  TrelloBoardDetail,
  TrelloCard,
  TrelloList,
  TrelloMember,
  TrelloParams,
} from '../trello-client.js';

export const TEST_KEY = 'test-api-key-0000000000000000000';
export const TEST_TOKEN = 'test-secret-token-00000000000000';
export const OTHER_KEY = 'other-api-key-000000000000000000';
export const OTHER_TOKEN = 'other-secret-token-0000000000000';

export const TEST_PAIR: CredentialPair = { apiKey: TEST_KEY, token: TEST_TOKEN };

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiUrl: 'https://trello.test/1',
    loginUrl: 'https://trello.test/app-key',
    provisioned: undefined,
    credentialTtlMs: 480 * 60 * 1000,
    credentialMinLength: 32,
    rateLimit: { maxCalls: 300, windowMs: 10_000, backoffMs: 0 },
    requestTimeoutMs: 5_000,
    boardCacheTtlMs: 60_000,
    transport: 'http',
    http: { port: 8080, host: '127.0.0.1' },
    ...overrides,
  };
}

// ============================================
// PROMPTER
// ============================================

export class ScriptedPrompter implements CredentialPrompter {
  calls = 0;

  constructor(private readonly outcomes: PromptOutcome[]) {}

  async promptForPair(): Promise<PromptOutcome> {
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls++;
    return outcome;
  }
}

// ============================================
// AXIOS ADAPTER
// ============================================

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

/** In-process stand-in for the Trello REST API. */
export function fakeAdapter(
  respond: (request: RecordedRequest) => FakeReply,
  requests: RecordedRequest[] = []
): AxiosAdapter {
  return async (config) => {
    const params: Record<string, unknown> =
      typeof config.params === 'object' && config.params !== null ? { ...config.params } : {};
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params,
    };
    requests.push(request);

    const reply = respond(request);
    const response: AxiosResponse = {
      data: reply.data ?? {},
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
      request: {},
    };

    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        {},
        response
      );
    }
    return response;
  };
}

// ============================================
// TRELLO API FAKE
// ============================================

export interface FakeCall {
  method: keyof TrelloApi;
  auth: CredentialPair;
  target?: string;
  params?: TrelloParams;
}

export class FakeTrello implements TrelloApi {
  calls: FakeCall[] = [];
  boards: TrelloBoard[] = [];
  failWith: Error | null = null;
  search: (params: TrelloParams) => Promise<TrelloCard[]> = async () => [];

  private record(call: FakeCall): void {
    this.calls.push(call);
    if (this.failWith) throw this.failWith;
  }

  async listBoards(auth: CredentialPair): Promise<TrelloBoard[]> {
    this.record({ method: 'listBoards', auth });
    return this.boards;
  }

  async getBoard(auth: CredentialPair, boardId: string): Promise<TrelloBoardDetail> {
    this.record({ method: 'getBoard', auth, target: boardId });
    return { id: boardId, name: 'Roadmap', lists: [], cards: [], members: [] };
  }

  async createBoard(auth: CredentialPair, params: TrelloParams): Promise<TrelloBoard> {
    this.record({ method: 'createBoard', auth, params });
    return { id: 'new-board', name: String(params.name) };
  }

  async updateBoard(auth: CredentialPair, boardId: string, params: TrelloParams): Promise<TrelloBoard> {
    this.record({ method: 'updateBoard', auth, target: boardId, params });
    return { id: boardId, name: 'Roadmap' };
  }

  async getLists(auth: CredentialPair, boardId: string): Promise<TrelloList[]> {
    this.record({ method: 'getLists', auth, target: boardId });
    return [{ id: 'l1', name: 'To Do', pos: 1 }];
  }

  async createList(auth: CredentialPair, params: TrelloParams): Promise<TrelloList> {
    this.record({ method: 'createList', auth, params });
    return { id: 'new-list', name: String(params.name) };
  }

  async getListCards(auth: CredentialPair, listId: string): Promise<TrelloCard[]> {
    this.record({ method: 'getListCards', auth, target: listId });
    return [];
  }

  async getBoardCards(auth: CredentialPair, boardId: string): Promise<TrelloCard[]> {
    this.record({ method: 'getBoardCards', auth, target: boardId });
    return [];
  }

  async createCard(auth: CredentialPair, params: TrelloParams): Promise<TrelloCard> {
    this.record({ method: 'createCard', auth, params });
    return { id: 'new-card', name: String(params.name), idList: String(params.idList) };
  }

  async updateCard(auth: CredentialPair, cardId: string, params: TrelloParams): Promise<TrelloCard> {
    this.record({ method: 'updateCard', auth, target: cardId, params });
    return { id: cardId, name: 'Card' };
  }

  async addMemberToCard(auth: CredentialPair, cardId: string, memberId: string): Promise<TrelloMember[]> {
    this.record({ method: 'addMemberToCard', auth, target: cardId, params: { value: memberId } });
    return [{ id: memberId, username: 'alex', fullName: 'Alex Doe' }];
  }

  async searchCards(auth: CredentialPair, params: TrelloParams): Promise<TrelloCard[]> {
    this.record({ method: 'searchCards', auth, params });
    return this.search(params);
  }
}

// ============================================
// GATED CALLS
// ============================================

/** Holds an outbound call open until the test releases it. */
export class Gate {
  private open: () => void = () => undefined;
  private markEntered: () => void = () => undefined;
  private readonly opened = new Promise<void>((resolve) => {
    this.open = resolve;
  });
  /** Resolves once the call has reached the stand-in. */
  readonly entered = new Promise<void>((resolve) => {
    this.markEntered = resolve;
  });

  async pass(): Promise<void> {
    this.markEntered();
    await this.opened;
  }

  release(): void {
    this.open();
  }
}

export class GatedTrello extends FakeTrello {
  readonly gate = new Gate();

  async getLists(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloList[]> {
    await this.gate.pass();
    // fails the call if it was cancelled while held
    signal?.throwIfAborted();
    return super.getLists(auth, boardId);
  }
}
