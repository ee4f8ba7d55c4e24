import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import axiosRetry from 'axios-retry';
import type { CredentialPair } from './credentials/index.js';
import { isAbortError } from './errors.js';
import { logger, safeLog } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import type { RateLimiter } from './rate-limiter.js';

// ============================================
// ERROR TYPES
// ============================================

export enum TrelloErrorType {
  AUTH_ERROR = 'AUTH_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  TIMEOUT = 'TIMEOUT',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  API_ERROR = 'API_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  ABORTED = 'ABORTED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class TrelloApiError extends Error {
  constructor(
    public type: TrelloErrorType,
    message: string,
    public status?: number,
    public details?: unknown,
    public hint?: string
  ) {
    super(message);
    this.name = 'TrelloApiError';
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
      hint: this.hint,
    };
  }
}

// ============================================
// TRELLO ENTITIES
// ============================================

export interface TrelloLabel {
  id: string;
  name?: string;
  color?: string | null;
}

export interface TrelloMember {
  id: string;
  username?: string;
  fullName?: string;
}

export interface TrelloBoardPrefs {
  permissionLevel?: string;
  voting?: string;
  comments?: string;
  background?: string;
  [key: string]: unknown;
}

export interface TrelloBoard {
  id: string;
  name: string;
  desc?: string;
  closed?: boolean;
  url?: string;
  prefs?: TrelloBoardPrefs;
}

export interface TrelloList {
  id: string;
  name: string;
  closed?: boolean;
  pos?: number;
  idBoard?: string;
}

export interface TrelloCard {
  id: string;
  name: string;
  desc?: string;
  closed?: boolean;
  due?: string | null;
  url?: string;
  idList?: string;
  idBoard?: string;
  pos?: number;
  labels?: TrelloLabel[];
  idMembers?: string[];
  members?: TrelloMember[];
}

export interface TrelloBoardDetail extends TrelloBoard {
  lists?: TrelloList[];
  cards?: TrelloCard[];
  members?: TrelloMember[];
}

export interface TrelloSearchResult {
  cards?: TrelloCard[];
}

// Outbound parameters exactly as Trello names them
export type TrelloParams = Record<string, string | number | boolean>;

/** Surface used by the operations; tests substitute a fake. */
export interface TrelloApi {
  listBoards(auth: CredentialPair, signal?: AbortSignal): Promise<TrelloBoard[]>;
  getBoard(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloBoardDetail>;
  createBoard(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloBoard>;
  updateBoard(auth: CredentialPair, boardId: string, params: TrelloParams, signal?: AbortSignal): Promise<TrelloBoard>;
  getLists(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloList[]>;
  createList(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloList>;
  getListCards(auth: CredentialPair, listId: string, signal?: AbortSignal): Promise<TrelloCard[]>;
  getBoardCards(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloCard[]>;
  createCard(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard>;
  updateCard(auth: CredentialPair, cardId: string, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard>;
  addMemberToCard(auth: CredentialPair, cardId: string, memberId: string, signal?: AbortSignal): Promise<TrelloMember[]>;
  searchCards(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard[]>;
}

export interface TrelloClientOptions {
  baseUrl: string;
  timeoutMs: number;
  rateLimiter: RateLimiter;
  /** Fixed delay before the single retry of a 429. */
  retryBackoffMs: number;
  adapter?: AxiosAdapter;
}

const CARD_FIELDS = 'id,name,desc,closed,due,url,idList,labels,idMembers';

// ============================================
// TRELLO CLIENT WITH ADMISSION/RETRY
// ============================================

export class TrelloClient implements TrelloApi {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(options: TrelloClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'trello-mcp-server/1.0.0',
      },
      timeout: options.timeoutMs,
      adapter: options.adapter,
    });

    // Per-attempt logging, registered first so it sees raw axios errors
    setupLoggingMiddleware(this.client);

    // Every attempt, retries included, takes a slot in the rate window.
    // The caller's signal only covers the wait: once admitted, the call runs to completion.
    this.client.interceptors.request.use(async (config: InternalAxiosRequestConfig) => {
      await options.rateLimiter.admit(config.signal instanceof AbortSignal ? config.signal : undefined);
      delete config.signal;
      return config;
    });

    axiosRetry(this.client, {
      retries: 1,
      retryDelay: () => options.retryBackoffMs,
      retryCondition: (error: AxiosError) => error.response?.status === 429,
      onRetry: (_retryCount, _error, requestConfig) => {
        safeLog.warn(
          `Rate limited by Trello, retrying ${requestConfig.method?.toUpperCase()} ${requestConfig.url} in ${options.retryBackoffMs}ms`
        );
      },
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw this.handleError(error);
      }
    );

    logger.info('TrelloClient initialized', {
      base_url: options.baseUrl,
      timeout: options.timeoutMs,
      retry_backoff_ms: options.retryBackoffMs,
    }, 'trello-client');
  }

  private handleError(error: unknown): TrelloApiError {
    // A retried request has already been mapped by the inner chain
    if (error instanceof TrelloApiError) {
      return error;
    }

    // Abandoned while waiting for admission; nothing was sent
    if (isAbortError(error) || (axios.isAxiosError(error) && error.code === AxiosError.ERR_CANCELED)) {
      return new TrelloApiError(
        TrelloErrorType.ABORTED,
        'Request aborted',
        undefined,
        { code: 'ABORTED' },
        'The operation was cancelled by the client'
      );
    }

    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new TrelloApiError(TrelloErrorType.UNKNOWN_ERROR, message);
    }

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new TrelloApiError(
        TrelloErrorType.TIMEOUT,
        `Request timeout after ${this.timeoutMs}ms`,
        undefined,
        { code: error.code },
        'Trello did not answer in time. Try again later.'
      );
    }

    if (!error.response) {
      return new TrelloApiError(
        TrelloErrorType.NETWORK_ERROR,
        error.message || 'Network error occurred',
        undefined,
        { code: error.code },
        'Check your internet connection and TRELLO_API_URL'
      );
    }

    const status = error.response.status;
    const data: unknown = error.response.data;

    const errorMap: Record<number, [TrelloErrorType, string, string]> = {
      401: [TrelloErrorType.AUTH_ERROR, 'Trello rejected the credentials', 'Check your API key and token at https://trello.com/app-key'],
      403: [TrelloErrorType.AUTH_ERROR, 'Insufficient permissions', 'The token does not grant access to this resource'],
      404: [TrelloErrorType.NOT_FOUND, 'Resource not found', 'Check that the board_id, list_id, card_id or member_id is correct'],
      400: [TrelloErrorType.VALIDATION_ERROR, 'Trello rejected the request', 'Check the request parameters for correctness'],
      422: [TrelloErrorType.VALIDATION_ERROR, 'Validation error', 'Check the request parameters for correctness'],
    };

    const mapped = errorMap[status];
    if (mapped) {
      const [type, message, hint] = mapped;
      return new TrelloApiError(type, message, status, data, hint);
    }

    if (status === 429) {
      return new TrelloApiError(
        TrelloErrorType.RATE_LIMITED,
        'Rate limit exceeded',
        status,
        { retry_after: error.response.headers['retry-after'] ?? 'unknown' },
        'Trello is throttling this token. Wait a few seconds before retrying.'
      );
    }

    if (status >= 500 && status < 600) {
      return new TrelloApiError(
        TrelloErrorType.API_ERROR,
        'Trello server error',
        status,
        data,
        'The Trello API is experiencing issues. Try again later.'
      );
    }

    return new TrelloApiError(TrelloErrorType.API_ERROR, error.message || 'API request failed', status, data);
  }

  private params(auth: CredentialPair, extra: TrelloParams = {}): TrelloParams {
    return { ...extra, key: auth.apiKey, token: auth.token };
  }

  // Board operations
  async listBoards(auth: CredentialPair, signal?: AbortSignal): Promise<TrelloBoard[]> {
    const response = await this.client.get<TrelloBoard[]>('/members/me/boards', {
      params: this.params(auth, { fields: 'id,name,desc,closed,url,prefs', filter: 'open' }),
      signal,
    });
    return response.data;
  }

  async getBoard(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloBoardDetail> {
    const response = await this.client.get<TrelloBoardDetail>(`/boards/${encodeURIComponent(boardId)}`, {
      params: this.params(auth, {
        lists: 'open',
        cards: 'open',
        members: 'all',
        fields: 'id,name,desc,closed,url,prefs',
        card_fields: CARD_FIELDS,
        list_fields: 'id,name,closed,pos',
        member_fields: 'id,username,fullName',
      }),
      signal,
    });
    return response.data;
  }

  async createBoard(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloBoard> {
    const response = await this.client.post<TrelloBoard>('/boards', null, {
      params: this.params(auth, params),
      signal,
    });
    return response.data;
  }

  async updateBoard(auth: CredentialPair, boardId: string, params: TrelloParams, signal?: AbortSignal): Promise<TrelloBoard> {
    const response = await this.client.put<TrelloBoard>(`/boards/${encodeURIComponent(boardId)}`, null, {
      params: this.params(auth, params),
      signal,
    });
    return response.data;
  }

  // List operations
  async getLists(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloList[]> {
    const response = await this.client.get<TrelloList[]>(`/boards/${encodeURIComponent(boardId)}/lists`, {
      params: this.params(auth, { fields: 'id,name,closed,pos', filter: 'open' }),
      signal,
    });
    return response.data;
  }

  async createList(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloList> {
    const response = await this.client.post<TrelloList>('/lists', null, {
      params: this.params(auth, params),
      signal,
    });
    return response.data;
  }

  // Card operations
  async getListCards(auth: CredentialPair, listId: string, signal?: AbortSignal): Promise<TrelloCard[]> {
    const response = await this.client.get<TrelloCard[]>(`/lists/${encodeURIComponent(listId)}/cards`, {
      params: this.params(auth, { fields: CARD_FIELDS, filter: 'open' }),
      signal,
    });
    return response.data;
  }

  async getBoardCards(auth: CredentialPair, boardId: string, signal?: AbortSignal): Promise<TrelloCard[]> {
    const response = await this.client.get<TrelloCard[]>(`/boards/${encodeURIComponent(boardId)}/cards`, {
      params: this.params(auth, { fields: CARD_FIELDS, filter: 'open' }),
      signal,
    });
    return response.data;
  }

  async createCard(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard> {
    const response = await this.client.post<TrelloCard>('/cards', null, {
      params: this.params(auth, params),
      signal,
    });
    return response.data;
  }

  async updateCard(auth: CredentialPair, cardId: string, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard> {
    const response = await this.client.put<TrelloCard>(`/cards/${encodeURIComponent(cardId)}`, null, {
      params: this.params(auth, params),
      signal,
    });
    return response.data;
  }

  async addMemberToCard(auth: CredentialPair, cardId: string, memberId: string, signal?: AbortSignal): Promise<TrelloMember[]> {
    const response = await this.client.post<TrelloMember[]>(`/cards/${encodeURIComponent(cardId)}/idMembers`, null, {
      params: this.params(auth, { value: memberId }),
      signal,
    });
    return response.data;
  }

  // Search
  async searchCards(auth: CredentialPair, params: TrelloParams, signal?: AbortSignal): Promise<TrelloCard[]> {
    const response = await this.client.get<TrelloSearchResult>('/search', {
      params: this.params(auth, {
        ...params,
        modelTypes: 'cards',
        card_fields: CARD_FIELDS,
      }),
      signal,
    });
    return response.data.cards ?? [];
  }
}
