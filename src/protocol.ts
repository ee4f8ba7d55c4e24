import {
  ErrorCode,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CredentialPair } from './credentials/index.js';
import type { ToolDispatcher } from './dispatcher.js';
import { malformed, ToolError } from './errors.js';
import { logger, LogLevel } from './logging/index.js';
import type { ToolRegistry } from './registry.js';
import { applyResponseFormat, isResponseFormat, type ResponseFormat, truncateResponse } from './utils.js';

// ============================================
// JSON-RPC ENVELOPES
// ============================================

export type RequestId = string | number;

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: RequestId;
  result: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

const RequestIdSchema = z.union([z.string(), z.number().int()]);

const EnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0', { errorMap: () => ({ message: 'jsonrpc must be "2.0"' }) }),
  id: RequestIdSchema.optional(),
  method: z.string({ required_error: 'method is required' }).min(1, 'method is required'),
  params: z.record(z.unknown()).optional(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

export const SERVER_INFO = { name: 'trello-mcp', version: '1.0.0' } as const;

const INSTRUCTIONS = `Trello boards, lists and cards.
Start with list_boards, then get_board or get_lists for ids. Every tool accepts
optional api_key + token to act as another Trello user, and format ("markdown"
or "json") for the text rendering.`;

const COMMON_ARGUMENTS = ['api_key', 'token', 'format'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorResponse(id: RequestId | null, error: ToolError): JsonRpcFailure {
  const data: Record<string, unknown> = { type: error.kind };
  if (error.details !== undefined) data.details = error.details;
  if (error.hint !== undefined) data.hint = error.hint;
  return { jsonrpc: '2.0', id, error: { code: error.rpcCode, message: error.message, data } };
}

export interface ToolCallArguments {
  arguments: unknown;
  credentials?: CredentialPair;
  format: ResponseFormat;
}

/** Pulls the per-call credential pair and output format out of the arguments. */
export function splitToolArguments(raw: unknown): ToolCallArguments {
  if (!isRecord(raw)) {
    // left for the registry to reject
    return { arguments: raw ?? {}, format: 'markdown' };
  }

  const args: Record<string, unknown> = { ...raw };
  const apiKey = args.api_key;
  const token = args.token;
  const format = args.format;
  for (const key of COMMON_ARGUMENTS) {
    delete args[key];
  }

  const credentials =
    typeof apiKey === 'string' && typeof token === 'string' && apiKey.trim() && token.trim()
      ? { apiKey, token }
      : undefined;

  return {
    arguments: args,
    credentials,
    format: isResponseFormat(format) ? format : 'markdown',
  };
}

// ============================================
// PROTOCOL HANDLER
// ============================================

/**
 * Requests in flight on one client connection. `notifications/cancelled` only
 * reaches requests of the connection it arrived on; JSON-RPC ids are unique
 * per connection, not per server.
 */
export class ProtocolSession {
  private readonly inFlight = new Map<RequestId, AbortController>();

  track(id: RequestId, controller: AbortController): void {
    this.inFlight.set(id, controller);
  }

  release(id: RequestId, controller: AbortController): void {
    // a reused id may already belong to a newer call
    if (this.inFlight.get(id) === controller) {
      this.inFlight.delete(id);
    }
  }

  cancel(id: RequestId): boolean {
    const controller = this.inFlight.get(id);
    controller?.abort();
    return controller !== undefined;
  }
}

export interface HandleOptions {
  /** Aborts calls still waiting for admission, e.g. on client disconnect. */
  signal?: AbortSignal;
  /** Connection scope for cancellation; a one-off scope when omitted. */
  session?: ProtocolSession;
}

export interface ProtocolHandlerOptions {
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
}

export class ProtocolHandler {
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private initialized = false;

  constructor(options: ProtocolHandlerOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Entry point for transports that deliver the raw body. */
  async handleRaw(text: string, options: HandleOptions = {}): Promise<JsonRpcResponse | undefined> {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warning('Unparseable JSON-RPC message', { reason }, 'protocol');
      return errorResponse(null, malformed(`Parse error: ${reason}`, ErrorCode.ParseError));
    }
    return this.handle(message, options);
  }

  async handle(message: unknown, options: HandleOptions = {}): Promise<JsonRpcResponse | undefined> {
    const session = options.session ?? new ProtocolSession();

    if (!isRecord(message)) {
      return errorResponse(null, malformed('Invalid Request: expected a JSON-RPC object'));
    }

    const rawId = RequestIdSchema.safeParse(message.id);
    const id = rawId.success ? rawId.data : null;

    const parsed = EnvelopeSchema.safeParse(message);
    if (!parsed.success) {
      const reason = parsed.error.errors.map((err) => err.message).join('; ');
      return errorResponse(id, malformed(`Invalid Request: ${reason}`));
    }

    const envelope = parsed.data;
    if (envelope.id === undefined) {
      this.handleNotification(envelope, session);
      return undefined;
    }

    try {
      const result = await this.dispatch(envelope, envelope.id, session, options.signal);
      return { jsonrpc: '2.0', id: envelope.id, result };
    } catch (error) {
      if (error instanceof ToolError) {
        return errorResponse(envelope.id, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.critical('Unhandled error in protocol handler', { method: envelope.method, reason }, 'protocol');
      return {
        jsonrpc: '2.0',
        id: envelope.id,
        error: { code: ErrorCode.InternalError, message: 'Internal error' },
      };
    }
  }

  private handleNotification(envelope: Envelope, session: ProtocolSession): void {
    switch (envelope.method) {
      case 'notifications/initialized':
        this.initialized = true;
        logger.info('Client initialized', undefined, 'protocol');
        return;
      case 'notifications/cancelled': {
        const requestId = RequestIdSchema.safeParse(envelope.params?.requestId);
        if (requestId.success && !session.cancel(requestId.data)) {
          logger.debug('Cancellation for unknown request', { request_id: requestId.data }, 'protocol');
        }
        return;
      }
      default:
        logger.debug('Ignoring notification', { method: envelope.method }, 'protocol');
    }
  }

  private async dispatch(
    envelope: Envelope,
    id: RequestId,
    session: ProtocolSession,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>> {
    if (!this.initialized && envelope.method !== 'initialize' && envelope.method !== 'ping') {
      logger.warning('Request received before initialize', { method: envelope.method }, 'protocol');
    }

    const params = envelope.params ?? {};

    switch (envelope.method) {
      case 'initialize':
        return this.initialize(params);
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: this.registry.list() };
      case 'tools/call':
        return this.callTool(params, id, session, signal);
      case 'logging/setLevel':
        return this.setLevel(params);
      default:
        throw malformed(`Method not found: ${envelope.method}`, ErrorCode.MethodNotFound);
    }
  }

  private initialize(params: Record<string, unknown>): Record<string, unknown> {
    const requested = params.protocolVersion;
    const protocolVersion =
      typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
        ? requested
        : LATEST_PROTOCOL_VERSION;

    this.initialized = true;
    logger.info('Session initialized', {
      protocol_version: protocolVersion,
      client: isRecord(params.clientInfo) ? params.clientInfo.name : undefined,
    }, 'protocol');

    return {
      protocolVersion,
      capabilities: {
        tools: { listChanged: false },
        logging: {},
      },
      serverInfo: { ...SERVER_INFO },
      instructions: INSTRUCTIONS,
    };
  }

  private setLevel(params: Record<string, unknown>): Record<string, unknown> {
    const level = Object.values(LogLevel).find((value) => value === params.level);
    if (!level) {
      throw malformed(`Invalid log level: ${String(params.level)}`, ErrorCode.InvalidParams);
    }
    logger.updateConfig({ enabled: true, mcpEnabled: true, level });
    return {};
  }

  private async callTool(
    params: Record<string, unknown>,
    id: RequestId,
    session: ProtocolSession,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>> {
    if (typeof params.name !== 'string' || params.name.length === 0) {
      throw malformed('tools/call requires a tool name', ErrorCode.InvalidParams);
    }

    const call = splitToolArguments(params.arguments);
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    session.track(id, controller);

    try {
      const outcome = await this.dispatcher.invoke(
        {
          name: params.name,
          arguments: call.arguments,
          credentials: call.credentials,
        },
        controller.signal
      );

      if (!outcome.ok) {
        throw outcome.error;
      }

      const text = truncateResponse(applyResponseFormat(outcome.data, call.format, outcome.title));
      return {
        content: [{ type: 'text', text }],
        structuredContent: outcome.data,
      };
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      session.release(id, controller);
    }
  }
}
