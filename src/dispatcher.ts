import type { BoardCache } from './cache.js';
import type { CredentialPair, CredentialResolver } from './credentials/index.js';
import { ErrorKind, isAbortError, ToolError } from './errors.js';
import { logger } from './logging/index.js';
import { type Operation, OPERATIONS, ToolArgs } from './operations.js';
import type { ToolRegistry } from './registry.js';
import type { ToolName } from './tools.js';
import { type TrelloApi, TrelloApiError, TrelloErrorType } from './trello-client.js';

export interface OperationRequest {
  name: string;
  arguments: unknown;
  credentials?: CredentialPair;
}

export type OperationResult =
  | { ok: true; title: string; data: Record<string, unknown> }
  | { ok: false; error: ToolError };

export interface ToolDispatcherOptions {
  registry: ToolRegistry;
  resolver: CredentialResolver;
  api: TrelloApi;
  boards: BoardCache;
  operations?: Readonly<Record<ToolName, Operation>>;
}

/** Maps a Trello client failure onto the tool error taxonomy. */
export function toToolError(error: unknown): ToolError {
  if (error instanceof ToolError) {
    return error;
  }

  if (error instanceof TrelloApiError) {
    const details = { status: error.status, trello_error: error.type };
    switch (error.type) {
      case TrelloErrorType.AUTH_ERROR:
        return new ToolError(
          ErrorKind.UNAUTHORIZED,
          `${error.message}; cached credentials were cleared`,
          details,
          'Provide a valid API key and token, then retry'
        );
      case TrelloErrorType.NOT_FOUND:
        return new ToolError(ErrorKind.NOT_FOUND, error.message, details, error.hint);
      case TrelloErrorType.ABORTED:
        return new ToolError(ErrorKind.CANCELLED, 'Request cancelled before it was sent to Trello', details);
      case TrelloErrorType.RATE_LIMITED:
        return new ToolError(ErrorKind.RATE_LIMITED, 'Trello rate limit exceeded after retry', details, error.hint);
      default:
        return new ToolError(ErrorKind.EXTERNAL_ERROR, error.message, details, error.hint);
    }
  }

  if (isAbortError(error)) {
    return new ToolError(ErrorKind.CANCELLED, 'Request cancelled before it was sent to Trello');
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ToolError(ErrorKind.EXTERNAL_ERROR, `Unexpected error: ${message}`);
}

export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly resolver: CredentialResolver;
  private readonly api: TrelloApi;
  private readonly boards: BoardCache;
  private readonly operations: Readonly<Record<ToolName, Operation>>;

  constructor(options: ToolDispatcherOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.api = options.api;
    this.boards = options.boards;
    this.operations = options.operations ?? OPERATIONS;
  }

  async invoke(request: OperationRequest, signal?: AbortSignal): Promise<OperationResult> {
    const startTime = Date.now();
    const descriptor = this.registry.describe(request.name);

    if (!descriptor) {
      return this.fail(request.name, startTime, new ToolError(
        ErrorKind.UNKNOWN_OPERATION,
        `Unknown tool: ${request.name}`,
        { available: this.registry.list().map((tool) => tool.name) }
      ));
    }

    const validation = this.registry.validate(descriptor.name, request.arguments ?? {});
    if (!validation.ok) {
      return this.fail(request.name, startTime, new ToolError(
        ErrorKind.INVALID_ARGUMENTS,
        `Invalid arguments for ${descriptor.name}`,
        { missingFields: validation.missingFields, typeErrors: validation.typeErrors }
      ));
    }

    logger.debug('Tool call started', { tool: descriptor.name }, 'dispatcher');

    try {
      const auth = await this.resolver.resolve(request.credentials);
      const output = await this.operations[descriptor.name](new ToolArgs(validation.value), {
        api: this.api,
        boards: this.boards,
        auth,
        signal,
      });

      const latency = Date.now() - startTime;
      logger.info('Tool call completed', { tool: descriptor.name, latency_ms: latency }, 'dispatcher');
      logger.recordMetric({
        tool: descriptor.name,
        latency_ms: latency,
        success: true,
        timestamp: new Date().toISOString(),
      });

      return { ok: true, title: output.title, data: output.data };
    } catch (error) {
      const toolError = toToolError(error);
      if (toolError.kind === ErrorKind.UNAUTHORIZED) {
        this.resolver.clear();
        this.boards.invalidate();
      }
      return this.fail(descriptor.name, startTime, toolError);
    }
  }

  private fail(tool: string, startTime: number, error: ToolError): OperationResult {
    const latency = Date.now() - startTime;
    logger.error('Tool call failed', {
      tool,
      error_type: error.kind,
      message: error.message,
      latency_ms: latency,
    }, 'dispatcher');
    logger.recordMetric({
      tool,
      latency_ms: latency,
      success: false,
      timestamp: new Date().toISOString(),
      error_type: error.kind,
    });
    return { ok: false, error };
  }
}
