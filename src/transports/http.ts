import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { BoardCache } from '../cache.js';
import type { CredentialResolver } from '../credentials/index.js';
import { logger } from '../logging/index.js';
import { type ProtocolHandler, SERVER_INFO } from '../protocol.js';
import type { RateLimiter } from '../rate-limiter.js';
import type { ToolRegistry } from '../registry.js';

export interface HttpTransportDeps {
  handler: ProtocolHandler;
  registry: ToolRegistry;
  resolver: CredentialResolver;
  rateLimiter: RateLimiter;
  boards: BoardCache;
}

// Envelope-level failures are the client's fault
const BAD_REQUEST_CODES: readonly number[] = [ErrorCode.ParseError, ErrorCode.InvalidRequest];

export function buildHttpServer(deps: HttpTransportDeps): FastifyInstance {
  const { handler, registry, resolver, rateLimiter, boards } = deps;
  const app = Fastify({ logger: false });

  // The protocol handler parses the body itself so bad JSON becomes a JSON-RPC parse error
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onResponse', async (request, reply) => {
    if (logger.isRequestLoggingEnabled()) {
      logger.debug('HTTP request served', {
        method: request.method,
        url: request.url,
        status: reply.statusCode,
        duration_ms: Math.round(reply.elapsedTime),
      }, 'http-transport');
    }
  });

  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    if (statusCode >= 500) {
      logger.error('HTTP handler failed', { message: error.message }, 'http-transport');
    }

    return reply.code(statusCode).send({ error: message, statusCode });
  });

  app.post('/mcp', async (request, reply) => {
    const body = typeof request.body === 'string' ? request.body : '';

    // Client went away before we answered: drop calls still waiting for admission
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    // Stateless: every POST is its own session, so notifications/cancelled
    // never reaches another client's request
    const response = await handler.handleRaw(body, { signal: controller.signal });
    if (!response) {
      return reply.code(202).send();
    }

    const status = 'error' in response && BAD_REQUEST_CODES.includes(response.error.code) ? 400 : 200;
    return reply.code(status).send(response);
  });

  app.get('/health', async () => ({
    status: 'healthy',
    service: SERVER_INFO.name,
    version: SERVER_INFO.version,
    timestamp: new Date().toISOString(),
    initialized: handler.isInitialized(),
    tools_count: registry.size,
    rate_limiter: rateLimiter.getStatus(),
    board_cache: boards.getStats(),
    session: resolver.getSessionInfo(),
    metrics: logger.getMetrics(),
  }));

  app.get('/', async () => ({
    name: 'Trello MCP Server',
    description: 'Model Context Protocol server for the Trello API',
    version: SERVER_INFO.version,
    endpoints: {
      health: '/health',
      login: '/auth/login (GET)',
      mcp: '/mcp (POST)',
      tools: '/tools (GET)',
    },
    features: {
      interactive_login: true,
      session_credentials_caching: true,
      no_persistent_storage: true,
    },
  }));

  app.get('/tools', async () => {
    const tools = registry.list();
    return { tools, count: tools.length, timestamp: new Date().toISOString() };
  });

  app.get('/auth/login', async () => {
    const session = resolver.getSessionInfo();
    return {
      message: 'Credentials are requested on the first tool call that needs them',
      login_url: session.login_url,
      instructions: {
        step_1: `Visit ${session.login_url}`,
        step_2: 'Copy your API Key',
        step_3: "Follow the 'Token' link to generate a token",
        step_4: 'Pass both as api_key and token, or enter them when prompted',
      },
      features: {
        session_caching: true,
        cache_duration_minutes: session.cache_duration_minutes,
        no_disk_storage: true,
      },
    };
  });

  return app;
}

export async function startHttpTransport(app: FastifyInstance, host: string, port: number): Promise<string> {
  const address = await app.listen({ host, port });
  logger.info('HTTP transport listening', { address }, 'http-transport');
  return address;
}
