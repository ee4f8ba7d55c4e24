#!/usr/bin/env node

import { loadConfig } from './config.js';
import { logger, safeLog } from './logging/index.js';
import { SERVER_INFO } from './protocol.js';
import { createServer } from './server.js';
import { buildHttpServer, startHttpTransport } from './transports/http.js';
import { startStdioTransport } from './transports/stdio.js';

// ============================================
// START SERVER
// ============================================

async function main() {
  const config = loadConfig();
  const components = createServer(config);
  let shutdown: () => Promise<void>;

  if (config.transport === 'http') {
    const app = buildHttpServer(components);
    const address = await startHttpTransport(app, config.http.host, config.http.port);
    shutdown = () => app.close();
    console.error(`Trello MCP Server v${SERVER_INFO.version} listening on ${address}`);
  } else {
    const transport = await startStdioTransport(components.handler);
    shutdown = () => transport.close();
    console.error(`Trello MCP Server v${SERVER_INFO.version} running on stdio`);
  }

  logger.info('Trello MCP Server started', {
    version: SERVER_INFO.version,
    transport: config.transport,
    tools: components.registry.size,
    provisioned_credentials: config.provisioned !== undefined,
    logging_enabled: logger.getConfig().enabled,
  }, 'main');

  console.error(`- Tools: ${components.registry.size} available`);
  console.error(`- Rate limit: ${config.rateLimit.maxCalls} calls / ${config.rateLimit.windowMs}ms`);
  console.error(`- Credentials: ${config.provisioned ? 'pre-provisioned' : 'per call or interactive'}`);

  const stop = (signal: string) => {
    safeLog.info(`Received ${signal}, shutting down`);
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
