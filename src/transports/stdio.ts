import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { type JSONRPCMessage, JSONRPCMessageSchema } from '@modelcontextprotocol/sdk/types.js';
import { logger, safeLog } from '../logging/index.js';
import { type ProtocolHandler, ProtocolSession } from '../protocol.js';

/**
 * Serves the protocol handler over stdin/stdout. Messages are handled
 * concurrently; each response is written as soon as it is ready.
 */
export async function startStdioTransport(handler: ProtocolHandler): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  // one client per process
  const session = new ProtocolSession();

  const send = async (message: unknown): Promise<void> => {
    const parsed = JSONRPCMessageSchema.safeParse(message);
    if (!parsed.success) {
      // e.g. an error response with a null id, which stdio framing cannot carry
      safeLog.warn('Dropping outbound message the stdio transport cannot frame');
      return;
    }
    await transport.send(parsed.data);
  };

  transport.onmessage = (message: JSONRPCMessage) => {
    handler
      .handle(message, { session })
      .then((response) => (response ? send(response) : undefined))
      .catch((error: unknown) => {
        logger.error('Failed to answer stdio message', {
          reason: error instanceof Error ? error.message : String(error),
        }, 'stdio-transport');
      });
  };

  // Frames the SDK reader cannot parse arrive here instead of onmessage
  transport.onerror = (error: Error) => {
    safeLog.error(`stdio transport error: ${error.message}`);
    logger.error('stdio transport error', { message: error.message }, 'stdio-transport');
  };

  transport.onclose = () => {
    logger.getMCPLogger().setSink(null);
    logger.info('stdio transport closed', undefined, 'stdio-transport');
  };

  logger.getMCPLogger().setSink(send);
  await transport.start();
  return transport;
}
