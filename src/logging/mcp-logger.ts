import { LogEntry, LogLevel } from './types.js';
import { redactData, redactSecrets } from './redact.js';

export interface LogNotification {
  jsonrpc: '2.0';
  method: 'notifications/message';
  params: {
    level: LogLevel;
    logger: string;
    data: Record<string, unknown>;
  };
}

export type NotificationSink = (notification: LogNotification) => Promise<void>;

/**
 * Forwards log entries to the connected MCP client as `notifications/message`.
 * The sink is attached by whichever transport is active; until then entries
 * are dropped.
 */
export class MCPLogger {
  private sink: NotificationSink | null = null;

  setSink(sink: NotificationSink | null): void {
    this.sink = sink;
  }

  log(entry: LogEntry): void {
    if (!this.sink) {
      return;
    }

    const notification: LogNotification = {
      jsonrpc: '2.0',
      method: 'notifications/message',
      params: {
        level: entry.level,
        logger: entry.logger || 'trello-mcp',
        data: {
          message: redactSecrets(entry.message),
          timestamp: entry.timestamp || new Date().toISOString(),
          ...redactData(entry.data),
        },
      },
    };

    // logging must never crash a request
    this.sink(notification).catch((error: unknown) => {
      console.error('[MCPLogger] Failed to send log:', error);
    });
  }
}
