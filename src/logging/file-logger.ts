import pino from 'pino';
import { LogEntry, LogLevel } from './types.js';
import { redactData, redactSecrets } from './redact.js';

type PinoLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class FileLogger {
  private pino: pino.Logger;

  constructor(logPath: string = process.env.TRELLO_MCP_LOG_FILE_PATH || './logs/trello-mcp.log') {
    this.pino = pino(
      {
        level: 'debug', // filtering happens in logger.ts
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        redact: {
          paths: ['*.token', '*.key', '*.api_key', '*.apiKey', 'params.token', 'params.key'],
          censor: '***REDACTED***',
        },
      },
      pino.destination({
        dest: logPath,
        sync: false,
        mkdir: true,
      })
    );
  }

  log(entry: LogEntry): void {
    try {
      const safeMessage = redactSecrets(entry.message);
      const safeData = redactData(entry.data);

      this.pino[this.mapToPinoLevel(entry.level)](
        {
          rfc_level: entry.level,
          logger: entry.logger,
          timestamp: entry.timestamp || new Date().toISOString(),
          ...safeData,
        },
        safeMessage
      );
    } catch (error) {
      console.error('[FileLogger] Failed to write log:', error);
    }
  }

  // Map RFC 5424 levels to pino's standard levels
  private mapToPinoLevel(level: LogLevel): PinoLevel {
    switch (level) {
      case LogLevel.DEBUG: return 'debug';
      case LogLevel.INFO: return 'info';
      case LogLevel.NOTICE: return 'info';
      case LogLevel.WARNING: return 'warn';
      case LogLevel.ERROR: return 'error';
      case LogLevel.CRITICAL: return 'error';
      case LogLevel.ALERT: return 'fatal';
      case LogLevel.EMERGENCY: return 'fatal';
      default: return 'info';
    }
  }

  close(): void {
    this.pino.flush();
  }
}
