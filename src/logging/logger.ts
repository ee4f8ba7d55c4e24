import { LogLevel, LogEntry, LogData, LoggerConfig, PerformanceMetrics } from './types.js';
import { MCPLogger } from './mcp-logger.js';
import { FileLogger } from './file-logger.js';
import { MetricsCollector } from './metrics.js';

const LEVEL_ORDER: LogLevel[] = Object.values(LogLevel);

function parseLevel(value: string | undefined): LogLevel {
  const match = LEVEL_ORDER.find((level) => level === value);
  return match ?? LogLevel.ERROR;
}

export class Logger {
  private config: LoggerConfig;
  private mcpLogger: MCPLogger;
  private fileLogger: FileLogger | null;
  private metricsCollector: MetricsCollector;

  constructor(config: LoggerConfig = Logger.configFromEnv()) {
    this.config = config;
    this.mcpLogger = new MCPLogger();
    this.fileLogger = this.config.fileEnabled ? new FileLogger() : null;
    this.metricsCollector = new MetricsCollector(this.config.metricsEnabled);
  }

  static configFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
    return {
      enabled: env.TRELLO_MCP_LOG_ENABLED !== 'false',
      level: parseLevel(env.TRELLO_MCP_LOG_LEVEL),
      mcpEnabled: env.TRELLO_MCP_LOG_MCP_ENABLED === 'true',
      fileEnabled: env.TRELLO_MCP_LOG_FILE_ENABLED === 'true',
      requestsEnabled: env.TRELLO_MCP_LOG_REQUESTS === 'true',
      metricsEnabled: env.TRELLO_MCP_LOG_METRICS !== 'false',
    };
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    if (!entry.timestamp) {
      entry.timestamp = new Date().toISOString();
    }

    if (this.config.mcpEnabled) {
      this.mcpLogger.log(entry);
    }

    if (this.fileLogger) {
      this.fileLogger.log(entry);
    }
  }

  debug(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.DEBUG, message, data, logger });
  }

  info(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.INFO, message, data, logger });
  }

  notice(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.NOTICE, message, data, logger });
  }

  warning(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.WARNING, message, data, logger });
  }

  error(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.ERROR, message, data, logger });
  }

  critical(message: string, data?: LogData, logger?: string): void {
    this.log({ level: LogLevel.CRITICAL, message, data, logger });
  }

  // Metrics API
  recordMetric(metric: PerformanceMetrics): void {
    this.metricsCollector.record(metric);
  }

  getMetrics() {
    return this.metricsCollector.getMetrics();
  }

  isRequestLoggingEnabled(): boolean {
    return this.config.enabled && this.config.requestsEnabled;
  }

  getMCPLogger(): MCPLogger {
    return this.mcpLogger;
  }

  // Runtime config update (without restart)
  updateConfig(newConfig: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...newConfig };

    if (newConfig.fileEnabled !== undefined) {
      if (newConfig.fileEnabled && !this.fileLogger) {
        this.fileLogger = new FileLogger();
      } else if (!newConfig.fileEnabled && this.fileLogger) {
        this.fileLogger.close();
        this.fileLogger = null;
      }
    }

    if (newConfig.metricsEnabled !== undefined) {
      this.metricsCollector = new MetricsCollector(newConfig.metricsEnabled);
    }

    this.info('Logging configuration updated', { config: { ...this.config } }, 'logger');
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// Singleton instance
export const logger = new Logger();
