export { logger, Logger } from './logger.js';
export { LogLevel, type LogEntry, type LogData, type PerformanceMetrics, type LoggerConfig } from './types.js';
export { MCPLogger, type LogNotification, type NotificationSink } from './mcp-logger.js';
export { MetricsCollector } from './metrics.js';
export { safeLog, redactSecrets, redactData, registerSecret, clearRegisteredSecrets, registeredSecretCount, MAX_REGISTERED_SECRETS } from './redact.js';
