import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { logger } from '../logging/index.js';

const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

// key/token ride along as query params on every Trello call
function loggableParams(params: unknown): Record<string, unknown> | undefined {
  if (typeof params !== 'object' || params === null) return undefined;
  return Object.fromEntries(
    Object.entries(params).filter(([name]) => name !== 'key' && name !== 'token')
  );
}

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const start = config ? startTimes.get(config) : undefined;
  return start !== undefined ? Date.now() - start : 0;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  axiosInstance.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    startTimes.set(config, Date.now());

    if (logger.isRequestLoggingEnabled()) {
      logger.debug('HTTP Request', {
        method: config.method?.toUpperCase(),
        url: config.url,
        params: loggableParams(config.params),
      }, 'http-client');
    }

    return config;
  });

  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      const duration = elapsed(response.config);

      if (logger.isRequestLoggingEnabled()) {
        logger.debug('HTTP Response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration_ms: duration,
        }, 'http-client');
      }

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success: true,
        timestamp: new Date().toISOString(),
      });

      return response;
    },
    (error: unknown) => {
      if (!axios.isAxiosError(error)) {
        return Promise.reject(error);
      }

      const duration = elapsed(error.config);
      logger.error('HTTP Response Error', {
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
        status: error.response?.status,
        duration_ms: duration,
        message: error.message,
      }, 'http-client');

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success: false,
        timestamp: new Date().toISOString(),
        error_type: error.response ? `HTTP_${error.response.status}` : error.code,
      });

      return Promise.reject(error);
    }
  );
}
