/**
 * 日志中间件
 *
 * 记录请求开始、完成和失败，错误原样向外抛出。
 */
import type { Logger } from 'pino';
import { middleware, type Layer } from '../engine';
import { getDefaultLogger } from '../logging/logger';

export interface LoggingMiddlewareOptions {
  logger?: Logger;
}

export function createLoggingMiddleware(options: LoggingMiddlewareOptions = {}): Layer {
  const logger = options.logger ?? getDefaultLogger();

  return middleware(async (request, extensions, next) => {
    const log = logger.child({ method: request.method, url: request.url });
    const startedAt = Date.now();
    log.info('request started');

    try {
      const response = await next(request, extensions);
      log.info({ status: response.status, durationMs: Date.now() - startedAt }, 'request completed');
      return response;
    } catch (error) {
      log.warn({ err: error, durationMs: Date.now() - startedAt }, 'request failed');
      throw error;
    }
  });
}
