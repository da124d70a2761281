/**
 * 内置中间件
 */

export { createRetryMiddleware, retryMiddleware, calculateDelay, RetryState } from './retry';
export type { RetryMiddlewareOptions } from './retry';

export { createTimeoutMiddleware } from './timeout';
export type { TimeoutMiddlewareOptions } from './timeout';

export { createThrottleMiddleware } from './throttle';
export type { ThrottleOptions } from './throttle';

export { createCacheMiddleware, cacheKey, CacheStatus } from './cache';
export type { CacheMiddlewareOptions } from './cache';

export { createLoggingMiddleware } from './logging';
export type { LoggingMiddlewareOptions } from './logging';
