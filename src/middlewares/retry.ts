/**
 * 重试中间件
 *
 * 提供自动重试功能，支持指数退避和自定义重试条件。
 * 失败时重新调用 next()，因此位于它内侧的中间件和传输单元会被再次执行。
 */

import {
  AbortError,
  isRequestError,
  isRetryableError,
  isStreamBody,
  middleware,
  type Layer,
} from '../engine';

/**
 * 重试中间件配置
 */
export interface RetryMiddlewareOptions {
  /** 最大重试次数，默认 3 */
  maxRetries?: number;
  /** 退避策略：linear（线性）或 exponential（指数），默认 exponential */
  backoff?: 'linear' | 'exponential';
  /** 基础延迟时间（毫秒），默认 1000 */
  baseDelay?: number;
  /** 最大延迟时间（毫秒），默认 30000 */
  maxDelay?: number;
  /** 可重试的 HTTP 状态码，默认 [408, 429, 500, 502, 503, 504] */
  retryableStatusCodes?: number[];
  /** 自定义重试条件，返回 true 表示应该重试 */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** 重试前的回调 */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Retry bookkeeping published in the request's extensions. `attempt` is 0
 * for the first try.
 */
export class RetryState {
  attempt = 0;
  lastError?: unknown;
}

/**
 * 默认可重试的状态码
 */
const DEFAULT_RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

/**
 * 计算延迟时间
 */
export function calculateDelay(
  attempt: number,
  backoff: 'linear' | 'exponential',
  baseDelay: number,
  maxDelay: number
): number {
  let delay: number;

  if (backoff === 'exponential') {
    // 指数退避：baseDelay * 2^attempt + 0-25% 随机抖动
    delay = baseDelay * Math.pow(2, attempt);
    delay += delay * Math.random() * 0.25;
  } else {
    // 线性退避：baseDelay * (attempt + 1)
    delay = baseDelay * (attempt + 1);
  }

  return Math.min(delay, maxDelay);
}

/**
 * 延迟函数，可被 signal 中断
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError('Request aborted by user'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Request aborted by user'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 检查错误是否应该重试
 */
function checkShouldRetry(
  error: unknown,
  attempt: number,
  retryableStatusCodes: number[],
  customShouldRetry?: (error: unknown, attempt: number) => boolean
): boolean {
  // 优先使用自定义重试条件
  if (customShouldRetry) {
    return customShouldRetry(error, attempt);
  }

  if (isRequestError(error)) {
    // 中止错误和构建错误不重试
    if (error.isAbortedError() || error.isBuildError()) {
      return false;
    }
    if (error.isHttpError() && error.status) {
      return retryableStatusCodes.includes(error.status);
    }
    return error.isRetryable();
  }

  return isRetryableError(error);
}

/**
 * 创建重试中间件
 *
 * @example
 * ```ts
 * const client = new ClientBuilder(fetchAdapter())
 *   .with(createRetryMiddleware({ maxRetries: 3, backoff: 'exponential' }))
 *   .build();
 * ```
 */
export function createRetryMiddleware(options: RetryMiddlewareOptions = {}): Layer {
  const {
    maxRetries = 3,
    backoff = 'exponential',
    baseDelay = 1000,
    maxDelay = 30000,
    retryableStatusCodes = DEFAULT_RETRYABLE_STATUS_CODES,
    shouldRetry,
    onRetry,
  } = options;

  return middleware(async (request, extensions, next) => {
    const state = extensions.getOrInsert(RetryState, () => new RetryState());

    // 流式请求体只能发送一次
    if (isStreamBody(request.body)) {
      return next(request, extensions);
    }

    for (let attempt = 0; ; attempt++) {
      state.attempt = attempt;
      try {
        return await next(request, extensions);
      } catch (error) {
        state.lastError = error;

        if (attempt >= maxRetries) {
          throw error;
        }
        if (!checkShouldRetry(error, attempt, retryableStatusCodes, shouldRetry)) {
          throw error;
        }

        const delay = calculateDelay(attempt, backoff, baseDelay, maxDelay);
        onRetry?.(error, attempt + 1);
        await sleep(delay, request.signal);
      }
    }
  });
}

/**
 * 创建简单重试中间件的快捷方法
 */
export function retryMiddleware(maxRetries = 3): Layer {
  return createRetryMiddleware({ maxRetries });
}
