/**
 * 超时中间件
 *
 * 为其内侧的整条链路（包括重试）设置总超时。内层收到的请求携带一个
 * 关联的 signal，超时或用户取消时传输单元会被中止。
 */
import {
  AbortError,
  TimeoutError,
  cloneRequest,
  middleware,
  type Layer,
} from '../engine';

export interface TimeoutMiddlewareOptions {
  /** 总超时时间(ms) */
  timeout: number;
}

export function createTimeoutMiddleware(options: TimeoutMiddlewareOptions): Layer {
  const { timeout } = options;

  return middleware(async (request, extensions, next) => {
    const userSignal = request.signal;
    if (userSignal?.aborted) {
      throw new AbortError('Request aborted by user', request);
    }

    const controller = new AbortController();
    const onUserAbort = () => controller.abort();
    userSignal?.addEventListener('abort', onUserAbort, { once: true });

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new TimeoutError(`Request timeout after ${timeout}ms`, timeout, request));
        controller.abort();
      }, timeout);
    });

    try {
      return await Promise.race([
        next(cloneRequest(request, { signal: controller.signal }), extensions),
        deadline,
      ]);
    } finally {
      clearTimeout(timeoutId);
      userSignal?.removeEventListener('abort', onUserAbort);
    }
  });
}
