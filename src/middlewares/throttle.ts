/**
 * 限流/节流中间件
 *
 * 作用：限制单位时间内的最大请求数（滑动窗口），超出的请求排队等待。
 * 计数状态属于中间件实例本身，由使用该实例的所有请求共享。
 *
 * 用法示例：
 * ```ts
 * builder.with(createThrottleMiddleware({ limit: 10, interval: 1000 }));
 * ```
 */
import { AbortError, middleware, type HttpRequest, type Layer } from '../engine';

export interface ThrottleOptions {
  /** 单位时间内最大请求数（默认5） */
  limit?: number;
  /** 单位时间(ms)，默认1000 */
  interval?: number;
}

export function createThrottleMiddleware(options: ThrottleOptions = {}): Layer {
  const { limit = 5, interval = 1000 } = options;
  const queue: Array<() => void> = [];
  let timestamps: number[] = [];
  let wakeTimer: ReturnType<typeof setTimeout> | undefined;

  function clean() {
    const now = Date.now();
    timestamps = timestamps.filter((ts) => now - ts < interval);
  }

  function scheduleWake() {
    if (queue.length === 0 || wakeTimer !== undefined) {
      return;
    }
    const oldest = timestamps[0] ?? Date.now();
    wakeTimer = setTimeout(drain, Math.max(0, oldest + interval - Date.now()));
  }

  function drain() {
    wakeTimer = undefined;
    clean();
    while (queue.length > 0 && timestamps.length < limit) {
      timestamps.push(Date.now());
      queue.shift()?.();
    }
    scheduleWake();
  }

  /**
   * Waits for a slot. Aborting the request while it is queued removes it from
   * the queue without taking a slot.
   */
  function acquire(request: HttpRequest): Promise<void> {
    const { signal } = request;
    if (signal?.aborted) {
      return Promise.reject(new AbortError('Request aborted by user', request));
    }
    clean();
    if (queue.length === 0 && timestamps.length < limit) {
      timestamps.push(Date.now());
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = queue.indexOf(grant);
        if (index !== -1) {
          queue.splice(index, 1);
        }
        reject(new AbortError('Request aborted by user', request));
      };
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      queue.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
      scheduleWake();
    });
  }

  return middleware(async (request, extensions, next) => {
    await acquire(request);
    return next(request, extensions);
  });
}
