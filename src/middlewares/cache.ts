/**
 * 缓存中间件
 *
 * 作用：缓存 GET 请求的成功响应，命中时直接返回，不再调用内层中间件和传输单元。
 * 仅支持内存缓存，每个中间件实例拥有独立的存储。
 *
 * 用法示例：
 * ```ts
 * builder.with(createCacheMiddleware({ ttl: 60_000 }));
 * ```
 */
import {
  middleware,
  type HttpMethod,
  type HttpRequest,
  type Layer,
  type ResponseData,
} from '../engine';

export interface CacheMiddlewareOptions {
  /** 缓存有效期(ms)，不设置表示永不过期 */
  ttl?: number;
  /** 可缓存的方法，默认 ['GET'] */
  methods?: HttpMethod[];
  /** 参与缓存键的请求头，默认 ['authorization', 'accept'] */
  varyHeaders?: string[];
  /** 最多缓存的条目数，默认 500；超出时淘汰最早写入的条目 */
  maxEntries?: number;
}

const DEFAULT_VARY_HEADERS = ['authorization', 'accept'];

/**
 * Published in the request's extensions so outer stages can tell whether
 * the response came from the cache.
 */
export class CacheStatus {
  constructor(readonly hit: boolean) {}
}

interface CacheEntry {
  response: ResponseData;
  expiresAt: number;
}

/**
 * Requests that differ in any of `varyHeaders` never share an entry.
 */
export function cacheKey(request: HttpRequest, varyHeaders: string[] = DEFAULT_VARY_HEADERS): string {
  const { method, baseURL = '', url, params, headers } = request;
  const vary: Record<string, string> = {};
  for (const name of varyHeaders) {
    const value = headers[name.toLowerCase()];
    if (value !== undefined) {
      vary[name.toLowerCase()] = value;
    }
  }
  return `${method} ${baseURL}${url} ${JSON.stringify(params)} ${JSON.stringify(vary)}`;
}

export function createCacheMiddleware(options: CacheMiddlewareOptions = {}): Layer {
  const { ttl, methods = ['GET'], varyHeaders = DEFAULT_VARY_HEADERS, maxEntries = 500 } = options;
  const store = new Map<string, CacheEntry>();

  function save(key: string, response: ResponseData) {
    const now = Date.now();
    for (const [storedKey, entry] of store) {
      if (entry.expiresAt <= now) {
        store.delete(storedKey);
      }
    }
    // Map 保持插入顺序，第一个键即最早写入的条目
    while (store.size >= maxEntries) {
      const oldest = store.keys().next();
      if (oldest.done) {
        break;
      }
      store.delete(oldest.value);
    }
    store.set(key, {
      response,
      expiresAt: ttl === undefined ? Number.POSITIVE_INFINITY : now + ttl,
    });
  }

  return middleware(async (request, extensions, next) => {
    if (!methods.includes(request.method)) {
      return next(request, extensions);
    }

    const key = cacheKey(request, varyHeaders);
    const entry = store.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      extensions.insert(new CacheStatus(true));
      return entry.response;
    }
    store.delete(key);

    extensions.insert(new CacheStatus(false));
    const response = await next(request, extensions);
    save(key, response);
    return response;
  });
}
