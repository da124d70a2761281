/**
 * Fetch 适配器
 *
 * 将原生 fetch API 适配为统一的 HttpAdapter 接口
 */

import type { HttpAdapter, HttpRequest, ResponseData, ResponseType } from '../engine';
import {
  TimeoutError,
  HttpError,
  NetworkError,
  AbortError,
  ParseError,
  isStreamBody,
  normalizeError,
} from '../engine';

/**
 * Fetch 适配器配置
 */
export interface FetchAdapterConfig {
  /** 基础 URL */
  baseURL?: string;
  /** 默认请求头 */
  defaultHeaders?: Record<string, string>;
  /** 自定义 fetch 实现（用于测试）*/
  customFetch?: typeof fetch;
}

/** Streaming request bodies need `duplex: 'half'` under Node's fetch. */
type FetchInit = RequestInit & { duplex?: 'half' };

/**
 * 构建完整 URL
 */
export function buildUrl(request: HttpRequest, baseURL?: string): string {
  let url = request.url;

  // 处理 baseURL
  if (baseURL && !url.startsWith('http://') && !url.startsWith('https://')) {
    url = baseURL.replace(/\/$/, '') + '/' + url.replace(/^\//, '');
  }

  // 处理 query params
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(request.params)) {
    if (value !== undefined && value !== null) {
      searchParams.append(key, String(value));
    }
  }
  const queryString = searchParams.toString();
  if (queryString) {
    url += (url.includes('?') ? '&' : '?') + queryString;
  }

  return url;
}

/**
 * Request header names are lower-cased; defaults are matched to them so the
 * request value replaces the default.
 */
function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = value;
  }
  return result;
}

/**
 * 将 Headers 对象转换为普通对象
 */
function headersToObject(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

/**
 * 解析响应体
 */
async function parseResponseBody(response: Response, responseType?: ResponseType): Promise<unknown> {
  switch (responseType) {
    case 'text':
      return response.text();
    case 'blob':
      return response.blob();
    case 'arraybuffer':
      return response.arrayBuffer();
    case 'json':
    default: {
      // 尝试解析 JSON，如果失败则返回原始文本
      const text = await response.text();
      if (text === '') {
        return undefined;
      }
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
  }
}

/**
 * 创建 Fetch 适配器
 *
 * @example
 * ```ts
 * const adapter = createFetchAdapter({
 *   baseURL: 'https://api.example.com',
 *   defaultHeaders: { accept: 'application/json' },
 * });
 * ```
 */
export function createFetchAdapter(config: FetchAdapterConfig = {}): HttpAdapter {
  const { baseURL, customFetch } = config;
  const defaultHeaders = lowerCaseKeys(config.defaultHeaders ?? {});

  return {
    async request(request: HttpRequest): Promise<ResponseData> {
      const fetchFn = customFetch ?? fetch;
      const url = buildUrl(request, request.baseURL ?? baseURL);

      const fetchConfig: FetchInit = {
        method: request.method,
        headers: { ...defaultHeaders, ...request.headers },
      };

      if (request.body !== undefined) {
        fetchConfig.body = request.body;
        if (isStreamBody(request.body)) {
          fetchConfig.duplex = 'half';
        }
      }

      // 处理请求取消和超时
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      const userSignal = request.signal;
      const timeout = request.timeout ?? 0;

      // 如果用户的 signal 已经被取消，立即抛出错误
      if (userSignal?.aborted) {
        throw new AbortError('Request aborted by user', request);
      }

      const internalAbortController = new AbortController();
      const onUserAbort = () => internalAbortController.abort();
      if (userSignal || timeout > 0) {
        fetchConfig.signal = internalAbortController.signal;
        userSignal?.addEventListener('abort', onUserAbort, { once: true });

        if (timeout > 0) {
          timeoutId = setTimeout(() => {
            internalAbortController.abort();
          }, timeout);
        }
      }

      try {
        const response = await fetchFn(url, fetchConfig);

        // 错误响应同样读取响应体，随 HttpError 一起返回
        let data: unknown;
        try {
          data = await parseResponseBody(response, request.responseType);
        } catch (parseErr) {
          throw new ParseError('Failed to parse response body', request, undefined, parseErr);
        }

        const result: ResponseData = {
          data,
          status: response.status,
          statusText: response.statusText,
          headers: headersToObject(response.headers),
          request,
        };

        // HTTP 错误状态码处理
        if (!response.ok) {
          throw new HttpError(
            `HTTP Error: ${response.status} ${response.statusText}`,
            response.status,
            response.statusText,
            request,
            result
          );
        }

        return result;
      } catch (error) {
        // 已经是统一错误类型，直接抛出
        if (error instanceof HttpError || error instanceof ParseError) {
          throw error;
        }

        if (
          (error instanceof DOMException && error.name === 'AbortError') ||
          internalAbortController.signal.aborted
        ) {
          // 优先检查用户是否主动取消
          if (userSignal?.aborted) {
            throw new AbortError('Request aborted by user', request);
          }
          // 否则是超时导致的取消
          if (timeout > 0) {
            throw new TimeoutError(`Request timeout after ${timeout}ms`, timeout, request);
          }
          throw new AbortError('Request aborted', request);
        }

        // 处理网络错误
        if (error instanceof TypeError) {
          throw new NetworkError(error.message || 'Network error', request, error);
        }

        throw normalizeError(error, request);
      } finally {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        userSignal?.removeEventListener('abort', onUserAbort);
      }
    },
  };
}

/**
 * 创建 Fetch 适配器的快捷方法
 */
export function fetchAdapter(baseURL?: string): HttpAdapter {
  return createFetchAdapter({ baseURL });
}
