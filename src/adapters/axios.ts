/**
 * Axios 适配器
 *
 * 将 axios 实例适配为统一的 HttpAdapter 接口
 */

import type { AxiosInstance, AxiosResponse, AxiosRequestConfig, AxiosError } from 'axios';
import type { HttpAdapter, HttpRequest, ResponseData } from '../engine';
import {
  HttpError,
  NetworkError,
  TimeoutError,
  AbortError,
  normalizeError,
} from '../engine';

/**
 * Axios 适配器配置
 */
export interface AxiosAdapterConfig {
  /** Axios 实例 */
  instance: AxiosInstance;
}

/**
 * 将内部请求转换为 Axios 请求配置
 */
function toAxiosConfig(request: HttpRequest): AxiosRequestConfig {
  return {
    url: request.url,
    method: request.method,
    headers: { ...request.headers },
    params: { ...request.params },
    data: request.body,
    timeout: request.timeout,
    baseURL: request.baseURL,
    responseType: request.responseType,
    signal: request.signal,
  };
}

/**
 * Flatten axios headers (plain object or AxiosHeaders) to strings
 */
function toHeaderRecord(headers: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (headers === null || typeof headers !== 'object') {
    return result;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * 将 Axios 响应转换为内部响应格式
 */
function fromAxiosResponse(axiosResponse: AxiosResponse, request: HttpRequest): ResponseData {
  return {
    data: axiosResponse.data,
    status: axiosResponse.status,
    statusText: axiosResponse.statusText,
    headers: toHeaderRecord(axiosResponse.headers),
    request,
  };
}

/**
 * Check if error is AxiosError
 */
function isAxiosError(error: unknown): error is AxiosError {
  return (
    error !== null &&
    typeof error === 'object' &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

/**
 * 创建 Axios 适配器
 *
 * @example
 * ```ts
 * import axios from 'axios';
 *
 * const adapter = createAxiosAdapter({
 *   instance: axios.create({ baseURL: 'https://api.example.com' })
 * });
 * ```
 */
export function createAxiosAdapter(config: AxiosAdapterConfig): HttpAdapter {
  const { instance } = config;

  return {
    async request(request: HttpRequest): Promise<ResponseData> {
      try {
        const response = await instance.request(toAxiosConfig(request));
        return fromAxiosResponse(response, request);
      } catch (error) {
        if (isAxiosError(error)) {
          // HTTP error (4xx/5xx)
          if (error.response) {
            throw new HttpError(
              `HTTP Error: ${error.response.status} ${error.response.statusText}`,
              error.response.status,
              error.response.statusText,
              request,
              fromAxiosResponse(error.response, request)
            );
          }

          // Canceled
          if (error.code === 'ERR_CANCELED') {
            throw new AbortError('Request aborted', request);
          }

          // Timeout
          if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message?.includes('timeout')) {
            throw new TimeoutError(
              error.message || `Request timeout after ${request.timeout ?? 0}ms`,
              request.timeout ?? 0,
              request
            );
          }

          // Network error
          throw new NetworkError(error.message || 'Network error', request, error);
        }

        throw normalizeError(error, request);
      }
    },
  };
}

/**
 * 从 Axios 实例创建适配器的快捷方法
 */
export function axiosAdapter(instance: AxiosInstance): HttpAdapter {
  return createAxiosAdapter({ instance });
}
