/**
 * 中间件引擎类型定义
 *
 * 设计原则：
 * - Engine 本身与 HTTP/网络完全解耦：Service / Layer / Initializer 都是泛型的
 * - 每个请求携带一个独立的 Extensions（类型索引的上下文）
 * - 提供默认的 HTTP 类型供便捷使用
 */

import type { Extensions } from './extensions';
import type { HttpMethod } from './validation';

export type { HttpMethod } from './validation';

// ============================================================================
// 基础类型
// ============================================================================

/**
 * A unit of work: consumes a request plus the request's extensions and
 * produces a result asynchronously.
 *
 * Implementations may call the next stage any number of times, or not at all.
 */
export interface Service<TReq = HttpRequest, TRes = ResponseData> {
  call(request: TReq, extensions: Extensions): Promise<TRes>;
}

/**
 * Wraps one service to produce another. Applying a layer must not perform
 * I/O; all effects belong to the produced service's `call`.
 */
export interface Layer<TReq = HttpRequest, TRes = ResponseData> {
  layer(inner: Service<TReq, TRes>): Service<TReq, TRes>;
}

/**
 * 下一步函数类型
 *
 * Calling it runs every inner stage and, eventually, the transport.
 */
export type Next<TReq = HttpRequest, TRes = ResponseData> = (
  request: TReq,
  extensions: Extensions
) => Promise<TRes>;

/**
 * 中间件函数类型
 *
 * @example
 * ```ts
 * const logger: Middleware = async (request, extensions, next) => {
 *   console.log('Request:', request.url);
 *   const response = await next(request, extensions);
 *   console.log('Response:', response.status);
 *   return response;
 * };
 * ```
 */
export type Middleware<TReq = HttpRequest, TRes = ResponseData> = (
  request: TReq,
  extensions: Extensions,
  next: Next<TReq, TRes>
) => Promise<TRes>;

/**
 * Runs before a request is materialized. Receives the builder and the bag
 * the request will carry, and returns a (possibly modified) builder.
 */
export interface RequestInitializer<B> {
  init(builder: B, extensions: Extensions): B;
}

export type InitializerFunction<B> = (builder: B, extensions: Extensions) => B;

// ============================================================================
// HTTP 相关默认类型（供 adapter 层使用）
// ============================================================================

export type ResponseType = 'json' | 'text' | 'blob' | 'arraybuffer';

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * 请求体
 *
 * A `ReadableStream` body is a one-shot source: it cannot be replayed.
 */
export type RequestBody =
  | string
  | ArrayBuffer
  | Blob
  | FormData
  | URLSearchParams
  | ReadableStream<Uint8Array>;

/**
 * 已构建的请求（不可变）
 */
export interface HttpRequest {
  readonly method: HttpMethod;
  /** 请求 URL */
  readonly url: string;
  /** 基础 URL */
  readonly baseURL?: string;
  /** 请求头（名称均为小写） */
  readonly headers: Readonly<Record<string, string>>;
  /** 请求参数 (query string) */
  readonly params: Readonly<QueryParams>;
  readonly body?: RequestBody;
  /** 超时时间 (ms)，0 或未设置表示不限 */
  readonly timeout?: number;
  readonly responseType?: ResponseType;
  /** 请求取消信号 */
  readonly signal?: AbortSignal;
}

/**
 * 响应对象
 */
export interface ResponseData<TData = unknown> {
  data: TData;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** The request that produced this response */
  request: HttpRequest;
}

/**
 * HTTP 适配器接口
 *
 * 所有 adapter（axios/fetch/其他）都需要实现此接口
 */
export interface HttpAdapter {
  request(request: HttpRequest): Promise<ResponseData>;
}
