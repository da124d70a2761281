/**
 * layered-http
 *
 * 在现有 HTTP 传输之前插入可组合的中间件管道
 *
 * 设计特点：
 * - Service / Layer 组合：先注册的中间件位于最外层
 * - 每个请求独立的 Extensions（按类型索引的上下文）
 * - 请求初始化器在请求构建之前运行
 * - 支持多种传输层适配器（axios/fetch/自定义）
 */

// ============================================================================
// Engine 核心导出
// ============================================================================

export {
  Extensions,

  // 组合
  Identity,
  identity,
  Stack,
  RequestStack,
  service,
  middleware,
  initializer,
  isLayer,
  toLayer,
  toInitializer,
  composeLayers,
  composeInitializers,

  // 请求工具
  isStreamBody,
  cloneRequest,

  // 校验
  httpMethodSchema,
  headerNameSchema,
  headerValueSchema,
  requestPartsSchema,
  validateRequestParts,
  formatValidationMessage,

  // 错误处理
  RequestErrorType,
  RequestError,
  BuildError,
  MiddlewareError,
  TransportError,
  NetworkError,
  TimeoutError,
  HttpError,
  AbortError,
  ParseError,
  normalizeError,
  toPipelineError,
  createHttpError,
  isRequestError,
  isTransportError,
  isRetryableError,
} from './engine';

export type {
  ExtensionType,
  Service,
  Layer,
  Next,
  Middleware,
  RequestInitializer,
  InitializerFunction,
  ValidationIssue,
  RequestPartsInput,

  // HTTP 相关默认类型
  HttpMethod,
  HttpRequest,
  ResponseData,
  ResponseType,
  RequestBody,
  QueryValue,
  QueryParams,
  HttpAdapter,
} from './engine';

// ============================================================================
// HTTP Client 导出
// ============================================================================

export {
  ClientWithMiddleware,
  ClientBuilder,
  createHttpClient,
  RequestBuilder,
  TransportService,
} from './client';

export type {
  ClientOptions,
  ClientMiddleware,
  ClientInitializer,
  HttpClientOptions,
  RequestDefaults,
  RequestExecutor,
  HeaderValue,
} from './client';

// ============================================================================
// Adapters 导出
// ============================================================================

export { createAxiosAdapter, axiosAdapter, createFetchAdapter, fetchAdapter, buildUrl } from './adapters';

export type { AxiosAdapterConfig, FetchAdapterConfig } from './adapters';

// ============================================================================
// 内置中间件导出
// ============================================================================

export {
  createRetryMiddleware,
  retryMiddleware,
  calculateDelay,
  RetryState,
  createTimeoutMiddleware,
  createThrottleMiddleware,
  createCacheMiddleware,
  cacheKey,
  CacheStatus,
  createLoggingMiddleware,
} from './middlewares';

export type {
  RetryMiddlewareOptions,
  TimeoutMiddlewareOptions,
  ThrottleOptions,
  CacheMiddlewareOptions,
  LoggingMiddlewareOptions,
} from './middlewares';

// ============================================================================
// Logging
// ============================================================================

export { createLogger, getDefaultLogger, resolveLogLevel, logLevelSchema } from './logging/logger';
export type { Logger, LoggerOptions, LogLevel } from './logging/logger';
