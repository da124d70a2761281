/**
 * Engine 模块导出
 */

export { Extensions } from './extensions';
export type { ExtensionType } from './extensions';

export {
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
} from './compose';

// 错误处理导出
export {
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
} from './errors';

export { isStreamBody, cloneRequest } from './request';

export {
  httpMethodSchema,
  headerNameSchema,
  headerValueSchema,
  requestPartsSchema,
  validateRequestParts,
  formatValidationMessage,
} from './validation';
export type { ValidationIssue, RequestPartsInput } from './validation';

// 类型导出
export type {
  Service,
  Layer,
  Next,
  Middleware,
  RequestInitializer,
  InitializerFunction,

  // HTTP 相关默认类型
  HttpMethod,
  HttpRequest,
  ResponseData,
  ResponseType,
  RequestBody,
  QueryValue,
  QueryParams,
  HttpAdapter,
} from './middlewareTypes';
