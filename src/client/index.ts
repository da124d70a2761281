export { ClientWithMiddleware } from './httpClient';
export type { ClientOptions } from './httpClient';
export { ClientBuilder, createHttpClient } from './clientBuilder';
export type {
  ClientMiddleware,
  ClientInitializer,
  HttpClientOptions,
} from './clientBuilder';
export { RequestBuilder } from './requestBuilder';
export type { RequestDefaults, RequestExecutor, HeaderValue } from './requestBuilder';
export { TransportService } from './transport';
