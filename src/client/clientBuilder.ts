/**
 * 客户端构建器
 */

import {
  identity,
  RequestStack,
  Stack,
  toInitializer,
  toLayer,
  type HttpAdapter,
  type InitializerFunction,
  type Layer,
  type Middleware,
  type RequestInitializer,
} from '../engine';
import type { Logger } from 'pino';
import { ClientWithMiddleware, type ClientOptions } from './httpClient';
import type { RequestBuilder, RequestDefaults } from './requestBuilder';

export type ClientMiddleware = Layer | Middleware;

export type ClientInitializer =
  | RequestInitializer<RequestBuilder>
  | InitializerFunction<RequestBuilder>;

/**
 * Collects middleware and initializers. Each call returns a new builder; the
 * first registered middleware ends up outermost and the first registered
 * initializer runs first.
 *
 * @example
 * ```ts
 * const client = new ClientBuilder(fetchAdapter('https://api.example.com'))
 *   .withInit((builder) => builder.header('x-client', 'docs'))
 *   .with(createLoggingMiddleware({ logger }))
 *   .with(createRetryMiddleware({ maxRetries: 2 }))
 *   .build();
 *
 * const response = await client.get('/users').query({ page: 1 }).send();
 * ```
 */
export class ClientBuilder {
  constructor(
    private readonly adapter: HttpAdapter,
    private readonly options: ClientOptions = {},
    private readonly middlewareStack: Layer = identity,
    private readonly initializerStack: RequestInitializer<RequestBuilder> = identity
  ) {}

  with(layer: ClientMiddleware): ClientBuilder {
    return new ClientBuilder(
      this.adapter,
      this.options,
      new Stack(toLayer(layer), this.middlewareStack),
      this.initializerStack
    );
  }

  withInit(init: ClientInitializer): ClientBuilder {
    return new ClientBuilder(
      this.adapter,
      this.options,
      this.middlewareStack,
      new RequestStack(toInitializer(init), this.initializerStack)
    );
  }

  build(): ClientWithMiddleware {
    return new ClientWithMiddleware(
      this.adapter,
      this.middlewareStack,
      this.initializerStack,
      this.options
    );
  }
}

/**
 * HTTP 客户端配置
 */
export interface HttpClientOptions {
  /** HTTP 适配器 */
  adapter: HttpAdapter;
  /** 中间件列表，按注册顺序由外到内 */
  middlewares?: ClientMiddleware[];
  /** 请求初始化器，按注册顺序执行 */
  initializers?: ClientInitializer[];
  /** 默认请求配置 */
  defaults?: RequestDefaults;
  logger?: Logger;
}

/**
 * 创建 HTTP 客户端
 *
 * @example
 * ```ts
 * import axios from 'axios';
 *
 * const client = createHttpClient({
 *   adapter: axiosAdapter(axios.create({ baseURL: 'https://api.example.com' })),
 *   middlewares: [loggingMiddleware, authMiddleware],
 * });
 *
 * const response = await client.get('/users').send();
 * ```
 */
export function createHttpClient(options: HttpClientOptions): ClientWithMiddleware {
  const { adapter, middlewares = [], initializers = [], defaults, logger } = options;

  let builder = new ClientBuilder(adapter, { defaults, logger });
  for (const layer of middlewares) {
    builder = builder.with(layer);
  }
  for (const init of initializers) {
    builder = builder.withInit(init);
  }
  return builder.build();
}
