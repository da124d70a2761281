/**
 * HTTP 客户端
 *
 * 组合 Engine + Adapter：每个请求依次经过
 * initializer 链 → 构建器 → 不可变请求 → 中间件栈 → 传输单元
 */

import type { Logger } from 'pino';
import {
  BuildError,
  Extensions,
  identity,
  toPipelineError,
  type HttpAdapter,
  type HttpMethod,
  type HttpRequest,
  type Layer,
  type RequestInitializer,
  type ResponseData,
  type Service,
} from '../engine';
import { getDefaultLogger } from '../logging/logger';
import { RequestBuilder, type RequestDefaults, type RequestExecutor } from './requestBuilder';
import { TransportService } from './transport';

/**
 * 客户端配置
 */
export interface ClientOptions {
  /** 默认请求配置 */
  defaults?: RequestDefaults;
  logger?: Logger;
}

/**
 * Runs every request through the registered middleware before it reaches
 * the adapter.
 *
 * The pipeline is composed once, here: services hold no per-request state,
 * since that travels in each call's Extensions, so one composed service
 * serves every concurrent request.
 */
export class ClientWithMiddleware implements RequestExecutor {
  readonly logger: Logger;
  private readonly pipeline: Service;
  private readonly defaults: RequestDefaults;

  constructor(
    adapter: HttpAdapter,
    middlewareStack: Layer,
    private readonly initializerStack: RequestInitializer<RequestBuilder>,
    options: ClientOptions = {}
  ) {
    this.logger = options.logger ?? getDefaultLogger();
    this.defaults = options.defaults ?? {};
    this.pipeline = middlewareStack.layer(new TransportService(adapter));
  }

  /**
   * A client without any middleware or initializer.
   */
  static from(adapter: HttpAdapter, options?: ClientOptions): ClientWithMiddleware {
    return new ClientWithMiddleware(adapter, identity, identity, options);
  }

  get(url: string): RequestBuilder {
    return this.request('GET', url);
  }

  post(url: string): RequestBuilder {
    return this.request('POST', url);
  }

  put(url: string): RequestBuilder {
    return this.request('PUT', url);
  }

  patch(url: string): RequestBuilder {
    return this.request('PATCH', url);
  }

  delete(url: string): RequestBuilder {
    return this.request('DELETE', url);
  }

  head(url: string): RequestBuilder {
    return this.request('HEAD', url);
  }

  options(url: string): RequestBuilder {
    return this.request('OPTIONS', url);
  }

  /**
   * Start a request. Initializers run now, on the fresh builder and the bag
   * that will travel with this request; anything they throw is reported when
   * the request is built.
   */
  request(method: HttpMethod, url: string): RequestBuilder {
    const extensions = new Extensions();
    const builder = RequestBuilder.create(this, method, url, extensions, this.defaults);
    try {
      return this.initializerStack.init(builder, extensions);
    } catch (error) {
      if (error instanceof BuildError) {
        return builder.fail(error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      return builder.fail(new BuildError(`Request initializer failed: ${reason}`, { cause: error }));
    }
  }

  /**
   * Run an already built request through the middleware chain.
   */
  async execute(request: HttpRequest, extensions: Extensions = new Extensions()): Promise<ResponseData> {
    const { method, url } = request;
    const startedAt = Date.now();
    this.logger.debug({ method, url }, 'dispatching request');

    try {
      const response = await this.pipeline.call(request, extensions);
      this.logger.debug(
        { method, url, status: response.status, durationMs: Date.now() - startedAt },
        'request completed'
      );
      return response;
    } catch (error) {
      const failure = toPipelineError(error, request);
      this.logger.debug(
        { method, url, type: failure.type, durationMs: Date.now() - startedAt, err: failure },
        'request failed'
      );
      throw failure;
    }
  }
}
