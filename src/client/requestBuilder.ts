/**
 * 请求构建器
 *
 * Fluent setters never throw: problems are recorded and reported by
 * `build()` / `send()` as a BuildError, before any middleware runs.
 */

import type { Logger } from 'pino';
import {
  BuildError,
  Extensions,
  formatValidationMessage,
  isStreamBody,
  validateRequestParts,
  type HttpMethod,
  type HttpRequest,
  type QueryParams,
  type RequestBody,
  type ResponseData,
  type ResponseType,
} from '../engine';

export type HeaderValue = string | number | boolean;

/**
 * 客户端默认请求配置
 */
export interface RequestDefaults {
  baseURL?: string;
  headers?: Record<string, HeaderValue>;
  params?: QueryParams;
  timeout?: number;
  responseType?: ResponseType;
}

/**
 * Where a built request goes. Implemented by the client.
 */
export interface RequestExecutor {
  readonly logger: Logger;
  execute(request: HttpRequest, extensions: Extensions): Promise<ResponseData>;
}

interface RequestParts {
  method: HttpMethod;
  url: string;
  baseURL?: string;
  headers: Record<string, string>;
  params: QueryParams;
  body?: RequestBody;
  timeout?: number;
  responseType?: ResponseType;
  signal?: AbortSignal;
}

function normalizeHeaders(headers: Record<string, HeaderValue>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = String(value);
  }
  return result;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(headers, name);
}

export class RequestBuilder {
  private constructor(
    private readonly executor: RequestExecutor,
    private readonly parts: RequestParts,
    private readonly bag: Extensions,
    private readonly error?: BuildError
  ) {}

  static create(
    executor: RequestExecutor,
    method: HttpMethod,
    url: string,
    extensions: Extensions,
    defaults: RequestDefaults = {}
  ): RequestBuilder {
    return new RequestBuilder(
      executor,
      {
        method,
        url,
        baseURL: defaults.baseURL,
        headers: normalizeHeaders(defaults.headers ?? {}),
        params: { ...defaults.params },
        timeout: defaults.timeout,
        responseType: defaults.responseType,
      },
      extensions
    );
  }

  private update(patch: Partial<RequestParts>): RequestBuilder {
    return new RequestBuilder(this.executor, { ...this.parts, ...patch }, this.bag, this.error);
  }

  /**
   * Record a failure to be reported at materialization. The first recorded
   * failure wins.
   */
  fail(error: BuildError): RequestBuilder {
    if (this.error) {
      return this;
    }
    return new RequestBuilder(this.executor, this.parts, this.bag, error);
  }

  header(name: string, value: HeaderValue): RequestBuilder {
    return this.headers({ [name]: value });
  }

  headers(headers: Record<string, HeaderValue>): RequestBuilder {
    return this.update({ headers: { ...this.parts.headers, ...normalizeHeaders(headers) } });
  }

  private defaultHeader(name: string, value: string): RequestBuilder {
    return hasHeader(this.parts.headers, name) ? this : this.header(name, value);
  }

  basicAuth(username: string, password?: string): RequestBuilder {
    const credentials = Buffer.from(`${username}:${password ?? ''}`, 'utf8').toString('base64');
    return this.header('authorization', `Basic ${credentials}`);
  }

  bearerAuth(token: string): RequestBuilder {
    return this.header('authorization', `Bearer ${token}`);
  }

  body(body: RequestBody): RequestBuilder {
    return this.update({ body });
  }

  json(value: unknown): RequestBuilder {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(new BuildError(`Failed to encode JSON body: ${reason}`, { cause: error }));
    }
    if (encoded === undefined) {
      return this.fail(new BuildError('Failed to encode JSON body: value is not serializable'));
    }
    return this.defaultHeader('content-type', 'application/json').update({ body: encoded });
  }

  form(values: QueryParams): RequestBuilder {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined && value !== null) {
        search.append(key, String(value));
      }
    }
    return this.defaultHeader('content-type', 'application/x-www-form-urlencoded').update({
      body: search.toString(),
    });
  }

  /** The transport sets the multipart boundary header. */
  multipart(form: FormData): RequestBuilder {
    return this.update({ body: form });
  }

  query(params: QueryParams): RequestBuilder {
    return this.update({ params: { ...this.parts.params, ...params } });
  }

  timeout(ms: number): RequestBuilder {
    return this.update({ timeout: ms });
  }

  responseType(responseType: ResponseType): RequestBuilder {
    return this.update({ responseType });
  }

  signal(signal: AbortSignal): RequestBuilder {
    return this.update({ signal });
  }

  /**
   * Inserts the extension into this request's extensions
   */
  withExtension(value: object): RequestBuilder {
    this.bag.insert(value);
    return this;
  }

  /**
   * The extensions this request will carry through the middleware chain.
   */
  extensions(): Extensions {
    return this.bag;
  }

  /**
   * Freeze the builder into a request.
   *
   * @throws BuildError
   */
  build(): HttpRequest {
    if (this.error) {
      throw this.error;
    }

    const { method, url, baseURL, headers, params, body, timeout, responseType, signal } = this.parts;
    const issues = validateRequestParts({ method, url, headers, timeout });
    if (issues.length > 0) {
      throw new BuildError(formatValidationMessage(issues), { issues });
    }

    return Object.freeze({
      method,
      url,
      baseURL,
      headers: Object.freeze({ ...headers }),
      params: Object.freeze({ ...params }),
      body,
      timeout,
      responseType,
      signal,
    });
  }

  /**
   * Attempt to clone the builder. Returns `undefined` when the body is a
   * stream. Extensions are not carried over: the clone starts with an empty
   * bag.
   */
  tryClone(): RequestBuilder | undefined {
    if (isStreamBody(this.parts.body)) {
      return undefined;
    }
    return new RequestBuilder(
      this.executor,
      { ...this.parts, headers: { ...this.parts.headers }, params: { ...this.parts.params } },
      new Extensions(),
      this.error
    );
  }

  async send(): Promise<ResponseData> {
    let request: HttpRequest;
    try {
      request = this.build();
    } catch (error) {
      this.executor.logger.warn(
        { err: error, method: this.parts.method, url: this.parts.url },
        'request build failed'
      );
      throw error;
    }
    return this.executor.execute(request, this.bag);
  }
}
