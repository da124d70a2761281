/**
 * Unified Error Handling Module
 *
 * Three families reach the caller:
 * - BuildError: the builder could not be materialized; no middleware ran
 * - MiddlewareError: a middleware failed with something that is not a RequestError
 * - TransportError and its subclasses: the adapter failed
 */

import type { HttpRequest, ResponseData } from './middlewareTypes';
import type { ValidationIssue } from './validation';

/**
 * Error type enum
 */
export enum RequestErrorType {
  /** Request could not be built */
  BUILD = 'BUILD',
  /** Raised by a middleware */
  MIDDLEWARE = 'MIDDLEWARE',
  /** Network error */
  NETWORK = 'NETWORK',
  /** Request timeout */
  TIMEOUT = 'TIMEOUT',
  /** HTTP status error (4xx/5xx) */
  HTTP = 'HTTP',
  /** Request aborted */
  ABORTED = 'ABORTED',
  /** Response parse error */
  PARSE = 'PARSE',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

const TRANSPORT_ERROR_TYPES: ReadonlySet<RequestErrorType> = new Set([
  RequestErrorType.NETWORK,
  RequestErrorType.TIMEOUT,
  RequestErrorType.HTTP,
  RequestErrorType.ABORTED,
  RequestErrorType.PARSE,
  RequestErrorType.UNKNOWN,
]);

/**
 * Base request error class
 */
export class RequestError extends Error {
  readonly type: RequestErrorType;
  readonly status?: number;
  readonly statusText?: string;
  readonly request?: HttpRequest;
  readonly response?: ResponseData;
  readonly cause?: unknown;
  readonly timestamp: number;

  constructor(
    message: string,
    type: RequestErrorType,
    options?: {
      status?: number;
      statusText?: string;
      request?: HttpRequest;
      response?: ResponseData;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'RequestError';
    this.type = type;
    this.status = options?.status;
    this.statusText = options?.statusText;
    this.request = options?.request;
    this.response = options?.response;
    this.cause = options?.cause;
    this.timestamp = Date.now();

    Object.setPrototypeOf(this, RequestError.prototype);
  }

  isBuildError(): boolean {
    return this.type === RequestErrorType.BUILD;
  }

  isMiddlewareError(): boolean {
    return this.type === RequestErrorType.MIDDLEWARE;
  }

  isTransportError(): boolean {
    return TRANSPORT_ERROR_TYPES.has(this.type);
  }

  isNetworkError(): boolean {
    return this.type === RequestErrorType.NETWORK;
  }

  isTimeoutError(): boolean {
    return this.type === RequestErrorType.TIMEOUT;
  }

  isHttpError(): boolean {
    return this.type === RequestErrorType.HTTP;
  }

  isAbortedError(): boolean {
    return this.type === RequestErrorType.ABORTED;
  }

  /**
   * Check if error is retryable
   */
  isRetryable(): boolean {
    if (this.type === RequestErrorType.NETWORK) return true;
    if (this.type === RequestErrorType.TIMEOUT) return true;
    if (this.type === RequestErrorType.HTTP && this.status && this.status >= 500) return true;
    return false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      type: this.type,
      status: this.status,
      statusText: this.statusText,
      timestamp: this.timestamp,
      url: this.request?.url,
      method: this.request?.method,
    };
  }
}

/**
 * The builder could not produce a request
 */
export class BuildError extends RequestError {
  readonly issues: ValidationIssue[];

  constructor(message: string, options?: { issues?: ValidationIssue[]; cause?: unknown }) {
    super(message, RequestErrorType.BUILD, { cause: options?.cause });
    this.name = 'BuildError';
    this.issues = options?.issues ?? [];
    Object.setPrototypeOf(this, BuildError.prototype);
  }
}

/**
 * A middleware failed; `cause` holds whatever it threw
 */
export class MiddlewareError extends RequestError {
  constructor(message: string, request?: HttpRequest, cause?: unknown) {
    super(message, RequestErrorType.MIDDLEWARE, { request, cause });
    this.name = 'MiddlewareError';
    Object.setPrototypeOf(this, MiddlewareError.prototype);
  }
}

/**
 * Base class of every failure raised by the transport
 */
export class TransportError extends RequestError {
  constructor(
    message: string,
    type: RequestErrorType = RequestErrorType.UNKNOWN,
    options?: {
      status?: number;
      statusText?: string;
      request?: HttpRequest;
      response?: ResponseData;
      cause?: unknown;
    }
  ) {
    super(message, type, options);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Network error
 */
export class NetworkError extends TransportError {
  constructor(message: string, request?: HttpRequest, cause?: unknown) {
    super(message, RequestErrorType.NETWORK, { request, cause });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends TransportError {
  readonly timeout: number;

  constructor(message: string, timeout: number, request?: HttpRequest) {
    super(message, RequestErrorType.TIMEOUT, { request });
    this.name = 'TimeoutError';
    this.timeout = timeout;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * HTTP error (4xx/5xx)
 */
export class HttpError extends TransportError {
  constructor(
    message: string,
    status: number,
    statusText: string,
    request?: HttpRequest,
    response?: ResponseData
  ) {
    super(message, RequestErrorType.HTTP, { status, statusText, request, response });
    this.name = 'HttpError';
    Object.setPrototypeOf(this, HttpError.prototype);
  }

  isClientError(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }

  isServerError(): boolean {
    return this.status !== undefined && this.status >= 500;
  }
}

/**
 * Abort error
 */
export class AbortError extends TransportError {
  constructor(message: string = 'Request aborted', request?: HttpRequest) {
    super(message, RequestErrorType.ABORTED, { request });
    this.name = 'AbortError';
    Object.setPrototypeOf(this, AbortError.prototype);
  }
}

/**
 * Parse error
 */
export class ParseError extends TransportError {
  readonly rawResponse?: string;

  constructor(message: string, request?: HttpRequest, rawResponse?: string, cause?: unknown) {
    super(message, RequestErrorType.PARSE, { request, cause });
    this.name = 'ParseError';
    this.rawResponse = rawResponse;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

// ============================================================================
// Utility functions
// ============================================================================

/**
 * Normalize anything a transport throws to a RequestError
 */
export function normalizeError(error: unknown, request?: HttpRequest): RequestError {
  if (error instanceof RequestError) {
    return error;
  }

  // Handle DOMException (AbortError)
  if (error instanceof DOMException && error.name === 'AbortError') {
    return new AbortError('Request aborted', request);
  }

  // Handle TypeError (usually network error)
  if (error instanceof TypeError) {
    if (error.message.includes('fetch') || error.message.includes('network')) {
      return new NetworkError(error.message, request, error);
    }
  }

  // Handle standard Error
  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('timeout')) {
      return new TimeoutError(error.message, request?.timeout ?? 0, request);
    }

    if (error.name === 'AbortError' || message.includes('abort')) {
      return new AbortError(error.message, request);
    }

    if (
      message.includes('network') ||
      message.includes('failed to fetch') ||
      message.includes('econnrefused')
    ) {
      return new NetworkError(error.message, request, error);
    }

    return new TransportError(error.message, RequestErrorType.UNKNOWN, {
      request,
      cause: error,
    });
  }

  return new TransportError(
    typeof error === 'string' ? error : 'Unknown error',
    RequestErrorType.UNKNOWN,
    { request, cause: error }
  );
}

/**
 * Classify a failure that left the middleware pipeline. Transport errors
 * are already RequestErrors by the time they get here, so anything else was
 * thrown by a middleware.
 */
export function toPipelineError(error: unknown, request?: HttpRequest): RequestError {
  if (error instanceof RequestError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MiddlewareError(message, request, error);
}

/**
 * Create HTTP error
 */
export function createHttpError(
  status: number,
  statusText: string,
  request?: HttpRequest,
  response?: ResponseData
): HttpError {
  const message = `HTTP Error: ${status} ${statusText}`;
  return new HttpError(message, status, statusText, request, response);
}

/**
 * Check if error is RequestError
 */
export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Check if error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RequestError) {
    return error.isRetryable();
  }
  return false;
}
