import type { HttpRequest, RequestBody } from './middlewareTypes';

/**
 * Whether the body is a one-shot stream that cannot be sent twice.
 */
export function isStreamBody(body: RequestBody | undefined): body is ReadableStream<Uint8Array> {
  return typeof ReadableStream !== 'undefined' && body instanceof ReadableStream;
}

/**
 * Derive a new frozen request from an existing one. Middleware that needs to
 * change what the inner stages see passes the result to `next`.
 */
export function cloneRequest(request: HttpRequest, patch: Partial<HttpRequest> = {}): HttpRequest {
  return Object.freeze({
    ...request,
    ...patch,
    headers: Object.freeze({ ...(patch.headers ?? request.headers) }),
    params: Object.freeze({ ...(patch.params ?? request.params) }),
  });
}
