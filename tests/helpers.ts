import { vi } from 'vitest';
import { cloneRequest, createLogger, type HttpRequest, type LogLevel, type ResponseData } from '../src';

export function makeRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return cloneRequest(
    { method: 'GET', url: 'https://api.example.com/test', headers: {}, params: {} },
    overrides
  );
}

export function okResponse(request: HttpRequest, data: unknown = { ok: true }): ResponseData {
  return { data, status: 200, statusText: 'OK', headers: {}, request };
}

/**
 * In-process transport engine; records every request it receives.
 */
export function createStubAdapter(
  handler: (request: HttpRequest) => ResponseData | Promise<ResponseData> = (request) =>
    okResponse(request)
) {
  return {
    request: vi.fn(async (request: HttpRequest) => handler(request)),
  };
}

export function jsonResponse(body: unknown, init: { status?: number; statusText?: string } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText ?? 'OK',
    headers: { 'content-type': 'application/json' },
  });
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

export type LogLine = Record<string, unknown>;

/**
 * pino logger whose output is parsed into `lines` instead of written out.
 */
export function captureLogger(level: LogLevel = 'info') {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { lines, logger };
}
