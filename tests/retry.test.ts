import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AbortError,
  ClientBuilder,
  HttpError,
  NetworkError,
  RetryState,
  calculateDelay,
  createHttpError,
  createRetryMiddleware,
  retryMiddleware,
  type ClientMiddleware,
  type HttpRequest,
  type ResponseData,
  type RetryMiddlewareOptions,
} from '../src';
import { createStubAdapter, okResponse, rejectionOf } from './helpers';

const ENDPOINT = 'https://api.example.com/items';

function failTimes(times: number, makeError: () => unknown = () => new TypeError('fetch failed')) {
  let calls = 0;
  return (request: HttpRequest) => {
    calls++;
    if (calls <= times) {
      throw makeError();
    }
    return okResponse(request);
  };
}

function setup(
  handler: (request: HttpRequest) => ResponseData,
  options: RetryMiddlewareOptions = {},
  ...extra: ClientMiddleware[]
) {
  const adapter = createStubAdapter(handler);
  let builder = new ClientBuilder(adapter).with(
    createRetryMiddleware({ backoff: 'linear', baseDelay: 100, ...options })
  );
  for (const layer of extra) {
    builder = builder.with(layer);
  }
  return { adapter, client: builder.build() };
}

describe('createRetryMiddleware', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('retries network errors until the request succeeds', async () => {
    const { adapter, client } = setup(failTimes(2), { maxRetries: 3 });

    const pending = client.get(ENDPOINT).send();
    await vi.runAllTimersAsync();
    const response = await pending;

    expect(response.status).toBe(200);
    expect(adapter.request).toHaveBeenCalledTimes(3);
  });

  it('retries a retryable status', async () => {
    const { adapter, client } = setup(
      failTimes(1, () => createHttpError(503, 'Service Unavailable'))
    );

    const pending = client.get(ENDPOINT).send();
    await vi.runAllTimersAsync();
    await pending;

    expect(adapter.request).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    const { adapter, client } = setup(failTimes(1, () => createHttpError(404, 'Not Found')));

    const error = await rejectionOf(client.get(ENDPOINT).send());

    expect(error).toBeInstanceOf(HttpError);
    expect(adapter.request).toHaveBeenCalledTimes(1);
  });

  it('does not retry an aborted request', async () => {
    const { adapter, client } = setup(failTimes(1, () => new AbortError()));

    const error = await rejectionOf(client.get(ENDPOINT).send());

    expect(error).toBeInstanceOf(AbortError);
    expect(adapter.request).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const { adapter, client } = setup(failTimes(Infinity), { maxRetries: 2 });

    const pending = rejectionOf(client.get(ENDPOINT).send());
    await vi.runAllTimersAsync();
    const error = await pending;

    expect(error).toBeInstanceOf(NetworkError);
    expect(adapter.request).toHaveBeenCalledTimes(3);
  });

  it('reports each retry to onRetry', async () => {
    const onRetry = vi.fn();
    const { client } = setup(failTimes(Infinity), { maxRetries: 2, onRetry });

    const pending = rejectionOf(client.get(ENDPOINT).send());
    await vi.runAllTimersAsync();
    await pending;

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
    expect(onRetry.mock.calls[0][0]).toBeInstanceOf(NetworkError);
  });

  it('uses a custom retry condition', async () => {
    const { adapter, client } = setup(failTimes(1, () => createHttpError(418, "I'm a teapot")), {
      shouldRetry: (error) => error instanceof HttpError && error.status === 418,
    });

    const pending = client.get(ENDPOINT).send();
    await vi.runAllTimersAsync();
    await pending;

    expect(adapter.request).toHaveBeenCalledTimes(2);
  });

  it('waits the backoff delay between attempts', async () => {
    const { adapter, client } = setup(failTimes(Infinity), { maxRetries: 2 });

    const pending = rejectionOf(client.get(ENDPOINT).send());

    await vi.advanceTimersByTimeAsync(99);
    expect(adapter.request).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(adapter.request).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(199);
    expect(adapter.request).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(adapter.request).toHaveBeenCalledTimes(3);

    expect(await pending).toBeInstanceOf(NetworkError);
  });

  it('sends a streaming body only once', async () => {
    const { adapter, client } = setup(failTimes(1), { maxRetries: 3 });

    const error = await rejectionOf(
      client.post(ENDPOINT).body(new ReadableStream<Uint8Array>()).send()
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(adapter.request).toHaveBeenCalledTimes(1);
  });

  it('publishes the attempt number to inner middleware', async () => {
    const attempts: Array<number | undefined> = [];
    const { client } = setup(failTimes(1), {}, async (request, extensions, next) => {
      attempts.push(extensions.get(RetryState)?.attempt);
      return next(request, extensions);
    });

    const builder = client.get(ENDPOINT);
    const pending = builder.send();
    await vi.runAllTimersAsync();
    await pending;

    expect(attempts).toEqual([0, 1]);
    const state = builder.extensions().get(RetryState);
    expect(state?.attempt).toBe(1);
    expect(state?.lastError).toBeInstanceOf(NetworkError);
  });

  it('stops waiting when the request is aborted during backoff', async () => {
    const controller = new AbortController();
    const { adapter, client } = setup(failTimes(Infinity), {
      onRetry: () => controller.abort(),
    });

    const error = await rejectionOf(client.get(ENDPOINT).signal(controller.signal).send());

    expect(error).toBeInstanceOf(AbortError);
    expect(error).toMatchObject({ message: 'Request aborted by user' });
    expect(adapter.request).toHaveBeenCalledTimes(1);
  });

  it('retryMiddleware sets only the retry count', async () => {
    const adapter = createStubAdapter(failTimes(Infinity));
    const client = new ClientBuilder(adapter).with(retryMiddleware(1)).build();

    const pending = rejectionOf(client.get(ENDPOINT).send());
    await vi.runAllTimersAsync();

    expect(await pending).toBeInstanceOf(NetworkError);
    expect(adapter.request).toHaveBeenCalledTimes(2);
  });
});

describe('calculateDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('grows linearly', () => {
    expect([0, 1, 2].map((attempt) => calculateDelay(attempt, 'linear', 1000, 30000))).toEqual([
      1000, 2000, 3000,
    ]);
  });

  it('is capped at maxDelay', () => {
    expect(calculateDelay(5, 'linear', 1000, 2000)).toBe(2000);
    expect(calculateDelay(10, 'exponential', 1000, 5000)).toBe(5000);
  });

  it('doubles with up to a quarter of jitter', () => {
    const random = vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateDelay(1, 'exponential', 100, 30000)).toBe(200);

    random.mockReturnValue(1);
    expect(calculateDelay(1, 'exponential', 100, 30000)).toBe(250);
  });
});
