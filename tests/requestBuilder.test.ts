import { describe, it, expect } from 'vitest';
import { BuildError, ClientWithMiddleware, type RequestBuilder } from '../src';
import { createStubAdapter } from './helpers';

const ENDPOINT = 'https://api.example.com/items';

class Marker {
  constructor(readonly label: string) {}
}

function createClient() {
  const adapter = createStubAdapter();
  return { adapter, client: ClientWithMiddleware.from(adapter) };
}

function captureBuildError(builder: RequestBuilder): BuildError {
  try {
    builder.build();
  } catch (error) {
    if (error instanceof BuildError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected build() to fail');
}

describe('RequestBuilder', () => {
  describe('build', () => {
    it('produces a frozen request', () => {
      const { client } = createClient();

      const request = client.get(ENDPOINT).header('X-Trace', 'a').query({ page: 1 }).build();

      expect(request).toEqual({
        method: 'GET',
        url: ENDPOINT,
        headers: { 'x-trace': 'a' },
        params: { page: 1 },
      });
      expect(Object.isFrozen(request)).toBe(true);
      expect(Object.isFrozen(request.headers)).toBe(true);
      expect(Object.isFrozen(request.params)).toBe(true);
    });

    it('lowercases header names so later values replace earlier ones', () => {
      const { client } = createClient();

      const request = client
        .get(ENDPOINT)
        .header('X-Trace', 'a')
        .headers({ 'x-trace': 'b', 'X-Count': 3, 'X-Debug': true })
        .build();

      expect(request.headers).toEqual({ 'x-trace': 'b', 'x-count': '3', 'x-debug': 'true' });
    });

    it('applies client defaults', () => {
      const adapter = createStubAdapter();
      const client = ClientWithMiddleware.from(adapter, {
        defaults: {
          baseURL: 'https://api.example.com',
          headers: { 'X-Api': 'v1' },
          params: { lang: 'en' },
          timeout: 1000,
          responseType: 'text',
        },
      });

      const request = client.get('/items').query({ page: 2 }).build();

      expect(request).toEqual({
        method: 'GET',
        url: '/items',
        baseURL: 'https://api.example.com',
        headers: { 'x-api': 'v1' },
        params: { lang: 'en', page: 2 },
        timeout: 1000,
        responseType: 'text',
      });
    });

    it('merges query parameters', () => {
      const { client } = createClient();

      const request = client.get(ENDPOINT).query({ page: 1 }).query({ size: 10, page: 2 }).build();

      expect(request.params).toEqual({ page: 2, size: 10 });
    });

    it('keeps the timeout, response type and signal', () => {
      const { client } = createClient();
      const controller = new AbortController();

      const request = client
        .get(ENDPOINT)
        .timeout(2500)
        .responseType('arraybuffer')
        .signal(controller.signal)
        .build();

      expect(request.timeout).toBe(2500);
      expect(request.responseType).toBe('arraybuffer');
      expect(request.signal).toBe(controller.signal);
    });
  });

  describe('authentication', () => {
    it('encodes basic credentials', () => {
      const { client } = createClient();

      expect(client.get(ENDPOINT).basicAuth('user', 'pass').build().headers).toEqual({
        authorization: 'Basic dXNlcjpwYXNz',
      });
      expect(client.get(ENDPOINT).basicAuth('user').build().headers).toEqual({
        authorization: 'Basic dXNlcjo=',
      });
    });

    it('sets a bearer token', () => {
      const { client } = createClient();

      const request = client.get(ENDPOINT).bearerAuth('test-token').build();

      expect(request.headers).toEqual({ authorization: 'Bearer test-token' });
    });
  });

  describe('bodies', () => {
    it('encodes JSON and sets the content type', () => {
      const { client } = createClient();

      const request = client.post(ENDPOINT).json({ name: 'widget', tags: ['a'] }).build();

      expect(request.body).toBe('{"name":"widget","tags":["a"]}');
      expect(request.headers).toEqual({ 'content-type': 'application/json' });
    });

    it('keeps a content type chosen by the caller', () => {
      const { client } = createClient();

      const request = client
        .post(ENDPOINT)
        .header('Content-Type', 'application/vnd.api+json')
        .json({})
        .build();

      expect(request.body).toBe('{}');
      expect(request.headers).toEqual({ 'content-type': 'application/vnd.api+json' });
    });

    it('reports a value JSON cannot encode', () => {
      const { client } = createClient();

      const error = captureBuildError(client.post(ENDPOINT).json({ id: 10n }));

      expect(error.message).toMatch(/^Failed to encode JSON body: /);
      expect(error.cause).toBeInstanceOf(TypeError);
    });

    it('reports a value that encodes to nothing', () => {
      const { client } = createClient();

      const error = captureBuildError(client.post(ENDPOINT).json(undefined));

      expect(error.message).toBe('Failed to encode JSON body: value is not serializable');
    });

    it('keeps the first recorded failure', () => {
      const { client } = createClient();

      const error = captureBuildError(
        client.post(ENDPOINT).json(undefined).json({ id: 10n }).json({ ok: true })
      );

      expect(error.message).toBe('Failed to encode JSON body: value is not serializable');
    });

    it('form-encodes values and skips empty ones', () => {
      const { client } = createClient();

      const request = client
        .post(ENDPOINT)
        .form({ q: 'a b', page: 2, skip: undefined, none: null })
        .build();

      expect(request.body).toBe('q=a+b&page=2');
      expect(request.headers).toEqual({ 'content-type': 'application/x-www-form-urlencoded' });
    });

    it('passes multipart forms through untouched', () => {
      const { client } = createClient();
      const form = new FormData();
      form.append('field', 'value');

      const request = client.post(ENDPOINT).multipart(form).build();

      expect(request.body).toBe(form);
      expect(request.headers).toEqual({});
    });
  });

  describe('validation', () => {
    it('rejects a header value with a line break', () => {
      const { client } = createClient();

      const error = captureBuildError(client.get(ENDPOINT).header('x-bad', 'line\nbreak'));

      expect(error.message).toBe('headers.x-bad: Invalid header value');
      expect(error.issues).toEqual([
        { path: 'headers.x-bad', message: 'Invalid header value', code: 'invalid_string' },
      ]);
    });

    it('rejects a header name that is not a token', () => {
      const { client } = createClient();

      const error = captureBuildError(client.get(ENDPOINT).header('bad header', 'value'));

      expect(error.message).toContain('Invalid header name');
    });

    it('rejects an empty URL', () => {
      const { client } = createClient();

      const error = captureBuildError(client.get(''));

      expect(error.message).toBe('url: URL must not be empty');
    });

    it('rejects a negative timeout', () => {
      const { client } = createClient();

      const error = captureBuildError(client.get(ENDPOINT).timeout(-1));

      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatchObject({ path: 'timeout', code: 'too_small' });
    });

    it('never throws from a setter', () => {
      const { client } = createClient();

      expect(() =>
        client.get('').header('bad header', '\n').timeout(Number.NaN).json(undefined)
      ).not.toThrow();
    });

    it('rejects send() with the build error', async () => {
      const { client, adapter } = createClient();

      await expect(client.get(ENDPOINT).timeout(-5).send()).rejects.toBeInstanceOf(BuildError);
      expect(adapter.request).not.toHaveBeenCalled();
    });
  });

  describe('immutability', () => {
    it('leaves the original builder unchanged', () => {
      const { client } = createClient();
      const base = client.get(ENDPOINT);

      const derived = base.header('x-a', '1').query({ page: 1 });

      expect(base.build().headers).toEqual({});
      expect(base.build().params).toEqual({});
      expect(derived.build().headers).toEqual({ 'x-a': '1' });
    });

    it('shares the request extensions between derived builders', () => {
      const { client } = createClient();
      const base = client.get(ENDPOINT);

      const derived = base.header('x-a', '1').withExtension(new Marker('shared'));

      expect(derived.extensions()).toBe(base.extensions());
      expect(base.extensions().get(Marker)?.label).toBe('shared');
    });
  });

  describe('tryClone', () => {
    it('copies a buffered request with an empty extensions bag', () => {
      const { client } = createClient();
      const original = client
        .post(ENDPOINT)
        .header('x-a', '1')
        .body('payload')
        .withExtension(new Marker('original'));

      const clone = original.tryClone();

      expect(clone).toBeDefined();
      expect(clone?.build()).toEqual(original.build());
      expect(clone?.extensions().size).toBe(0);
      expect(original.extensions().get(Marker)?.label).toBe('original');
    });

    it('carries a recorded failure over to the clone', () => {
      const { client } = createClient();

      const clone = client.get(ENDPOINT).json(undefined).tryClone();

      expect(clone).toBeDefined();
      expect(() => clone?.build()).toThrow('Failed to encode JSON body: value is not serializable');
    });

    it('refuses to clone a streaming body', () => {
      const { client } = createClient();

      const builder = client.post(ENDPOINT).body(new ReadableStream<Uint8Array>());

      expect(builder.tryClone()).toBeUndefined();
    });
  });

  describe('send', () => {
    it('hands the built request and its extensions to the pipeline', async () => {
      const { client, adapter } = createClient();
      const builder = client.put(ENDPOINT).bearerAuth('test-token').body('data');

      const response = await builder.send();

      expect(adapter.request).toHaveBeenCalledTimes(1);
      expect(adapter.request.mock.calls[0][0]).toEqual({
        method: 'PUT',
        url: ENDPOINT,
        headers: { authorization: 'Bearer test-token' },
        params: {},
        body: 'data',
      });
      expect(response.status).toBe(200);
    });
  });
});
