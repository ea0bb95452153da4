import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import type { DestinationStream } from 'pino';
import type { QueryParams } from '@freshsales-sdk/types';
import {
  createLogger,
  ExternalServiceError,
  InvalidArgumentError,
  MalformedResponseError,
  NotFoundError,
  RemoteRequestError,
  ValidationError,
} from '@freshsales-sdk/core';
import {
  encodeQueryParams,
  FreshsalesHttpGateway,
  parseClientConfig,
  type FetchFn,
} from '../freshsales/http-gateway.js';

const config = { domain: 'acme', apiKey: 'test-secret' };

function jsonFetch(body: string, status = 200) {
  return vi.fn<FetchFn>(async () => new Response(body, { status }));
}

function createGateway(fetchFn: FetchFn, defaultParams: QueryParams = {}) {
  return new FreshsalesHttpGateway(config, { defaultParams, fetch: fetchFn });
}

describe('encodeQueryParams', () => {
  it('should drop null and undefined values and encode booleans', () => {
    const search = encodeQueryParams({}, { page: 2, flag: true, off: false, skip: null, gone: undefined });

    expect(search.toString()).toBe('page=2&flag=true&off=false');
  });

  it('should keep defaults unless overridden with a value', () => {
    const search = encodeQueryParams(
      { include: 'owner', sort: 'updated_at' },
      { sort: null, include: 'appointments', page: 1 }
    );

    expect(search.toString()).toBe('include=appointments&sort=updated_at&page=1');
  });

  it('should only emit keys whose values are present', () => {
    const value = fc.oneof(
      fc.boolean(),
      fc.integer(),
      fc.stringMatching(/^[a-z0-9]{0,8}$/),
      fc.constant(null),
      fc.constant(undefined)
    );

    fc.assert(
      fc.property(fc.dictionary(fc.stringMatching(/^[a-z]{1,10}$/), value), (params) => {
        const search = encodeQueryParams({}, params);
        const present = Object.entries(params).filter(([, v]) => v !== null && v !== undefined);

        expect([...search.keys()]).toEqual(present.map(([key]) => key));
        for (const [key, v] of present) {
          expect(search.get(key)).toBe(typeof v === 'boolean' ? (v ? 'true' : 'false') : String(v));
        }
      })
    );
  });
});

describe('parseClientConfig', () => {
  it('should return the validated settings', () => {
    expect(parseClientConfig({ ...config, perPage: 25, extra: true })).toEqual({
      domain: 'acme',
      apiKey: 'test-secret',
      perPage: 25,
    });
  });

  it('should reject a domain that is not a subdomain label', () => {
    expect(() => parseClientConfig({ domain: 'acme.evil.com/', apiKey: 'test-secret' })).toThrow(
      ValidationError
    );
  });

  it('should reject an empty API key', () => {
    expect(() => parseClientConfig({ domain: 'acme', apiKey: '' })).toThrow(ValidationError);
  });
});

describe('FreshsalesHttpGateway', () => {
  describe('configuration', () => {
    it('should build the account base URL', () => {
      expect(createGateway(jsonFetch('{}')).baseUrl).toBe('https://acme.freshsales.io/api');
    });
  });

  describe('request', () => {
    it('should send an authenticated JSON request', async () => {
      const fetchFn = jsonFetch('{"contact":{"id":1}}');
      const gateway = createGateway(fetchFn, { include: 'owner' });

      const result = await gateway.request('POST', '/contacts', { page: 1 }, { contact: { a: 1 } });

      expect(result).toEqual({ contact: { id: 1 } });
      expect(fetchFn).toHaveBeenCalledTimes(1);
      const [url, init] = fetchFn.mock.calls[0] ?? [];
      expect(url).toBe('https://acme.freshsales.io/api/contacts?include=owner&page=1');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"contact":{"a":1}}');
      const headers = new Headers(init?.headers);
      expect(headers.get('Authorization')).toBe('Token token=test-secret');
      expect(headers.get('Content-Type')).toBe('application/json');
      expect(headers.get('Accept')).toBe('application/json');
    });

    it('should send no body when none is given', async () => {
      const fetchFn = jsonFetch('[]');

      await createGateway(fetchFn).request('GET', '/contacts/filters');

      expect(fetchFn.mock.calls[0]?.[1].body).toBeNull();
      expect(fetchFn.mock.calls[0]?.[0]).toBe('https://acme.freshsales.io/api/contacts/filters');
    });

    it('should decode a bare JSON value', async () => {
      await expect(createGateway(jsonFetch('true')).request('DELETE', '/contacts/1')).resolves.toBe(
        true
      );
    });

    it.each(['contacts', 'https://evil.example/api', '/contacts/../admin', '/x://y'])(
      'should refuse unsafe path %s without calling fetch',
      async (path) => {
        const fetchFn = jsonFetch('{}');

        await expect(createGateway(fetchFn).request('GET', path)).rejects.toThrow(
          InvalidArgumentError
        );
        expect(fetchFn).not.toHaveBeenCalled();
      }
    );
  });

  describe('errors', () => {
    it('should raise NotFoundError on 404', async () => {
      const gateway = createGateway(jsonFetch('{"errors":{"code":404}}', 404));

      const error = await gateway.request('GET', '/contacts/9').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ status: 404, body: '{"errors":{"code":404}}', path: '/contacts/9' });
    });

    it('should raise RemoteRequestError on other non-2xx statuses', async () => {
      const gateway = createGateway(jsonFetch('busy', 503));

      const error = await gateway.request('GET', '/deals/1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteRequestError);
      expect(error).not.toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ status: 503, body: 'busy', method: 'GET' });
    });

    it('should raise MalformedResponseError on invalid JSON', async () => {
      const gateway = createGateway(jsonFetch('<html>oops</html>'));

      await expect(gateway.request('GET', '/contacts/1')).rejects.toThrow(MalformedResponseError);
    });

    it.each(['', '  \n'])('should raise MalformedResponseError on body %j', async (body) => {
      const gateway = createGateway(jsonFetch(body));

      await expect(gateway.request('GET', '/contacts/1')).rejects.toThrow(
        'Freshsales returned a malformed response: GET /contacts/1 returned invalid JSON'
      );
    });

    it('should reject a 204 without a body', async () => {
      const gateway = createGateway(vi.fn<FetchFn>(async () => new Response(null, { status: 204 })));

      await expect(gateway.request('DELETE', '/contacts/1')).rejects.toThrow(MalformedResponseError);
    });

    it('should wrap transport failures', async () => {
      const cause = new TypeError('fetch failed');
      const gateway = createGateway(vi.fn<FetchFn>(async () => Promise.reject(cause)));

      const error = await gateway.request('GET', '/contacts/1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).not.toBeInstanceOf(RemoteRequestError);
      expect(error).toMatchObject({
        message: 'Freshsales error: GET /contacts/1 failed',
        originalError: cause,
      });
    });

    it('should report timeouts', async () => {
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      });
      const gateway = new FreshsalesHttpGateway(
        { ...config, timeoutMs: 1500 },
        { fetch: vi.fn<FetchFn>(async () => Promise.reject(timeout)) }
      );

      await expect(gateway.request('GET', '/contacts/1')).rejects.toThrow(
        'Freshsales error: Request timeout after 1500ms'
      );
    });
  });

  describe('logging', () => {
    function capture() {
      const chunks: string[] = [];
      const destination: DestinationStream = {
        write(msg: string) {
          chunks.push(msg);
        },
      };
      const logger = createLogger({ name: 'gateway-test', level: 'debug', destination });
      const entries = () => chunks.map((line) => JSON.parse(line) as Record<string, unknown>);
      return { chunks, logger, entries };
    }

    it('should log calls at debug without the API key', async () => {
      const { chunks, logger, entries } = capture();
      const gateway = new FreshsalesHttpGateway(config, { logger, fetch: jsonFetch('{}') });

      await gateway.request('GET', '/contacts/filters', { page: 1 });

      expect(entries().map((entry) => entry.msg)).toEqual(['Freshsales request', 'Freshsales response']);
      expect(entries()[0]).toMatchObject({ method: 'GET', path: '/contacts/filters', params: { page: 1 } });
      expect(chunks.join('')).not.toContain('test-secret');
    });

    it('should redact credential-like query params', async () => {
      const { logger, entries } = capture();
      const gateway = new FreshsalesHttpGateway(config, { logger, fetch: jsonFetch('{}') });

      await gateway.request('GET', '/contacts/filters', { api_key: 'test-secret', page: 2 });

      expect(entries()[0]?.params).toEqual({ api_key: '[REDACTED]', page: 2 });
    });

    it('should scrub credentials echoed in an error body', async () => {
      const { logger, entries } = capture();
      const gateway = new FreshsalesHttpGateway(config, {
        logger,
        fetch: jsonFetch('bad header: Token token=test-secret', 401),
      });

      const error = await gateway.request('GET', '/contacts/1').catch((e: unknown) => e);

      expect(error).toMatchObject({ status: 401, body: 'bad header: Token token=test-secret' });
      const logged = entries().find((entry) => entry.msg === 'Freshsales API error');
      expect(logged?.errorBody).toBe('bad header: [REDACTED]');
    });
  });
});
