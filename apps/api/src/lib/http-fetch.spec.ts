import { Logger } from '@nestjs/common';
import { fetchCall, mockResponse } from '../tests/fixtures/fetch-mock';
import { fetchJson, fetchText, HttpStatusError, isTransientHttpError } from './http-fetch';

const logger = new Logger('HttpFetchSpec');

describe('isTransientHttpError', () => {
  it('retries server errors, throttling and transport failures only', () => {
    expect(isTransientHttpError(new HttpStatusError(503, 'x'))).toBe(true);
    expect(isTransientHttpError(new HttpStatusError(429, 'x'))).toBe(true);
    expect(isTransientHttpError(new HttpStatusError(404, 'x'))).toBe(false);
    expect(isTransientHttpError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientHttpError(new SyntaxError('Unexpected token'))).toBe(false);
  });
});

describe('fetchText / fetchJson', () => {
  const originalFetch = globalThis.fetch;
  let fetchMock: jest.Mock;

  beforeEach(() => {
    fetchMock = jest.fn();
    globalThis.fetch = fetchMock as unknown as typeof fetch;
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  it('parses JSON and sends the Accept header', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse({ ok: true, status: 200, body: '{"a":1}' }));

    await expect(
      fetchJson({ service: 'Test', url: 'http://svc.local/x', headers: { 'X-Test': '1' }, timeoutMs: 1_000, logger }),
    ).resolves.toEqual({ a: 1 });
    expect(fetchCall(fetchMock, 0).init.headers).toEqual({ Accept: 'application/json', 'X-Test': '1' });
  });

  it('throws HttpStatusError with a redacted body excerpt', async () => {
    fetchMock.mockResolvedValueOnce(
      mockResponse({ ok: false, status: 500, body: 'boom for key test-secret' }),
    );

    const err = await fetchText({
      service: 'Test',
      url: 'http://svc.local/x?api_key=test-secret',
      timeoutMs: 1_000,
      logger,
      secrets: ['test-secret'],
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toHaveProperty('status', 500);
    expect(err).toHaveProperty('message', 'Test request failed: HTTP 500 boom for key REDACTED');
  });

  it('reports a timeout with its duration', async () => {
    fetchMock.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
    );

    await expect(
      fetchText({ service: 'Test', url: 'http://svc.local/slow', timeoutMs: 20, logger }),
    ).rejects.toThrow('Test request failed: timed out after 20ms');
  });
});
