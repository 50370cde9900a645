import { afterEach, describe, expect, it, vi } from 'vitest';
import { errors as playwrightErrors } from 'playwright-core';
import { FetchError } from './errors';
import {
  BrowserFetcher,
  classifyHttpError,
  classifyNavigationError,
  createFetcher,
  HttpFetcher,
} from './scraper';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyNavigationError', () => {
  it('maps Playwright timeouts to Timeout', () => {
    const error = new playwrightErrors.TimeoutError('page.goto: Timeout 15000ms exceeded.');
    expect(classifyNavigationError(error).kind).toBe('Timeout');
  });

  it('maps Chromium net errors to ConnectionFailure', () => {
    const error = new Error('page.goto: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test/');
    expect(classifyNavigationError(error)).toMatchObject({
      kind: 'ConnectionFailure',
      message: 'page.goto: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test/',
    });
  });

  it('passes FetchErrors through and treats the rest as Other', () => {
    const http = FetchError.http(404);
    expect(classifyNavigationError(http)).toBe(http);
    expect(classifyNavigationError(new Error('page.goto: net::ERR_ABORTED')).kind).toBe('Other');
  });
});

describe('classifyHttpError', () => {
  it('maps aborts to Timeout', () => {
    const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    expect(classifyHttpError(abort).kind).toBe('Timeout');
  });

  it('reads socket codes from the undici cause', () => {
    const refused = new TypeError('fetch failed', { cause: withCode('connect ECONNREFUSED', 'ECONNREFUSED') });
    expect(classifyHttpError(refused)).toMatchObject({
      kind: 'ConnectionFailure',
      message: 'fetch failed (ECONNREFUSED)',
    });

    const slow = new TypeError('fetch failed', { cause: withCode('Connect Timeout Error', 'UND_ERR_CONNECT_TIMEOUT') });
    expect(classifyHttpError(slow).kind).toBe('Timeout');
  });

  it('treats an uncoded fetch failure as a connection failure', () => {
    const error = new TypeError('fetch failed', { cause: new Error('other side closed') });
    expect(classifyHttpError(error)).toMatchObject({
      kind: 'ConnectionFailure',
      message: 'other side closed',
    });
  });

  it('falls back to Other', () => {
    expect(classifyHttpError(new Error('weird'))).toMatchObject({ kind: 'Other', message: 'weird' });
  });
});

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the body and status of a successful response', async () => {
    const fetchMock = vi.fn(async () => new Response('<html>ok</html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const page = await new HttpFetcher().fetch('https://example.test/', 5, 'REQ-test');

    expect(page).toEqual({ html: '<html>ok</html>', statusCode: 200 });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.test/',
      expect.objectContaining({ redirect: 'follow' })
    );
  });

  it('rejects error statuses with HttpError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));

    await expect(new HttpFetcher().fetch('https://example.test/x', 5, 'REQ-test')).rejects.toMatchObject({
      kind: 'HttpError',
      statusCode: 404,
    });
  });

  it('rejects transport failures with ConnectionFailure', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed', { cause: withCode('getaddrinfo ENOTFOUND', 'ENOTFOUND') });
      })
    );

    await expect(new HttpFetcher().fetch('https://nowhere.test/', 5, 'REQ-test')).rejects.toMatchObject({
      kind: 'ConnectionFailure',
    });
  });

  it('aborts after the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
            });
          })
      )
    );

    await expect(new HttpFetcher().fetch('https://slow.test/', 0.01, 'REQ-test')).rejects.toMatchObject({
      kind: 'Timeout',
    });
  });
});

describe('createFetcher', () => {
  it('builds the plain HTTP backend', async () => {
    const handle = createFetcher({ fetchBackend: 'http', chromiumPath: undefined, pageSettleMs: 0 });

    expect(handle.fetcher).toBeInstanceOf(HttpFetcher);
    expect(handle.fetcher.backend).toBe('http');
    expect(handle.status).toBeUndefined();
    await expect(handle.close()).resolves.toBeUndefined();
  });

  it('builds the browser backend without launching anything', async () => {
    const handle = createFetcher({ fetchBackend: 'browser', chromiumPath: '/opt/chromium', pageSettleMs: 0 });

    expect(handle.fetcher).toBeInstanceOf(BrowserFetcher);
    expect(handle.fetcher.backend).toBe('browser');
    expect(handle.status?.()).toMatchObject({ healthy: false, isInitializing: false });
    await expect(handle.close()).resolves.toBeUndefined();
  });
});
