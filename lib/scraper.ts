/**
 * Page Fetchers
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────────┐
 * │ BrowserFetcher                                              │
 * │    - Pooled Chromium, isolated context per fetch            │
 * │    - Waits for load + a settle delay for client rendering   │
 * └─────────────────────────────────────────────────────────────┘
 * ┌─────────────────────────────────────────────────────────────┐
 * │ HttpFetcher                                                 │
 * │    - Plain GET, redirects followed, no script execution     │
 * └─────────────────────────────────────────────────────────────┘
 *
 * Both reject with a FetchError whose kind feeds the scan error taxonomy.
 * Neither retries.
 */

import { errors as playwrightErrors, type BrowserContext, type Page } from 'playwright-core';
import { BrowserPool, type BrowserPoolStatus } from './browser-pool';
import { extractErrorMessage, FetchError } from './errors';
import { logger } from './logger';
import type { AppConfig } from './config';
import type { FetchBackend, FetchedPage, PageFetcher } from '@/lib/types/fetch.types';

/*============================================================================*
 * CONFIGURATION
 *============================================================================*/

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Chromium net error codes that mean the target could not be reached. */
const NET_CONNECTION_ERRORS = [
  'ERR_CONNECTION_REFUSED',
  'ERR_CONNECTION_RESET',
  'ERR_CONNECTION_CLOSED',
  'ERR_CONNECTION_FAILED',
  'ERR_NAME_NOT_RESOLVED',
  'ERR_ADDRESS_UNREACHABLE',
  'ERR_INTERNET_DISCONNECTED',
  'ERR_NETWORK_CHANGED',
  'ERR_SSL_PROTOCOL_ERROR',
  'ERR_CERT_AUTHORITY_INVALID',
];

/** Node/undici socket error codes with the same meaning. */
const SOCKET_CONNECTION_ERRORS = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

const SOCKET_TIMEOUT_ERRORS = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/*============================================================================*
 * ERROR CLASSIFICATION
 *============================================================================*/

export function classifyNavigationError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  const message = extractErrorMessage(error);

  if (error instanceof playwrightErrors.TimeoutError || message.includes('ERR_TIMED_OUT')) {
    return FetchError.timeout(message);
  }
  if (NET_CONNECTION_ERRORS.some((code) => message.includes(`net::${code}`))) {
    return FetchError.connection(message);
  }
  return FetchError.other(message);
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Maps a rejected `fetch()` onto a FetchError.
 * undici wraps socket errors as `TypeError('fetch failed', { cause })`.
 */
export function classifyHttpError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return FetchError.timeout(error.message);
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);

  if (code && SOCKET_TIMEOUT_ERRORS.has(code)) {
    return FetchError.timeout(`${extractErrorMessage(error)} (${code})`);
  }
  if (code && SOCKET_CONNECTION_ERRORS.has(code)) {
    return FetchError.connection(`${extractErrorMessage(error)} (${code})`);
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return FetchError.connection(extractErrorMessage(cause ?? error));
  }
  return FetchError.other(extractErrorMessage(error));
}

/*============================================================================*
 * BROWSER FETCHER
 *============================================================================*/

export interface BrowserFetcherOptions {
  pool: BrowserPool;
  settleMs: number;
}

export class BrowserFetcher implements PageFetcher {
  readonly backend = 'browser' as const;
  private readonly pool: BrowserPool;
  private readonly settleMs: number;

  constructor(options: BrowserFetcherOptions) {
    this.pool = options.pool;
    this.settleMs = options.settleMs;
  }

  async fetch(url: string, timeoutSeconds: number, requestId: string): Promise<FetchedPage> {
    const startTime = Date.now();
    let context: BrowserContext | undefined;
    let page: Page | undefined;

    logger.info(requestId, 'FETCH_START', {
      url,
      backend: this.backend,
      timeout: `${timeoutSeconds}s`,
    });

    try {
      context = await this.pool.createContext(requestId);
      page = await context.newPage();

      const response = await page.goto(url, {
        waitUntil: 'load',
        timeout: timeoutSeconds * 1000,
      });

      const statusCode = response?.status() ?? 200;
      if (statusCode >= 400) {
        throw FetchError.http(statusCode);
      }

      if (this.settleMs > 0) {
        await page.waitForTimeout(this.settleMs);
      }
      const html = await page.content();

      logger.success(requestId, 'FETCH_SUCCESS', {
        statusCode,
        htmlSize: `${Math.round(html.length / 1024)}KB`,
      }, startTime);

      return { html, statusCode };
    } catch (error) {
      const fetchError = classifyNavigationError(error);
      logger.error(requestId, 'FETCH_FAILED', fetchError, {
        url,
        kind: fetchError.kind,
        duration: `${Date.now() - startTime}ms`,
      });
      throw fetchError;
    } finally {
      await this.cleanup(page, context, requestId);
    }
  }

  private async cleanup(
    page: Page | undefined,
    context: BrowserContext | undefined,
    requestId: string
  ): Promise<void> {
    if (page) {
      try {
        await page.close();
      } catch (error) {
        logger.warn(requestId, 'CLEANUP_PAGE_FAILED', 'Failed to close page', {
          error: extractErrorMessage(error),
        });
      }
    }

    if (context) {
      await this.pool.closeContext(context, requestId);
    }
  }
}

/*============================================================================*
 * HTTP FETCHER
 *============================================================================*/

export class HttpFetcher implements PageFetcher {
  readonly backend = 'http' as const;

  async fetch(url: string, timeoutSeconds: number, requestId: string): Promise<FetchedPage> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutSeconds * 1000);

    logger.info(requestId, 'FETCH_START', {
      url,
      backend: this.backend,
      timeout: `${timeoutSeconds}s`,
    });

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });

      if (response.status >= 400) {
        throw FetchError.http(response.status);
      }

      const html = await response.text();

      logger.success(requestId, 'FETCH_SUCCESS', {
        statusCode: response.status,
        htmlSize: `${Math.round(html.length / 1024)}KB`,
      }, startTime);

      return { html, statusCode: response.status };
    } catch (error) {
      const fetchError = classifyHttpError(error);
      logger.error(requestId, 'FETCH_FAILED', fetchError, {
        url,
        kind: fetchError.kind,
        duration: `${Date.now() - startTime}ms`,
      });
      throw fetchError;
    } finally {
      clearTimeout(timer);
    }
  }
}

/*============================================================================*
 * FACTORY
 *============================================================================*/

export interface FetcherHandle {
  fetcher: PageFetcher;
  /** Releases backend resources (the browser process, if any). */
  close(): Promise<void>;
  /** Browser pool health; absent for the plain HTTP backend. */
  status?: () => BrowserPoolStatus;
}

export function createFetcher(
  config: Pick<AppConfig, 'fetchBackend' | 'chromiumPath' | 'pageSettleMs'>
): FetcherHandle {
  const backend: FetchBackend = config.fetchBackend;

  if (backend === 'http') {
    return { fetcher: new HttpFetcher(), close: async () => {} };
  }

  const pool = new BrowserPool({ executablePath: config.chromiumPath });
  return {
    fetcher: new BrowserFetcher({ pool, settleMs: config.pageSettleMs }),
    close: () => pool.closeBrowser('SYSTEM'),
    status: () => pool.getStatus(),
  };
}
