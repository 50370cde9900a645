/**
 * Browser Connection Pool
 *
 * Manages a single reusable Chromium instance with one isolated context per
 * fetch. Launching a browser takes seconds; a new context takes
 * milliseconds, and contexts share no cookies, storage or cache.
 *
 * Architecture:
 * - 1 browser instance (kept alive, closed after 5 idle minutes)
 * - New context per fetch, closed by the caller
 * - Concurrent first callers share one launch promise
 */

import { existsSync } from 'node:fs';
import { chromium, type Browser, type BrowserContext } from 'playwright-core';
import { logger } from './logger';

/** Where distro packages (and the Docker image) install Chromium. */
export const SYSTEM_CHROMIUM = '/usr/bin/chromium';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--no-first-run',
  '--no-zygote',
  '--disable-extensions',
];

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'font', 'media']);

export interface BrowserPoolOptions {
  executablePath?: string;
  idleTimeoutMs?: number;
}

export interface BrowserPoolStatus {
  healthy: boolean;
  idleTime: number;
  isInitializing: boolean;
}

/**
 * Picks the browser binary: explicit path, then the system Chromium, then
 * whatever Playwright has installed.
 */
export function resolveExecutablePath(
  configured: string | undefined,
  exists: (path: string) => boolean = existsSync
): string | undefined {
  if (configured) return configured;
  return exists(SYSTEM_CHROMIUM) ? SYSTEM_CHROMIUM : undefined;
}

export class BrowserPool {
  private browser: Browser | null = null;
  private initPromise: Promise<Browser> | null = null;
  private lastUsed: number = Date.now();
  private idleCheckInterval: NodeJS.Timeout | null = null;
  private readonly idleTimeoutMs: number;
  private readonly executablePath: string | undefined;

  constructor(options: BrowserPoolOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 5 * 60 * 1000;
    this.executablePath = resolveExecutablePath(options.executablePath);
  }

  /**
   * Get or create browser instance
   */
  private async getBrowser(requestId: string): Promise<Browser> {
    if (this.browser && this.browser.isConnected()) {
      this.lastUsed = Date.now();
      return this.browser;
    }

    if (this.initPromise) {
      logger.info(requestId, 'BROWSER_POOL_WAITING', {
        message: 'Waiting for browser initialization to complete',
      });
      return this.initPromise;
    }

    const startTime = Date.now();
    logger.info(requestId, 'BROWSER_POOL_INIT_START', {
      executablePath: this.executablePath ?? 'playwright default',
    });

    this.initPromise = chromium
      .launch({
        headless: true,
        args: LAUNCH_ARGS,
        executablePath: this.executablePath,
      })
      .then((browser) => {
        this.browser = browser;
        this.initPromise = null;
        this.lastUsed = Date.now();

        logger.success(requestId, 'BROWSER_POOL_INIT_SUCCESS', {
          message: 'Browser instance launched',
        }, startTime);

        this.startIdleMonitoring();
        return browser;
      })
      .catch((error: unknown) => {
        this.initPromise = null;
        logger.error(requestId, 'BROWSER_POOL_INIT_ERROR', error, {
          message: 'Failed to launch browser',
        });
        throw error;
      });

    return this.initPromise;
  }

  /**
   * Create new browser context for an isolated fetch.
   * Images, fonts and media are blocked; they carry no auth markup.
   */
  async createContext(requestId: string): Promise<BrowserContext> {
    const browser = await this.getBrowser(requestId);

    logger.info(requestId, 'BROWSER_CONTEXT_CREATE', {
      message: 'Creating new browser context',
    });

    const context = await browser.newContext({
      userAgent:
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      viewport: { width: 1280, height: 800 },
      locale: 'en-US',
      javaScriptEnabled: true,
    });

    await context.route('**/*', (route) => {
      if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
        return route.abort();
      }
      return route.continue();
    });

    return context;
  }

  async closeContext(context: BrowserContext, requestId: string): Promise<void> {
    try {
      await context.close();
      logger.info(requestId, 'BROWSER_CONTEXT_CLOSED', {
        message: 'Browser context closed successfully',
      });
    } catch (error) {
      logger.error(requestId, 'BROWSER_CONTEXT_CLOSE_ERROR', error, {
        message: 'Failed to close browser context',
      });
    }
  }

  private startIdleMonitoring(): void {
    if (this.idleCheckInterval) {
      clearInterval(this.idleCheckInterval);
    }

    this.idleCheckInterval = setInterval(() => {
      const idleTime = Date.now() - this.lastUsed;

      if (idleTime > this.idleTimeoutMs && this.browser) {
        logger.info('SYSTEM', 'BROWSER_POOL_IDLE_TIMEOUT', {
          message: 'Closing browser due to inactivity',
          idleTime: `${Math.round(idleTime / 1000)}s`,
        });
        void this.closeBrowser('SYSTEM');
      }
    }, 60000);

    // The idle check alone must not keep the process alive.
    this.idleCheckInterval.unref();
  }

  async closeBrowser(requestId: string): Promise<void> {
    if (this.idleCheckInterval) {
      clearInterval(this.idleCheckInterval);
      this.idleCheckInterval = null;
    }

    if (this.browser) {
      try {
        await this.browser.close();
        logger.info(requestId, 'BROWSER_POOL_CLOSED', {
          message: 'Browser closed successfully',
        });
      } catch (error) {
        logger.error(requestId, 'BROWSER_POOL_CLOSE_ERROR', error);
      } finally {
        this.browser = null;
      }
    }
  }

  isHealthy(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }

  getStatus(): BrowserPoolStatus {
    return {
      healthy: this.isHealthy(),
      idleTime: Date.now() - this.lastUsed,
      isInitializing: this.initPromise !== null,
    };
  }
}
