/**
 * Scan Orchestrator
 *
 * Flow per URL:
 * 1. Fetch HTML through the configured PageFetcher (the only async step)
 * 2. Read the page title from the raw document
 * 3. Normalize + run the rule engine + aggregate
 * 4. Return a ScanResult; failures become `success: false`, never a throw
 */

import { detectInDocument, type DetectionOptions } from './detector';
import { FetchError, toScanError } from './errors';
import { logger } from './logger';
import { extractTitle, parseDocument } from './normalizer';
import type { BatchScanResult, DetectionResult, ScanResult } from '@/lib/types/auth.types';
import type { FetchedPage, PageFetcher } from '@/lib/types/fetch.types';

/*============================================================================*
 * CONFIGURATION
 *============================================================================*/

const CONFIG = {
  DEFAULT_TIMEOUT_SECONDS: 15,
  /** Extra time a fetcher gets past its own deadline before we give up on it. */
  TIMEOUT_GRACE_MS: 5000,
} as const;

export interface ScannerOptions {
  timeoutSeconds?: number;
  timeoutGraceMs?: number;
  detection?: DetectionOptions;
}

/*============================================================================*
 * SCANNER
 *============================================================================*/

export class AuthScanner {
  private readonly timeoutSeconds: number;
  private readonly timeoutGraceMs: number;
  private readonly detection: DetectionOptions;

  constructor(
    private readonly fetcher: PageFetcher,
    options: ScannerOptions = {}
  ) {
    this.timeoutSeconds = options.timeoutSeconds ?? CONFIG.DEFAULT_TIMEOUT_SECONDS;
    this.timeoutGraceMs = options.timeoutGraceMs ?? CONFIG.TIMEOUT_GRACE_MS;
    this.detection = options.detection ?? {};
  }

  /**
   * Scans one URL. The URL is expected to be validated and normalized by
   * the caller.
   */
  async scan(url: string, requestId: string = logger.generateRequestId()): Promise<ScanResult> {
    const startTime = Date.now();
    let statusCode: number | null = null;
    let fetchDuration = 0;

    logger.info(requestId, 'SCAN_START', { url, backend: this.fetcher.backend });

    try {
      const page = await this.fetchWithDeadline(url, requestId);
      statusCode = page.statusCode;
      fetchDuration = Date.now() - startTime;

      const detectStart = Date.now();
      const $ = parseDocument(page.html);
      const pageTitle = extractTitle($);
      const authResult = detectInDocument($, this.detection);
      const detectionDuration = Date.now() - detectStart;

      this.logScanSuccess(requestId, page, authResult, startTime, fetchDuration, detectionDuration);

      return {
        url,
        success: true,
        error: null,
        statusCode,
        pageTitle,
        authResult,
        scanDurationSeconds: elapsedSeconds(startTime),
      };
    } catch (error) {
      const scanError = toScanError(error);
      if (error instanceof FetchError && error.statusCode !== null) {
        statusCode = error.statusCode;
      }

      logger.error(requestId, 'SCAN_FAILED', error, {
        url,
        kind: scanError.kind,
        duration: `${Date.now() - startTime}ms`,
      });

      return {
        url,
        success: false,
        error: scanError,
        statusCode,
        pageTitle: null,
        authResult: null,
        scanDurationSeconds: elapsedSeconds(startTime),
      };
    }
  }

  /**
   * Scans URLs one after another, in input order.
   * One failing URL never stops the rest.
   */
  async scanAll(urls: readonly string[]): Promise<BatchScanResult> {
    const results: ScanResult[] = [];

    for (const url of urls) {
      results.push(await this.scan(url));
    }

    return {
      results,
      totalScanned: results.length,
      sitesWithAuthFound: results.filter((result) => result.authResult?.found === true).length,
    };
  }

  private async fetchWithDeadline(url: string, requestId: string): Promise<FetchedPage> {
    const deadlineMs = this.timeoutSeconds * 1000 + this.timeoutGraceMs;
    logger.debug(requestId, 'FETCH_DEADLINE', { fetchTimeout: `${this.timeoutSeconds}s`, deadlineMs });
    return executeWithTimeout(
      this.fetcher.fetch(url, this.timeoutSeconds, requestId),
      deadlineMs,
      `Fetch of ${url} exceeded ${deadlineMs}ms`
    );
  }

  private logScanSuccess(
    requestId: string,
    page: FetchedPage,
    authResult: DetectionResult,
    startTime: number,
    fetchDuration: number,
    detectionDuration: number
  ): void {
    logger.success(requestId, 'SCAN_SUCCESS', {
      found: authResult.found,
      componentCount: authResult.totalFound,
      summary: authResult.summary,
    }, startTime);

    logger.performance(requestId, {
      totalDuration: Date.now() - startTime,
      fetchDuration,
      detectionDuration,
      htmlSize: page.html.length,
      fetchBackend: this.fetcher.backend,
      authFound: authResult.found,
      componentsCount: authResult.totalFound,
    });
  }
}

/*============================================================================*
 * UTILITY FUNCTIONS
 *============================================================================*/

/**
 * Executes a promise with timeout protection.
 * Rejects with a Timeout FetchError; the timer is always cleared.
 */
export async function executeWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(FetchError.timeout(errorMessage)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

function elapsedSeconds(startTime: number): number {
  return Math.round((Date.now() - startTime) / 10) / 100;
}
