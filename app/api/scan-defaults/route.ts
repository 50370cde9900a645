import type { RequestHandler } from 'express';
import { logger } from '@/lib/logger';
import type { AuthScanner } from '@/lib/scanner';

/**
 * API Route: GET /api/scan-defaults
 *
 * Scans the configured demo sites one by one and returns
 * `{ results, totalScanned, sitesWithAuthFound }`.
 */
export function GET(scanner: AuthScanner, sites: readonly string[]): RequestHandler {
  return async (_request, response, next) => {
    const requestId = logger.generateRequestId();
    const startTime = Date.now();

    try {
      logger.info(requestId, 'API_BATCH_START', { siteCount: sites.length });

      const batch = await scanner.scanAll(sites);

      logger.success(requestId, 'API_BATCH_COMPLETE', {
        totalScanned: batch.totalScanned,
        sitesWithAuthFound: batch.sitesWithAuthFound,
      }, startTime);

      response.json(batch);
    } catch (error) {
      next(error);
    }
  };
}
