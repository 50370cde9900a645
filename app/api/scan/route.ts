import type { RequestHandler } from 'express';
import { z } from 'zod';
import { logger } from '@/lib/logger';
import type { AuthScanner } from '@/lib/scanner';
import { normalizeScanUrl } from '@/lib/url';

/**
 * API Route: POST /api/scan
 *
 * Request body:
 * {
 *   "url": "github.com/login"
 * }
 *
 * Response: a ScanResult
 * {
 *   "url": "https://github.com/login",
 *   "success": true,
 *   "error": null,
 *   "statusCode": 200,
 *   "pageTitle": "Sign in to GitHub",
 *   "authResult": { "found": true, "components": [...], "summary": "...", "totalFound": 3 },
 *   "scanDurationSeconds": 4.21
 * }
 */
const scanRequestSchema = z.object({
  url: z.string(),
});

export function POST(scanner: AuthScanner): RequestHandler {
  return async (request, response, next) => {
    const requestId = logger.generateRequestId();
    const startTime = Date.now();

    try {
      const body = scanRequestSchema.safeParse(request.body);
      if (!body.success) {
        response.status(400).json({ error: 'Missing url' });
        return;
      }

      const checked = normalizeScanUrl(body.data.url);
      if (!checked.ok) {
        logger.warn(requestId, 'API_SCAN_REJECTED', checked.error, { url: body.data.url });
        response.status(400).json({ error: checked.error });
        return;
      }

      logger.info(requestId, 'API_REQUEST_START', { url: checked.url });

      const result = await scanner.scan(checked.url, requestId);

      logger.success(requestId, 'API_REQUEST_COMPLETE', {
        success: result.success,
        found: result.authResult?.found ?? false,
      }, startTime);

      response.json(result);
    } catch (error) {
      next(error);
    }
  };
}
