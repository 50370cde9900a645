import type { RequestHandler } from 'express';
import type { BrowserPoolStatus } from '@/lib/browser-pool';
import type { FetchBackend } from '@/lib/types/fetch.types';

export const SERVICE_NAME = 'auth-component-detector';
export const SERVICE_VERSION = '1.0.0';

/**
 * API Route: GET /api/health
 *
 * Includes the browser pool status when scans run through Chromium.
 */
export function GET(backend: FetchBackend, browserStatus?: () => BrowserPoolStatus): RequestHandler {
  return (_request, response) => {
    response.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      fetchBackend: backend,
      ...(browserStatus ? { browser: browserStatus() } : {}),
    });
  };
}
