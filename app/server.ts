import express, { type ErrorRequestHandler, type Express } from 'express';
import { corsMiddleware } from '@/middleware';
import { extractErrorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import type { BrowserPoolStatus } from '@/lib/browser-pool';
import type { AppConfig } from '@/lib/config';
import type { AuthScanner } from '@/lib/scanner';
import type { FetchBackend } from '@/lib/types/fetch.types';
import { GET as healthCheck } from './api/health/route';
import { GET as scanDefaults } from './api/scan-defaults/route';
import { POST as scanOne } from './api/scan/route';

export interface AppDependencies {
  scanner: AuthScanner;
  backend: FetchBackend;
  browserStatus?: () => BrowserPoolStatus;
  config: Pick<AppConfig, 'defaultSites' | 'allowedOrigins'>;
}

/** Body-parser messages for the request errors callers can fix. */
const CLIENT_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Invalid JSON',
  'entity.too.large': 'Request body too large',
};

/**
 * Status of an error raised with an explicit 4xx status (body-parser,
 * http-errors), or undefined for everything else.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function clientErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return CLIENT_ERROR_MESSAGES[error.type] ?? extractErrorMessage(error);
  }
  return extractErrorMessage(error);
}

const handleError: ErrorRequestHandler = (error: unknown, _request, response, _next) => {
  const status = clientErrorStatus(error);

  if (status !== undefined) {
    const message = clientErrorMessage(error);
    logger.warn('SYSTEM', 'API_REQUEST_REJECTED', message, { status });
    response.status(status).json({ error: message });
    return;
  }

  logger.error('SYSTEM', 'API_REQUEST_ERROR', error);
  response.status(500).json({ error: extractErrorMessage(error) });
};

export function createApp({ scanner, backend, browserStatus, config }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));
  app.use('/api', corsMiddleware(config.allowedOrigins));

  app.post('/api/scan', scanOne(scanner));
  app.get('/api/scan-defaults', scanDefaults(scanner, config.defaultSites));
  app.get('/api/health', healthCheck(backend, browserStatus));

  app.use(handleError);

  return app;
}
