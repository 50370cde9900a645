import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import { AuthScanner } from '@/lib/scanner';
import { createFetcher } from '@/lib/scraper';
import { createApp } from './server';

const config = loadConfig();
logger.setLevel(config.logLevel);

const { fetcher, close, status } = createFetcher(config);
const scanner = new AuthScanner(fetcher, { timeoutSeconds: config.fetchTimeoutSeconds });
const app = createApp({ scanner, backend: fetcher.backend, browserStatus: status, config });

const server = app.listen(config.port, () => {
  logger.success('SYSTEM', 'SERVER_LISTENING', {
    port: config.port,
    fetchBackend: fetcher.backend,
    fetchTimeout: `${config.fetchTimeoutSeconds}s`,
  });
});

function shutdown(signal: string): void {
  logger.info('SYSTEM', 'SERVER_SHUTDOWN', { signal });
  server.close(() => {
    close()
      .catch((error: unknown) => logger.error('SYSTEM', 'SHUTDOWN_CLEANUP_FAILED', error))
      .finally(() => process.exit(0));
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
