/**
 * Application configuration
 *
 * Values come from the environment (a `.env` file is loaded by the server
 * entry point). `loadConfig` validates everything up front so a typo in a
 * variable fails at boot rather than on the first scan.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { parseLogLevel, type LogLevel } from './logger';
import type { FetchBackend } from '@/lib/types/fetch.types';

/*============================================================================*
 * DEFAULTS
 *============================================================================*/

export const DEFAULT_SITES: readonly string[] = [
  'https://github.com/login',
  'https://www.linkedin.com/login',
  'https://www.facebook.com/login',
  'https://login.salesforce.com/',
  'https://login.twitter.com/i/flow/login',
];

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5000'];

const commaList = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined) return [...fallback];
      return value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  FETCH_BACKEND: z.enum(['browser', 'http']).default('browser'),
  FETCH_TIMEOUT_SECONDS: z.coerce.number().positive().default(15),
  PAGE_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  CHROMIUM_PATH: z.string().min(1).optional(),
  DEFAULT_SITES: commaList(DEFAULT_SITES),
  ALLOWED_ORIGINS: commaList(DEFAULT_ORIGINS),
  LOG_LEVEL: z.string().optional(),
});

/*============================================================================*
 * TYPE DEFINITIONS
 *============================================================================*/

export interface AppConfig {
  port: number;
  fetchBackend: FetchBackend;
  fetchTimeoutSeconds: number;
  pageSettleMs: number;
  chromiumPath: string | undefined;
  defaultSites: string[];
  allowedOrigins: string[];
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    fetchBackend: vars.FETCH_BACKEND,
    fetchTimeoutSeconds: vars.FETCH_TIMEOUT_SECONDS,
    pageSettleMs: vars.PAGE_SETTLE_MS,
    chromiumPath: vars.CHROMIUM_PATH,
    defaultSites: vars.DEFAULT_SITES,
    allowedOrigins: vars.ALLOWED_ORIGINS,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
  };
}
