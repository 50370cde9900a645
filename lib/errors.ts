/**
 * Error types shared by the fetchers, the scanner and the HTTP layer
 */

import type { ScanError, ScanErrorKind } from '@/lib/types/auth.types';

export class FetchError extends Error {
  readonly kind: ScanErrorKind;
  readonly statusCode: number | null;

  constructor(kind: ScanErrorKind, message: string, statusCode: number | null = null) {
    super(message);
    this.name = 'FetchError';
    this.kind = kind;
    this.statusCode = statusCode;
  }

  static timeout(detail: string): FetchError {
    return new FetchError('Timeout', detail);
  }

  static connection(detail: string): FetchError {
    return new FetchError('ConnectionFailure', detail);
  }

  static http(statusCode: number): FetchError {
    return new FetchError('HttpError', `HTTP ${statusCode}`, statusCode);
  }

  static other(detail: string): FetchError {
    return new FetchError('Other', detail);
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}

/**
 * Maps anything thrown during a scan onto the user-facing error taxonomy.
 * Non-`FetchError` values become `Other` with their message behind an `Error: ` prefix.
 */
export function toScanError(error: unknown): ScanError {
  if (!(error instanceof FetchError)) {
    return { kind: 'Other', message: `Error: ${extractErrorMessage(error)}` };
  }

  switch (error.kind) {
    case 'Timeout':
      return { kind: 'Timeout', message: 'Request timed out: site took too long to respond.' };
    case 'ConnectionFailure':
      return { kind: 'ConnectionFailure', message: 'Connection error: could not reach the website.' };
    case 'HttpError': {
      const statusCode = error.statusCode ?? 0;
      return { kind: 'HttpError', statusCode, message: `HTTP error: ${statusCode}` };
    }
    case 'Other':
      return { kind: 'Other', message: `Error: ${error.message}` };
  }
}
