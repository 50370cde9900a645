import { describe, expect, it } from 'vitest';
import { extractErrorMessage, FetchError, toScanError } from './errors';

describe('toScanError', () => {
  it('maps each fetch error kind to its message', () => {
    expect(toScanError(FetchError.timeout('goto timed out'))).toEqual({
      kind: 'Timeout',
      message: 'Request timed out: site took too long to respond.',
    });
    expect(toScanError(FetchError.connection('ECONNREFUSED'))).toEqual({
      kind: 'ConnectionFailure',
      message: 'Connection error: could not reach the website.',
    });
    expect(toScanError(FetchError.http(418))).toEqual({
      kind: 'HttpError',
      statusCode: 418,
      message: 'HTTP error: 418',
    });
    expect(toScanError(FetchError.other('bad gzip'))).toEqual({ kind: 'Other', message: 'Error: bad gzip' });
  });

  it('wraps anything else as Other', () => {
    expect(toScanError(new RangeError('out of range'))).toEqual({ kind: 'Other', message: 'Error: out of range' });
    expect(toScanError('plain string')).toEqual({ kind: 'Other', message: 'Error: plain string' });
  });
});

describe('extractErrorMessage', () => {
  it('handles errors, strings and unknown values', () => {
    expect(extractErrorMessage(new Error('x'))).toBe('x');
    expect(extractErrorMessage('y')).toBe('y');
    expect(extractErrorMessage({ code: 1 })).toBe('Unknown error');
  });
});
