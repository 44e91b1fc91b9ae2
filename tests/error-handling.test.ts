import { describe, expect, it } from 'vitest';
import { ScanError, errorAttrs, errorMessage, formatScanError } from '../src/services/error-handling.js';
import { ErrorCode } from '../src/types/errors.js';

describe('formatScanError', () => {
  it('joins category, message and the remediation hint', () => {
    const error = new ScanError('No credentials found.', 'config', false, {}, ErrorCode.CREDENTIALS_MISSING);

    expect(formatScanError(error)).toBe(
      'config|No credentials found.|Hint: Add one access token per line to the credentials file.'
    );
  });

  it('omits the hint for codes without one and escapes the delimiter', () => {
    const error = new ScanError('HTTP 502 | bad gateway', 'network', true, {}, ErrorCode.NOTIFICATION_FAILED);

    expect(formatScanError(error)).toBe('network|HTTP 502 / bad gateway');
  });

  it('falls back to the plain message for other errors', () => {
    expect(formatScanError(new Error('a|b'))).toBe('a/b');
    expect(formatScanError('boom')).toBe('boom');
  });
});

describe('errorMessage', () => {
  it('stringifies non-Error values', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('errorAttrs', () => {
  it('exposes category, retryable and code as log fields', () => {
    const error = new ScanError('Engine timed out after 300ms', 'engine', false, {}, ErrorCode.ENGINE_TIMEOUT);

    expect(errorAttrs(error)).toEqual({ category: 'engine', retryable: false, code: ErrorCode.ENGINE_TIMEOUT });
  });

  it('omits the code when none was given', () => {
    expect(errorAttrs(new ScanError('slow down', 'rate-limit', true))).toEqual({
      category: 'rate-limit',
      retryable: true,
    });
  });

  it('has nothing to add for plain errors', () => {
    expect(errorAttrs(new Error('boom'))).toEqual({});
  });
});
