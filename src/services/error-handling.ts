// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { ErrorCode, type ScanErrorType } from '../types/errors.js';
import type { LogAttrs } from '../types/activity-logger.js';

export class ScanError extends Error {
  readonly category: ScanErrorType;
  readonly retryable: boolean;
  readonly context: Record<string, unknown>;
  readonly code: ErrorCode | undefined;

  constructor(
    message: string,
    category: ScanErrorType,
    retryable: boolean = false,
    context: Record<string, unknown> = {},
    code?: ErrorCode
  ) {
    super(message);
    this.name = 'ScanError';
    this.category = category;
    this.retryable = retryable;
    this.context = context;
    this.code = code;
  }
}

/** Maps error codes to a hint an operator can act on. */
const REMEDIATION_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CREDENTIALS_MISSING]: 'Add one access token per line to the credentials file.',
  [ErrorCode.TARGETS_MISSING]: 'Create the targets file with one organization per line.',
  [ErrorCode.CONFIG_VALIDATION_FAILED]: 'Check the YAML config and LEAKWATCH_* environment variables.',
  [ErrorCode.RESULTS_WRITE_FAILED]: 'Check free disk space and permissions on the results directories.',
  [ErrorCode.LEDGER_WRITE_FAILED]: 'Check permissions on the completed ledger file.',
  [ErrorCode.DIRECTORY_NOT_WRITABLE]: 'Check permissions on the data directory.',
  [ErrorCode.ENGINE_FAILED]: 'Verify the engine binary path and that it runs standalone.',
  [ErrorCode.ENGINE_TIMEOUT]: 'Raise engine.timeout_seconds or split the organization.',
  [ErrorCode.CREDENTIALS_EXHAUSTED]: 'Add more access tokens or lower the scan rate.',
};

/** Wraps anything thrown into a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Structured log fields for an error; empty for anything but a ScanError. */
export function errorAttrs(error: unknown): LogAttrs {
  if (!(error instanceof ScanError)) {
    return {};
  }
  return {
    category: error.category,
    retryable: error.retryable,
    ...(error.code && { code: error.code }),
  };
}

/**
 * Render an error as `category|message|Hint: ...`.
 * Segments are delimited by | so log consumers can split them.
 */
export function formatScanError(error: unknown): string {
  if (!(error instanceof ScanError)) {
    return errorMessage(error).replaceAll('|', '/');
  }

  const segments: string[] = [error.category, error.message.replaceAll('|', '/')];
  if (error.code) {
    const hint = REMEDIATION_HINTS[error.code];
    if (hint) {
      segments.push(`Hint: ${hint}`);
    }
  }
  return segments.join('|');
}
