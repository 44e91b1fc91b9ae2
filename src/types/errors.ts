// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Error classification shared by services and the entry point.
 */

export type ScanErrorType =
  | 'config'
  | 'filesystem'
  | 'engine'
  | 'rate-limit'
  | 'network'
  | 'parse';

export enum ErrorCode {
  CREDENTIALS_MISSING = 'CREDENTIALS_MISSING',
  TARGETS_MISSING = 'TARGETS_MISSING',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  RESULTS_WRITE_FAILED = 'RESULTS_WRITE_FAILED',
  LEDGER_WRITE_FAILED = 'LEDGER_WRITE_FAILED',
  DIRECTORY_NOT_WRITABLE = 'DIRECTORY_NOT_WRITABLE',
  ENGINE_FAILED = 'ENGINE_FAILED',
  ENGINE_TIMEOUT = 'ENGINE_TIMEOUT',
  CREDENTIALS_EXHAUSTED = 'CREDENTIALS_EXHAUSTED',
  NOTIFICATION_FAILED = 'NOTIFICATION_FAILED',
}
