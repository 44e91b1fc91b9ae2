// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Preflight Validation Service
 *
 * Runs cheap filesystem checks before the first cycle so that configuration
 * problems fail the process at startup instead of mid-cycle.
 *
 * Checks run sequentially:
 * 1. Credentials file exists and lists at least one token
 * 2. Targets file exists
 * 3. Results and verified directories exist (created if missing) and are writable
 * 4. Completed ledger directory exists
 */

import { fs, path } from 'zx';
import { ScanError } from './error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { PathsConfig } from '../types/config.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import { fileExists, readLineList } from '../utils/file-io.js';

// === Input Files ===

async function validateCredentialsFile(
  credentialsFile: string,
  logger: ActivityLogger
): Promise<Result<void, ScanError>> {
  logger.info('Checking credentials file...', { credentialsFile });

  if (!(await fileExists(credentialsFile))) {
    return err(
      new ScanError(
        `Credentials file not found: ${credentialsFile}`,
        'config',
        false,
        { credentialsFile },
        ErrorCode.CREDENTIALS_MISSING
      )
    );
  }

  const credentials = await readLineList(credentialsFile);
  if (credentials.length === 0) {
    return err(
      new ScanError(
        'No credentials found.',
        'config',
        false,
        { credentialsFile },
        ErrorCode.CREDENTIALS_MISSING
      )
    );
  }

  logger.info('Credentials file OK', { credentials: credentials.length });
  return ok(undefined);
}

async function validateTargetsFile(
  targetsFile: string,
  logger: ActivityLogger
): Promise<Result<void, ScanError>> {
  logger.info('Checking targets file...', { targetsFile });

  if (!(await fileExists(targetsFile))) {
    return err(
      new ScanError(
        `${targetsFile} not found`,
        'config',
        false,
        { targetsFile },
        ErrorCode.TARGETS_MISSING
      )
    );
  }

  logger.info('Targets file OK');
  return ok(undefined);
}

// === Output Directories ===

async function validateWritableDir(dir: string, logger: ActivityLogger): Promise<Result<void, ScanError>> {
  try {
    await fs.ensureDir(dir);
    const testFile = path.join(dir, '.leakwatch-preflight-write-test');
    await fs.writeFile(testFile, 'ok', 'utf8');
    await fs.unlink(testFile);
  } catch {
    return err(
      new ScanError(
        `Directory is not writable: ${dir}`,
        'filesystem',
        false,
        { dir },
        ErrorCode.DIRECTORY_NOT_WRITABLE
      )
    );
  }

  logger.info('Directory OK', { dir });
  return ok(undefined);
}

// === Preflight Orchestrator ===

/** Returns on first failure. */
export async function runPreflightChecks(
  paths: PathsConfig,
  logger: ActivityLogger
): Promise<Result<void, ScanError>> {
  const checks: Array<() => Promise<Result<void, ScanError>>> = [
    () => validateCredentialsFile(paths.credentialsFile, logger),
    () => validateTargetsFile(paths.targetsFile, logger),
    () => validateWritableDir(paths.resultsDir, logger),
    () => validateWritableDir(paths.verifiedDir, logger),
    () => validateWritableDir(path.dirname(paths.completedFile), logger),
  ];

  for (const check of checks) {
    const result = await check();
    if (!result.ok) {
      return result;
    }
  }

  logger.info('All preflight checks passed');
  return ok(undefined);
}
