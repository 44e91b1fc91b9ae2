// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Wires the scanner's components once per process. All mutable state
 * (rotation cursor, cool-downs, completed set) lives on the instances
 * created here.
 */

import { CredentialPool } from './credential-pool.js';
import { ScanInvoker, type CommandRunner } from './scan-invoker.js';
import { FindingProcessor } from './finding-processor.js';
import { createNotifier, type Notifier } from './notifier.js';
import { DomainOrchestrator } from './domain-orchestrator.js';
import { CycleScheduler } from './cycle-scheduler.js';
import { ScanError, errorMessage } from './error-handling.js';
import { CompletedLedger, ResultStore } from '../audit/result-store.js';
import { ErrorCode } from '../types/errors.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { ScannerConfig } from '../types/config.js';
import { fileExists, readLineList } from '../utils/file-io.js';
import type { Clock, SleepFn } from '../utils/timing.js';

export interface ScannerContainer {
  pool: CredentialPool;
  ledger: CompletedLedger;
  store: ResultStore;
  notifier: Notifier;
  orchestrator: DomainOrchestrator;
  scheduler: CycleScheduler;
}

export interface ContainerOverrides {
  runner?: CommandRunner;
  notifier?: Notifier;
  sleep?: SleepFn;
  now?: Clock;
}

export async function loadTargetList(targetsFile: string): Promise<string[]> {
  if (!(await fileExists(targetsFile))) {
    throw new ScanError(`${targetsFile} not found`, 'config', false, { targetsFile }, ErrorCode.TARGETS_MISSING);
  }
  return readLineList(targetsFile);
}

async function loadCredentials(credentialsFile: string): Promise<string[]> {
  try {
    return await readLineList(credentialsFile);
  } catch (error) {
    throw new ScanError(
      `Cannot read credentials file ${credentialsFile}: ${errorMessage(error)}`,
      'config',
      false,
      { credentialsFile },
      ErrorCode.CREDENTIALS_MISSING
    );
  }
}

export async function createScannerContainer(
  config: ScannerConfig,
  logger: ActivityLogger,
  overrides: ContainerOverrides = {}
): Promise<ScannerContainer> {
  const { paths, schedule } = config;

  const pool = new CredentialPool(await loadCredentials(paths.credentialsFile), schedule.cooldownMs, overrides.now);
  const ledger = await CompletedLedger.load(paths.completedFile);
  const store = new ResultStore(paths.resultsDir, paths.verifiedDir);
  const notifier = overrides.notifier ?? createNotifier(config.telegram, logger);

  const orchestrator = new DomainOrchestrator({
    pool,
    invoker: new ScanInvoker(config.engine, overrides.runner),
    processor: new FindingProcessor(store, logger),
    notifier,
    ledger,
    schedule,
    logger,
    ...(overrides.sleep && { sleep: overrides.sleep }),
  });

  const scheduler = new CycleScheduler({
    orchestrator,
    notifier,
    schedule,
    logger,
    loadTargets: () => loadTargetList(paths.targetsFile),
    ...(overrides.sleep && { sleep: overrides.sleep }),
    ...(overrides.now && { now: overrides.now }),
  });

  logger.info(`Loaded ${pool.size} credentials and ${ledger.size} completed targets`);
  return { pool, ledger, store, notifier, orchestrator, scheduler };
}
