// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Domain Orchestrator
 *
 * Per-target state machine:
 *
 *   attempting ⇄ awaiting-credential
 *   attempting → completed | failed | exhausted
 *
 * Waiting for a free credential does not use up an attempt; only rate-limited
 * engine runs count against the ceiling. Only `completed` is remembered
 * across cycles, through the ledger.
 */

import { ScanError, errorAttrs, formatScanError } from './error-handling.js';
import type { CredentialPool } from './credential-pool.js';
import type { ScanInvoker, ScanOutcome } from './scan-invoker.js';
import type { FindingProcessor } from './finding-processor.js';
import type { Notifier } from './notifier.js';
import type { CompletedLedger } from '../audit/result-store.js';
import { ErrorCode } from '../types/errors.js';
import { isErr } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { ScheduleConfig } from '../types/config.js';
import { maskCredential } from '../utils/formatting.js';
import { type SleepFn, sleep as defaultSleep } from '../utils/timing.js';

export type DomainState = 'completed' | 'failed' | 'exhausted';

export type ExhaustionReason = 'rate-limited' | 'credentials-unavailable';

export interface FindingCounts {
  total: number;
  verified: number;
  invalidLines: number;
}

export interface DomainScanOutcome {
  target: string;
  state: DomainState;
  /** Engine runs made for this target in this cycle */
  attempts: number;
  skipped: boolean;
  findings?: FindingCounts;
  reason?: ExhaustionReason;
  error?: ScanError;
}

export interface CycleSummary {
  total: number;
  skipped: number;
  completed: number;
  failed: number;
  exhausted: number;
}

type ScanState =
  | { kind: 'attempting'; attempts: number; waits: number }
  | { kind: 'awaiting-credential'; attempts: number; waits: number }
  | { kind: 'done'; outcome: DomainScanOutcome };

export interface DomainOrchestratorDeps {
  pool: CredentialPool;
  invoker: ScanInvoker;
  processor: FindingProcessor;
  notifier: Notifier;
  ledger: CompletedLedger;
  schedule: ScheduleConfig;
  logger: ActivityLogger;
  sleep?: SleepFn;
}

export class DomainOrchestrator {
  private readonly pool: CredentialPool;
  private readonly invoker: ScanInvoker;
  private readonly processor: FindingProcessor;
  private readonly notifier: Notifier;
  private readonly ledger: CompletedLedger;
  private readonly schedule: ScheduleConfig;
  private readonly logger: ActivityLogger;
  private readonly sleep: SleepFn;

  constructor(deps: DomainOrchestratorDeps) {
    this.pool = deps.pool;
    this.invoker = deps.invoker;
    this.processor = deps.processor;
    this.notifier = deps.notifier;
    this.ledger = deps.ledger;
    this.schedule = deps.schedule;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async scanTarget(target: string): Promise<DomainScanOutcome> {
    if (this.ledger.has(target)) {
      this.logger.info(`Skipping completed target: ${target}`);
      return { target, state: 'completed', attempts: 0, skipped: true };
    }

    this.logger.info(`Starting scan for target: ${target}`);
    let state: ScanState = { kind: 'attempting', attempts: 0, waits: 0 };
    while (state.kind !== 'done') {
      state = state.kind === 'attempting'
        ? await this.attempt(target, state.attempts, state.waits)
        : await this.awaitCredential(target, state.attempts, state.waits);
    }
    return state.outcome;
  }

  /**
   * Scan every target in order, pausing between targets that were actually
   * scanned. Runs to the end of the list regardless of wall-clock time.
   */
  async scanTargets(targets: readonly string[]): Promise<CycleSummary> {
    const summary: CycleSummary = { total: targets.length, skipped: 0, completed: 0, failed: 0, exhausted: 0 };

    for (const target of targets) {
      const outcome = await this.scanTarget(target);
      if (outcome.skipped) {
        summary.skipped++;
        continue;
      }
      summary[outcome.state]++;
      await this.sleep(this.schedule.targetPauseMs);
    }
    return summary;
  }

  private async attempt(target: string, attempts: number, waits: number): Promise<ScanState> {
    const credential = this.pool.nextAvailable();
    if (credential === null) {
      return { kind: 'awaiting-credential', attempts, waits };
    }

    this.logger.info(`Using credential ending with ${maskCredential(credential)}`, { target });
    const outcome = await this.invoker.invoke(target, credential);
    const attemptNumber = attempts + 1;

    switch (outcome.kind) {
      case 'success':
        return { kind: 'done', outcome: await this.complete(target, outcome.stdout, attemptNumber) };

      case 'rate-limited':
        this.pool.markRateLimited(credential);
        this.logger.warn(`Credential ${maskCredential(credential)} rate-limited`, {
          target,
          attempt: attemptNumber,
          maxAttempts: this.schedule.maxAttempts,
        });
        if (attemptNumber >= this.schedule.maxAttempts) {
          this.logger.error(`Max retries reached for ${target}`, { attempts: attemptNumber });
          return {
            kind: 'done',
            outcome: { target, state: 'exhausted', attempts: attemptNumber, skipped: false, reason: 'rate-limited' },
          };
        }
        await this.sleep(this.schedule.rateLimitDelayMs);
        return { kind: 'attempting', attempts: attemptNumber, waits };

      case 'failed':
      case 'timed-out':
        return { kind: 'done', outcome: this.engineFailure(target, outcome, attemptNumber) };
    }
  }

  private async awaitCredential(target: string, attempts: number, waits: number): Promise<ScanState> {
    const maxWaits = this.schedule.maxCredentialWaits;
    if (maxWaits > 0 && waits >= maxWaits) {
      const error = new ScanError(
        `No credential became available for ${target} after ${waits} waits`,
        'rate-limit',
        true,
        { target, waits },
        ErrorCode.CREDENTIALS_EXHAUSTED
      );
      this.logger.error(formatScanError(error), errorAttrs(error));
      return {
        kind: 'done',
        outcome: { target, state: 'exhausted', attempts, skipped: false, reason: 'credentials-unavailable', error },
      };
    }

    const nextExpiry = this.pool.nextExpiry();
    this.logger.warn('All credentials are rate-limited. Waiting...', {
      target,
      coolingDown: this.pool.coolingDownCount(),
      waitMs: this.schedule.cooldownMs,
      ...(nextExpiry !== null && { nextExpiry: new Date(nextExpiry).toISOString() }),
    });
    await this.sleep(this.schedule.cooldownMs);
    return { kind: 'attempting', attempts, waits: waits + 1 };
  }

  private async complete(target: string, stdout: string, attempts: number): Promise<DomainScanOutcome> {
    // 1. Parse and persist
    const processed = await this.processor.process(target, stdout);
    if (isErr(processed)) {
      this.logger.error(`Scan failed for ${target}: ${formatScanError(processed.error)}`, errorAttrs(processed.error));
      return { target, state: 'failed', attempts, skipped: false, error: processed.error };
    }
    const { all, verified, invalidLines } = processed.value;

    // 2. Alert; delivery is best-effort and never changes the outcome
    const delivery = await this.notifier.alert(target, verified);
    if (isErr(delivery)) {
      this.logger.warn(`Alert delivery incomplete for ${target}`, { error: formatScanError(delivery.error) });
    }

    // 3. Record completion
    const marked = await this.ledger.markCompleted(target);
    if (isErr(marked)) {
      this.logger.error(`Scan failed for ${target}: ${formatScanError(marked.error)}`, errorAttrs(marked.error));
      return { target, state: 'failed', attempts, skipped: false, error: marked.error };
    }

    this.logger.info(`Completed scan for ${target}`, { findings: all.length, verified: verified.length });
    return {
      target,
      state: 'completed',
      attempts,
      skipped: false,
      findings: { total: all.length, verified: verified.length, invalidLines },
    };
  }

  private engineFailure(
    target: string,
    outcome: Extract<ScanOutcome, { kind: 'failed' | 'timed-out' }>,
    attempts: number
  ): DomainScanOutcome {
    const error = outcome.kind === 'timed-out'
      ? new ScanError(
          `Engine timed out after ${outcome.timeoutMs}ms`,
          'engine',
          false,
          { target },
          ErrorCode.ENGINE_TIMEOUT
        )
      : new ScanError(outcome.reason, 'engine', false, { target }, ErrorCode.ENGINE_FAILED);

    this.logger.error(`Scan failed for ${target}: ${formatScanError(error)}`, errorAttrs(error));
    return { target, state: 'failed', attempts, skipped: false, error };
  }
}
