// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Cycle Scheduler
 *
 * Alternates a bounded run window with a fixed rest window, forever. A cycle
 * that finishes its target list early sleeps out the remainder of the window
 * so cycles start at an even pace.
 */

import { formatScanError } from './error-handling.js';
import type { CycleSummary, DomainOrchestrator } from './domain-orchestrator.js';
import type { Notifier } from './notifier.js';
import { isErr } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { ScheduleConfig } from '../types/config.js';
import { formatClock, formatDuration, formatTimestamp } from '../utils/formatting.js';
import { type Clock, type SleepFn, sleep as defaultSleep, systemClock } from '../utils/timing.js';

export interface CycleReport {
  startedAt: number;
  deadline: number;
  finishedAt: number;
  summary: CycleSummary;
}

export interface CycleSchedulerDeps {
  orchestrator: DomainOrchestrator;
  notifier: Notifier;
  schedule: ScheduleConfig;
  logger: ActivityLogger;
  /** Reloaded at the start of every cycle */
  loadTargets: () => Promise<string[]>;
  sleep?: SleepFn;
  now?: Clock;
}

export class CycleScheduler {
  private readonly deps: CycleSchedulerDeps;
  private readonly sleep: SleepFn;
  private readonly now: Clock;

  constructor(deps: CycleSchedulerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? systemClock;
  }

  async runForever(): Promise<never> {
    for (;;) {
      await this.runCycle();
      await this.rest();
    }
  }

  /** One pass over the targets with no pacing sleep and no rest. */
  async runOnce(): Promise<CycleReport> {
    return this.runCycle({ pace: false });
  }

  async runCycle(options: { pace?: boolean } = {}): Promise<CycleReport> {
    const { orchestrator, schedule, logger, loadTargets } = this.deps;

    // 1. Fix the run window
    const startedAt = this.now();
    const deadline = startedAt + schedule.runDurationMs;
    logger.info(`🚀 Starting scanning cycle. Will run until ${formatTimestamp(new Date(deadline))}`);
    await this.announce('🔌 Secret scanner started new cycle');

    // 2. Scan the current target list
    const targets = await loadTargets();
    logger.info(`Loaded ${targets.length} targets`);
    const summary = await orchestrator.scanTargets(targets);
    const finishedAt = this.now();
    logger.info(`Scan pass finished in ${formatDuration(finishedAt - startedAt)}`, { ...summary });

    // 3. Sleep out the rest of the window if the list finished early
    const remaining = deadline - finishedAt;
    if (options.pace !== false && remaining > 0) {
      logger.info(`Scanning completed early. Sleeping for ${(remaining / 1000).toFixed(1)}s`);
      await this.sleep(remaining);
    }

    return { startedAt, deadline, finishedAt, summary };
  }

  async rest(): Promise<void> {
    const { schedule, logger } = this.deps;
    const minutes = Math.floor(schedule.restDurationMs / 60_000);
    const resumeAt = new Date(this.now() + schedule.restDurationMs);

    logger.info(`⏸️ Taking scheduled break for ${minutes} minutes`);
    await this.announce(`🛑 Scanner pausing for ${minutes} minute break. Resuming at ${formatClock(resumeAt)}`);
    await this.sleep(schedule.restDurationMs);
  }

  private async announce(text: string): Promise<void> {
    const delivery = await this.deps.notifier.post(text);
    if (isErr(delivery)) {
      this.deps.logger.warn('Lifecycle notification not delivered', { error: formatScanError(delivery.error) });
    }
  }
}
