// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Result store and completed ledger.
 *
 * Per-target artifacts are pretty-printed JSON arrays, overwritten on every
 * successful scan. The ledger is an append-only list of finished targets.
 */

import { fs, path } from 'zx';
import { ScanError, errorMessage } from '../services/error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { FindingRecord } from '../types/finding.js';
import { fileExists, readLineList, writeJson } from '../utils/file-io.js';
import { sanitizeTargetName } from '../utils/formatting.js';

export class ResultStore {
  constructor(
    readonly resultsDir: string,
    readonly verifiedDir: string
  ) {}

  rawPath(target: string): string {
    return path.join(this.resultsDir, `${sanitizeTargetName(target)}.json`);
  }

  verifiedPath(target: string): string {
    return path.join(this.verifiedDir, `${sanitizeTargetName(target)}.verified.json`);
  }

  async writeRaw(target: string, findings: FindingRecord[]): Promise<Result<string, ScanError>> {
    return this.write(this.rawPath(target), target, findings);
  }

  async writeVerified(target: string, findings: FindingRecord[]): Promise<Result<string, ScanError>> {
    return this.write(this.verifiedPath(target), target, findings);
  }

  private async write(
    filePath: string,
    target: string,
    findings: FindingRecord[]
  ): Promise<Result<string, ScanError>> {
    try {
      await writeJson(filePath, findings);
      return ok(filePath);
    } catch (error) {
      return err(
        new ScanError(
          `Failed to write results for ${target}: ${errorMessage(error)}`,
          'filesystem',
          false,
          { target, filePath },
          ErrorCode.RESULTS_WRITE_FAILED
        )
      );
    }
  }
}

export class CompletedLedger {
  private readonly completed: Set<string>;

  private constructor(
    readonly filePath: string,
    entries: Iterable<string>
  ) {
    this.completed = new Set(entries);
  }

  /** A missing ledger file is an empty ledger. */
  static async load(filePath: string): Promise<CompletedLedger> {
    const entries = (await fileExists(filePath)) ? await readLineList(filePath) : [];
    return new CompletedLedger(filePath, entries);
  }

  has(target: string): boolean {
    return this.completed.has(target);
  }

  get size(): number {
    return this.completed.size;
  }

  entries(): string[] {
    return [...this.completed];
  }

  /** Appends to disk first; memory only changes once the write landed. */
  async markCompleted(target: string): Promise<Result<void, ScanError>> {
    if (this.completed.has(target)) {
      return ok(undefined);
    }
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.appendFile(this.filePath, `${target}\n`, 'utf8');
    } catch (error) {
      return err(
        new ScanError(
          `Failed to record ${target} as completed: ${errorMessage(error)}`,
          'filesystem',
          false,
          { target, filePath: this.filePath },
          ErrorCode.LEDGER_WRITE_FAILED
        )
      );
    }
    this.completed.add(target);
    return ok(undefined);
  }
}
