// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Finding Processor
 *
 * Turns raw engine output into findings, splits out the alertable ones and
 * persists both sets. Bad lines are counted and skipped; write failures are
 * returned to the caller.
 */

import type { ScanError } from './error-handling.js';
import type { ResultStore } from '../audit/result-store.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { FindingRecord, GithubLocation, ProcessedFindings } from '../types/finding.js';
import { type Result, ok, isErr } from '../types/result.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** SourceMetadata.Data.Github, only if every level is a mapping. */
export function githubLocation(finding: FindingRecord): GithubLocation | null {
  const metadata = finding['SourceMetadata'];
  if (!isRecord(metadata)) return null;
  const data = metadata['Data'];
  if (!isRecord(data)) return null;
  const github = data['Github'];
  if (!isRecord(github)) return null;
  return github;
}

export function permalinkOf(finding: FindingRecord): string {
  const link = githubLocation(finding)?.link;
  return typeof link === 'string' ? link : '';
}

export function isAlertable(finding: FindingRecord): boolean {
  return finding['Verified'] === true && permalinkOf(finding).length > 0;
}

export interface ParsedOutput {
  findings: FindingRecord[];
  invalidLines: number;
}

export function parseFindingLines(rawOutput: string, logger: ActivityLogger): ParsedOutput {
  const findings: FindingRecord[] = [];
  let invalidLines = 0;

  for (const line of rawOutput.split(/\r?\n/)) {
    if (line.trim().length === 0) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.debug('Skipping invalid JSON line', { line: line.slice(0, 100) });
      invalidLines++;
      continue;
    }

    if (!isRecord(parsed)) {
      logger.debug('Skipping non-object JSON entry', { line: line.slice(0, 100) });
      invalidLines++;
      continue;
    }
    findings.push(parsed);
  }

  return { findings, invalidLines };
}

export class FindingProcessor {
  constructor(
    private readonly store: ResultStore,
    private readonly logger: ActivityLogger
  ) {}

  async process(target: string, rawOutput: string): Promise<Result<ProcessedFindings, ScanError>> {
    // 1. Parse line by line
    const { findings, invalidLines } = parseFindingLines(rawOutput, this.logger);
    this.logger.info(`Parsed ${findings.length} valid entries, skipped ${invalidLines} invalid lines`, {
      target,
    });

    // 2. Raw results are always written, even when empty
    const rawWrite = await this.store.writeRaw(target, findings);
    if (isErr(rawWrite)) {
      return rawWrite;
    }

    // 3. Verified results only when there is something to write
    const verified = findings.filter(isAlertable);
    if (verified.length > 0) {
      const verifiedWrite = await this.store.writeVerified(target, verified);
      if (isErr(verifiedWrite)) {
        return verifiedWrite;
      }
      this.logger.info(`Found ${verified.length} verified secrets`, { target });
    } else {
      this.logger.info('No verified secrets found', { target });
    }

    return ok({ all: findings, verified, invalidLines });
  }
}
