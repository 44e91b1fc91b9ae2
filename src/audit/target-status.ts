// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Per-target status derived from the results directories and the ledger.
 */

import { fs, path } from 'zx';
import { CompletedLedger } from './result-store.js';
import type { PathsConfig } from '../types/config.js';
import { fileExists, readJson } from '../utils/file-io.js';
import { formatDuration, sanitizeTargetName, truncate } from '../utils/formatting.js';

export type TargetStatus = 'completed' | 'partial';

export interface TargetStatusRow {
  name: string;
  status: TargetStatus;
  findings: number;
  verified: number;
  updatedAt: Date;
}

async function countEntries(filePath: string): Promise<number> {
  if (!(await fileExists(filePath))) {
    return 0;
  }
  const data = await readJson(filePath);
  return Array.isArray(data) ? data.length : 0;
}

export async function collectTargetStatuses(
  paths: Pick<PathsConfig, 'resultsDir' | 'verifiedDir' | 'completedFile'>
): Promise<TargetStatusRow[]> {
  if (!(await fileExists(paths.resultsDir))) {
    return [];
  }

  const ledger = await CompletedLedger.load(paths.completedFile);
  const completed = new Set(ledger.entries().map(sanitizeTargetName));
  const rows: TargetStatusRow[] = [];

  for (const entry of await fs.readdir(paths.resultsDir)) {
    if (!entry.endsWith('.json')) {
      continue;
    }
    const name = entry.slice(0, -'.json'.length);
    const rawPath = path.join(paths.resultsDir, entry);
    try {
      const stats = await fs.stat(rawPath);
      rows.push({
        name,
        status: completed.has(name) ? 'completed' : 'partial',
        findings: await countEntries(rawPath),
        verified: await countEntries(path.join(paths.verifiedDir, `${name}.verified.json`)),
        updatedAt: stats.mtime,
      });
    } catch {
      // Unreadable or half-written artifact: leave it out of the report
    }
  }

  // Most recent first
  rows.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  return rows;
}

export function renderStatusTable(rows: TargetStatusRow[], now: Date = new Date()): string[] {
  if (rows.length === 0) {
    return ['No scanned targets found.'];
  }

  const nameWidth = 32;
  const statusWidth = 12;
  const findingsWidth = 10;
  const verifiedWidth = 10;
  const ageWidth = 10;

  const lines: string[] = [
    '  ' +
      'TARGET'.padEnd(nameWidth) +
      'STATUS'.padEnd(statusWidth) +
      'FINDINGS'.padEnd(findingsWidth) +
      'VERIFIED'.padEnd(verifiedWidth) +
      'UPDATED'.padEnd(ageWidth),
    '  ' + '─'.repeat(nameWidth + statusWidth + findingsWidth + verifiedWidth + ageWidth),
  ];

  for (const row of rows) {
    const age = formatDuration(Math.max(0, now.getTime() - row.updatedAt.getTime()));
    lines.push(
      '  ' +
        truncate(row.name, nameWidth - 2).padEnd(nameWidth) +
        row.status.padEnd(statusWidth) +
        String(row.findings).padEnd(findingsWidth) +
        String(row.verified).padEnd(verifiedWidth) +
        `${age} ago`.padEnd(ageWidth)
    );
  }

  lines.push('');
  lines.push(`${rows.length} target${rows.length === 1 ? '' : 's'} found`);
  return lines;
}
