import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { collectTargetStatuses, renderStatusTable } from '../src/audit/target-status.js';
import { makeFinding, makeTempDir } from './fixtures.js';

describe('collectTargetStatuses', () => {
  it('lists result files with counts and ledger status, most recent first', async () => {
    const dir = await makeTempDir();
    const paths = {
      resultsDir: path.join(dir, 'results'),
      verifiedDir: path.join(dir, 'verified'),
      completedFile: path.join(dir, 'completed.txt'),
    };
    await fs.mkdir(paths.resultsDir);
    await fs.mkdir(paths.verifiedDir);
    await fs.writeFile(path.join(paths.resultsDir, 'acme.json'), JSON.stringify([makeFinding(), makeFinding()]));
    await fs.writeFile(path.join(paths.verifiedDir, 'acme.verified.json'), JSON.stringify([makeFinding()]));
    await fs.writeFile(path.join(paths.resultsDir, 'globex.json'), '[]');
    await fs.writeFile(path.join(paths.resultsDir, 'notes.txt'), 'ignored');
    await fs.writeFile(paths.completedFile, 'acme\n');

    const older = new Date('2025-01-06T09:00:00.000Z');
    const newer = new Date('2025-01-06T10:00:00.000Z');
    await fs.utimes(path.join(paths.resultsDir, 'acme.json'), newer, newer);
    await fs.utimes(path.join(paths.resultsDir, 'globex.json'), older, older);

    const rows = await collectTargetStatuses(paths);

    expect(rows).toEqual([
      { name: 'acme', status: 'completed', findings: 2, verified: 1, updatedAt: newer },
      { name: 'globex', status: 'partial', findings: 0, verified: 0, updatedAt: older },
    ]);
  });

  it('returns nothing before the first scan', async () => {
    const dir = await makeTempDir();
    const rows = await collectTargetStatuses({
      resultsDir: path.join(dir, 'results'),
      verifiedDir: path.join(dir, 'verified'),
      completedFile: path.join(dir, 'completed.txt'),
    });
    expect(rows).toEqual([]);
  });
});

describe('renderStatusTable', () => {
  it('renders one padded row per target with its age', () => {
    const now = new Date('2025-01-06T12:00:00.000Z');
    const lines = renderStatusTable(
      [{ name: 'acme', status: 'completed', findings: 2, verified: 1, updatedAt: new Date('2025-01-06T10:30:00.000Z') }],
      now
    );

    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe(
      '  ' + 'TARGET'.padEnd(32) + 'STATUS'.padEnd(12) + 'FINDINGS'.padEnd(10) + 'VERIFIED'.padEnd(10) + 'UPDATED   '
    );
    expect(lines[1]).toBe('  ' + '─'.repeat(74));
    expect(lines[2]).toBe('  ' + 'acme'.padEnd(32) + 'completed   ' + '2'.padEnd(10) + '1'.padEnd(10) + '1h 30m ago');
    expect(lines[3]).toBe('');
    expect(lines[4]).toBe('1 target found');
  });

  it('says so when nothing has been scanned', () => {
    expect(renderStatusTable([])).toEqual(['No scanned targets found.']);
  });
});
