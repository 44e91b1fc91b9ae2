import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { createNoopLogger } from '../src/audit/activity-logger.js';
import { runPreflightChecks } from '../src/services/preflight.js';
import type { PathsConfig } from '../src/types/config.js';
import { ErrorCode } from '../src/types/errors.js';
import { makeTempDir } from './fixtures.js';

const logger = createNoopLogger();

async function makePaths(files: { credentials?: string; targets?: string } = {}): Promise<PathsConfig> {
  const baseDir = await makeTempDir();
  const paths: PathsConfig = {
    baseDir,
    targetsFile: path.join(baseDir, 'Domains.txt'),
    credentialsFile: path.join(baseDir, 'PAT.txt'),
    resultsDir: path.join(baseDir, 'results'),
    verifiedDir: path.join(baseDir, 'verified'),
    completedFile: path.join(baseDir, 'state', 'completed.txt'),
  };
  if (files.credentials !== undefined) {
    await fs.writeFile(paths.credentialsFile, files.credentials);
  }
  if (files.targets !== undefined) {
    await fs.writeFile(paths.targetsFile, files.targets);
  }
  return paths;
}

describe('runPreflightChecks', () => {
  it('passes and creates the output directories', async () => {
    const paths = await makePaths({ credentials: 'tok-a\n', targets: 'acme\n' });

    const result = await runPreflightChecks(paths, logger);

    expect(result.ok).toBe(true);
    expect((await fs.stat(paths.resultsDir)).isDirectory()).toBe(true);
    expect((await fs.stat(paths.verifiedDir)).isDirectory()).toBe(true);
    expect((await fs.stat(path.dirname(paths.completedFile))).isDirectory()).toBe(true);
  });

  it('fails when the credentials file is missing', async () => {
    const paths = await makePaths({ targets: 'acme\n' });

    const result = await runPreflightChecks(paths, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CREDENTIALS_MISSING);
    expect(result.error.message).toBe(`Credentials file not found: ${paths.credentialsFile}`);
  });

  it('fails when the credentials file lists no tokens', async () => {
    const paths = await makePaths({ credentials: '\n   \n', targets: 'acme\n' });

    const result = await runPreflightChecks(paths, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('No credentials found.');
  });

  it('fails when the targets file is missing', async () => {
    const paths = await makePaths({ credentials: 'tok-a\n' });

    const result = await runPreflightChecks(paths, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.TARGETS_MISSING);
    expect(result.error.message).toBe(`${paths.targetsFile} not found`);
  });

  it('fails when an output directory cannot be created', async () => {
    const paths = await makePaths({ credentials: 'tok-a\n', targets: 'acme\n' });
    await fs.writeFile(paths.resultsDir, 'not a directory');

    const result = await runPreflightChecks(paths, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.DIRECTORY_NOT_WRITABLE);
    expect(result.error.context).toEqual({ dir: paths.resultsDir });
  });
});
