import { describe, expect, it, vi } from 'vitest';
import {
  ScanInvoker,
  buildEngineArgs,
  classifyScanResult,
  runCommandCapture,
  type CommandRunner,
} from '../src/services/scan-invoker.js';
import { commandResult } from './fixtures.js';

const TIMEOUT_MS = 3_600_000;

describe('classifyScanResult', () => {
  it('treats a zero exit as success carrying stdout', () => {
    const outcome = classifyScanResult(commandResult({ stdout: '{"Verified":false}\n' }), TIMEOUT_MS);
    expect(outcome).toEqual({ kind: 'success', stdout: '{"Verified":false}\n' });
  });

  it('treats a non-zero exit mentioning 403 as rate-limited', () => {
    const outcome = classifyScanResult(
      commandResult({ exitCode: 1, stderr: 'error: GET https://api.github.com/orgs/acme: 403 API rate limit exceeded' }),
      TIMEOUT_MS
    );
    expect(outcome.kind).toBe('rate-limited');
  });

  it('treats other non-zero exits as failures carrying the diagnostic text', () => {
    const outcome = classifyScanResult(commandResult({ exitCode: 2, stderr: '  organization not found\n' }), TIMEOUT_MS);
    expect(outcome).toEqual({ kind: 'failed', reason: 'organization not found' });
  });

  it('describes the exit code when stderr is empty', () => {
    const outcome = classifyScanResult(commandResult({ exitCode: 7 }), TIMEOUT_MS);
    expect(outcome).toEqual({ kind: 'failed', reason: 'Engine exited with code 7' });
  });

  it('reports a timeout ahead of anything else', () => {
    const outcome = classifyScanResult(
      commandResult({ exitCode: null, signal: 'SIGKILL', timedOut: true, stderr: '403' }),
      TIMEOUT_MS
    );
    expect(outcome).toEqual({ kind: 'timed-out', timeoutMs: TIMEOUT_MS });
  });

  it('reports a spawn error as a failure', () => {
    const outcome = classifyScanResult(
      commandResult({ exitCode: null, error: 'spawn trufflehog ENOENT' }),
      TIMEOUT_MS
    );
    expect(outcome).toEqual({ kind: 'failed', reason: 'spawn trufflehog ENOENT' });
  });
});

describe('ScanInvoker', () => {
  it('runs the engine against the target with the credential and JSON output', async () => {
    const runner = vi.fn<CommandRunner>(async () => commandResult({ stdout: '' }));
    const invoker = new ScanInvoker({ binary: '/opt/trufflehog', timeoutMs: 5_000 }, runner);

    const outcome = await invoker.invoke('acme', 'tok-a');

    expect(outcome).toEqual({ kind: 'success', stdout: '' });
    expect(runner).toHaveBeenCalledWith(
      '/opt/trufflehog',
      ['github', '--org', 'acme', '--token', 'tok-a', '--json'],
      5_000
    );
  });

  it('builds the engine arguments in a fixed order', () => {
    expect(buildEngineArgs('org-x', 'tok-z')).toEqual(['github', '--org', 'org-x', '--token', 'tok-z', '--json']);
  });
});

describe('runCommandCapture', () => {
  const node = process.execPath;

  it('captures stdout of a clean exit', async () => {
    const result = await runCommandCapture(node, ['-e', 'process.stdout.write(\'{"Verified":true}\\n\')'], 10_000);

    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.stdout).toBe('{"Verified":true}\n');
    expect(classifyScanResult(result, 10_000)).toEqual({ kind: 'success', stdout: '{"Verified":true}\n' });
  });

  it('kills a run that outlives its budget and reports a timeout', async () => {
    const startedAt = Date.now();
    const result = await runCommandCapture(node, ['-e', 'setTimeout(() => {}, 20000)'], 300);

    expect(Date.now() - startedAt).toBeLessThan(10_000);
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
    expect(result.exitCode).toBeNull();
    expect(classifyScanResult(result, 300)).toEqual({ kind: 'timed-out', timeoutMs: 300 });
  }, 15_000);

  it('reports a missing binary as a failure instead of throwing', async () => {
    const result = await runCommandCapture('/nonexistent/leakwatch-engine', [], 5_000);

    expect(result.exitCode).toBeNull();
    expect(result.error).toContain('ENOENT');
    expect(classifyScanResult(result, 5_000).kind).toBe('failed');
  });

  it('classifies a 403 on stderr as rate-limited', async () => {
    const result = await runCommandCapture(
      node,
      ['-e', 'process.stderr.write(\'HTTP 403 rate limit exceeded\'); process.exit(1)'],
      10_000
    );

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('HTTP 403 rate limit exceeded');
    expect(classifyScanResult(result, 10_000)).toEqual({
      kind: 'rate-limited',
      stderr: 'HTTP 403 rate limit exceeded',
    });
  });
});
