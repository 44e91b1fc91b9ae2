// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Scan Invoker
 *
 * Runs the detection engine once for one target with one credential and
 * classifies how it ended. Rate-limit bookkeeping belongs to the caller.
 */

import { spawn } from 'child_process';
import type { EngineConfig } from '../types/config.js';

const RATE_LIMIT_MARKER = '403';

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => Promise<CommandResult>;

export type ScanOutcome =
  | { kind: 'success'; stdout: string }
  | { kind: 'rate-limited'; stderr: string }
  | { kind: 'failed'; reason: string }
  | { kind: 'timed-out'; timeoutMs: number };

/**
 * Spawn without a shell, capture both streams, and SIGKILL on timeout.
 * Never rejects: spawn failures come back in `error`.
 */
export async function runCommandCapture(
  command: string,
  args: string[],
  timeoutMs: number
): Promise<CommandResult> {
  return await new Promise((resolve) => {
    const resolveFailure = (error: string) => {
      resolve({
        command,
        args,
        exitCode: null,
        signal: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        error,
      });
    };

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        shell: false,
      });
    } catch (error) {
      resolveFailure(error instanceof Error ? error.message : String(error));
      return;
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdout = child.stdout;
    const stderr = child.stderr;
    if (!stdout || !stderr) {
      resolveFailure('Command output streams are unavailable');
      return;
    }

    stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    let timedOut = false;
    let settled = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        command,
        args,
        exitCode: null,
        signal: null,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
        error: error.message,
      });
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        command,
        args,
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
      });
    });
  });
}

export function buildEngineArgs(target: string, credential: string): string[] {
  return ['github', '--org', target, '--token', credential, '--json'];
}

export function classifyScanResult(result: CommandResult, timeoutMs: number): ScanOutcome {
  if (result.timedOut) {
    return { kind: 'timed-out', timeoutMs };
  }
  if (result.error !== undefined) {
    return { kind: 'failed', reason: result.error };
  }
  if (result.exitCode === 0) {
    return { kind: 'success', stdout: result.stdout };
  }
  if (result.stderr.includes(RATE_LIMIT_MARKER)) {
    return { kind: 'rate-limited', stderr: result.stderr };
  }

  const status = result.exitCode !== null
    ? `exited with code ${result.exitCode}`
    : `terminated by ${result.signal ?? 'unknown signal'}`;
  const diagnostic = result.stderr.trim();
  return { kind: 'failed', reason: diagnostic ? diagnostic : `Engine ${status}` };
}

export class ScanInvoker {
  private readonly engine: EngineConfig;
  private readonly runner: CommandRunner;

  constructor(engine: EngineConfig, runner: CommandRunner = runCommandCapture) {
    this.engine = engine;
    this.runner = runner;
  }

  async invoke(target: string, credential: string): Promise<ScanOutcome> {
    const result = await this.runner(
      this.engine.binary,
      buildEngineArgs(target, credential),
      this.engine.timeoutMs
    );
    return classifyScanResult(result, this.engine.timeoutMs);
  }
}
