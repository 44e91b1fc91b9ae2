import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { ScheduleConfig } from '../src/types/config.js';
import type { FindingRecord } from '../src/types/finding.js';
import type { CommandResult } from '../src/services/scan-invoker.js';
import type { ScanError } from '../src/services/error-handling.js';
import type { Notifier } from '../src/services/notifier.js';
import type { ActivityLogger, LogAttrs } from '../src/types/activity-logger.js';
import { type Result, ok } from '../src/types/result.js';

export const schedule: ScheduleConfig = {
  maxAttempts: 3,
  cooldownMs: 300_000,
  rateLimitDelayMs: 2_000,
  targetPauseMs: 5_000,
  runDurationMs: 6 * 3_600_000,
  restDurationMs: 3_600_000,
  maxCredentialWaits: 0,
};

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'leakwatch-test-'));
}

export function makeFinding(overrides: {
  detector?: string;
  verified?: boolean;
  file?: string;
  link?: string;
} = {}): FindingRecord {
  return {
    DetectorName: overrides.detector ?? 'Github',
    Verified: overrides.verified ?? true,
    Raw: 'test-secret',
    SourceMetadata: {
      Data: {
        Github: {
          file: overrides.file ?? 'config/settings.yml',
          link: overrides.link ?? 'https://github.com/acme/app/blob/abc123/config/settings.yml#L3',
        },
      },
    },
  };
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    command: 'trufflehog',
    args: [],
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    ...overrides,
  };
}

/** Resolves immediately and records every requested delay. */
export function makeSleep() {
  return vi.fn(async (_ms: number): Promise<void> => {});
}

/** Notifier double that accepts every message. */
export function makeNotifier() {
  return {
    post: vi.fn(async (_text: string): Promise<Result<void, ScanError>> => ok(undefined)),
    alert: vi.fn(async (_target: string, _verified: FindingRecord[]): Promise<Result<void, ScanError>> => ok(undefined)),
  } satisfies Notifier;
}

type LogFn = (message: string, attrs?: LogAttrs) => void;

/** Logger double that records every call. */
export function makeLogger() {
  return {
    debug: vi.fn<LogFn>(),
    info: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
  } satisfies ActivityLogger;
}
