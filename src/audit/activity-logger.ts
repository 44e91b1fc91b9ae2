// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Pino-backed ActivityLogger.
 *
 * Emits JSON lines with ISO timestamps to stdout, and appends the same lines
 * to a log file when one is configured. Silenced under Vitest.
 */

import pino, { type Logger } from 'pino';
import type { ActivityLogger, LogAttrs } from '../types/activity-logger.js';
import type { LogLevel } from '../types/config.js';

const REDACT_PATHS = ['credential', 'token', '*.token', 'botToken'];

export interface ActivityLoggerOptions {
  level?: LogLevel;
  logFile?: string | undefined;
}

class PinoActivityLogger implements ActivityLogger {
  constructor(private readonly pinoLogger: Logger) {}

  debug(message: string, attrs: LogAttrs = {}): void {
    this.pinoLogger.debug(attrs, message);
  }

  info(message: string, attrs: LogAttrs = {}): void {
    this.pinoLogger.info(attrs, message);
  }

  warn(message: string, attrs: LogAttrs = {}): void {
    this.pinoLogger.warn(attrs, message);
  }

  error(message: string, attrs: LogAttrs = {}): void {
    this.pinoLogger.error(attrs, message);
  }
}

export function createActivityLogger(options: ActivityLoggerOptions = {}): ActivityLogger {
  const level = options.level ?? 'info';
  const enabled = process.env.VITEST !== 'true' && process.env.NODE_ENV !== 'test';

  const streams: pino.StreamEntry[] = [{ level, stream: pino.destination({ dest: 1, sync: true }) }];
  if (options.logFile) {
    streams.push({
      level,
      stream: pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: true }),
    });
  }

  const pinoLogger = pino(
    {
      level,
      enabled,
      base: { service: 'leakwatch' },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    pino.multistream(streams)
  );

  return new PinoActivityLogger(pinoLogger);
}

/** For tests: keeps the pino shape, emits nothing. */
export function createNoopLogger(): ActivityLogger {
  return new PinoActivityLogger(pino({ enabled: false }));
}
