// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Configuration type definitions
 */

export interface PathsConfig {
  baseDir: string;
  targetsFile: string;
  credentialsFile: string;
  resultsDir: string;
  verifiedDir: string;
  completedFile: string;
  logFile?: string | undefined;
}

export interface EngineConfig {
  binary: string;
  timeoutMs: number;
}

export interface ScheduleConfig {
  maxAttempts: number;
  cooldownMs: number;
  rateLimitDelayMs: number;
  targetPauseMs: number;
  runDurationMs: number;
  restDurationMs: number;
  /** 0 waits for a free credential indefinitely */
  maxCredentialWaits: number;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  messageLimit: number;
  timeoutMs: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ScannerConfig {
  paths: PathsConfig;
  engine: EngineConfig;
  schedule: ScheduleConfig;
  telegram: TelegramConfig | null;
  logLevel: LogLevel;
}
