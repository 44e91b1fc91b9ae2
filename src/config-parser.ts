// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Config loading: optional YAML file, overridden by environment variables,
 * validated and coerced into a ScannerConfig.
 *
 * The YAML file is read with FAILSAFE_SCHEMA, so every value arrives as a
 * string and goes through the same coercion as environment values.
 */

import { fs, path } from 'zx';
import { load, FAILSAFE_SCHEMA } from 'js-yaml';
import { z } from 'zod';
import { ScanError, errorMessage } from './services/error-handling.js';
import { ErrorCode } from './types/errors.js';
import type { ScannerConfig } from './types/config.js';

/** Node timers fire immediately for delays above a signed 32-bit millisecond count. */
const MAX_TIMER_MS = 2_147_483_647;
const MAX_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
const MAX_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);
const MAX_HOURS = Math.floor(MAX_TIMER_MS / 3_600_000);

const seconds = () => z.coerce.number().nonnegative().max(MAX_SECONDS);

const ConfigSchema = z.object({
  base_dir: z.string().min(1).default('./leakwatch-data'),
  targets_file: z.string().min(1).default('Domains.txt'),
  credentials_file: z.string().min(1).default('PAT.txt'),
  results_dir: z.string().min(1).default('results'),
  verified_dir: z.string().min(1).default('verified'),
  completed_file: z.string().min(1).default('completed.txt'),
  log_file: z.string().min(1).default('leakwatch.log'),

  engine_binary: z.string().min(1).default('trufflehog'),
  engine_timeout_seconds: seconds().positive().default(3600),

  max_attempts: z.coerce.number().int().positive().default(3),
  cooldown_seconds: seconds().positive().default(300),
  rate_limit_delay_seconds: seconds().default(2),
  target_pause_seconds: seconds().default(5),
  run_hours: z.coerce.number().positive().max(MAX_HOURS).default(6),
  rest_minutes: z.coerce.number().nonnegative().max(MAX_MINUTES).default(60),
  max_credential_waits: z.coerce.number().int().nonnegative().default(0),

  telegram_bot_token: z.string().min(1).optional(),
  telegram_chat_id: z.string().min(1).optional(),
  telegram_message_limit: z.coerce.number().int().positive().default(3000),
  telegram_timeout_seconds: seconds().positive().default(10),

  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

type ConfigKey = keyof z.infer<typeof ConfigSchema>;

const CONFIG_KEYS = ConfigSchema.keyof().options;

/** Unprefixed environment names accepted alongside LEAKWATCH_<KEY>. */
const ENV_ALIASES: Partial<Record<ConfigKey, string>> = {
  telegram_bot_token: 'TELEGRAM_BOT_TOKEN',
  telegram_chat_id: 'TELEGRAM_CHAT_ID',
  log_level: 'LOG_LEVEL',
};

/** YAML sections whose keys get a prefix when flattened. */
const SECTION_PREFIXES: Record<string, string> = {
  paths: '',
  schedule: '',
  engine: 'engine_',
  telegram: 'telegram_',
};

type FlatConfig = Record<string, string>;

function configError(message: string, context: Record<string, unknown> = {}): ScanError {
  return new ScanError(message, 'config', false, context, ErrorCode.CONFIG_VALIDATION_FAILED);
}

function isStringMap(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function flattenConfigDocument(document: unknown): FlatConfig {
  if (document === undefined || document === null) {
    return {};
  }
  if (!isStringMap(document)) {
    throw configError('Config file must contain a mapping at the top level');
  }

  const flat: FlatConfig = {};
  for (const [key, value] of Object.entries(document)) {
    if (typeof value === 'string') {
      flat[key] = value;
      continue;
    }

    const prefix = SECTION_PREFIXES[key];
    if (prefix === undefined || !isStringMap(value)) {
      throw configError(`Unsupported config entry: ${key}`, { key });
    }
    for (const [subKey, subValue] of Object.entries(value)) {
      if (typeof subValue !== 'string') {
        throw configError(`Config value ${key}.${subKey} must be a scalar`, { key, subKey });
      }
      flat[`${prefix}${subKey}`] = subValue;
    }
  }
  return flat;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): FlatConfig {
  const flat: FlatConfig = {};
  for (const key of CONFIG_KEYS) {
    const alias = ENV_ALIASES[key];
    const value = env[`LEAKWATCH_${key.toUpperCase()}`] ?? (alias ? env[alias] : undefined);
    if (value !== undefined && value.trim() !== '') {
      flat[key] = value.trim();
    }
  }
  return flat;
}

export function buildScannerConfig(raw: FlatConfig): ScannerConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw configError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const values = parsed.data;

  const baseDir = path.resolve(values.base_dir);
  const inBase = (p: string): string => path.resolve(baseDir, p);

  const { telegram_bot_token: botToken, telegram_chat_id: chatId } = values;
  if ((botToken === undefined) !== (chatId === undefined)) {
    throw configError('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together');
  }

  return {
    paths: {
      baseDir,
      targetsFile: inBase(values.targets_file),
      credentialsFile: inBase(values.credentials_file),
      resultsDir: inBase(values.results_dir),
      verifiedDir: inBase(values.verified_dir),
      completedFile: inBase(values.completed_file),
      logFile: inBase(values.log_file),
    },
    engine: {
      binary: values.engine_binary,
      timeoutMs: values.engine_timeout_seconds * 1000,
    },
    schedule: {
      maxAttempts: values.max_attempts,
      cooldownMs: values.cooldown_seconds * 1000,
      rateLimitDelayMs: values.rate_limit_delay_seconds * 1000,
      targetPauseMs: values.target_pause_seconds * 1000,
      runDurationMs: values.run_hours * 3_600_000,
      restDurationMs: values.rest_minutes * 60_000,
      maxCredentialWaits: values.max_credential_waits,
    },
    telegram: botToken !== undefined && chatId !== undefined
      ? {
          botToken,
          chatId,
          messageLimit: values.telegram_message_limit,
          timeoutMs: values.telegram_timeout_seconds * 1000,
        }
      : null,
    logLevel: values.log_level,
  };
}

export async function parseConfig(
  configPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): Promise<ScannerConfig> {
  let fromFile: FlatConfig = {};
  if (configPath) {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf8');
    } catch (error) {
      throw configError(`Cannot read config file ${configPath}: ${errorMessage(error)}`, { configPath });
    }

    let document: unknown;
    try {
      document = load(content, { schema: FAILSAFE_SCHEMA });
    } catch (error) {
      throw configError(`Config file is not valid YAML: ${errorMessage(error)}`, { configPath });
    }
    fromFile = flattenConfigDocument(document);
  }

  return buildScannerConfig({ ...fromFile, ...readEnvOverrides(env) });
}
