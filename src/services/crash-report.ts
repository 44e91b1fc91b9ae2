// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Last-resort reporting for errors that end the process.
 */

import { errorAttrs, errorMessage, formatScanError } from './error-handling.js';
import {
  DEFAULT_DELIVERY_TIMEOUT_MS,
  DEFAULT_MESSAGE_LIMIT,
  DisabledNotifier,
  TelegramNotifier,
  type Notifier,
} from './notifier.js';
import { isErr } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';

/** Used when the config never loaded: crash reports still go out if the env allows. */
export function fallbackNotifier(logger: ActivityLogger, env: NodeJS.ProcessEnv = process.env): Notifier {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  if (botToken && chatId) {
    return new TelegramNotifier(
      { botToken, chatId, messageLimit: DEFAULT_MESSAGE_LIMIT, timeoutMs: DEFAULT_DELIVERY_TIMEOUT_MS },
      logger
    );
  }
  return new DisabledNotifier(logger);
}

/**
 * Log the fatal error and post the crash message once. Never throws; the
 * caller exits afterwards.
 */
export async function reportCrash(
  error: unknown,
  notifier: Notifier | null,
  logger: ActivityLogger,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  logger.error(`Fatal error: ${formatScanError(error)}`, {
    ...errorAttrs(error),
    ...(error instanceof Error && error.stack !== undefined && { stack: error.stack }),
  });

  const delivery = await (notifier ?? fallbackNotifier(logger, env)).post(`❌ Scanner crashed: ${errorMessage(error)}`);
  if (isErr(delivery)) {
    logger.error('Failed to send crash notification', { error: formatScanError(delivery.error) });
  }
}
