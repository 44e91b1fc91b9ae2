// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Notifier
 *
 * Best-effort delivery of alerts and lifecycle messages. Every operation
 * resolves to a Result; nothing here throws, and callers decide whether a
 * failed delivery is worth more than a log line.
 */

import { ScanError, errorMessage } from './error-handling.js';
import { githubLocation, isRecord, permalinkOf } from './finding-processor.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err, isErr } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { TelegramConfig } from '../types/config.js';
import type { FindingRecord } from '../types/finding.js';

export const DEFAULT_MESSAGE_LIMIT = 3000;
export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

export interface Notifier {
  post(text: string): Promise<Result<void, ScanError>>;
  alert(target: string, verified: FindingRecord[]): Promise<Result<void, ScanError>>;
}

export function alertHeader(target: string): string {
  return `🚨 *Verified secrets found in ${target}*:\n`;
}

export function continuedHeader(target: string): string {
  return `*Continued findings for ${target}:*\n`;
}

/** One message block, or null when the finding has nothing to link to. */
export function formatFindingBlock(finding: unknown): string | null {
  if (!isRecord(finding)) {
    return null;
  }
  const link = permalinkOf(finding);
  if (!link) {
    return null;
  }

  const detectorName = finding['DetectorName'];
  const file = githubLocation(finding)?.file;
  const detector = typeof detectorName === 'string' && detectorName ? detectorName : 'Unknown Secret';
  const filePath = typeof file === 'string' && file ? file : 'Unknown file';

  return `\n🔍 *${detector}*\n📄 \`${filePath}\`\n🔗 [View Commit](${link})\n`;
}

/**
 * Split alert text into messages under a soft length limit. The block that
 * would push a message over the limit opens the next one instead, so a
 * message exceeds the limit only when a single block does.
 */
export function buildAlertMessages(
  target: string,
  findings: readonly unknown[],
  limit: number = DEFAULT_MESSAGE_LIMIT
): string[] {
  const messages: string[] = [];
  let message = alertHeader(target);
  let blocks = 0;

  for (const finding of findings) {
    const block = formatFindingBlock(finding);
    if (block === null) {
      continue;
    }

    if (blocks > 0 && message.length + block.length > limit) {
      messages.push(message);
      message = continuedHeader(target);
      blocks = 0;
    }
    message += block;
    blocks++;
  }

  if (blocks > 0) {
    messages.push(message);
  }
  return messages;
}

async function deliverAll(
  notifier: Notifier,
  messages: string[]
): Promise<Result<void, ScanError>> {
  let firstFailure: Result<void, ScanError> | null = null;
  for (const message of messages) {
    const delivery = await notifier.post(message);
    if (isErr(delivery) && firstFailure === null) {
      firstFailure = delivery;
    }
  }
  return firstFailure ?? ok(undefined);
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly config: TelegramConfig,
    private readonly logger: ActivityLogger
  ) {}

  async post(text: string): Promise<Result<void, ScanError>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await fetch(`https://api.telegram.org/bot${this.config.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.config.chatId,
          text,
          parse_mode: 'Markdown',
          disable_web_page_preview: true,
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        return this.fail(`Telegram responded with HTTP ${response.status}`, { status: response.status });
      }
      this.logger.info('Telegram message sent successfully');
      return ok(undefined);
    } catch (error) {
      return this.fail(`Failed to send Telegram message: ${errorMessage(error)}`, {});
    } finally {
      clearTimeout(timer);
    }
  }

  async alert(target: string, verified: FindingRecord[]): Promise<Result<void, ScanError>> {
    if (verified.length === 0) {
      this.logger.info('No secrets to alert', { target });
      return ok(undefined);
    }

    const messages = buildAlertMessages(target, verified, this.config.messageLimit);
    if (messages.length === 0) {
      this.logger.info('No alertable secrets found (missing required fields)', { target });
      return ok(undefined);
    }
    return deliverAll(this, messages);
  }

  private fail(message: string, context: Record<string, unknown>): Result<void, ScanError> {
    this.logger.error(message, context);
    return err(new ScanError(message, 'network', false, context, ErrorCode.NOTIFICATION_FAILED));
  }
}

/** Used when no chat channel is configured: logs instead of sending. */
export class DisabledNotifier implements Notifier {
  constructor(
    private readonly logger: ActivityLogger,
    private readonly messageLimit: number = DEFAULT_MESSAGE_LIMIT
  ) {}

  async post(text: string): Promise<Result<void, ScanError>> {
    this.logger.info('Notifications disabled, message not sent', { text });
    return ok(undefined);
  }

  async alert(target: string, verified: FindingRecord[]): Promise<Result<void, ScanError>> {
    if (verified.length === 0) {
      return ok(undefined);
    }
    return deliverAll(this, buildAlertMessages(target, verified, this.messageLimit));
  }
}

export function createNotifier(config: TelegramConfig | null, logger: ActivityLogger): Notifier {
  if (config) {
    return new TelegramNotifier(config, logger);
  }
  logger.warn('TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set, notifications will only be logged');
  return new DisabledNotifier(logger);
}
