// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Credential Pool
 *
 * Round-robin rotation over access tokens, skipping any that are cooling
 * down after a rate-limit signal. One call inspects each credential at most
 * once and never blocks.
 */

import { ScanError } from './error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Clock, systemClock } from '../utils/timing.js';

export const DEFAULT_COOLDOWN_MS = 300_000;

export class CredentialPool {
  private readonly credentials: readonly string[];
  private readonly cooldownMs: number;
  private readonly now: Clock;
  private readonly cooldownUntil: Map<string, number> = new Map();
  private cursor = 0;

  constructor(credentials: readonly string[], cooldownMs: number = DEFAULT_COOLDOWN_MS, now: Clock = systemClock) {
    if (credentials.length === 0) {
      throw new ScanError(
        'No credentials found.',
        'config',
        false,
        {},
        ErrorCode.CREDENTIALS_MISSING
      );
    }
    this.credentials = [...credentials];
    this.cooldownMs = cooldownMs;
    this.now = now;
  }

  get size(): number {
    return this.credentials.length;
  }

  /**
   * Next usable credential after the last one inspected, or null when every
   * credential is still cooling down. The cursor advances past each
   * credential looked at, usable or not.
   */
  nextAvailable(): string | null {
    const now = this.now();
    for (let i = 0; i < this.credentials.length; i++) {
      const credential = this.credentials[this.cursor];
      this.cursor = (this.cursor + 1) % this.credentials.length;
      if (credential === undefined) {
        continue;
      }

      const until = this.cooldownUntil.get(credential);
      if (until !== undefined && until > now) {
        continue;
      }
      this.cooldownUntil.delete(credential);
      return credential;
    }
    return null;
  }

  markRateLimited(credential: string): void {
    this.cooldownUntil.set(credential, this.now() + this.cooldownMs);
  }

  coolingDownCount(): number {
    const now = this.now();
    let count = 0;
    for (const until of this.cooldownUntil.values()) {
      if (until > now) count++;
    }
    return count;
  }

  /** Earliest pending expiry, or null if nothing is cooling down. */
  nextExpiry(): number | null {
    const now = this.now();
    let earliest: number | null = null;
    for (const until of this.cooldownUntil.values()) {
      if (until > now && (earliest === null || until < earliest)) {
        earliest = until;
      }
    }
    return earliest;
  }
}
