#!/usr/bin/env node
// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * leakwatch entry point.
 *
 * Scans every target in the targets file for leaked credentials, rotating
 * through the access-token pool, then rests, forever.
 *
 * Usage:
 *   leakwatch [--config <path>] [--once]
 *
 * Options:
 *   --config <path>   YAML configuration file (also LEAKWATCH_CONFIG)
 *   --once            Scan the target list once without pacing or rest, then exit
 *
 * Environment:
 *   LEAKWATCH_* overrides, TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID, LOG_LEVEL
 */

import dotenv from 'dotenv';
import { createActivityLogger } from './audit/index.js';
import { parseConfig } from './config-parser.js';
import { createScannerContainer } from './services/container.js';
import { reportCrash } from './services/crash-report.js';
import type { Notifier } from './services/notifier.js';
import { runPreflightChecks } from './services/preflight.js';
import { isErr } from './types/result.js';

dotenv.config();

interface CliArgs {
  configPath?: string;
  once: boolean;
}

function showUsage(): void {
  console.log('\nleakwatch');
  console.log('Continuously scan organizations for leaked credentials\n');
  console.log('Usage:');
  console.log('  leakwatch [--config <path>] [--once]\n');
  console.log('Options:');
  console.log('  --config <path>   YAML configuration file');
  console.log('  --once            Scan the target list once, then exit\n');
}

function parseCliArgs(argv: string[]): CliArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    showUsage();
    process.exit(0);
  }

  let configPath = process.env.LEAKWATCH_CONFIG || undefined;
  let once = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config') {
      const nextArg = argv[i + 1];
      if (nextArg && !nextArg.startsWith('-')) {
        configPath = nextArg;
        i++;
      }
    } else if (arg === '--once') {
      once = true;
    }
  }

  return { once, ...(configPath && { configPath }) };
}

async function startScanner(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  let logger = createActivityLogger();
  let notifier: Notifier | null = null;

  try {
    // 1. Config and logging
    const config = await parseConfig(args.configPath);
    logger = createActivityLogger({ level: config.logLevel, logFile: config.paths.logFile });

    // 2. Fail fast on missing inputs
    const preflight = await runPreflightChecks(config.paths, logger);
    if (isErr(preflight)) {
      throw preflight.error;
    }

    // 3. Wire components and run
    const container = await createScannerContainer(config, logger);
    notifier = container.notifier;

    if (args.once) {
      await container.scheduler.runOnce();
      return;
    }
    await container.scheduler.runForever();
  } catch (error) {
    await reportCrash(error, notifier, logger);
    process.exit(1);
  }
}

startScanner().catch((err) => {
  console.error('Scanner error:', err);
  process.exit(1);
});
