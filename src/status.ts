#!/usr/bin/env node
// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Status listing for leakwatch.
 *
 * Reads the results directories and the completed ledger and prints one row
 * per scanned target with its finding counts.
 *
 * Usage:
 *   leakwatch-status [--config <path>]
 */

import dotenv from 'dotenv';
import { parseConfig } from './config-parser.js';
import { collectTargetStatuses, renderStatusTable } from './audit/target-status.js';
import { formatScanError } from './services/error-handling.js';

dotenv.config();

async function listTargets(): Promise<void> {
  const argv = process.argv.slice(2);
  const configIndex = argv.indexOf('--config');
  const configPath = configIndex >= 0 ? argv[configIndex + 1] : process.env.LEAKWATCH_CONFIG;

  const config = await parseConfig(configPath);
  const rows = await collectTargetStatuses(config.paths);

  console.log('\n=== leakwatch targets ===\n');
  for (const line of renderStatusTable(rows)) {
    console.log(line);
  }
  console.log();
}

listTargets().catch((err) => {
  console.error('Error listing targets:', formatScanError(err));
  process.exit(1);
});
