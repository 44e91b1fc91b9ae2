// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Persistence & logging
 *
 * Public API for scan artifacts, the completed ledger, and the activity logger.
 *
 * @module audit
 */

export { ResultStore, CompletedLedger } from './result-store.js';
export { createActivityLogger, createNoopLogger } from './activity-logger.js';
