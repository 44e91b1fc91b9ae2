// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Finding type definitions
 *
 * The engine emits one JSON object per line. Only a handful of fields matter
 * to the orchestrator; everything else is carried through untouched.
 */

export type FindingRecord = Record<string, unknown>;

export interface GithubLocation {
  file?: unknown;
  link?: unknown;
  [key: string]: unknown;
}

export interface ProcessedFindings {
  all: FindingRecord[];
  verified: FindingRecord[];
  invalidLines: number;
}
