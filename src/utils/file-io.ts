// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { fs, path } from 'zx';

export async function fileExists(filePath: string): Promise<boolean> {
  return fs.pathExists(filePath);
}

/** Callers narrow the parsed value themselves. */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf8');
  return JSON.parse(content);
}

/**
 * Write via a sibling temp file and rename, so readers never observe a
 * half-written file.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, content, 'utf8');
  await fs.rename(tempPath, filePath);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(data, null, 2));
}

/** Newline-delimited list: trimmed, blank lines dropped. */
export function parseLineList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function readLineList(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf8');
  return parseLineList(content);
}
