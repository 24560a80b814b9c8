/**
 * @module utils/fs
 * File system helpers shared by the collaborators and the CLI.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

/** Ensure a directory exists (recursive). */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/** ISO timestamp safe for filenames (colons/dots replaced with dashes). */
export function nowStamp(): string {
  return new Date().toISOString().replace(/[:.]/g, '-');
}

/** Create a temp directory with a given prefix. Returns absolute path. */
export function makeTempDir(prefix = 'podcast-flow-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write a JSON file with pretty formatting. Creates parent dirs. */
export function writeJson(filepath: string, data: unknown): void {
  ensureDir(path.dirname(filepath));
  fs.writeFileSync(filepath, JSON.stringify(data, null, 2));
}
