/**
 * @module utils/env
 * `.env` loader for the CLI. Real environment variables always win.
 */

import fs from 'node:fs';
import path from 'node:path';

/** Parse `KEY=value` lines. Supports `#` comments, `export KEY=…` and quoted values. */
export function parseDotenv(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;

    const key = trimmed.slice(0, eqIdx).replace(/^export\s+/, '').trim();
    const val = trimmed
      .slice(eqIdx + 1)
      .trim()
      .replace(/^(["'])(.*)\1$/, '$2');
    if (key) out[key] = val;
  }
  return out;
}

/**
 * Load `<dir>/.env` into `env`, skipping keys that are already set.
 * Returns the keys that were added. A missing file is not an error.
 */
export function loadDotenv(dir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = path.resolve(dir, '.env');
  if (!fs.existsSync(envPath)) return [];

  const added: string[] = [];
  for (const [key, val] of Object.entries(parseDotenv(fs.readFileSync(envPath, 'utf8')))) {
    if (key in env) continue;
    env[key] = val;
    added.push(key);
  }
  return added;
}
