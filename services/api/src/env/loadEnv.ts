import fs from 'node:fs';
import path from 'node:path';

function stripQuotes(value: string): string {
  const v = value.trim();
  if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
    return v.slice(1, -1);
  }
  return v;
}

/**
 * Parses `KEY=VALUE` lines; blank lines, `#` comments and an `export ` prefix are allowed.
 */
export function parseDotEnv(raw: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const withoutExport = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const eq = withoutExport.indexOf('=');
    if (eq <= 0) continue;

    const key = withoutExport.slice(0, eq).trim();
    if (!key) continue;
    values[key] = stripQuotes(withoutExport.slice(eq + 1));
  }
  return values;
}

/**
 * Lightweight `.env` loader.
 *
 * - Loads from `${process.cwd()}/.env` if present
 * - Does not override existing `process.env` values
 */
export function loadEnvFromDotEnvIfPresent(envPath = path.resolve(process.cwd(), '.env')): void {
  if (!fs.existsSync(envPath)) return;

  const values = parseDotEnv(fs.readFileSync(envPath, 'utf8'));
  for (const [key, value] of Object.entries(values)) {
    if (process.env[key] != null) continue;
    process.env[key] = value;
  }
}
