import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync } from 'node:fs';

/** Directory names skipped when walking a repository, unless overridden. */
export const DEFAULT_EXCLUDES: readonly string[] = [
  'third-party',
  'vendor',
  'build',
  'scripts',
];

/** Location of the SQLite index (`DECLSCAN_DB_PATH` or `~/.declscan/declscan.db`). */
export function resolveDbPath(): string {
  return process.env.DECLSCAN_DB_PATH || join(homedir(), '.declscan', 'declscan.db');
}

/**
 * Pick the term dictionary for a repository: an explicit path wins, then
 * `DECLSCAN_DICTIONARY`, then `<repo>/.declscan/dictionary.json` if it exists.
 * Returns null when no dictionary applies.
 */
export function resolveDictionaryPath(repoRoot: string, explicit?: string): string | null {
  if (explicit) return explicit;
  if (process.env.DECLSCAN_DICTIONARY) return process.env.DECLSCAN_DICTIONARY;
  const local = join(repoRoot, '.declscan', 'dictionary.json');
  return existsSync(local) ? local : null;
}

/** Parse a comma-separated `--exclude` value. */
export function parseExcludes(value: string): string[] {
  return value
    .split(',')
    .map((e) => e.trim())
    .filter((e) => e.length > 0);
}
