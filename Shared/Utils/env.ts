import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` without overriding variables already set in the process
 * environment. Looks in the working directory first, then in the package root
 * of the calling entry point.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to its package root (default: 1 for src/index.ts)
 * @returns the path that was loaded, or null when no file was found
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const candidates = [resolve(process.cwd(), '.env'), resolve(dir, '.env')];
  for (const envPath of candidates) {
    if (existsSync(envPath)) {
      dotenvConfig({ path: envPath, override: false, quiet: true });
      return envPath;
    }
  }
  return null;
}
