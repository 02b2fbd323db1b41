import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from the package root if it exists. dotenv stays quiet:
 * anything it printed to stdout would corrupt the MCP stdio transport.
 *
 * @param importMetaUrl - `import.meta.url` of the entry point
 * @param levelsUp - directories between the entry point and the package root
 * @returns the path that was loaded, or null when there was no file
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) {
    return null;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
