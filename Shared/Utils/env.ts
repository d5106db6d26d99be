import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Walk up from a module URL to the nearest directory holding a package.json.
 * Falls back to the module's own directory when none is found.
 */
export function findPackageRoot(importMetaUrl: string): string {
  const start = dirname(fileURLToPath(importMetaUrl));
  let dir = start;
  for (;;) {
    if (existsSync(resolve(dir, 'package.json'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
}

/**
 * Load .env from the package root when it exists.
 * `quiet` keeps dotenv v17 from printing to stdout, which would corrupt
 * the MCP stdio transport.
 *
 * @returns the path that was loaded, or null
 */
export function loadEnvSafely(importMetaUrl: string): string | null {
  const envPath = resolve(findPackageRoot(importMetaUrl), '.env');
  if (!existsSync(envPath)) return null;
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
