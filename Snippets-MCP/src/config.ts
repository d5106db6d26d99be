/**
 * Snippets MCP Configuration
 *
 * Zod-validated environment config and the stripped environment handed to
 * the sandbox runtime.
 */

import { z } from 'zod';
import { homedir, tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../../Shared/Types/errors.js';
import { findPackageRoot } from '../../Shared/Utils/env.js';
import type { PrefixConfig } from './parser/types.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const booleanFlag = z
  .string()
  .transform((value) => value === '1' || value.toLowerCase() === 'true');

const configSchema = z.object({
  scriptPrefix: z.string().min(1).default('$'),
  commandPrefixes: z
    .string()
    .default('.')
    .transform((value) =>
      value
        .split(',')
        .map((prefix) => prefix.trim())
        .filter((prefix) => prefix.length > 0),
    ),
  timeoutMs: z.coerce.number().int().positive().default(5_000),
  killGraceMs: z.coerce.number().int().nonnegative().default(1_000),
  maxMemoryMb: z.coerce.number().int().positive().default(128),
  scriptMemoryMb: z.coerce.number().int().positive().default(32),
  importHosts: z
    .string()
    .default('esm.sh')
    .transform((value) =>
      value
        .split(',')
        .map((host) => host.trim())
        .filter((host) => host.length > 0),
    ),
  tempRoot: z.string().default(tmpdir()),
  runtimeExecutable: z.string().min(1).default(process.execPath),
  runtimeEntry: z.string().min(1).default(fileURLToPath(new URL('./runtime/main.js', import.meta.url))),
  installDir: z.string().min(1).default(findPackageRoot(import.meta.url)),
  logDir: z.string().default('~/.snippets/logs'),
  catalogFile: z.string().optional(),
  debug: booleanFlag.default('false'),
});

export type SnippetsConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

export function getPrefixes(config: SnippetsConfig): PrefixConfig {
  return { script: config.scriptPrefix, commandOnly: config.commandPrefixes };
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: SnippetsConfig | null = null;

export function getConfig(): SnippetsConfig {
  if (cached) return cached;

  const raw = {
    scriptPrefix: process.env.SNIPPETS_SCRIPT_PREFIX,
    commandPrefixes: process.env.SNIPPETS_COMMAND_PREFIXES,
    timeoutMs: process.env.SNIPPETS_TIMEOUT_MS,
    killGraceMs: process.env.SNIPPETS_KILL_GRACE_MS,
    maxMemoryMb: process.env.SNIPPETS_MAX_MEMORY_MB,
    scriptMemoryMb: process.env.SNIPPETS_SCRIPT_MEMORY_MB,
    importHosts: process.env.SNIPPETS_IMPORT_HOSTS,
    tempRoot: process.env.SNIPPETS_TEMP_ROOT,
    runtimeExecutable: process.env.SNIPPETS_RUNTIME_EXECUTABLE,
    runtimeEntry: process.env.SNIPPETS_RUNTIME_ENTRY,
    installDir: process.env.SNIPPETS_INSTALL_DIR,
    logDir: process.env.SNIPPETS_LOG_DIR,
    catalogFile: process.env.SNIPPETS_CATALOG_FILE,
    debug: process.env.DEBUG,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`Snippets config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  config.tempRoot = resolve(expandHome(config.tempRoot));
  config.installDir = resolve(expandHome(config.installDir));
  config.logDir = resolve(expandHome(config.logDir));
  if (config.catalogFile !== undefined) {
    config.catalogFile = resolve(expandHome(config.catalogFile));
  }

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

export const ENV_ALLOWLIST: readonly string[] = ['LOG_LEVEL', 'DEBUG', 'NO_COLOR'];

/**
 * Environment for the sandbox runtime: allowlisted vars only, plus NO_COLOR
 * so diagnostics come back without escape codes.
 */
export function getStrippedEnv(
  allowlist: readonly string[] = ENV_ALLOWLIST,
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  env.NO_COLOR = '1';
  return env;
}
