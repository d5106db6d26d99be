/**
 * Locating the runtime and building its command line.
 *
 * The runtime process runs under Node's permission model: it may read its
 * own install directory, its entry and the per-call temp directory, may
 * write only the temp directory, and gets no child processes, workers or
 * native addons. Snippets themselves run in the script engine inside it.
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, isAbsolute, join, resolve } from 'node:path';

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable given as a path or as a bare name on PATH.
 *
 * @returns the absolute path, or null when nothing executable is found
 */
export function resolveExecutable(executable: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (isAbsolute(executable) || executable.includes('/')) {
    const path = resolve(executable);
    return isExecutableFile(path) ? path : null;
  }

  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, executable);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export interface LaunchSpec {
  entry: string;
  installDir: string;
  tempDir: string;
  maxMemoryMb: number;
  scriptMemoryMb: number;
  timeoutMs: number;
  importHosts: readonly string[];
  fieldsFile: string;
  commandsFile: string;
  code: string;
}

/**
 * Arguments for the runtime executable. The code goes last, after `--`,
 * exactly as given.
 */
export function buildLaunchArgs(spec: LaunchSpec): string[] {
  return [
    '--experimental-permission',
    '--no-warnings',
    `--allow-fs-read=${spec.installDir}`,
    `--allow-fs-read=${spec.entry}`,
    `--allow-fs-read=${spec.tempDir}`,
    `--allow-fs-write=${spec.tempDir}`,
    `--max-old-space-size=${spec.maxMemoryMb}`,
    spec.entry,
    `--fieldsFile=${spec.fieldsFile}`,
    `--commandsFile=${spec.commandsFile}`,
    `--timeoutMs=${spec.timeoutMs}`,
    `--memoryLimitMb=${spec.scriptMemoryMb}`,
    `--importHosts=${spec.importHosts.join(',')}`,
    '--',
    spec.code,
  ];
}
