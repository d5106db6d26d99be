/**
 * Command line of the runtime:
 *
 *   main.js --fieldsFile=<path> --commandsFile=<path>
 *           [--timeoutMs=<n>] [--memoryLimitMb=<n>] [--importHosts=<host,...>] -- <code>
 */

import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ValidationError } from '../../../Shared/Types/errors.js';
import { wireCatalogSchema, wirePayloadSchema } from '../context/types.js';
import type { SnippetInput } from './host.js';

export const USAGE =
  'Usage: main.js --fieldsFile=<path> --commandsFile=<path> ' +
  '[--timeoutMs=<n>] [--memoryLimitMb=<n>] [--importHosts=<host,...>] -- <code>';

export const DEFAULT_TIMEOUT_MS = 5_000;
export const DEFAULT_MEMORY_LIMIT_MB = 32;

const limitsSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  memoryLimitMb: z.coerce.number().int().positive().default(DEFAULT_MEMORY_LIMIT_MB),
  importHosts: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((host) => host.trim()).filter((host) => host.length > 0)),
});

async function readJson(path: string, label: string): Promise<unknown> {
  const text = await readFile(path, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${label} file: ${path}`, { path, error });
  }
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      fieldsFile: { type: 'string' },
      commandsFile: { type: 'string' },
      timeoutMs: { type: 'string' },
      memoryLimitMb: { type: 'string' },
      importHosts: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * @throws ValidationError on a bad command line or payload
 */
export async function loadRuntimeInput(argv: string[]): Promise<SnippetInput> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    throw new ValidationError(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
  }

  const { fieldsFile, commandsFile, timeoutMs, memoryLimitMb, importHosts } = parsed.values;
  if (fieldsFile === undefined || commandsFile === undefined || parsed.positionals.length !== 1) {
    throw new ValidationError(USAGE);
  }

  const limits = limitsSchema.safeParse({ timeoutMs, memoryLimitMb, importHosts });
  if (!limits.success) {
    throw new ValidationError(`Invalid runtime limits: ${limits.error.message}\n${USAGE}`, {
      issues: limits.error.issues,
    });
  }

  const fields = wirePayloadSchema.safeParse(await readJson(fieldsFile, 'fields'));
  if (!fields.success) {
    throw new ValidationError(`Invalid fields payload: ${fields.error.message}`, {
      issues: fields.error.issues,
    });
  }

  const commands = wireCatalogSchema.safeParse(await readJson(commandsFile, 'commands'));
  if (!commands.success) {
    throw new ValidationError(`Invalid commands payload: ${commands.error.message}`, {
      issues: commands.error.issues,
    });
  }

  return {
    code: parsed.positionals[0],
    fields: fields.data,
    commands: commands.data,
    ...limits.data,
  };
}
