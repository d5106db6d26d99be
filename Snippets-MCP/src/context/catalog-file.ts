import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../../../Shared/Types/errors.js';
import { InMemoryCatalogSource } from './catalog.js';

const storedEntrySchema = z.object({
  name: z.string(),
  content: z.string(),
  run: z.string().nullable().default(null),
  user_id: z.string(),
  server_id: z.string().nullable().default(null),
});

const catalogFileSchema = z.array(storedEntrySchema);

/**
 * Load a JSON array of `{ name, content, run?, user_id, server_id? }`.
 *
 * @throws ConfigurationError when the file is unreadable or malformed
 */
export async function loadCatalogFile(path: string): Promise<InMemoryCatalogSource> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read catalog file: ${path}`, { path, error });
  }

  const result = catalogFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid catalog file ${path}: ${result.error.message}`, {
      path,
      issues: result.error.issues,
    });
  }

  return new InMemoryCatalogSource(
    result.data.map((entry) => ({
      name: entry.name,
      content: entry.content,
      run: entry.run,
      userId: entry.user_id,
      serverId: entry.server_id,
    })),
  );
}
