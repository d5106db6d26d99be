/**
 * execute_script tool — run a snippet in the sandbox.
 */

import { z } from 'zod';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import type { CommandCatalogSource } from '../context/types.js';
import type { ExecutionResult, ScriptRunner } from '../executor/types.js';
import { contextInputSchema, resolveContext } from './context-input.js';

const logger = rootLogger.child('tools');

export const executeScriptSchema = z.object({
  code: z.string().min(1).describe('JavaScript to run; a trailing expression is returned as the value'),
  context: contextInputSchema.describe('Who runs the snippet and where'),
  timeout_ms: z.number().int().positive().nullish()
    .describe('Execution timeout in milliseconds (default from SNIPPETS_TIMEOUT_MS)'),
});

export type ExecuteScriptInput = z.infer<typeof executeScriptSchema>;

export interface ScriptToolDeps {
  engine: ScriptRunner;
  catalog: CommandCatalogSource;
}

export async function handleExecuteScript(
  input: ExecuteScriptInput,
  deps: ScriptToolDeps,
  signal?: AbortSignal,
): Promise<ExecutionResult> {
  const ctx = await resolveContext(input.context, input.code, deps.catalog);
  logger.debug('execute_script', { commands: ctx.commands.length, timeoutMs: input.timeout_ms });
  return deps.engine.execute(input.code, ctx, ctx.commands, {
    timeoutMs: input.timeout_ms ?? undefined,
    signal,
  });
}
