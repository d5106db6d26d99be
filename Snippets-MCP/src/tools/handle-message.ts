/**
 * handle_message tool — classify a chat message and act on it.
 *
 * - script         → run the snippet
 * - command        → run the entry through `$.cmd`, which prints the
 *                    content of entries without a script body
 * - list-children  → names of entries under the parent
 * - unhandled      → nothing to do
 */

import { z } from 'zod';
import { BaseError } from '../../../Shared/Types/errors.js';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import type { ExecutionResult } from '../executor/types.js';
import { classify } from '../parser/classifier.js';
import { isDescendantOf } from '../parser/path.js';
import type { PrefixConfig } from '../parser/types.js';
import { contextInputSchema, resolveContext } from './context-input.js';
import type { ScriptToolDeps } from './execute-script.js';

const logger = rootLogger.child('tools');

export const handleMessageSchema = z.object({
  text: z.string().describe('Raw message text, prefix included'),
  context: contextInputSchema.describe('Who sent the message and where'),
});

export type HandleMessageInput = z.infer<typeof handleMessageSchema>;

export type HandleMessageResult =
  | { handled: false }
  | { handled: true; kind: 'script'; result: ExecutionResult }
  | { handled: true; kind: 'command'; name: string; args: string[]; result: ExecutionResult }
  | { handled: true; kind: 'list-children'; parent: string; children: string[] };

export class CommandNotFoundError extends BaseError {
  constructor(public readonly commandName: string) {
    super(`Command not found: ${commandName}`, 'COMMAND_NOT_FOUND', { name: commandName });
  }
}

/** Snippet that invokes a catalog entry with literal arguments. */
export function commandInvocationCode(name: string, args: readonly string[]): string {
  return `$.cmd(${[name, ...args].map((value) => JSON.stringify(value)).join(', ')})`;
}

export interface HandleMessageDeps extends ScriptToolDeps {
  prefixes: PrefixConfig;
}

/**
 * @throws CommandNotFoundError when a command names no visible entry
 */
export async function handleMessage(
  input: HandleMessageInput,
  deps: HandleMessageDeps,
  signal?: AbortSignal,
): Promise<HandleMessageResult> {
  const parsed = classify(input.text, deps.prefixes);
  logger.debug('Classified message', { kind: parsed.kind });

  switch (parsed.kind) {
    case 'unhandled':
      return { handled: false };

    case 'script': {
      const ctx = await resolveContext(input.context, input.text, deps.catalog);
      const result = await deps.engine.execute(parsed.code, ctx, ctx.commands, { signal });
      return { handled: true, kind: 'script', result };
    }

    case 'command': {
      const ctx = await resolveContext(input.context, input.text, deps.catalog);
      if (!ctx.commands.some((entry) => entry.name === parsed.name)) {
        throw new CommandNotFoundError(parsed.name);
      }
      const code = commandInvocationCode(parsed.name, parsed.args);
      const result = await deps.engine.execute(code, ctx, ctx.commands, { signal });
      return { handled: true, kind: 'command', name: parsed.name, args: parsed.args, result };
    }

    case 'list-children': {
      const ctx = await resolveContext(input.context, input.text, deps.catalog);
      const children = ctx.commands
        .map((entry) => entry.name)
        .filter((name) => isDescendantOf(name, parsed.parent));
      return { handled: true, kind: 'list-children', parent: parsed.parent, children };
    }
  }
}
