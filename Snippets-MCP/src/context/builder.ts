import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import { isValidPath } from '../parser/path.js';
import type {
  CommandCatalogEntry,
  ContextUser,
  ExecutionContext,
  ExecutionContextInput,
  WireCatalogEntry,
  WirePayload,
  WireUser,
} from './types.js';

const logger = rootLogger.child('context');

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Entries whose names do not fit the command grammar are dropped; order is
 * kept otherwise. The returned context and everything inside it is frozen.
 */
export function buildExecutionContext(input: ExecutionContextInput): ExecutionContext {
  const commands: CommandCatalogEntry[] = [];
  for (const entry of input.commands ?? []) {
    if (!isValidPath(entry.name)) {
      logger.warn('Dropping catalog entry with invalid name', { name: entry.name });
      continue;
    }
    commands.push({ name: entry.name, content: entry.content, run: entry.run });
  }

  return deepFreeze({
    message: { text: input.message.text },
    user: { ...input.user },
    server: input.server ? { id: input.server.id } : null,
    replyTo: input.replyTo ? { text: input.replyTo.text, user: { ...input.replyTo.user } } : null,
    commands,
  });
}

function toWireUser(user: ContextUser): WireUser {
  return {
    id: user.id,
    handle: user.handle,
    name: user.displayName,
    global_name: user.globalName,
    avatar_url: user.avatarUrl,
  };
}

export function toWirePayload(ctx: ExecutionContext): WirePayload {
  const fields = {
    message: { text: ctx.message.text },
    user: toWireUser(ctx.user),
    server: ctx.server ? { id: ctx.server.id } : null,
    reply_to: ctx.replyTo ? { text: ctx.replyTo.text, user: toWireUser(ctx.replyTo.user) } : null,
  };
  return { ...fields, ctx: fields };
}

export function toWireCatalog(entries: readonly CommandCatalogEntry[]): WireCatalogEntry[] {
  return entries.map((entry) => ({ name: entry.name, content: entry.content, run: entry.run }));
}
