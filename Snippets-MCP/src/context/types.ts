/**
 * Execution context handed to a sandboxed script, and the wire format the
 * runtime reads it in.
 */

import { z } from 'zod';

export interface ContextUser {
  /** Platform id as a string; numeric ids overflow JS numbers. */
  id: string;
  handle: string;
  displayName: string;
  globalName: string | null;
  avatarUrl: string;
}

export interface ContextServer {
  id: string;
}

export interface ContextReply {
  text: string;
  user: ContextUser;
}

export interface CommandCatalogEntry {
  name: string;
  content: string;
  /** Script body run by `$.cmd(name)`; null for plain text entries. */
  run: string | null;
}

export interface ExecutionContext {
  message: { text: string };
  user: ContextUser;
  /** null in a direct (private) context */
  server: ContextServer | null;
  replyTo: ContextReply | null;
  commands: CommandCatalogEntry[];
}

export type ExecutionContextInput = Omit<ExecutionContext, 'commands'> & {
  commands?: readonly CommandCatalogEntry[];
};

// Wire format. Field names are snake_case because scripts read them directly.

export const wireUserSchema = z.object({
  id: z.string(),
  handle: z.string(),
  name: z.string(),
  global_name: z.string().nullable(),
  avatar_url: z.string(),
});

const wireFieldsSchema = z.object({
  message: z.object({ text: z.string() }),
  user: wireUserSchema,
  server: z.object({ id: z.string() }).nullable(),
  reply_to: z.object({ text: z.string(), user: wireUserSchema }).nullable(),
});

/** `ctx` repeats the top-level fields for scripts written against `ctx.user` etc. */
export const wirePayloadSchema = wireFieldsSchema.extend({
  ctx: wireFieldsSchema,
});

export const wireCatalogEntrySchema = z.object({
  name: z.string(),
  content: z.string(),
  run: z.string().nullable(),
});

export const wireCatalogSchema = z.array(wireCatalogEntrySchema);

export type WireUser = z.infer<typeof wireUserSchema>;
export type WirePayload = z.infer<typeof wirePayloadSchema>;
export type WireCatalogEntry = z.infer<typeof wireCatalogEntrySchema>;

/**
 * Storage collaborator: the entries visible to a user in a given scope.
 */
export interface CommandCatalogSource {
  listAvailable(scope: { userId: string; serverId: string | null }): Promise<CommandCatalogEntry[]>;
}
