/**
 * Message context as tools receive it, and its conversion to an
 * ExecutionContext. Commands come from the input when given, otherwise
 * from the catalog source for the user's scope.
 */

import { z } from 'zod';
import { buildExecutionContext } from '../context/builder.js';
import type { CommandCatalogSource, ContextUser, ExecutionContext } from '../context/types.js';

const userSchema = z.object({
  id: z.string().min(1).describe('Platform user id'),
  handle: z.string().describe('Username'),
  display_name: z.string().describe('Name shown in the server'),
  global_name: z.string().nullable().default(null).describe('Profile display name'),
  avatar_url: z.string().default('').describe('Avatar URL'),
});

export const contextInputSchema = z.object({
  user: userSchema,
  server_id: z.string().nullable().default(null)
    .describe('Server id; null for a direct conversation'),
  reply_to: z
    .object({ text: z.string(), user: userSchema })
    .nullable()
    .default(null)
    .describe('Message being replied to'),
  commands: z
    .array(
      z.object({
        name: z.string(),
        content: z.string(),
        run: z.string().nullable().default(null),
      }),
    )
    .optional()
    .describe('Catalog to expose; omitted = entries available to the user in this scope'),
});

export type ContextInput = z.infer<typeof contextInputSchema>;

function toUser(user: z.infer<typeof userSchema>): ContextUser {
  return {
    id: user.id,
    handle: user.handle,
    displayName: user.display_name,
    globalName: user.global_name,
    avatarUrl: user.avatar_url,
  };
}

export async function resolveContext(
  input: ContextInput,
  messageText: string,
  catalog: CommandCatalogSource,
): Promise<ExecutionContext> {
  const commands =
    input.commands ??
    (await catalog.listAvailable({ userId: input.user.id, serverId: input.server_id }));

  return buildExecutionContext({
    message: { text: messageText },
    user: toUser(input.user),
    server: input.server_id === null ? null : { id: input.server_id },
    replyTo: input.reply_to === null ? null : { text: input.reply_to.text, user: toUser(input.reply_to.user) },
    commands,
  });
}
