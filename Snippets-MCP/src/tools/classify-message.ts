/**
 * classify_message tool — what a chat message asks for, without running it.
 */

import { z } from 'zod';
import { classify } from '../parser/classifier.js';
import type { ParsedMessage, PrefixConfig } from '../parser/types.js';

export const classifyMessageSchema = z.object({
  text: z.string().describe('Raw message text, prefix included'),
});

export type ClassifyMessageInput = z.infer<typeof classifyMessageSchema>;

export async function handleClassifyMessage(
  input: ClassifyMessageInput,
  prefixes: PrefixConfig,
): Promise<ParsedMessage> {
  return classify(input.text, prefixes);
}
