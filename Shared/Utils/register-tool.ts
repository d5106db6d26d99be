/**
 * Tool registration wrapper for McpServer.
 *
 * - Handler returns StandardResponse, wrapper formats it as MCP text content
 * - Thrown errors become StandardResponse failures instead of protocol errors
 */

import type { z } from 'zod';
import type { StandardResponse } from '../Types/StandardResponse.js';
import { createErrorFromException } from '../Types/StandardResponse.js';

/**
 * Structural interface for McpServer, so tests can pass a plain mock.
 */
export interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

export interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/** Per-call data from the SDK that handlers may use. */
export interface ToolCallContext {
  /** Aborted when the client cancels the request. */
  signal?: AbortSignal;
}

export interface ToolContent {
  content: Array<{ type: 'text'; text: string }>;
}

/**
 * Register a tool with project conventions.
 *
 * The SDK validates arguments against `inputSchema.shape` before the callback
 * runs; the wrapper parses them once more so the handler gets the schema's
 * output type (defaults applied) without a cast.
 */
export function registerTool<T extends z.AnyZodObject>(
  server: McpServerLike,
  config: {
    name: string;
    description: string;
    inputSchema: T;
    annotations?: ToolAnnotations;
    handler: (input: z.infer<T>, context: ToolCallContext) => Promise<StandardResponse>;
  }
): void {
  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: Record<string, unknown>, extra?: ToolCallContext): Promise<ToolContent> => {
      try {
        const input: z.infer<T> = config.inputSchema.parse(args);
        const result = await config.handler(input, { signal: extra?.signal });
        return { content: [{ type: 'text', text: JSON.stringify(result) }] };
      } catch (error) {
        const errorResponse = createErrorFromException(error);
        return { content: [{ type: 'text', text: JSON.stringify(errorResponse) }] };
      }
    }
  );
}
