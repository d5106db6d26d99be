/**
 * Snippets MCP Server
 *
 * Registers message classification and script execution tools on an
 * McpServer instance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTool } from '../../Shared/Utils/register-tool.js';
import { createError, createSuccess } from '../../Shared/Types/StandardResponse.js';
import { InMemoryCatalogSource } from './context/catalog.js';
import type { CommandCatalogSource } from './context/types.js';
import type { ScriptRunner } from './executor/types.js';
import type { PrefixConfig } from './parser/types.js';
import { classifyMessageSchema, handleClassifyMessage } from './tools/classify-message.js';
import { executeScriptSchema, handleExecuteScript } from './tools/execute-script.js';
import { CommandNotFoundError, handleMessage, handleMessageSchema } from './tools/handle-message.js';

export interface ServerDeps {
  engine: ScriptRunner;
  prefixes: PrefixConfig;
  catalog?: CommandCatalogSource;
}

export function createServer(deps: ServerDeps): McpServer {
  const server = new McpServer({
    name: 'snippets',
    version: '1.0.0',
  });

  const catalog = deps.catalog ?? new InMemoryCatalogSource();
  const prefixList = [deps.prefixes.script, ...deps.prefixes.commandOnly].map((p) => `"${p}"`).join(', ');

  registerTool(server, {
    name: 'classify_message',
    description:
      'Decide what a chat message asks for without running anything.\n\n' +
      `Recognized prefixes: ${prefixList} (only "${deps.prefixes.script}" may carry scripts).\n\n` +
      'Args:\n' +
      '  - text (string): Raw message text, prefix included\n\n' +
      'Returns one of: { kind: "command", name, args } | { kind: "script", code } | ' +
      '{ kind: "list-children", parent } | { kind: "unhandled" }',
    inputSchema: classifyMessageSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleClassifyMessage(params, deps.prefixes);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'execute_script',
    description:
      'Run a JavaScript snippet in a fresh sandboxed process against a message context.\n\n' +
      'Args:\n' +
      '  - code (string): Snippet; a trailing expression becomes the returned value\n' +
      '  - context (object): { user, server_id, reply_to, commands? }\n' +
      '  - timeout_ms (number, optional): Timeout in ms\n\n' +
      'Returns: { executionId, success, output, value?, errorKind?, durationMs }',
    inputSchema: executeScriptSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: false,
    },
    handler: async (params, { signal }) => {
      const result = await handleExecuteScript(params, { engine: deps.engine, catalog }, signal);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'handle_message',
    description:
      'Classify a chat message and act on it: run a script, run or show a command, or list the entries under a name.\n\n' +
      'Args:\n' +
      '  - text (string): Raw message text, prefix included\n' +
      '  - context (object): { user, server_id, reply_to, commands? }\n\n' +
      'Returns: { handled: false } | { handled: true, kind, ... }',
    inputSchema: handleMessageSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: false,
    },
    handler: async (params, { signal }) => {
      try {
        const result = await handleMessage(params, { engine: deps.engine, catalog, prefixes: deps.prefixes }, signal);
        return createSuccess(result);
      } catch (error) {
        if (error instanceof CommandNotFoundError) {
          return createError(error.message, error.code, { name: error.commandName });
        }
        throw error;
      }
    },
  });

  return server;
}
