/**
 * Unit tests for Snippets MCP server registration and tool calls.
 * Uses InMemoryTransport and a fake ScriptRunner; nothing is spawned.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createServer } from '../../src/server.js';
import { InMemoryCatalogSource } from '../../src/context/catalog.js';
import { ExecutionCancelledError } from '../../src/executor/errors.js';
import type { ScriptRunner } from '../../src/executor/types.js';

const execute = vi.fn<ScriptRunner['execute']>();

const catalog = new InMemoryCatalogSource([
  { name: 'greet', content: 'hello', run: null, userId: '1', serverId: null },
  { name: 'tools/a', content: '', run: 'return 1', userId: '1', serverId: null },
  { name: 'tools/b/c', content: '', run: null, userId: '1', serverId: null },
  { name: 'toolsmith', content: '', run: null, userId: '1', serverId: null },
  { name: 'shared', content: 'in s1', run: null, userId: '2', serverId: 's1' },
]);

const user = { id: '1', handle: 'alice', display_name: 'Alice' };

const contentSchema = z.array(z.object({ type: z.literal('text'), text: z.string() }));
const responseSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  errorCode: z.string().optional(),
  errorDetails: z.record(z.unknown()).optional(),
});

let client: Client;
let tools: Tool[];

async function call(name: string, args: Record<string, unknown>) {
  const result = await client.callTool({ name, arguments: args });
  const [first] = contentSchema.parse(result.content);
  return responseSchema.parse(JSON.parse(first.text));
}

beforeAll(async () => {
  const server = createServer({
    engine: { execute },
    prefixes: { script: '$', commandOnly: ['.'] },
    catalog,
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
  tools = (await client.listTools()).tools;
});

afterAll(async () => {
  await client.close();
});

beforeEach(() => {
  execute.mockReset();
  execute.mockImplementation(async (code) => ({
    success: true,
    executionId: 'run_000000000deadbeef',
    output: '',
    value: code,
    durationMs: 1,
  }));
});

describe('Snippets MCP Server Registration', () => {
  it('should register the three tools', () => {
    expect(tools.map((t) => t.name).sort()).toEqual(['classify_message', 'execute_script', 'handle_message']);
  });

  it('should mark only classify_message read-only', () => {
    for (const tool of tools) {
      expect(tool.annotations?.readOnlyHint, tool.name).toBe(tool.name === 'classify_message');
      expect(tool.annotations?.destructiveHint, tool.name).toBe(false);
    }
  });

  it('should list the configured prefixes', () => {
    const classifyTool = tools.find((t) => t.name === 'classify_message');
    expect(classifyTool?.description).toContain('Recognized prefixes: "$", "."');
  });
});

describe('classify_message', () => {
  it('should return the classification', async () => {
    expect(await call('classify_message', { text: '$foo.bar a' })).toEqual({
      success: true,
      data: { kind: 'command', name: 'foo/bar', args: ['a'] },
    });
    expect(await call('classify_message', { text: 'hello' })).toEqual({
      success: true,
      data: { kind: 'unhandled' },
    });
  });
});

describe('execute_script', () => {
  it('should run the code against the resolved context', async () => {
    const response = await call('execute_script', { code: 'return 1', context: { user }, timeout_ms: 250 });

    expect(response).toEqual({
      success: true,
      data: { success: true, executionId: 'run_000000000deadbeef', output: '', value: 'return 1', durationMs: 1 },
    });
    expect(execute).toHaveBeenCalledTimes(1);
    const [code, ctx, commands, options] = execute.mock.calls[0];
    expect(code).toBe('return 1');
    expect(ctx.message.text).toBe('return 1');
    expect(ctx.user).toEqual({
      id: '1',
      handle: 'alice',
      displayName: 'Alice',
      globalName: null,
      avatarUrl: '',
    });
    expect(ctx.server).toBeNull();
    expect(commands.map((c) => c.name)).toEqual(['greet', 'tools/a', 'tools/b/c', 'toolsmith']);
    expect(options?.timeoutMs).toBe(250);
  });

  it('should prefer commands given in the context', async () => {
    await call('execute_script', {
      code: 'x',
      context: { user, server_id: 's1', commands: [{ name: 'inline', content: 'c' }] },
    });

    const [, ctx, commands] = execute.mock.calls[0];
    expect(ctx.server).toEqual({ id: 's1' });
    expect(commands).toEqual([{ name: 'inline', content: 'c', run: null }]);
  });

  it('should report cancellation as an error response', async () => {
    execute.mockRejectedValueOnce(new ExecutionCancelledError('run_000000000cafef00d'));

    const response = await call('execute_script', { code: 'x', context: { user } });
    expect(response).toMatchObject({
      success: false,
      error: 'Script execution was cancelled',
      errorCode: 'EXECUTION_CANCELLED',
    });
  });
});

describe('handle_message', () => {
  it('should ignore messages without a prefix', async () => {
    expect(await call('handle_message', { text: 'hello', context: { user } })).toEqual({
      success: true,
      data: { handled: false },
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should run scripts with the whole message as context text', async () => {
    const response = await call('handle_message', { text: '$ 1+1', context: { user } });

    expect(response.data).toMatchObject({ handled: true, kind: 'script', result: { value: '1+1' } });
    const [code, ctx] = execute.mock.calls[0];
    expect(code).toBe('1+1');
    expect(ctx.message.text).toBe('$ 1+1');
  });

  it('should run commands through $.cmd', async () => {
    const response = await call('handle_message', { text: '.greet "a b" c', context: { user } });

    expect(response.data).toMatchObject({ handled: true, kind: 'command', name: 'greet', args: ['a b', 'c'] });
    expect(execute.mock.calls[0][0]).toBe('$.cmd("greet", "a b", "c")');
  });

  it('should report commands that are not in the catalog', async () => {
    expect(await call('handle_message', { text: '.missing', context: { user } })).toEqual({
      success: false,
      error: 'Command not found: missing',
      errorCode: 'COMMAND_NOT_FOUND',
      errorDetails: { name: 'missing' },
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should list the entries under a parent', async () => {
    expect(await call('handle_message', { text: '$tools.', context: { user } })).toEqual({
      success: true,
      data: { handled: true, kind: 'list-children', parent: 'tools', children: ['tools/a', 'tools/b/c'] },
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should only see server entries in a server context', async () => {
    const response = await call('handle_message', { text: '.greet', context: { user, server_id: 's1' } });
    expect(response.errorCode).toBe('COMMAND_NOT_FOUND');

    await call('handle_message', { text: '.shared', context: { user, server_id: 's1' } });
    expect(execute.mock.calls[0][0]).toBe('$.cmd("shared")');
  });
});
