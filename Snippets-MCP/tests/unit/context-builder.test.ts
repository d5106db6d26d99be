import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildExecutionContext, toWireCatalog, toWirePayload } from '../../src/context/builder.js';
import { InMemoryCatalogSource } from '../../src/context/catalog.js';
import { wireCatalogSchema, wirePayloadSchema } from '../../src/context/types.js';
import type { ContextUser, ExecutionContextInput } from '../../src/context/types.js';

const alice: ContextUser = {
  id: '100000000000000001',
  handle: 'alice',
  displayName: 'Alice',
  globalName: 'Alice A.',
  avatarUrl: 'https://example.test/alice.png',
};

const bob: ContextUser = {
  id: '2',
  handle: 'bob',
  displayName: 'Bob',
  globalName: null,
  avatarUrl: 'https://example.test/bob.png',
};

function makeInput(overrides: Partial<ExecutionContextInput> = {}): ExecutionContextInput {
  return {
    message: { text: '$ 1 + 1' },
    user: alice,
    server: { id: 's1' },
    replyTo: null,
    commands: [],
    ...overrides,
  };
}

describe('buildExecutionContext', () => {
  let spy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    spy.mockRestore();
  });

  it('should keep catalog order', () => {
    const ctx = buildExecutionContext(
      makeInput({
        commands: [
          { name: 'b', content: 'B', run: null },
          { name: 'a/x', content: 'AX', run: 'return 1' },
          { name: 'a', content: 'A', run: null },
        ],
      }),
    );
    expect(ctx.commands.map((c) => c.name)).toEqual(['b', 'a/x', 'a']);
  });

  it('should drop entries with invalid names and warn', () => {
    const ctx = buildExecutionContext(
      makeInput({
        commands: [
          { name: 'ok', content: '', run: null },
          { name: 'not ok', content: '', run: null },
          { name: 'a//b', content: '', run: null },
        ],
      }),
    );
    expect(ctx.commands.map((c) => c.name)).toEqual(['ok']);
    expect(spy).toHaveBeenCalledTimes(2);
    expect(String(spy.mock.calls[0][0])).toContain('Dropping catalog entry with invalid name');
  });

  it('should freeze the whole context', () => {
    const ctx = buildExecutionContext(
      makeInput({
        replyTo: { text: 'hi', user: bob },
        commands: [{ name: 'a', content: 'A', run: null }],
      }),
    );
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(Object.isFrozen(ctx.user)).toBe(true);
    expect(Object.isFrozen(ctx.replyTo?.user)).toBe(true);
    expect(Object.isFrozen(ctx.commands)).toBe(true);
    expect(Object.isFrozen(ctx.commands[0])).toBe(true);
  });

  it('should not share objects with the input', () => {
    const input = makeInput();
    const ctx = buildExecutionContext(input);
    expect(ctx.user).not.toBe(input.user);
    expect(Object.isFrozen(input.user)).toBe(false);
  });

  it('should default to an empty catalog', () => {
    const { commands: _omitted, ...rest } = makeInput();
    expect(buildExecutionContext(rest).commands).toEqual([]);
  });
});

describe('toWirePayload', () => {
  it('should use the wire field names and mirror them under ctx', () => {
    const ctx = buildExecutionContext(makeInput({ replyTo: { text: 'earlier', user: bob } }));
    const payload = toWirePayload(ctx);

    const fields = {
      message: { text: '$ 1 + 1' },
      user: {
        id: '100000000000000001',
        handle: 'alice',
        name: 'Alice',
        global_name: 'Alice A.',
        avatar_url: 'https://example.test/alice.png',
      },
      server: { id: 's1' },
      reply_to: {
        text: 'earlier',
        user: {
          id: '2',
          handle: 'bob',
          name: 'Bob',
          global_name: null,
          avatar_url: 'https://example.test/bob.png',
        },
      },
    };
    expect(payload).toEqual({ ...fields, ctx: fields });
    expect(wirePayloadSchema.parse(JSON.parse(JSON.stringify(payload)))).toEqual(payload);
  });

  it('should send null for a direct context without a reply', () => {
    const payload = toWirePayload(buildExecutionContext(makeInput({ server: null })));
    expect(payload.server).toBeNull();
    expect(payload.reply_to).toBeNull();
    expect(payload.ctx.server).toBeNull();
  });
});

describe('toWireCatalog', () => {
  it('should keep name, content and run', () => {
    const catalog = toWireCatalog([{ name: 'a', content: 'A', run: 'return 1' }]);
    expect(catalog).toEqual([{ name: 'a', content: 'A', run: 'return 1' }]);
    expect(wireCatalogSchema.safeParse(catalog).success).toBe(true);
  });

  it('should be rejected by the schema when run is missing', () => {
    expect(wireCatalogSchema.safeParse([{ name: 'a', content: 'A' }]).success).toBe(false);
  });
});

describe('InMemoryCatalogSource', () => {
  const source = new InMemoryCatalogSource([
    { name: 'greet', content: 'hi', run: null, userId: '1', serverId: 's1' },
    { name: 'other', content: 'x', run: null, userId: '2', serverId: 's1' },
    { name: 'mine', content: 'dm', run: null, userId: '1', serverId: null },
    { name: 'theirs', content: 'dm', run: null, userId: '2', serverId: null },
    { name: 'elsewhere', content: '', run: null, userId: '1', serverId: 's2' },
  ]);

  it('should list every entry of the server in a server context', async () => {
    const entries = await source.listAvailable({ userId: '1', serverId: 's1' });
    expect(entries).toEqual([
      { name: 'greet', content: 'hi', run: null },
      { name: 'other', content: 'x', run: null },
    ]);
  });

  it("should list only the user's direct entries in a direct context", async () => {
    const entries = await source.listAvailable({ userId: '1', serverId: null });
    expect(entries.map((e) => e.name)).toEqual(['mine']);
  });

  it('should pick up added entries', async () => {
    const local = new InMemoryCatalogSource();
    local.add({ name: 'n', content: 'c', run: null, userId: '9', serverId: null });
    expect(await local.listAvailable({ userId: '9', serverId: null })).toHaveLength(1);
  });
});
