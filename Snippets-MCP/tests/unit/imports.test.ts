import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import {
  assertImportAllowed,
  fetchModuleGraph,
  fetchModuleSource,
  moduleDependencies,
  ModuleImportError,
  resolveSpecifier,
  SNIPPET_URL,
} from '../../src/runtime/imports.js';
import type { ModuleFetcher } from '../../src/runtime/imports.js';

describe('resolveSpecifier', () => {
  it('should resolve absolute and root-relative specifiers', () => {
    expect(resolveSpecifier('https://esm.sh/a', SNIPPET_URL)).toBe('https://esm.sh/a');
    expect(resolveSpecifier('/b@1/x.mjs', 'https://esm.sh/a')).toBe('https://esm.sh/b@1/x.mjs');
    expect(resolveSpecifier('./c.mjs', 'https://esm.sh/pkg/index.mjs')).toBe('https://esm.sh/pkg/c.mjs');
  });

  it('should turn bare names into snippet-relative file URLs', () => {
    expect(resolveSpecifier('lodash', SNIPPET_URL)).toBe('file:///lodash');
  });

  it('should reject what cannot be resolved', () => {
    expect(() => resolveSpecifier('x', 'not a url')).toThrow(ModuleImportError);
  });
});

describe('assertImportAllowed', () => {
  it('should accept https on an allowed host', () => {
    expect(() => assertImportAllowed('https://esm.sh/a', ['esm.sh'])).not.toThrow();
    expect(() => assertImportAllowed('https://cdn.example:8443/a', ['cdn.example:8443'])).not.toThrow();
  });

  it('should reject other hosts, other schemes and subdomains', () => {
    for (const url of ['https://evil.example/a', 'http://esm.sh/a', 'file:///lodash', 'https://x.esm.sh/a']) {
      expect(() => assertImportAllowed(url, ['esm.sh']), url).toThrow(
        `Import of ${url} is not allowed: modules may only be imported from esm.sh`,
      );
    }
  });

  it('should reject everything when no host is allowed', () => {
    expect(() => assertImportAllowed('https://esm.sh/a', [])).toThrow(
      'Imports are disabled (tried to import https://esm.sh/a)',
    );
  });
});

describe('moduleDependencies', () => {
  it('should list imports, re-exports and literal dynamic imports', () => {
    const source = [
      "import a from '/a.mjs';",
      "export * from './b.mjs';",
      "export { c } from 'https://esm.sh/c';",
      'export const d = 1;',
      "const e = () => import('/e.mjs');",
    ].join('\n');

    expect(moduleDependencies(source)).toEqual(['/a.mjs', './b.mjs', 'https://esm.sh/c', '/e.mjs']);
  });

  it('should return nothing for source that does not parse', () => {
    expect(moduleDependencies('export default {')).toEqual([]);
  });
});

describe('fetchModuleGraph', () => {
  const sources = new Map([
    ['https://esm.sh/a', "import '/shared.mjs'; export default 'a';"],
    ['https://esm.sh/b', "import '/shared.mjs'; export default 'b';"],
    ['https://esm.sh/shared.mjs', 'export const shared = true;'],
  ]);
  const fetcher = () =>
    vi.fn<ModuleFetcher>(async (url) => {
      const source = sources.get(url);
      if (source === undefined) throw new Error('not found');
      return source;
    });

  it('should fetch each module once', async () => {
    const fetchModule = fetcher();
    const graph = await fetchModuleGraph(['https://esm.sh/a', 'https://esm.sh/b', 'https://esm.sh/a'], {
      allowedHosts: ['esm.sh'],
      fetchModule,
    });

    expect([...graph.keys()]).toEqual(['https://esm.sh/a', 'https://esm.sh/b', 'https://esm.sh/shared.mjs']);
    expect(fetchModule).toHaveBeenCalledTimes(3);
  });

  it('should stop at the module limit', async () => {
    await expect(
      fetchModuleGraph(['https://esm.sh/a'], { allowedHosts: ['esm.sh'], fetchModule: fetcher(), maxModules: 1 }),
    ).rejects.toThrow('Too many modules imported (limit 1)');
  });

  it('should wrap fetch failures', async () => {
    await expect(
      fetchModuleGraph(['https://esm.sh/missing'], { allowedHosts: ['esm.sh'], fetchModule: fetcher() }),
    ).rejects.toThrow('Failed to fetch module https://esm.sh/missing: not found');
  });
});

describe('fetchModuleSource', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      if (req.url === '/mod.mjs') {
        res.writeHead(200, { 'content-type': 'application/javascript' });
        res.end('export default 7;');
        return;
      }
      res.writeHead(404);
      res.end();
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Test server has no port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should return the module body', async () => {
    expect(await fetchModuleSource(`${base}/mod.mjs`)).toBe('export default 7;');
  });

  it('should fail on an error status', async () => {
    await expect(fetchModuleSource(`${base}/nope.mjs`)).rejects.toThrow(
      `Failed to fetch module ${base}/nope.mjs: HTTP 404`,
    );
  });
});
