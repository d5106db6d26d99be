import { describe, it, expect } from 'vitest';
import { rewriteSnippet, wrapSnippet } from '../../src/runtime/rewrite.js';

const returnLastExpression = (code: string): string => rewriteSnippet(code).body;

describe('trailing expressions', () => {
  it('should return a trailing expression', () => {
    expect(returnLastExpression('1 + 1')).toBe('return (1 + 1);');
    expect(returnLastExpression('const a = 1;\na * 2')).toBe('const a = 1;\nreturn (a * 2);');
    expect(returnLastExpression('x;')).toBe('return (x);');
  });

  it('should keep a trailing comment after the expression', () => {
    expect(returnLastExpression('1 // one')).toBe('return (1); // one');
  });

  it('should return a lone string literal', () => {
    expect(returnLastExpression("'hello'")).toBe("return ('hello');");
  });

  it('should return an awaited expression', () => {
    expect(returnLastExpression('await f()')).toBe('return (await f());');
  });

  it('should leave code that ends in a statement untouched', () => {
    for (const code of ['const a = 1', 'return 5', 'if (x) { y }', "'use strict'", '']) {
      expect(returnLastExpression(code), code).toBe(code);
    }
  });
});

describe('rewriteSnippet', () => {
  it('should turn a default import into an awaited import', () => {
    expect(rewriteSnippet("import x from 'https://esm.sh/a'\nx")).toEqual({
      body: 'const { default: x } = await import("https://esm.sh/a");\nreturn (x);',
      imports: ['https://esm.sh/a'],
    });
  });

  it('should map named and renamed imports', () => {
    expect(rewriteSnippet("import { a, b as c } from 'https://esm.sh/m';").body).toBe(
      'const { a, b: c } = await import("https://esm.sh/m");',
    );
  });

  it('should keep a namespace and read the default from it', () => {
    expect(rewriteSnippet("import d, * as ns from 'https://esm.sh/m';").body).toBe(
      'const ns = await import("https://esm.sh/m"); const { default: d } = ns;',
    );
  });

  it('should keep side-effect imports', () => {
    expect(rewriteSnippet("import 'https://esm.sh/polyfill';").body).toBe(
      'await import("https://esm.sh/polyfill");',
    );
  });

  it('should collect literal dynamic imports after static ones', () => {
    const code = "import a from 'https://esm.sh/a';\nconst b = await import('https://esm.sh/b');\nconst c = await import(name)";
    expect(rewriteSnippet(code).imports).toEqual(['https://esm.sh/a', 'https://esm.sh/b']);
  });

  it('should pass code that does not parse through unchanged', () => {
    expect(rewriteSnippet('$foo "a')).toEqual({ body: '$foo "a', imports: [] });
  });
});

describe('wrapSnippet', () => {
  it('should run the body in an async function', () => {
    expect(wrapSnippet('return (1);')).toBe('(async () => {\nreturn (1);\n})()');
  });
});
