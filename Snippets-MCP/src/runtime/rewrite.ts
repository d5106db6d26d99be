/**
 * Source rewriting for snippets: a trailing expression becomes the
 * snippet's return value, static imports become `await import()`, and the
 * whole body runs inside an async function so `await` and `return` work
 * at the top level.
 *
 * Edits are spliced into the source text by node offsets, so everything
 * the rewrite does not touch (comments, formatting) is kept as written.
 */

import { parse } from 'meriyah';
import type { ESTree } from 'meriyah';

export interface RewrittenSnippet {
  /** Body to run inside the async wrapper. */
  body: string;
  /** Literal module specifiers, in source order: static imports and `import('...')`. */
  imports: string[];
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

function isNode(value: unknown): value is ESTree.Node {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function span(node: ESTree.Node): { start: number; end: number } {
  if (node.start === undefined || node.end === undefined) {
    throw new Error(`Parser returned ${node.type} without offsets`);
  }
  return { start: node.start, end: node.end };
}

export function parseModule(code: string): ESTree.Program | null {
  try {
    return parse(code, { module: true, next: true, globalReturn: true, ranges: true });
  } catch {
    return null;
  }
}

/** Calls `visit` for every node below `root`, depth first. */
export function walk(root: ESTree.Node, visit: (node: ESTree.Node) => void): void {
  visit(root);
  const values: unknown[] = Object.values(root);
  for (const value of values) {
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) walk(item, visit);
      }
    } else if (isNode(value)) {
      walk(value, visit);
    }
  }
}

function stringLiteral(node: ESTree.Node): string | null {
  return node.type === 'Literal' && typeof node.value === 'string' ? node.value : null;
}

/** Literal specifiers of `import()` calls anywhere below `root`. */
export function dynamicImports(root: ESTree.Node): string[] {
  const found: string[] = [];
  walk(root, (node) => {
    if (node.type !== 'ImportExpression') return;
    const specifier = stringLiteral(node.source);
    if (specifier !== null) found.push(specifier);
  });
  return found;
}

/**
 * `import a, { b as c } from 'x'` → `const { default: a, b: c } = await import("x");`
 */
function importReplacement(node: ESTree.ImportDeclaration, specifier: string): string {
  const source = `await import(${JSON.stringify(specifier)})`;
  const bindings: string[] = [];
  let namespace: string | null = null;

  for (const spec of node.specifiers) {
    switch (spec.type) {
      case 'ImportNamespaceSpecifier':
        namespace = spec.local.name;
        break;
      case 'ImportDefaultSpecifier':
        bindings.push(`default: ${spec.local.name}`);
        break;
      case 'ImportSpecifier':
        bindings.push(
          spec.imported.name === spec.local.name
            ? spec.local.name
            : `${spec.imported.name}: ${spec.local.name}`,
        );
        break;
    }
  }

  if (namespace !== null) {
    const rest = bindings.length > 0 ? ` const { ${bindings.join(', ')} } = ${namespace};` : '';
    return `const ${namespace} = ${source};${rest}`;
  }
  if (bindings.length > 0) {
    return `const { ${bindings.join(', ')} } = ${source};`;
  }
  return `${source};`;
}

function isUseStrict(statements: readonly ESTree.Node[], statement: ESTree.ExpressionStatement): boolean {
  for (const candidate of statements) {
    if (candidate.type !== 'ExpressionStatement' || stringLiteral(candidate.expression) === null) {
      return false;
    }
    if (candidate === statement) return stringLiteral(candidate.expression) === 'use strict';
  }
  return false;
}

function applyEdits(code: string, edits: Edit[]): string {
  let result = code;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}

/**
 * Rewrite a snippet for the async wrapper: `a; b + 1` → `a; return (b + 1);`.
 * Code that does not parse is passed through unchanged so the engine
 * reports its own syntax error.
 */
export function rewriteSnippet(code: string): RewrittenSnippet {
  const program = parseModule(code);
  if (program === null) return { body: code, imports: [] };

  const statements: readonly ESTree.Node[] = program.body;
  const edits: Edit[] = [];
  const imports: string[] = [];

  for (const statement of statements) {
    if (statement.type !== 'ImportDeclaration') continue;
    const specifier = stringLiteral(statement.source);
    if (specifier === null) continue;
    imports.push(specifier);
    edits.push({ ...span(statement), text: importReplacement(statement, specifier) });
  }
  imports.push(...dynamicImports(program));

  const last = statements[statements.length - 1];
  if (last !== undefined && last.type === 'ExpressionStatement' && !isUseStrict(statements, last)) {
    const expression = span(last.expression);
    edits.push({
      ...span(last),
      text: `return (${code.slice(expression.start, expression.end)});`,
    });
  }

  return { body: applyEdits(code, edits), imports };
}

export function wrapSnippet(body: string): string {
  return `(async () => {\n${body}\n})()`;
}
