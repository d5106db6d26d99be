/**
 * Module imports for snippets.
 *
 * Snippets have no network access of their own. Before a snippet runs, the
 * host fetches every module it imports (and everything those modules
 * import) from the allowed hosts; the engine's module loader then only
 * serves from that set. Anything outside it fails to load.
 */

import type { ESTree } from 'meriyah';
import { BaseError } from '../../../Shared/Types/errors.js';
import type { ErrorDetails } from '../../../Shared/Types/errors.js';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import { dynamicImports, parseModule } from './rewrite.js';

const logger = rootLogger.child('imports');

/** Base URL the snippet itself is evaluated under. */
export const SNIPPET_URL = 'file:///snippet.js';

export const DEFAULT_MAX_MODULES = 64;

export class ModuleImportError extends BaseError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'MODULE_IMPORT_ERROR', details);
  }
}

export type ModuleFetcher = (url: string) => Promise<string>;

export interface ModuleGraphOptions {
  allowedHosts: readonly string[];
  fetchModule?: ModuleFetcher;
  maxModules?: number;
}

/**
 * @throws ModuleImportError when the specifier is not a URL relative to `base`
 */
export function resolveSpecifier(specifier: string, base: string): string {
  try {
    return new URL(specifier, base).href;
  } catch {
    throw new ModuleImportError(`Cannot resolve module '${specifier}' from ${base}`, { specifier, base });
  }
}

/**
 * @throws ModuleImportError unless `url` is https on one of `allowedHosts`
 */
export function assertImportAllowed(url: string, allowedHosts: readonly string[]): void {
  if (allowedHosts.length === 0) {
    throw new ModuleImportError(`Imports are disabled (tried to import ${url})`, { url });
  }
  const parsed = new URL(url);
  const hostAllowed = allowedHosts.includes(parsed.host) || allowedHosts.includes(parsed.hostname);
  if (parsed.protocol !== 'https:' || !hostAllowed) {
    throw new ModuleImportError(
      `Import of ${url} is not allowed: modules may only be imported from ${allowedHosts.join(', ')}`,
      { url, allowedHosts },
    );
  }
}

export const fetchModuleSource: ModuleFetcher = async (url) => {
  const response = await fetch(url, { headers: { accept: 'application/javascript' } });
  if (!response.ok) {
    throw new ModuleImportError(`Failed to fetch module ${url}: HTTP ${response.status}`, {
      url,
      status: response.status,
    });
  }
  return response.text();
};

/** Specifiers a module source depends on, statically and through literal `import()`. */
export function moduleDependencies(source: string): string[] {
  const program = parseModule(source);
  if (program === null) return [];

  const statements: readonly ESTree.Node[] = program.body;
  const found: string[] = [];
  for (const statement of statements) {
    if (
      (statement.type === 'ImportDeclaration' ||
        statement.type === 'ExportAllDeclaration' ||
        statement.type === 'ExportNamedDeclaration') &&
      statement.source &&
      typeof statement.source.value === 'string'
    ) {
      found.push(statement.source.value);
    }
  }
  return [...found, ...dynamicImports(program)];
}

/**
 * Fetch `specifiers` (relative to the snippet) and their dependencies.
 *
 * @returns module sources by resolved URL
 * @throws ModuleImportError on a disallowed host, a failed fetch or too many modules
 */
export async function fetchModuleGraph(
  specifiers: readonly string[],
  options: ModuleGraphOptions,
): Promise<Map<string, string>> {
  const fetchModule = options.fetchModule ?? fetchModuleSource;
  const maxModules = options.maxModules ?? DEFAULT_MAX_MODULES;
  const sources = new Map<string, string>();
  const queue = specifiers.map((specifier) => resolveSpecifier(specifier, SNIPPET_URL));

  for (let url = queue.shift(); url !== undefined; url = queue.shift()) {
    if (sources.has(url)) continue;
    assertImportAllowed(url, options.allowedHosts);
    if (sources.size >= maxModules) {
      throw new ModuleImportError(`Too many modules imported (limit ${maxModules})`, { maxModules });
    }

    let source: string;
    try {
      source = await fetchModule(url);
    } catch (error) {
      if (error instanceof ModuleImportError) throw error;
      throw new ModuleImportError(
        `Failed to fetch module ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { url },
      );
    }
    logger.debug('Fetched module', { url, bytes: source.length });
    sources.set(url, source);

    for (const dependency of moduleDependencies(source)) {
      queue.push(resolveSpecifier(dependency, url));
    }
  }
  return sources;
}
