#!/usr/bin/env node
/**
 * Snippets MCP Server — Entry Point
 *
 * Stdio transport.
 */

import { loadEnvSafely } from '../../Shared/Utils/env.js';

// dotenv must run before the config is read
loadEnvSafely(import.meta.url);

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Logger } from '../../Shared/Utils/logger.js';
import { getConfig, getPrefixes } from './config.js';
import { loadCatalogFile } from './context/catalog-file.js';
import { InMemoryCatalogSource } from './context/catalog.js';
import { SandboxEngine } from './executor/engine.js';
import { createServer } from './server.js';

const logger = new Logger('snippets');

async function main(): Promise<void> {
  const config = getConfig();

  // Fails fast when the runtime cannot be found
  const engine = new SandboxEngine({ logDir: config.logDir });
  const catalog = config.catalogFile
    ? await loadCatalogFile(config.catalogFile)
    : new InMemoryCatalogSource();

  logger.info('Starting Snippets MCP', { transport: 'stdio' });
  logger.info(`Runtime: ${engine.runtime.executable} ${engine.runtime.entry}`);
  logger.info(`Logs: ${config.logDir}`);

  const server = createServer({ engine, prefixes: getPrefixes(config), catalog });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Snippets MCP running on stdio');
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
