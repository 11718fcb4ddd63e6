/**
 * Fusion MCP Server — Entry Point
 *
 * Stdio transport.
 */

import { loadPackageEnv } from '@fusion/shared/Utils/env.js';

loadPackageEnv(import.meta.url);

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { getConfig } from './config.js';
import { mkdir } from 'node:fs/promises';
import { Logger } from '@fusion/shared/Utils/logger.js';

const logger = new Logger('fusion');

async function main() {
  const config = getConfig();

  // Ensure sandbox and log directories exist
  await mkdir(config.sandboxDir, { recursive: true });
  await mkdir(config.logDir, { recursive: true });

  logger.info('Starting Fusion MCP', { transport: 'stdio' });
  logger.info(`Sandbox: ${config.sandboxDir}`);
  logger.info(`Logs: ${config.logDir}`);
  logger.info(`Security level: ${config.securityLevel}`);

  const { server } = createServer({ config });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  logger.info('Fusion MCP running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
