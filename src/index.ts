#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer, openInitialPipeline } from './server.js';
import { logger } from './logger.js';

async function main() {
  await openInitialPipeline(process.argv[2] ?? process.env.TEXPUB_CONFIG);

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('texpub MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
