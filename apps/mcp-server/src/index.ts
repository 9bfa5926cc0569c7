#!/usr/bin/env node
/**
 * Market Guide MCP server entry point
 *
 * Serves read-only market data tools, resources and prompts over stdio.
 * Logs go to stderr; stdout carries the protocol.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConsoleLogger } from '@libs/resilient-http-core';
import { loadServerConfig } from './config';
import { createServer, createSession } from './server';

async function run() {
  const config = loadServerConfig();
  const logger = new ConsoleLogger(config.logLevel);

  const server = createServer({ session: createSession(config.client, logger), logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('server.connected', { transport: 'stdio', baseUrl: config.client.baseUrl });
}

run().catch((err) => {
  console.error('Market guide MCP server failed:', err);
  process.exit(1);
});
