import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { withMarketGuideSession } from '@libs/market-guide-client';
import type { Logger, ResilientHttpClientDeps } from '@libs/resilient-http-core';
import { SERVER_NAME, SERVER_VERSION, type ServerConfig } from './config';
import type { MarketGuideSession, ServerContext } from './context';
import { registerPrompts } from './prompts';
import { registerInstrumentResources } from './resources/instruments';
import { registerUsageResources } from './resources/usage';
import { buildToolRegistry, registerTools } from './tools/registry';

/** One HTTP client per call, released when the call settles. */
export function createSession(
  config: ServerConfig['client'],
  logger: Logger,
  deps: Omit<ResilientHttpClientDeps, 'logger'> = {}
): MarketGuideSession {
  return (fn) => withMarketGuideSession(config, fn, { ...deps, logger });
}

export function createServer(context: ServerContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  const tools = buildToolRegistry(context);
  registerTools(server, tools);
  registerInstrumentResources(server, context);
  registerUsageResources(server);
  registerPrompts(server);

  context.logger.info('server.ready', { tools: tools.length });
  return server;
}
