import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../context';
import { certificateTools } from './certificates';
import type { ToolEntry } from './defineTool';
import { etfTools } from './etfs';
import { fundTools } from './funds';
import { futureForwardTools } from './futuresForwards';
import { instrumentDataTools } from './instrumentData';
import { searchTools } from './search';
import { stockTools } from './stocks';
import { warrantTools } from './warrants';

/** Every tool the server exposes, in listing order. */
export function buildToolRegistry(context: ServerContext): ToolEntry[] {
  const entries = [
    ...searchTools(context),
    ...stockTools(context),
    ...fundTools(context),
    ...certificateTools(context),
    ...warrantTools(context),
    ...etfTools(context),
    ...futureForwardTools(context),
    ...instrumentDataTools(context),
  ];
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.name)) {
      throw new Error(`Duplicate tool name: ${entry.name}`);
    }
    seen.add(entry.name);
  }
  return entries;
}

export function registerTools(server: McpServer, entries: ToolEntry[]): void {
  for (const entry of entries) {
    entry.register(server);
  }
}
