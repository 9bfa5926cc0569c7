import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { analyzeStockPrompt, compareFundsPrompt, screenDividendStocksPrompt } from './analysis';
import { decideToolOrScriptPrompt, filterLargeDatasetPrompt } from './workflows';

export const PROMPT_NAMES = [
  analyzeStockPrompt.name,
  compareFundsPrompt.name,
  screenDividendStocksPrompt.name,
  decideToolOrScriptPrompt.name,
  filterLargeDatasetPrompt.name,
];

export function registerPrompts(server: McpServer): void {
  server.registerPrompt(analyzeStockPrompt.name, analyzeStockPrompt.config, analyzeStockPrompt.handler);
  server.registerPrompt(compareFundsPrompt.name, compareFundsPrompt.config, compareFundsPrompt.handler);
  server.registerPrompt(
    screenDividendStocksPrompt.name,
    screenDividendStocksPrompt.config,
    screenDividendStocksPrompt.handler
  );
  server.registerPrompt(decideToolOrScriptPrompt.name, decideToolOrScriptPrompt.config, decideToolOrScriptPrompt.handler);
  server.registerPrompt(filterLargeDatasetPrompt.name, filterLargeDatasetPrompt.config, filterLargeDatasetPrompt.handler);
}
