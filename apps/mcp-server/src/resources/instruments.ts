import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../context';
import { formatFundMarkdown, formatStockMarkdown } from '../formatters/markdown';

const MARKDOWN = 'text/markdown';

function singleVariable(variables: Record<string, string | string[]>, name: string): string {
  const value = variables[name];
  const single = Array.isArray(value) ? value[0] : value;
  if (!single) {
    throw new Error(`Missing URI variable: ${name}`);
  }
  return single;
}

export async function readStockPage(context: ServerContext, instrumentId: string): Promise<string> {
  const stock = await context.session((guide) => guide.getStockInfo(instrumentId));
  return formatStockMarkdown(stock);
}

export async function readFundPage(context: ServerContext, instrumentId: string): Promise<string> {
  const fund = await context.session((guide) => guide.getFundInfo(instrumentId));
  return formatFundMarkdown(fund);
}

/** `market://stock/{instrumentId}` and `market://fund/{instrumentId}` markdown pages. */
export function registerInstrumentResources(server: McpServer, context: ServerContext): void {
  server.registerResource(
    'stock',
    new ResourceTemplate('market://stock/{instrumentId}', { list: undefined }),
    { title: 'Stock overview', description: 'Price, change, company and key ratios of a stock', mimeType: MARKDOWN },
    async (uri, variables) => ({
      contents: [
        { uri: uri.href, mimeType: MARKDOWN, text: await readStockPage(context, singleVariable(variables, 'instrumentId')) },
      ],
    })
  );

  server.registerResource(
    'fund',
    new ResourceTemplate('market://fund/{instrumentId}', { list: undefined }),
    { title: 'Fund overview', description: 'NAV, performance, risk and fees of a fund', mimeType: MARKDOWN },
    async (uri, variables) => ({
      contents: [
        { uri: uri.href, mimeType: MARKDOWN, text: await readFundPage(context, singleVariable(variables, 'instrumentId')) },
      ],
    })
  );
}
