import { z } from 'zod';
import { DEFAULT_SEARCH_LIMIT } from '@libs/market-guide-client';
import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { MAX_SEARCH_LIMIT, clamp } from './inputs';

export const SEARCH_INSTRUMENT_TYPES = ['stock', 'fund', 'etf', 'certificate', 'warrant', 'all'] as const;

export function searchTools(context: ServerContext): ToolEntry[] {
  return [
    defineTool(context, {
      name: 'search_instruments',
      title: 'Search instruments',
      description:
        'Search stocks, funds, ETFs, certificates and warrants by name, ticker or ISIN. ' +
        'Returns hits with order book ids, prices and market places plus per-type facets.',
      inputSchema: {
        query: z.string().min(1).describe('Company name, ticker symbol or ISIN'),
        instrumentType: z.enum(SEARCH_INSTRUMENT_TYPES).default('all').describe('Restrict hits to one instrument type'),
        limit: z
          .number()
          .int()
          .default(DEFAULT_SEARCH_LIMIT)
          .describe(`Maximum number of hits (1-${MAX_SEARCH_LIMIT}, default ${DEFAULT_SEARCH_LIMIT})`),
      },
      handler: ({ query, instrumentType, limit }) =>
        context.session((guide) =>
          guide.search(query, { instrumentType, limit: clamp(limit, 1, MAX_SEARCH_LIMIT) })
        ),
    }),
    defineTool(context, {
      name: 'get_instrument_by_order_book_id',
      title: 'Look up instrument by order book id',
      description: 'Find the search hit for an order book id. Returns null when nothing matches.',
      inputSchema: {
        orderBookId: z.string().min(1).describe('Order book id to look up'),
      },
      handler: ({ orderBookId }) => context.session((guide) => guide.findByOrderBookId(orderBookId)),
    }),
  ];
}
