import { z } from 'zod';
import { DEFAULT_FILTER_LIMIT, MAX_FILTER_LIMIT, SortOrderSchema, type SortCriteria } from '@libs/market-guide-client';

export const MAX_SEARCH_LIMIT = 50;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export const instrumentIdInput = {
  instrumentId: z.string().min(1).describe('Order book id of the instrument, e.g. "5247"'),
};

export function stringFilter(description: string) {
  return z.array(z.string()).optional().describe(description);
}

/** Paging and sorting arguments shared by the filter tools. */
export function pagingInput(defaultSortField: string, defaultSortOrder: 'asc' | 'desc') {
  return {
    offset: z.number().int().min(0).default(0).describe('Number of results to skip'),
    limit: z
      .number()
      .int()
      .default(DEFAULT_FILTER_LIMIT)
      .describe(`Maximum number of results (1-${MAX_FILTER_LIMIT}, default ${DEFAULT_FILTER_LIMIT})`),
    sortField: z.string().min(1).default(defaultSortField).describe(`Field to sort by (default "${defaultSortField}")`),
    sortOrder: SortOrderSchema.default(defaultSortOrder).describe(`"asc" or "desc" (default "${defaultSortOrder}")`),
  };
}

export interface PagingArgs {
  offset: number;
  limit: number;
  sortField: string;
  sortOrder: SortCriteria['order'];
}

export function toPaging(args: PagingArgs): { offset: number; limit: number; sortBy: SortCriteria } {
  return {
    offset: args.offset,
    limit: clamp(args.limit, 1, MAX_FILTER_LIMIT),
    sortBy: { field: args.sortField, order: args.sortOrder },
  };
}
