import { z } from 'zod';
import { list, opt, record } from '../records';

export const SearchPriceSchema = record({
  last: opt(z.string()),
  currency: opt(z.string()),
  todayChangePercent: opt(z.string()),
  todayChangeValue: opt(z.string()),
  todayChangeDirection: opt(z.number()),
  threeMonthsAgoChangePercent: opt(z.string()),
  threeMonthsAgoChangeDirection: opt(z.number()),
  spread: opt(z.string()),
});

export const StockSectorSchema = record({
  id: opt(z.number()),
  level: opt(z.number()),
  name: opt(z.string()),
  englishName: opt(z.string()),
  highlightedName: opt(z.string()),
});

export const FundTagSchema = record({
  title: opt(z.string()),
  category: opt(z.string()),
  tagCategory: opt(z.string()),
  highlightedTitle: opt(z.string()),
});

export const SearchHitSchema = record({
  type: opt(z.string()),
  title: z.string(),
  highlightedTitle: opt(z.string()),
  description: opt(z.string()),
  highlightedDescription: opt(z.string()),
  path: opt(z.string()),
  flagCode: opt(z.string()),
  orderBookId: opt(z.string()),
  urlSlugName: opt(z.string()),
  tradeable: opt(z.boolean()),
  sellable: opt(z.boolean()),
  buyable: opt(z.boolean()),
  price: opt(SearchPriceSchema),
  stockSectors: list(StockSectorSchema),
  fundTags: list(FundTagSchema),
  marketPlaceName: opt(z.string()),
  subType: opt(z.string()),
  highlightedSubType: opt(z.string()),
});
export type SearchHit = z.infer<typeof SearchHitSchema>;

export const SearchPaginationSchema = record({
  size: opt(z.number()),
  rangeFrom: opt(z.number()),
});

export const SearchResponseSchema = record({
  totalNumberOfHits: opt(z.number()),
  hits: list(SearchHitSchema),
  searchQuery: opt(z.string()),
  searchFilter: opt(record({ types: list(z.string()) })),
  facets: opt(record({ types: list(record({ type: opt(z.string()), count: opt(z.number()) })) })),
  pagination: opt(SearchPaginationSchema),
});
export type SearchResponse = z.infer<typeof SearchResponseSchema>;
