import { z } from 'zod';
import { opt } from '../records';
import { OpaqueSchema, SortBySchema, type SortOrder } from './common';

export const DEFAULT_FILTER_LIMIT = 20;
export const MAX_FILTER_LIMIT = 100;

export interface SortCriteria {
  field: string;
  order: SortOrder;
}

/** Body of the certificate, warrant, ETF and future/forward list endpoints. */
export interface FilterRequest<Filter> {
  filter: Filter;
  offset: number;
  limit: number;
  sortBy: SortCriteria;
}

/** Paging fields shared by every filter response. */
export const filterResponseShape = {
  pagination: opt(OpaqueSchema),
  totalNumberOfOrderbooks: opt(z.number()),
  sortBy: opt(SortBySchema),
};
