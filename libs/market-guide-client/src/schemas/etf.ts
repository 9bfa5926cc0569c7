import { z } from 'zod';
import { list, opt, record } from '../records';
import { MarketPlaceSchema, OpaqueSchema, instrumentPageShape, stringList } from './common';
import { filterResponseShape } from './filter';

export interface EtfFilter {
  assetCategories: string[];
  subCategories: string[];
  exposures: string[];
  riskScores: string[];
  directions: string[];
  issuers: string[];
  currencyCodes: string[];
}

export const EtfListItemSchema = record({
  orderbookId: z.string(),
  name: z.string(),
  countryCode: opt(z.string()),
  directYield: opt(z.number()),
  oneDayChangePercent: opt(z.number()),
  threeYearsChangePercent: opt(z.number()),
  managementFee: opt(z.number()),
  productFee: opt(z.number()),
  numberOfOwners: opt(z.number()),
  riskScore: opt(z.number()),
  hasPosition: opt(z.boolean()),
});
export type EtfListItem = z.infer<typeof EtfListItemSchema>;

export const EtfFilterResponseSchema = record({
  ...filterResponseShape,
  etfs: list(EtfListItemSchema),
  filter: opt(
    record({
      assetCategories: stringList(),
      subCategories: stringList(),
      exposures: stringList(),
      riskScores: stringList(),
      directions: stringList(),
      issuers: stringList(),
      currencyCodes: stringList(),
    })
  ),
  filterOptions: opt(OpaqueSchema),
});
export type EtfFilterResponse = z.infer<typeof EtfFilterResponseSchema>;

export const EtfInfoSchema = record({
  ...instrumentPageShape,
  marketPlace: opt(MarketPlaceSchema),
  keyIndicators: opt(OpaqueSchema),
});
export type EtfInfo = z.infer<typeof EtfInfoSchema>;

export const EtfDetailsSchema = record({});
export type EtfDetails = z.infer<typeof EtfDetailsSchema>;
