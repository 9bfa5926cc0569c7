import { z } from 'zod';
import { list, opt, record } from '../records';
import { OpaqueSchema, UnderlyingInstrumentSchema, instrumentPageShape, stringList } from './common';
import { filterResponseShape } from './filter';

export interface WarrantFilter {
  directions: string[];
  subTypes: string[];
  issuers: string[];
  underlyingInstruments: string[];
}

export const WarrantListItemSchema = record({
  orderbookId: z.string(),
  name: z.string(),
  countryCode: opt(z.string()),
  direction: opt(z.string()),
  issuer: opt(z.string()),
  subType: opt(z.string()),
  hasPosition: opt(z.boolean()),
  underlyingInstrument: opt(UnderlyingInstrumentSchema),
  totalValueTraded: opt(z.number()),
  stopLoss: opt(z.number()),
  oneDayChangePercent: opt(z.number()),
  spread: opt(z.number()),
  buyPrice: opt(z.number()),
  sellPrice: opt(z.number()),
});
export type WarrantListItem = z.infer<typeof WarrantListItemSchema>;

export const WarrantFilterResponseSchema = record({
  ...filterResponseShape,
  warrants: list(WarrantListItemSchema),
  filter: opt(
    record({
      directions: stringList(),
      subTypes: stringList(),
      issuers: stringList(),
      underlyingInstruments: stringList(),
    })
  ),
});
export type WarrantFilterResponse = z.infer<typeof WarrantFilterResponseSchema>;

export const WarrantInfoSchema = record({
  ...instrumentPageShape,
  keyIndicators: opt(OpaqueSchema),
  underlying: opt(OpaqueSchema),
  assetCategory: opt(z.string()),
  category: opt(z.string()),
  subCategory: opt(z.string()),
});
export type WarrantInfo = z.infer<typeof WarrantInfoSchema>;

export const WarrantDetailsSchema = record({});
export type WarrantDetails = z.infer<typeof WarrantDetailsSchema>;
