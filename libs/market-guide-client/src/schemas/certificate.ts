import { z } from 'zod';
import { list, opt, record } from '../records';
import { KeyIndicatorsSchema, UnderlyingInstrumentSchema, instrumentPageShape, stringList } from './common';
import { filterResponseShape } from './filter';

export interface CertificateFilter {
  directions: string[];
  leverages: number[];
  underlyingInstruments: string[];
  categories: string[];
  exposures: string[];
  issuers: string[];
}

export const CertificateListItemSchema = record({
  orderbookId: z.string(),
  name: z.string(),
  countryCode: opt(z.string()),
  direction: opt(z.string()),
  marketplaceCode: opt(z.string()),
  issuer: opt(z.string()),
  hasPosition: opt(z.boolean()),
  totalValueTraded: opt(z.number()),
  underlyingInstrument: opt(UnderlyingInstrumentSchema),
  leverage: opt(z.number()),
  spread: opt(z.number()),
  buyPrice: opt(z.number()),
  sellPrice: opt(z.number()),
});
export type CertificateListItem = z.infer<typeof CertificateListItemSchema>;

export const CertificateFilterResponseSchema = record({
  ...filterResponseShape,
  certificates: list(CertificateListItemSchema),
  filter: opt(
    record({
      directions: stringList(),
      leverages: list(z.number()),
      underlyingInstruments: stringList(),
      categories: stringList(),
      exposures: stringList(),
      issuers: stringList(),
    })
  ),
});
export type CertificateFilterResponse = z.infer<typeof CertificateFilterResponseSchema>;

export const CertificateInfoSchema = record({
  ...instrumentPageShape,
  keyIndicators: opt(KeyIndicatorsSchema),
  assetCategory: opt(z.string()),
  category: opt(z.string()),
  subCategory: opt(z.string()),
});
export type CertificateInfo = z.infer<typeof CertificateInfoSchema>;

/** Issuer terms and the like; the shape varies per product. */
export const CertificateDetailsSchema = record({});
export type CertificateDetails = z.infer<typeof CertificateDetailsSchema>;
