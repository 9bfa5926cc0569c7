import { z } from 'zod';
import { list, opt, record } from '../records';
import {
  AmountSchema,
  HistoricalClosingPricesSchema,
  KeyIndicatorsSchema,
  ListingSchema,
  MarketPlaceSchema,
  QuoteSchema,
} from './common';

export const SectorSchema = record({
  sectorId: opt(z.string()),
  sectorName: opt(z.string()),
});

export const CompanySchema = record({
  name: opt(z.string()),
  description: opt(z.string()),
  ceo: opt(z.string()),
  chairman: opt(z.string()),
  url: opt(z.string()),
  marketCapital: opt(AmountSchema),
});

export const StockInfoSchema = record({
  orderbookId: z.string(),
  name: z.string(),
  isin: opt(z.string()),
  instrumentId: opt(z.string()),
  sectors: list(SectorSchema),
  tradable: opt(z.string()),
  listing: opt(ListingSchema),
  marketPlace: opt(MarketPlaceSchema),
  historicalClosingPrices: opt(HistoricalClosingPricesSchema),
  keyIndicators: opt(KeyIndicatorsSchema),
  quote: opt(QuoteSchema),
  type: opt(z.string()),
  company: opt(CompanySchema),
  relatedStocks: opt(z.array(z.unknown())),
  dividends: opt(z.array(z.unknown())),
});
export type StockInfo = z.infer<typeof StockInfoSchema>;

/** Analysis payload: yearly and quarterly figures, dividends and ratios. */
export const StockAnalysisSchema = record({
  dividendsByYear: list(z.unknown()),
  companyFinancialsByYear: list(z.unknown()),
  companyFinancialsByQuarter: list(z.unknown()),
  companyFinancialsByQuarterTTM: list(z.unknown()),
});
export type StockAnalysis = z.infer<typeof StockAnalysisSchema>;

export interface Dividends {
  dividendsByYear: unknown[];
}

export interface CompanyFinancials {
  companyFinancialsByYear: unknown[];
  companyFinancialsByQuarter: unknown[];
  companyFinancialsByQuarterTTM: unknown[];
}

export const MarketplaceInfoSchema = record({
  marketOpen: opt(z.boolean()),
  timeLeftMs: opt(z.number()),
  openingTime: opt(z.string()),
  todayClosingTime: opt(z.string()),
  normalClosingTime: opt(z.string()),
});
export type MarketplaceInfo = z.infer<typeof MarketplaceInfoSchema>;

export const BrokerTradeSummarySchema = record({
  brokerCode: z.string(),
  brokerName: opt(z.string()),
  sellVolume: opt(z.number()),
  buyVolume: opt(z.number()),
  netBuyVolume: opt(z.number()),
});
export type BrokerTradeSummary = z.infer<typeof BrokerTradeSummarySchema>;

export const TradeSchema = record({
  buyer: opt(z.string()),
  seller: opt(z.string()),
  dealTime: opt(z.number()),
  price: opt(z.number()),
  volume: opt(z.number()),
  matchedOnMarket: opt(z.boolean()),
  cancelled: opt(z.boolean()),
});
export type Trade = z.infer<typeof TradeSchema>;

export const OrderSideSchema = record({
  price: opt(z.number()),
  volume: opt(z.number()),
  priceString: opt(z.string()),
});

export const OrderLevelSchema = record({
  buySide: opt(OrderSideSchema),
  sellSide: opt(OrderSideSchema),
});
export type OrderLevel = z.infer<typeof OrderLevelSchema>;

/** Outside trading hours `levels` is empty and `receivedTime` absent. */
export const OrderDepthSchema = record({
  receivedTime: opt(z.number()),
  levels: list(OrderLevelSchema),
});
export type OrderDepth = z.infer<typeof OrderDepthSchema>;
