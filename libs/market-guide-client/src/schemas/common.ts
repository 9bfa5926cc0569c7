import { z } from 'zod';
import { list, opt, record } from '../records';

export const InstrumentTypeSchema = z.enum([
  'STOCK',
  'FUND',
  'BOND',
  'OPTION',
  'FUTURE_FORWARD',
  'CERTIFICATE',
  'WARRANT',
  'ETF',
  'EXCHANGE_TRADED_FUND',
  'INDEX',
  'PREMIUM_BOND',
  'SUBSCRIPTION_OPTION',
  'EQUITY_LINKED_BOND',
  'CONVERTIBLE',
]);
export type InstrumentType = z.infer<typeof InstrumentTypeSchema>;

/** Periods accepted by the stock and market maker price charts. */
export const ChartTimePeriodSchema = z.enum([
  'today',
  'one_week',
  'one_month',
  'three_months',
  'this_year',
  'one_year',
  'three_years',
  'five_years',
  'all_time',
]);
export type ChartTimePeriod = z.infer<typeof ChartTimePeriodSchema>;

export const FundChartTimePeriodSchema = z.enum([
  'one_week',
  'one_month',
  'three_months',
  'this_year',
  'one_year',
  'three_years',
  'five_years',
  'ten_years',
  'infinity',
]);
export type FundChartTimePeriod = z.infer<typeof FundChartTimePeriodSchema>;

export const SortOrderSchema = z.enum(['asc', 'desc']);
export type SortOrder = z.infer<typeof SortOrderSchema>;

export const SortBySchema = record({
  field: z.string(),
  order: SortOrderSchema,
});
export type SortBy = z.infer<typeof SortBySchema>;

export const QuoteSchema = record({
  buy: opt(z.number()),
  sell: opt(z.number()),
  last: opt(z.number()),
  highest: opt(z.number()),
  lowest: opt(z.number()),
  change: opt(z.number()),
  changePercent: opt(z.number()),
  spread: opt(z.number()),
  timeOfLast: opt(z.number()),
  totalValueTraded: opt(z.number()),
  totalVolumeTraded: opt(z.number()),
  updated: opt(z.number()),
  volumeWeightedAveragePrice: opt(z.number()),
  isRealTime: opt(z.boolean()),
});
export type Quote = z.infer<typeof QuoteSchema>;

export const ListingSchema = record({
  shortName: opt(z.string()),
  tickerSymbol: opt(z.string()),
  countryCode: opt(z.string()),
  currency: opt(z.string()),
  marketPlaceCode: opt(z.string()),
  marketPlaceName: opt(z.string()),
  tickSizeListId: opt(z.string()),
  marketTradesAvailable: opt(z.boolean()),
});
export type Listing = z.infer<typeof ListingSchema>;

export const MarketPlaceSchema = record({
  marketOpen: opt(z.boolean()),
  tradingTime: opt(z.string()),
  closingTime: opt(z.string()),
  country: opt(z.string()),
  name: opt(z.string()),
});
export type MarketPlace = z.infer<typeof MarketPlaceSchema>;

export const AmountSchema = record({
  value: opt(z.number()),
  currency: opt(z.string()),
});
export type Amount = z.infer<typeof AmountSchema>;

export const ReportInfoSchema = record({
  date: opt(z.string()),
  reportType: opt(z.string()),
});

export const KeyIndicatorsSchema = record({
  numberOfOwners: opt(z.number()),
  reportDate: opt(z.string()),
  volatility: opt(z.number()),
  beta: opt(z.number()),
  priceEarningsRatio: opt(z.number()),
  priceSalesRatio: opt(z.number()),
  evEbitRatio: opt(z.number()),
  returnOnEquity: opt(z.number()),
  returnOnTotalAssets: opt(z.number()),
  equityRatio: opt(z.number()),
  capitalTurnover: opt(z.number()),
  operatingProfitMargin: opt(z.number()),
  netMargin: opt(z.number()),
  marketCapital: opt(AmountSchema),
  equityPerShare: opt(AmountSchema),
  turnoverPerShare: opt(AmountSchema),
  earningsPerShare: opt(AmountSchema),
  dividendsPerYear: opt(z.number()),
  nextReport: opt(ReportInfoSchema),
  previousReport: opt(ReportInfoSchema),
  directYield: opt(z.number()),
});
export type KeyIndicators = z.infer<typeof KeyIndicatorsSchema>;

export const HistoricalClosingPricesSchema = record({
  oneDay: opt(z.number()),
  oneWeek: opt(z.number()),
  oneMonth: opt(z.number()),
  threeMonths: opt(z.number()),
  startOfYear: opt(z.number()),
  oneYear: opt(z.number()),
  threeYears: opt(z.number()),
  fiveYears: opt(z.number()),
  start: opt(z.number()),
});
export type HistoricalClosingPrices = z.infer<typeof HistoricalClosingPricesSchema>;

export const UnderlyingInstrumentSchema = record({
  name: opt(z.string()),
  orderbookId: opt(z.string()),
  instrumentType: opt(z.string()),
  countryCode: opt(z.string()),
});
export type UnderlyingInstrument = z.infer<typeof UnderlyingInstrumentSchema>;

/** Fields shared by the instrument pages of derivatives and exchange traded products. */
export const instrumentPageShape = {
  orderbookId: z.string(),
  name: z.string(),
  isin: opt(z.string()),
  tradable: opt(z.string()),
  listing: opt(ListingSchema),
  historicalClosingPrices: opt(HistoricalClosingPricesSchema),
  quote: opt(QuoteSchema),
  type: opt(z.string()),
};

/** Free-form nested object: every field lands in `extensions`. */
export const OpaqueSchema = record({});
export type Opaque = z.infer<typeof OpaqueSchema>;

export const stringList = () => list(z.string());
