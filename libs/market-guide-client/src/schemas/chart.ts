import { z } from 'zod';
import { list, numeric, opt, record } from '../records';

export const OhlcSchema = record({
  timestamp: z.number(),
  open: opt(z.number()),
  close: opt(z.number()),
  low: opt(z.number()),
  high: opt(z.number()),
  totalVolumeTraded: opt(z.number()),
});
export type Ohlc = z.infer<typeof OhlcSchema>;

export const ChartResolutionSchema = record({
  chartResolution: opt(z.string()),
  availableResolutions: list(z.string()),
});

export const ChartMetadataSchema = record({
  resolution: opt(z.union([z.string(), ChartResolutionSchema])),
});

/**
 * Price series. The wire field `from` is exposed as `rangeFrom`.
 */
export const ChartDataSchema = record({
  ohlc: list(OhlcSchema),
  metadata: opt(ChartMetadataSchema),
  rangeFrom: opt(numeric),
  to: opt(numeric),
  previousClosingPrice: opt(z.number()),
  marketMaker: opt(z.array(z.unknown())),
});
export type ChartData = z.infer<typeof ChartDataSchema>;
