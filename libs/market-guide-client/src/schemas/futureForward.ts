import { z } from 'zod';
import { opt, record } from '../records';
import { OpaqueSchema, instrumentPageShape } from './common';

export interface FutureForwardFilter {
  underlyingInstruments: string[];
  optionTypes: string[];
  endDates: string[];
  callIndicators: string[];
}

export const FutureForwardInfoSchema = record({
  ...instrumentPageShape,
  keyIndicators: opt(OpaqueSchema),
  underlying: opt(OpaqueSchema),
});
export type FutureForwardInfo = z.infer<typeof FutureForwardInfoSchema>;

export const FutureForwardDetailsSchema = record({});
export type FutureForwardDetails = z.infer<typeof FutureForwardDetailsSchema>;

/** The matrix layout is not documented; everything is kept as received. */
export const FutureForwardMatrixSchema = record({});
export type FutureForwardMatrix = z.infer<typeof FutureForwardMatrixSchema>;

export const FutureForwardFilterOptionsSchema = record({});
export type FutureForwardFilterOptions = z.infer<typeof FutureForwardFilterOptionsSchema>;
