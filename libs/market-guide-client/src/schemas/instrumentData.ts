import { z } from 'zod';
import { opt, record } from '../records';

export const NumberOfOwnersSchema = record({
  orderbookId: opt(z.string()),
  numberOfOwners: opt(z.number()),
  timestamp: opt(z.number()),
});
export type NumberOfOwners = z.infer<typeof NumberOfOwnersSchema>;

export const ShortSellingSchema = record({
  orderbookId: opt(z.string()),
  shortSellingVolume: opt(z.number()),
  shortSellingPercentage: opt(z.number()),
  date: opt(z.string()),
});
export type ShortSelling = z.infer<typeof ShortSellingSchema>;
