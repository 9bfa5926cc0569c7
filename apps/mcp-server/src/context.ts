import type { MarketGuideClient } from '@libs/market-guide-client';
import type { Logger } from '@libs/resilient-http-core';

/**
 * Runs `fn` against a freshly acquired market guide client and releases the
 * client afterwards.
 */
export type MarketGuideSession = <T>(fn: (guide: MarketGuideClient) => Promise<T>) => Promise<T>;

export interface ServerContext {
  session: MarketGuideSession;
  logger: Logger;
}
