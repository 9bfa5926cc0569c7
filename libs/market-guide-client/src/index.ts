/**
 * Market guide client
 *
 * Read-only, typed access to the public market guide API: stocks, funds,
 * certificates, warrants, ETFs, futures/forwards, search, ownership and
 * short-selling data.
 *
 * @example
 * ```typescript
 * import { createMarketGuideClientConfig, withMarketGuideSession } from '@libs/market-guide-client';
 *
 * const quote = await withMarketGuideSession(createMarketGuideClientConfig(), (guide) =>
 *   guide.getStockQuote('5247')
 * );
 * ```
 *
 * Environment variables:
 * - MARKET_GUIDE_BASE_URL (default: https://www.avanza.se)
 * - MARKET_GUIDE_READ_TIMEOUT_MS (default: 30000)
 * - MARKET_GUIDE_CONNECT_TIMEOUT_MS (default: 5000)
 * - MARKET_GUIDE_MAX_CONNECTIONS (default: 10)
 * - MARKET_GUIDE_MAX_KEEPALIVE (default: 5)
 * - MARKET_GUIDE_MAX_ATTEMPTS (default: 3)
 */

export * from './schemas';
export * from './endpoints';
export * from './errors';
export { record, toWire, opt, list, listOf, numeric } from './records';
export type { Extensions, RecordOf, RecordSchema } from './records';
export {
  MarketGuideClient,
  createMarketGuideClientConfig,
  withMarketGuideSession,
  DEFAULT_BASE_URL,
  DEFAULT_SEARCH_LIMIT,
} from './marketGuideClient';
export type { FilterOptions, JsonHttpClient, MarketGuideClientConfig, SearchOptions } from './marketGuideClient';
export { CLIENT_NAME, CLIENT_VERSION } from './version';
