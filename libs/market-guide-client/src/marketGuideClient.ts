import type { z } from 'zod';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_MAX_KEEPALIVE_CONNECTIONS,
  DEFAULT_READ_TIMEOUT_MS,
  noopLogger,
  withHttpClient,
  type JsonValue,
  type Logger,
  type QueryParams,
  type ResilientHttpClientConfig,
  type ResilientHttpClientDeps,
} from '@libs/resilient-http-core';
import { resolveEndpoint, type ResolvedEndpoint } from './endpoints';
import { ResponseMappingError } from './errors';
import { listOf, toWire } from './records';
import {
  BrokerTradeSummarySchema,
  CertificateDetailsSchema,
  CertificateFilterResponseSchema,
  CertificateInfoSchema,
  ChartDataSchema,
  DEFAULT_FILTER_LIMIT,
  EtfDetailsSchema,
  EtfFilterResponseSchema,
  EtfInfoSchema,
  FundChartPeriodSchema,
  FundChartSchema,
  FundDescriptionSchema,
  FundInfoSchema,
  FundSustainabilitySchema,
  FutureForwardDetailsSchema,
  FutureForwardFilterOptionsSchema,
  FutureForwardInfoSchema,
  FutureForwardMatrixSchema,
  MarketplaceInfoSchema,
  NumberOfOwnersSchema,
  OrderDepthSchema,
  QuoteSchema,
  SearchResponseSchema,
  ShortSellingSchema,
  StockAnalysisSchema,
  StockInfoSchema,
  TradeSchema,
  type BrokerTradeSummary,
  type CertificateDetails,
  type CertificateFilter,
  type CertificateFilterResponse,
  type CertificateInfo,
  type ChartData,
  type ChartTimePeriod,
  type CompanyFinancials,
  type Dividends,
  type EtfDetails,
  type EtfFilter,
  type EtfFilterResponse,
  type EtfInfo,
  type FilterRequest,
  type FundChart,
  type FundChartPeriod,
  type FundChartTimePeriod,
  type FundDescription,
  type FundHoldings,
  type FundInfo,
  type FundSustainability,
  type FutureForwardDetails,
  type FutureForwardFilter,
  type FutureForwardFilterOptions,
  type FutureForwardInfo,
  type FutureForwardMatrix,
  type MarketplaceInfo,
  type NumberOfOwners,
  type OrderDepth,
  type Quote,
  type SearchHit,
  type SearchResponse,
  type ShortSelling,
  type SortCriteria,
  type StockAnalysis,
  type StockInfo,
  type Trade,
  type WarrantDetails,
  type WarrantFilter,
  type WarrantFilterResponse,
  type WarrantInfo,
  WarrantDetailsSchema,
  WarrantFilterResponseSchema,
  WarrantInfoSchema,
} from './schemas';
import { CLIENT_NAME, CLIENT_VERSION } from './version';

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_BASE_URL = 'https://www.avanza.se';
export const DEFAULT_SEARCH_LIMIT = 10;

export type MarketGuideClientConfig = Omit<ResilientHttpClientConfig, 'clientName' | 'clientVersion'>;

/**
 * Builds the HTTP client configuration from MARKET_GUIDE_* environment
 * variables, letting explicit overrides win.
 */
export function createMarketGuideClientConfig(
  configOverrides?: Partial<MarketGuideClientConfig>,
  env: NodeJS.ProcessEnv = process.env
): ResilientHttpClientConfig {
  return {
    clientName: CLIENT_NAME,
    clientVersion: CLIENT_VERSION,
    baseUrl: env.MARKET_GUIDE_BASE_URL || DEFAULT_BASE_URL,
    readTimeoutMs: parseNumberOrDefault(env.MARKET_GUIDE_READ_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS),
    connectTimeoutMs: parseNumberOrDefault(env.MARKET_GUIDE_CONNECT_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS),
    maxConnections: parseNumberOrDefault(env.MARKET_GUIDE_MAX_CONNECTIONS, DEFAULT_MAX_CONNECTIONS),
    maxKeepaliveConnections: parseNumberOrDefault(env.MARKET_GUIDE_MAX_KEEPALIVE, DEFAULT_MAX_KEEPALIVE_CONNECTIONS),
    maxAttempts: parseNumberOrDefault(env.MARKET_GUIDE_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    ...configOverrides,
  };
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// ============================================================================
// Client
// ============================================================================

/** The part of the HTTP client the market guide needs. */
export interface JsonHttpClient {
  get(path: string, params?: QueryParams): Promise<JsonValue>;
  post(path: string, body?: JsonValue): Promise<JsonValue>;
}

export interface SearchOptions {
  /** `stock`, `fund`, ... or `all`; case-insensitive. */
  instrumentType?: string;
  limit?: number;
}

export type FilterOptions<Filter> = {
  filter?: Partial<Filter>;
  offset?: number;
  limit?: number;
  sortBy?: SortCriteria;
};

const EMPTY_CERTIFICATE_FILTER: CertificateFilter = {
  directions: [],
  leverages: [],
  underlyingInstruments: [],
  categories: [],
  exposures: [],
  issuers: [],
};

const EMPTY_WARRANT_FILTER: WarrantFilter = {
  directions: [],
  subTypes: [],
  issuers: [],
  underlyingInstruments: [],
};

const EMPTY_ETF_FILTER: EtfFilter = {
  assetCategories: [],
  subCategories: [],
  exposures: [],
  riskScores: [],
  directions: [],
  issuers: [],
  currencyCodes: [],
};

const EMPTY_FUTURE_FORWARD_FILTER: FutureForwardFilter = {
  underlyingInstruments: [],
  optionTypes: [],
  endDates: [],
  callIndicators: [],
};

function buildFilterRequest<Filter extends object>(
  empty: Filter,
  options: FilterOptions<Filter>,
  defaultSort: SortCriteria
): FilterRequest<Filter> {
  const filter: Filter = { ...empty };
  for (const key in empty) {
    const value = options.filter?.[key];
    if (value !== undefined) {
      filter[key] = value;
    }
  }
  return {
    filter,
    offset: options.offset ?? 0,
    limit: options.limit ?? DEFAULT_FILTER_LIMIT,
    sortBy: options.sortBy ?? defaultSort,
  };
}

/**
 * Typed access to the public market guide. Every method resolves its
 * endpoint from the catalog, performs one call and maps the payload.
 *
 * @example
 * ```typescript
 * const info = await withMarketGuideSession(createMarketGuideClientConfig(), (guide) =>
 *   guide.getStockInfo('5247')
 * );
 * ```
 */
export class MarketGuideClient {
  constructor(
    private readonly http: JsonHttpClient,
    private readonly logger: Logger = noopLogger
  ) {}

  // --------------------------------------------------------------------------
  // Search
  // --------------------------------------------------------------------------

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const payload: { [key: string]: JsonValue } = {
      query,
      limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
    };
    const instrumentType = options.instrumentType?.trim();
    if (instrumentType && instrumentType.toLowerCase() !== 'all') {
      payload.instrumentType = instrumentType.toUpperCase();
    }
    return this.postJson(SearchResponseSchema, resolveEndpoint('search'), payload);
  }

  /** First search hit for an order book id, or null. */
  async findByOrderBookId(orderBookId: string): Promise<SearchHit | null> {
    const response = await this.search(orderBookId, { limit: 1 });
    return response.hits[0] ?? null;
  }

  // --------------------------------------------------------------------------
  // Stocks
  // --------------------------------------------------------------------------

  async getStockInfo(id: string): Promise<StockInfo> {
    return this.getJson(StockInfoSchema, resolveEndpoint('stockInfo', { id }));
  }

  async getStockAnalysis(id: string): Promise<StockAnalysis> {
    return this.getJson(StockAnalysisSchema, resolveEndpoint('stockAnalysis', { id }));
  }

  async getStockQuote(id: string): Promise<Quote> {
    return this.getJson(QuoteSchema, resolveEndpoint('stockQuote', { id }));
  }

  async getMarketplaceInfo(id: string): Promise<MarketplaceInfo> {
    return this.getJson(MarketplaceInfoSchema, resolveEndpoint('stockMarketplace', { id }));
  }

  async getOrderDepth(id: string): Promise<OrderDepth> {
    return this.getJson(OrderDepthSchema, resolveEndpoint('stockOrderDepth', { id }));
  }

  async getTrades(id: string): Promise<Trade[]> {
    return this.getJson(listOf(TradeSchema), resolveEndpoint('stockTrades', { id }));
  }

  async getBrokerTradeSummaries(id: string): Promise<BrokerTradeSummary[]> {
    return this.getJson(listOf(BrokerTradeSummarySchema), resolveEndpoint('stockBrokerTradeSummaries', { id }));
  }

  async getStockChart(id: string, timePeriod: ChartTimePeriod = 'one_year'): Promise<ChartData> {
    return this.getJson(ChartDataSchema, resolveEndpoint('stockChart', { id }), { timePeriod });
  }

  async getDividends(id: string): Promise<Dividends> {
    const analysis = await this.getStockAnalysis(id);
    return { dividendsByYear: analysis.dividendsByYear };
  }

  async getCompanyFinancials(id: string): Promise<CompanyFinancials> {
    const analysis = await this.getStockAnalysis(id);
    return {
      companyFinancialsByYear: analysis.companyFinancialsByYear,
      companyFinancialsByQuarter: analysis.companyFinancialsByQuarter,
      companyFinancialsByQuarterTTM: analysis.companyFinancialsByQuarterTTM,
    };
  }

  // --------------------------------------------------------------------------
  // Funds
  // --------------------------------------------------------------------------

  async getFundInfo(id: string): Promise<FundInfo> {
    return this.getJson(FundInfoSchema, resolveEndpoint('fundInfo', { id }));
  }

  async getFundHoldings(id: string): Promise<FundHoldings> {
    const fund = await this.getFundInfo(id);
    return {
      countryChartData: fund.countryChartData,
      sectorChartData: fund.sectorChartData,
      holdingChartData: fund.holdingChartData,
      portfolioDate: fund.portfolioDate ?? null,
    };
  }

  async getFundSustainability(id: string): Promise<FundSustainability> {
    return this.getJson(FundSustainabilitySchema, resolveEndpoint('fundSustainability', { id }));
  }

  async getFundChart(id: string, timePeriod: FundChartTimePeriod = 'three_years'): Promise<FundChart> {
    return this.getJson(FundChartSchema, resolveEndpoint('fundChart', { id, timePeriod }));
  }

  async getFundChartPeriods(id: string): Promise<FundChartPeriod[]> {
    return this.getJson(listOf(FundChartPeriodSchema), resolveEndpoint('fundChartPeriods', { id }));
  }

  async getFundDescription(id: string): Promise<FundDescription> {
    return this.getJson(FundDescriptionSchema, resolveEndpoint('fundDescription', { id }));
  }

  // --------------------------------------------------------------------------
  // Certificates, warrants, ETFs
  // --------------------------------------------------------------------------

  async filterCertificates(options: FilterOptions<CertificateFilter> = {}): Promise<CertificateFilterResponse> {
    const request = buildFilterRequest(EMPTY_CERTIFICATE_FILTER, options, { field: 'name', order: 'asc' });
    return this.postJson(CertificateFilterResponseSchema, resolveEndpoint('certificateFilter'), toWire(request));
  }

  async getCertificateInfo(id: string): Promise<CertificateInfo> {
    return this.getJson(CertificateInfoSchema, resolveEndpoint('certificateInfo', { id }));
  }

  async getCertificateDetails(id: string): Promise<CertificateDetails> {
    return this.getJson(CertificateDetailsSchema, resolveEndpoint('certificateDetails', { id }));
  }

  async filterWarrants(options: FilterOptions<WarrantFilter> = {}): Promise<WarrantFilterResponse> {
    const request = buildFilterRequest(EMPTY_WARRANT_FILTER, options, { field: 'name', order: 'asc' });
    return this.postJson(WarrantFilterResponseSchema, resolveEndpoint('warrantFilter'), toWire(request));
  }

  async getWarrantInfo(id: string): Promise<WarrantInfo> {
    return this.getJson(WarrantInfoSchema, resolveEndpoint('warrantInfo', { id }));
  }

  async getWarrantDetails(id: string): Promise<WarrantDetails> {
    return this.getJson(WarrantDetailsSchema, resolveEndpoint('warrantDetails', { id }));
  }

  async filterEtfs(options: FilterOptions<EtfFilter> = {}): Promise<EtfFilterResponse> {
    const request = buildFilterRequest(EMPTY_ETF_FILTER, options, { field: 'numberOfOwners', order: 'desc' });
    return this.postJson(EtfFilterResponseSchema, resolveEndpoint('etfFilter'), toWire(request));
  }

  async getEtfInfo(id: string): Promise<EtfInfo> {
    return this.getJson(EtfInfoSchema, resolveEndpoint('etfInfo', { id }));
  }

  async getEtfDetails(id: string): Promise<EtfDetails> {
    return this.getJson(EtfDetailsSchema, resolveEndpoint('etfDetails', { id }));
  }

  // --------------------------------------------------------------------------
  // Futures and forwards
  // --------------------------------------------------------------------------

  async listFuturesForwards(options: FilterOptions<FutureForwardFilter> = {}): Promise<FutureForwardMatrix> {
    const request = buildFilterRequest(EMPTY_FUTURE_FORWARD_FILTER, options, { field: 'strikePrice', order: 'desc' });
    return this.postJson(FutureForwardMatrixSchema, resolveEndpoint('futureForwardMatrix'), toWire(request));
  }

  async getFutureForwardFilterOptions(): Promise<FutureForwardFilterOptions> {
    return this.getJson(FutureForwardFilterOptionsSchema, resolveEndpoint('futureForwardFilterOptions'));
  }

  async getFutureForwardInfo(id: string): Promise<FutureForwardInfo> {
    return this.getJson(FutureForwardInfoSchema, resolveEndpoint('futureForwardInfo', { id }));
  }

  async getFutureForwardDetails(id: string): Promise<FutureForwardDetails> {
    return this.getJson(FutureForwardDetailsSchema, resolveEndpoint('futureForwardDetails', { id }));
  }

  // --------------------------------------------------------------------------
  // Ownership, short interest, market makers
  // --------------------------------------------------------------------------

  async getNumberOfOwners(id: string): Promise<NumberOfOwners> {
    return this.getJson(NumberOfOwnersSchema, resolveEndpoint('numberOfOwners', { id }));
  }

  async getShortSelling(id: string): Promise<ShortSelling> {
    return this.getJson(ShortSellingSchema, resolveEndpoint('shortSelling', { id }));
  }

  async getMarketMakerChart(id: string, timePeriod: ChartTimePeriod = 'today'): Promise<ChartData> {
    return this.getJson(ChartDataSchema, resolveEndpoint('marketMakerChart', { id }), { timePeriod });
  }

  // --------------------------------------------------------------------------
  // Plumbing
  // --------------------------------------------------------------------------

  private async getJson<Output>(
    schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
    endpoint: ResolvedEndpoint,
    params?: QueryParams
  ): Promise<Output> {
    const payload = await this.http.get(endpoint.path, params);
    return this.map(schema, endpoint, payload);
  }

  private async postJson<Output>(
    schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
    endpoint: ResolvedEndpoint,
    body: JsonValue
  ): Promise<Output> {
    const payload = await this.http.post(endpoint.path, body);
    return this.map(schema, endpoint, payload);
  }

  private map<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, endpoint: ResolvedEndpoint, payload: JsonValue): Output {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn('market_guide.response.invalid', {
        endpoint: endpoint.name,
        path: endpoint.path,
        issues: parsed.error.issues.length,
      });
      throw new ResponseMappingError(endpoint.path, parsed.error.issues);
    }
    return parsed.data;
  }
}

/**
 * Opens an HTTP client for the duration of `fn` and hands it a
 * MarketGuideClient. The connection pool is released on every exit path.
 */
export async function withMarketGuideSession<T>(
  config: ResilientHttpClientConfig,
  fn: (guide: MarketGuideClient) => Promise<T>,
  deps: ResilientHttpClientDeps = {}
): Promise<T> {
  return withHttpClient(config, (http) => fn(new MarketGuideClient(http, deps.logger)), deps);
}
