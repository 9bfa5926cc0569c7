import { afterEach, describe, expect, it, vi } from 'vitest';
import { ClientStateError, type ConnectionPool, type JsonValue, type PoolRequest, type PoolResponse } from '@libs/resilient-http-core';
import { ResponseMappingError } from '../errors';
import {
  MarketGuideClient,
  createMarketGuideClientConfig,
  withMarketGuideSession,
  type JsonHttpClient,
} from '../marketGuideClient';

const createHttp = () => {
  const get = vi.fn(async (_path: string, _params?: Record<string, unknown>): Promise<JsonValue> => ({}));
  const post = vi.fn(async (_path: string, _body?: JsonValue): Promise<JsonValue> => ({}));
  const http: JsonHttpClient = { get, post };
  return { http, get, post };
};

describe('MarketGuideClient', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('fetches and maps stock info', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValueOnce({
      orderbookId: '5247',
      name: 'Example AB',
      quote: { last: 101.5 },
      listing: { currency: 'SEK' },
    });
    const guide = new MarketGuideClient(http);

    const info = await guide.getStockInfo('5247');

    expect(get).toHaveBeenCalledWith('/_api/market-guide/stock/5247', undefined);
    expect(info.name).toBe('Example AB');
    expect(info.quote?.last).toBe(101.5);
    expect(info.sectors).toEqual([]);
  });

  it('passes the chart period as a query parameter', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValue({ ohlc: [] });
    const guide = new MarketGuideClient(http);

    await guide.getStockChart('5247');
    await guide.getMarketMakerChart('5247');
    await guide.getStockChart('5247', 'five_years');

    expect(get.mock.calls).toEqual([
      ['/_api/price-chart/stock/5247', { timePeriod: 'one_year' }],
      ['/_api/price-chart/marketmaker/5247', { timePeriod: 'today' }],
      ['/_api/price-chart/stock/5247', { timePeriod: 'five_years' }],
    ]);
  });

  it('puts the fund chart period in the path', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValue({ id: '41567', dataSerie: [{ x: 1, y: 2.5 }] });
    const guide = new MarketGuideClient(http);

    const chart = await guide.getFundChart('41567');

    expect(get).toHaveBeenCalledWith('/_api/fund-guide/chart/41567/three_years', undefined);
    expect(chart.dataSerie[0].y).toBe(2.5);
  });

  it('maps list endpoints item by item', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValueOnce([
      { brokerCode: 'AVA', buyVolume: 100, sellVolume: 40, netBuyVolume: 60, brokerName: 'Broker A' },
      { brokerCode: 'NON', buyVolume: 1, sellVolume: 2, netBuyVolume: -1 },
    ]);
    const guide = new MarketGuideClient(http);

    const summaries = await guide.getBrokerTradeSummaries('5247');

    expect(summaries.map((summary) => summary.netBuyVolume)).toEqual([60, -1]);
  });

  it('returns an empty order book outside trading hours', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValueOnce({});
    const guide = new MarketGuideClient(http);

    await expect(guide.getOrderDepth('5247')).resolves.toEqual({ levels: [], extensions: {} });
  });

  it('derives dividends and financials from the analysis payload', async () => {
    const { http, get } = createHttp();
    const analysis = {
      dividendsByYear: [{ year: 2025, dividend: 5.5 }],
      companyFinancialsByYear: [{ year: 2025, sales: 1000 }],
      companyFinancialsByQuarter: [],
    };
    get.mockResolvedValue(analysis);
    const guide = new MarketGuideClient(http);

    await expect(guide.getDividends('5247')).resolves.toEqual({ dividendsByYear: [{ year: 2025, dividend: 5.5 }] });
    await expect(guide.getCompanyFinancials('5247')).resolves.toEqual({
      companyFinancialsByYear: [{ year: 2025, sales: 1000 }],
      companyFinancialsByQuarter: [],
      companyFinancialsByQuarterTTM: [],
    });
    expect(get).toHaveBeenCalledWith('/_api/market-guide/stock/5247/analysis', undefined);
  });

  it('derives fund holdings from the fund guide', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValueOnce({
      name: 'Example Global',
      countryChartData: [{ name: 'Sverige', y: 60 }],
      holdingChartData: [{ name: 'Example AB', y: 8.5 }],
      portfolioDate: '2025-09-30',
    });
    const guide = new MarketGuideClient(http);

    const holdings = await guide.getFundHoldings('878733');

    expect(holdings.portfolioDate).toBe('2025-09-30');
    expect(holdings.sectorChartData).toEqual([]);
    expect(holdings.countryChartData.map((entry) => entry.name)).toEqual(['Sverige']);
  });

  describe('search', () => {
    it('sends the query and limit, upper-casing the instrument type', async () => {
      const { http, post } = createHttp();
      post.mockResolvedValue({ totalNumberOfHits: 0, hits: [] });
      const guide = new MarketGuideClient(http);

      await guide.search('volvo', { instrumentType: 'stock', limit: 5 });
      await guide.search('volvo', { instrumentType: 'all' });

      expect(post.mock.calls).toEqual([
        ['/_api/search/filtered-search', { query: 'volvo', limit: 5, instrumentType: 'STOCK' }],
        ['/_api/search/filtered-search', { query: 'volvo', limit: 10 }],
      ]);
    });

    it('finds an instrument by order book id', async () => {
      const { http, post } = createHttp();
      post
        .mockResolvedValueOnce({ hits: [{ title: 'Example AB', orderBookId: '5247' }] })
        .mockResolvedValueOnce({ hits: [] });
      const guide = new MarketGuideClient(http);

      await expect(guide.findByOrderBookId('5247')).resolves.toMatchObject({ title: 'Example AB' });
      await expect(guide.findByOrderBookId('0')).resolves.toBeNull();
      expect(post).toHaveBeenNthCalledWith(1, '/_api/search/filtered-search', { query: '5247', limit: 1 });
    });
  });

  describe('filters', () => {
    it('fills filter defaults for certificates', async () => {
      const { http, post } = createHttp();
      post.mockResolvedValueOnce({ certificates: [], totalNumberOfOrderbooks: 0 });
      const guide = new MarketGuideClient(http);

      await guide.filterCertificates({ filter: { directions: ['long'] }, limit: 50 });

      expect(post).toHaveBeenCalledWith('/_api/market-certificate-filter/', {
        filter: {
          directions: ['long'],
          leverages: [],
          underlyingInstruments: [],
          categories: [],
          exposures: [],
          issuers: [],
        },
        offset: 0,
        limit: 50,
        sortBy: { field: 'name', order: 'asc' },
      });
    });

    it('keeps the empty default for filters passed as undefined', async () => {
      const { http, post } = createHttp();
      post.mockResolvedValueOnce({ warrants: [] });
      const guide = new MarketGuideClient(http);

      await guide.filterWarrants({ filter: { directions: undefined, issuers: ['Example Bank'] } });

      expect(post.mock.calls[0][1]).toMatchObject({
        filter: { directions: [], subTypes: [], issuers: ['Example Bank'], underlyingInstruments: [] },
      });
    });

    it('sorts ETFs by owners and futures by strike price by default', async () => {
      const { http, post } = createHttp();
      post.mockResolvedValue({});
      const guide = new MarketGuideClient(http);

      await guide.filterEtfs();
      await guide.listFuturesForwards({ offset: 20 });

      expect(post.mock.calls[0][1]).toMatchObject({ sortBy: { field: 'numberOfOwners', order: 'desc' }, limit: 20 });
      expect(post.mock.calls[1][0]).toBe('/_api/market-option-future-forward-list/matrix');
      expect(post.mock.calls[1][1]).toMatchObject({ sortBy: { field: 'strikePrice', order: 'desc' }, offset: 20 });
    });
  });

  it('raises ResponseMappingError for payloads with the wrong structure', async () => {
    const { http, get } = createHttp();
    get.mockResolvedValueOnce({ orderbookId: 5247 });
    const guide = new MarketGuideClient(http);

    const error = await guide.getStockInfo('5247').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResponseMappingError);
    expect(error).toMatchObject({
      path: '/_api/market-guide/stock/5247',
      message:
        'Unexpected response structure from /_api/market-guide/stock/5247: orderbookId: Expected string, received number; name: Required',
    });
  });
});

describe('createMarketGuideClientConfig', () => {
  it('uses defaults when the environment is empty', () => {
    expect(createMarketGuideClientConfig(undefined, {})).toEqual({
      clientName: 'market-guide-client',
      clientVersion: '1.0.0',
      baseUrl: 'https://www.avanza.se',
      readTimeoutMs: 30_000,
      connectTimeoutMs: 5_000,
      maxConnections: 10,
      maxKeepaliveConnections: 5,
      maxAttempts: 3,
    });
  });

  it('reads the environment and lets overrides win', () => {
    const config = createMarketGuideClientConfig(
      { maxAttempts: 5 },
      {
        MARKET_GUIDE_BASE_URL: 'https://market.test',
        MARKET_GUIDE_READ_TIMEOUT_MS: '1000',
        MARKET_GUIDE_MAX_ATTEMPTS: '2',
        MARKET_GUIDE_MAX_CONNECTIONS: 'lots',
      }
    );

    expect(config).toMatchObject({
      baseUrl: 'https://market.test',
      readTimeoutMs: 1_000,
      maxConnections: 10,
      maxAttempts: 5,
    });
  });
});

describe('withMarketGuideSession', () => {
  it.each([
    ['getTrades', '/_api/market-guide/stock/5247/trades'],
    ['getBrokerTradeSummaries', '/_api/market-guide/stock/5247/broker-trade-summaries'],
    ['getFundChartPeriods', '/_api/fund-guide/chart/timeperiods/5247'],
  ] as const)('reads an empty body from %s as an empty list', async (method, path) => {
    const request = vi.fn(async (_req: PoolRequest): Promise<PoolResponse> => ({ status: 200, headers: {}, body: '' }));
    const pool: ConnectionPool = { request, close: async () => undefined };

    const result = await withMarketGuideSession(
      createMarketGuideClientConfig({ baseUrl: 'https://market.test' }, {}),
      (guide) => guide[method]('5247'),
      { createPool: () => pool }
    );

    expect(result).toEqual([]);
    expect(request.mock.calls[0][0].path).toBe(path);
  });

  it('opens a pool for the session and releases it afterwards', async () => {
    const request = vi.fn(
      async (_req: PoolRequest): Promise<PoolResponse> => ({
        status: 200,
        headers: {},
        body: '{"orderbookId":"5247","numberOfOwners":12000}',
      })
    );
    const close = vi.fn(async () => undefined);
    const pool: ConnectionPool = { request, close };
    let escaped: MarketGuideClient | undefined;

    const owners = await withMarketGuideSession(
      createMarketGuideClientConfig({ baseUrl: 'https://market.test' }, {}),
      async (guide) => {
        escaped = guide;
        return guide.getNumberOfOwners('5247');
      },
      { createPool: () => pool }
    );

    expect(owners.numberOfOwners).toBe(12_000);
    expect(request.mock.calls[0][0].path).toBe('/_api/market-guide/number-of-owners/5247');
    expect(request.mock.calls[0][0].headers['user-agent']).toBe('market-guide-client/1.0.0');
    expect(close).toHaveBeenCalledTimes(1);
    await expect(escaped?.getShortSelling('5247')).rejects.toBeInstanceOf(ClientStateError);
  });
});
