import { describe, expect, it } from 'vitest';
import { buildToolRegistry } from '../tools/registry';
import type { ToolEntry } from '../tools/defineTool';
import { createTestContext } from './testContext';

const EXPECTED_TOOLS = [
  'search_instruments',
  'get_instrument_by_order_book_id',
  'get_stock_info',
  'get_stock_analysis',
  'get_stock_quote',
  'get_marketplace_info',
  'get_orderbook',
  'get_recent_trades',
  'get_broker_trade_summary',
  'get_stock_chart',
  'get_dividends',
  'get_company_financials',
  'get_fund_info',
  'get_fund_sustainability',
  'get_fund_chart',
  'get_fund_chart_periods',
  'get_fund_description',
  'get_fund_holdings',
  'filter_certificates',
  'get_certificate_info',
  'get_certificate_details',
  'filter_warrants',
  'get_warrant_info',
  'get_warrant_details',
  'filter_etfs',
  'get_etf_info',
  'get_etf_details',
  'list_futures_forwards',
  'get_future_forward_filter_options',
  'get_future_forward_info',
  'get_future_forward_details',
  'get_number_of_owners',
  'get_short_selling',
  'get_marketmaker_chart',
];

function findTool(entries: ToolEntry[], name: string): ToolEntry {
  const entry = entries.find((candidate) => candidate.name === name);
  if (!entry) {
    throw new Error(`tool ${name} is not registered`);
  }
  return entry;
}

function textOf(result: Awaited<ReturnType<ToolEntry['run']>>): string {
  const [first] = result.content;
  if (!first || first.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

describe('buildToolRegistry', () => {
  it('lists every tool exactly once', () => {
    const { context } = createTestContext();
    const names = buildToolRegistry(context).map((entry) => entry.name);

    expect(names).toEqual(EXPECTED_TOOLS);
    expect(new Set(names).size).toBe(34);
  });

  it('gives every tool a description', () => {
    const { context } = createTestContext();
    for (const entry of buildToolRegistry(context)) {
      expect(entry.description.length).toBeGreaterThan(0);
    }
  });
});

describe('tool execution', () => {
  it('returns the wire form of the mapped record as pretty JSON', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValueOnce({ last: 100, change: 1.5, extra: 'x' });

    const result = await findTool(buildToolRegistry(context), 'get_stock_quote').run({ instrumentId: '5247' });

    expect(get).toHaveBeenCalledWith('/_api/market-guide/stock/5247/quote', undefined);
    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe(JSON.stringify({ last: 100, change: 1.5, extra: 'x' }, null, 2));
  });

  it('restores the wire name of renamed fields', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValueOnce({ ohlc: [{ timestamp: 1, close: 10 }], from: '2025-01-01', to: '2025-12-31' });

    const result = await findTool(buildToolRegistry(context), 'get_stock_chart').run({ instrumentId: '5247' });

    expect(get).toHaveBeenCalledWith('/_api/price-chart/stock/5247', { timePeriod: 'one_year' });
    expect(JSON.parse(textOf(result))).toEqual({
      ohlc: [{ timestamp: 1, close: 10 }],
      from: '2025-01-01',
      to: '2025-12-31',
    });
  });

  it('uses three_years for fund charts unless told otherwise', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValue({ dataSerie: [] });
    const tool = findTool(buildToolRegistry(context), 'get_fund_chart');

    await tool.run({ instrumentId: '41567' });
    await tool.run({ instrumentId: '41567', timePeriod: 'ten_years' });

    expect(get.mock.calls).toEqual([
      ['/_api/fund-guide/chart/41567/three_years', undefined],
      ['/_api/fund-guide/chart/41567/ten_years', undefined],
    ]);
  });

  it('clamps the search limit to 1-50 and upper-cases the instrument type', async () => {
    const { context, post } = createTestContext();
    post.mockResolvedValue({ totalNumberOfHits: 1, hits: [{ title: 'Volvo B', orderBookId: '5269' }] });
    const tool = findTool(buildToolRegistry(context), 'search_instruments');

    const result = await tool.run({ query: 'Volvo', instrumentType: 'stock', limit: 500 });
    await tool.run({ query: 'Volvo', limit: 0 });

    expect(post.mock.calls).toEqual([
      ['/_api/search/filtered-search', { query: 'Volvo', limit: 50, instrumentType: 'STOCK' }],
      ['/_api/search/filtered-search', { query: 'Volvo', limit: 1 }],
    ]);
    expect(JSON.parse(textOf(result))).toEqual({
      totalNumberOfHits: 1,
      hits: [{ title: 'Volvo B', orderBookId: '5269', stockSectors: [], fundTags: [] }],
    });
  });

  it('returns null when no instrument matches an order book id', async () => {
    const { context, post } = createTestContext();
    post.mockResolvedValueOnce({ hits: [] });

    const result = await findTool(buildToolRegistry(context), 'get_instrument_by_order_book_id').run({
      orderBookId: '999999',
    });

    expect(post).toHaveBeenCalledWith('/_api/search/filtered-search', { query: '999999', limit: 1 });
    expect(textOf(result)).toBe('null');
  });

  it('caps filter limits at 100 and fills unset filters with empty lists', async () => {
    const { context, post } = createTestContext();
    post.mockResolvedValueOnce({ certificates: [] });

    await findTool(buildToolRegistry(context), 'filter_certificates').run({ directions: ['long'], limit: 250 });

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
      limit: 100,
      sortBy: { field: 'name', order: 'asc' },
    });
  });

  it('applies per-category default sorting', async () => {
    const { context, post } = createTestContext();
    post.mockResolvedValue({});
    const entries = buildToolRegistry(context);

    await findTool(entries, 'filter_etfs').run({ offset: 40, limit: 20 });
    await findTool(entries, 'list_futures_forwards').run({});

    expect(post.mock.calls[0]?.[1]).toMatchObject({ offset: 40, limit: 20, sortBy: { field: 'numberOfOwners', order: 'desc' } });
    expect(post.mock.calls[1]?.[1]).toMatchObject({ offset: 0, limit: 20, sortBy: { field: 'strikePrice', order: 'desc' } });
  });

  it('rejects a negative offset before calling upstream', async () => {
    const { context, post } = createTestContext();

    const result = await findTool(buildToolRegistry(context), 'filter_warrants').run({ offset: -1 });

    expect(post).not.toHaveBeenCalled();
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error: Invalid arguments for filter_warrants: offset: Number must be greater than or equal to 0');
  });

  it('reports missing arguments as a tool error', async () => {
    const { context, get } = createTestContext();

    const result = await findTool(buildToolRegistry(context), 'get_stock_info').run({});

    expect(get).not.toHaveBeenCalled();
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Invalid arguments for get_stock_info: instrumentId: Required' }],
      isError: true,
    });
  });

  it('turns upstream failures into tool errors and logs them', async () => {
    const { context, get, logger } = createTestContext();
    get.mockRejectedValueOnce(new Error('boom'));

    const result = await findTool(buildToolRegistry(context), 'get_short_selling').run({ instrumentId: '5247' });

    expect(result).toEqual({ content: [{ type: 'text', text: 'Error: boom' }], isError: true });
    expect(logger.error).toHaveBeenCalledWith('tool.call.failed', {
      tool: 'get_short_selling',
      error: 'boom',
      errorName: 'Error',
    });
  });

  it('reports responses that do not match the expected structure', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValueOnce({});

    const result = await findTool(buildToolRegistry(context), 'get_stock_info').run({ instrumentId: '5247' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'Error: Unexpected response structure from /_api/market-guide/stock/5247: orderbookId: Required; name: Required'
    );
  });
});
