import { describe, expect, it } from 'vitest';
import { loadDoc, USAGE_DOCS } from '../resources/usage';
import { readFundPage, readStockPage } from '../resources/instruments';
import { createTestContext } from './testContext';

describe('instrument pages', () => {
  it('renders the stock page from stock info', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValueOnce({ orderbookId: '5247', name: 'Example AB', quote: { last: 50 } });

    const page = await readStockPage(context, '5247');

    expect(get).toHaveBeenCalledWith('/_api/market-guide/stock/5247', undefined);
    expect(page.split('\n').slice(0, 3)).toEqual(['# Example AB', '', '**Price:** 50 SEK']);
  });

  it('renders the fund page from fund info', async () => {
    const { context, get } = createTestContext();
    get.mockResolvedValueOnce({ name: 'Example Fund', nav: '101.2', currency: 'EUR' });

    const page = await readFundPage(context, '41567');

    expect(get).toHaveBeenCalledWith('/_api/fund-guide/guide/41567', undefined);
    expect(page).toBe('# Example Fund\n\n**NAV:** 101.2 EUR\n\n');
  });
});

describe('usage docs', () => {
  it('ships a markdown file for every documented uri', async () => {
    expect(USAGE_DOCS.map((doc) => doc.uri)).toEqual(['market://docs/usage', 'market://docs/quick-start']);

    const usage = await loadDoc('usage.md');
    const quickStart = await loadDoc('quick-start.md');

    expect(usage.split('\n')[0]).toBe('# Market Guide MCP Server: Usage Guide');
    expect(quickStart.split('\n')[0]).toBe('# Market Guide MCP: Quick Decision Guide');
  });
});
