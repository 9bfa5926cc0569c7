import { ChartTimePeriodSchema } from '@libs/market-guide-client';
import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput } from './inputs';

export function stockTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'get_stock_info',
      title: 'Stock info',
      description:
        'Company details, listing, sectors, key indicators (P/E, dividend yield, market cap), quote and historical closing prices for a stock.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getStockInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_stock_analysis',
      title: 'Stock analysis',
      description: 'Yearly and quarterly company financials and dividends by year for a stock.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getStockAnalysis(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_stock_quote',
      title: 'Stock quote',
      description: 'Real-time quote for a stock: buy, sell, last, high, low, change and traded volume.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getStockQuote(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_marketplace_info',
      title: 'Marketplace status',
      description: 'Whether the market of a stock is open, with opening and closing times.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getMarketplaceInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_orderbook',
      title: 'Order book depth',
      description: 'Buy and sell levels of the order book. Empty outside trading hours.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getOrderDepth(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_recent_trades',
      title: 'Recent trades',
      description: 'Latest executed trades with price, volume, buyer and seller.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getTrades(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_broker_trade_summary',
      title: 'Broker trade summary',
      description: 'Buy, sell and net volume per broker for today.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getBrokerTradeSummaries(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_stock_chart',
      title: 'Stock price chart',
      description: 'OHLC price series for a stock over a time period (default one_year).',
      inputSchema: {
        ...instrumentIdInput,
        timePeriod: ChartTimePeriodSchema.default('one_year').describe('Chart period'),
      },
      handler: ({ instrumentId, timePeriod }) => session((guide) => guide.getStockChart(instrumentId, timePeriod)),
    }),
    defineTool(context, {
      name: 'get_dividends',
      title: 'Dividend history',
      description: 'Dividends by year for a stock.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getDividends(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_company_financials',
      title: 'Company financials',
      description: 'Revenue, earnings and margins by year, by quarter and trailing twelve months.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getCompanyFinancials(instrumentId)),
    }),
  ];
}

