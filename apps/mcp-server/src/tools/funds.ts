import { FundChartTimePeriodSchema } from '@libs/market-guide-client';
import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput } from './inputs';

export function fundTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'get_fund_info',
      title: 'Fund info',
      description:
        'NAV, performance by period, fees, risk, rating, Sharpe ratio, fund company and allocations for a mutual fund.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFundInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_fund_sustainability',
      title: 'Fund sustainability',
      description: 'ESG scores, carbon metrics, product involvements and sustainability goals of a fund.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFundSustainability(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_fund_chart',
      title: 'Fund performance chart',
      description: 'Performance series of a fund over a time period (default three_years).',
      inputSchema: {
        ...instrumentIdInput,
        timePeriod: FundChartTimePeriodSchema.default('three_years').describe('Chart period'),
      },
      handler: ({ instrumentId, timePeriod }) => session((guide) => guide.getFundChart(instrumentId, timePeriod)),
    }),
    defineTool(context, {
      name: 'get_fund_chart_periods',
      title: 'Fund period returns',
      description: 'Return of a fund for each standard period (one week to ten years).',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFundChartPeriods(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_fund_description',
      title: 'Fund description',
      description: 'Descriptive text of a fund and its category.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFundDescription(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_fund_holdings',
      title: 'Fund holdings',
      description: 'Country, sector and top holding allocations of a fund with the portfolio date.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFundHoldings(instrumentId)),
    }),
  ];
}
