import { ChartTimePeriodSchema } from '@libs/market-guide-client';
import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput } from './inputs';

export function instrumentDataTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'get_number_of_owners',
      title: 'Number of owners',
      description: 'How many account holders own the instrument, with the change over time.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getNumberOfOwners(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_short_selling',
      title: 'Short selling',
      description: 'Short interest of a stock as volume and percentage of shares outstanding.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getShortSelling(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_marketmaker_chart',
      title: 'Market maker chart',
      description: 'Market maker price series of an exchange traded product (default period today).',
      inputSchema: {
        ...instrumentIdInput,
        timePeriod: ChartTimePeriodSchema.default('today').describe('Chart period'),
      },
      handler: ({ instrumentId, timePeriod }) =>
        session((guide) => guide.getMarketMakerChart(instrumentId, timePeriod)),
    }),
  ];
}
