import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput, pagingInput, stringFilter, toPaging } from './inputs';

export function futureForwardTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'list_futures_forwards',
      title: 'List futures and forwards',
      description:
        'Matrix of futures and forwards filtered by underlying instrument, option type, end date and call indicator. ' +
        'Use get_future_forward_filter_options to discover valid filter values.',
      inputSchema: {
        ...pagingInput('strikePrice', 'desc'),
        underlyingInstruments: stringFilter('Order book ids of underlying instruments'),
        optionTypes: stringFilter('Option types'),
        endDates: stringFilter('End dates, YYYY-MM-DD'),
        callIndicators: stringFilter('Call indicators'),
      },
      handler: ({ underlyingInstruments, optionTypes, endDates, callIndicators, ...paging }) =>
        session((guide) =>
          guide.listFuturesForwards({
            filter: { underlyingInstruments, optionTypes, endDates, callIndicators },
            ...toPaging(paging),
          })
        ),
    }),
    defineTool(context, {
      name: 'get_future_forward_filter_options',
      title: 'Future/forward filter options',
      description: 'Valid values for each future/forward filter.',
      inputSchema: {},
      handler: () => session((guide) => guide.getFutureForwardFilterOptions()),
    }),
    defineTool(context, {
      name: 'get_future_forward_info',
      title: 'Future/forward info',
      description: 'Quote, key indicators and underlying of a future or forward.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFutureForwardInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_future_forward_details',
      title: 'Future/forward details',
      description: 'Extended details of a future or forward, returned as received.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getFutureForwardDetails(instrumentId)),
    }),
  ];
}
