import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput, pagingInput, stringFilter, toPaging } from './inputs';

export function warrantTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'filter_warrants',
      title: 'Filter warrants',
      description: 'List warrants filtered by direction, sub type, issuer and underlying instrument, with paging.',
      inputSchema: {
        ...pagingInput('name', 'asc'),
        directions: stringFilter('Directions, e.g. ["long"]'),
        subTypes: stringFilter('Sub types, e.g. ["TURBO", "MINI"]'),
        issuers: stringFilter('Issuer names'),
        underlyingInstruments: stringFilter('Order book ids of underlying instruments'),
      },
      handler: ({ directions, subTypes, issuers, underlyingInstruments, ...paging }) =>
        session((guide) =>
          guide.filterWarrants({
            filter: { directions, subTypes, issuers, underlyingInstruments },
            ...toPaging(paging),
          })
        ),
    }),
    defineTool(context, {
      name: 'get_warrant_info',
      title: 'Warrant info',
      description: 'Quote, sub type, direction, issuer and underlying of a warrant.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getWarrantInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_warrant_details',
      title: 'Warrant details',
      description: 'Extended details of a warrant, returned as received.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getWarrantDetails(instrumentId)),
    }),
  ];
}
