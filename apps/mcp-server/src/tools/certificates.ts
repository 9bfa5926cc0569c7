import { z } from 'zod';
import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput, pagingInput, stringFilter, toPaging } from './inputs';

export function certificateTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'filter_certificates',
      title: 'Filter certificates',
      description:
        'List certificates filtered by direction, leverage, issuer, category, exposure and underlying instrument, with paging.',
      inputSchema: {
        ...pagingInput('name', 'asc'),
        directions: stringFilter('Directions, e.g. ["long"]'),
        leverages: z.array(z.number()).optional().describe('Leverage values, e.g. [1, 2]'),
        issuers: stringFilter('Issuer names'),
        categories: stringFilter('Categories'),
        exposures: stringFilter('Exposures'),
        underlyingInstruments: stringFilter('Order book ids of underlying instruments'),
      },
      handler: ({ directions, leverages, issuers, categories, exposures, underlyingInstruments, ...paging }) =>
        session((guide) =>
          guide.filterCertificates({
            filter: { directions, leverages, issuers, categories, exposures, underlyingInstruments },
            ...toPaging(paging),
          })
        ),
    }),
    defineTool(context, {
      name: 'get_certificate_info',
      title: 'Certificate info',
      description: 'Quote, leverage, direction, issuer, underlying and price history of a certificate.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getCertificateInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_certificate_details',
      title: 'Certificate details',
      description: 'Extended details of a certificate, returned as received.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getCertificateDetails(instrumentId)),
    }),
  ];
}
