import type { ServerContext } from '../context';
import { defineTool, type ToolEntry } from './defineTool';
import { instrumentIdInput, pagingInput, stringFilter, toPaging } from './inputs';

export function etfTools(context: ServerContext): ToolEntry[] {
  const { session } = context;
  return [
    defineTool(context, {
      name: 'filter_etfs',
      title: 'Filter ETFs',
      description:
        'List exchange traded funds filtered by asset category, sub category, exposure, risk score, direction, issuer and currency, with paging. Sorted by number of owners by default.',
      inputSchema: {
        ...pagingInput('numberOfOwners', 'desc'),
        assetCategories: stringFilter('Asset categories, e.g. ["STOCK"]'),
        subCategories: stringFilter('Sub categories'),
        exposures: stringFilter('Exposures, e.g. ["usa"]'),
        riskScores: stringFilter('Risk scores'),
        directions: stringFilter('Directions'),
        issuers: stringFilter('Issuer names'),
        currencyCodes: stringFilter('Currency codes, e.g. ["SEK"]'),
      },
      handler: ({ assetCategories, subCategories, exposures, riskScores, directions, issuers, currencyCodes, ...paging }) =>
        session((guide) =>
          guide.filterEtfs({
            filter: { assetCategories, subCategories, exposures, riskScores, directions, issuers, currencyCodes },
            ...toPaging(paging),
          })
        ),
    }),
    defineTool(context, {
      name: 'get_etf_info',
      title: 'ETF info',
      description: 'Quote, key indicators, fees and listing of an exchange traded fund.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getEtfInfo(instrumentId)),
    }),
    defineTool(context, {
      name: 'get_etf_details',
      title: 'ETF details',
      description: 'Extended details of an exchange traded fund, returned as received.',
      inputSchema: instrumentIdInput,
      handler: ({ instrumentId }) => session((guide) => guide.getEtfDetails(instrumentId)),
    }),
  ];
}
