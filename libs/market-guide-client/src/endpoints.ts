import { EndpointTemplateError } from './errors';

type EndpointDefinition = {
  method: 'GET' | 'POST';
  template: string;
};

export const ENDPOINTS = {
  search: { method: 'POST', template: '/_api/search/filtered-search' },

  stockInfo: { method: 'GET', template: '/_api/market-guide/stock/{id}' },
  stockAnalysis: { method: 'GET', template: '/_api/market-guide/stock/{id}/analysis' },
  stockQuote: { method: 'GET', template: '/_api/market-guide/stock/{id}/quote' },
  stockMarketplace: { method: 'GET', template: '/_api/market-guide/stock/{id}/marketplace' },
  stockOrderDepth: { method: 'GET', template: '/_api/market-guide/stock/{id}/orderdepth' },
  stockTrades: { method: 'GET', template: '/_api/market-guide/stock/{id}/trades' },
  stockBrokerTradeSummaries: { method: 'GET', template: '/_api/market-guide/stock/{id}/broker-trade-summaries' },
  stockChart: { method: 'GET', template: '/_api/price-chart/stock/{id}' },
  marketMakerChart: { method: 'GET', template: '/_api/price-chart/marketmaker/{id}' },

  fundInfo: { method: 'GET', template: '/_api/fund-guide/guide/{id}' },
  fundSustainability: { method: 'GET', template: '/_api/fund-reference/sustainability/{id}' },
  fundChart: { method: 'GET', template: '/_api/fund-guide/chart/{id}/{timePeriod}' },
  fundChartPeriods: { method: 'GET', template: '/_api/fund-guide/chart/timeperiods/{id}' },
  fundDescription: { method: 'GET', template: '/_api/fund-guide/description/{id}' },

  certificateFilter: { method: 'POST', template: '/_api/market-certificate-filter/' },
  certificateInfo: { method: 'GET', template: '/_api/market-guide/certificate/{id}' },
  certificateDetails: { method: 'GET', template: '/_api/market-guide/certificate/{id}/details' },

  warrantFilter: { method: 'POST', template: '/_api/market-warrant-filter/' },
  warrantInfo: { method: 'GET', template: '/_api/market-guide/warrant/{id}' },
  warrantDetails: { method: 'GET', template: '/_api/market-guide/warrant/{id}/details' },

  etfFilter: { method: 'POST', template: '/_api/market-etf-filter/' },
  etfInfo: { method: 'GET', template: '/_api/market-etf/{id}' },
  etfDetails: { method: 'GET', template: '/_api/market-etf/{id}/details' },

  futureForwardMatrix: { method: 'POST', template: '/_api/market-option-future-forward-list/matrix' },
  futureForwardFilterOptions: { method: 'GET', template: '/_api/market-option-future-forward-list/filter-options' },
  futureForwardInfo: { method: 'GET', template: '/_api/market-guide/futureforward/{id}' },
  futureForwardDetails: { method: 'GET', template: '/_api/market-guide/futureforward/{id}/details' },

  numberOfOwners: { method: 'GET', template: '/_api/market-guide/number-of-owners/{id}' },
  shortSelling: { method: 'GET', template: '/_api/market-guide/short-selling/{id}' },
} as const satisfies Record<string, EndpointDefinition>;

export type EndpointName = keyof typeof ENDPOINTS;

/** Placeholder names of a template, extracted at compile time. */
export type PlaceholderOf<Template extends string> = Template extends `${string}{${infer Name}}${infer Rest}`
  ? Name | PlaceholderOf<Rest>
  : never;

export type EndpointParams<Name extends EndpointName> = {
  [Key in PlaceholderOf<(typeof ENDPOINTS)[Name]['template']>]: string | number;
};

type ParamsArgs<Name extends EndpointName> = [PlaceholderOf<(typeof ENDPOINTS)[Name]['template']>] extends [never]
  ? []
  : [params: EndpointParams<Name>];

export type TemplateParams = Readonly<Record<string, string | number | undefined>>;

export interface ResolvedEndpoint {
  name: EndpointName;
  method: 'GET' | 'POST';
  path: string;
}

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function placeholdersOf(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}

/**
 * Substitutes every `{name}` in `template`. The supplied names must match the
 * template's placeholders exactly; empty values count as missing.
 */
export function fillTemplate(template: string, params: TemplateParams): string {
  const required = placeholdersOf(template);
  const supplied = Object.keys(params).filter((key) => {
    const value = params[key];
    return value !== undefined && String(value) !== '';
  });
  const missing = required.filter((name) => !supplied.includes(name));
  const unexpected = Object.keys(params).filter((key) => !required.includes(key));
  if (missing.length > 0 || unexpected.length > 0) {
    throw new EndpointTemplateError(template, missing, unexpected);
  }
  return template.replace(PLACEHOLDER, (_match, name: string) => encodeURIComponent(String(params[name])));
}

export function resolveEndpoint<Name extends EndpointName>(name: Name, ...args: ParamsArgs<Name>): ResolvedEndpoint;
export function resolveEndpoint(name: EndpointName, params: TemplateParams = {}): ResolvedEndpoint {
  const { method, template } = ENDPOINTS[name];
  return { name, method, path: fillTemplate(template, params) };
}
