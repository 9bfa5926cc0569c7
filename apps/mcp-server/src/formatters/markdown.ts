import type { FundInfo, StockInfo } from '@libs/market-guide-client';

const DEFAULT_CURRENCY = 'SEK';

/** Two decimals with an explicit sign, e.g. `+1.50`. */
export function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

/** Rounded to a whole number with thousands separators, e.g. `1,234,567`. */
export function grouped(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function formatStockMarkdown(stock: StockInfo): string {
  const quote = stock.quote;
  const currency = stock.listing?.currency ?? DEFAULT_CURRENCY;
  const lines = [
    `# ${stock.name}`,
    '',
    `**Price:** ${quote?.last ?? 'N/A'} ${currency}`,
    `**Change:** ${signed(quote?.change ?? 0)} (${signed(quote?.changePercent ?? 0)}%)`,
    '',
  ];

  const company = stock.company;
  if (company?.description) {
    lines.push('## Company', company.description, '');
  }
  const marketCap = company?.marketCapital;
  if (marketCap?.value != null) {
    lines.push(`**Market Cap:** ${grouped(marketCap.value)} ${marketCap.currency ?? currency}`);
  }

  const indicators = stock.keyIndicators;
  if (indicators) {
    lines.push('', '## Key Ratios');
    if (indicators.priceEarningsRatio != null) {
      lines.push(`- **P/E Ratio:** ${indicators.priceEarningsRatio.toFixed(2)}`);
    }
    if (indicators.directYield != null) {
      lines.push(`- **Dividend Yield:** ${indicators.directYield.toFixed(2)}%`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatFundMarkdown(fund: FundInfo): string {
  const lines = [`# ${fund.name}`, '', `**NAV:** ${fund.nav ?? 'N/A'} ${fund.currency ?? DEFAULT_CURRENCY}`, ''];

  if (fund.description) {
    lines.push(fund.description, '');
  }

  const development = fund.development;
  if (development) {
    lines.push('## Performance');
    const periods: Array<[string, number | null | undefined]> = [
      ['YTD', development.thisYear],
      ['1 Year', development.oneYear],
      ['3 Years', development.threeYears],
    ];
    for (const [label, value] of periods) {
      if (value != null) {
        lines.push(`- **${label}:** ${signed(value)}%`);
      }
    }
    lines.push('');
  }

  if (fund.risk != null) {
    lines.push(`**Risk Level:** ${fund.risk}/7`);
  }
  if (fund.fee?.ongoingCharges != null) {
    lines.push(`**Ongoing Charges:** ${fund.fee.ongoingCharges.toFixed(2)}%`);
  }

  return `${lines.join('\n')}\n`;
}
