import { z } from 'zod';
import { userPrompt } from './message';

const DEFAULT_MIN_YIELD = 3;

/**
 * Walks through a single-stock analysis: lookup, fundamentals, price trend,
 * liquidity and ownership.
 */
export const analyzeStockPrompt = {
  name: 'analyze_stock',
  config: {
    title: 'Analyze Stock',
    description: 'Comprehensive analysis of one stock: valuation, trend, liquidity and risks',
    argsSchema: {
      stockSymbol: z.string().min(1).describe('Ticker symbol or company name, e.g. "VOLV B"'),
    },
  },
  handler: ({ stockSymbol }: { stockSymbol: string }) =>
    userPrompt(
      `Analyze ${stockSymbol}`,
      `Please perform a comprehensive analysis of ${stockSymbol}:

1. **Find the stock**: use search_instruments with instrumentType "stock" to get its order book id.
2. **Fundamentals**: use get_stock_info for price, company description, sector and key ratios (P/E, dividend yield, market cap).
3. **Price trend**: use get_stock_chart with timePeriod "one_year".
4. **Financials**: use get_company_financials for revenue and earnings development.
5. **Liquidity**: use get_orderbook and get_recent_trades.
6. **Sentiment**: use get_number_of_owners and get_short_selling.

Based on this data, provide:
- a valuation assessment (over- or undervalued relative to its ratios)
- the recent price momentum
- key risks and opportunities
- an overall investment perspective

Stick to facts from the data returned.`
    ),
};

export function splitNames(list: string): string[] {
  return list
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');
}

export const compareFundsPrompt = {
  name: 'compare_funds',
  config: {
    title: 'Compare Funds',
    description: 'Side-by-side comparison of funds on performance, risk and fees',
    argsSchema: {
      fundNames: z.string().min(1).describe('Comma-separated fund names, e.g. "Fund A, Fund B"'),
    },
  },
  handler: ({ fundNames }: { fundNames: string }) => {
    const funds = splitNames(fundNames);
    const header = `| Metric | ${funds.join(' | ')} |`;
    const divider = `|--------|${funds.map(() => '-----|').join('')}`;
    const row = (metric: string) => `| ${metric} |${funds.map(() => ' ... |').join('')}`;
    const table = [
      header,
      divider,
      ...['NAV', 'YTD Return', '1Y Return', '3Y Return', '5Y Return', 'Risk Level (1-7)', 'Ongoing Charges', 'Fund Size'].map(row),
    ].join('\n');

    return userPrompt(
      `Compare ${funds.length} funds`,
      `Compare the following funds:
${funds.map((fund) => `- ${fund}`).join('\n')}

For each fund:
1. **Find the fund**: use search_instruments with instrumentType "fund".
2. **Details**: use get_fund_info for NAV, performance by period, risk, fees and size.
3. **Holdings**: use get_fund_holdings for country, sector and top holding allocations.

Then fill in this comparison:

${table}

Conclude with:
- which fund has the best risk-adjusted return
- which has the lowest fees
- a recommendation based on the comparison`
    );
  },
};

export const screenDividendStocksPrompt = {
  name: 'screen_dividend_stocks',
  config: {
    title: 'Screen Dividend Stocks',
    description: 'Find stocks whose dividend yield is above a minimum',
    argsSchema: {
      minYield: z
        .string()
        .regex(/^\d+(\.\d+)?$/, 'must be a number')
        .optional()
        .describe(`Minimum dividend yield in percent (default ${DEFAULT_MIN_YIELD})`),
    },
  },
  handler: ({ minYield }: { minYield?: string }) => {
    const threshold = minYield === undefined ? DEFAULT_MIN_YIELD : Number(minYield);
    return userPrompt(
      `Dividend stocks yielding at least ${threshold}%`,
      `Help me find dividend stocks with a yield of at least ${threshold}%.

Process:
1. Search for major Swedish stocks with search_instruments (instrumentType "stock").
2. For each candidate, use get_stock_info and read keyIndicators.directYield.
3. Keep stocks whose directYield is ${threshold} or higher.
4. For the remaining stocks, use get_dividends to check the dividend history.

Present the results as a table:

| Stock | Ticker | Price | Dividend Yield | P/E Ratio | Market Cap |
|-------|--------|-------|----------------|-----------|------------|
| ...   | ...    | ...   | ...%           | ...       | ...        |

Sort by dividend yield, highest first, and add:
- a short sustainability assessment based on P/E and dividend history
- notable risks

If more than 20 stocks need checking, suggest a script instead (see market://docs/usage).`
    );
  },
};
