import { describe, expect, it } from 'vitest';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { analyzeStockPrompt, compareFundsPrompt, screenDividendStocksPrompt, splitNames } from '../prompts/analysis';
import { PROMPT_NAMES } from '../prompts';
import { chooseApproach, decideToolOrScriptPrompt, filterLargeDatasetPrompt } from '../prompts/workflows';

function textOf(result: GetPromptResult): string {
  const [message] = result.messages;
  if (!message || message.content.type !== 'text') {
    throw new Error('expected one text message');
  }
  return message.content.text;
}

describe('prompts', () => {
  it('exposes the five workflow prompts', () => {
    expect(PROMPT_NAMES).toEqual([
      'analyze_stock',
      'compare_funds',
      'screen_dividend_stocks',
      'decide_tool_or_script',
      'filter_large_dataset',
    ]);
  });

  it('addresses the analysis to the requested stock', () => {
    const result = analyzeStockPrompt.handler({ stockSymbol: 'VOLV B' });

    expect(result.description).toBe('Analyze VOLV B');
    expect(result.messages[0]?.role).toBe('user');
    expect(textOf(result).split('\n')[0]).toBe('Please perform a comprehensive analysis of VOLV B:');
  });

  it('builds one comparison column per fund', () => {
    const result = compareFundsPrompt.handler({ fundNames: 'Alpha, Beta,' });
    const lines = textOf(result).split('\n');

    expect(result.description).toBe('Compare 2 funds');
    expect(lines).toContain('- Alpha');
    expect(lines).toContain('| Metric | Alpha | Beta |');
    expect(lines).toContain('|--------|-----|-----|');
    expect(lines).toContain('| NAV | ... | ... |');
  });

  it('splits comma-separated names and drops blanks', () => {
    expect(splitNames(' A ,B,, C ')).toEqual(['A', 'B', 'C']);
  });

  it('defaults the dividend threshold to 3%', () => {
    expect(screenDividendStocksPrompt.handler({}).description).toBe('Dividend stocks yielding at least 3%');
    expect(screenDividendStocksPrompt.handler({ minYield: '4.5' }).description).toBe(
      'Dividend stocks yielding at least 4.5%'
    );
  });

  it.each([
    [1, 'tools'],
    [20, 'tools'],
    [21, 'ask'],
    [50, 'ask'],
    [51, 'script'],
  ] as const)('chooses %s items -> %s', (items, approach) => {
    expect(chooseApproach(items)).toBe(approach);
  });

  it('includes a script template only above the tool threshold', () => {
    const bulk = decideToolOrScriptPrompt.handler({ userRequest: 'Analyze all stocks', estimatedItems: '60' });
    const small = decideToolOrScriptPrompt.handler({ userRequest: 'Check Volvo', estimatedItems: '5' });

    expect(bulk.description).toBe('provide script for 60 items');
    expect(textOf(bulk).split('\n')).toContain('## Decision: PROVIDE SCRIPT');
    expect(textOf(bulk).split('\n')).toContain('## Script Template');
    expect(textOf(small).split('\n')).toContain('## Decision: USE MCP TOOLS');
    expect(textOf(small).split('\n')).not.toContain('## Script Template');
  });

  it('points the filter guide at the endpoint of the instrument type', () => {
    const lines = textOf(filterLargeDatasetPrompt.handler({ instrumentType: 'ETFs', criteria: 'USA exposure' })).split('\n');

    expect(lines).toContain("curl 'https://www.avanza.se/_api/market-etf-filter/' \\");
    expect(lines).toContain('- `currencyCodes`: ["SEK", "USD", ...]');
  });

  it('falls back to a generic note for unknown instrument types', () => {
    const lines = textOf(filterLargeDatasetPrompt.handler({ instrumentType: 'bonds', criteria: 'low risk' })).split('\n');

    expect(lines).toContain('Check the API documentation.');
    expect(lines).toContain("curl 'https://www.avanza.se/_api/market-certificate-filter/' \\");
  });
});
