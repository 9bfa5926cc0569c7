import { z } from 'zod';
import { userPrompt } from './message';

export const TOOL_THRESHOLD = 20;
export const SCRIPT_THRESHOLD = 50;

export type Approach = 'tools' | 'ask' | 'script';

export function chooseApproach(estimatedItems: number): Approach {
  if (estimatedItems <= TOOL_THRESHOLD) {
    return 'tools';
  }
  if (estimatedItems <= SCRIPT_THRESHOLD) {
    return 'ask';
  }
  return 'script';
}

const APPROACH_TEXT: Record<Approach, { decision: string; reason: string; plan: string }> = {
  tools: {
    decision: 'USE MCP TOOLS',
    reason: 'small enough for interactive exploration',
    plan: 'I will fetch the data interactively with the tools.',
  },
  ask: {
    decision: 'ASK USER PREFERENCE',
    reason: 'tools work, but a script is faster',
    plan: 'I will ask whether you prefer the tools (interactive) or a script (faster).',
  },
  script: {
    decision: 'PROVIDE SCRIPT',
    reason: 'too many items for tool calls; a script is much more efficient',
    plan: 'I will provide a Node.js or shell script for bulk fetching.',
  },
};

export const decideToolOrScriptPrompt = {
  name: 'decide_tool_or_script',
  config: {
    title: 'Decide Tool or Script',
    description: 'Decide between tool calls and a script based on how many items a request needs',
    argsSchema: {
      userRequest: z.string().min(1).describe('What the user wants to do'),
      estimatedItems: z.string().regex(/^\d+$/, 'must be a whole number').describe('Estimated number of items'),
    },
  },
  handler: ({ userRequest, estimatedItems }: { userRequest: string; estimatedItems: string }) => {
    const count = Number(estimatedItems);
    const approach = APPROACH_TEXT[chooseApproach(count)];
    const sections = [
      `Request: "${userRequest}"`,
      `Estimated items: ${count}`,
      '',
      `## Decision: ${approach.decision}`,
      '',
      `**Reason**: ${approach.reason}`,
      '',
      `**Approach**: ${approach.plan}`,
    ];
    if (count > TOOL_THRESHOLD) {
      sections.push(
        '',
        '## Script Template',
        '',
        '```js',
        'const results = [];',
        'for (const id of ids) {',
        '  const res = await fetch(`https://www.avanza.se/_api/market-guide/stock/${id}`);',
        '  if (res.ok) results.push(await res.json());',
        '  await new Promise((resolve) => setTimeout(resolve, 500));',
        '}',
        '```',
        '',
        `Endpoint reference: market://docs/usage`
      );
    }
    return userPrompt(`${approach.decision.toLowerCase()} for ${count} items`, sections.join('\n'));
  },
};

interface FilterGuide {
  endpoint: string;
  params: string[];
}

export const FILTER_GUIDES: Record<string, FilterGuide> = {
  certificates: {
    endpoint: 'market-certificate-filter',
    params: [
      '`directions`: ["long", "short"]',
      '`leverages`: [1, 2, 3, ...]',
      '`issuers`: issuer names',
      '`categories`, `exposures`: category and exposure names',
      '`underlyingInstruments`: order book ids',
    ],
  },
  etfs: {
    endpoint: 'market-etf-filter',
    params: [
      '`exposures`: ["usa", "europe", "global", ...]',
      '`assetCategories`: ["stock", "bond", "commodity", ...]',
      '`riskScores`: ["risk_one", "risk_two", ...]',
      '`currencyCodes`: ["SEK", "USD", ...]',
    ],
  },
  warrants: {
    endpoint: 'market-warrant-filter',
    params: [
      '`directions`: ["long", "short"]',
      '`subTypes`: ["TURBO", "MINI", ...]',
      '`issuers`: issuer names',
      '`underlyingInstruments`: order book ids',
    ],
  },
};

export const filterLargeDatasetPrompt = {
  name: 'filter_large_dataset',
  config: {
    title: 'Filter Large Dataset',
    description: 'Screen many certificates, ETFs or warrants through the filter endpoint instead of looping over tools',
    argsSchema: {
      instrumentType: z.string().min(1).describe('"certificates", "etfs" or "warrants"'),
      criteria: z.string().min(1).describe('Screening criteria in plain words'),
    },
  },
  handler: ({ instrumentType, criteria }: { instrumentType: string; criteria: string }) => {
    const key = instrumentType.trim().toLowerCase();
    const guide = Object.hasOwn(FILTER_GUIDES, key) ? FILTER_GUIDES[key] : undefined;
    const endpoint = guide?.endpoint ?? 'market-certificate-filter';
    const params = guide ? guide.params.map((param) => `- ${param}`).join('\n') : 'Check the API documentation.';

    return userPrompt(
      `Screen ${instrumentType} by ${criteria}`,
      `To screen ${instrumentType} with criteria: ${criteria}

## Use the filter endpoint directly

Do not call the tools in a loop. One request returns up to 100 instruments:

\`\`\`bash
curl 'https://www.avanza.se/_api/${endpoint}/' \\
  -H 'Content-Type: application/json' \\
  --data-raw '{"filter": {}, "offset": 0, "limit": 100, "sortBy": {"field": "name", "order": "asc"}}' \\
  > results.json
\`\`\`

## Available filter parameters

${params}

## Pagination

Read totalNumberOfOrderbooks from the response and repeat the request with
offset 100, 200, ... until every page is fetched.

## Afterwards

1. Analyze patterns in the saved results.
2. Pick interesting instruments for a closer look with the tools.`
    );
  },
};
