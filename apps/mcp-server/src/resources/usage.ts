import { readFile } from 'fs/promises';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export const USAGE_DOCS = [
  {
    name: 'usage-guide',
    uri: 'market://docs/usage',
    file: 'usage.md',
    title: 'Usage guide',
    description: 'When to call the tools and when to hand over a script, with an endpoint reference',
  },
  {
    name: 'quick-start',
    uri: 'market://docs/quick-start',
    file: 'quick-start.md',
    title: 'Quick start',
    description: 'Short tool-or-script decision guide',
  },
] as const;

export function loadDoc(file: string): Promise<string> {
  return readFile(new URL(`./docs/${file}`, import.meta.url), 'utf8');
}

export function registerUsageResources(server: McpServer): void {
  for (const doc of USAGE_DOCS) {
    server.registerResource(
      doc.name,
      doc.uri,
      { title: doc.title, description: doc.description, mimeType: 'text/markdown' },
      async (uri) => ({
        contents: [{ uri: uri.href, mimeType: 'text/markdown', text: await loadDoc(doc.file) }],
      })
    );
  }
}
