import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { toWire } from '@libs/market-guide-client';
import type { ServerContext } from '../context';

export interface ToolDefinition<Shape extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputSchema: Shape;
  handler: (args: z.objectOutputType<Shape, z.ZodTypeAny>) => Promise<unknown>;
}

/** A tool with its input type erased, ready to be listed and registered. */
export interface ToolEntry {
  name: string;
  title: string;
  description: string;
  run(args: unknown): Promise<CallToolResult>;
  register(server: McpServer): void;
}

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

function describeIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Wraps a handler so that its result is returned as wire-form JSON and any
 * failure becomes a tool error carrying the failure's message.
 */
export function defineTool<Shape extends z.ZodRawShape>(
  context: ServerContext,
  definition: ToolDefinition<Shape>
): ToolEntry {
  const schema = z.object(definition.inputSchema);
  const { name, title, description } = definition;

  const run = async (args: unknown): Promise<CallToolResult> => {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      return errorResult(`Invalid arguments for ${name}: ${describeIssues(parsed.error.issues)}`);
    }
    try {
      const result = await definition.handler(parsed.data);
      return textResult(JSON.stringify(toWire(result), null, 2));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.error('tool.call.failed', {
        tool: name,
        error: message,
        errorName: error instanceof Error ? error.name : undefined,
      });
      return errorResult(message);
    }
  };

  return {
    name,
    title,
    description,
    run,
    register(server: McpServer) {
      const inputSchema: z.ZodRawShape = definition.inputSchema;
      server.registerTool(name, { title, description, inputSchema }, (args) => run(args));
    },
  };
}
