import type { z } from 'zod';

/**
 * A catalog template was filled with the wrong set of placeholders. This is a
 * programming error and never reaches the upstream.
 */
export class EndpointTemplateError extends Error {
  constructor(
    readonly template: string,
    readonly missing: string[],
    readonly unexpected: string[]
  ) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing ${missing.map((name) => `{${name}}`).join(', ')}`);
    }
    if (unexpected.length > 0) {
      parts.push(`unexpected ${unexpected.join(', ')}`);
    }
    super(`Cannot fill endpoint template ${template}: ${parts.join('; ')}`);
    this.name = 'EndpointTemplateError';
  }
}

/**
 * The upstream answered successfully but the payload does not have the
 * expected structure.
 */
export class ResponseMappingError extends Error {
  constructor(
    readonly path: string,
    readonly issues: z.ZodIssue[]
  ) {
    const summary = issues
      .slice(0, 5)
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Unexpected response structure from ${path}: ${summary}`);
    this.name = 'ResponseMappingError';
  }
}
