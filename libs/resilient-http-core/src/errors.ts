import type { HttpMethod, JsonValue, RequestAttempt } from './types';

export const MAX_UPSTREAM_MESSAGE_LENGTH = 200;

export function truncateUpstreamMessage(text: string, maxLength = MAX_UPSTREAM_MESSAGE_LENGTH): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function describeAttempt(context: Pick<RequestAttempt, 'correlationId' | 'method' | 'path'>): string {
  return `[${context.correlationId}] ${context.method} ${context.path}`;
}

export type UpstreamErrorKind = 'not_found' | 'auth' | 'rate_limited' | 'timeout' | 'network' | 'api';

/**
 * Base class of every failure the upstream API (or the path to it) can produce.
 * Messages always start with the correlation id, method and path.
 */
export abstract class UpstreamRequestError extends Error {
  abstract readonly kind: UpstreamErrorKind;
  abstract readonly retryable: boolean;
  readonly correlationId: string;
  readonly method: HttpMethod;
  readonly path: string;

  protected constructor(context: RequestAttempt, detail: string, options?: { cause?: unknown }) {
    super(`${describeAttempt(context)} ${detail}`, options);
    this.name = new.target.name;
    this.correlationId = context.correlationId;
    this.method = context.method;
    this.path = context.path;
  }
}

export class NotFoundError extends UpstreamRequestError {
  readonly kind = 'not_found';
  readonly retryable = false;
  readonly status = 404;

  constructor(context: RequestAttempt, upstreamMessage: string) {
    super(context, `not found (404): ${truncateUpstreamMessage(upstreamMessage)}`);
  }
}

export class AuthError extends UpstreamRequestError {
  readonly kind = 'auth';
  readonly retryable = false;

  constructor(
    context: RequestAttempt,
    readonly status: 401 | 403,
    upstreamMessage: string
  ) {
    super(context, `authorization failed (${status}): ${truncateUpstreamMessage(upstreamMessage)}`);
  }
}

export class RateLimitError extends UpstreamRequestError {
  readonly kind = 'rate_limited';
  readonly retryable = false;
  readonly status = 429;

  constructor(
    context: RequestAttempt,
    readonly retryAfterSeconds: number | undefined,
    upstreamMessage: string
  ) {
    const hint = retryAfterSeconds === undefined ? '' : ` (retry after ${retryAfterSeconds}s)`;
    super(context, `rate limited (429)${hint}: ${truncateUpstreamMessage(upstreamMessage)}`);
  }
}

export class RequestTimeoutError extends UpstreamRequestError {
  readonly kind = 'timeout';
  readonly retryable = true;

  constructor(context: RequestAttempt, detail: string, cause?: unknown) {
    super(context, `timed out on attempt ${context.attempt}: ${truncateUpstreamMessage(detail)}`, { cause });
  }
}

export class NetworkError extends UpstreamRequestError {
  readonly kind = 'network';
  readonly retryable = true;

  constructor(context: RequestAttempt, detail: string, cause?: unknown) {
    super(context, `network failure on attempt ${context.attempt}: ${truncateUpstreamMessage(detail)}`, { cause });
  }
}

/**
 * Any other non-success status, a body that is not JSON, or a server error
 * that outlived the retry budget.
 */
export class ApiError extends UpstreamRequestError {
  readonly kind = 'api';
  readonly retryable = false;

  constructor(
    context: RequestAttempt,
    readonly status: number,
    upstreamMessage: string,
    readonly body?: JsonValue
  ) {
    super(context, `failed with status ${status}: ${truncateUpstreamMessage(upstreamMessage)}`);
  }
}

// ============================================================================
// Programming errors: never produced by the upstream, never retried
// ============================================================================

export class ClientStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClientStateError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}
