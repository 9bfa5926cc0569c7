import {
  ApiError,
  AuthError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  RequestTimeoutError,
  type UpstreamRequestError,
} from './errors';
import type { JsonValue, PoolResponse, RequestAttempt } from './types';

export type RetryReason = 'timeout' | 'network' | 'server';

/**
 * Result of evaluating one attempt. The retry loop only ever looks at `kind`;
 * nothing is thrown to signal a retry.
 */
export type AttemptOutcome =
  | { kind: 'success'; status: number; value: JsonValue }
  | { kind: 'retryable'; reason: RetryReason; status?: number; error: UpstreamRequestError }
  | { kind: 'permanent'; status: number; error: UpstreamRequestError };

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
]);

type DecodedBody = { ok: true; value: JsonValue } | { ok: false };

function decodeBody(text: string): DecodedBody {
  if (text.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function upstreamMessage(status: number, text: string, decoded: DecodedBody): string {
  if (decoded.ok && decoded.value !== null && typeof decoded.value === 'object' && !Array.isArray(decoded.value)) {
    const message = decoded.value.message;
    if (typeof message === 'string' && message !== '') {
      return message;
    }
  }
  return text.trim() === '' ? `HTTP ${status}` : text;
}

/**
 * `Retry-After` as whole seconds. HTTP dates and anything else that is not a
 * non-negative integer are ignored.
 */
export function parseRetryAfterSeconds(header: string | undefined): number | undefined {
  if (header === undefined) {
    return undefined;
  }
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

export function classifyResponse(response: PoolResponse, context: RequestAttempt): AttemptOutcome {
  const { status, body } = response;
  const decoded = decodeBody(body);

  if (status >= 200 && status < 300) {
    if (!decoded.ok) {
      return {
        kind: 'permanent',
        status,
        error: new ApiError(context, status, `response body is not valid JSON: ${body}`),
      };
    }
    return { kind: 'success', status, value: decoded.value };
  }

  const message = upstreamMessage(status, body, decoded);
  const errorBody = decoded.ok ? decoded.value : undefined;

  if (status >= 500) {
    return { kind: 'retryable', reason: 'server', status, error: new ApiError(context, status, message, errorBody) };
  }

  switch (status) {
    case 404:
      return { kind: 'permanent', status, error: new NotFoundError(context, message) };
    case 401:
    case 403:
      return { kind: 'permanent', status, error: new AuthError(context, status, message) };
    case 429:
      return {
        kind: 'permanent',
        status,
        error: new RateLimitError(context, parseRetryAfterSeconds(response.headers['retry-after']), message),
      };
    default:
      return { kind: 'permanent', status, error: new ApiError(context, status, message, errorBody) };
  }
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isTimeoutError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return true;
  }
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Transport exceptions. `deadlineExceeded` is set when the attempt's own
 * deadline aborted the request, whatever error the transport surfaced for it.
 */
export function classifyTransportError(
  error: unknown,
  context: RequestAttempt,
  deadlineExceeded = false
): AttemptOutcome {
  const detail = error instanceof Error ? error.message : String(error);
  if (deadlineExceeded || isTimeoutError(error)) {
    return { kind: 'retryable', reason: 'timeout', error: new RequestTimeoutError(context, detail, error) };
  }
  const code = errorCode(error);
  return {
    kind: 'retryable',
    reason: 'network',
    error: new NetworkError(context, code === undefined ? detail : `${code} ${detail}`, error),
  };
}
