/**
 * Resilient JSON-over-HTTP client.
 *
 * - Pooled connections (undici) with separate connect and read timeouts
 * - Bounded retries with exponential backoff for timeouts, network failures and 5xx
 * - A closed error taxonomy; permanent errors are never retried
 * - Correlation ids shared by all attempts of a call, present in every log line and error
 */
export * from './types';
export * from './errors';
export * from './backoff';
export * from './logger';
export { classifyResponse, classifyTransportError, parseRetryAfterSeconds } from './outcome';
export type { AttemptOutcome, RetryReason } from './outcome';
export {
  ResilientHttpClient,
  withHttpClient,
  resolveClientConfig,
  generateCorrelationId,
  buildQueryString,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_MAX_KEEPALIVE_CONNECTIONS,
  DEFAULT_MAX_ATTEMPTS,
} from './HttpClient';
export type { ResolvedClientConfig } from './HttpClient';
export { createUndiciPool, createDispatcherPool } from './transport/undiciPool';
