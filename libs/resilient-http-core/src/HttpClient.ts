import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { computeBackoffWithJitter } from './backoff';
import { ClientStateError, ConfigurationError, type UpstreamRequestError } from './errors';
import { noopLogger } from './logger';
import { classifyResponse, classifyTransportError, type AttemptOutcome } from './outcome';
import { createUndiciPool } from './transport/undiciPool';
import type {
  ConnectionPool,
  HttpHeaders,
  HttpMethod,
  JsonValue,
  Logger,
  PoolFactory,
  QueryParams,
  RequestAttempt,
  ResilientHttpClientConfig,
  ResilientHttpClientDeps,
} from './types';

export const DEFAULT_READ_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_CONNECTIONS = 10;
export const DEFAULT_MAX_KEEPALIVE_CONNECTIONS = 5;
export const DEFAULT_MAX_ATTEMPTS = 3;

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const positiveInt = z.number().int().positive();

const configSchema = z.object({
  baseUrl: z.string().refine(isHttpUrl, { message: 'must be an absolute http(s) URL' }),
  clientName: z.string().min(1),
  clientVersion: z.string().min(1),
  readTimeoutMs: positiveInt.default(DEFAULT_READ_TIMEOUT_MS),
  connectTimeoutMs: positiveInt.default(DEFAULT_CONNECT_TIMEOUT_MS),
  maxConnections: positiveInt.default(DEFAULT_MAX_CONNECTIONS),
  maxKeepaliveConnections: z.number().int().nonnegative().default(DEFAULT_MAX_KEEPALIVE_CONNECTIONS),
  maxAttempts: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
});

export type ResolvedClientConfig = z.infer<typeof configSchema>;

export function resolveClientConfig(config: ResilientHttpClientConfig): ResolvedClientConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid HTTP client configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Eight hex characters; only used to tie log lines of one call together. */
export function generateCorrelationId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

export function buildQueryString(params?: QueryParams): string {
  if (!params) {
    return '';
  }
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item !== undefined) {
        search.append(key, String(item));
      }
    }
  }
  const query = search.toString();
  return query === '' ? '' : `?${query}`;
}

type ClientState = 'idle' | 'open' | 'closed';

/**
 * JSON-over-HTTP client with a pooled connection resource, split connect and
 * read timeouts, and bounded retries of transient failures.
 *
 * The client must be opened before use and closed afterwards; prefer
 * {@link withHttpClient}, which guarantees the close.
 *
 * @example
 * ```typescript
 * const data = await withHttpClient(
 *   { baseUrl: 'https://api.example.com', clientName: 'example', clientVersion: '1.0.0' },
 *   (client) => client.get('/instruments/42')
 * );
 * ```
 */
export class ResilientHttpClient {
  private readonly config: ResolvedClientConfig;
  private readonly basePath: string;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly createPool: PoolFactory;
  private readonly nextCorrelationId: () => string;
  private state: ClientState = 'idle';
  private pool?: ConnectionPool;

  constructor(config: ResilientHttpClientConfig, deps: ResilientHttpClientDeps = {}) {
    this.config = resolveClientConfig(config);
    this.basePath = new URL(this.config.baseUrl).pathname.replace(/\/+$/, '');
    this.logger = deps.logger ?? noopLogger;
    this.sleep = deps.sleep ?? ((ms) => sleep(ms));
    this.random = deps.random ?? Math.random;
    this.createPool = deps.createPool ?? createUndiciPool;
    this.nextCorrelationId = deps.generateCorrelationId ?? generateCorrelationId;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /** Acquires the connection pool. No connection is made until the first request. */
  open(): this {
    if (this.state !== 'idle') {
      throw new ClientStateError(`Cannot open an HTTP client that is already ${this.state}`);
    }
    this.pool = this.createPool({
      baseUrl: this.config.baseUrl,
      connectTimeoutMs: this.config.connectTimeoutMs,
      readTimeoutMs: this.config.readTimeoutMs,
      maxConnections: this.config.maxConnections,
      maxKeepaliveConnections: this.config.maxKeepaliveConnections,
    });
    this.state = 'open';
    return this;
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.state = 'closed';
    this.pool = undefined;
    if (pool) {
      await pool.close();
    }
  }

  async get(path: string, params?: QueryParams): Promise<JsonValue> {
    return this.request('GET', `${path}${buildQueryString(params)}`);
  }

  async post(path: string, body?: JsonValue): Promise<JsonValue> {
    return this.request('POST', path, body === undefined ? undefined : JSON.stringify(body));
  }

  /** The pool to issue an attempt on; every attempt checks, including retries. */
  private requirePool(method: HttpMethod, path: string): ConnectionPool {
    const pool = this.pool;
    if (this.state !== 'open' || !pool) {
      throw new ClientStateError(
        this.state === 'idle'
          ? `Cannot ${method} ${path}: HTTP client has not been opened`
          : `Cannot ${method} ${path}: HTTP client has been closed`
      );
    }
    return pool;
  }

  private async request(method: HttpMethod, path: string, body?: string): Promise<JsonValue> {
    this.requirePool(method, path);

    const correlationId = this.nextCorrelationId();
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt += 1) {
      const pool = this.requirePool(method, path);
      const context: RequestAttempt = { method, path, correlationId, attempt };
      this.logger.debug('http.request.attempt', { ...context, maxAttempts });

      const outcome = await this.executeAttempt(pool, context, body);

      if (outcome.kind === 'success') {
        this.logger.debug('http.request.success', { ...context, status: outcome.status });
        return outcome.value;
      }

      if (outcome.kind === 'permanent') {
        this.logFailure(outcome.error, context, outcome.status);
        throw outcome.error;
      }

      if (attempt >= maxAttempts) {
        this.logFailure(outcome.error, context, outcome.status, outcome.reason);
        throw outcome.error;
      }

      const delayMs = computeBackoffWithJitter(attempt, this.random);
      this.logger.warn('http.request.retry', {
        ...context,
        status: outcome.status,
        reason: outcome.reason,
        delayMs,
        error: outcome.error.message,
      });
      await this.sleep(delayMs);
    }
  }

  private async executeAttempt(pool: ConnectionPool, context: RequestAttempt, body?: string): Promise<AttemptOutcome> {
    const headers: HttpHeaders = {
      'user-agent': `${this.config.clientName}/${this.config.clientVersion}`,
      accept: 'application/json',
    };
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    const controller = new AbortController();
    let deadlineExceeded = false;
    const deadline = setTimeout(() => {
      deadlineExceeded = true;
      controller.abort();
    }, this.config.connectTimeoutMs + this.config.readTimeoutMs);

    try {
      const response = await pool.request({
        method: context.method,
        path: `${this.basePath}${context.path}`,
        headers,
        body,
        signal: controller.signal,
      });
      return classifyResponse(response, context);
    } catch (error) {
      return classifyTransportError(error, context, deadlineExceeded);
    } finally {
      clearTimeout(deadline);
    }
  }

  private logFailure(error: UpstreamRequestError, context: RequestAttempt, status?: number, reason?: string): void {
    const meta = { ...context, status, reason, kind: error.kind, error: error.message };
    if (error.retryable || (status !== undefined && status >= 500)) {
      this.logger.error('http.request.failed', meta);
    } else {
      this.logger.warn('http.request.failed', meta);
    }
  }
}

/**
 * Opens a client, runs `fn` with it and closes it on every exit path.
 */
export async function withHttpClient<T>(
  config: ResilientHttpClientConfig,
  fn: (client: ResilientHttpClient) => Promise<T>,
  deps?: ResilientHttpClientDeps
): Promise<T> {
  const client = new ResilientHttpClient(config, deps).open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
