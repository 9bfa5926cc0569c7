// ============================================================================
// JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ============================================================================
// Requests
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * One attempt of an external call. The correlation id is shared by every
 * attempt of the same call.
 */
export interface RequestAttempt {
  method: HttpMethod;
  path: string;
  correlationId: string;
  attempt: number;
}

// ============================================================================
// Transport
// ============================================================================

export interface PoolRequest {
  method: HttpMethod;
  /** Path relative to the pool origin, including the query string. */
  path: string;
  headers: HttpHeaders;
  body?: string;
  signal: AbortSignal;
}

export interface PoolResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: HttpHeaders;
  body: string;
}

/**
 * Pooled connections bound to a single origin. Safe for concurrent use by
 * independent calls.
 */
export interface ConnectionPool {
  request(req: PoolRequest): Promise<PoolResponse>;
  close(): Promise<void>;
}

export interface PoolOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxConnections: number;
  maxKeepaliveConnections: number;
}

export type PoolFactory = (options: PoolOptions) => ConnectionPool;

// ============================================================================
// Client configuration
// ============================================================================

export interface ResilientHttpClientConfig {
  baseUrl: string;
  /** Sent as `User-Agent: <clientName>/<clientVersion>`. */
  clientName: string;
  clientVersion: string;
  readTimeoutMs?: number;
  connectTimeoutMs?: number;
  maxConnections?: number;
  maxKeepaliveConnections?: number;
  maxAttempts?: number;
}

export interface ResilientHttpClientDeps {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  createPool?: PoolFactory;
  generateCorrelationId?: () => string;
}
