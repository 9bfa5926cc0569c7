import { Client, Pool, type Dispatcher } from 'undici';
import type { ConnectionPool, HttpHeaders, PoolOptions, PoolRequest, PoolResponse } from '../types';

/** Keep-alive for connections opened above the idle ceiling. */
const BURST_KEEPALIVE_MS = 1;

type ResponseHeaders = Record<string, string | string[] | undefined>;

function normalizeHeaders(headers: ResponseHeaders): HttpHeaders {
  const normalized: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

/**
 * Adapts any undici dispatcher (a Pool in production, a MockPool in tests)
 * to the ConnectionPool contract.
 */
export function createDispatcherPool(dispatcher: Dispatcher): ConnectionPool {
  return {
    async request(req: PoolRequest): Promise<PoolResponse> {
      const response = await dispatcher.request({
        path: req.path,
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: req.signal,
      });
      const body = await response.body.text();
      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body,
      };
    },
    async close(): Promise<void> {
      await dispatcher.close();
    },
  };
}

/**
 * undici Pool bound to the base origin. At most `maxConnections` sockets are
 * open at once; only the first `maxKeepaliveConnections` clients keep idle
 * sockets around, the rest close theirs as soon as they go idle.
 */
export function createUndiciPool(options: PoolOptions): ConnectionPool {
  const origin = new URL(options.baseUrl).origin;
  let clientsCreated = 0;

  const pool = new Pool(origin, {
    connections: options.maxConnections,
    connect: { timeout: options.connectTimeoutMs },
    headersTimeout: options.readTimeoutMs,
    bodyTimeout: options.readTimeoutMs,
    factory: (clientOrigin, clientOptions) => {
      clientsCreated += 1;
      if (clientsCreated <= options.maxKeepaliveConnections) {
        return new Client(clientOrigin, clientOptions);
      }
      return new Client(clientOrigin, {
        ...clientOptions,
        keepAliveTimeout: BURST_KEEPALIVE_MS,
        keepAliveMaxTimeout: BURST_KEEPALIVE_MS,
      });
    },
  });

  return createDispatcherPool(pool);
}
