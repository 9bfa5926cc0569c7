import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { createDispatcherPool, createUndiciPool } from '../transport/undiciPool';

describe('createDispatcherPool', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('returns status, lower-cased headers and the raw body', async () => {
    const mockPool = agent.get('https://market.test');
    mockPool
      .intercept({ path: '/_api/market-guide/stock/5247/quote', method: 'GET' })
      .reply(200, '{"last":101.5}', { headers: { 'Content-Type': 'application/json', 'Retry-After': '3' } });
    const pool = createDispatcherPool(mockPool);

    const response = await pool.request({
      method: 'GET',
      path: '/_api/market-guide/stock/5247/quote',
      headers: { accept: 'application/json' },
      signal: new AbortController().signal,
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"last":101.5}');
    expect(response.headers['content-type']).toBe('application/json');
    expect(response.headers['retry-after']).toBe('3');
  });

  it('surfaces transport errors unchanged', async () => {
    const mockPool = agent.get('https://market.test');
    mockPool
      .intercept({ path: '/broken', method: 'POST' })
      .replyWithError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
    const pool = createDispatcherPool(mockPool);

    await expect(
      pool.request({
        method: 'POST',
        path: '/broken',
        headers: {},
        body: '{}',
        signal: new AbortController().signal,
      })
    ).rejects.toMatchObject({ code: 'ECONNRESET' });
  });
});

describe('createUndiciPool', () => {
  it('can be closed without ever connecting', async () => {
    const pool = createUndiciPool({
      baseUrl: 'https://market.test/base',
      connectTimeoutMs: 100,
      readTimeoutMs: 100,
      maxConnections: 2,
      maxKeepaliveConnections: 1,
    });

    await expect(pool.close()).resolves.toBeUndefined();
  });
});
