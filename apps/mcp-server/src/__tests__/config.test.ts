import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@libs/resilient-http-core';
import { loadServerConfig } from '../config';

describe('loadServerConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadServerConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.client).toEqual({
      clientName: 'market-guide-client',
      clientVersion: '1.0.0',
      baseUrl: 'https://www.avanza.se',
      readTimeoutMs: 30000,
      connectTimeoutMs: 5000,
      maxConnections: 10,
      maxKeepaliveConnections: 5,
      maxAttempts: 3,
    });
  });

  it('reads the log level case-insensitively and ignores unknown levels', () => {
    expect(loadServerConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadServerConfig({ LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });

  it('passes client settings from the environment through', () => {
    const config = loadServerConfig({ MARKET_GUIDE_MAX_ATTEMPTS: '5', MARKET_GUIDE_BASE_URL: 'http://localhost:8080' });

    expect(config.client.maxAttempts).toBe(5);
    expect(config.client.baseUrl).toBe('http://localhost:8080');
  });

  it('rejects invalid client settings when loading', () => {
    expect(() => loadServerConfig({ MARKET_GUIDE_MAX_ATTEMPTS: '0' })).toThrow(ConfigurationError);
    expect(() => loadServerConfig({ MARKET_GUIDE_READ_TIMEOUT_MS: '-5' })).toThrow(/readTimeoutMs/);
  });
});
