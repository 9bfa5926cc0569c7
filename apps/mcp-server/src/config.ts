import { createMarketGuideClientConfig } from '@libs/market-guide-client';
import {
  isLogLevel,
  resolveClientConfig,
  type LogLevel,
  type ResilientHttpClientConfig,
} from '@libs/resilient-http-core';

export const SERVER_NAME = 'market-guide';
export const SERVER_VERSION = '1.0.0';

export interface ServerConfig {
  client: ResilientHttpClientConfig;
  logLevel: LogLevel;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  const client = createMarketGuideClientConfig(undefined, env);
  resolveClientConfig(client);
  return {
    client,
    logLevel: level && isLogLevel(level) ? level : 'info',
  };
}
