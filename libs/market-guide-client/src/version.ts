export const CLIENT_NAME = 'market-guide-client';
export const CLIENT_VERSION = '1.0.0';
