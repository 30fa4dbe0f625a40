import 'dotenv/config';

const DEFAULT_PORT = 3333;

export const config = {
  port: parseInt(process.env.DATAYOINKER_PORT || String(DEFAULT_PORT), 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  storage: {
    backend: process.env.STORAGE_BACKEND || 'sqlite',
    sqlitePath: process.env.DB_PATH || 'yoink.db',
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  },
  // Server-side limits, the core itself never times out
  timeouts: {
    requestMs: 10_000,
    connectionMs: 20_000,
    keepAliveMs: 30_000,
  },
  version: process.env.DATAYOINKER_VERSION || process.env.npm_package_version || '0.0.0-dev',
  revision: process.env.DATAYOINKER_REVISION || 'unknown',
};

export type Config = typeof config;
export type StorageConfig = Config['storage'];
