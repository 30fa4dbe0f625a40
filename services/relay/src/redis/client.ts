import Redis from 'ioredis';

/** One client per process; the caller owns it and quits it on shutdown. */
export function createRedis(url: string): Redis {
  return new Redis(url, {
    lazyConnect: false,
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
  });
}
