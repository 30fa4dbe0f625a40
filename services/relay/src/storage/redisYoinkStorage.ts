import type Redis from 'ioredis';
import { createRedis } from '../redis/client';
import { appendYoink, queryYoinks } from '../redis/yoinks';
import type { YoinkQuery, YoinkStorageBackend } from '../contracts/yoinkStorage';
import type { Topic, YoinkRow } from '../types';

/**
 * Implements `YoinkStorageBackend` on the Redis helpers in `../redis/yoinks`.
 * Redis needs no schema; keys are created by the first append to a topic.
 */
export class RedisYoinkStorage implements YoinkStorageBackend {
  readonly kind = 'redis';

  constructor(private readonly redis: Redis) {}

  static async open(url: string): Promise<RedisYoinkStorage> {
    const storage = new RedisYoinkStorage(createRedis(url));
    await storage.ping();
    return storage;
  }

  async append(topic: Topic, contentJson: string): Promise<YoinkRow> {
    return appendYoink(this.redis, topic, contentJson);
  }

  async query({ topic, limit }: YoinkQuery): Promise<YoinkRow[]> {
    return queryYoinks(this.redis, topic, limit);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
