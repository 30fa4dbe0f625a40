import type Redis from 'ioredis';
import { z } from 'zod';
import type { Topic, YoinkId, YoinkRow } from '../types';

const SEQ_KEY = 'yoink:seq';
const recordKey = (id: YoinkId) => `yoink:record:${id}`;
const topicKey = (topic: Topic) => `yoink:topic:${topic}`;

const rowHashSchema = z.object({
  id: z.coerce.number().int().positive(),
  topic: z.string().min(1),
  timestamp: z.string().min(1),
  content: z.string(),
});

export async function appendYoink(redis: Redis, topic: Topic, content: string): Promise<YoinkRow> {
  // INCR is atomic, so concurrent appends never share an id
  const id = await redis.incr(SEQ_KEY);
  const timestamp = new Date().toISOString();

  const results = await redis
    .multi()
    .hset(recordKey(id), { id: String(id), topic, timestamp, content })
    .zadd(topicKey(topic), id, String(id))
    .exec();

  const failed = results?.find(([err]) => err !== null);
  if (!results || failed) {
    throw failed?.[0] ?? new Error(`append of yoink ${id} was discarded`);
  }

  return { id, topic, timestamp, content };
}

/** Newest first; ids are scored in allocation order, which is also timestamp order. */
export async function queryYoinks(redis: Redis, topic: Topic, limit?: number): Promise<YoinkRow[]> {
  const stop = typeof limit === 'undefined' ? -1 : limit - 1;
  const ids = await redis.zrevrange(topicKey(topic), 0, stop);
  if (ids.length === 0) return [];

  const pipeline = redis.pipeline();
  for (const id of ids) pipeline.hgetall(recordKey(Number(id)));
  const results = (await pipeline.exec()) ?? [];

  return results.map(([err, hash], idx) => {
    if (err) throw err;
    const parsed = rowHashSchema.safeParse(hash);
    if (!parsed.success) {
      throw new Error(`yoink ${ids[idx]} in topic "${topic}" is missing or incomplete`);
    }
    return parsed.data;
  });
}
