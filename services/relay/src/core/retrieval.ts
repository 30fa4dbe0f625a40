import { storageFailure, YoinkError } from '../errors';
import type { YoinkStorageBackend } from '../contracts/yoinkStorage';
import type { Topic, Yoink, YoinkRow } from '../types';
import { requireTopic, toYoink } from './content';

/** What `getLatest` answers for a topic nobody has published to. */
export function emptyYoink(): Yoink {
  return { id: 0, topic: '', timestamp: '', content: {} };
}

/**
 * Read-only, newest-first views over a topic's history.
 * A row whose stored content cannot be decoded fails the whole call.
 */
export class RetrievalEngine {
  constructor(private readonly storage: YoinkStorageBackend) {}

  async getLatest(topic: Topic): Promise<Yoink> {
    const [latest] = await this.fetch(topic, 1);
    return latest ?? emptyYoink();
  }

  async getLastN(topic: Topic, n: number): Promise<Yoink[]> {
    requireTopic(topic);
    if (!Number.isSafeInteger(n)) {
      throw new YoinkError('invalid_number', `${n} is not a whole number`, 'Error parsing number of yoinks');
    }
    if (n < 1) {
      throw new YoinkError('number_out_of_range', 'number is less than 1', 'Error validating number of yoinks');
    }
    return this.fetch(topic, n);
  }

  async getAll(topic: Topic): Promise<Yoink[]> {
    return this.fetch(topic);
  }

  private async fetch(topic: Topic, limit?: number): Promise<Yoink[]> {
    requireTopic(topic);

    let rows: YoinkRow[];
    try {
      rows = await this.storage.query({ topic, limit });
    } catch (err) {
      throw storageFailure(err, 'read');
    }
    return rows.map(toYoink);
  }
}
