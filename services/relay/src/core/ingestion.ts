import { storageFailure } from '../errors';
import type { YoinkStorageBackend } from '../contracts/yoinkStorage';
import type { RawParams, Topic, Yoink, YoinkRow } from '../types';
import { buildContent, encodeContent, requireTopic, toYoink } from './content';

/**
 * Turns a topic and its raw request parameters into one persisted yoink.
 *
 * The returned yoink is the row the store handed back (id, timestamp and
 * content as stored), never the caller's input. Every validation happens
 * before the append, so a failed publish stores nothing.
 */
export class IngestionEncoder {
  constructor(private readonly storage: YoinkStorageBackend) {}

  async publish(topic: Topic, params: RawParams): Promise<Yoink> {
    requireTopic(topic);
    const document = encodeContent(buildContent(params));

    let row: YoinkRow;
    try {
      row = await this.storage.append(topic, document);
    } catch (err) {
      throw storageFailure(err, 'write');
    }
    return toYoink(row);
  }
}
