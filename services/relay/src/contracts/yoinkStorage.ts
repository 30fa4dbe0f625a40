import type { Topic, YoinkRow } from '../types';

/** Backends the relay knows how to open. */
export type StorageBackendKind = 'sqlite' | 'redis';

/** Arguments for a per-topic read; rows always come back newest first. */
export interface YoinkQuery {
  topic: Topic;
  /** Maximum rows to return; omit for the whole history. */
  limit?: number;
}

/**
 * Append-only, per-topic record store shared by ingestion and retrieval.
 *
 * Implementations assign `id` and `timestamp` themselves, make an appended row
 * visible to every query issued after `append` resolves, and create their
 * schema idempotently when opened.
 */
export interface YoinkStorageBackend {
  readonly kind: StorageBackendKind;
  append(topic: Topic, contentJson: string): Promise<YoinkRow>;
  /** Ordered by timestamp descending, then id descending. */
  query(query: YoinkQuery): Promise<YoinkRow[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
