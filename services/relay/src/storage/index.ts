// src/storage/index.ts
import type { YoinkStorageBackend } from '../contracts/yoinkStorage';
import type { StorageConfig } from '../config';
import { RedisYoinkStorage } from './redisYoinkStorage';
import { SqliteYoinkStorage } from './sqliteYoinkStorage';

export { RedisYoinkStorage, SqliteYoinkStorage };

/** Open the configured backend; rejects if it cannot be reached. */
export async function createStorageBackend(storage: StorageConfig): Promise<YoinkStorageBackend> {
  switch (storage.backend) {
    case 'sqlite':
      return SqliteYoinkStorage.open(storage.sqlitePath);
    case 'redis':
      return RedisYoinkStorage.open(storage.redisUrl);
    default:
      throw new Error(`Unsupported storage backend: ${storage.backend}`);
  }
}
