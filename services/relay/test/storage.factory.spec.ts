import { describe, expect, it } from 'vitest';
import { createStorageBackend, SqliteYoinkStorage } from '../src/storage';

const base = { sqlitePath: ':memory:', redisUrl: 'redis://localhost:6379' };

describe('createStorageBackend', () => {
  it('opens SQLite and creates the schema', async () => {
    const storage = await createStorageBackend({ ...base, backend: 'sqlite' });
    expect(storage).toBeInstanceOf(SqliteYoinkStorage);
    expect(storage.kind).toBe('sqlite');

    const row = await storage.append('attic', '{"t":1}');
    expect(await storage.query({ topic: 'attic' })).toEqual([row]);
    await storage.close();
  });

  it('throws for unsupported backends', async () => {
    await expect(createStorageBackend({ ...base, backend: 'mongo' })).rejects.toThrow(
      'Unsupported storage backend: mongo',
    );
  });
});
