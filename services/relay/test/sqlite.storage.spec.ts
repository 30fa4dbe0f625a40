import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ensureYoinkSchema } from '../src/sqlite/schema';
import { SqliteYoinkStorage } from '../src/storage/sqliteYoinkStorage';
import { ISO_MILLIS } from './helpers';

let db: Database.Database;
let storage: SqliteYoinkStorage;

beforeEach(() => {
  db = new Database(':memory:');
  storage = new SqliteYoinkStorage(db);
});

afterEach(async () => {
  await storage.close();
});

function insertAt(topic: string, timestamp: string, content = '{}') {
  db.prepare('INSERT INTO yoinks (topic, timestamp, content) VALUES (?, ?, ?)').run(topic, timestamp, content);
}

describe('SqliteYoinkStorage', () => {
  it('assigns id and timestamp on append and returns the stored row', async () => {
    const row = await storage.append('attic', '{"t":19.5}');
    expect(row.id).toBe(1);
    expect(row.topic).toBe('attic');
    expect(row.timestamp).toMatch(ISO_MILLIS);
    expect(row.content).toBe('{"t":19.5}');
  });

  it('hands out strictly increasing ids', async () => {
    const first = await storage.append('attic', '{}');
    const second = await storage.append('attic', '{}');
    const third = await storage.append('cellar', '{}');
    expect(second.id).toBeGreaterThan(first.id);
    expect(third.id).toBeGreaterThan(second.id);
  });

  it('returns rows newest first and honours the limit', async () => {
    for (let i = 1; i <= 4; i++) await storage.append('attic', `{"seq":${i}}`);

    const all = await storage.query({ topic: 'attic' });
    expect(all.map((r) => r.id)).toEqual([4, 3, 2, 1]);

    const two = await storage.query({ topic: 'attic', limit: 2 });
    expect(two.map((r) => r.content)).toEqual(['{"seq":4}', '{"seq":3}']);
  });

  it('orders by timestamp before id', async () => {
    insertAt('attic', '2026-01-02T00:00:00.000Z');
    insertAt('attic', '2026-01-01T00:00:00.000Z');
    const rows = await storage.query({ topic: 'attic' });
    expect(rows.map((r) => r.id)).toEqual([1, 2]);
  });

  it('breaks timestamp ties by descending id', async () => {
    insertAt('attic', '2026-01-01T00:00:00.000Z');
    insertAt('attic', '2026-01-01T00:00:00.000Z');
    insertAt('attic', '2026-01-01T00:00:00.000Z');
    const rows = await storage.query({ topic: 'attic' });
    expect(rows.map((r) => r.id)).toEqual([3, 2, 1]);
  });

  it('keeps topics apart', async () => {
    await storage.append('attic', '{}');
    await storage.append('cellar', '{}');
    expect((await storage.query({ topic: 'cellar' })).map((r) => r.topic)).toEqual(['cellar']);
    expect(await storage.query({ topic: 'garage' })).toEqual([]);
  });

  it('refuses content that is not valid JSON', async () => {
    await expect(storage.append('attic', '{oops')).rejects.toThrow(/CHECK constraint failed/);
    expect(await storage.query({ topic: 'attic' })).toEqual([]);
  });

  it('creates its schema idempotently', async () => {
    await storage.append('attic', '{"kept":1}');
    ensureYoinkSchema(db);
    const reopened = new SqliteYoinkStorage(db);
    const rows = await reopened.query({ topic: 'attic' });
    expect(rows.map((r) => r.content)).toEqual(['{"kept":1}']);
  });

  it('fails ping once closed', async () => {
    await expect(storage.ping()).resolves.toBeUndefined();
    await storage.close();
    await expect(storage.ping()).rejects.toThrow(/not open/);
  });
});
