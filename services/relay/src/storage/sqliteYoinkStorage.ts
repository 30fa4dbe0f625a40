import Database from 'better-sqlite3';
import { ensureYoinkSchema, YOINKS_TABLE } from '../sqlite/schema';
import type { YoinkQuery, YoinkStorageBackend } from '../contracts/yoinkStorage';
import type { Topic, YoinkRow } from '../types';

const COLUMNS = 'id, topic, timestamp, content';

/**
 * Implements `YoinkStorageBackend` on a single SQLite file (or `:memory:`).
 * better-sqlite3 is synchronous, so every call completes before its promise resolves.
 */
export class SqliteYoinkStorage implements YoinkStorageBackend {
  readonly kind = 'sqlite';

  private readonly insertStmt: Database.Statement<[Topic, string], YoinkRow>;
  private readonly latestStmt: Database.Statement<[Topic, number], YoinkRow>;
  private readonly historyStmt: Database.Statement<[Topic], YoinkRow>;

  constructor(private readonly db: Database.Database) {
    ensureYoinkSchema(db);
    this.insertStmt = db.prepare<[Topic, string], YoinkRow>(
      `INSERT INTO ${YOINKS_TABLE} (topic, content) VALUES (?, ?) RETURNING ${COLUMNS}`,
    );
    this.latestStmt = db.prepare<[Topic, number], YoinkRow>(
      `SELECT ${COLUMNS} FROM ${YOINKS_TABLE} WHERE topic = ? ORDER BY timestamp DESC, id DESC LIMIT ?`,
    );
    this.historyStmt = db.prepare<[Topic], YoinkRow>(
      `SELECT ${COLUMNS} FROM ${YOINKS_TABLE} WHERE topic = ? ORDER BY timestamp DESC, id DESC`,
    );
  }

  /** Open (creating if needed) the database file at `path`. */
  static open(path: string): SqliteYoinkStorage {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    return new SqliteYoinkStorage(db);
  }

  async append(topic: Topic, contentJson: string): Promise<YoinkRow> {
    const row = this.insertStmt.get(topic, contentJson);
    if (!row) {
      throw new Error('insert returned no row');
    }
    return row;
  }

  async query({ topic, limit }: YoinkQuery): Promise<YoinkRow[]> {
    if (typeof limit === 'undefined') {
      return this.historyStmt.all(topic);
    }
    return this.latestStmt.all(topic, limit);
  }

  async ping(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
