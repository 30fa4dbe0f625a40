import type Database from 'better-sqlite3';

export const YOINKS_TABLE = 'yoinks';

// Millisecond ISO-8601 in UTC, e.g. 2026-10-18T10:21:11.123Z
const NOW_ISO = `strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`;

/** Create the yoinks table and its topic index; safe on every start. */
export function ensureYoinkSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${YOINKS_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      topic TEXT NOT NULL CHECK (length(topic) > 0),
      timestamp TEXT NOT NULL DEFAULT (${NOW_ISO}),
      content TEXT NOT NULL CHECK (json_valid(content))
    );
    CREATE INDEX IF NOT EXISTS idx_${YOINKS_TABLE}_topic_ts
      ON ${YOINKS_TABLE} (topic, timestamp DESC, id DESC);
  `);
}
