import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { UNASSIGNED_GROUP_ID, UNASSIGNED_GROUP_NAME } from "./constants.js";

export type Database = BetterSqlite3.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  "synchronous = NORMAL",
  "foreign_keys = ON",
];

export function getDb(dbPath: string): Database {
  // ----------------- SQLite setup -----------------
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new BetterSqlite3(dbPath);
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS files (
    path        TEXT PRIMARY KEY NOT NULL,
    fingerprint TEXT NOT NULL,        -- hex digest of the content
    mtime       REAL NOT NULL         -- mtimeMs as last observed
  );
  CREATE INDEX IF NOT EXISTS files_fingerprint_idx ON files(fingerprint);
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS subscriber_groups (
    id   INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL
  );

  CREATE TABLE IF NOT EXISTS members (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    name     TEXT NOT NULL,
    email    TEXT NOT NULL,
    group_id INTEGER NOT NULL REFERENCES subscriber_groups(id) ON DELETE CASCADE
  );
  CREATE INDEX IF NOT EXISTS members_group_idx ON members(group_id);

  -- one album key may be linked to several groups
  CREATE TABLE IF NOT EXISTS albums (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    name     TEXT NOT NULL,
    group_id INTEGER NOT NULL REFERENCES subscriber_groups(id),
    UNIQUE(name, group_id)
  );
  CREATE INDEX IF NOT EXISTS albums_name_idx ON albums(name);
`);

  db.prepare<[number, string]>(
    `INSERT OR IGNORE INTO subscriber_groups(id, name) VALUES(?, ?)`,
  ).run(UNASSIGNED_GROUP_ID, UNASSIGNED_GROUP_NAME);

  return db;
}

export function getMeta(db: Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string | null }>(
      `SELECT value FROM meta WHERE key = ?`,
    )
    .get(key);
  return row?.value ?? null;
}

export function setMeta(db: Database, key: string, value: string): void {
  db.prepare(
    `INSERT INTO meta(key, value) VALUES(?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  ).run(key, value);
}
