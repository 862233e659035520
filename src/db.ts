import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

/** Opens (and migrates) the ledger database. An empty path or ":memory:" stays in memory. */
export function openDatabase(dbPath: string): Db {
  const inMemory = !dbPath || dbPath === ":memory:";
  if (!inMemory) {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(inMemory ? ":memory:" : dbPath);
  if (!inMemory) db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS blocks (
  channel        TEXT NOT NULL,
  idx            INTEGER NOT NULL,
  timestamp      TEXT NOT NULL,
  data           TEXT NOT NULL, -- canonical JSON payload, re-hashes to the stored hash
  previous_hash  TEXT NOT NULL,
  hash           TEXT NOT NULL,
  PRIMARY KEY (channel, idx)
);

CREATE TABLE IF NOT EXISTS alerts (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  contract    TEXT,
  rule        TEXT NOT NULL,
  severity    TEXT NOT NULL,
  vehicle_id  TEXT,
  payload     TEXT NOT NULL, -- JSON with the full alert record
  created_at  INTEGER NOT NULL
);
`);

  return db;
}
