import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type SqliteDatabase = Database.Database;

const schema = `
  CREATE TABLE IF NOT EXISTS prompts (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    prompt         TEXT    NOT NULL,
    expected_style TEXT    NOT NULL,
    filename       TEXT    NOT NULL,
    created_at     TEXT    NOT NULL,
    score          INTEGER,
    feedback       TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_created_at ON prompts (created_at);
`;

const migrate = (db: SqliteDatabase) => {
  db.exec(schema);
};

export const openDatabase = (filename: string) => {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
};
