// SQLite vector store database
// - rows, their JSON metadata and the vec0 embeddings live in one file

import { promises as fs } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { load as loadSqliteVec } from "sqlite-vec";

import { migrate } from "./migrate.js";

export type OpenVecsyncDbOptions = {
  dbPath: string;
  embeddingModel: string;
  embeddingDim: number;
};

export type VecsyncDb = Database.Database;

export const DEFAULT_DB_FILENAME = "vecsync.sqlite";

export async function ensureDbDir(dbPath: string): Promise<void> {
  if (dbPath === ":memory:") return;
  await fs.mkdir(path.dirname(path.resolve(dbPath)), { recursive: true });
}

export function openVecsyncDb(options: OpenVecsyncDbOptions): VecsyncDb {
  const db = new Database(options.dbPath);

  // vec0 virtual tables come from the sqlite-vec extension
  loadSqliteVec(db);

  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  try {
    migrate(db, options);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}
