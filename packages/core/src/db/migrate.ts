import { VectorStoreConfigError } from "../errors.js";

import type { OpenVecsyncDbOptions, VecsyncDb } from "./db.js";

export function nowIso(): string {
  return new Date().toISOString().slice(0, 19);
}

export function migrate(db: VecsyncDb, options: OpenVecsyncDbOptions): void {
  if (!Number.isInteger(options.embeddingDim) || options.embeddingDim <= 0) {
    throw new VectorStoreConfigError(`Invalid embedding dimension: ${options.embeddingDim}`);
  }

  // Schema: embeddings (row + metadata), embedding_rowids, vec_embeddings(vec0)
  // - vec0 is rowid-based, so storage ids are mapped to rowids
  db.exec(`
    CREATE TABLE IF NOT EXISTS embeddings (
      id TEXT PRIMARY KEY,
      collection_name TEXT NOT NULL,
      document TEXT NOT NULL,
      metadata_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
  `);

  db.exec(
    `CREATE INDEX IF NOT EXISTS idx_embeddings_collection ON embeddings(collection_name);`,
  );

  // DB metadata
  // - prevents mixing embeddings from different models/dimensions
  db.exec(`
    CREATE TABLE IF NOT EXISTS db_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  const hasAnyRows = !!db.prepare(`SELECT 1 FROM embeddings LIMIT 1`).get();

  const getMeta = (key: string): string | null => {
    const row = db.prepare(`SELECT value FROM db_meta WHERE key = ?`).get(key) as
      | { value?: string }
      | undefined;
    return row?.value ?? null;
  };

  const setMeta = (key: string, value: string): void => {
    db.prepare(
      `
      INSERT INTO db_meta(key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value=excluded.value,
        updated_at=excluded.updated_at
    `,
    ).run(key, value, nowIso());
  };

  const existingModel = getMeta("embedding_model");
  const existingDimRaw = getMeta("embedding_dim");
  const existingDim = existingDimRaw ? Number(existingDimRaw) : null;

  const missingMeta = !existingModel || !existingDimRaw || !Number.isFinite(existingDim);
  if (missingMeta) {
    if (hasAnyRows) {
      throw new VectorStoreConfigError(
        [
          "Vector store DB does not record the embedding model/dimension.",
          "Refusing to continue to avoid mixing incompatible embeddings in one DB.",
          `DB path: ${options.dbPath}`,
        ].join(" "),
      );
    }

    setMeta("embedding_model", options.embeddingModel);
    setMeta("embedding_dim", String(options.embeddingDim));
  } else if (existingModel !== options.embeddingModel || existingDim !== options.embeddingDim) {
    throw new VectorStoreConfigError(
      [
        "Embedding config mismatch for the vector store DB.",
        `DB path: ${options.dbPath}`,
        `DB expects: model=${existingModel}, dim=${existingDimRaw}`,
        `Current run: model=${options.embeddingModel}, dim=${options.embeddingDim}`,
        "Fix: delete the DB and reindex (or choose another connection path).",
      ].join(" "),
    );
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS embedding_rowids (
      id TEXT PRIMARY KEY,
      rowid INTEGER UNIQUE NOT NULL,
      FOREIGN KEY(id) REFERENCES embeddings(id) ON DELETE CASCADE
    );
  `);

  db.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS vec_embeddings USING vec0(
      embedding FLOAT[${options.embeddingDim}] distance_metric=cosine
    );
  `);
}
