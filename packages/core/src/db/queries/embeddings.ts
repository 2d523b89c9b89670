import { MetadataKeys } from "../../document.js";
import type { VecsyncDb } from "../db.js";
import { nowIso } from "../migrate.js";

import { compileMetadataFilter } from "./metadataFilter.js";
import { normalizeIds, SQL_BATCH_SIZE } from "./shared.js";

export type InsertEmbeddingInput = {
  id: string;
  collectionName: string;
  content: string;
  metadataJson: string;
  embedding: number[];
};

export function insertEmbeddings(db: VecsyncDb, inputs: InsertEmbeddingInput[]): void {
  if (inputs.length === 0) return;

  const insertRow = db.prepare(`
    INSERT INTO embeddings(id, collection_name, document, metadata_json, created_at)
    VALUES (@id, @collection_name, @document, @metadata_json, @created_at)
  `);
  const insertVec = db.prepare(`INSERT INTO vec_embeddings(embedding) VALUES (?)`);
  const insertRowid = db.prepare(`INSERT INTO embedding_rowids(id, rowid) VALUES (?, ?)`);

  const tx = db.transaction(() => {
    const createdAt = nowIso();
    for (const input of inputs) {
      insertRow.run({
        id: input.id,
        collection_name: input.collectionName,
        document: input.content,
        metadata_json: input.metadataJson,
        created_at: createdAt,
      });

      // Insert into vec0 → capture rowid
      const info = insertVec.run(JSON.stringify(input.embedding));
      insertRowid.run(input.id, Number(info.lastInsertRowid));
    }
  });

  tx();
}

export function deleteEmbeddingsByIds(db: VecsyncDb, ids: string[]): void {
  const targets = normalizeIds(ids);
  if (targets.length === 0) return;

  const deleteVecStmt = db.prepare(`DELETE FROM vec_embeddings WHERE rowid = ?`);

  const tx = db.transaction(() => {
    for (let i = 0; i < targets.length; i += SQL_BATCH_SIZE) {
      const batch = targets.slice(i, i + SQL_BATCH_SIZE);
      const placeholders = batch.map(() => "?").join(",");

      const rowids = db
        .prepare(`SELECT rowid FROM embedding_rowids WHERE id IN (${placeholders})`)
        .all(...batch) as Array<{ rowid: number }>;

      // vec0 requires manual deletion
      for (const r of rowids) {
        deleteVecStmt.run(r.rowid);
      }

      // ON DELETE CASCADE cleans embedding_rowids
      db.prepare(`DELETE FROM embeddings WHERE id IN (${placeholders})`).run(...batch);
    }
  });

  tx();
}

export type EmbeddingRowMetadata = {
  id: string;
  metadataJson: string;
};

// Rows of a physical collection in insertion order, optionally narrowed to the rows
// whose ';'-separated `collection` holds the tag.
export function listEmbeddingRows(
  db: VecsyncDb,
  collectionName: string,
  collectionTag?: string,
): EmbeddingRowMetadata[] {
  if (collectionTag) {
    const tagged = compileMetadataFilter(
      { kind: "tag", field: MetadataKeys.collection, tag: collectionTag },
      "metadata_json",
    );
    return db
      .prepare(
        `
          SELECT id, metadata_json AS metadataJson
          FROM embeddings
          WHERE collection_name = ?
            AND ${tagged.sql}
          ORDER BY rowid
        `,
      )
      .all(collectionName, ...tagged.params) as EmbeddingRowMetadata[];
  }

  return db
    .prepare(
      `
        SELECT id, metadata_json AS metadataJson
        FROM embeddings
        WHERE collection_name = ?
        ORDER BY rowid
      `,
    )
    .all(collectionName) as EmbeddingRowMetadata[];
}

// Distinct raw `collection` values, skipping rows whose `type` is excludedType
export function listCollectionTagValues(
  db: VecsyncDb,
  collectionName: string,
  excludedType: string,
): string[] {
  const rows = db
    .prepare(
      `
        SELECT DISTINCT json_extract(metadata_json, '$.collection') AS tag
        FROM embeddings
        WHERE collection_name = ?
          AND json_type(metadata_json, '$.collection') = 'text'
          AND COALESCE(json_extract(metadata_json, '$.type'), '') != ?
      `,
    )
    .all(collectionName, excludedType) as Array<{ tag: string }>;
  return rows.map((r) => r.tag);
}

export function getEmbeddingMetadataJson(db: VecsyncDb, id: string): string | null {
  const row = db.prepare(`SELECT metadata_json AS metadataJson FROM embeddings WHERE id = ?`).get(id) as
    | { metadataJson?: string }
    | undefined;
  return row?.metadataJson ?? null;
}

export function updateEmbeddingMetadataJson(db: VecsyncDb, id: string, metadataJson: string): void {
  db.prepare(`UPDATE embeddings SET metadata_json = ? WHERE id = ?`).run(metadataJson, id);
}
