import type { FilterNode } from "../../vectorstore/filter.js";
import type { VecsyncDb } from "../db.js";

import { compileMetadataFilter } from "./metadataFilter.js";

export type VectorSearchRow = {
  id: string;
  content: string;
  metadataJson: string;
  distance: number;
};

export function vectorSearch(
  db: VecsyncDb,
  collectionName: string,
  queryEmbedding: number[],
  k: number,
  filter: FilterNode | null,
): VectorSearchRow[] {
  const candidateWhere = ["e.collection_name = ?"];
  const candidateParams: Array<string | number> = [collectionName];

  if (filter) {
    const compiled = compileMetadataFilter(filter, "e.metadata_json");
    candidateWhere.push(compiled.sql);
    candidateParams.push(...compiled.params);
  }

  // vec0 search query
  // - sqlite-vec requires LIMIT or `k = ?` for KNN queries
  // - When JOINs are involved, LIMIT detection can break, so split via a CTE
  const stmt = db.prepare(`
    WITH candidates AS (
      SELECT r.rowid AS rowid
      FROM embeddings e
      JOIN embedding_rowids r ON r.id = e.id
      WHERE ${candidateWhere.join(" AND ")}
    ),
    matches AS (
      SELECT rowid, distance
      FROM vec_embeddings
      WHERE embedding MATCH ?
        AND k = ?
        AND rowid IN (SELECT rowid FROM candidates)
      ORDER BY distance
    )
    SELECT
      e.id AS id,
      e.document AS content,
      e.metadata_json AS metadataJson,
      m.distance AS distance
    FROM matches m
    JOIN embedding_rowids r ON r.rowid = m.rowid
    JOIN embeddings e ON e.id = r.id
    ORDER BY m.distance
  `);

  return stmt.all(
    ...candidateParams,
    JSON.stringify(queryEmbedding),
    Math.max(1, Math.floor(k)),
  ) as VectorSearchRow[];
}
