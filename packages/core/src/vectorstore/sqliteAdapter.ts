// Relational backend: better-sqlite3 + sqlite-vec

import { randomUUID } from "node:crypto";
import path from "node:path";

import { DEFAULT_DB_FILENAME, ensureDbDir, openVecsyncDb, type VecsyncDb } from "../db/db.js";
import {
  deleteEmbeddingsByIds,
  getEmbeddingMetadataJson,
  insertEmbeddings,
  listCollectionTagValues,
  listEmbeddingRows,
  updateEmbeddingMetadataJson,
} from "../db/queries/embeddings.js";
import { vectorSearch } from "../db/queries/search.js";
import { safeParseJsonObject } from "../db/queries/shared.js";
import type { DocumentMetadata } from "../document.js";
import { VectorStoreConfigError } from "../errors.js";
import type { IndexLogger } from "../logging.js";

import { BaseVectorStoreAdapter } from "./baseAdapter.js";
import { parseMetadataFilter, type MetadataFilter } from "./filter.js";
import { collectionTags, INDEX_META_TYPE, type StoredRowMetadata } from "./indexedData.js";
import type {
  NewVectorRow,
  ScoredDocument,
  VectorStoreAdapterOptions,
  VectorStoreBackend,
  VectorStoreParams,
} from "./types.js";

export class SqliteVectorStoreAdapter extends BaseVectorStoreAdapter {
  constructor(
    params: VectorStoreParams,
    private readonly db: VecsyncDb,
    readonly embeddingDim: number,
    logger?: IndexLogger,
  ) {
    super(params, logger);
  }

  protected async listRows(collectionSuffix: string): Promise<StoredRowMetadata[]> {
    return listEmbeddingRows(this.db, this.params.collectionName, collectionSuffix).map((row) => ({
      id: row.id,
      metadata: safeParseJsonObject(row.metadataJson),
    }));
  }

  override async listCollections(): Promise<string[]> {
    const tags = new Set<string>();
    for (const value of listCollectionTagValues(this.db, this.params.collectionName, INDEX_META_TYPE)) {
      for (const tag of collectionTags({ collection: value })) tags.add(tag);
    }
    return [...tags].sort();
  }

  async removeCollection(): Promise<void> {
    const ids = listEmbeddingRows(this.db, this.params.collectionName).map((row) => row.id);
    deleteEmbeddingsByIds(this.db, ids);
  }

  protected async getRowMetadata(storageId: string): Promise<DocumentMetadata | undefined> {
    const metadataJson = getEmbeddingMetadataJson(this.db, storageId);
    return metadataJson === null ? undefined : safeParseJsonObject(metadataJson);
  }

  async updateMetadata(storageId: string, metadata: DocumentMetadata): Promise<void> {
    updateEmbeddingMetadataJson(this.db, storageId, JSON.stringify(metadata));
  }

  async deleteByIds(ids: string[]): Promise<void> {
    deleteEmbeddingsByIds(this.db, ids);
  }

  async addDocuments(rows: NewVectorRow[]): Promise<string[]> {
    for (const row of rows) {
      if (row.embedding.length !== this.embeddingDim) {
        throw new Error(
          `Embedding dimension mismatch. expected=${this.embeddingDim}, got=${row.embedding.length}`,
        );
      }
    }

    const inputs = rows.map((row) => ({
      id: randomUUID(),
      collectionName: this.params.collectionName,
      content: row.content,
      metadataJson: JSON.stringify(row.metadata),
      embedding: row.embedding,
    }));
    insertEmbeddings(this.db, inputs);
    return inputs.map((input) => input.id);
  }

  async similaritySearchWithScore(
    queryEmbedding: number[],
    filter: MetadataFilter | undefined,
    k: number,
  ): Promise<ScoredDocument[]> {
    const node = parseMetadataFilter(filter);
    const rows = vectorSearch(this.db, this.params.collectionName, queryEmbedding, k, node);
    return rows.map((row) => ({
      document: {
        id: row.id,
        content: row.content,
        metadata: safeParseJsonObject(row.metadataJson),
      },
      distance: row.distance,
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

export const sqliteBackend: VectorStoreBackend = {
  getVectorstoreParams(collectionName: string, connectionSecret?: string): VectorStoreParams {
    const location = connectionSecret?.trim() || path.join("indexer_db", DEFAULT_DB_FILENAME);
    return { type: "sqlite", collectionName, location };
  },

  async open(options: VectorStoreAdapterOptions) {
    if (!options.embeddingModel) {
      throw new VectorStoreConfigError("An embedding model name is required");
    }
    const params = sqliteBackend.getVectorstoreParams(options.collectionName, options.connection);
    await ensureDbDir(params.location);
    const db = openVecsyncDb({
      dbPath: params.location,
      embeddingModel: options.embeddingModel,
      embeddingDim: options.embeddingDim,
    });
    return new SqliteVectorStoreAdapter(params, db, options.embeddingDim, options.logger);
  },
};
