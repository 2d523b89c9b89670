// Embedded backend: one JSON file per collection, in-process cosine search

import { randomUUID } from "node:crypto";

import type { DocumentMetadata } from "../document.js";
import { VectorStoreConfigError } from "../errors.js";
import type { IndexLogger } from "../logging.js";

import { BaseVectorStoreAdapter } from "./baseAdapter.js";
import { matchesFilter, parseMetadataFilter, type MetadataFilter } from "./filter.js";
import { hasCollectionTag, type StoredRowMetadata } from "./indexedData.js";
import { LocalCollectionStore, type LocalRow } from "./localStore.js";
import type {
  NewVectorRow,
  ScoredDocument,
  VectorStoreAdapterOptions,
  VectorStoreBackend,
  VectorStoreParams,
} from "./types.js";

export const DEFAULT_PERSIST_DIRECTORY = "./indexer_db";

export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// Callers get copies; the store's rows change only through its own methods
export class LocalVectorStoreAdapter extends BaseVectorStoreAdapter {
  readonly embeddingDim: number;

  constructor(
    params: VectorStoreParams,
    private readonly store: LocalCollectionStore,
    logger?: IndexLogger,
  ) {
    super(params, logger);
    this.embeddingDim = store.embeddingDim;
  }

  protected async listRows(collectionSuffix: string): Promise<StoredRowMetadata[]> {
    return this.store
      .all()
      .filter((row) => !collectionSuffix || hasCollectionTag(row.metadata, collectionSuffix))
      .map((row) => ({ id: row.id, metadata: { ...row.metadata } }));
  }

  protected async getRowMetadata(storageId: string): Promise<DocumentMetadata | undefined> {
    const row = this.store.all().find((r) => r.id === storageId);
    return row ? { ...row.metadata } : undefined;
  }

  async updateMetadata(storageId: string, metadata: DocumentMetadata): Promise<void> {
    await this.store.update(storageId, { ...metadata });
  }

  async removeCollection(): Promise<void> {
    await this.store.drop();
  }

  async deleteByIds(ids: string[]): Promise<void> {
    const targets = new Set(ids);
    if (targets.size === 0) return;
    await this.store.removeWhere((row) => targets.has(row.id));
  }

  async addDocuments(rows: NewVectorRow[]): Promise<string[]> {
    const dim = this.embeddingDim;
    const localRows = rows.map((row): LocalRow => {
      if (row.embedding.length !== dim) {
        throw new Error(
          `Embedding dimension mismatch. expected=${dim}, got=${row.embedding.length}`,
        );
      }
      return {
        id: randomUUID(),
        content: row.content,
        metadata: { ...row.metadata },
        embedding: Float32Array.from(row.embedding),
      };
    });

    await this.store.append(localRows);
    return localRows.map((row) => row.id);
  }

  async similaritySearchWithScore(
    queryEmbedding: number[],
    filter: MetadataFilter | undefined,
    k: number,
  ): Promise<ScoredDocument[]> {
    const node = parseMetadataFilter(filter);
    return this.store
      .all()
      .filter((row) => matchesFilter(node, row.metadata))
      .map((row) => ({
        document: { id: row.id, content: row.content, metadata: { ...row.metadata } },
        distance: cosineDistance(queryEmbedding, row.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.max(1, Math.floor(k)));
  }

  async close(): Promise<void> {
    // rows are persisted on every mutation
  }
}

export const localBackend: VectorStoreBackend = {
  getVectorstoreParams(collectionName: string, connectionSecret?: string): VectorStoreParams {
    return {
      type: "local",
      collectionName,
      location: connectionSecret?.trim() || DEFAULT_PERSIST_DIRECTORY,
    };
  },

  async open(options: VectorStoreAdapterOptions) {
    if (!options.embeddingModel) {
      throw new VectorStoreConfigError("An embedding model name is required");
    }
    const params = localBackend.getVectorstoreParams(options.collectionName, options.connection);
    const store = await LocalCollectionStore.open({
      persistDirectory: params.location,
      collectionName: params.collectionName,
      embeddingModel: options.embeddingModel,
      embeddingDim: options.embeddingDim,
    });
    return new LocalVectorStoreAdapter(params, store, options.logger);
  },
};
