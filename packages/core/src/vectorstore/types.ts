import type { DocumentMetadata } from "../document.js";
import type { IndexLogger } from "../logging.js";

import type { MetadataFilter } from "./filter.js";
import type { StoredRowMetadata } from "./indexedData.js";

export type StoredDocument = {
  id: string;
  content: string;
  metadata: DocumentMetadata;
};

export type ScoredDocument = {
  document: StoredDocument;
  // cosine distance, lower is closer
  distance: number;
};

export type NewVectorRow = {
  content: string;
  metadata: DocumentMetadata;
  embedding: number[];
};

// Non-code mode: rows grouped by `metadata.id`
export type IndexedEntry = {
  // storage id of the first row seen for the logical id
  id: string;
  metadata: DocumentMetadata;
  allChunks: string[];
  dependentDocs: string[];
  parentId: string | null;
};

// Code mode: rows grouped by `metadata.filename`
export type CodeIndexedEntry = {
  metadata: DocumentMetadata;
  ids: string[];
  commitHashes: string[];
};

export type VectorStoreParams = {
  type: string;
  collectionName: string;
  // SQLite database path, or the local persist directory
  location: string;
};

export interface VectorStoreAdapter {
  readonly params: VectorStoreParams;
  readonly embeddingDim: number;
  listCollections(): Promise<string[]>;
  // drops every row of the physical collection
  removeCollection(): Promise<void>;
  getIndexedIds(collectionSuffix: string): Promise<string[]>;
  cleanCollection(collectionSuffix: string): Promise<void>;
  getIndexedData(collectionSuffix: string): Promise<Map<string, IndexedEntry>>;
  getCodeIndexedData(collectionSuffix: string): Promise<Map<string, CodeIndexedEntry>>;
  // a missing row is logged and ignored
  addToCollection(storageId: string, collectionTag: string): Promise<void>;
  updateMetadata(storageId: string, metadata: DocumentMetadata): Promise<void>;
  // the collection's bookkeeping row, if one was written
  getIndexMeta(collectionSuffix: string): Promise<StoredRowMetadata | undefined>;
  deleteByIds(ids: string[]): Promise<void>;
  addDocuments(rows: NewVectorRow[]): Promise<string[]>;
  similaritySearchWithScore(
    queryEmbedding: number[],
    filter: MetadataFilter | undefined,
    k: number,
  ): Promise<ScoredDocument[]>;
  close(): Promise<void>;
}

export type VectorStoreAdapterOptions = {
  collectionName: string;
  embeddingModel: string;
  embeddingDim: number;
  // backend-specific: database path or persist directory
  connection?: string;
  logger?: IndexLogger;
};

export interface VectorStoreBackend {
  getVectorstoreParams(collectionName: string, connectionSecret?: string): VectorStoreParams;
  open(options: VectorStoreAdapterOptions): Promise<VectorStoreAdapter>;
}
