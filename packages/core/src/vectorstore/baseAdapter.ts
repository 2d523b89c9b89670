import type { DocumentMetadata } from "../document.js";
import { errorMessage } from "../errors.js";
import { warnLine, type IndexLogger } from "../logging.js";

import type { MetadataFilter } from "./filter.js";
import {
  appendCollectionTag,
  buildCodeIndexedData,
  buildIndexedData,
  collectionTags,
  isIndexMeta,
  removeCollectionTag,
  type StoredRowMetadata,
} from "./indexedData.js";
import type {
  CodeIndexedEntry,
  IndexedEntry,
  NewVectorRow,
  ScoredDocument,
  VectorStoreAdapter,
  VectorStoreParams,
} from "./types.js";

// Shared read paths; backends only list rows and mutate storage.
// Reads the duplicate reducer depends on fail open: logged, empty result.
// Index-meta rows are bookkeeping and never count as indexed documents.
export abstract class BaseVectorStoreAdapter implements VectorStoreAdapter {
  abstract readonly embeddingDim: number;

  constructor(
    readonly params: VectorStoreParams,
    protected readonly logger?: IndexLogger,
  ) {}

  // Rows whose `collection` tag set holds the suffix, or every row for an empty suffix
  protected abstract listRows(collectionSuffix: string): Promise<StoredRowMetadata[]>;
  protected abstract getRowMetadata(storageId: string): Promise<DocumentMetadata | undefined>;

  abstract updateMetadata(storageId: string, metadata: DocumentMetadata): Promise<void>;
  abstract removeCollection(): Promise<void>;
  abstract deleteByIds(ids: string[]): Promise<void>;
  abstract addDocuments(rows: NewVectorRow[]): Promise<string[]>;
  abstract similaritySearchWithScore(
    queryEmbedding: number[],
    filter: MetadataFilter | undefined,
    k: number,
  ): Promise<ScoredDocument[]>;
  abstract close(): Promise<void>;

  private async listDocumentRows(collectionSuffix: string): Promise<StoredRowMetadata[]> {
    const rows = await this.listRows(collectionSuffix);
    return rows.filter((row) => !isIndexMeta(row.metadata));
  }

  async listCollections(): Promise<string[]> {
    const rows = await this.listDocumentRows("");
    const tags = new Set<string>();
    for (const row of rows) {
      for (const tag of collectionTags(row.metadata)) tags.add(tag);
    }
    return [...tags].sort();
  }

  async getIndexedIds(collectionSuffix: string): Promise<string[]> {
    try {
      const rows = await this.listDocumentRows(collectionSuffix);
      return rows.map((row) => row.id);
    } catch (error) {
      warnLine(this.logger, `Failed to get indexed ids from vectorstore: ${errorMessage(error)}`);
      return [];
    }
  }

  async getIndexedData(collectionSuffix: string): Promise<Map<string, IndexedEntry>> {
    try {
      return buildIndexedData(await this.listDocumentRows(collectionSuffix));
    } catch (error) {
      warnLine(this.logger, `Failed to get indexed data from vectorstore: ${errorMessage(error)}`);
      return new Map();
    }
  }

  async getCodeIndexedData(collectionSuffix: string): Promise<Map<string, CodeIndexedEntry>> {
    try {
      return buildCodeIndexedData(await this.listDocumentRows(collectionSuffix));
    } catch (error) {
      warnLine(
        this.logger,
        `Failed to get indexed code data from vectorstore: ${errorMessage(error)}`,
      );
      return new Map();
    }
  }

  async getIndexMeta(collectionSuffix: string): Promise<StoredRowMetadata | undefined> {
    if (!collectionSuffix) return undefined;
    const rows = await this.listRows(collectionSuffix);
    return rows.find((row) => isIndexMeta(row.metadata));
  }

  // Rows shared with other collections only lose the tag
  async cleanCollection(collectionSuffix: string): Promise<void> {
    const rows = await this.listRows(collectionSuffix);
    if (!collectionSuffix) {
      await this.deleteByIds(rows.map((row) => row.id));
      return;
    }

    const toDelete: string[] = [];
    for (const row of rows) {
      const remaining = removeCollectionTag(row.metadata, collectionSuffix);
      if (remaining) {
        await this.updateMetadata(row.id, remaining);
      } else {
        toDelete.push(row.id);
      }
    }
    await this.deleteByIds(toDelete);
  }

  async addToCollection(storageId: string, collectionTag: string): Promise<void> {
    const metadata = await this.getRowMetadata(storageId);
    if (!metadata) {
      warnLine(this.logger, `Vector store row not found: ${storageId}`);
      return;
    }
    await this.updateMetadata(storageId, appendCollectionTag(metadata, collectionTag));
  }
}
