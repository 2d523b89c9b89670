// Grouping of stored rows into the shapes the duplicate reducer consumes

import { MetadataKeys, metadataString, type DocumentMetadata } from "../document.js";

import { splitTags, TAG_SEPARATOR } from "./filter.js";
import type { CodeIndexedEntry, IndexedEntry } from "./types.js";

export const INDEX_META_TYPE = "index_meta";

export type StoredRowMetadata = {
  id: string;
  metadata: DocumentMetadata;
};

// `dependent_docs` may be stored as a list or as a comma-separated string
export function parseDependentDocs(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .map((v) => (typeof v === "string" || typeof v === "number" ? String(v).trim() : ""))
      .filter(Boolean);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((v) => v.trim())
      .filter(Boolean);
  }
  return [];
}

export function buildIndexedData(rows: StoredRowMetadata[]): Map<string, IndexedEntry> {
  const result = new Map<string, IndexedEntry>();

  for (const row of rows) {
    const docId = metadataString(row.metadata, MetadataKeys.id);
    if (docId === undefined) continue;

    const existing = result.get(docId);
    if (existing) {
      existing.allChunks.push(row.id);
      continue;
    }

    result.set(docId, {
      id: row.id,
      metadata: row.metadata,
      allChunks: [row.id],
      dependentDocs: parseDependentDocs(row.metadata[MetadataKeys.dependentDocs]),
      parentId: metadataString(row.metadata, MetadataKeys.parentId) ?? null,
    });
  }

  // A child row registers itself as a dependent of its parent
  for (const [docId, entry] of result) {
    if (!entry.parentId) continue;
    const parent = result.get(entry.parentId);
    if (!parent) continue;
    if (!parent.dependentDocs.includes(docId)) parent.dependentDocs.push(docId);
  }

  return result;
}

export function buildCodeIndexedData(rows: StoredRowMetadata[]): Map<string, CodeIndexedEntry> {
  const result = new Map<string, CodeIndexedEntry>();

  for (const row of rows) {
    const filename = metadataString(row.metadata, MetadataKeys.filename);
    if (filename === undefined) continue;

    let entry = result.get(filename);
    if (!entry) {
      entry = { metadata: row.metadata, ids: [], commitHashes: [] };
      result.set(filename, entry);
    }

    entry.ids.push(row.id);
    const commitHash = metadataString(row.metadata, MetadataKeys.commitHash);
    if (commitHash && !entry.commitHashes.includes(commitHash)) entry.commitHashes.push(commitHash);
  }

  return result;
}

export function isIndexMeta(metadata: DocumentMetadata): boolean {
  return metadata[MetadataKeys.type] === INDEX_META_TYPE;
}

export function collectionTags(metadata: DocumentMetadata): string[] {
  const value = metadataString(metadata, MetadataKeys.collection);
  if (!value) return [];
  return splitTags(value);
}

export function hasCollectionTag(metadata: DocumentMetadata, tag: string): boolean {
  return collectionTags(metadata).includes(tag);
}

// No-op when the tag is already present
export function appendCollectionTag(metadata: DocumentMetadata, tag: string): DocumentMetadata {
  if (collectionTags(metadata).includes(tag)) return metadata;
  const current = metadataString(metadata, MetadataKeys.collection);
  return {
    ...metadata,
    [MetadataKeys.collection]: current ? `${current}${TAG_SEPARATOR}${tag}` : tag,
  };
}

// Returns null when no tag would remain
export function removeCollectionTag(metadata: DocumentMetadata, tag: string): DocumentMetadata | null {
  const remaining = collectionTags(metadata).filter((t) => t !== tag);
  if (remaining.length === 0) return null;
  return { ...metadata, [MetadataKeys.collection]: remaining.join(TAG_SEPARATOR) };
}
