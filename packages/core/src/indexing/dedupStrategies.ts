// Change-detection strategies for the duplicate reducer

import { isPresent, MetadataKeys, metadataString } from "../document.js";
import type { CodeIndexedEntry, IndexedEntry } from "../vectorstore/types.js";

import type { DedupStrategy } from "./types.js";

// Records (tickets, pages): keyed by `id`, changed when `updated_on` differs
export const recordDedupStrategy: DedupStrategy<IndexedEntry> = {
  mode: "record",

  getIndexedData: (adapter, collectionSuffix) => adapter.getIndexedData(collectionSuffix),

  keyFn: (doc) => doc.metadata[MetadataKeys.id],

  compareFn(doc, entry) {
    const incoming = doc.metadata[MetadataKeys.updatedOn];
    const stored = entry.metadata[MetadataKeys.updatedOn];
    return isPresent(incoming) && isPresent(stored) && incoming === stored;
  },

  // own chunks, plus each dependent's representative row and chunks (one level)
  removeIdsFn(indexed, key) {
    const entry = indexed.get(key);
    if (!entry) return [];

    const ids = new Set(entry.allChunks);
    for (const dependentId of entry.dependentDocs) {
      const dependent = indexed.get(dependentId);
      if (!dependent) continue;
      ids.add(dependent.id);
      for (const chunkId of dependent.allChunks) ids.add(chunkId);
    }
    return [...ids];
  },
};

// Files: keyed by `filename`, unchanged when the commit hash is already stored
export const fileDedupStrategy: DedupStrategy<CodeIndexedEntry> = {
  mode: "file",

  getIndexedData: (adapter, collectionSuffix) => adapter.getCodeIndexedData(collectionSuffix),

  keyFn: (doc) => doc.metadata[MetadataKeys.filename],

  compareFn(doc, entry) {
    const commitHash = metadataString(doc.metadata, MetadataKeys.commitHash);
    return !!commitHash && entry.commitHashes.includes(commitHash);
  },

  removeIdsFn(indexed, key) {
    return [...(indexed.get(key)?.ids ?? [])];
  },
};
