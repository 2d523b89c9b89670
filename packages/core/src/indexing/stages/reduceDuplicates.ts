import type { PipelineDocument } from "../../document.js";
import { errorMessage } from "../../errors.js";
import { logLine, warnLine, type IndexLogger } from "../../logging.js";
import { hasCollectionTag } from "../../vectorstore/indexedData.js";
import type { DedupStrategy, IndexedEntryBase } from "../types.js";

export type ReduceDuplicatesOptions<E extends IndexedEntryBase> = {
  strategy: Pick<DedupStrategy<E>, "keyFn" | "compareFn" | "removeIdsFn">;
  loadIndexedData: () => Promise<Map<string, E>>;
  deleteByIds: (ids: string[]) => Promise<void>;
  collectionSuffix: string;
  logger?: IndexLogger;
};

// Drops documents whose stored copy is current and schedules stale rows for deletion.
// Stale rows are deleted in one call once the input stream is exhausted.
export async function* reduceDuplicatesStage<E extends IndexedEntryBase>(
  documents: AsyncIterable<PipelineDocument>,
  options: ReduceDuplicatesOptions<E>,
): AsyncGenerator<PipelineDocument> {
  const { strategy, collectionSuffix, logger } = options;
  logLine(logger, "Verification of documents to index started");

  let indexed: Map<string, E>;
  try {
    indexed = await options.loadIndexedData();
  } catch (error) {
    warnLine(logger, `Failed to load indexed data: ${errorMessage(error)}`);
    indexed = new Map();
  }

  if (indexed.size === 0) {
    logLine(logger, "Vectorstore is empty, indexing all incoming documents");
    yield* documents;
    return;
  }

  const toRemove = new Set<string>();
  let skipped = 0;

  for await (const doc of documents) {
    const key = String(strategy.keyFn(doc));
    const entry = indexed.get(key);

    if (!entry || !hasCollectionTag(entry.metadata, collectionSuffix)) {
      yield doc;
      continue;
    }

    if (strategy.compareFn(doc, entry)) {
      skipped += 1;
      continue;
    }

    yield doc;
    for (const id of strategy.removeIdsFn(indexed, key)) toRemove.add(id);
  }

  logLine(logger, `Skipped ${skipped} unchanged documents`);

  if (toRemove.size > 0) {
    logLine(logger, `Removing ${toRemove.size} stale documents from the vectorstore`);
    await options.deleteByIds([...toRemove]);
  }
}
