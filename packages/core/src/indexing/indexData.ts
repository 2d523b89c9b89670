// Index orchestrator
// - load → reduce duplicates → extend → dependencies → chunk → clean → save
// - every stage is lazy; the stream is materialized once, right before saving
// - the collection's index-meta row follows the run: in_progress, then completed or failed

import { liftTransientFieldsStream, type PipelineDocument } from "../document.js";
import { errorMessage } from "../errors.js";
import { logLine, warnLine } from "../logging.js";

import { applyChunkersStage } from "./stages/applyChunkers.js";
import { cleanMetadataStage } from "./stages/cleanMetadata.js";
import { collectDependenciesStage } from "./stages/collectDependencies.js";
import { reduceDuplicatesStage } from "./stages/reduceDuplicates.js";
import { saveDocumentsStage } from "./stages/saveDocuments.js";
import { iterateDocuments } from "./stages/source.js";
import { IndexMetaStates, IndexMetaTracker } from "./indexMeta.js";
import type { IndexDataOptions, IndexDataResult, IndexedEntryBase } from "./types.js";

export const MAX_COLLECTION_SUFFIX_LENGTH = 7;

export function validateCollectionSuffix(collectionSuffix: string): void {
  if (collectionSuffix.length < 1 || collectionSuffix.length > MAX_COLLECTION_SUFFIX_LENGTH) {
    throw new Error(
      `collection_suffix must be 1 to ${MAX_COLLECTION_SUFFIX_LENGTH} characters long, got '${collectionSuffix}'`,
    );
  }
  if (collectionSuffix.includes(";")) {
    throw new Error(`collection_suffix must not contain ';', got '${collectionSuffix}'`);
  }
}

function indexConfiguration<E extends IndexedEntryBase>(options: IndexDataOptions<E>): Record<string, unknown> {
  return {
    collection_suffix: options.collectionSuffix,
    clean_index: options.cleanIndex ?? false,
    ...(options.progressStep !== undefined ? { progress_step: options.progressStep } : {}),
    ...(options.chunkingTool !== undefined ? { chunking_tool: options.chunkingTool } : {}),
    ...(options.chunkingConfig !== undefined ? { chunking_config: options.chunkingConfig } : {}),
    ...(options.loaderParams ?? {}),
  };
}

export async function indexData<E extends IndexedEntryBase>(
  options: IndexDataOptions<E>,
): Promise<IndexDataResult> {
  const { adapter, loader, strategy, collectionSuffix, logger } = options;
  validateCollectionSuffix(collectionSuffix);

  const meta = new IndexMetaTracker({
    adapter,
    collectionSuffix,
    indexConfiguration: indexConfiguration(options),
    updateInterval: options.metaUpdateInterval,
    now: options.now,
    logger,
  });
  let saved = 0;

  try {
    if (options.cleanIndex) {
      try {
        logLine(logger, `Cleaning collection '${collectionSuffix}' before indexing`);
        await adapter.cleanCollection(collectionSuffix);
      } catch (error) {
        warnLine(logger, `Failed to clean collection '${collectionSuffix}': ${errorMessage(error)}`);
      }
    }

    await meta.start();

    logLine(
      logger,
      `Indexing data into collection with suffix '${collectionSuffix}'. It can take some time...`,
    );
    logLine(logger, "Loading the documents to index...");

    let documents: AsyncIterable<PipelineDocument> = liftTransientFieldsStream(
      iterateDocuments(loader.baseLoader(options.loaderParams ?? {})),
    );

    documents = reduceDuplicatesStage(documents, {
      strategy,
      loadIndexedData: () => strategy.getIndexedData(adapter, collectionSuffix),
      deleteByIds: (ids) => adapter.deleteByIds(ids),
      collectionSuffix,
      logger,
    });

    if (loader.extendData) documents = liftTransientFieldsStream(loader.extendData(documents));
    documents = collectDependenciesStage(documents, loader, logger);
    documents = applyChunkersStage(documents, {
      chunkingTool: options.chunkingTool,
      chunkingConfig: options.chunkingConfig,
      logger,
    });

    const prepared = await cleanMetadataStage(documents, collectionSuffix);
    logLine(logger, `Documents were prepared for indexing. Total documents: ${prepared.length}`);

    const ids = await saveDocumentsStage(prepared, {
      adapter,
      embedTexts: options.embedTexts,
      maxDocsPerAdd: options.maxDocsPerAdd,
      progressStep: options.progressStep,
      onProgress: async (processed) => {
        saved = processed;
        await meta.progress(processed);
      },
      logger,
    });

    await meta.finish(IndexMetaStates.completed, ids.length);

    const message = ids.length > 0 ? `successfully indexed ${ids.length} documents` : "no new documents to index";
    logLine(logger, message);
    return { status: "ok", message, count: ids.length, ids };
  } catch (error) {
    try {
      await meta.finish(IndexMetaStates.failed, saved);
    } catch (metaError) {
      warnLine(
        logger,
        `Failed to set index meta to failed for collection '${collectionSuffix}': ${errorMessage(metaError)}`,
      );
    }
    throw error;
  }
}
