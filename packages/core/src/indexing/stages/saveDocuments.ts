import { isPresent, MetadataKeys, type SourceDocument } from "../../document.js";
import { logLine, warnLine, type IndexLogger } from "../../logging.js";
import type { VectorStoreAdapter } from "../../vectorstore/types.js";
import type { EmbedTexts } from "../types.js";

export const DEFAULT_MAX_DOCS_PER_ADD = 20;
export const DEFAULT_PROGRESS_STEP = 10;
const FALLBACK_PROGRESS_STEP = 20;

export type SaveDocumentsOptions = {
  adapter: Pick<VectorStoreAdapter, "addDocuments">;
  embedTexts: EmbedTexts;
  maxDocsPerAdd?: number;
  progressStep?: number;
  // called after every written batch
  onProgress?: (processed: number, total: number) => Promise<void>;
  logger?: IndexLogger;
};

export function normalizeProgressStep(step: number | undefined): number {
  if (step === undefined) return DEFAULT_PROGRESS_STEP;
  return Number.isInteger(step) && step >= 0 && step < 100 ? step : FALLBACK_PROGRESS_STEP;
}

function warnMissingKeys(doc: SourceDocument, logger: IndexLogger | undefined): void {
  const { metadata } = doc;
  if (!isPresent(metadata[MetadataKeys.id])) {
    warnLine(logger, "Document without 'id' metadata cannot be deduplicated on later runs");
    return;
  }
  if (!isPresent(metadata[MetadataKeys.updatedOn]) && !isPresent(metadata[MetadataKeys.commitHash])) {
    warnLine(
      logger,
      `Document '${String(metadata[MetadataKeys.id])}' has neither 'updated_on' nor 'commit_hash'; it is re-indexed on every run`,
    );
  }
}

// Embeds and writes documents in batches; returns the storage ids in input order.
export async function saveDocumentsStage(
  documents: SourceDocument[],
  options: SaveDocumentsOptions,
): Promise<string[]> {
  const { logger } = options;
  const batchSize = Math.max(1, Math.floor(options.maxDocsPerAdd ?? DEFAULT_MAX_DOCS_PER_ADD));
  const step = normalizeProgressStep(options.progressStep);

  const toSave = documents.filter((doc) => doc.content.trim() !== "");
  const skipped = documents.length - toSave.length;
  if (skipped > 0) logLine(logger, `Skipping ${skipped} documents with empty content`);
  for (const doc of toSave) warnMissingKeys(doc, logger);

  const total = toSave.length;
  const ids: string[] = [];
  let nextPct = step;

  for (let i = 0; i < total; i += batchSize) {
    const batch = toSave.slice(i, i + batchSize);
    const embeddings = await options.embedTexts(batch.map((doc) => doc.content));

    const rows = batch.map((doc, j) => {
      const embedding = embeddings[j];
      if (!embedding) {
        throw new Error(
          `Embedding response returned too few embeddings. batchSize=${batch.length}, got=${embeddings.length}`,
        );
      }
      return { content: doc.content, metadata: doc.metadata, embedding };
    });

    ids.push(...(await options.adapter.addDocuments(rows)));

    const processed = i + batch.length;
    const pct = Math.floor((processed / total) * 100);
    if (step === 0 || pct >= nextPct) {
      logLine(logger, `Indexing progress: ${pct}%. Processed ${processed} of ${total} documents.`);
      if (step > 0) nextPct = (Math.floor(pct / step) + 1) * step;
    }
    await options.onProgress?.(processed, total);
  }

  return ids;
}
