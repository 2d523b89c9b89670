// Per-collection index bookkeeping
// - one row per collection with `type: "index_meta"`; search and dedup reads skip it
// - progress writes are throttled, completed and failed writes always land
// - `history` is a JSON list of snapshots, one per run; the last one tracks the current run

import { MetadataKeys, type DocumentMetadata } from "../document.js";
import { errorMessage } from "../errors.js";
import { logLine, warnLine, type IndexLogger } from "../logging.js";
import { INDEX_META_TYPE } from "../vectorstore/indexedData.js";
import type { VectorStoreAdapter } from "../vectorstore/types.js";

export const IndexMetaStates = {
  inProgress: "in_progress",
  completed: "completed",
  failed: "failed",
} as const;

export type IndexMetaState = (typeof IndexMetaStates)[keyof typeof IndexMetaStates];

// seconds
export const DEFAULT_META_UPDATE_INTERVAL = 600;

export type IndexMetaTrackerOptions = {
  adapter: Pick<
    VectorStoreAdapter,
    "embeddingDim" | "getIndexMeta" | "getIndexedIds" | "addDocuments" | "updateMetadata"
  >;
  collectionSuffix: string;
  indexConfiguration: Record<string, unknown>;
  // minimum seconds between two progress writes
  updateInterval?: number;
  // epoch seconds
  now?: () => number;
  logger?: IndexLogger;
};

function epochSeconds(): number {
  return Date.now() / 1000;
}

// The row carries no searchable text; any fixed non-zero vector will do
function placeholderEmbedding(dim: number): number[] {
  return Array.from({ length: dim }, (_, i) => (i === 0 ? 1 : 0));
}

function parseHistory(raw: unknown): DocumentMetadata[] | undefined {
  if (typeof raw !== "string" || !raw.trim()) return [];
  try {
    const value: unknown = JSON.parse(raw);
    if (!Array.isArray(value)) return undefined;
    return value.filter(
      (item): item is DocumentMetadata => typeof item === "object" && item !== null && !Array.isArray(item),
    );
  } catch {
    return undefined;
  }
}

export class IndexMetaTracker {
  private lastWrite: number | undefined;

  constructor(private readonly options: IndexMetaTrackerOptions) {}

  private now(): number {
    return (this.options.now ?? epochSeconds)();
  }

  private get suffix(): string {
    return this.options.collectionSuffix;
  }

  // Creates the row on the first run; later runs append a fresh history snapshot
  async start(): Promise<void> {
    const { adapter, logger } = this.options;
    const now = this.now();
    this.lastWrite = now;

    const snapshot: DocumentMetadata = {
      [MetadataKeys.collection]: this.suffix,
      [MetadataKeys.type]: INDEX_META_TYPE,
      indexed: 0,
      updated: 0,
      state: IndexMetaStates.inProgress,
      index_configuration: this.options.indexConfiguration,
      created_on: now,
      updated_on: now,
    };

    const existing = await adapter.getIndexMeta(this.suffix);
    if (!existing) {
      logLine(logger, `There is no existing index_meta for collection '${this.suffix}'. Initializing it.`);
      await adapter.addDocuments([
        {
          content: `${INDEX_META_TYPE}_${this.suffix}`,
          metadata: { ...snapshot, history: JSON.stringify([snapshot]) },
          embedding: placeholderEmbedding(adapter.embeddingDim),
        },
      ]);
      return;
    }

    const { history: rawHistory, ...previous } = existing.metadata;
    const current: DocumentMetadata = {
      ...previous,
      indexed: (await adapter.getIndexedIds(this.suffix)).length,
      updated: 0,
      state: IndexMetaStates.inProgress,
      index_configuration: this.options.indexConfiguration,
      updated_on: now,
    };
    const history = [...(parseHistory(rawHistory) ?? []), current];
    await adapter.updateMetadata(existing.id, { ...current, history: JSON.stringify(history) });
  }

  // Best effort: a failed progress write is logged and indexing goes on
  async progress(updated: number): Promise<void> {
    const interval = this.options.updateInterval ?? DEFAULT_META_UPDATE_INTERVAL;
    const now = this.now();
    if (this.lastWrite !== undefined && now - this.lastWrite < interval) return;

    try {
      await this.write(IndexMetaStates.inProgress, updated);
    } catch (error) {
      warnLine(
        this.options.logger,
        `Failed to update index meta during indexing for collection '${this.suffix}': ${errorMessage(error)}`,
      );
    }
  }

  async finish(state: Exclude<IndexMetaState, "in_progress">, updated: number): Promise<void> {
    await this.write(state, updated);
  }

  private async write(state: IndexMetaState, updated: number): Promise<void> {
    const { adapter, logger } = this.options;
    const now = this.now();
    this.lastWrite = now;

    const existing = await adapter.getIndexMeta(this.suffix);
    if (!existing) {
      warnLine(logger, `No index_meta found for collection '${this.suffix}'`);
      return;
    }

    const { history: rawHistory, ...previous } = existing.metadata;
    const current: DocumentMetadata = {
      ...previous,
      indexed: (await adapter.getIndexedIds(this.suffix)).length,
      updated,
      state,
      updated_on: now,
    };

    let history = parseHistory(rawHistory);
    if (history === undefined) {
      warnLine(logger, `Failed to load index history for collection '${this.suffix}'. Starting a new one.`);
      history = [];
    }
    // the last snapshot belongs to the current run
    history = history.length > 0 ? [...history.slice(0, -1), current] : [current];

    await adapter.updateMetadata(existing.id, { ...current, history: JSON.stringify(history) });
  }
}
