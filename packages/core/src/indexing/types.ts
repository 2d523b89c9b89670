import type { ZodRawShape } from "zod";

import type { ChunkingConfig } from "../chunking/types.js";
import type { DocumentMetadata, PipelineDocument } from "../document.js";
import type { IndexLogger } from "../logging.js";
import type { VectorStoreAdapter } from "../vectorstore/types.js";

export type EmbedTexts = (inputs: string[]) => Promise<number[][]>;

export type LoaderParams = Record<string, unknown>;

export type DocumentSource = AsyncIterable<PipelineDocument> | Iterable<PipelineDocument>;

// A source of documents; everything beyond `baseLoader` is optional
export interface Loader {
  baseLoader(params: LoaderParams): DocumentSource;
  // Dependents of a document (attachments, comments); `parent_id` is set by the pipeline
  processDocument?(doc: PipelineDocument): DocumentSource | Promise<DocumentSource>;
  extendData?(documents: AsyncIterable<PipelineDocument>): AsyncIterable<PipelineDocument>;
  // Extra `index_data` tool parameters, as zod fields with descriptions and defaults
  indexToolParams?(): ZodRawShape;
}

export type IndexedEntryBase = {
  metadata: DocumentMetadata;
};

export type DedupMode = "record" | "file";

export interface DedupStrategy<E extends IndexedEntryBase> {
  readonly mode: DedupMode;
  getIndexedData(adapter: VectorStoreAdapter, collectionSuffix: string): Promise<Map<string, E>>;
  keyFn(doc: PipelineDocument): unknown;
  // true when the stored entry already reflects the incoming document
  compareFn(doc: PipelineDocument, entry: E): boolean;
  removeIdsFn(indexed: Map<string, E>, key: string): string[];
}

export type IndexDataOptions<E extends IndexedEntryBase> = {
  adapter: VectorStoreAdapter;
  loader: Loader;
  strategy: DedupStrategy<E>;
  embedTexts: EmbedTexts;
  collectionSuffix: string;
  cleanIndex?: boolean;
  progressStep?: number;
  chunkingTool?: string;
  chunkingConfig?: ChunkingConfig;
  loaderParams?: LoaderParams;
  maxDocsPerAdd?: number;
  // minimum seconds between progress writes to the index-meta row
  metaUpdateInterval?: number;
  // epoch seconds, for index-meta timestamps
  now?: () => number;
  logger?: IndexLogger;
};

export type IndexDataResult = {
  status: "ok";
  message: string;
  count: number;
  ids: string[];
};
