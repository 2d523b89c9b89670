import { MetadataKeys } from "../document.js";
import { VectorStoreFilterError } from "../errors.js";
import type { EmbedTexts } from "../indexing/types.js";
import { isPlainObject, type MetadataFilter } from "../vectorstore/filter.js";
import { INDEX_META_TYPE } from "../vectorstore/indexedData.js";
import type { VectorStoreAdapter } from "../vectorstore/types.js";

import { answerPrompt, stepbackPrompt } from "./prompts.js";
import { applyReranking } from "./rerank.js";
import type {
  CompleteText,
  RerankingConfig,
  SearchHit,
  SearchIndexParams,
  StepbackSearchParams,
} from "./types.js";

export const DEFAULT_CUT_OFF = 0.1;
export const DEFAULT_SEARCH_TOP = 10;
const MAX_CANDIDATES = 30;

export type SearchContext = {
  adapter: VectorStoreAdapter;
  embedTexts: EmbedTexts;
};

export type StepbackContext = SearchContext & {
  complete: CompleteText;
};

const EXCLUDE_INDEX_META: MetadataFilter = {
  $or: [{ [MetadataKeys.type]: { $exists: false } }, { [MetadataKeys.type]: { $ne: INDEX_META_TYPE } }],
};

export function parseSearchFilter(filter: MetadataFilter | string | undefined): MetadataFilter {
  if (typeof filter !== "string") return filter ?? {};
  if (!filter.trim()) return {};

  let value: unknown;
  try {
    value = JSON.parse(filter);
  } catch {
    throw new VectorStoreFilterError(`Filter is not valid JSON: ${filter}`);
  }
  if (!isPlainObject(value)) {
    throw new VectorStoreFilterError(`Filter must be a JSON object: ${filter}`);
  }
  return value;
}

// The caller's filter, narrowed to one collection tag and never matching index-meta rows
export function resolveSearchFilter(
  filter: MetadataFilter | string | undefined,
  collectionSuffix: string,
): MetadataFilter {
  const parsed = parseSearchFilter(filter);
  const constraints: MetadataFilter[] = [];
  if (Object.keys(parsed).length > 0) constraints.push(parsed);
  if (collectionSuffix) constraints.push({ [MetadataKeys.collection]: { $tag: collectionSuffix } });
  constraints.push(EXCLUDE_INDEX_META);
  return { $and: constraints };
}

export type SearchDocumentsParams = {
  query: string;
  filter: MetadataFilter;
  cutOff: number;
  searchTop: number;
  rerankingConfig?: RerankingConfig;
};

export async function searchDocuments(
  context: SearchContext,
  params: SearchDocumentsParams,
): Promise<SearchHit[]> {
  const searchTop = Math.max(1, Math.floor(params.searchTop));
  const [queryEmbedding] = await context.embedTexts([params.query]);
  if (!queryEmbedding) {
    throw new Error("Embedding response returned no embedding for the query");
  }

  const scored = await context.adapter.similaritySearchWithScore(
    queryEmbedding,
    params.filter,
    Math.min(MAX_CANDIDATES, searchTop * 3),
  );

  // One hit per (id, chunk_id); a later duplicate replaces an earlier one
  const byKey = new Map<string, SearchHit>();
  for (const [i, { document, distance }] of scored.entries()) {
    const { metadata } = document;
    const docId = metadata[MetadataKeys.id];
    const base = docId === undefined || docId === null ? `idx_${i}` : String(docId);
    const chunkId = metadata[MetadataKeys.chunkId];
    const key = chunkId === undefined ? base : `${base}_${String(chunkId)}`;
    byKey.set(key, { content: document.content, metadata, score: 1 - distance });
  }

  let hits = [...byKey.values()].sort((a, b) => b.score - a.score);
  if (params.rerankingConfig && Object.keys(params.rerankingConfig).length > 0) {
    hits = applyReranking(hits, params.rerankingConfig);
  }
  if (params.cutOff) {
    hits = hits.filter((hit) => Math.abs(hit.score) >= params.cutOff);
  }
  return hits.slice(0, searchTop);
}

function toSearchDocumentsParams(params: SearchIndexParams, filter: MetadataFilter) {
  return {
    query: params.query,
    filter,
    cutOff: params.cutOff ?? DEFAULT_CUT_OFF,
    searchTop: params.searchTop ?? DEFAULT_SEARCH_TOP,
    rerankingConfig: params.rerankingConfig,
  };
}

// Returns the hits, or a message when the collection is unknown or nothing matched.
export async function searchIndex(
  context: SearchContext,
  params: SearchIndexParams,
): Promise<SearchHit[] | string> {
  const collectionSuffix = params.collectionSuffix?.trim() ?? "";
  if (collectionSuffix) {
    const available = await context.adapter.listCollections();
    if (!available.includes(collectionSuffix)) {
      return `Collection '${collectionSuffix}' not found. Available collections: ${available.join(", ")}`;
    }
  }

  const filter = resolveSearchFilter(params.filter, collectionSuffix);
  const hits = await searchDocuments(context, toSearchDocumentsParams(params, filter));
  if (hits.length === 0) {
    const shown = JSON.stringify(parseSearchFilter(params.filter));
    return `No documents found by query '${params.query}' and filter '${shown}'`;
  }
  return hits;
}

async function stepbackHits(
  context: StepbackContext,
  params: StepbackSearchParams,
): Promise<SearchHit[]> {
  const rewritten = (await context.complete(stepbackPrompt(params.query, params.messages ?? []))).trim();
  const filter = resolveSearchFilter(params.filter, params.collectionSuffix?.trim() ?? "");
  return await searchDocuments(
    context,
    toSearchDocumentsParams({ ...params, query: rewritten || params.query }, filter),
  );
}

export async function stepbackSearchIndex(
  context: StepbackContext,
  params: StepbackSearchParams,
): Promise<string> {
  const hits = await stepbackHits(context, params);
  if (hits.length === 0) return "No documents found matching the query.";
  return `Found ${hits.length} documents matching the query\n${JSON.stringify(hits, null, 4)}`;
}

export async function stepbackSummaryIndex(
  context: StepbackContext,
  params: StepbackSearchParams,
): Promise<string> {
  const hits = await stepbackHits(context, params);
  const prompt = answerPrompt(params.query, JSON.stringify(hits, null, 2), params.messages ?? []);
  return await context.complete(prompt);
}
