import { z } from "zod";

import { listChunkerNames } from "../chunking/registry.js";
import { MAX_COLLECTION_SUFFIX_LENGTH } from "../indexing/indexData.js";
import { DEFAULT_META_UPDATE_INTERVAL } from "../indexing/indexMeta.js";
import { DEFAULT_PROGRESS_STEP } from "../indexing/stages/saveDocuments.js";
import { DEFAULT_CUT_OFF, DEFAULT_SEARCH_TOP } from "../search/searchIndex.js";

const chunkOptionValue = z.union([z.string(), z.number(), z.boolean()]);

export const chunkingConfigSchema = z
  .record(z.string(), z.record(z.string(), chunkOptionValue))
  .describe('Per-extension chunker options, e.g. {".md": {"max_chars": 2000}}');

export const rerankingConfigSchema = z
  .record(
    z.string(),
    z.object({
      weight: z.number().optional(),
      rules: z
        .object({
          contains: z.string().optional(),
          priority: chunkOptionValue.optional(),
          sort: z.enum(["asc", "desc"]).optional(),
        })
        .default({}),
    }),
  )
  .describe(
    'Reranking rules keyed by metadata field, e.g. {"status": {"weight": 0.5, "rules": {"priority": "open"}}}',
  );

export const indexDataBaseShape = {
  collection_suffix: z
    .string()
    .min(1)
    .max(MAX_COLLECTION_SUFFIX_LENGTH)
    .describe(
      `Suffix for the collection, ${MAX_COLLECTION_SUFFIX_LENGTH} characters at most; separates datasets in one store`,
    ),
  clean_index: z
    .boolean()
    .default(false)
    .describe("Remove every document of the collection before indexing"),
  progress_step: z
    .number()
    .int()
    .min(0)
    .max(100)
    .default(DEFAULT_PROGRESS_STEP)
    .describe("Percent step between progress log lines"),
  chunking_tool: z
    .string()
    .optional()
    .describe(`Chunker applied to documents: ${listChunkerNames().join(", ")}`),
  chunking_config: chunkingConfigSchema.optional(),
  meta_update_interval: z
    .number()
    .min(0)
    .default(DEFAULT_META_UPDATE_INTERVAL)
    .describe("Minimum seconds between progress updates of the collection's index_meta record"),
};

const collectionFilterShape = {
  collection_suffix: z
    .string()
    .max(MAX_COLLECTION_SUFFIX_LENGTH)
    .default("")
    .describe("Collection to search; empty searches every collection"),
  filter: z
    .union([z.record(z.string(), z.unknown()), z.string()])
    .default({})
    .describe('Metadata filter, e.g. {"status": {"$in": ["open", "done"]}}'),
};

export const searchIndexShape = {
  query: z.string().min(1).describe("Search query"),
  ...collectionFilterShape,
  cut_off: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_CUT_OFF)
    .describe("Minimum relevance score"),
  search_top: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(DEFAULT_SEARCH_TOP)
    .describe("Maximum number of results"),
  reranking_config: rerankingConfigSchema.optional(),
};

export const stepbackSearchShape = {
  ...searchIndexShape,
  messages: z
    .array(z.object({ role: z.string(), content: z.string() }))
    .default([])
    .describe("Conversation history used to rewrite the query"),
};

export const removeIndexShape = {
  collection_suffix: z
    .string()
    .max(MAX_COLLECTION_SUFFIX_LENGTH)
    .default("")
    .describe("Collection to remove; empty removes every collection"),
};

export const listCollectionsShape = {};
