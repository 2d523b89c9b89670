// Binds a loader, a dedup strategy, a vector store and the model capabilities
// into the six index operations, plus tool descriptors for agent runtimes.

import { z, type AnyZodObject } from "zod";

import type { ChunkingConfig } from "../chunking/types.js";
import { errorMessage } from "../errors.js";
import { indexData } from "../indexing/indexData.js";
import type {
  DedupStrategy,
  EmbedTexts,
  IndexDataResult,
  IndexedEntryBase,
  Loader,
  LoaderParams,
} from "../indexing/types.js";
import { warnLine, type IndexLogger } from "../logging.js";
import {
  searchIndex,
  stepbackSearchIndex,
  stepbackSummaryIndex,
  type StepbackContext,
} from "../search/searchIndex.js";
import type {
  CompleteText,
  SearchHit,
  SearchIndexParams,
  StepbackSearchParams,
} from "../search/types.js";
import type { VectorStoreAdapter } from "../vectorstore/types.js";

import {
  indexDataBaseShape,
  listCollectionsShape,
  removeIndexShape,
  searchIndexShape,
  stepbackSearchShape,
} from "./schemas.js";

export const IndexToolNames = {
  indexData: "index_data",
  searchIndex: "search_index",
  stepbackSearchIndex: "stepback_search_index",
  stepbackSummaryIndex: "stepback_summary_index",
  removeIndex: "remove_index",
  listCollections: "list_collections",
} as const;

export type IndexToolName = (typeof IndexToolNames)[keyof typeof IndexToolNames];

export type ToolResult = {
  isError: boolean;
  message: string;
  data?: unknown;
};

export type ToolDescriptor = {
  name: IndexToolName;
  description: string;
  inputSchema: AnyZodObject;
  // never throws; failures come back as `isError: true`
  handler: (args: unknown) => Promise<ToolResult>;
};

export type IndexDataArgs = {
  collectionSuffix: string;
  cleanIndex?: boolean;
  progressStep?: number;
  chunkingTool?: string;
  chunkingConfig?: ChunkingConfig;
  metaUpdateInterval?: number;
  loaderParams?: LoaderParams;
};

export type EmptyCollections = {
  collections: [];
  message: string;
};

export type IndexerToolkitOptions<E extends IndexedEntryBase> = {
  adapter: VectorStoreAdapter;
  loader: Loader;
  strategy: DedupStrategy<E>;
  embedTexts: EmbedTexts;
  complete?: CompleteText;
  maxDocsPerAdd?: number;
  logger?: IndexLogger;
};

// loader parameters ride along under their own names
const indexDataArgsSchema = z.object(indexDataBaseShape).passthrough();

function toToolResult(result: unknown): ToolResult {
  if (typeof result === "string") return { isError: false, message: result };
  return { isError: false, message: JSON.stringify(result, null, 2), data: result };
}

export class IndexerToolkit<E extends IndexedEntryBase> {
  constructor(private readonly options: IndexerToolkitOptions<E>) {}

  get adapter(): VectorStoreAdapter {
    return this.options.adapter;
  }

  async indexData(args: IndexDataArgs): Promise<IndexDataResult> {
    return await indexData({
      adapter: this.options.adapter,
      loader: this.options.loader,
      strategy: this.options.strategy,
      embedTexts: this.options.embedTexts,
      maxDocsPerAdd: this.options.maxDocsPerAdd,
      logger: this.options.logger,
      ...args,
    });
  }

  async searchIndex(params: SearchIndexParams): Promise<SearchHit[] | string> {
    return await searchIndex(this.options, params);
  }

  async stepbackSearchIndex(params: StepbackSearchParams): Promise<string> {
    return await stepbackSearchIndex(this.stepbackContext(), params);
  }

  async stepbackSummaryIndex(params: StepbackSearchParams): Promise<string> {
    return await stepbackSummaryIndex(this.stepbackContext(), params);
  }

  async removeIndex(collectionSuffix = ""): Promise<string> {
    const suffix = collectionSuffix.trim();
    if (!suffix) {
      await this.options.adapter.removeCollection();
      return "All collections have been removed from the vector store.";
    }

    await this.options.adapter.cleanCollection(suffix);
    const available = await this.options.adapter.listCollections();
    return (
      `Collection '${suffix}' has been removed from the vector store.\n` +
      `Available collections: ${available.join(", ")}`
    );
  }

  async listCollections(): Promise<string[] | EmptyCollections> {
    const collections = await this.options.adapter.listCollections();
    if (collections.length === 0) return { collections: [], message: "No indexed collections" };
    return collections;
  }

  getAvailableTools(): ToolDescriptor[] {
    const loaderShape = this.options.loader.indexToolParams?.() ?? {};
    const indexSchema = z.object({ ...indexDataBaseShape, ...loaderShape });

    return [
      this.tool(IndexToolNames.indexData, "Loads data to index.", indexSchema, async (args) => {
        const {
          collection_suffix,
          clean_index,
          progress_step,
          chunking_tool,
          chunking_config,
          meta_update_interval,
          ...loaderParams
        } = indexDataArgsSchema.parse(args);
        return await this.indexData({
          collectionSuffix: collection_suffix,
          cleanIndex: clean_index,
          progressStep: progress_step,
          chunkingTool: chunking_tool,
          chunkingConfig: chunking_config,
          metaUpdateInterval: meta_update_interval,
          loaderParams,
        });
      }),
      this.tool(
        IndexToolNames.searchIndex,
        "Searches indexed documents in the vector store.",
        z.object(searchIndexShape),
        async (args) =>
          await this.searchIndex({
            query: args.query,
            collectionSuffix: args.collection_suffix,
            filter: args.filter,
            cutOff: args.cut_off,
            searchTop: args.search_top,
            rerankingConfig: args.reranking_config,
          }),
      ),
      this.tool(
        IndexToolNames.stepbackSearchIndex,
        "Rewrites the query into a more general one, then searches indexed documents.",
        z.object(stepbackSearchShape),
        async (args) => await this.stepbackSearchIndex(toStepbackParams(args)),
      ),
      this.tool(
        IndexToolNames.stepbackSummaryIndex,
        "Answers the query from indexed documents found by a stepback search.",
        z.object(stepbackSearchShape),
        async (args) => await this.stepbackSummaryIndex(toStepbackParams(args)),
      ),
      this.tool(
        IndexToolNames.removeIndex,
        "Removes a collection's indexed data from the vector store.",
        z.object(removeIndexShape),
        async (args) => await this.removeIndex(args.collection_suffix),
      ),
      this.tool(
        IndexToolNames.listCollections,
        "Lists the indexed collections.",
        z.object(listCollectionsShape),
        async () => await this.listCollections(),
      ),
    ];
  }

  private stepbackContext(): StepbackContext {
    const { complete } = this.options;
    if (!complete) {
      throw new Error("Stepback search needs a text-completion model; none is configured");
    }
    return { adapter: this.options.adapter, embedTexts: this.options.embedTexts, complete };
  }

  private tool<T extends AnyZodObject>(
    name: IndexToolName,
    description: string,
    inputSchema: T,
    run: (args: z.output<T>) => Promise<unknown>,
  ): ToolDescriptor {
    return {
      name,
      description,
      inputSchema,
      handler: async (args) => {
        const parsed = inputSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return { isError: true, message: `Invalid arguments for ${name}: ${parsed.error.message}` };
        }
        try {
          return toToolResult(await run(parsed.data));
        } catch (error) {
          warnLine(this.options.logger, `${name} failed: ${errorMessage(error)}`);
          return { isError: true, message: errorMessage(error) };
        }
      },
    };
  }
}

function toStepbackParams(args: z.output<z.ZodObject<typeof stepbackSearchShape>>): StepbackSearchParams {
  return {
    query: args.query,
    messages: args.messages,
    collectionSuffix: args.collection_suffix,
    filter: args.filter,
    cutOff: args.cut_off,
    searchTop: args.search_top,
    rerankingConfig: args.reranking_config,
  };
}
