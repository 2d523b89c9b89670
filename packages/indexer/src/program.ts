// vecsync-indexer commands
// - each command runs one toolkit tool against the configured vector store

import { Command, InvalidArgumentError } from "commander";

import {
  IndexToolNames,
  errorMessage,
  loadEnv,
  type IndexToolName,
  type ToolResult,
  type VecsyncEnv,
} from "@vecsync/core";

import {
  createVecsyncRuntime,
  type VecsyncRuntime,
  type VecsyncRuntimeOptions,
} from "./runtime.js";

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export type CliDeps = {
  io?: CliIo;
  loadEnv?: () => VecsyncEnv;
  createRuntime?: (options: VecsyncRuntimeOptions) => Promise<VecsyncRuntime>;
  setExitCode?: (code: number) => void;
};

type StoreOptions = {
  store?: string;
  connection?: string;
  collectionName?: string;
};

type SearchOptions = {
  collection: string;
  filter?: string;
  cutOff?: number;
  top?: number;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError(`Not a number: ${value}`);
  return parsed;
}

function parseJsonObject(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError(`Not valid JSON: ${value}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError(`Not a JSON object: ${value}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function searchArgs(query: string, opts: SearchOptions): Record<string, unknown> {
  return {
    query,
    collection_suffix: opts.collection,
    ...(opts.filter !== undefined ? { filter: opts.filter } : {}),
    ...(opts.cutOff !== undefined ? { cut_off: opts.cutOff } : {}),
    ...(opts.top !== undefined ? { search_top: opts.top } : {}),
  };
}

async function runTool(runtime: VecsyncRuntime, name: IndexToolName, args: unknown): Promise<ToolResult> {
  const descriptor = runtime.toolkit.getAvailableTools().find((tool) => tool.name === name);
  if (!descriptor) throw new Error(`Unknown tool: ${name}`);
  return await descriptor.handler(args);
}

export function createCliProgram(deps: CliDeps = {}): Command {
  const io: CliIo = deps.io ?? {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  };
  const readEnv = deps.loadEnv ?? loadEnv;
  const createRuntime = deps.createRuntime ?? createVecsyncRuntime;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name("vecsync-indexer")
    .description("Incrementally index a directory into a vector store and search it")
    .option("--store <type>", "Vector store type (default: VECSYNC_VECTORSTORE_TYPE or sqlite)")
    .option("--connection <value>", "SQLite database path or local persist directory")
    .option("--collection-name <name>", "Physical collection name (default: VECSYNC_COLLECTION_NAME)");

  // Opens the runtime, runs one tool and prints its message; failures set exit code 1
  async function execute(
    sourceDir: string | undefined,
    name: IndexToolName,
    args: unknown,
  ): Promise<void> {
    try {
      const store = program.opts<StoreOptions>();
      const runtime = await createRuntime({
        env: readEnv(),
        sourceDir,
        vectorstoreType: store.store,
        connection: store.connection,
        collectionName: store.collectionName,
        logger: { log: io.log, warn: io.error },
      });

      try {
        const result = await runTool(runtime, name, args);
        if (result.isError) throw new Error(result.message);
        io.log(result.message);
      } finally {
        await runtime.close();
      }
    } catch (error) {
      io.error(`[vecsync-indexer] error: ${errorMessage(error)}`);
      setExitCode(1);
    }
  }

  program
    .command("index")
    .description("Index the files of a directory into a collection")
    .argument("<dir>", "Directory to index")
    .requiredOption("-c, --collection <suffix>", "Collection suffix")
    .option("--clean", "Remove the collection's documents before indexing", false)
    .option("--progress-step <percent>", "Percent step between progress lines", parseNumber)
    .option("--chunking-tool <name>", "Chunker applied to every document")
    .option("--chunking-config <json>", "Per-extension chunker options as JSON", parseJsonObject)
    .option("--include <exts...>", "Only index files with these extensions")
    .option("--exclude <exts...>", "Skip files with these extensions")
    .action(
      async (
        dir: string,
        opts: {
          collection: string;
          clean: boolean;
          progressStep?: number;
          chunkingTool?: string;
          chunkingConfig?: Record<string, unknown>;
          include?: string[];
          exclude?: string[];
        },
      ) => {
        await execute(dir, IndexToolNames.indexData, {
          collection_suffix: opts.collection,
          clean_index: opts.clean,
          ...(opts.progressStep !== undefined ? { progress_step: opts.progressStep } : {}),
          ...(opts.chunkingTool ? { chunking_tool: opts.chunkingTool } : {}),
          ...(opts.chunkingConfig ? { chunking_config: opts.chunkingConfig } : {}),
          include_extensions: opts.include ?? [],
          exclude_extensions: opts.exclude ?? [],
        });
      },
    );

  program
    .command("search")
    .description("Search indexed documents")
    .argument("<query>", "Search query")
    .option("-c, --collection <suffix>", "Collection suffix; empty searches every collection", "")
    .option("--filter <json>", "Metadata filter as JSON")
    .option("--cut-off <score>", "Minimum relevance score", parseNumber)
    .option("--top <n>", "Maximum number of results", parseNumber)
    .action(async (query: string, opts: SearchOptions) => {
      await execute(undefined, IndexToolNames.searchIndex, searchArgs(query, opts));
    });

  program
    .command("stepback")
    .description("Rewrite the query into a broader one, then search")
    .argument("<query>", "Search query")
    .option("-c, --collection <suffix>", "Collection suffix; empty searches every collection", "")
    .option("--filter <json>", "Metadata filter as JSON")
    .option("--cut-off <score>", "Minimum relevance score", parseNumber)
    .option("--top <n>", "Maximum number of results", parseNumber)
    .option("--summary", "Answer the query from the found documents", false)
    .action(async (query: string, opts: SearchOptions & { summary: boolean }) => {
      const name = opts.summary
        ? IndexToolNames.stepbackSummaryIndex
        : IndexToolNames.stepbackSearchIndex;
      await execute(undefined, name, searchArgs(query, opts));
    });

  program
    .command("list")
    .description("List indexed collections")
    .action(async () => {
      await execute(undefined, IndexToolNames.listCollections, {});
    });

  program
    .command("remove")
    .description("Remove a collection, or every collection when no suffix is given")
    .argument("[suffix]", "Collection suffix", "")
    .action(async (suffix: string) => {
      await execute(undefined, IndexToolNames.removeIndex, { collection_suffix: suffix });
    });

  return program;
}
