// Toolkit runtime
// - wires env, the vector-store backend, the directory source and the model clients
// - shared by the CLI and the MCP server

import OpenAI from "openai";

import {
  IndexerToolkit,
  createDirectoryLoader,
  createVectorStoreAdapter,
  fileDedupStrategy,
  type CodeIndexedEntry,
  type CompleteText,
  type EmbedTexts,
  type IndexLogger,
  type VecsyncEnv,
  type VectorStoreAdapter,
} from "@vecsync/core";

import { createOpenAiComplete, createOpenAiEmbedTexts, embeddingDimForModel } from "./openai.js";

export type ModelCapabilities = {
  embeddingModel: string;
  embeddingDim: number;
  embedTexts: EmbedTexts;
  complete?: CompleteText;
};

export type VecsyncRuntimeOptions = {
  env: VecsyncEnv;
  // directory source root; defaults to VECSYNC_SOURCE_DIR, then the working directory
  sourceDir?: string;
  vectorstoreType?: string;
  connection?: string;
  collectionName?: string;
  logger?: IndexLogger;
  // defaults to the OpenAI clients built from the env
  models?: ModelCapabilities;
};

export type VecsyncRuntime = {
  adapter: VectorStoreAdapter;
  toolkit: IndexerToolkit<CodeIndexedEntry>;
  close(): Promise<void>;
};

export function createOpenAiCapabilities(env: VecsyncEnv): ModelCapabilities {
  const apiKey = env.openaiApiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is missing. Set it via .env or environment variables.");
  }

  const client = new OpenAI({ apiKey });
  return {
    embeddingModel: env.openaiEmbeddingModel,
    embeddingDim: embeddingDimForModel(env.openaiEmbeddingModel),
    embedTexts: createOpenAiEmbedTexts(client, env.openaiEmbeddingModel),
    complete: createOpenAiComplete(client, env.openaiChatModel),
  };
}

export async function createVecsyncRuntime(options: VecsyncRuntimeOptions): Promise<VecsyncRuntime> {
  const { env, logger } = options;
  const models = options.models ?? createOpenAiCapabilities(env);

  const adapter = await createVectorStoreAdapter(options.vectorstoreType ?? env.vectorstoreType, {
    collectionName: options.collectionName ?? env.collectionName,
    embeddingModel: models.embeddingModel,
    embeddingDim: models.embeddingDim,
    connection: options.connection ?? env.connection,
    logger,
  });

  const toolkit = new IndexerToolkit({
    adapter,
    loader: createDirectoryLoader({ root: options.sourceDir ?? env.sourceDir ?? process.cwd() }),
    strategy: fileDedupStrategy,
    embedTexts: models.embedTexts,
    complete: models.complete,
    logger,
  });

  return { adapter, toolkit, close: async () => await adapter.close() };
}
