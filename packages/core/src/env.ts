// Environment variable loading
// - shared by the indexer CLI and the MCP server

import { config as loadDotenv } from "dotenv";

export type VecsyncEnv = {
  openaiApiKey: string | undefined;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  vectorstoreType: string;
  connection: string | undefined;
  collectionName: string;
  sourceDir: string | undefined;
};

function readOptional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function loadEnv(): VecsyncEnv {
  // .env is a development convenience; plain environment variables are enough
  loadDotenv();

  return {
    openaiApiKey: readOptional("OPENAI_API_KEY"),
    openaiEmbeddingModel: readOptional("OPENAI_EMBEDDING_MODEL") ?? "text-embedding-3-small",
    openaiChatModel: readOptional("OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    vectorstoreType: readOptional("VECSYNC_VECTORSTORE_TYPE") ?? "sqlite",
    connection: readOptional("VECSYNC_CONNECTION"),
    collectionName: readOptional("VECSYNC_COLLECTION_NAME") ?? "vecsync",
    sourceDir: readOptional("VECSYNC_SOURCE_DIR"),
  };
}
