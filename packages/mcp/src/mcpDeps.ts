// Shared dependency container for MCP tool registration

import type { CodeIndexedEntry, IndexerToolkit } from "@vecsync/core";

export type IndexLock = {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
};

export type McpToolDeps = {
  toolkit: IndexerToolkit<CodeIndexedEntry>;
  // serializes tools that write to the vector store
  indexLock?: IndexLock;
};
