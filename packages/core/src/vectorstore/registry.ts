import { VectorStoreConfigError } from "../errors.js";

import { localBackend } from "./localAdapter.js";
import { sqliteBackend } from "./sqliteAdapter.js";
import type { VectorStoreAdapter, VectorStoreAdapterOptions, VectorStoreBackend } from "./types.js";

const backends = new Map<string, VectorStoreBackend>([
  ["sqlite", sqliteBackend],
  ["local", localBackend],
]);

export function registerVectorStoreAdapter(type: string, backend: VectorStoreBackend): void {
  backends.set(type.trim().toLowerCase(), backend);
}

export function listVectorStoreTypes(): string[] {
  return [...backends.keys()].sort();
}

export function getVectorStoreBackend(type: string): VectorStoreBackend {
  const backend = backends.get(type.trim().toLowerCase());
  if (!backend) {
    throw new VectorStoreConfigError(
      `Unknown vector store type: ${type}. Supported types: ${listVectorStoreTypes().join(", ")}`,
    );
  }
  return backend;
}

export async function createVectorStoreAdapter(
  type: string,
  options: VectorStoreAdapterOptions,
): Promise<VectorStoreAdapter> {
  return await getVectorStoreBackend(type).open(options);
}
