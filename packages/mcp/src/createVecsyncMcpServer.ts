import { loadEnv, type IndexLogger } from "@vecsync/core";
import {
  createVecsyncRuntime,
  type VecsyncRuntime,
  type VecsyncRuntimeOptions,
} from "@vecsync/indexer";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { AsyncMutex } from "./lib/asyncMutex.js";
import type { McpToolDeps } from "./mcpDeps.js";
import { registerToolkitTools } from "./tools/registerToolkitTools.js";

export type VecsyncMcpRuntime = {
  runtime: VecsyncRuntime;
  deps: McpToolDeps;
};

// stdout carries the protocol, so every log line goes to stderr
export const stderrLogger: IndexLogger = {
  log: (line) => console.error(line),
  warn: (line) => console.error(line),
};

export async function createVecsyncMcpRuntime(
  options: VecsyncRuntimeOptions,
): Promise<VecsyncMcpRuntime> {
  const runtime = await createVecsyncRuntime({ logger: stderrLogger, ...options });
  return {
    runtime,
    deps: { toolkit: runtime.toolkit, indexLock: new AsyncMutex() },
  };
}

export async function createVecsyncMcpRuntimeFromEnv(): Promise<VecsyncMcpRuntime> {
  return await createVecsyncMcpRuntime({ env: loadEnv() });
}

export function createVecsyncMcpServerFromRuntime(runtime: VecsyncMcpRuntime): McpServer {
  const server = new McpServer({ name: "vecsync-mcp", version: "0.1.0" });
  registerToolkitTools(server, runtime.deps);
  return server;
}

export async function createVecsyncMcpServer(): Promise<{
  server: McpServer;
  runtime: VecsyncMcpRuntime;
}> {
  const runtime = await createVecsyncMcpRuntimeFromEnv();
  return { server: createVecsyncMcpServerFromRuntime(runtime), runtime };
}
