// Toolkit tools
// - one MCP tool per toolkit descriptor, with the descriptor's zod shape as input schema

import { IndexToolNames, type IndexToolName, type ToolDescriptor } from "@vecsync/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ZodRawShape } from "zod";

import type { McpToolDeps } from "../mcpDeps.js";

const WRITE_TOOLS: ReadonlySet<IndexToolName> = new Set([
  IndexToolNames.indexData,
  IndexToolNames.removeIndex,
]);

export function toolTitle(name: string): string {
  const text = name.replace(/_/g, " ");
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function registerToolkitTool(server: McpServer, deps: McpToolDeps, descriptor: ToolDescriptor): void {
  const lock = WRITE_TOOLS.has(descriptor.name) ? deps.indexLock : undefined;
  const inputSchema: ZodRawShape = descriptor.inputSchema.shape;

  server.registerTool(
    descriptor.name,
    {
      title: toolTitle(descriptor.name),
      description: descriptor.description,
      inputSchema,
    },
    async (args: unknown) => {
      const run = () => descriptor.handler(args);
      const result = lock ? await lock.runExclusive(run) : await run();
      return {
        content: [{ type: "text" as const, text: result.message }],
        ...(result.isError ? { isError: true } : {}),
      };
    },
  );
}

export function registerToolkitTools(server: McpServer, deps: McpToolDeps): void {
  for (const descriptor of deps.toolkit.getAvailableTools()) {
    registerToolkitTool(server, deps, descriptor);
  }
}
