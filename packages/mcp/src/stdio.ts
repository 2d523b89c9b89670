#!/usr/bin/env node
// vecsync MCP server - STDIO transport
// - exposes index_data, search and collection tools over the toolkit

import { errorMessage } from "@vecsync/core";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createVecsyncMcpServer } from "./createVecsyncMcpServer.js";

async function main(): Promise<void> {
  const { server, runtime } = await createVecsyncMcpServer();

  const shutdown = async (): Promise<void> => {
    await server.close();
    await runtime.runtime.close();
  };
  process.once("SIGINT", () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[vecsync-mcp] shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      },
    );
  });

  await server.connect(new StdioServerTransport());
  console.error("[vecsync-mcp] listening on stdio");
}

try {
  await main();
} catch (error) {
  console.error(`[vecsync-mcp] error: ${errorMessage(error)}`);
  process.exitCode = 1;
}
