#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { connect, disconnect, ensureConnected } from "./cdp/client.js";
import { parseArgs } from "./config.js";
import { CdpDriver } from "./driver/cdp-driver.js";
import { registerWaitTools } from "./tools/wait-tools.js";
import { Waiter } from "./wait/waiter.js";

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));
  const { cdpUrl, headless } = config;

  const server = new McpServer({
    name: "page-waiter",
    version: "0.1.0",
  });

  const waiter = new Waiter({
    timeoutSeconds: config.timeoutSeconds,
    pollIntervalMs: config.pollIntervalMs,
  });
  registerWaitTools(server, {
    waiter,
    getDriver: async () => new CdpDriver(await ensureConnected()),
  });

  // Connect to Chrome
  console.error(`[page-waiter] Connecting to Chrome${cdpUrl ? ` at ${cdpUrl}` : " (launching)"}...`);
  await connect({ cdpUrl, headless });
  console.error(`[page-waiter] Chrome connected (default timeout ${waiter.timeoutSeconds}s)`);

  // Start MCP server on stdio
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[page-waiter] MCP server ready on stdio");

  // Graceful shutdown
  const shutdown = async () => {
    console.error("[page-waiter] Shutting down...");
    await server.close();
    await disconnect();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[page-waiter] Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[page-waiter] Fatal:", err);
  process.exit(1);
});
