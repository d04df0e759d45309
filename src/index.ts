#!/usr/bin/env node

/**
 * dac-eq-mcp MCP entry point.
 *
 * Builds the device registry from the environment and serves the tools
 * over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { createLogger } from "./utils/logger.js";
import { NodeHidBackend } from "./hid/node-hid-backend.js";
import { DeviceRegistry } from "./core/device-registry.js";
import { createDefaultHandlerFactories } from "./devices/index.js";
import { createServer } from "./server.js";

const config = loadConfig();
const logger = createLogger("dac-eq", config.logLevel);
const backend = new NodeHidBackend();

const registry = new DeviceRegistry({
  backend,
  factories: createDefaultHandlerFactories({ backend, logger, config }),
  logger: logger.child("registry"),
});

const server = createServer(registry, logger.child("tools"));

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("server ready on stdio");
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
