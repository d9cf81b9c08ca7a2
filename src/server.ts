#!/usr/bin/env node

/**
 * Anchor Audit MCP Server
 *
 * Serves the scan, explain and list tools over stdio. Logs go to stderr.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createAuditServer, getServerInfo } from "./server/index.js";
import { logger } from "./utils/logger.js";

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const info = getServerInfo();
  logger.info(`Starting ${info.name} v${info.version}`);

  const server = createAuditServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);

  logger.info(`${info.name} is running on stdio transport`);
  logger.info(`Available tools: ${info.tools.join(", ")}`);
  logger.info(`Built-in detectors: ${info.detectors.join(", ")}`);
}

main().catch((error) => {
  logger.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
