/**
 * MCP server for the scan, explain and list tools.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import { BUILT_IN_DETECTOR_IDS } from "../detectors/index.js";
import { logger } from "../utils/logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./config.js";
import { executeTool } from "./handlers/toolHandlers.js";
import { TOOLS, getToolNames } from "./tools/toolDefinitions.js";

const serverLogger = logger.child({ component: "mcp" });

export interface ServerInfo {
  name: string;
  version: string;
  tools: string[];
  /** Built-in rules; configured rules depend on the scanned project */
  detectors: readonly string[];
}

export function getServerInfo(): ServerInfo {
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: getToolNames(),
    detectors: BUILT_IN_DETECTOR_IDS,
  };
}

/**
 * Build an unconnected server. Tool calls never reject: failures come back as
 * `isError` results.
 *
 * @example
 * ```ts
 * const server = createAuditServer();
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createAuditServer(): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    serverLogger.debug("CallTool", { tool: name, args: Object.keys(args ?? {}) });
    return executeTool(name, args);
  });

  return server;
}

export { SERVER_NAME, SERVER_VERSION } from "./config.js";
export { TOOLS, getToolNames } from "./tools/toolDefinitions.js";
export {
  executeTool,
  isValidToolName,
  type ToolResult,
  type ToolName,
} from "./handlers/toolHandlers.js";
export * from "./schemas/inputSchemas.js";
