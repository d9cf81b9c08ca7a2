/**
 * Tool Handlers
 *
 * Dispatch from MCP tool names to tool implementations, with input errors
 * turned into `isError` results.
 */

import { z } from "zod";

import { logger } from "../../utils/logger.js";
import { explainFinding } from "../../tools/explainFinding.js";
import { listDetectors } from "../../tools/listDetectors.js";
import { scanProjectTool, scanSourceTool } from "../../tools/scanProgram.js";
import {
  ExplainFindingInputSchema,
  ListDetectorsInputSchema,
  ScanProjectInputSchema,
  ScanSourceInputSchema,
} from "../schemas/inputSchemas.js";
import { TOOLS } from "../tools/toolDefinitions.js";

// ============================================================================
// Types
// ============================================================================

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
  [key: string]: unknown;
}

export type ToolName = "scan_source" | "scan_project" | "explain_finding" | "list_detectors";

// ============================================================================
// Individual Tool Handlers
// ============================================================================

async function handleScanSource(args: unknown): Promise<string> {
  const input = ScanSourceInputSchema.parse(args);
  logger.info(`scan_source called`, { path: input.path });
  return await scanSourceTool(input);
}

async function handleScanProject(args: unknown): Promise<string> {
  const input = ScanProjectInputSchema.parse(args);
  logger.info(`scan_project called`, { projectRoot: input.projectRoot });
  return await scanProjectTool(input);
}

async function handleExplainFinding(args: unknown): Promise<string> {
  const input = ExplainFindingInputSchema.parse(args);
  logger.info(`explain_finding called`, { findingId: input.findingId });
  return await explainFinding(input);
}

async function handleListDetectors(args: unknown): Promise<string> {
  const input = ListDetectorsInputSchema.parse(args ?? {});
  return await listDetectors(input);
}

// ============================================================================
// Tool Handler Registry
// ============================================================================

const TOOL_HANDLERS: Record<ToolName, (args: unknown) => Promise<string>> = {
  scan_source: handleScanSource,
  scan_project: handleScanProject,
  explain_finding: handleExplainFinding,
  list_detectors: handleListDetectors,
};

/**
 * Check if a tool name is valid.
 */
export function isValidToolName(name: string): name is ToolName {
  return Object.hasOwn(TOOL_HANDLERS, name);
}

// ============================================================================
// Main Tool Executor
// ============================================================================

/**
 * Execute a tool by name with the given arguments.
 */
export async function executeTool(name: string, args: unknown): Promise<ToolResult> {
  logger.info(`CallTool request: ${name}`);

  if (!isValidToolName(name)) {
    logger.error(`Unknown tool requested: ${name}`);
    return {
      content: [
        {
          type: "text",
          text: `Error: Unknown tool "${name}". Available tools: ${TOOLS.map((t) => t.name).join(", ")}`,
        },
      ],
      isError: true,
    };
  }

  try {
    const result = await TOOL_HANDLERS[name](args);
    return {
      content: [{ type: "text", text: result }],
    };
  } catch (error) {
    return handleToolError(name, error);
  }
}

function handleToolError(toolName: string, error: unknown): ToolResult {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`Error executing tool ${toolName}: ${errorMessage}`);

  if (error instanceof z.ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return {
      content: [{ type: "text", text: `Validation error: ${issues}` }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: `Error: ${errorMessage}` }],
    isError: true,
  };
}
