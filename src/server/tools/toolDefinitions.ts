/**
 * Tool Definitions
 *
 * Tool metadata exposed to MCP clients.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

const FORMAT_PROPERTY = {
  type: "string",
  enum: ["markdown", "json", "sarif"],
  description: "Output format for the report",
  default: "markdown",
};

// ============================================================================
// Tool Definitions
// ============================================================================

export const TOOLS: Tool[] = [
  {
    name: "scan_source",
    description:
      "Scans the text of one Anchor program file for account-validation weaknesses " +
      "(init_if_needed token fields, duplicate mutable accounts, realloc payers, raw " +
      "account handles, close + reinit) and returns findings with a letter grade.",
    inputSchema: {
      type: "object",
      properties: {
        content: {
          type: "string",
          description: "Rust source text of an Anchor program",
        },
        path: {
          type: "string",
          description: "Path label used in findings",
          default: "lib.rs",
        },
        format: FORMAT_PROPERTY,
        config: {
          type: "object",
          description: "Detector configuration, as in .anchor-audit.json",
        },
      },
      required: ["content"],
    },
  },
  {
    name: "scan_project",
    description:
      "Scans every .rs file under an Anchor workspace or program directory (skipping " +
      "target/ and node_modules/), applying the project's .anchor-audit config file, " +
      "and reports findings, the Anchor version and a letter grade.",
    inputSchema: {
      type: "object",
      properties: {
        projectRoot: {
          type: "string",
          description: "Anchor workspace, program directory or single .rs file",
        },
        format: FORMAT_PROPERTY,
        configPath: {
          type: "string",
          description: "Explicit config file (defaults to .anchor-audit.* in the project root)",
        },
      },
      required: ["projectRoot"],
    },
  },
  {
    name: "explain_finding",
    description:
      "Explains a detector: root cause, exploit scenario and fix. Accepts an id such " +
      "as ANCHOR-003 or a keyword such as 'realloc'.",
    inputSchema: {
      type: "object",
      properties: {
        findingId: {
          type: "string",
          description: "Detector id (e.g. 'ANCHOR-001') or keyword (e.g. 'realloc', 'owner')",
        },
        projectRoot: {
          type: "string",
          description: "Project whose configured rules should also be searched",
        },
      },
      required: ["findingId"],
    },
  },
  {
    name: "list_detectors",
    description: "Lists the built-in detectors and any configured project rules.",
    inputSchema: {
      type: "object",
      properties: {
        projectRoot: {
          type: "string",
          description: "Project whose configured rules should be listed too",
        },
      },
    },
  },
];

/**
 * Get tool names for display purposes.
 */
export function getToolNames(): string[] {
  return TOOLS.map((t) => t.name);
}
