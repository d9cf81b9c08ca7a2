/**
 * Input Schemas
 *
 * Zod validation schemas for all MCP tool inputs.
 */

import { z } from "zod";
import { ScanConfigSchema } from "../../config/scanConfig.js";

const FormatSchema = z
  .enum(["markdown", "json", "sarif"])
  .optional()
  .default("markdown")
  .describe("Output format for the report");

// ============================================================================
// Tool Input Schemas
// ============================================================================

export const ScanSourceInputSchema = z.object({
  content: z.string().describe("Rust source text of an Anchor program"),
  path: z
    .string()
    .optional()
    .default("lib.rs")
    .describe("Path label used in findings"),
  format: FormatSchema,
  config: ScanConfigSchema.optional().describe("Detector configuration, as in .anchor-audit.json"),
});

export const ScanProjectInputSchema = z.object({
  projectRoot: z.string().describe("Anchor workspace, program directory or single .rs file"),
  format: FormatSchema,
  configPath: z
    .string()
    .optional()
    .describe("Explicit config file (defaults to .anchor-audit.* in the project root)"),
});

export const ExplainFindingInputSchema = z.object({
  findingId: z
    .string()
    .min(1)
    .describe("Detector id (e.g. 'ANCHOR-001') or keyword (e.g. 'realloc', 'owner')"),
  projectRoot: z
    .string()
    .optional()
    .describe("Project whose configured rules should also be searched"),
});

export const ListDetectorsInputSchema = z.object({
  projectRoot: z
    .string()
    .optional()
    .describe("Project whose configured rules should be listed too"),
});

// ============================================================================
// Types
// ============================================================================

export type ScanSourceInput = z.input<typeof ScanSourceInputSchema>;
export type ScanProjectInput = z.input<typeof ScanProjectInputSchema>;
export type ExplainFindingInput = z.input<typeof ExplainFindingInputSchema>;
export type ListDetectorsInput = z.input<typeof ListDetectorsInputSchema>;
