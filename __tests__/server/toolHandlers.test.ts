/**
 * Tool Handler Tests
 */

import { describe, it, expect } from "vitest";
import { executeTool, isValidToolName } from "../../src/server/handlers/toolHandlers.js";
import { TOOLS, getToolNames } from "../../src/server/tools/toolDefinitions.js";
import type { ScanReport } from "../../src/types/index.js";
import { rust } from "../helpers.js";

const RESIZE = rust(
  "#[derive(Accounts)]",
  "pub struct Resize<'info> {",
  "    #[account(mut, realloc = 64, realloc::payer = payer, realloc::zero = false)]",
  "    pub data: Account<'info, Data>,",
  "    #[account(mut)]",
  "    pub payer: SystemAccount<'info>,",
  "}"
);

function textOf(result: { content: Array<{ text: string }> }): string {
  return result.content.map((c) => c.text).join("");
}

describe("tool definitions", () => {
  it("should define one tool per handler", () => {
    expect(getToolNames()).toEqual(["scan_source", "scan_project", "explain_finding", "list_detectors"]);
    for (const tool of TOOLS) {
      expect(isValidToolName(tool.name)).toBe(true);
    }
  });
});

describe("executeTool", () => {
  it("should reject unknown tools", async () => {
    const result = await executeTool("audit_contract", {});

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'Error: Unknown tool "audit_contract". Available tools: scan_source, scan_project, explain_finding, list_detectors'
    );
  });

  it("should reject names inherited from Object.prototype", async () => {
    // Given: a tool name that exists on every object's prototype
    // When: The tool runs
    const result = await executeTool("toString", {});

    // Then: It is treated as unknown
    expect(isValidToolName("toString")).toBe(false);
    expect(isValidToolName("constructor")).toBe(false);
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'Error: Unknown tool "toString". Available tools: scan_source, scan_project, explain_finding, list_detectors'
    );
  });

  it("should report validation errors by path", async () => {
    // Given: scan_source without content
    // When: The tool runs
    const result = await executeTool("scan_source", { path: "lib.rs" });

    // Then: The validation message names the field
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Validation error: content: Required");
  });

  it("should scan inline source", async () => {
    // Given: a realloc payer typed as SystemAccount
    // When: scan_source runs with JSON output
    const result = await executeTool("scan_source", {
      content: RESIZE,
      path: "programs/store/src/lib.rs",
      format: "json",
    });

    // Then: The report carries the ANCHOR-003 finding on the attribute line
    expect(result.isError).toBeUndefined();
    const report: ScanReport = JSON.parse(textOf(result));
    expect(report.target).toBe("programs/store/src/lib.rs");
    expect(report.filesScanned).toBe(1);
    const realloc = report.findings.filter((f) => f.id === "ANCHOR-003");
    expect(realloc).toHaveLength(1);
    expect(realloc[0]?.location.line).toBe(3);
  });

  it("should honour inline config", async () => {
    const result = await executeTool("scan_source", {
      content: RESIZE,
      format: "json",
      config: { disabledDetectors: ["ANCHOR-003"] },
    });

    const report: ScanReport = JSON.parse(textOf(result));
    expect(report.findings.some((f) => f.id === "ANCHOR-003")).toBe(false);
    expect(report.detectorsRun).toBe(5);
  });

  it("should explain by keyword", async () => {
    const result = await executeTool("explain_finding", { findingId: "realloc" });

    expect(textOf(result).split("\n")[0]).toBe("# ANCHOR-003: Realloc Payer Missing Signer Verification");
  });

  it("should list detectors without arguments", async () => {
    const result = await executeTool("list_detectors", undefined);

    expect(textOf(result).split("\n")[0]).toBe("| Id | Severity | Title | Enabled |");
  });

  it("should report a missing project as an error", async () => {
    const result = await executeTool("scan_project", {
      projectRoot: "/nonexistent/anchor-audit-project",
    });

    expect(result.isError).toBe(true);
    expect(textOf(result).startsWith("Error: ")).toBe(true);
  });
});
