/**
 * Explain Finding Tool Tests
 */

import { describe, it, expect } from "vitest";
import { explainFinding, resolveDetector } from "../../src/tools/explainFinding.js";
import { createDefaultDetectors } from "../../src/detectors/index.js";

describe("resolveDetector", () => {
  const detectors = createDefaultDetectors();

  it.each([
    ["ANCHOR-004", "ANCHOR-004"],
    ["anchor-002", "ANCHOR-002"],
    ["realloc payer", "ANCHOR-003"],
    ["close_authority on token account", "ANCHOR-001"],
    ["account revival after close", "ANCHOR-005"],
    ["UncheckedAccount", "ANCHOR-006"],
  ])("should resolve %s to %s", (query, id) => {
    expect(resolveDetector(detectors, query)?.id).toBe(id);
  });

  it("should return null when nothing matches", () => {
    expect(resolveDetector(detectors, "reentrancy")).toBeNull();
  });
});

describe("explainFinding", () => {
  it("should explain a detector by id", async () => {
    // Given: a known detector id
    // When: We ask for its explanation
    const result = await explainFinding({ findingId: "ANCHOR-002" });

    // Then: The heading and sections are present
    expect(result.startsWith("# ANCHOR-002: Duplicate Mutable Account Bypass\n")).toBe(true);
    expect(result).toContain("**Severity:** medium");
    expect(result).toContain("## Root Cause");
  });

  it("should explain a detector by keyword", async () => {
    const result = await explainFinding({ findingId: "discriminator" });

    expect(result.startsWith("# ANCHOR-004: Account Type Cosplay: Missing Discriminator Check\n")).toBe(true);
  });

  it("should list detectors when nothing matches", async () => {
    const result = await explainFinding({ findingId: "reentrancy" });
    const lines = result.split("\n");

    expect(lines[0]).toBe('No explanation found for "reentrancy".');
    expect(lines.slice(2, 9)).toEqual([
      "Available detector ids:",
      "- ANCHOR-001: init_if_needed Incomplete Field Validation",
      "- ANCHOR-002: Duplicate Mutable Account Bypass",
      "- ANCHOR-003: Realloc Payer Missing Signer Verification",
      "- ANCHOR-004: Account Type Cosplay: Missing Discriminator Check",
      "- ANCHOR-005: Close + Reinit Lifecycle Attack",
      "- ANCHOR-006: Missing Owner Validation",
    ]);
  });

  it("should reject an empty query", async () => {
    await expect(explainFinding({ findingId: "" })).rejects.toThrow();
  });
});
