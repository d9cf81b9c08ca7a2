/**
 * SARIF Generator Tests
 */

import { describe, it, expect } from "vitest";
import { generateSarifReport, severityToLevel } from "../../src/utils/sarif.js";
import { Severity } from "../../src/types/index.js";
import { createFinding } from "../helpers.js";

describe("severityToLevel", () => {
  it("should map severities to SARIF levels", () => {
    expect(severityToLevel(Severity.CRITICAL)).toBe("error");
    expect(severityToLevel(Severity.HIGH)).toBe("error");
    expect(severityToLevel(Severity.MEDIUM)).toBe("warning");
    expect(severityToLevel(Severity.LOW)).toBe("note");
  });
});

describe("generateSarifReport", () => {
  const findings = [
    createFinding({
      id: "ANCHOR-004",
      title: "Account Type Cosplay",
      severity: Severity.MEDIUM,
      confidence: "medium",
      reference: "https://github.com/solana-foundation/anchor/pull/4229",
      location: { file: "programs/a/src/lib.rs", line: 12, struct: "Read", field: "feed" },
    }),
    createFinding({
      id: "ANCHOR-004",
      title: "Account Type Cosplay",
      severity: Severity.MEDIUM,
      location: { file: "programs/a/src/lib.rs", line: 30, struct: "Write", field: "feed" },
    }),
    createFinding({
      id: "CUSTOM-NO-MSG",
      title: "Logging",
      severity: Severity.LOW,
      location: { file: "programs/b/src/lib.rs", line: 4 },
    }),
  ];

  it("should emit one rule per detector id", () => {
    // Given: three findings from two detectors
    // When: We generate SARIF
    const run = generateSarifReport(findings).runs[0];

    // Then: Rules are deduplicated and results point back at them
    expect(run?.tool.driver.name).toBe("anchor-audit-mcp");
    expect(run?.tool.driver.rules.map((r) => r.id)).toEqual(["ANCHOR-004", "CUSTOM-NO-MSG"]);
    expect(run?.results.map((r) => [r.ruleId, r.ruleIndex, r.level])).toEqual([
      ["ANCHOR-004", 0, "warning"],
      ["ANCHOR-004", 0, "warning"],
      ["CUSTOM-NO-MSG", 1, "note"],
    ]);
  });

  it("should describe rules with tags, precision and help links", () => {
    const [cosplay, custom] = generateSarifReport(findings).runs[0]?.tool.driver.rules ?? [];

    expect(cosplay?.helpUri).toBe("https://github.com/solana-foundation/anchor/pull/4229");
    expect(cosplay?.properties?.precision).toBe("medium");
    expect(cosplay?.properties?.["security-severity"]).toBe("5.0");
    expect(custom?.helpUri).toBeUndefined();
    expect(custom?.properties?.tags).toEqual(["security", "solana", "anchor", "custom-detector"]);
  });

  it("should place results by line and struct member", () => {
    const [first, , third] = generateSarifReport(findings).runs[0]?.results ?? [];

    expect(first?.locations[0]).toEqual({
      physicalLocation: {
        artifactLocation: { uri: "programs/a/src/lib.rs" },
        region: { startLine: 12 },
      },
      logicalLocations: [{ name: "feed", fullyQualifiedName: "Read.feed", kind: "member" }],
    });
    expect(third?.locations[0]?.logicalLocations).toBeUndefined();
  });

  it("should list each file once as an artifact", () => {
    const artifacts = generateSarifReport(findings).runs[0]?.artifacts;

    expect(artifacts).toEqual([
      { location: { uri: "programs/a/src/lib.rs" }, sourceLanguage: "rust" },
      { location: { uri: "programs/b/src/lib.rs" }, sourceLanguage: "rust" },
    ]);
  });

  it("should give distinct fingerprints to distinct locations", () => {
    const results = generateSarifReport(findings).runs[0]?.results ?? [];
    const prints = results.map((r) => r.fingerprints?.["primaryLocationLineHash"]);

    expect(new Set(prints).size).toBe(3);
  });
});
