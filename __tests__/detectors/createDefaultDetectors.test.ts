/**
 * Detector Set Tests
 */

import { describe, it, expect } from "vitest";
import {
  BUILT_IN_DETECTOR_IDS,
  CloseReinitDetector,
  MissingOwnerDetector,
  createDefaultDetectors,
  findDetector,
} from "../../src/detectors/index.js";
import { ScanConfigSchema } from "../../src/config/scanConfig.js";
import { Severity } from "../../src/types/index.js";

describe("createDefaultDetectors", () => {
  it("should build the built-ins in id order", () => {
    expect(createDefaultDetectors().map((d) => d.id)).toEqual([...BUILT_IN_DETECTOR_IDS]);
  });

  it("should leave out disabled detectors", () => {
    const detectors = createDefaultDetectors({ disabledDetectors: ["ANCHOR-002", "ANCHOR-005"] });

    expect(detectors.map((d) => d.id)).toEqual([
      "ANCHOR-001",
      "ANCHOR-003",
      "ANCHOR-004",
      "ANCHOR-006",
    ]);
  });

  it("should apply severity overrides by id", () => {
    // Given: a config lowering ANCHOR-001
    const config = ScanConfigSchema.parse({ severityOverrides: { "ANCHOR-001": "low" } });

    // When: The detectors are built
    const detectors = createDefaultDetectors(config);

    // Then: Only that detector changes
    expect(findDetector(detectors, "ANCHOR-001")?.severity).toBe(Severity.LOW);
    expect(findDetector(detectors, "ANCHOR-006")?.severity).toBe(Severity.HIGH);
  });

  it("should pass rule options through", () => {
    const config = ScanConfigSchema.parse({
      closeReinitScope: "file",
      uncheckedAccountSeverity: "medium",
    });

    const detectors = createDefaultDetectors(config);
    const close = detectors.find((d) => d instanceof CloseReinitDetector);
    const owner = detectors.find((d) => d instanceof MissingOwnerDetector);

    expect(close instanceof CloseReinitDetector && close.scope).toBe("file");
    expect(owner instanceof MissingOwnerDetector && owner.uncheckedAccountSeverity).toBe(
      Severity.MEDIUM
    );
  });

  it("should append configured rules", () => {
    const config = ScanConfigSchema.parse({
      rules: [
        {
          id: "NO-MSG",
          type: "regex",
          title: "Logging",
          description: "Logs cost compute",
          severity: "low",
          pattern: "msg!",
        },
      ],
    });

    const ids = createDefaultDetectors(config).map((d) => d.id);

    expect(ids).toHaveLength(7);
    expect(ids[6]).toBe("CUSTOM-NO-MSG");
  });
});

describe("findDetector", () => {
  it("should match ids case-insensitively", () => {
    expect(findDetector(createDefaultDetectors(), " anchor-003 ")?.id).toBe("ANCHOR-003");
  });

  it("should return null for unknown ids", () => {
    expect(findDetector(createDefaultDetectors(), "ANCHOR-999")).toBeNull();
  });
});

describe("explain", () => {
  it("should describe every built-in detector", () => {
    for (const detector of createDefaultDetectors()) {
      const explanation = detector.explain();

      expect(explanation.id).toBe(detector.id);
      expect(explanation.rootCause).not.toBe("");
      expect(explanation.exploitScenario).not.toBe("");
      expect(explanation.fix).not.toBe("");
      expect(explanation.reference).toBe("https://github.com/solana-foundation/anchor/pull/4229");
      expect(explanation.beforeAfterState).toBeDefined();
      expect(explanation.impact?.attackCost.startsWith("< 0.01 SOL")).toBe(true);
      expect(explanation.anchorVersionsAffected).not.toBe("");
      expect(explanation.ecosystemRecommendations.length).toBeGreaterThan(1);
    }
  });
});
