/**
 * Shared test helpers.
 */

import { parseSource, type ScanContext } from "../src/parser/index.js";
import { Severity, type Finding } from "../src/types/index.js";

/**
 * Join source lines so fixture line numbers can be read off the array index
 * (element 0 is line 1).
 */
export function rust(...lines: string[]): string {
  return lines.join("\n");
}

export function contextOf(content: string, path = "lib.rs"): ScanContext {
  return parseSource({ path, content });
}

export function createFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: "ANCHOR-001",
    title: "Test Finding",
    severity: Severity.HIGH,
    description: "Test finding",
    location: { file: "lib.rs", line: 1 },
    recommendation: "Fix it",
    reference: "",
    confidence: "high",
    rootCause: "Test root cause",
    exploitScenario: "",
    anchorVersionsAffected: "0.25.0 - 0.30.x",
    ecosystemRecommendations: [],
    ...overrides,
  };
}
