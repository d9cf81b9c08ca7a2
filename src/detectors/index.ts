/**
 * Detector set construction.
 *
 * The detector list is built explicitly per scan and handed to the engine;
 * there is no global registry.
 */

import { defaultScanConfig, type ScanConfig } from "../config/scanConfig.js";
import type { BuiltInDetectorId } from "../types/index.js";
import type { Detector, DetectorOptions } from "./BaseDetector.js";
import { CloseReinitDetector } from "./CloseReinitDetector.js";
import { ConfiguredRuleDetector } from "./ConfiguredRuleDetector.js";
import { DuplicateMutableDetector } from "./DuplicateMutableDetector.js";
import { InitIfNeededDetector } from "./InitIfNeededDetector.js";
import { MissingOwnerDetector } from "./MissingOwnerDetector.js";
import { ReallocPayerDetector } from "./ReallocPayerDetector.js";
import { TypeCosplayDetector } from "./TypeCosplayDetector.js";

export const BUILT_IN_DETECTOR_IDS: readonly BuiltInDetectorId[] = [
  "ANCHOR-001",
  "ANCHOR-002",
  "ANCHOR-003",
  "ANCHOR-004",
  "ANCHOR-005",
  "ANCHOR-006",
];

/**
 * Build the ordered detector list: built-ins in id order, then configured
 * rules. Disabled ids are left out.
 *
 * @example
 * ```ts
 * const detectors = createDefaultDetectors({ disabledDetectors: ["ANCHOR-002"] });
 * const findings = scanFile("programs/vault/src/lib.rs", source, detectors);
 * ```
 */
export function createDefaultDetectors(config: Partial<ScanConfig> = {}): Detector[] {
  const resolved: ScanConfig = { ...defaultScanConfig(), ...config };
  const disabled = new Set(resolved.disabledDetectors);

  const optionsFor = (id: string): DetectorOptions => {
    const severity = resolved.severityOverrides[id];
    return severity === undefined ? {} : { severity };
  };

  const detectors: Detector[] = [
    new InitIfNeededDetector(optionsFor("ANCHOR-001")),
    new DuplicateMutableDetector(optionsFor("ANCHOR-002")),
    new ReallocPayerDetector(optionsFor("ANCHOR-003")),
    new TypeCosplayDetector(optionsFor("ANCHOR-004")),
    new CloseReinitDetector({ ...optionsFor("ANCHOR-005"), scope: resolved.closeReinitScope }),
    new MissingOwnerDetector({
      ...optionsFor("ANCHOR-006"),
      uncheckedAccountSeverity: resolved.uncheckedAccountSeverity,
    }),
    ...resolved.rules.map((rule) => new ConfiguredRuleDetector(rule, optionsFor(`CUSTOM-${rule.id}`))),
  ];

  return detectors.filter((detector) => !disabled.has(detector.id));
}

/**
 * Explanation lookup by id, case-insensitive.
 */
export function findDetector(detectors: readonly Detector[], id: string): Detector | null {
  const wanted = id.trim().toUpperCase();
  return detectors.find((detector) => detector.id.toUpperCase() === wanted) ?? null;
}

export { BaseDetector, type Detector, type DetectorExplanation, type DetectorOptions } from "./BaseDetector.js";
export { CloseReinitDetector, type CloseReinitScope } from "./CloseReinitDetector.js";
export { ConfiguredRuleDetector } from "./ConfiguredRuleDetector.js";
export { DuplicateMutableDetector } from "./DuplicateMutableDetector.js";
export { InitIfNeededDetector } from "./InitIfNeededDetector.js";
export { MissingOwnerDetector } from "./MissingOwnerDetector.js";
export { ReallocPayerDetector } from "./ReallocPayerDetector.js";
export { TypeCosplayDetector } from "./TypeCosplayDetector.js";
