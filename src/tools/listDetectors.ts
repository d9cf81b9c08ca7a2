/**
 * List Detectors Tool
 */

import { loadScanConfig } from "../config/scanConfig.js";
import { createDefaultDetectors } from "../detectors/index.js";
import { ListDetectorsInputSchema, type ListDetectorsInput } from "../server/schemas/inputSchemas.js";

export async function listDetectors(input: ListDetectorsInput = {}): Promise<string> {
  const { projectRoot } = ListDetectorsInputSchema.parse(input);
  const config = projectRoot !== undefined ? await loadScanConfig(projectRoot) : undefined;
  const disabled = new Set(config?.disabledDetectors ?? []);
  const detectors = createDefaultDetectors({ ...config, disabledDetectors: [] });

  const lines = ["| Id | Severity | Title | Enabled |", "|----|----------|-------|---------|"];
  for (const detector of detectors) {
    const enabled = detector.enabled && !disabled.has(detector.id) ? "yes" : "no";
    lines.push(`| ${detector.id} | ${detector.severity} | ${detector.title} | ${enabled} |`);
  }
  return lines.join("\n");
}
