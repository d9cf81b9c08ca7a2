/**
 * Explain Finding Tool
 *
 * Looks up a detector by id, or by keyword when the query is free text, and
 * returns its root cause, exploit scenario and fix.
 */

import { loadScanConfig } from "../config/scanConfig.js";
import {
  createDefaultDetectors,
  findDetector,
  type Detector,
} from "../detectors/index.js";
import { ExplainFindingInputSchema, type ExplainFindingInput } from "../server/schemas/inputSchemas.js";
import { logger } from "../utils/logger.js";
import { formatExplanation } from "../utils/report.js";

// ============================================================================
// Keyword Lookup
// ============================================================================

const KEYWORDS: Record<string, string> = {
  init_if_needed: "ANCHOR-001",
  delegate: "ANCHOR-001",
  close_authority: "ANCHOR-001",
  "token account": "ANCHOR-001",
  duplicate: "ANCHOR-002",
  "double mutation": "ANCHOR-002",
  realloc: "ANCHOR-003",
  payer: "ANCHOR-003",
  cosplay: "ANCHOR-004",
  discriminator: "ANCHOR-004",
  close: "ANCHOR-005",
  reinit: "ANCHOR-005",
  revival: "ANCHOR-005",
  owner: "ANCHOR-006",
  accountinfo: "ANCHOR-006",
  uncheckedaccount: "ANCHOR-006",
};

/**
 * Resolve an id or keyword to a detector.
 */
export function resolveDetector(detectors: readonly Detector[], query: string): Detector | null {
  const direct = findDetector(detectors, query);
  if (direct !== null) return direct;

  const q = query.toLowerCase();
  for (const [keyword, id] of Object.entries(KEYWORDS)) {
    if (q.includes(keyword)) {
      return findDetector(detectors, id);
    }
  }
  return null;
}

// ============================================================================
// Main Function
// ============================================================================

export async function explainFinding(input: ExplainFindingInput): Promise<string> {
  const { findingId, projectRoot } = ExplainFindingInputSchema.parse(input);
  logger.info(`[explainFinding] Explaining: ${findingId}`);

  const config = projectRoot !== undefined ? await loadScanConfig(projectRoot) : undefined;
  // disabled detectors can still be explained
  const detectors = createDefaultDetectors({ ...config, disabledDetectors: [] });
  const detector = resolveDetector(detectors, findingId);

  if (detector === null) {
    return formatNotFound(findingId, detectors);
  }

  return formatExplanation(detector.explain());
}

function formatNotFound(query: string, detectors: readonly Detector[]): string {
  return [
    `No explanation found for "${query}".`,
    "",
    "Available detector ids:",
    ...detectors.map((d) => `- ${d.id}: ${d.title}`),
    "",
    `Keywords: ${Object.keys(KEYWORDS).join(", ")}`,
  ].join("\n");
}
