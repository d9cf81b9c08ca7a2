/**
 * SARIF Report Generator
 *
 * Static Analysis Results Interchange Format output for GitHub Code Scanning
 * and other SARIF consumers.
 *
 * SARIF Specification: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { Severity, type Finding } from "../types/index.js";
import { PACKAGE_NAME, PACKAGE_VERSION } from "../version.js";

// ============================================================================
// SARIF Types
// ============================================================================

interface SarifReport {
  $schema: string;
  version: string;
  runs: SarifRun[];
}

interface SarifRun {
  tool: SarifTool;
  results: SarifResult[];
  artifacts?: SarifArtifact[];
}

interface SarifTool {
  driver: SarifDriver;
}

interface SarifDriver {
  name: string;
  version: string;
  rules: SarifRule[];
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: {
    text: string;
  };
  helpUri?: string;
  help?: {
    text: string;
    markdown?: string;
  };
  defaultConfiguration: {
    level: SarifLevel;
  };
  properties?: {
    tags?: string[];
    precision?: string;
    "security-severity"?: string;
  };
}

interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: SarifLevel;
  message: {
    text: string;
  };
  locations: SarifLocation[];
  fingerprints?: Record<string, string>;
  properties?: Record<string, unknown>;
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: {
      uri: string;
    };
    region?: {
      startLine: number;
    };
  };
  logicalLocations?: Array<{
    name?: string;
    fullyQualifiedName?: string;
    kind?: string;
  }>;
}

interface SarifArtifact {
  location: {
    uri: string;
  };
  sourceLanguage?: string;
}

type SarifLevel = "none" | "note" | "warning" | "error";

// ============================================================================
// SARIF Generation
// ============================================================================

/**
 * Generate a SARIF report from findings. Each distinct detector id becomes one
 * rule; every scanned file with a finding becomes an artifact.
 */
export function generateSarifReport(findings: readonly Finding[]): SarifReport {
  const rules = extractRules(findings);
  const results = findings.map((finding) => convertFindingToResult(finding, rules));
  const files = [...new Set(findings.map((finding) => finding.location.file))];

  return {
    $schema:
      "https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json",
    version: "2.1.0",
    runs: [
      {
        tool: {
          driver: {
            name: PACKAGE_NAME,
            version: PACKAGE_VERSION,
            rules,
          },
        },
        results,
        artifacts: files.map((uri) => ({ location: { uri }, sourceLanguage: "rust" })),
      },
    ],
  };
}

function extractRules(findings: readonly Finding[]): SarifRule[] {
  const rulesMap = new Map<string, SarifRule>();

  for (const finding of findings) {
    if (rulesMap.has(finding.id)) continue;

    const rule: SarifRule = {
      id: finding.id,
      name: finding.title,
      shortDescription: {
        text: finding.title,
      },
      help: {
        text: finding.recommendation,
        markdown: `**Recommendation:**\n\n\`\`\`\n${finding.recommendation}\n\`\`\``,
      },
      defaultConfiguration: {
        level: severityToLevel(finding.severity),
      },
      properties: {
        tags: getTagsForFinding(finding),
        precision: finding.confidence === "high" ? "very-high" : finding.confidence,
        "security-severity": getSecuritySeverityScore(finding.severity),
      },
    };
    if (finding.reference !== "") {
      rule.helpUri = finding.reference;
    }

    rulesMap.set(finding.id, rule);
  }

  return Array.from(rulesMap.values());
}

function convertFindingToResult(finding: Finding, rules: readonly SarifRule[]): SarifResult {
  const ruleIndex = rules.findIndex((r) => r.id === finding.id);

  const location: SarifLocation = {
    physicalLocation: {
      artifactLocation: {
        uri: finding.location.file,
      },
      region: {
        startLine: finding.location.line,
      },
    },
  };

  if (finding.location.struct !== undefined) {
    const qualified =
      finding.location.field !== undefined
        ? `${finding.location.struct}.${finding.location.field}`
        : finding.location.struct;
    location.logicalLocations = [
      {
        name: finding.location.field ?? finding.location.struct,
        fullyQualifiedName: qualified,
        kind: finding.location.field !== undefined ? "member" : "type",
      },
    ];
  }

  return {
    ruleId: finding.id,
    ruleIndex: ruleIndex >= 0 ? ruleIndex : 0,
    level: severityToLevel(finding.severity),
    message: {
      text: finding.description,
    },
    locations: [location],
    fingerprints: {
      primaryLocationLineHash: createFingerprint(finding),
    },
    properties: {
      severity: finding.severity,
      confidence: finding.confidence,
    },
  };
}

/**
 * Convert severity to SARIF level.
 */
export function severityToLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.CRITICAL:
    case Severity.HIGH:
      return "error";
    case Severity.MEDIUM:
      return "warning";
    case Severity.LOW:
      return "note";
  }
}

/**
 * Get security severity score (0.0-10.0 scale for GitHub).
 */
function getSecuritySeverityScore(severity: Severity): string {
  switch (severity) {
    case Severity.CRITICAL:
      return "9.0";
    case Severity.HIGH:
      return "7.0";
    case Severity.MEDIUM:
      return "5.0";
    case Severity.LOW:
      return "3.0";
  }
}

function getTagsForFinding(finding: Finding): string[] {
  const tags = ["security", "solana", "anchor"];
  if (finding.id.startsWith("CUSTOM-")) {
    tags.push("custom-detector");
  }
  return tags;
}

function createFingerprint(finding: Finding): string {
  const parts = [
    finding.id,
    finding.location.file,
    finding.location.struct ?? "",
    finding.location.field ?? "",
    String(finding.location.line),
  ];

  let hash = 0;
  const str = parts.join("|");
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) - hash + str.charCodeAt(i);
    hash = hash & hash; // 32-bit
  }

  return Math.abs(hash).toString(16).padStart(8, "0");
}

// ============================================================================
// Exports
// ============================================================================

export type { SarifReport, SarifRun, SarifResult, SarifRule, SarifLevel };
