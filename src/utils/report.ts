/**
 * Report formatters: Markdown for people, JSON for pipelines.
 */

import { Severity, type Finding, type ScanReport } from "../types/index.js";
import type { DetectorExplanation } from "../detectors/BaseDetector.js";
import { formatDuration } from "./logger.js";
import { generateSarifReport } from "./sarif.js";
import { SEVERITY_EMOJI, sortBySeverity } from "./severity.js";

const SEVERITY_ROWS: readonly Severity[] = [
  Severity.CRITICAL,
  Severity.HIGH,
  Severity.MEDIUM,
  Severity.LOW,
];

function formatLocation(finding: Finding): string {
  const { file, line, struct, field } = finding.location;
  const owner = struct !== undefined ? ` (${field !== undefined ? `${struct}.${field}` : struct})` : "";
  return `\`${file}:${line}\`${owner}`;
}

type ThreatModel = Pick<
  Finding,
  "beforeAfterState" | "impact" | "anchorVersionsAffected" | "ecosystemRecommendations"
>;

function formatThreatModel(model: ThreatModel): string[] {
  const lines: string[] = [];
  const { beforeAfterState: state, impact } = model;

  if (state !== undefined) {
    lines.push(`**Before:** ${state.before}`);
    lines.push(`**After:** ${state.after}`);
    lines.push(`**Damage:** ${state.damage}`);
    lines.push("");
  }
  if (impact !== undefined) {
    lines.push(`**Attack Cost:** ${impact.attackCost}`);
    lines.push(`**Exploitability:** ${impact.exploitability}`);
    lines.push(`**Breach Context:** ${impact.breachCostContext}`);
    lines.push("");
  }
  if (model.anchorVersionsAffected !== "") {
    lines.push(`**Anchor Versions Affected:** ${model.anchorVersionsAffected}`);
    lines.push("");
  }
  if (model.ecosystemRecommendations.length > 0) {
    lines.push("**Ecosystem Recommendations:**");
    lines.push("");
    for (const recommendation of model.ecosystemRecommendations) {
      lines.push(`- ${recommendation}`);
    }
    lines.push("");
  }

  return lines;
}

/**
 * Render a scan report as Markdown. Findings are grouped most severe first.
 */
export function formatMarkdownReport(report: ScanReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`# Anchor Security Scan: ${report.target}`);
  lines.push("");
  lines.push(`**Date:** ${report.timestamp}`);
  lines.push(`**Files Scanned:** ${report.filesScanned}`);
  lines.push(`**Detectors Run:** ${report.detectorsRun}`);
  lines.push(`**Anchor Version:** ${report.anchorVersion ?? "unknown"}`);
  lines.push(`**Duration:** ${formatDuration(report.durationMs)}`);
  if (report.cancelled) {
    lines.push("");
    lines.push("> Scan was cancelled before every file was processed.");
  }
  lines.push("");

  lines.push("## Summary");
  lines.push("");
  lines.push(`**Grade:** ${summary.grade} (weighted score ${summary.weightedScore})`);
  lines.push(`**Total Findings:** ${summary.total}`);
  lines.push("");
  const counts: Record<Severity, number> = {
    [Severity.CRITICAL]: summary.critical,
    [Severity.HIGH]: summary.high,
    [Severity.MEDIUM]: summary.medium,
    [Severity.LOW]: summary.low,
  };
  lines.push("| Severity | Count |");
  lines.push("|----------|-------|");
  for (const severity of SEVERITY_ROWS) {
    lines.push(`| ${SEVERITY_EMOJI[severity]} ${severity} | ${counts[severity]} |`);
  }
  lines.push("");

  lines.push("## Findings");
  lines.push("");

  if (report.findings.length === 0) {
    lines.push("**No issues were identified.**");
    lines.push("");
  } else {
    for (const finding of sortBySeverity(report.findings)) {
      lines.push(
        `### ${SEVERITY_EMOJI[finding.severity]} [${finding.severity.toUpperCase()}] ${finding.id}: ${finding.title}`
      );
      lines.push("");
      lines.push(`**Location:** ${formatLocation(finding)}`);
      lines.push(`**Confidence:** ${finding.confidence}`);
      lines.push("");
      lines.push(finding.description);
      lines.push("");
      if (finding.snippet !== undefined) {
        lines.push("```rust");
        lines.push(finding.snippet);
        lines.push("```");
        lines.push("");
      }
      if (finding.rootCause !== "") {
        lines.push(`**Root Cause:** ${finding.rootCause}`);
        lines.push("");
      }
      if (finding.exploitScenario !== "") {
        lines.push("**Exploit Scenario:**");
        lines.push("");
        lines.push(finding.exploitScenario);
        lines.push("");
      }
      lines.push(...formatThreatModel(finding));
      if (finding.recommendation !== "") {
        lines.push("**Recommendation:**");
        lines.push("");
        lines.push("```");
        lines.push(finding.recommendation);
        lines.push("```");
        lines.push("");
      }
      if (finding.reference !== "") {
        lines.push(`**Reference:** ${finding.reference}`);
        lines.push("");
      }
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push("## Diagnostics");
    lines.push("");
    for (const diagnostic of report.diagnostics) {
      lines.push(`- ${diagnostic}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function formatJsonReport(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}

export type ReportFormat = "markdown" | "json" | "sarif";

export const REPORT_FORMATS: readonly ReportFormat[] = ["markdown", "json", "sarif"];

export function renderReport(report: ScanReport, format: ReportFormat): string {
  switch (format) {
    case "markdown":
      return formatMarkdownReport(report);
    case "json":
      return formatJsonReport(report);
    case "sarif":
      return JSON.stringify(generateSarifReport(report.findings), null, 2);
  }
}

/**
 * Render a detector's explanation as Markdown.
 */
export function formatExplanation(explanation: DetectorExplanation): string {
  const lines = [
    `# ${explanation.id}: ${explanation.title}`,
    "",
    `**Severity:** ${explanation.severity}`,
    "",
    explanation.description,
    "",
    "## Root Cause",
    "",
    explanation.rootCause,
    "",
  ];

  if (explanation.exploitScenario !== "") {
    lines.push("## Exploit Scenario", "", explanation.exploitScenario, "");
  }
  const threatModel = formatThreatModel(explanation);
  if (threatModel.length > 0) {
    lines.push("## Impact", "", ...threatModel);
  }
  if (explanation.fix !== "") {
    lines.push("## Fix", "", "```", explanation.fix, "```", "");
  }
  if (explanation.reference !== "") {
    lines.push(`**Reference:** ${explanation.reference}`, "");
  }

  return lines.join("\n");
}
