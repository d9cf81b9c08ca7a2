/**
 * Severity utilities
 *
 * Ordering, counting and the weighted score behind a scan's letter grade.
 */

import {
  Severity,
  type Finding,
  type ScanSummary,
  type ScoreGrade,
  type SeverityCounts,
} from "../types/index.js";

// ============================================================================
// Severity Order (for sorting)
// ============================================================================

/**
 * Numeric ordering for severity levels (lower = more severe)
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.CRITICAL]: 0,
  [Severity.HIGH]: 1,
  [Severity.MEDIUM]: 2,
  [Severity.LOW]: 3,
};

/**
 * Compare two severities for sorting (most severe first)
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

/**
 * Sort findings by severity (most severe first)
 */
export function sortBySeverity<T extends { severity: Severity }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareSeverity(a.severity, b.severity));
}

/**
 * True when `severity` is at least as severe as `threshold`.
 */
export function meetsThreshold(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_ORDER[severity] <= SEVERITY_ORDER[threshold];
}

/**
 * Report order: file, then line, then detector id.
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    if (a.location.file !== b.location.file) {
      return a.location.file < b.location.file ? -1 : 1;
    }
    if (a.location.line !== b.location.line) {
      return a.location.line - b.location.line;
    }
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
  });
}

export const SEVERITY_EMOJI: Record<Severity, string> = {
  [Severity.CRITICAL]: "🔴",
  [Severity.HIGH]: "🟠",
  [Severity.MEDIUM]: "🟡",
  [Severity.LOW]: "🟢",
};

export function parseSeverity(value: string): Severity | null {
  switch (value.toLowerCase()) {
    case "critical":
      return Severity.CRITICAL;
    case "high":
      return Severity.HIGH;
    case "medium":
      return Severity.MEDIUM;
    case "low":
      return Severity.LOW;
    default:
      return null;
  }
}

// ============================================================================
// Severity Counts
// ============================================================================

/**
 * Count findings by severity level.
 */
export function countBySeverity<T extends { severity: Severity }>(
  items: readonly T[]
): SeverityCounts {
  const counts: SeverityCounts = {
    total: items.length,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
  };

  for (const item of items) {
    switch (item.severity) {
      case Severity.CRITICAL:
        counts.critical++;
        break;
      case Severity.HIGH:
        counts.high++;
        break;
      case Severity.MEDIUM:
        counts.medium++;
        break;
      case Severity.LOW:
        counts.low++;
        break;
    }
  }

  return counts;
}

// ============================================================================
// Scoring
// ============================================================================

export const SEVERITY_WEIGHTS: Record<Severity, number> = {
  [Severity.CRITICAL]: 10,
  [Severity.HIGH]: 5,
  [Severity.MEDIUM]: 2,
  [Severity.LOW]: 1,
};

export function weightedScore(findings: readonly Finding[]): number {
  return findings.reduce((sum, finding) => sum + SEVERITY_WEIGHTS[finding.severity], 0);
}

/**
 * Letter grade for a weighted score. Any finding at all rules out `A`.
 */
export function gradeFor(score: number, findingCount: number): ScoreGrade {
  if (findingCount === 0) return "A";
  if (score >= 20) return "F";
  if (score >= 15) return "D";
  if (score >= 10) return "C";
  if (score >= 5) return "B";
  return "B+";
}

/**
 * Aggregate a finding list into counts, per-detector totals and a grade.
 *
 * @example
 * ```ts
 * const summary = summarize(scanFile("lib.rs", source));
 * console.log(`${summary.total} findings, grade ${summary.grade}`);
 * ```
 */
export function summarize(findings: readonly Finding[]): ScanSummary {
  const byDetector: Record<string, number> = {};
  for (const finding of findings) {
    byDetector[finding.id] = (byDetector[finding.id] ?? 0) + 1;
  }

  const score = weightedScore(findings);

  return {
    ...countBySeverity(findings),
    byDetector,
    weightedScore: score,
    grade: gradeFor(score, findings.length),
  };
}
