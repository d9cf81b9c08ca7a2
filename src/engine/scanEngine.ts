/**
 * Scan Engine
 *
 * Runs an explicit detector list over parsed sources. A failing parser pass or
 * detector never aborts the scan: it contributes no findings and leaves a
 * diagnostic instead.
 */

import { createDefaultDetectors, type Detector } from "../detectors/index.js";
import { parseSource, type ScanContext } from "../parser/index.js";
import type { FileScanResult, Finding, ScanReport, SourceFile } from "../types/index.js";
import { tryCatchSync } from "../types/result.js";
import { logger } from "../utils/logger.js";
import { sortFindings, summarize } from "../utils/severity.js";

const engineLogger = logger.child({ component: "engine" });

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  /** Defaults to `createDefaultDetectors()` */
  detectors?: readonly Detector[];
  /** Checked between files; files already scanned keep their findings */
  signal?: AbortSignal;
  /** Label recorded in the report */
  target?: string;
  anchorVersion?: string | null;
}

// ============================================================================
// Helpers
// ============================================================================

function findingKey(finding: Finding): string {
  return [finding.id, finding.location.file, finding.location.line, finding.description].join("\u0000");
}

/**
 * Drop findings repeating an earlier (id, file, line, description).
 */
export function dedupFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = findingKey(finding);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }
  return unique;
}

/**
 * Append in place. `push(...items)` is capped by the engine's argument limit.
 */
function append<T>(target: T[], items: readonly T[]): void {
  for (const item of items) {
    target.push(item);
  }
}

function runDetector(
  detector: Detector,
  context: ScanContext
): { findings: Finding[]; diagnostic: string | null } {
  const result = tryCatchSync(() => detector.detect(context));
  if (result.ok) {
    return { findings: result.value, diagnostic: null };
  }

  const diagnostic = `${detector.id} failed on ${context.file.path}: ${result.error.message}`;
  engineLogger.warn(diagnostic);
  return { findings: [], diagnostic };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Scan one source with full diagnostics.
 */
export function scanSource(
  file: SourceFile,
  detectors: readonly Detector[] = createDefaultDetectors()
): FileScanResult {
  const active = detectors.filter((detector) => detector.enabled);
  const parsed = tryCatchSync(() => parseSource(file));

  if (!parsed.ok) {
    const diagnostic = `parser failed on ${file.path}: ${parsed.error.message}`;
    engineLogger.warn(diagnostic);
    return { file: file.path, findings: [], detectorsRun: 0, diagnostics: [diagnostic] };
  }

  const findings: Finding[] = [];
  const diagnostics: string[] = [];

  for (const detector of active) {
    const outcome = runDetector(detector, parsed.value);
    append(findings, outcome.findings);
    if (outcome.diagnostic !== null) {
      diagnostics.push(outcome.diagnostic);
    }
  }

  return {
    file: file.path,
    findings: sortFindings(dedupFindings(findings)),
    detectorsRun: active.length,
    diagnostics,
  };
}

/**
 * Scan one file's text and return its findings. Never throws.
 *
 * @example
 * ```ts
 * const findings = scanFile("programs/vault/src/lib.rs", source);
 * const summary = summarize(findings);
 * ```
 */
export function scanFile(
  path: string,
  text: string,
  detectors: readonly Detector[] = createDefaultDetectors()
): Finding[] {
  return scanSource({ path, content: text }, detectors).findings;
}

/**
 * Scan many sources into one report.
 */
export function scanSources(files: Iterable<SourceFile>, options: ScanOptions = {}): ScanReport {
  const startTime = Date.now();
  const detectors = options.detectors ?? createDefaultDetectors();
  const findings: Finding[] = [];
  const diagnostics: string[] = [];
  let filesScanned = 0;
  let cancelled = false;

  for (const file of files) {
    if (options.signal?.aborted) {
      cancelled = true;
      engineLogger.info("Scan cancelled", { filesScanned });
      break;
    }

    const result = scanSource(file, detectors);
    append(findings, result.findings);
    append(diagnostics, result.diagnostics);
    filesScanned++;
  }

  const merged = sortFindings(dedupFindings(findings));
  const durationMs = Date.now() - startTime;

  engineLogger.debug("Scan complete", { filesScanned, findings: merged.length, durationMs });

  return {
    target: options.target ?? "<memory>",
    timestamp: new Date().toISOString(),
    findings: merged,
    filesScanned,
    detectorsRun: detectors.filter((detector) => detector.enabled).length,
    diagnostics,
    anchorVersion: options.anchorVersion ?? null,
    summary: summarize(merged),
    durationMs,
    cancelled,
  };
}
