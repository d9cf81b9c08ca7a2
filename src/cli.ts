#!/usr/bin/env node

/**
 * Anchor Audit CLI
 *
 * Command-line interface for scanning Anchor programs outside of an MCP client.
 * Useful for CI/CD pipelines and local development.
 *
 * Usage:
 *   anchor-audit scan <path> [options]     Scan a workspace, program directory or .rs file
 *   anchor-audit explain <id-or-keyword>   Explain a detector
 *   anchor-audit detectors [path]          List detectors
 *
 * Exit Codes:
 *   0 - No findings at or above threshold
 *   1 - Findings at or above threshold detected
 *   2 - Execution error
 */

import { parseArgs } from "node:util";
import { resolve } from "node:path";
import { writeFileSync } from "node:fs";

import { scanProject } from "./engine/projectScanner.js";
import { ProjectNotFoundError, ConfigError } from "./errors/scan.errors.js";
import { explainFinding } from "./tools/explainFinding.js";
import { listDetectors } from "./tools/listDetectors.js";
import { Severity, type ScanReport } from "./types/index.js";
import { logger } from "./utils/logger.js";
import { REPORT_FORMATS, renderReport, type ReportFormat } from "./utils/report.js";
import { meetsThreshold, parseSeverity, summarize } from "./utils/severity.js";
import { PACKAGE_VERSION } from "./version.js";

// ============================================================================
// Types
// ============================================================================

interface CliOptions {
  format: ReportFormat;
  severityThreshold: Severity;
  quiet: boolean;
  output: string | null;
  config: string | null;
}

// ============================================================================
// Constants
// ============================================================================

const PROGRAM_NAME = "anchor-audit";

const HELP_TEXT = `
${PROGRAM_NAME} v${PACKAGE_VERSION} - Anchor Program Security Scanner

Usage:
  ${PROGRAM_NAME} <command> [options]

Commands:
  scan <path>               Scan an Anchor workspace, program directory or .rs file
  explain <id-or-keyword>   Explain a detector (ANCHOR-003, 'realloc', 'owner', etc.)
  detectors [path]          List detectors, including rules configured under [path]
  help                      Show this help message
  version                   Show version

Options:
  --format, -f <type>       Output format: markdown, json, sarif (default: markdown)
  --output, -o <file>       Write output to file instead of stdout
  --severity, -s <level>    Minimum severity: critical, high, medium, low (default: low)
  --config, -c <file>       Config file (default: .anchor-audit.{json,yml,yaml} in the project)
  --quiet, -q               Suppress progress messages

Examples:
  ${PROGRAM_NAME} scan ./programs/vault
  ${PROGRAM_NAME} scan . --format sarif -o anchor-audit.sarif
  ${PROGRAM_NAME} scan ./programs/vault/src/lib.rs --severity high
  ${PROGRAM_NAME} explain ANCHOR-001

Exit Codes:
  0 - No findings at or above threshold
  1 - Findings at or above threshold detected
  2 - Execution error
`;

// ============================================================================
// Argument Parser using node:util parseArgs
// ============================================================================

function parseCliArgs(): { command: string; args: string[]; options: CliOptions } {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      format: { type: "string", short: "f", default: "markdown" },
      output: { type: "string", short: "o" },
      severity: { type: "string", short: "s", default: "low" },
      config: { type: "string", short: "c" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });

  const format = REPORT_FORMATS.find((f) => f === (values.format ?? "markdown"));
  if (format === undefined) {
    throw new Error(`Invalid format: ${values.format}. Use markdown, json, or sarif.`);
  }

  const severityThreshold = parseSeverity(values.severity ?? "low");
  if (severityThreshold === null) {
    throw new Error(`Invalid severity: ${values.severity}. Use critical, high, medium, or low.`);
  }

  const options: CliOptions = {
    format,
    severityThreshold,
    quiet: values.quiet ?? false,
    output: values.output !== undefined ? resolve(values.output) : null,
    config: values.config !== undefined ? resolve(values.config) : null,
  };

  if (values.help) {
    return { command: "help", args: [], options };
  }
  if (values.version) {
    return { command: "version", args: [], options };
  }

  return { command: positionals[0] ?? "help", args: positionals.slice(1), options };
}

// ============================================================================
// Commands
// ============================================================================

async function runScan(path: string, options: CliOptions): Promise<number> {
  const target = resolve(path);
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logInfo("Interrupted, finishing current file...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  if (!options.quiet) {
    logInfo(`Scanning ${target}...`);
  }

  try {
    const report = await scanProject(target, {
      signal: controller.signal,
      ...(options.config !== null ? { configPath: options.config } : {}),
    });

    const filtered = filterReport(report, options.severityThreshold);
    writeOutput(renderReport(filtered, options.format), options);

    if (report.cancelled) {
      logError("Scan cancelled before all files were scanned");
      return 2;
    }
    return filtered.findings.length > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof ProjectNotFoundError || error instanceof ConfigError) {
      logError(error.message);
    } else {
      logError(`Scan failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 2;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function runExplain(query: string, options: CliOptions): Promise<number> {
  writeOutput(await explainFinding({ findingId: query }), options);
  return 0;
}

async function runDetectors(projectRoot: string | undefined, options: CliOptions): Promise<number> {
  const input = projectRoot !== undefined ? { projectRoot: resolve(projectRoot) } : {};
  writeOutput(await listDetectors(input), options);
  return 0;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Keep findings at or above the threshold; the summary follows the kept set.
 */
function filterReport(report: ScanReport, threshold: Severity): ScanReport {
  if (threshold === Severity.LOW) return report;
  const findings = report.findings.filter((f) => meetsThreshold(f.severity, threshold));
  return { ...report, findings, summary: summarize(findings) };
}

function logInfo(message: string): void {
  logger.info(message);
}

function logError(message: string): void {
  logger.error(message);
}

function writeOutput(content: string, options: CliOptions): void {
  if (options.output) {
    writeFileSync(options.output, content, "utf-8");
    if (!options.quiet) {
      logInfo(`Output written to ${options.output}`);
    }
  } else {
    process.stdout.write(content + "\n");
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs();
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    return 2;
  }
  const { command, args, options } = parsed;

  // stdout carries the report; keep stderr quiet for structured output
  if (options.quiet || options.format !== "markdown") {
    process.env["LOG_LEVEL"] = "error";
  }

  switch (command) {
    case "scan": {
      const path = args[0];
      if (!path) {
        logError(`Missing path. Usage: ${PROGRAM_NAME} scan <path>`);
        return 2;
      }
      return runScan(path, options);
    }

    case "explain": {
      const query = args[0];
      if (!query) {
        logError(`Missing detector id. Usage: ${PROGRAM_NAME} explain <id-or-keyword>`);
        return 2;
      }
      return runExplain(query, options);
    }

    case "detectors":
      return runDetectors(args[0], options);

    case "help":
      process.stdout.write(HELP_TEXT + "\n");
      return 0;

    case "version":
      process.stdout.write(`${PROGRAM_NAME} v${PACKAGE_VERSION}\n`);
      return 0;

    default:
      logError(`Unknown command: ${command}`);
      process.stderr.write(HELP_TEXT + "\n");
      return 2;
  }
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    logError(error instanceof Error ? error.message : String(error));
    process.exit(2);
  });
