/**
 * Project Scanner
 *
 * Discovers Rust sources under a project root, reads them with a bounded pool
 * and runs the engine over the lot. Reported paths are relative to the root.
 */

import { existsSync } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { basename, dirname, join, relative, sep } from "path";
import { loadScanConfig, readScanConfig, type ScanConfig } from "../config/scanConfig.js";
import { createDefaultDetectors, type Detector } from "../detectors/index.js";
import { ProjectNotFoundError } from "../errors/scan.errors.js";
import type { ScanReport, SourceFile } from "../types/index.js";
import { formatDuration, logger } from "../utils/logger.js";
import { scanSources } from "./scanEngine.js";

const scanLogger = logger.child({ component: "project-scanner" });

// ============================================================================
// Constants
// ============================================================================

/** Directories never descended into */
export const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  "target",
  "node_modules",
  ".git",
  ".anchor",
]);

export const DEFAULT_CONCURRENCY = 8;

const ANCHOR_VERSION_PATTERNS = [
  /anchor-lang\s*=\s*["']?([0-9]+\.[0-9]+\.[0-9]+)/,
  /anchor-lang\s*=\s*\{[^}]*version\s*=\s*"([0-9]+\.[0-9]+\.[0-9]+)"/,
];

// ============================================================================
// Types
// ============================================================================

export interface ProjectScanOptions {
  /** Explicit config file; errors in it reject the scan */
  configPath?: string;
  /** Already-loaded config; skips file discovery of the config */
  config?: ScanConfig;
  /** Overrides the detectors built from the config */
  detectors?: readonly Detector[];
  signal?: AbortSignal;
  concurrency?: number;
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Recursively list files ending in `extension`, sorted by path.
 */
export async function discoverFiles(
  root: string,
  extension: string,
  excludeDirs: ReadonlySet<string> = EXCLUDED_DIRS
): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excludeDirs.has(entry.name)) {
          await walk(fullPath);
        }
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        found.push(fullPath);
      }
    }
  }

  await walk(root);
  return found.sort();
}

/**
 * Anchor version declared in a manifest's `anchor-lang` dependency.
 */
export function parseAnchorVersion(manifest: string): string | null {
  for (const pattern of ANCHOR_VERSION_PATTERNS) {
    const match = pattern.exec(manifest);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}

/**
 * First `anchor-lang` version found in the project's Cargo.toml files, the
 * root manifest first.
 */
export async function detectAnchorVersion(
  root: string,
  excludeDirs: ReadonlySet<string> = EXCLUDED_DIRS
): Promise<string | null> {
  const manifests = (await discoverFiles(root, "Cargo.toml", excludeDirs)).filter(
    (path) => basename(path) === "Cargo.toml"
  );
  const rootManifest = join(root, "Cargo.toml");
  manifests.sort((a, b) => Number(b === rootManifest) - Number(a === rootManifest));

  for (const manifest of manifests) {
    const version = await readManifestVersion(manifest);
    if (version !== null) return version;
  }

  return null;
}

async function readManifestVersion(manifest: string): Promise<string | null> {
  try {
    return parseAnchorVersion(await readFile(manifest, "utf-8"));
  } catch (error) {
    scanLogger.debug(`Skipping unreadable manifest ${manifest}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Version from the manifests beside a single file or one directory above it,
 * the usual place for `src/lib.rs`.
 */
async function detectAnchorVersionNear(file: string): Promise<string | null> {
  const dir = dirname(file);
  for (const manifest of [join(dir, "Cargo.toml"), join(dirname(dir), "Cargo.toml")]) {
    if (!existsSync(manifest)) continue;
    const version = await readManifestVersion(manifest);
    if (version !== null) return version;
  }
  return null;
}

// ============================================================================
// Worker Pool
// ============================================================================

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep input order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = [];
  let currentIndex = 0;

  async function processNext(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(processNext());
  }

  await Promise.all(workers);
  return results;
}

// ============================================================================
// Public API
// ============================================================================

function toReportPath(base: string, file: string): string {
  return relative(base, file).split(sep).join("/");
}

/**
 * Scan a project directory, or a single file.
 *
 * @throws ProjectNotFoundError when `root` does not exist
 * @throws ConfigError when `options.configPath` cannot be used
 *
 * @example
 * ```ts
 * const report = await scanProject("./programs/vault");
 * console.log(report.summary.grade, report.anchorVersion);
 * ```
 */
export async function scanProject(
  root: string,
  options: ProjectScanOptions = {}
): Promise<ScanReport> {
  if (!existsSync(root)) {
    throw new ProjectNotFoundError(root);
  }

  const startTime = Date.now();
  const isFile = (await stat(root)).isFile();
  const projectDir = isFile ? dirname(root) : root;

  const config =
    options.config ??
    (options.configPath !== undefined
      ? await readScanConfig(options.configPath)
      : await loadScanConfig(projectDir));
  const excludeDirs = new Set([...EXCLUDED_DIRS, ...config.excludeDirs]);
  const detectors = options.detectors ?? createDefaultDetectors(config);

  const paths = isFile ? [root] : await discoverFiles(root, ".rs", excludeDirs);
  scanLogger.info(`Scanning ${paths.length} Rust files`, { root });

  const diagnostics: string[] = [];
  const loaded = await runWithConcurrency(
    paths,
    async (path): Promise<SourceFile | null> => {
      if (options.signal?.aborted) return null;
      const reportPath = toReportPath(projectDir, path);
      try {
        return { path: reportPath, content: await readFile(path, "utf-8") };
      } catch (error) {
        diagnostics.push(
          `cannot read ${reportPath}: ${error instanceof Error ? error.message : String(error)}`
        );
        return null;
      }
    },
    options.concurrency ?? DEFAULT_CONCURRENCY
  );

  const files = loaded.filter((file): file is SourceFile => file !== null);
  const report = scanSources(files, {
    detectors,
    target: root,
    anchorVersion: isFile
      ? await detectAnchorVersionNear(root)
      : await detectAnchorVersion(root, excludeDirs),
    ...(options.signal ? { signal: options.signal } : {}),
  });

  const durationMs = Date.now() - startTime;
  scanLogger.info(`Scan finished in ${formatDuration(durationMs)}`, {
    files: report.filesScanned,
    findings: report.findings.length,
  });

  return {
    ...report,
    diagnostics: [...diagnostics, ...report.diagnostics],
    cancelled: report.cancelled || (options.signal?.aborted ?? false),
    durationMs,
  };
}
