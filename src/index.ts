/**
 * Anchor Audit
 *
 * Library entry point: static detection of account-validation weaknesses in
 * Anchor programs.
 *
 * @example
 * ```ts
 * import { scanFile, scanProject } from "anchor-audit-mcp";
 *
 * const findings = scanFile("programs/vault/src/lib.rs", source);
 * const report = await scanProject("./programs/vault");
 * ```
 */

// Engine
export {
  scanFile,
  scanSource,
  scanSources,
  dedupFindings,
  type ScanOptions,
} from "./engine/scanEngine.js";
export {
  scanProject,
  discoverFiles,
  detectAnchorVersion,
  parseAnchorVersion,
  EXCLUDED_DIRS,
  type ProjectScanOptions,
} from "./engine/projectScanner.js";

// Parser
export {
  parseSource,
  extractAttributeBlocks,
  buildFieldRegistry,
  LineIndex,
  stripComments,
  parseTypeSignature,
  type ScanContext,
  type FieldRegistry,
} from "./parser/index.js";

// Detectors
export * from "./detectors/index.js";

// Configuration
export {
  ScanConfigSchema,
  defaultScanConfig,
  parseScanConfig,
  readScanConfig,
  loadScanConfig,
  findScanConfig,
  CONFIG_FILE_NAMES,
  type ScanConfig,
  type ScanConfigInput,
  type CustomRule,
} from "./config/scanConfig.js";

// Reports
export { summarize, sortFindings, meetsThreshold, gradeFor, weightedScore } from "./utils/severity.js";
export {
  renderReport,
  formatMarkdownReport,
  formatJsonReport,
  type ReportFormat,
} from "./utils/report.js";
export { generateSarifReport, type SarifReport } from "./utils/sarif.js";

// Errors
export { ProjectNotFoundError, ConfigError } from "./errors/scan.errors.js";

// Types
export * from "./types/index.js";
