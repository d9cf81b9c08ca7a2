/**
 * Scan Tools
 *
 * In-memory source scans and project scans, rendered in the requested format.
 */

import { defaultScanConfig } from "../config/scanConfig.js";
import { createDefaultDetectors } from "../detectors/index.js";
import { scanProject as runProjectScan } from "../engine/projectScanner.js";
import { scanSources } from "../engine/scanEngine.js";
import {
  ScanProjectInputSchema,
  ScanSourceInputSchema,
  type ScanProjectInput,
  type ScanSourceInput,
} from "../server/schemas/inputSchemas.js";
import { logger } from "../utils/logger.js";
import { renderReport } from "../utils/report.js";

export async function scanSourceTool(input: ScanSourceInput): Promise<string> {
  const { content, path, format, config } = ScanSourceInputSchema.parse(input);
  logger.info(`[scanSource] Scanning ${path}`, { bytes: content.length });

  const report = scanSources([{ path, content }], {
    detectors: createDefaultDetectors(config ?? defaultScanConfig()),
    target: path,
  });

  return renderReport(report, format);
}

export async function scanProjectTool(input: ScanProjectInput): Promise<string> {
  const { projectRoot, format, configPath } = ScanProjectInputSchema.parse(input);
  logger.info(`[scanProject] Scanning ${projectRoot}`);

  const report = await runProjectScan(
    projectRoot,
    configPath !== undefined ? { configPath } : {}
  );

  return renderReport(report, format);
}
