/**
 * Scan Configuration
 *
 * Optional project file (`.anchor-audit.json`, `.anchor-audit.yml` or
 * `.anchor-audit.yaml`, first found wins) that tunes the built-in detectors
 * and declares project-specific rules.
 *
 * @example
 * ```yaml
 * severityOverrides:
 *   ANCHOR-004: low
 * disabledDetectors: [ANCHOR-002]
 * closeReinitScope: file
 * rules:
 *   - id: VAULT-SEEDS
 *     type: attribute
 *     title: Vault without seeds
 *     description: Vault accounts must be PDAs
 *     severity: medium
 *     match:
 *       fieldType: "Account<'info, Vault>"
 *     unless: ["seeds\\s*="]
 * ```
 */

import { z } from "zod";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { basename, join } from "path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../errors/scan.errors.js";
import { Severity } from "../types/index.js";
import { err, ok, type Result } from "../types/result.js";
import { logger } from "../utils/logger.js";

const configLogger = logger.child({ component: "config" });

export const CONFIG_FILE_NAMES = [
  ".anchor-audit.json",
  ".anchor-audit.yml",
  ".anchor-audit.yaml",
] as const;

// ============================================================================
// Schema Definitions
// ============================================================================

export const SeveritySchema = z.preprocess(
  (value) => (typeof value === "string" ? value.toLowerCase() : value),
  z.nativeEnum(Severity)
);

const RuleIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "Rule ids may contain letters, digits, '-' and '_'");

const AttributeRuleSchema = z.object({
  id: RuleIdSchema,
  type: z.literal("attribute"),
  title: z.string(),
  description: z.string(),
  severity: SeveritySchema,
  recommendation: z.string().default(""),
  reference: z.string().default(""),
  match: z
    .object({
      attribute: z.string().optional(),
      fieldType: z.string().optional(),
      fieldName: z.string().optional(),
    })
    .refine(
      (m) => m.attribute !== undefined || m.fieldType !== undefined || m.fieldName !== undefined,
      { message: "Specify at least one of attribute, fieldType or fieldName" }
    ),
  unless: z.array(z.string()).default([]),
});

const RegexRuleSchema = z.object({
  id: RuleIdSchema,
  type: z.literal("regex"),
  title: z.string(),
  description: z.string(),
  severity: SeveritySchema,
  recommendation: z.string().default(""),
  reference: z.string().default(""),
  pattern: z.string(),
  caseInsensitive: z.boolean().default(false),
});

const CustomRuleSchema = z.discriminatedUnion("type", [AttributeRuleSchema, RegexRuleSchema]);

export const ScanConfigSchema = z.object({
  severityOverrides: z.record(z.string(), SeveritySchema).default({}),
  disabledDetectors: z.array(z.string()).default([]),
  uncheckedAccountSeverity: SeveritySchema.default(Severity.LOW),
  closeReinitScope: z.enum(["struct", "file"]).default("struct"),
  /** Directory names skipped during discovery, in addition to the built-in ones */
  excludeDirs: z.array(z.string()).default([]),
  rules: z.array(CustomRuleSchema).default([]),
});

// ============================================================================
// Types
// ============================================================================

export type ScanConfig = z.output<typeof ScanConfigSchema>;
export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
export type CustomRule = z.output<typeof CustomRuleSchema>;
export type AttributeRule = z.output<typeof AttributeRuleSchema>;
export type RegexRule = z.output<typeof RegexRuleSchema>;

export function defaultScanConfig(): ScanConfig {
  return ScanConfigSchema.parse({});
}

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/**
 * Validate an already-decoded configuration object.
 */
export function parseScanConfig(
  input: unknown,
  configPath: string | null = null
): Result<ScanConfig, ConfigError> {
  const parsed = ScanConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return err(new ConfigError(`Invalid config: ${formatIssues(parsed.error)}`, configPath));
  }
  return ok(parsed.data);
}

/**
 * Read and validate one configuration file. YAML is chosen by extension.
 *
 * @throws ConfigError when the file is missing, malformed or invalid
 */
export async function readScanConfig(configPath: string): Promise<ScanConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read config: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  let decoded: unknown;
  try {
    decoded = /\.ya?ml$/i.test(configPath) ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  const result = parseScanConfig(decoded, configPath);
  if (!result.ok) {
    throw result.error;
  }

  configLogger.info(`Loaded config from ${basename(configPath)}`, {
    rules: result.value.rules.length,
    disabled: result.value.disabledDetectors.length,
  });
  return result.value;
}

/**
 * Locate the project's configuration file.
 */
export function findScanConfig(projectRoot: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(projectRoot, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load the project's configuration, falling back to defaults when the file is
 * absent or unusable. Problems are logged, never thrown.
 */
export async function loadScanConfig(projectRoot: string): Promise<ScanConfig> {
  const configPath = findScanConfig(projectRoot);
  if (configPath === null) {
    return defaultScanConfig();
  }

  try {
    return await readScanConfig(configPath);
  } catch (error) {
    configLogger.error(error instanceof Error ? error.message : String(error));
    return defaultScanConfig();
  }
}
