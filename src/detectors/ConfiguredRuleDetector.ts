/**
 * Project-defined rules from the scan configuration, reported as
 * `CUSTOM-<id>`.
 *
 * - `attribute` rules test each accounts-struct field: every given matcher
 *   (attribute text, declared type, field name) must match, and any `unless`
 *   pattern found in the attribute or doc lines suppresses the finding.
 * - `regex` rules test each source line.
 *
 * A pattern that does not compile leaves the rule inert.
 */

import { stripComments, type ScanContext } from "../parser/index.js";
import type { AttributeRule, CustomRule, RegexRule } from "../config/scanConfig.js";
import type { Confidence, DetectorId, FieldRecord, Finding, Severity } from "../types/index.js";
import { tryCatchSync } from "../types/result.js";
import { logger } from "../utils/logger.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";

const ruleLogger = logger.child({ component: "custom-rules" });

interface CompiledAttributeMatch {
  attribute?: RegExp;
  fieldType?: RegExp;
  fieldName?: RegExp;
  unless: RegExp[];
}

export class ConfiguredRuleDetector extends BaseDetector {
  readonly id: DetectorId;
  readonly title: string;
  readonly description: string;
  override readonly reference: string;

  protected readonly defaultSeverity: Severity;
  protected readonly defaultConfidence: Confidence;
  protected readonly rootCause: string;
  protected readonly exploitScenario = "";
  protected readonly fix: string;
  protected override readonly anchorVersionsAffected = "";

  /** null when a pattern failed to compile */
  private readonly attributeMatch: CompiledAttributeMatch | null = null;
  private readonly linePattern: RegExp | null = null;

  constructor(
    readonly rule: CustomRule,
    options: DetectorOptions = {}
  ) {
    super(options);
    this.id = `CUSTOM-${rule.id}`;
    this.title = rule.title;
    this.description = rule.description;
    this.reference = rule.reference;
    this.defaultSeverity = rule.severity;
    this.defaultConfidence = rule.type === "regex" ? "high" : "medium";
    this.rootCause = rule.description;
    this.fix = rule.recommendation;

    if (rule.type === "attribute") {
      this.attributeMatch = this.compileAttributeMatch(rule);
    } else {
      this.linePattern = this.compile(rule.pattern, rule.caseInsensitive ? "i" : "");
    }
  }

  protected doDetect(context: ScanContext): Finding[] {
    if (this.rule.type === "attribute") {
      return this.attributeMatch === null ? [] : this.detectFields(context, this.attributeMatch);
    }
    return this.linePattern === null ? [] : this.detectLines(context, this.rule, this.linePattern);
  }

  // ==========================================================================
  // Matching
  // ==========================================================================

  private detectFields(context: ScanContext, match: CompiledAttributeMatch): Finding[] {
    const findings: Finding[] = [];

    for (const struct of context.structs) {
      for (const field of struct.fields) {
        if (!this.fieldMatches(field, match)) continue;

        findings.push(
          this.createFinding(context, {
            line: field.line,
            struct: struct.name,
            field: field.name,
            description: `${this.description}\n\nField: \`${struct.name}.${field.name}\``,
          })
        );
      }
    }

    return findings;
  }

  private fieldMatches(field: FieldRecord, match: CompiledAttributeMatch): boolean {
    const attribute = field.attribute === null ? null : stripComments(field.attribute.text);

    if (match.attribute !== undefined) {
      if (attribute === null || !match.attribute.test(attribute)) return false;
    }
    if (match.fieldType !== undefined && !match.fieldType.test(field.type)) return false;
    if (match.fieldName !== undefined && !match.fieldName.test(field.name)) return false;

    const evidence = [attribute ?? "", ...field.docs].join("\n");
    return !match.unless.some((pattern) => pattern.test(evidence));
  }

  private detectLines(context: ScanContext, rule: RegexRule, pattern: RegExp): Finding[] {
    const findings: Finding[] = [];

    context.index.lines.forEach((text, i) => {
      const match = pattern.exec(text);
      if (match === null) return;

      findings.push(
        this.createFinding(context, {
          line: i + 1,
          description: `${rule.description}\n\nMatched: \`${match[0]}\``,
        })
      );
    });

    return findings;
  }

  // ==========================================================================
  // Compilation
  // ==========================================================================

  private compile(pattern: string, flags = ""): RegExp | null {
    const compiled = tryCatchSync(() => new RegExp(pattern, flags));
    if (!compiled.ok) {
      ruleLogger.warn(`Rule ${this.id} disabled: invalid pattern`, {
        pattern,
        error: compiled.error.message,
      });
      return null;
    }
    return compiled.value;
  }

  private compileAttributeMatch(rule: AttributeRule): CompiledAttributeMatch | null {
    const compiled: CompiledAttributeMatch = { unless: [] };

    for (const key of ["attribute", "fieldType", "fieldName"] as const) {
      const source = rule.match[key];
      if (source === undefined) continue;
      const pattern = this.compile(source);
      if (pattern === null) return null;
      compiled[key] = pattern;
    }

    for (const source of rule.unless) {
      const pattern = this.compile(source);
      if (pattern === null) return null;
      compiled.unless.push(pattern);
    }

    return compiled;
  }
}
