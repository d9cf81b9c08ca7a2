/**
 * Detector Contract
 *
 * Every rule, built-in or configured, implements `Detector`. Built-ins extend
 * `BaseDetector`, which owns the metadata, the enabled/severity options and
 * finding construction, leaving each rule to implement `doDetect`.
 */

import type { ScanContext } from "../parser/index.js";
import type {
  Confidence,
  DetectorId,
  Finding,
  ImpactAssessment,
  Severity,
  SourceLocation,
  StateTransition,
} from "../types/index.js";
import { DEFAULT_AFFECTED_VERSIONS, DEFAULT_REFERENCE } from "./patterns.js";

// ============================================================================
// Types
// ============================================================================

export interface DetectorOptions {
  /** Replaces the rule's severity on every finding it produces */
  severity?: Severity;
  /** A disabled detector returns no findings */
  enabled?: boolean;
}

export interface DetectorExplanation {
  id: DetectorId;
  title: string;
  severity: Severity;
  description: string;
  rootCause: string;
  exploitScenario: string;
  fix: string;
  reference: string;
  beforeAfterState?: StateTransition;
  impact?: ImpactAssessment;
  anchorVersionsAffected: string;
  ecosystemRecommendations: string[];
}

export interface FindingParams {
  line: number;
  description: string;
  struct?: string;
  field?: string;
  /** Rule-specific severity, still subject to the configured override */
  severity?: Severity;
  confidence?: Confidence;
  /** Replaces the rule's list when the advice names the offending type */
  ecosystemRecommendations?: string[];
}

/**
 * Interface all detectors implement.
 *
 * @example
 * ```typescript
 * const context = parseSource({ path: "lib.rs", content });
 * for (const detector of createDefaultDetectors()) {
 *   findings = findings.concat(detector.detect(context));
 * }
 * ```
 */
export interface Detector {
  readonly id: DetectorId;
  readonly title: string;
  readonly severity: Severity;
  readonly description: string;
  readonly reference: string;
  readonly enabled: boolean;

  /** Must not mutate the context */
  detect(context: ScanContext): Finding[];

  explain(): DetectorExplanation;
}

// ============================================================================
// Abstract Base Class
// ============================================================================

export abstract class BaseDetector<TOptions extends DetectorOptions = DetectorOptions>
  implements Detector
{
  abstract readonly id: DetectorId;
  abstract readonly title: string;
  abstract readonly description: string;

  protected abstract readonly defaultSeverity: Severity;
  protected abstract readonly defaultConfidence: Confidence;
  protected abstract readonly rootCause: string;
  protected abstract readonly exploitScenario: string;
  protected abstract readonly fix: string;

  readonly reference: string = DEFAULT_REFERENCE;

  protected readonly beforeAfterState: StateTransition | undefined = undefined;
  protected readonly impact: ImpactAssessment | undefined = undefined;
  protected readonly anchorVersionsAffected: string = DEFAULT_AFFECTED_VERSIONS;
  protected readonly ecosystemRecommendations: readonly string[] = [];

  constructor(protected readonly options: TOptions) {}

  get severity(): Severity {
    return this.options.severity ?? this.defaultSeverity;
  }

  get enabled(): boolean {
    return this.options.enabled ?? true;
  }

  detect(context: ScanContext): Finding[] {
    if (!this.enabled) {
      return [];
    }
    return this.doDetect(context);
  }

  protected abstract doDetect(context: ScanContext): Finding[];

  explain(): DetectorExplanation {
    return {
      id: this.id,
      title: this.title,
      severity: this.severity,
      description: this.description,
      rootCause: this.rootCause,
      exploitScenario: this.exploitScenario,
      fix: this.fix,
      reference: this.reference,
      ...this.threatModel(),
      ecosystemRecommendations: [...this.ecosystemRecommendations],
    };
  }

  private threatModel(): Pick<
    Finding,
    "beforeAfterState" | "impact" | "anchorVersionsAffected"
  > {
    return {
      ...(this.beforeAfterState !== undefined
        ? { beforeAfterState: { ...this.beforeAfterState } }
        : {}),
      ...(this.impact !== undefined ? { impact: { ...this.impact } } : {}),
      anchorVersionsAffected: this.anchorVersionsAffected,
    };
  }

  protected createFinding(context: ScanContext, params: FindingParams): Finding {
    const location: SourceLocation = {
      file: context.file.path,
      line: params.line,
    };
    if (params.struct !== undefined) location.struct = params.struct;
    if (params.field !== undefined) location.field = params.field;

    return {
      id: this.id,
      title: this.title,
      severity: this.options.severity ?? params.severity ?? this.defaultSeverity,
      description: params.description,
      location,
      recommendation: this.fix,
      reference: this.reference,
      confidence: params.confidence ?? this.defaultConfidence,
      snippet: context.index.snippet(params.line),
      rootCause: this.rootCause,
      exploitScenario: this.exploitScenario,
      ...this.threatModel(),
      ecosystemRecommendations: params.ecosystemRecommendations ?? [...this.ecosystemRecommendations],
    };
  }
}
