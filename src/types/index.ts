/**
 * Core types for the Anchor audit engine
 */

export enum Severity {
  CRITICAL = "critical",
  HIGH = "high",
  MEDIUM = "medium",
  LOW = "low",
}

export type Confidence = "high" | "medium" | "low";

export type BuiltInDetectorId =
  | "ANCHOR-001"
  | "ANCHOR-002"
  | "ANCHOR-003"
  | "ANCHOR-004"
  | "ANCHOR-005"
  | "ANCHOR-006";

export type DetectorId = BuiltInDetectorId | `CUSTOM-${string}`;

// ============================================================================
// Source Model
// ============================================================================

export interface SourceFile {
  /** Path-like identifier, used verbatim in findings */
  readonly path: string;
  readonly content: string;
}

export interface Span {
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
}

/**
 * A balanced `#[account(...)]` annotation.
 */
export interface AttributeBlock {
  readonly name: "account";
  /** Contents between the outer parentheses, newlines preserved */
  readonly text: string;
  /** The whole annotation, from `#` to the closing `]` */
  readonly raw: string;
  readonly line: number;
  readonly endLine: number;
  readonly span: Span;
  /** Offset of `text` within the source */
  readonly textOffset: number;
  /** Owning field-container, or null when the block sits outside one */
  readonly structName: string | null;
}

/**
 * Structural view of a declared field type such as `Account<'info, Vault>`.
 */
export interface TypeSignature {
  /** Last path segment: `Account` for `anchor_lang::accounts::Account` */
  readonly name: string;
  readonly path: readonly string[];
  readonly lifetimes: readonly string[];
  readonly args: readonly TypeSignature[];
}

export interface FieldRecord {
  readonly name: string;
  /** Declared type text; empty when it could not be delimited */
  readonly type: string;
  readonly signature: TypeSignature | null;
  readonly attribute: AttributeBlock | null;
  /** `///` doc comment lines preceding the field, without the slashes */
  readonly docs: readonly string[];
  readonly line: number;
  readonly structName: string;
}

export interface StructRecord {
  readonly name: string;
  /** Line of the `#[derive(...)]` marker */
  readonly line: number;
  /** Line of the closing brace */
  readonly endLine: number;
  readonly fields: readonly FieldRecord[];
}

// ============================================================================
// Findings
// ============================================================================

export interface SourceLocation {
  file: string;
  line: number;
  struct?: string;
  field?: string;
}

/**
 * Account state before and after a successful exploit.
 */
export interface StateTransition {
  before: string;
  after: string;
  damage: string;
}

export interface ImpactAssessment {
  attackCost: string;
  exploitability: string;
  /** Losses seen for this class of bug, for triage */
  breachCostContext: string;
}

export interface Finding {
  id: DetectorId;
  title: string;
  severity: Severity;
  description: string;
  location: SourceLocation;
  recommendation: string;
  reference: string;
  confidence: Confidence;
  snippet?: string;
  rootCause: string;
  /** Numbered steps; empty when the rule has none */
  exploitScenario: string;
  beforeAfterState?: StateTransition;
  impact?: ImpactAssessment;
  /** Anchor releases the pattern applies to, e.g. `0.25.0 - 0.30.x` */
  anchorVersionsAffected: string;
  ecosystemRecommendations: string[];
}

export interface FileScanResult {
  file: string;
  findings: Finding[];
  detectorsRun: number;
  diagnostics: string[];
}

// ============================================================================
// Summary
// ============================================================================

export type ScoreGrade = "A" | "B+" | "B" | "C" | "D" | "F";

export interface SeverityCounts {
  total: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
}

export interface ScanSummary extends SeverityCounts {
  byDetector: Record<string, number>;
  weightedScore: number;
  grade: ScoreGrade;
}

export interface ScanReport {
  target: string;
  timestamp: string;
  findings: Finding[];
  filesScanned: number;
  detectorsRun: number;
  diagnostics: string[];
  anchorVersion: string | null;
  summary: ScanSummary;
  durationMs: number;
  /** True when the scan stopped early because its signal was aborted */
  cancelled: boolean;
}
