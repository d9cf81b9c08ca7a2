/**
 * ANCHOR-006: raw account handle with no owner validation.
 *
 * `UncheckedAccount` findings take `uncheckedAccountSeverity` (Low unless
 * configured); `AccountInfo` findings keep the rule severity.
 */

import type { ScanContext } from "../parser/index.js";
import { Severity, type Confidence, type Finding } from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import { OWNER_SAFE_NAMES, unvalidatedRawHandles } from "./patterns.js";

export interface MissingOwnerOptions extends DetectorOptions {
  uncheckedAccountSeverity?: Severity;
}

export class MissingOwnerDetector extends BaseDetector<MissingOwnerOptions> {
  readonly id = "ANCHOR-006";
  readonly title = "Missing Owner Validation";
  readonly description =
    "Account used without verifying program ownership. An attacker can " +
    "substitute a fake account from an arbitrary program.";

  protected readonly defaultSeverity = Severity.HIGH;
  protected readonly defaultConfidence: Confidence = "high";

  protected readonly rootCause =
    "Solana accounts are byte arrays with an owner field, and any program can " +
    "create accounts holding arbitrary data. Account<'info, T> verifies the " +
    "owner; a raw AccountInfo verifies nothing.";

  protected readonly exploitScenario = [
    "1. The program reads an account without checking its owner",
    "2. Attacker creates a matching account in their own program",
    "3. Attacker passes the fake account to the instruction",
    "4. The program operates on forged data",
  ].join("\n");

  protected readonly fix = [
    "Use Account<'info, T> for an automatic owner and discriminator check, or add:",
    "  #[account(owner = my_program::ID)]",
    "  /// CHECK: Owner verified via constraint",
    "  pub data: AccountInfo<'info>,",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Expected: account owned by this program",
    after: "Actual: attacker passes an account from their own program",
    damage: "Arbitrary state manipulation through fake account data.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL",
    exploitability: "High: the most common Solana vulnerability",
    breachCostContext: "Missing owner checks lead professional Solana audit findings.",
  };

  protected override readonly anchorVersionsAffected = "All versions (developer-side pattern)";

  protected override readonly ecosystemRecommendations = [
    "Replace AccountInfo<'info> or UncheckedAccount<'info> with Account<'info, T>",
    "Add an #[account(owner = program::ID)] constraint",
    "Add a /// CHECK: comment documenting the manual validation",
  ];

  constructor(options: MissingOwnerOptions = {}) {
    super(options);
  }

  get uncheckedAccountSeverity(): Severity {
    return this.options.uncheckedAccountSeverity ?? Severity.LOW;
  }

  protected doDetect(context: ScanContext): Finding[] {
    return unvalidatedRawHandles(context, OWNER_SAFE_NAMES).map(({ struct, field, kind }) =>
      this.createFinding(context, {
        line: field.line,
        struct: struct.name,
        field: field.name,
        description:
          `In struct ${struct.name}: field '${field.name}' uses raw ${kind} ` +
          `without owner validation or CHECK documentation.`,
        ecosystemRecommendations: [
          `Replace ${kind}<'info> with Account<'info, T>`,
          ...this.ecosystemRecommendations.slice(1),
        ],
        ...(kind === "UncheckedAccount"
          ? { severity: this.uncheckedAccountSeverity, confidence: "low" as const }
          : {}),
      })
    );
  }
}
