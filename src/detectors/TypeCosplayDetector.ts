/**
 * ANCHOR-004: raw account handle with no discriminator or owner check.
 */

import type { ScanContext } from "../parser/index.js";
import { Severity, type Confidence, type Finding } from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import { COSPLAY_SAFE_NAMES, unvalidatedRawHandles } from "./patterns.js";

export class TypeCosplayDetector extends BaseDetector {
  readonly id = "ANCHOR-004";
  readonly title = "Account Type Cosplay: Missing Discriminator Check";
  readonly description =
    "Raw AccountInfo used to deserialize account data without verifying " +
    "discriminator or program owner. An attacker can substitute a fake " +
    "account from another program with matching data layout.";

  protected readonly defaultSeverity = Severity.MEDIUM;
  protected readonly defaultConfidence: Confidence = "medium";

  protected readonly rootCause =
    "Account<'info, T> checks the 8-byte discriminator (the first 8 bytes of " +
    "sha256(\"account:<TypeName>\")) and the owning program. A raw AccountInfo " +
    "or UncheckedAccount skips both, so any account whose bytes happen to fit " +
    "the expected layout is accepted.";

  protected readonly exploitScenario = [
    "1. The program expects a data account with specific fields, such as a balance",
    "2. The field is declared as AccountInfo<'info> without an owner check",
    "3. Attacker creates an account in their own program with a matching layout",
    "4. Attacker sets the balance field to its maximum value",
    "5. The program reads the forged balance and acts on it",
  ].join("\n");

  protected readonly fix = [
    "Replace the raw handle with Account<'info, T>, which checks discriminator and owner:",
    "  pub data_account: Account<'info, MyDataType>,",
    "If a raw handle is required, validate it and document why:",
    "  #[account(owner = my_program::ID)]",
    "  /// CHECK: Validated via owner constraint",
    "  pub data_account: AccountInfo<'info>,",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Legitimate account: owner=this_program, data=valid_state, discriminator=correct",
    after:
      "Attacker-crafted account: owner=attacker_program, data=malicious_state " +
      "(matching byte layout), discriminator=wrong but unchecked",
    damage:
      "The program acts on attacker-controlled data as if it were its own " +
      "account, allowing state manipulation or fund theft.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL (create a fake account and call the instruction)",
    exploitability: "High: among the most common weaknesses in Solana programs",
    breachCostContext:
      "Missing owner and type checks are the most frequent finding in Solana " +
      "security audits.",
  };

  protected override readonly anchorVersionsAffected =
    "All versions (developer error, not a framework bug)";

  protected override readonly ecosystemRecommendations = [
    "Replace AccountInfo<'info> or UncheckedAccount<'info> with Account<'info, T>",
    "If the raw type is required, add an owner check: constraint = account.owner == &expected_program::ID",
    "Add a /// CHECK: comment explaining why the raw type is safe",
  ];

  constructor(options: DetectorOptions = {}) {
    super(options);
  }

  protected doDetect(context: ScanContext): Finding[] {
    return unvalidatedRawHandles(context, COSPLAY_SAFE_NAMES).map(({ struct, field, kind }) =>
      this.createFinding(context, {
        line: field.line,
        struct: struct.name,
        field: field.name,
        description:
          `In struct ${struct.name}: field '${field.name}' uses raw ${kind} without ` +
          `owner or discriminator verification. An attacker can substitute a fake ` +
          `account from another program.`,
        ecosystemRecommendations: [
          `Replace ${kind}<'info> with Account<'info, T>`,
          ...this.ecosystemRecommendations.slice(1),
        ],
      })
    );
  }
}
