/**
 * ANCHOR-003: realloc payer that is not verified as a signer.
 */

import { isSignerType, stripComments, type ScanContext } from "../parser/index.js";
import { Severity, type Confidence, type FieldRecord, type Finding } from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import { SIGNER_CONSTRAINT, attributeCode, reallocPayerPattern } from "./patterns.js";

export class ReallocPayerDetector extends BaseDetector {
  readonly id = "ANCHOR-003";
  readonly title = "Realloc Payer Missing Signer Verification";
  readonly description =
    "Realloc constraint payer may not be verified as a transaction signer. " +
    "When account space decreases, lamports are transferred directly to the " +
    "payer without CPI, relying entirely on the field type declaration for " +
    "signer verification.";

  protected readonly defaultSeverity = Severity.MEDIUM;
  protected readonly defaultConfidence: Confidence = "high";

  protected readonly rootCause =
    "Anchor's realloc code moves lamports with a direct borrow_mut() on the " +
    "account balances, bypassing CPI and the runtime's signer checks. Whether " +
    "the payer signed depends entirely on its declared Rust type.";

  protected readonly exploitScenario = [
    "1. The program reallocs with a payer that is not a Signer",
    "2. Attacker calls the instruction with a smaller size to trigger a shrink",
    "3. Excess rent lamports go to the payer without a signer check",
    "4. Attacker names their own account as payer and collects the lamports",
  ].join("\n");

  protected readonly fix = [
    "Change the realloc payer field type to Signer<'info>:",
    "  // Before: pub payer: AccountInfo<'info>,",
    "  // After:  pub payer: Signer<'info>,",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Account: data_len=1000, lamports=10M. Payer: attacker, lamports=0",
    after: "Account: data_len=100, lamports=1M. Payer: attacker, lamports=9M",
    damage: "Attacker extracts rent lamports without signing.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL",
    exploitability: "Medium: needs a payer that is not a Signer",
    breachCostContext: "Estimated $10K-$500K per program.",
  };

  protected override readonly anchorVersionsAffected = "0.26.0 - 0.30.x";

  protected override readonly ecosystemRecommendations = [
    "Change the payer to Signer<'info>",
    "Add a #[account(signer)] constraint",
  ];

  constructor(options: DetectorOptions = {}) {
    super(options);
  }

  protected doDetect(context: ScanContext): Finding[] {
    const findings: Finding[] = [];

    for (const struct of context.structs) {
      const byName = new Map<string, FieldRecord>();
      for (const f of struct.fields) {
        if (!byName.has(f.name)) byName.set(f.name, f);
      }

      for (const field of struct.fields) {
        const block = field.attribute;
        if (block === null) continue;

        const pattern = reallocPayerPattern();
        const code = stripComments(block.text);
        let match: RegExpExecArray | null;

        while ((match = pattern.exec(code)) !== null) {
          const payerName = match[1];
          const payer = payerName === undefined ? undefined : byName.get(payerName);
          // unknown payer or undelimited type: nothing to judge
          if (payer === undefined || payer.signature === null) continue;
          if (isSignerType(payer.signature)) continue;
          if (SIGNER_CONSTRAINT.test(attributeCode(payer))) continue;

          findings.push(
            this.createFinding(context, {
              line: context.index.lineOf(block.textOffset + match.index),
              struct: struct.name,
              field: field.name,
              description:
                `In struct ${struct.name}: realloc payer '${payer.name}' is typed ` +
                `as '${payer.type}' instead of Signer<'info>. Lamports transferred ` +
                `without signer verification.`,
            })
          );
        }
      }
    }

    return findings;
  }
}
