/**
 * ANCHOR-001: init_if_needed on a token account without delegate and
 * close_authority checks.
 *
 * When the account already exists, Anchor validates only mint, owner and token
 * program. A pre-created account can carry an attacker's delegate or close
 * authority.
 */

import { stripComments, type ScanContext } from "../parser/index.js";
import { Severity, type Confidence, type Finding } from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import {
  ASSOCIATED_TOKEN_CONSTRAINT,
  INIT_IF_NEEDED,
  TOKEN_CONSTRAINT,
  fieldsByAttribute,
  findStruct,
  noneConstraint,
} from "./patterns.js";

/** Lines searched on each side of the attribute for exclusion constraints */
export const CONSTRAINT_WINDOW = 30;

export class InitIfNeededDetector extends BaseDetector {
  readonly id = "ANCHOR-001";
  readonly title = "init_if_needed Incomplete Field Validation";
  readonly description =
    "Token or associated token account accepted via init_if_needed without " +
    "validation of delegate, close_authority, or state fields. An attacker " +
    "can pre-create the account with malicious field values.";

  protected readonly defaultSeverity = Severity.HIGH;
  protected readonly defaultConfidence: Confidence = "high";

  protected readonly rootCause =
    "When init_if_needed meets an already-existing token or associated token " +
    "account, Anchor deserializes it without re-initializing and validates only " +
    "mint, owner and token_program. delegate, close_authority, state and " +
    "delegated_amount are left unchecked, so a pre-created account keeps " +
    "whatever values the attacker gave it.";

  protected readonly exploitScenario = [
    "1. Attacker creates a token account with delegate=ATTACKER and close_authority=ATTACKER",
    "2. Attacker arranges for the account to match the expected owner and mint",
    "3. The program accepts it via init_if_needed; initialization is skipped",
    "4. Anchor validates mint, owner and token_program, and all pass",
    "5. delegate and close_authority are never checked",
    "6. Attacker drains funds through the delegate or force-closes the account",
  ].join("\n");

  protected readonly fix = [
    "Add explicit constraint checks for fields not validated by init_if_needed:",
    "  #[account(",
    "    init_if_needed,",
    "    token::mint = mint,",
    "    token::authority = authority,",
    "    constraint = token_account.delegate.is_none(),",
    "    constraint = token_account.close_authority.is_none(),",
    "  )]",
    "Alternatively, use plain `init` if the account should always be newly created.",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Token account: owner=victim, balance=1000, delegate=None, close_authority=None",
    after:
      "Token account: owner=victim, balance=1000, delegate=ATTACKER, " +
      "close_authority=ATTACKER",
    damage:
      "Attacker drains the balance through a delegated transfer or force-closes " +
      "the account; the loss is permanent.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL (one transaction to pre-create the account)",
    exploitability: "High: a single transaction, no special setup",
    breachCostContext:
      "Programs that accept pre-created token accounts through init_if_needed " +
      "risk an attacker keeping delegate or close_authority over user funds.",
  };

  protected override readonly anchorVersionsAffected =
    "0.25.0 - 0.30.x (init_if_needed introduced in 0.25)";

  protected override readonly ecosystemRecommendations = [
    "Add constraint = account.delegate.is_none() and constraint = account.close_authority.is_none()",
    "Use plain init instead of init_if_needed where the account is always new",
    "Ask for a compile-time warning on init_if_needed token accounts without these checks",
  ];

  constructor(options: DetectorOptions = {}) {
    super(options);
  }

  protected doDetect(context: ScanContext): Finding[] {
    const findings: Finding[] = [];
    const owners = fieldsByAttribute(context);

    for (const block of context.blocks) {
      const code = stripComments(block.text);
      if (!INIT_IF_NEEDED.test(code)) continue;

      const isAssociated = ASSOCIATED_TOKEN_CONSTRAINT.test(code);
      if (!isAssociated && !TOKEN_CONSTRAINT.test(code)) continue;

      const owner = owners.get(block);
      const struct = owner?.struct ?? findStruct(context, block.structName);
      const field = owner?.field;

      const window = context.codeIndex.window(
        block.line,
        CONSTRAINT_WINDOW,
        struct ? { first: struct.line, last: struct.endLine } : undefined
      );

      const missing: string[] = [];
      if (!noneConstraint("delegate", field?.name).test(window)) {
        missing.push("delegate");
      }
      if (!noneConstraint("close_authority", field?.name).test(window)) {
        missing.push("close_authority");
      }
      if (missing.length === 0) continue;

      const subject = isAssociated ? "Associated token account" : "Token account";
      const named = field ? ` '${field.name}'` : "";

      findings.push(
        this.createFinding(context, {
          line: block.line,
          description:
            `${subject}${named} accepted via init_if_needed without validation ` +
            `of ${missing.join(", ")} fields.`,
          ...(struct ? { struct: struct.name } : {}),
          ...(field ? { field: field.name } : {}),
        })
      );
    }

    return findings;
  }
}
