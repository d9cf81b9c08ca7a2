/**
 * ANCHOR-002: init_if_needed field sharing an element type with another
 * mutable field of the same struct.
 */

import { elementType, type ScanContext } from "../parser/index.js";
import { Severity, type Confidence, type FieldRecord, type Finding } from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import { INIT_IF_NEEDED, MUT_CONSTRAINT, attributeCode } from "./patterns.js";

interface TypedField {
  field: FieldRecord;
  type: string;
}

function describeTwins(twins: readonly FieldRecord[]): string {
  const names = twins.map((twin) => `'${twin.name}'`).join(", ");
  return twins.length === 1 ? `mutable field ${names}` : `mutable fields ${names}`;
}

export class DuplicateMutableDetector extends BaseDetector {
  readonly id = "ANCHOR-002";
  readonly title = "Duplicate Mutable Account Bypass";
  readonly description =
    "init_if_needed accounts are excluded from Anchor's duplicate mutable " +
    "account check. If the account already exists, an attacker could pass " +
    "the same account for both the init_if_needed field and another mutable " +
    "field, leading to unexpected double-mutation.";

  protected readonly defaultSeverity = Severity.MEDIUM;
  protected readonly defaultConfidence: Confidence = "medium";

  protected readonly rootCause =
    "Anchor's generated duplicate mutable account check skips fields that carry " +
    "an init constraint, and init_if_needed counts as one. Once the account " +
    "exists it behaves as an ordinary mutable account without duplicate protection.";

  protected readonly exploitScenario = [
    "1. The instruction has init_if_needed field A and mutable field B of the same type",
    "2. Attacker passes the SAME account for both A and B",
    "3. The duplicate check skips A because of its init constraint",
    "4. The account already exists, so init_if_needed does nothing",
    "5. The instruction body mutates one account twice",
  ].join("\n");

  protected readonly fix = [
    "Add an explicit duplicate account check in the instruction body:",
    "  require!(init_field.key() != mut_field.key(), CustomError::DuplicateAccount);",
    "Or use plain `init`, which takes part in the duplicate check.",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Account X passed as both fields. State: balance=1000",
    after: "Account X mutated twice. State: balance=0 (double withdrawal)",
    damage: "Double mutation leads to accounting errors or fund extraction.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL (single transaction)",
    exploitability: "Medium: the two fields must share an account type",
    breachCostContext: "Duplicate account attacks: $100K-$5M exposure.",
  };

  protected override readonly ecosystemRecommendations = [
    "Add an explicit duplicate check: require!(a.key() != b.key())",
    "Prefer plain init over init_if_needed",
  ];

  constructor(options: DetectorOptions = {}) {
    super(options);
  }

  protected doDetect(context: ScanContext): Finding[] {
    const findings: Finding[] = [];

    for (const struct of context.structs) {
      const initFields: TypedField[] = [];
      const mutableByType = new Map<string, FieldRecord[]>();

      for (const field of struct.fields) {
        const type = elementType(field.signature);
        if (type === null) continue;

        const code = attributeCode(field);
        if (INIT_IF_NEEDED.test(code)) {
          initFields.push({ field, type });
        } else if (MUT_CONSTRAINT.test(code)) {
          const group = mutableByType.get(type);
          if (group) group.push(field);
          else mutableByType.set(type, [field]);
        }
      }

      for (const init of initFields) {
        const twins = mutableByType.get(init.type);
        if (twins === undefined) continue;

        findings.push(
          this.createFinding(context, {
            line: init.field.line,
            struct: struct.name,
            field: init.field.name,
            description:
              `In struct ${struct.name}: init_if_needed field '${init.field.name}' ` +
              `(${init.type}) coexists with ${describeTwins(twins)} (${init.type}). ` +
              `The init_if_needed field is excluded from Anchor's duplicate mutable ` +
              `account check.`,
          })
        );
      }
    }

    return findings;
  }
}
