/**
 * ANCHOR-005: an element type that is both closed and init_if_needed.
 */

import { elementType, type ScanContext } from "../parser/index.js";
import {
  Severity,
  type Confidence,
  type FieldRecord,
  type Finding,
  type StructRecord,
} from "../types/index.js";
import { BaseDetector, type DetectorOptions } from "./BaseDetector.js";
import { CLOSE_CONSTRAINT, INIT_IF_NEEDED, attributeCode } from "./patterns.js";

/**
 * `struct` pairs fields within one accounts struct; `file` pairs them across
 * every accounts struct in the file, where instruction pairs usually live.
 */
export type CloseReinitScope = "struct" | "file";

export interface CloseReinitOptions extends DetectorOptions {
  scope?: CloseReinitScope;
}

interface Usage {
  struct: StructRecord;
  field: FieldRecord;
}

export class CloseReinitDetector extends BaseDetector<CloseReinitOptions> {
  readonly id = "ANCHOR-005";
  readonly title = "Close + Reinit Lifecycle Attack";
  readonly description =
    "Same account type is used with both close and init_if_needed constraints, " +
    "enabling potential account revival after close with attacker-controlled state.";

  protected readonly defaultSeverity = Severity.MEDIUM;
  protected readonly defaultConfidence: Confidence = "medium";

  protected readonly rootCause =
    "close zeroes an account and hands its lamports away. The address then looks " +
    "uninitialized, so init_if_needed will initialize it again. Whoever funds the " +
    "address between the two instructions controls the re-initialization.";

  protected readonly exploitScenario = [
    "1. Attacker calls the instruction carrying the close constraint",
    "2. The account is zeroed and its lamports transferred",
    "3. Attacker funds the address with the rent-exempt minimum",
    "4. Attacker calls the init_if_needed instruction and the account is re-initialized",
    "5. Attacker controls the initialization parameters",
  ].join("\n");

  protected readonly fix = [
    "Use plain init instead of init_if_needed, or track lifecycle state:",
    "  constraint = !account.is_closed",
  ].join("\n");

  protected override readonly beforeAfterState = {
    before: "Account: initialized, authority=victim",
    after: "Account: re-initialized via init_if_needed, authority=attacker",
    damage: "Account hijack through a close-then-reinit lifecycle.",
  };

  protected override readonly impact = {
    attackCost: "< 0.01 SOL",
    exploitability: "Medium: needs close and init_if_needed on the same type",
    breachCostContext: "Account revival: $50K-$2M per program.",
  };

  protected override readonly ecosystemRecommendations = [
    "Use plain init instead of init_if_needed",
    "Track lifecycle state so a closed account cannot be initialized again",
  ];

  constructor(options: CloseReinitOptions = {}) {
    super(options);
  }

  get scope(): CloseReinitScope {
    return this.options.scope ?? "struct";
  }

  protected doDetect(context: ScanContext): Finding[] {
    const groups: (readonly StructRecord[])[] =
      this.scope === "file" ? [context.structs] : context.structs.map((s) => [s]);

    return groups.flatMap((structs) => this.detectInGroup(context, structs));
  }

  private detectInGroup(context: ScanContext, structs: readonly StructRecord[]): Finding[] {
    const closed = new Map<string, Usage>();
    const reinit = new Map<string, Usage>();

    for (const struct of structs) {
      for (const field of struct.fields) {
        const type = elementType(field.signature);
        if (type === null) continue;

        const code = attributeCode(field);
        if (CLOSE_CONSTRAINT.test(code) && !closed.has(type)) {
          closed.set(type, { struct, field });
        }
        if (INIT_IF_NEEDED.test(code) && !reinit.has(type)) {
          reinit.set(type, { struct, field });
        }
      }
    }

    const findings: Finding[] = [];

    for (const [type, init] of reinit) {
      const close = closed.get(type);
      if (close === undefined) continue;

      findings.push(
        this.createFinding(context, {
          line: init.field.line,
          struct: init.struct.name,
          field: init.field.name,
          description:
            `Account type '${type}' is used with close (in ${close.struct.name}.` +
            `${close.field.name}, line ${close.field.line}) and init_if_needed ` +
            `(in ${init.struct.name}.${init.field.name}, line ${init.field.line}). ` +
            `Attacker can close and revive the account.`,
        })
      );
    }

    return findings;
  }
}
