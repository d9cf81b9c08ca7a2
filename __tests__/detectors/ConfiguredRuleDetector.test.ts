/**
 * Configured Rule Tests
 */

import { describe, it, expect } from "vitest";
import { ConfiguredRuleDetector } from "../../src/detectors/ConfiguredRuleDetector.js";
import { ScanConfigSchema, type CustomRule } from "../../src/config/scanConfig.js";
import { Severity } from "../../src/types/index.js";
import { contextOf, rust } from "../helpers.js";

function ruleFrom(input: unknown): CustomRule {
  const [rule] = ScanConfigSchema.parse({ rules: [input] }).rules;
  if (rule === undefined) throw new Error("rule did not parse");
  return rule;
}

const VAULTS = rust(
  "#[derive(Accounts)]",
  "pub struct Deposit<'info> {",
  '    #[account(mut, seeds = [b"vault", user.key().as_ref()], bump)]',
  "    pub vault: Account<'info, Vault>,",
  "    #[account(mut)]",
  "    pub backup_vault: Account<'info, Vault>,",
  "    pub user: Signer<'info>,",
  "}",
  "",
  "pub fn handler(ctx: Context<Deposit>) -> Result<()> {",
  "    msg!(\"deposit\");",
  "    let clock = Clock::get()?.unix_timestamp;",
  "    Ok(())",
  "}"
);

describe("ConfiguredRuleDetector", () => {
  describe("attribute rules", () => {
    const rule = ruleFrom({
      id: "VAULT-SEEDS",
      type: "attribute",
      title: "Vault without seeds",
      description: "Vault accounts must be PDAs",
      severity: "HIGH",
      match: { fieldType: "Account<'info, Vault>" },
      unless: ["seeds\\s*="],
    });

    it("should report matching fields not covered by an unless pattern", () => {
      // Given: two Vault fields, one with seeds
      const detector = new ConfiguredRuleDetector(rule);

      // When: The rule runs
      const findings = detector.detect(contextOf(VAULTS));

      // Then: Only the field without seeds is reported
      expect(findings).toHaveLength(1);
      expect(findings[0]?.id).toBe("CUSTOM-VAULT-SEEDS");
      expect(findings[0]?.severity).toBe(Severity.HIGH);
      expect(findings[0]?.confidence).toBe("medium");
      expect(findings[0]?.location).toEqual({
        file: "lib.rs",
        line: 6,
        struct: "Deposit",
        field: "backup_vault",
      });
      expect(findings[0]?.description).toBe(
        "Vault accounts must be PDAs\n\nField: `Deposit.backup_vault`"
      );
    });

    it("should require every given matcher", () => {
      const detector = new ConfiguredRuleDetector(
        ruleFrom({
          id: "BACKUP",
          type: "attribute",
          title: "Backup vault",
          description: "Backup vaults need review",
          severity: "low",
          match: { attribute: "\\bmut\\b", fieldName: "^backup_" },
        })
      );

      const findings = detector.detect(contextOf(VAULTS));

      expect(findings.map((f) => f.location.field)).toEqual(["backup_vault"]);
    });

    it("should read unless patterns from doc lines", () => {
      const source = rust(
        "#[derive(Accounts)]",
        "pub struct Read<'info> {",
        "    /// reviewed: derived off-chain",
        "    pub vault: Account<'info, Vault>,",
        "}"
      );
      const detector = new ConfiguredRuleDetector(
        ruleFrom({
          id: "V",
          type: "attribute",
          title: "t",
          description: "d",
          severity: "medium",
          match: { fieldName: "vault" },
          unless: ["reviewed:"],
        })
      );

      expect(detector.detect(contextOf(source))).toEqual([]);
    });

    it("should stay inert when a pattern does not compile", () => {
      // Given: an unbalanced regular expression
      const detector = new ConfiguredRuleDetector(
        ruleFrom({
          id: "BROKEN",
          type: "attribute",
          title: "t",
          description: "d",
          severity: "low",
          match: { attribute: "(" },
        })
      );

      // When/Then: The rule reports nothing instead of throwing
      expect(detector.detect(contextOf(VAULTS))).toEqual([]);
    });
  });

  describe("regex rules", () => {
    it("should report the first match on each line", () => {
      const detector = new ConfiguredRuleDetector(
        ruleFrom({
          id: "CLOCK",
          type: "regex",
          title: "Clock dependency",
          description: "Timestamps can drift",
          severity: "low",
          pattern: "clock::get",
          caseInsensitive: true,
        })
      );

      const findings = detector.detect(contextOf(VAULTS));

      expect(findings).toHaveLength(1);
      expect(findings[0]?.confidence).toBe("high");
      expect(findings[0]?.location).toEqual({ file: "lib.rs", line: 12 });
      expect(findings[0]?.description).toBe("Timestamps can drift\n\nMatched: `Clock::get`");
    });

    it("should respect case without the flag", () => {
      const detector = new ConfiguredRuleDetector(
        ruleFrom({
          id: "CLOCK",
          type: "regex",
          title: "Clock dependency",
          description: "Timestamps can drift",
          severity: "low",
          pattern: "clock::get",
        })
      );

      expect(detector.detect(contextOf(VAULTS))).toEqual([]);
    });
  });

  it("should carry recommendation and reference from the rule", () => {
    const detector = new ConfiguredRuleDetector(
      ruleFrom({
        id: "MSG",
        type: "regex",
        title: "Logging",
        description: "Logs cost compute",
        severity: "low",
        pattern: "msg!",
        recommendation: "Remove logs from hot paths",
        reference: "https://example.com/compute",
      })
    );

    const explanation = detector.explain();

    expect(explanation.id).toBe("CUSTOM-MSG");
    expect(explanation.fix).toBe("Remove logs from hot paths");
    expect(explanation.reference).toBe("https://example.com/compute");
    expect(detector.detect(contextOf(VAULTS))[0]?.recommendation).toBe("Remove logs from hot paths");
  });
});
