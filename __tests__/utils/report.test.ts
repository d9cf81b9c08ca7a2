/**
 * Report Formatter Tests
 */

import { describe, it, expect } from "vitest";
import { formatExplanation, renderReport } from "../../src/utils/report.js";
import { InitIfNeededDetector } from "../../src/detectors/InitIfNeededDetector.js";
import { Severity, type ScanReport } from "../../src/types/index.js";
import { summarize } from "../../src/utils/severity.js";
import { contextOf, createFinding, rust } from "../helpers.js";

function reportOf(overrides: Partial<ScanReport> = {}): ScanReport {
  const findings = overrides.findings ?? [];
  return {
    target: "programs/vault",
    timestamp: "2026-01-01T00:00:00.000Z",
    findings,
    filesScanned: 2,
    detectorsRun: 6,
    diagnostics: [],
    anchorVersion: null,
    summary: summarize(findings),
    durationMs: 12,
    cancelled: false,
    ...overrides,
  };
}

describe("renderReport", () => {
  it("should render a clean Markdown report", () => {
    const markdown = renderReport(reportOf(), "markdown");

    expect(markdown.split("\n").slice(0, 7)).toEqual([
      "# Anchor Security Scan: programs/vault",
      "",
      "**Date:** 2026-01-01T00:00:00.000Z",
      "**Files Scanned:** 2",
      "**Detectors Run:** 6",
      "**Anchor Version:** unknown",
      "**Duration:** 12ms",
    ]);
    expect(markdown).toContain("**Grade:** A (weighted score 0)");
    expect(markdown).toContain("**No issues were identified.**");
    expect(markdown).not.toContain("## Diagnostics");
  });

  it("should list findings most severe first with their details", () => {
    // Given: a low and a high finding
    const findings = [
      createFinding({ id: "ANCHOR-006", title: "Missing Owner Validation", severity: Severity.LOW }),
      createFinding({
        id: "ANCHOR-001",
        title: "init_if_needed Incomplete Field Validation",
        severity: Severity.HIGH,
        location: { file: "lib.rs", line: 5, struct: "Deposit", field: "user_ata" },
        snippet: ">>>    5 |     #[account(",
      }),
    ];

    // When: We render Markdown
    const markdown = renderReport(reportOf({ findings }), "markdown");

    // Then: The high finding comes first with location and snippet
    const high = markdown.indexOf("### 🟠 [HIGH] ANCHOR-001: init_if_needed Incomplete Field Validation");
    const low = markdown.indexOf("### 🟢 [LOW] ANCHOR-006: Missing Owner Validation");
    expect(high).toBeGreaterThan(-1);
    expect(low).toBeGreaterThan(high);
    expect(markdown).toContain("**Location:** `lib.rs:5` (Deposit.user_ata)");
    expect(markdown).toContain("```rust\n>>>    5 |     #[account(\n```");
    expect(markdown).toContain("| 🟠 high | 1 |");
  });

  it("should render a finding's threat model before its recommendation", () => {
    // Given: a finding with every threat model field set
    const finding = createFinding({
      rootCause: "Delegate is never checked",
      exploitScenario: "1. Pre-create the account\n2. Drain it",
      beforeAfterState: { before: "delegate=None", after: "delegate=ATTACKER", damage: "Balance drained" },
      impact: { attackCost: "< 0.01 SOL", exploitability: "High", breachCostContext: "Common pattern" },
      anchorVersionsAffected: "0.25.0 - 0.30.x",
      ecosystemRecommendations: ["Check the delegate", "Prefer plain init"],
    });

    // When: We render Markdown
    const markdown = renderReport(reportOf({ findings: [finding] }), "markdown");

    // Then: The sections appear in order between the description and the fix
    expect(markdown).toContain(
      [
        "Test finding",
        "",
        "**Root Cause:** Delegate is never checked",
        "",
        "**Exploit Scenario:**",
        "",
        "1. Pre-create the account",
        "2. Drain it",
        "",
        "**Before:** delegate=None",
        "**After:** delegate=ATTACKER",
        "**Damage:** Balance drained",
        "",
        "**Attack Cost:** < 0.01 SOL",
        "**Exploitability:** High",
        "**Breach Context:** Common pattern",
        "",
        "**Anchor Versions Affected:** 0.25.0 - 0.30.x",
        "",
        "**Ecosystem Recommendations:**",
        "",
        "- Check the delegate",
        "- Prefer plain init",
        "",
        "**Recommendation:**",
      ].join("\n")
    );
  });

  it("should omit threat model sections a finding does not have", () => {
    const markdown = renderReport(reportOf({ findings: [createFinding()] }), "markdown");

    expect(markdown).toContain("**Root Cause:** Test root cause\n\n**Anchor Versions Affected:**");
    expect(markdown).not.toContain("**Exploit Scenario:**");
    expect(markdown).not.toContain("**Before:**");
    expect(markdown).not.toContain("**Attack Cost:**");
    expect(markdown).not.toContain("**Ecosystem Recommendations:**");
  });

  it("should list diagnostics and cancellation", () => {
    const markdown = renderReport(
      reportOf({ diagnostics: ["cannot read a.rs: EACCES"], cancelled: true }),
      "markdown"
    );

    expect(markdown).toContain("> Scan was cancelled before every file was processed.");
    expect(markdown).toContain("## Diagnostics\n\n- cannot read a.rs: EACCES");
  });

  it("should render JSON that parses back to the report", () => {
    const report = reportOf({ findings: [createFinding()] });

    expect(JSON.parse(renderReport(report, "json"))).toEqual(report);
  });

  it("should keep detector threat models in JSON", () => {
    // Given: a real ANCHOR-001 finding
    const [finding] = new InitIfNeededDetector().detect(
      contextOf(
        rust(
          "#[derive(Accounts)]",
          "pub struct Deposit<'info> {",
          "    #[account(init_if_needed, payer = user, token::mint = mint, token::authority = user)]",
          "    pub vault: Account<'info, TokenAccount>,",
          "}"
        )
      )
    );

    // When: We render JSON and parse it back
    const parsed = JSON.parse(renderReport(reportOf({ findings: finding ? [finding] : [] }), "json"));

    // Then: The nested threat model survives
    expect(parsed.findings[0].impact.attackCost).toBe("< 0.01 SOL (one transaction to pre-create the account)");
    expect(parsed.findings[0].beforeAfterState.before).toBe(
      "Token account: owner=victim, balance=1000, delegate=None, close_authority=None"
    );
    expect(parsed.findings[0].anchorVersionsAffected).toBe("0.25.0 - 0.30.x (init_if_needed introduced in 0.25)");
  });

  it("should render SARIF", () => {
    const sarif = JSON.parse(renderReport(reportOf({ findings: [createFinding()] }), "sarif"));

    expect(sarif.version).toBe("2.1.0");
    expect(sarif.runs[0].results).toHaveLength(1);
  });
});

describe("formatExplanation", () => {
  it("should include every section", () => {
    const text = formatExplanation(new InitIfNeededDetector().explain());

    expect(text.startsWith("# ANCHOR-001: init_if_needed Incomplete Field Validation\n")).toBe(true);
    expect(text).toContain("**Severity:** high");
    expect(text).toContain("## Root Cause");
    expect(text).toContain("## Exploit Scenario");
    expect(text).toContain("## Impact");
    expect(text).toContain("**Anchor Versions Affected:** 0.25.0 - 0.30.x (init_if_needed introduced in 0.25)");
    expect(text).toContain("## Fix");
    expect(text).toContain("**Reference:** https://github.com/solana-foundation/anchor/pull/4229");
  });
});
