/**
 * Project Scanner Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  detectAnchorVersion,
  discoverFiles,
  parseAnchorVersion,
  runWithConcurrency,
  scanProject,
} from "../../src/engine/projectScanner.js";
import { ConfigError, ProjectNotFoundError } from "../../src/errors/scan.errors.js";
import { rust } from "../helpers.js";

const RAW_HANDLE = rust(
  "#[derive(Accounts)]",
  "pub struct Read<'info> {",
  "    pub price_feed: AccountInfo<'info>,",
  "}"
);

const CLEAN = rust(
  "#[derive(Accounts)]",
  "pub struct Init<'info> {",
  "    #[account(mut)]",
  "    pub user: Signer<'info>,",
  "}"
);

let workspace: string;

async function put(relativePath: string, content: string): Promise<void> {
  const path = join(workspace, relativePath);
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, content, "utf-8");
}

beforeAll(async () => {
  // Given: an Anchor workspace with a build directory and two programs
  workspace = await mkdtemp(join(tmpdir(), "anchor-audit-"));
  await put("Cargo.toml", '[workspace]\nmembers = ["programs/*"]\n');
  await put(
    "programs/oracle/Cargo.toml",
    '[package]\nname = "oracle"\n\n[dependencies]\nanchor-lang = { version = "0.30.1", features = ["init-if-needed"] }\n'
  );
  await put("programs/oracle/src/lib.rs", RAW_HANDLE);
  await put("programs/clean/src/lib.rs", CLEAN);
  await put("target/idl/generated.rs", RAW_HANDLE);
  await put("node_modules/pkg/lib.rs", RAW_HANDLE);
});

afterAll(async () => {
  await rm(workspace, { recursive: true, force: true });
});

describe("discoverFiles", () => {
  it("should list Rust files outside build directories, sorted", async () => {
    const files = await discoverFiles(workspace, ".rs");

    expect(files).toEqual([
      join(workspace, "programs/clean/src/lib.rs"),
      join(workspace, "programs/oracle/src/lib.rs"),
    ]);
  });

  it("should honour extra excluded directories", async () => {
    const files = await discoverFiles(workspace, ".rs", new Set(["target", "node_modules", "clean"]));

    expect(files).toEqual([join(workspace, "programs/oracle/src/lib.rs")]);
  });
});

describe("parseAnchorVersion", () => {
  it.each([
    ['anchor-lang = "0.29.0"', "0.29.0"],
    ['anchor-lang = { version = "0.30.1", features = ["init-if-needed"] }', "0.30.1"],
    ['anchor-spl = "0.30.1"', null],
  ])("should read %s", (manifest, expected) => {
    expect(parseAnchorVersion(manifest)).toBe(expected);
  });
});

describe("detectAnchorVersion", () => {
  it("should fall back to member manifests", async () => {
    expect(await detectAnchorVersion(workspace)).toBe("0.30.1");
  });
});

describe("runWithConcurrency", () => {
  it("should keep input order", async () => {
    const results = await runWithConcurrency(
      [30, 10, 20],
      async (ms) => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        return ms * 2;
      },
      2
    );

    expect(results).toEqual([60, 20, 40]);
  });
});

describe("scanProject", () => {
  it("should scan the workspace with relative paths", async () => {
    // Given: the workspace built above
    // When: We scan its root
    const report = await scanProject(workspace);

    // Then: Only program sources are scanned and paths are relative
    expect(report.filesScanned).toBe(2);
    expect(report.anchorVersion).toBe("0.30.1");
    expect(report.findings.map((f) => [f.location.file, f.location.line, f.id])).toEqual([
      ["programs/oracle/src/lib.rs", 3, "ANCHOR-004"],
      ["programs/oracle/src/lib.rs", 3, "ANCHOR-006"],
    ]);
    expect(report.summary.grade).toBe("B");
    expect(report.cancelled).toBe(false);
    expect(report.diagnostics).toEqual([]);
  });

  it("should scan a single file and find the manifest above it", async () => {
    const report = await scanProject(join(workspace, "programs/oracle/src/lib.rs"));

    expect(report.filesScanned).toBe(1);
    expect(report.anchorVersion).toBe("0.30.1");
    expect(report.findings.map((f) => f.location.file)).toEqual(["lib.rs", "lib.rs"]);
  });

  it("should skip a manifest path it cannot read", async () => {
    // Given: a directory named Cargo.toml beside the file
    const blocked = join(workspace, "programs/oracle/src/Cargo.toml");
    await mkdir(blocked);

    try {
      // When: We scan the file
      const report = await scanProject(join(workspace, "programs/oracle/src/lib.rs"));

      // Then: The manifest one level up still supplies the version
      expect(report.filesScanned).toBe(1);
      expect(report.anchorVersion).toBe("0.30.1");
    } finally {
      await rm(blocked, { recursive: true, force: true });
    }
  });

  it("should apply the project config file", async () => {
    // Given: a program directory whose config disables ANCHOR-004
    await put(
      "programs/oracle/.anchor-audit.yml",
      "disabledDetectors:\n  - ANCHOR-004\nseverityOverrides:\n  ANCHOR-006: medium\n"
    );

    // When: We scan that program
    const report = await scanProject(join(workspace, "programs/oracle"));

    // Then: Only ANCHOR-006 remains, at the configured severity
    expect(report.findings.map((f) => [f.id, f.severity])).toEqual([["ANCHOR-006", "medium"]]);
    expect(report.detectorsRun).toBe(5);
    await rm(join(workspace, "programs/oracle/.anchor-audit.yml"));
  });

  it("should reject a missing root", async () => {
    await expect(scanProject(join(workspace, "missing"))).rejects.toBeInstanceOf(
      ProjectNotFoundError
    );
  });

  it("should reject an explicit config that does not exist", async () => {
    await expect(
      scanProject(workspace, { configPath: join(workspace, "nope.json") })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should report nothing when aborted before starting", async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await scanProject(workspace, { signal: controller.signal });

    expect(report.filesScanned).toBe(0);
    expect(report.findings).toEqual([]);
    expect(report.cancelled).toBe(true);
  });
});
