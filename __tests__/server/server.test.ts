/**
 * MCP Server Tests
 */

import { describe, it, expect } from "vitest";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  SERVER_NAME,
  SERVER_VERSION,
  createAuditServer,
  getServerInfo,
} from "../../src/server/index.js";

describe("getServerInfo", () => {
  it("should list the tools and the built-in detectors", () => {
    const info = getServerInfo();

    expect(info.name).toBe(SERVER_NAME);
    expect(info.version).toBe(SERVER_VERSION);
    expect(info.tools).toEqual(["scan_source", "scan_project", "explain_finding", "list_detectors"]);
    expect(info.detectors).toEqual([
      "ANCHOR-001",
      "ANCHOR-002",
      "ANCHOR-003",
      "ANCHOR-004",
      "ANCHOR-005",
      "ANCHOR-006",
    ]);
  });
});

describe("createAuditServer", () => {
  it("should build a fresh unconnected server each call", () => {
    // Given/When: Two servers are created
    const first = createAuditServer();
    const second = createAuditServer();

    // Then: Both are SDK servers and neither is shared
    expect(first).toBeInstanceOf(Server);
    expect(second).toBeInstanceOf(Server);
    expect(first).not.toBe(second);
  });
});
