export const PACKAGE_NAME = "anchor-audit-mcp";
export const PACKAGE_VERSION = "0.1.0";
