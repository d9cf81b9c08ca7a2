/**
 * Server Configuration
 */

import { PACKAGE_NAME, PACKAGE_VERSION } from "../version.js";

// ============================================================================
// Server Identity
// ============================================================================

export const SERVER_NAME = PACKAGE_NAME;
export const SERVER_VERSION = PACKAGE_VERSION;
