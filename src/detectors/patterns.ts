/**
 * Shared constraint patterns and field classification used by the rules.
 */

import type { ScanContext } from "../parser/index.js";
import { rawHandleKind, stripComments, type RawHandleKind } from "../parser/index.js";
import type { AttributeBlock, FieldRecord, StructRecord } from "../types/index.js";

export const DEFAULT_REFERENCE = "https://github.com/solana-foundation/anchor/pull/4229";

export const DEFAULT_AFFECTED_VERSIONS = "0.25.0 - 0.30.x";

// ============================================================================
// Attribute Patterns
// ============================================================================

export const INIT_IF_NEEDED = /\binit_if_needed\b/;
export const TOKEN_CONSTRAINT = /\btoken\s*::/;
export const ASSOCIATED_TOKEN_CONSTRAINT = /\bassociated_token\s*::/;
export const MUT_CONSTRAINT = /\bmut\b/;
export const CLOSE_CONSTRAINT = /\bclose\s*=/;
export const SIGNER_CONSTRAINT = /\bsigner\b/;
export const OWNER_CONSTRAINT = /\bowner\s*=|constraint\s*=\s*[^,]*\.owner\s*==/;
export const CHECK_DOC = /^CHECK\s*:/;

/** Fresh global matcher for `realloc::payer = <name>` */
export function reallocPayerPattern(): RegExp {
  return /realloc\s*::\s*payer\s*=\s*(\w+)/g;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `constraint = <target>.<property>.is_none()` or `== None` / `== COption::None`.
 * Without a target any receiver expression matches.
 */
export function noneConstraint(property: string, target?: string): RegExp {
  const receiver = target === undefined ? "[^,]*" : `[^,]*?\\b${escapeRegExp(target)}\\s*`;
  return new RegExp(
    `constraint\\s*=\\s*${receiver}\\.\\s*${property}\\s*` +
      `(?:\\.\\s*is_none\\s*\\(\\s*\\)|==\\s*(?:None|COption\\s*::\\s*None))`
  );
}

// ============================================================================
// Field Helpers
// ============================================================================

/**
 * Attribute text with comments removed; empty for unconstrained fields.
 */
export function attributeCode(field: FieldRecord): string {
  return field.attribute === null ? "" : stripComments(field.attribute.text);
}

export function hasCheckDoc(field: FieldRecord): boolean {
  return field.docs.some((doc) => CHECK_DOC.test(doc));
}

/**
 * Field-scoped evidence that a raw handle is validated: a signer or owner
 * constraint on its own attribute, or a `/// CHECK:` note above it.
 */
export function isRawHandleValidated(field: FieldRecord): boolean {
  const code = attributeCode(field);
  return SIGNER_CONSTRAINT.test(code) || OWNER_CONSTRAINT.test(code) || hasCheckDoc(field);
}

export function findStruct(context: ScanContext, name: string | null): StructRecord | null {
  if (name === null) return null;
  return context.structs.find((s) => s.name === name) ?? null;
}

export interface OwnedField {
  struct: StructRecord;
  field: FieldRecord;
}

/**
 * The field each attribute block annotates.
 */
export function fieldsByAttribute(context: ScanContext): Map<AttributeBlock, OwnedField> {
  const owners = new Map<AttributeBlock, OwnedField>();
  for (const struct of context.structs) {
    for (const field of struct.fields) {
      if (field.attribute !== null) owners.set(field.attribute, { struct, field });
    }
  }
  return owners;
}

// ============================================================================
// Raw Handle Allow-Lists
// ============================================================================

export const COSPLAY_SAFE_NAMES: ReadonlySet<string> = new Set([
  "system_program",
  "token_program",
  "rent",
  "clock",
  "associated_token_program",
  "authority",
  "payer",
  "owner",
  "signer",
  "fee_payer",
  "rent_sysvar",
]);

export const OWNER_SAFE_NAMES: ReadonlySet<string> = new Set([
  "system_program",
  "token_program",
  "rent",
  "clock",
  "associated_token_program",
  "sysvar_rent",
  "sysvar_clock",
]);

/**
 * Program and sysvar handles are validated by the runtime or by convention.
 * Matching ignores case and trailing underscores.
 */
export function isAllowListed(name: string, allowList: ReadonlySet<string>): boolean {
  if (name === "program" || name.endsWith("_program")) return true;
  return allowList.has(name.toLowerCase().replace(/_+$/, ""));
}

export interface RawHandleField {
  struct: StructRecord;
  field: FieldRecord;
  kind: RawHandleKind;
}

/**
 * Raw-handle fields that are neither allow-listed nor validated.
 */
export function unvalidatedRawHandles(
  context: ScanContext,
  allowList: ReadonlySet<string>
): RawHandleField[] {
  const results: RawHandleField[] = [];

  for (const struct of context.structs) {
    for (const field of struct.fields) {
      const kind = rawHandleKind(field.signature);
      if (kind === null) continue;
      if (isAllowListed(field.name, allowList)) continue;
      if (isRawHandleValidated(field)) continue;
      results.push({ struct, field, kind });
    }
  }

  return results;
}
