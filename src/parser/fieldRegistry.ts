/**
 * Field Registry Builder
 *
 * Finds `#[derive(Accounts)]` structs, delimits their bodies by balanced braces
 * and records each field with its declared type, the attribute block directly
 * above it and its `///` doc lines.
 */

import type { AttributeBlock, FieldRecord, StructRecord } from "../types/index.js";
import { prepareCode, type CodeView } from "./delimiters.js";
import { LineIndex } from "./lineIndex.js";
import { parseTypeSignature } from "./typeSignature.js";

// ============================================================================
// Types
// ============================================================================

export interface FieldRegistry {
  structs: StructRecord[];
  /** Input blocks with `structName` filled in for those inside a container */
  blocks: AttributeBlock[];
}

interface Container {
  name: string;
  markerOffset: number;
  bodyStart: number;
  bodyEnd: number;
}

// ============================================================================
// Patterns
// ============================================================================

const DERIVE_MARKER = /#\s*\[\s*derive\s*\(/g;

const STRUCT_HEAD = /(?:pub(?:\s*\([^)]*\))?\s+)?struct\s+([A-Za-z_]\w*)/y;

const FIELD_HEAD = /(pub(?:\s*\([^)]*\))?\s+)?([A-Za-z_]\w*)\s*:(?!:)/y;

const DOC_LINE = /^\s*\/\/\/(?!\/)(.*)$/;

// ============================================================================
// Container Discovery
// ============================================================================

function skipWhitespace(code: string, index: number, limit: number): number {
  let i = index;
  while (i < limit && /\s/.test(code.charAt(i))) i++;
  return i;
}

/**
 * Skip whitespace and any further `#[...]` attributes between a derive and the
 * struct keyword.
 */
function skipAttributes({ code, delimiters }: CodeView, index: number): number {
  let i = index;
  for (;;) {
    i = skipWhitespace(code, i, code.length);
    if (code.charAt(i) !== "#") return i;
    const bracket = skipWhitespace(code, i + 1, code.length);
    if (code.charAt(bracket) !== "[") return i;
    const close = delimiters.closerOf(bracket);
    if (close === -1) return i;
    i = close + 1;
  }
}

function findContainers(view: CodeView): Container[] {
  const { code, delimiters } = view;
  const containers: Container[] = [];
  const marker = new RegExp(DERIVE_MARKER.source, "g");

  let match: RegExpExecArray | null;
  while ((match = marker.exec(code)) !== null) {
    const bracket = code.indexOf("[", match.index);
    const close = delimiters.closerOf(bracket);
    if (close === -1) continue;
    if (!/\bAccounts\b/.test(code.slice(bracket + 1, close))) continue;

    const head = skipAttributes(view, close + 1);
    const struct = new RegExp(STRUCT_HEAD.source, "y");
    struct.lastIndex = head;
    const found = struct.exec(code);
    const name = found?.[1];
    if (!found || name === undefined) continue;

    // generics and where-clauses sit between the name and the body
    let brace = head + found[0].length;
    while (brace < code.length && !"{;#".includes(code.charAt(brace))) {
      brace++;
    }
    if (code.charAt(brace) !== "{") continue;

    const bodyEnd = delimiters.closerOf(brace);
    if (bodyEnd === -1) continue;

    containers.push({ name, markerOffset: match.index, bodyStart: brace + 1, bodyEnd });
    marker.lastIndex = bodyEnd + 1;
  }

  return containers;
}

// ============================================================================
// Field Parsing
// ============================================================================

/**
 * Read a type up to the next top-level comma. Returns `balanced: false` when
 * the text nests unevenly before the body ends.
 */
function readFieldType(
  code: string,
  start: number,
  limit: number
): { text: string; next: number; balanced: boolean } {
  let depth = 0;
  let i = start;

  for (; i < limit; i++) {
    const ch = code.charAt(i);
    if (ch === "<" || ch === "(" || ch === "[" || ch === "{") {
      depth++;
    } else if (ch === ">" || ch === ")" || ch === "]" || ch === "}") {
      if (ch === ">" && code.charAt(i - 1) === "-") continue;
      depth--;
      if (depth < 0) break;
    } else if (ch === "," && depth === 0) {
      break;
    }
  }

  return {
    text: code.slice(start, i).trim().replace(/\s+/g, " "),
    next: i + 1,
    balanced: depth === 0,
  };
}

function collectDocs(source: string, from: number, to: number): string[] {
  const docs: string[] = [];
  for (const line of source.slice(from, to).split("\n")) {
    const doc = DOC_LINE.exec(line);
    if (doc) docs.push((doc[1] ?? "").trim());
  }
  return docs;
}

function parseFields(
  source: string,
  { code, delimiters }: CodeView,
  container: Container,
  blocks: readonly AttributeBlock[],
  index: LineIndex
): FieldRecord[] {
  const fields: FieldRecord[] = [];
  const { bodyStart, bodyEnd } = container;
  let cursor = bodyStart;
  let boundary = bodyStart;
  // blocks are in source order; `nextBlock` only moves forward
  let nextBlock = 0;

  while (cursor < bodyEnd) {
    cursor = skipWhitespace(code, cursor, bodyEnd);
    if (cursor >= bodyEnd) break;

    if (code.charAt(cursor) === "#") {
      const bracket = skipWhitespace(code, cursor + 1, bodyEnd);
      const close = code.charAt(bracket) === "[" ? delimiters.closerOf(bracket, bodyEnd) : -1;
      if (close === -1) break;
      cursor = close + 1;
      continue;
    }

    const head = new RegExp(FIELD_HEAD.source, "y");
    head.lastIndex = cursor;
    const found = head.exec(code);
    const name = found?.[2];

    if (!found || name === undefined) {
      // not a field declaration; resync on the next separator
      let next = cursor + 1;
      while (next < bodyEnd && code.charAt(next) !== "," && code.charAt(next) !== "\n") next++;
      cursor = next + 1;
      boundary = cursor;
      continue;
    }

    const nameOffset = cursor + (found[1]?.length ?? 0);
    const typeInfo = readFieldType(code, cursor + found[0].length, bodyEnd);
    const type = typeInfo.balanced ? typeInfo.text : "";

    let attribute: AttributeBlock | null = null;
    let block = blocks[nextBlock];
    while (block !== undefined && block.span.end <= cursor) {
      if (block.span.start >= boundary) attribute = block;
      block = blocks[++nextBlock];
    }

    fields.push({
      name,
      type,
      signature: parseTypeSignature(type),
      attribute,
      docs: collectDocs(source, boundary, cursor),
      line: index.lineOf(nameOffset),
      structName: container.name,
    });

    if (!typeInfo.balanced) break;
    cursor = typeInfo.next;
    boundary = cursor;
  }

  return fields;
}

/**
 * Tag each block with the container whose body holds it. Containers do not
 * overlap and both lists are in source order, so one merge pass suffices.
 */
function assignBlocks(
  blocks: readonly AttributeBlock[],
  containers: readonly Container[]
): { owned: AttributeBlock[]; byContainer: AttributeBlock[][] } {
  const owned: AttributeBlock[] = [];
  const byContainer: AttributeBlock[][] = containers.map(() => []);
  let c = 0;

  for (const block of blocks) {
    let container = containers[c];
    while (container !== undefined && container.bodyEnd < block.span.end) {
      container = containers[++c];
    }

    if (container !== undefined && block.span.start >= container.bodyStart) {
      const tagged = { ...block, structName: container.name };
      owned.push(tagged);
      byContainer[c]?.push(tagged);
    } else {
      owned.push(block);
    }
  }

  return { owned, byContainer };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Build the field registry for one source text.
 *
 * @param blocks - attribute blocks previously extracted from the same source
 */
export function buildFieldRegistry(
  source: string,
  blocks: readonly AttributeBlock[],
  index: LineIndex = new LineIndex(source),
  view: CodeView = prepareCode(source)
): FieldRegistry {
  const containers = findContainers(view);
  const { owned, byContainer } = assignBlocks(blocks, containers);

  const structs = containers.map((container, i) => ({
    name: container.name,
    line: index.lineOf(container.markerOffset),
    endLine: index.lineOf(container.bodyEnd),
    fields: parseFields(source, view, container, byContainer[i] ?? [], index),
  }));

  return { structs, blocks: owned };
}
