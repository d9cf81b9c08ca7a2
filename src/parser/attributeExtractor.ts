/**
 * Attribute Block Extractor
 *
 * Locates every `#[account(...)]` annotation and returns its full text, however
 * many lines it spans. Each marker's closing bracket comes from the delimiter
 * table of the whole text; a block whose text ends first is dropped and
 * scanning resumes after its marker.
 */

import type { AttributeBlock } from "../types/index.js";
import { prepareCode, type CodeView } from "./delimiters.js";
import { LineIndex } from "./lineIndex.js";

// `#[account]` on its own marks a data account, not a field constraint
const ACCOUNT_MARKER = /#\s*\[\s*account\s*\(/g;

/**
 * Extract all account attribute blocks from a source text, in source order.
 *
 * Markers inside comments are ignored.
 *
 * @example
 * ```ts
 * const blocks = extractAttributeBlocks(source);
 * for (const block of blocks) {
 *   console.log(block.line, block.text.includes("init_if_needed"));
 * }
 * ```
 */
export function extractAttributeBlocks(
  source: string,
  index: LineIndex = new LineIndex(source),
  { code, delimiters }: CodeView = prepareCode(source)
): AttributeBlock[] {
  const blocks: AttributeBlock[] = [];
  const marker = new RegExp(ACCOUNT_MARKER.source, "g");

  let match: RegExpExecArray | null;
  while ((match = marker.exec(code)) !== null) {
    const start = match.index;
    const bracket = code.indexOf("[", start);
    const paren = start + match[0].length - 1;

    const closeBracket = delimiters.closerOf(bracket);
    if (closeBracket === -1) continue;

    const closeParen = delimiters.closerOf(paren, closeBracket);
    if (closeParen === -1) continue;

    const end = closeBracket + 1;
    blocks.push({
      name: "account",
      text: source.slice(paren + 1, closeParen),
      raw: source.slice(start, end),
      line: index.lineOf(start),
      endLine: index.lineOf(closeBracket),
      span: { start, end },
      textOffset: paren + 1,
      structName: null,
    });

    marker.lastIndex = end;
  }

  return blocks;
}
