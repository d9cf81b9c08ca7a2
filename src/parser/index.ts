/**
 * Source parser facade: one pass per file producing the read-only context
 * every detector receives.
 */

import type { AttributeBlock, SourceFile, StructRecord } from "../types/index.js";
import { extractAttributeBlocks } from "./attributeExtractor.js";
import { prepareCode } from "./delimiters.js";
import { buildFieldRegistry } from "./fieldRegistry.js";
import { LineIndex } from "./lineIndex.js";

export interface ScanContext {
  readonly file: SourceFile;
  readonly index: LineIndex;
  /** Same lines with comments blanked out */
  readonly codeIndex: LineIndex;
  readonly blocks: readonly AttributeBlock[];
  readonly structs: readonly StructRecord[];
}

export function parseSource(file: SourceFile): ScanContext {
  const index = new LineIndex(file.content);
  const view = prepareCode(file.content);
  const extracted = extractAttributeBlocks(file.content, index, view);
  const { structs, blocks } = buildFieldRegistry(file.content, extracted, index, view);

  return Object.freeze({
    file,
    index,
    codeIndex: new LineIndex(view.code),
    blocks: Object.freeze(blocks),
    structs: Object.freeze(structs),
  });
}

export { extractAttributeBlocks } from "./attributeExtractor.js";
export { buildFieldRegistry, type FieldRegistry } from "./fieldRegistry.js";
export { LineIndex } from "./lineIndex.js";
export {
  DelimiterIndex,
  delimiterBalance,
  findMatchingDelimiter,
  prepareCode,
  stripComments,
  type CodeView,
} from "./delimiters.js";
export {
  elementType,
  isSignerType,
  parseTypeSignature,
  rawHandleKind,
  unwrapType,
  type RawHandleKind,
} from "./typeSignature.js";
