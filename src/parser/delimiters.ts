/**
 * Delimiter Scanner
 *
 * Depth counting over Rust source text. Brackets that appear inside string
 * literals, char literals or comments do not count toward nesting, so an
 * attribute such as `seeds = [b"]", user.key().as_ref()]` still balances.
 */

const OPENERS: Record<string, string> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

const CLOSERS = new Set([")", "]", "}"]);

// 'a', '\n', '\x7f', '\u{1F600}' but not the lifetime in `<'info>`
const CHAR_LITERAL = /'(?:\\(?:x[0-9a-fA-F]{2}|u\{[0-9a-fA-F]{1,6}\}|.)|[^\\'\n])'/y;

const RAW_STRING_OPEN = /r(#*)"/y;

function isIdentChar(ch: string): boolean {
  return /\w/.test(ch);
}

/**
 * True when a line or block comment starts at `index`.
 */
export function isCommentStart(source: string, index: number): boolean {
  return source.startsWith("//", index) || source.startsWith("/*", index);
}

/**
 * Skip a comment, string literal or char literal starting at `index`.
 *
 * @returns the offset just past the skipped token, `index` itself when no such
 * token starts there, or -1 when the token is unterminated
 */
export function skipNonCode(source: string, index: number): number {
  if (source.startsWith("//", index)) {
    const newline = source.indexOf("\n", index);
    return newline === -1 ? source.length : newline;
  }

  if (source.startsWith("/*", index)) {
    // Rust block comments nest
    let depth = 0;
    let i = index;
    while (i < source.length) {
      if (source.startsWith("/*", i)) {
        depth++;
        i += 2;
      } else if (source.startsWith("*/", i)) {
        depth--;
        i += 2;
        if (depth === 0) return i;
      } else {
        i++;
      }
    }
    return -1;
  }

  const ch = source.charAt(index);

  if (ch === "r" && (index === 0 || !isIdentChar(source.charAt(index - 1)))) {
    RAW_STRING_OPEN.lastIndex = index;
    const raw = RAW_STRING_OPEN.exec(source);
    if (raw) {
      const terminator = `"${raw[1] ?? ""}`;
      const close = source.indexOf(terminator, index + raw[0].length);
      return close === -1 ? -1 : close + terminator.length;
    }
  }

  if (ch === '"') {
    let i = index + 1;
    while (i < source.length) {
      const current = source.charAt(i);
      if (current === "\\") {
        i += 2;
        continue;
      }
      if (current === '"') return i + 1;
      i++;
    }
    return -1;
  }

  if (ch === "'") {
    CHAR_LITERAL.lastIndex = index;
    const literal = CHAR_LITERAL.exec(source);
    if (literal) return index + literal[0].length;
  }

  return index;
}

/**
 * Find the delimiter that closes the one at `openIndex`.
 *
 * Mixed nesting must be well formed: `( [ ) ]` is treated as unbalanced.
 *
 * @returns offset of the matching closer, or -1 when the text ends (or
 * `limit` is reached) before depth returns to zero
 */
export function findMatchingDelimiter(
  source: string,
  openIndex: number,
  limit: number = source.length
): number {
  if (!(source.charAt(openIndex) in OPENERS)) {
    return -1;
  }

  const expected: string[] = [];
  let i = openIndex;

  while (i < limit) {
    const skipped = skipNonCode(source, i);
    if (skipped === -1) return -1;
    if (skipped !== i) {
      i = skipped;
      continue;
    }

    const ch = source.charAt(i);
    const closer = OPENERS[ch];
    if (closer !== undefined) {
      expected.push(closer);
    } else if (CLOSERS.has(ch)) {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i;
    }
    i++;
  }

  return -1;
}

/**
 * Closer offsets for every opener in a text, computed in one pass.
 *
 * `closerOf` agrees with `findMatchingDelimiter` for any opener that lies in
 * code, without rescanning: a mismatched closer or an unterminated literal
 * leaves every opener still open at that point unmatched.
 *
 * @example
 * ```ts
 * const delimiters = new DelimiterIndex(code);
 * const close = delimiters.closerOf(code.indexOf("{"));
 * ```
 */
export class DelimiterIndex {
  private readonly closers = new Map<number, number>();

  constructor(source: string) {
    const open: Array<{ offset: number; closer: string }> = [];
    let i = 0;

    while (i < source.length) {
      const skipped = skipNonCode(source, i);
      if (skipped === -1) break;
      if (skipped !== i) {
        i = skipped;
        continue;
      }

      const ch = source.charAt(i);
      const closer = OPENERS[ch];
      if (closer !== undefined) {
        open.push({ offset: i, closer });
      } else if (CLOSERS.has(ch)) {
        const top = open.pop();
        if (top !== undefined && top.closer === ch) {
          this.closers.set(top.offset, i);
        } else {
          open.length = 0;
        }
      }
      i++;
    }
  }

  /**
   * @returns offset of the closer, or -1 when the opener is unmatched or its
   * closer lies at or beyond `limit`
   */
  closerOf(openIndex: number, limit?: number): number {
    const close = this.closers.get(openIndex);
    if (close === undefined) return -1;
    return limit !== undefined && close >= limit ? -1 : close;
  }
}

/**
 * Net nesting depth of `text`: openers minus closers, ignoring non-code.
 * A balanced span yields 0.
 */
export function delimiterBalance(text: string): number {
  let depth = 0;
  let i = 0;

  while (i < text.length) {
    const skipped = skipNonCode(text, i);
    if (skipped === -1) break;
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const ch = text.charAt(i);
    if (ch in OPENERS) depth++;
    else if (CLOSERS.has(ch)) depth--;
    i++;
  }

  return depth;
}

/**
 * Blank out comments while keeping every offset and newline in place, so
 * positions found in the result map one-to-one onto the original text.
 */
export function stripComments(text: string): string {
  let out = "";
  let i = 0;

  while (i < text.length) {
    const next = skipNonCode(text, i);
    if (next === i) {
      out += text.charAt(i);
      i++;
      continue;
    }

    const end = next === -1 ? text.length : next;
    const segment = text.slice(i, end);
    out += isCommentStart(text, i) ? segment.replace(/[^\n]/g, " ") : segment;
    i = end;
  }

  return out;
}

/**
 * Comment-free text of a source together with its delimiter table.
 */
export interface CodeView {
  readonly code: string;
  readonly delimiters: DelimiterIndex;
}

export function prepareCode(source: string): CodeView {
  const code = stripComments(source);
  return { code, delimiters: new DelimiterIndex(code) };
}
