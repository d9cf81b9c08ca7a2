/**
 * Offset to line mapping for a single source text.
 */
export class LineIndex {
  readonly lines: readonly string[];
  private readonly lineStarts: number[];

  constructor(source: string) {
    const starts = [0];
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        starts.push(i + 1);
      }
    }
    this.lineStarts = starts;
    this.lines = source.split("\n").map((line) => line.replace(/\r$/, ""));
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * 1-based line containing `offset`.
   */
  lineOf(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;

    while (low < high) {
      const mid = (low + high + 1) >> 1;
      const start = this.lineStarts[mid] ?? 0;
      if (start <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low + 1;
  }

  lineText(line: number): string {
    return this.lines[line - 1] ?? "";
  }

  /**
   * Lines `line - radius` through `line + radius`, clipped to the file and to
   * the optional inclusive `bounds`.
   */
  window(line: number, radius: number, bounds?: { first: number; last: number }): string {
    const first = Math.max(1, line - radius, bounds?.first ?? 1);
    const last = Math.min(this.lineCount, line + radius, bounds?.last ?? this.lineCount);
    return this.lines.slice(first - 1, last).join("\n");
  }

  /**
   * Numbered excerpt around `line` with the line itself marked `>>>`.
   */
  snippet(line: number, context = 3): string {
    const first = Math.max(1, line - context);
    const last = Math.min(this.lineCount, line + context);
    const out: string[] = [];

    for (let n = first; n <= last; n++) {
      const prefix = n === line ? ">>> " : "    ";
      out.push(`${prefix}${String(n).padStart(4)} | ${this.lineText(n)}`);
    }

    return out.join("\n");
  }
}
