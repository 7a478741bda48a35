/**
 * Number of lines in `text`. A trailing newline does not open a new line,
 * and an empty document still has one (empty) line.
 */
export function lineCount(text: string): number {
  const lines = text.split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines.length;
}

/** Offsets at which each line starts. */
export function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

export function clampLine(line: number, text: string): number {
  return Math.min(Math.max(1, line), lineCount(text));
}

/** Maps character offsets to 1-based line/column pairs. */
export class LineIndex {
  private readonly starts: number[];

  constructor(private readonly text: string) {
    this.starts = lineStarts(text);
  }

  lineAt(pos: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= pos) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  columnAt(pos: number): number {
    return pos - this.starts[this.lineAt(pos) - 1] + 1;
  }

  /** Same as `lineAt`, but never past the last line of the text. */
  clampedLineAt(pos: number): number {
    return clampLine(this.lineAt(pos), this.text);
  }

  /**
   * Line/column of `pos`. Offsets past the last line (the end of a text with
   * a trailing newline) land just after the last character of the last line.
   */
  locate(pos: number): { line: number; column: number } {
    const line = this.clampedLineAt(pos);
    if (line === this.lineAt(pos)) return { line, column: this.columnAt(pos) };
    const start = this.starts[line - 1];
    const end = this.text.indexOf('\n', start);
    return { line, column: (end === -1 ? this.text.length : end) - start + 1 };
  }
}
