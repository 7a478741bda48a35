import type { SyntaxIssue } from './validate';

interface LogicalLine {
  /** Offset of the first character after the indentation */
  start: number;
  /** Indentation width, tabs advancing to the next multiple of 8 */
  width: number;
  /** Indentation width, tabs counting as one column */
  altWidth: number;
  /** Ends with `:` outside brackets, strings and comments */
  opensBlock: boolean;
}

const OPENERS = '([{';
const CLOSERS = ')]}';

function continuationLength(source: string, i: number): number {
  if (source[i] !== '\\') return 0;
  if (source[i + 1] === '\n') return 2;
  if (source[i + 1] === '\r' && source[i + 2] === '\n') return 3;
  return 0;
}

/**
 * Splits the source into logical lines, joining bracketed and backslash
 * continuations. Stops at the first string that never closes.
 */
function scanLines(source: string): { lines: LogicalLine[]; issue: SyntaxIssue | null } {
  const lines: LogicalLine[] = [];
  const n = source.length;
  let current: LogicalLine | null = null;
  let last = '';
  let depth = 0;
  let i = 0;

  while (i < n) {
    if (!current) {
      let width = 0;
      let altWidth = 0;
      for (; i < n; i++) {
        const ch = source[i];
        if (ch === ' ') {
          width++;
          altWidth++;
        } else if (ch === '\t') {
          width += 8 - (width % 8);
          altWidth++;
        } else if (ch === '\f') {
          width = 0;
          altWidth = 0;
        } else {
          break;
        }
      }
      if (i >= n) break;
      const ch = source[i];
      if (ch === '\n') {
        i++;
        continue;
      }
      if (ch === '#' || ch === '\r') {
        const end = source.indexOf('\n', i);
        i = end === -1 ? n : end + 1;
        continue;
      }
      current = { start: i, width, altWidth, opensBlock: false };
      last = '';
      depth = 0;
    }

    const ch = source[i];
    if (ch === '\n') {
      i++;
      if (depth === 0) {
        current.opensBlock = last === ':';
        lines.push(current);
        current = null;
      }
      continue;
    }
    if (ch === '#') {
      const end = source.indexOf('\n', i);
      i = end === -1 ? n : end;
      continue;
    }
    const joined = continuationLength(source, i);
    if (joined > 0) {
      i += joined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const triple = source.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      const open = i;
      let closed = false;
      i += quote.length;
      while (i < n) {
        if (source[i] === '\\') {
          i += continuationLength(source, i) || 2;
          continue;
        }
        if (source.startsWith(quote, i)) {
          i += quote.length;
          closed = true;
          break;
        }
        if (!triple && source[i] === '\n') break;
        i++;
      }
      if (!closed) {
        const message = triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal';
        return { lines, issue: { from: open, message } };
      }
      last = ch;
      continue;
    }

    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth = Math.max(0, depth - 1);
    if (ch !== ' ' && ch !== '\t' && ch !== '\r' && ch !== '\f') last = ch;
    i++;
  }

  if (current) {
    current.opensBlock = depth === 0 && last === ':';
    lines.push(current);
  }
  return { lines, issue: null };
}

function tabIssue(line: LogicalLine): SyntaxIssue {
  return { from: line.start, message: 'inconsistent use of tabs and spaces in indentation' };
}

/** Block structure from indentation, comparing widths under both tab sizes. */
function checkIndentation(lines: readonly LogicalLine[]): SyntaxIssue | null {
  const levels = [{ width: 0, altWidth: 0 }];
  let expectIndent = false;

  for (const line of lines) {
    const top = levels[levels.length - 1];
    if (line.width > top.width) {
      if (!expectIndent) return { from: line.start, message: 'unexpected indent' };
      if (line.altWidth <= top.altWidth) return tabIssue(line);
      levels.push({ width: line.width, altWidth: line.altWidth });
    } else {
      if (expectIndent) return { from: line.start, message: 'expected an indented block' };
      while (levels.length > 1 && line.width < levels[levels.length - 1].width) levels.pop();
      const level = levels[levels.length - 1];
      if (line.width !== level.width) {
        return { from: line.start, message: 'unindent does not match any outer indentation level' };
      }
      if (line.altWidth !== level.altWidth) return tabIssue(line);
    }
    expectIndent = line.opensBlock;
  }
  // a block header at the end of input is left to the grammar
  return null;
}

/** Indentation and string termination problems, whichever comes first. */
export function findLayoutIssue(source: string): SyntaxIssue | null {
  const { lines, issue } = scanLines(source);
  const indentation = checkIndentation(lines);
  if (issue && indentation) return indentation.from < issue.from ? indentation : issue;
  return issue ?? indentation;
}
