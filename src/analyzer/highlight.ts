import { classHighlighter, highlightCode } from '@lezer/highlight';
import { lineCount } from './lines';
import { parsePython } from './parser';

export interface HighlightToken {
  text: string;
  /** `tok-*` classes from the class highlighter, empty for plain text */
  className: string;
}

/** Tokenize Python source into highlighted lines, one array per source line. */
export function highlightLines(source: string): HighlightToken[][] {
  const lines: HighlightToken[][] = [[]];
  highlightCode(
    source,
    parsePython(source),
    classHighlighter,
    (text, classes) => {
      lines[lines.length - 1].push({ text, className: classes });
    },
    () => {
      lines.push([]);
    },
  );

  while (lines.length > lineCount(source) && lines[lines.length - 1].length === 0) {
    lines.pop();
  }
  return lines;
}
