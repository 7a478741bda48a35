import type { AnalysisResult, Finding, ParseError } from '../analyzer/types';
import { codeFence, formatParseError, parseExplanation } from '../explain/prompt';
import type { ExplanationResult } from '../explain/types';

export interface Report {
  readonly sourceText: string;
  readonly errorMessage: string | null;
  readonly findings: readonly Finding[];
  readonly parseError: ParseError | null;
  readonly explanation: ExplanationResult;
  /** ISO-8601 */
  readonly timestamp: string;
}

export interface ReportInput {
  source: string;
  errorMessage?: string | null;
  analysis: AnalysisResult;
  explanation: ExplanationResult;
}

export const HISTORY_LIMIT = 50;

export function assembleReport(input: ReportInput, now: Date = new Date()): Report {
  const errorMessage = input.errorMessage?.trim() ? input.errorMessage : null;
  return Object.freeze({
    sourceText: input.source,
    errorMessage,
    findings: Object.freeze(input.analysis.findings.map((f) => Object.freeze({ ...f }))),
    parseError: input.analysis.parseError ? Object.freeze({ ...input.analysis.parseError }) : null,
    explanation: Object.freeze({ ...input.explanation }),
    timestamp: now.toISOString(),
  });
}

/** `2026-10-19T08:05:09.000Z` -> `2026-10-19 08:05:09 UTC` */
function formatTimestamp(iso: string): string {
  return `${iso.slice(0, 19).replace('T', ' ')} UTC`;
}

export function renderMarkdown(report: Report): string {
  const fence = codeFence(report.sourceText);
  const lines: string[] = [
    '# AI Code Debugging Report',
    '',
    `**Date:** ${formatTimestamp(report.timestamp)}`,
    '',
    '---',
    '',
    '## Submitted Code',
    `${fence}python`,
    report.sourceText.replace(/\n$/, ''),
    fence,
    '',
    '## Error Message',
    report.errorMessage ?? 'N/A',
    '',
    '---',
    '',
    '## Static Analysis',
  ];

  if (report.parseError) {
    lines.push(`- Syntax error: ${formatParseError(report.parseError)}`);
  } else if (report.findings.length === 0) {
    lines.push('- No obvious issues found via static analysis');
  } else {
    report.findings.forEach((f, i) => {
      lines.push(`${i + 1}. **Line ${f.line}** \`${f.ruleId}\`: ${f.message}`);
    });
  }

  lines.push('', '---', '', '## AI Explanation');
  if (report.explanation.success) {
    lines.push(report.explanation.text.trim(), '', `_Model: ${report.explanation.modelUsed}_`);
  } else {
    lines.push(`_Explanation unavailable: ${report.explanation.errorMessage}_`);
  }

  return lines.join('\n') + '\n';
}

export function reportFileName(report: Report): string {
  const stamp = report.timestamp.slice(0, 19).replace(/[-:]/g, '').replace('T', '-');
  return `debug-report-${stamp}.md`;
}

/** New history with `report` appended, oldest entries dropped past `limit`. */
export function appendToHistory(
  history: readonly Report[],
  report: Report,
  limit: number = HISTORY_LIMIT,
): readonly Report[] {
  const next = [...history, report];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

/** One-line summary for the history list. */
export function summarizeReport(report: Report): string {
  if (report.explanation.success) {
    const { explanation } = parseExplanation(report.explanation.text);
    const summary = explanation.slice(0, 60).replace(/\s*\n\s*/g, ' ').trim();
    if (summary) return summary;
  }
  if (report.parseError) return `Syntax error on line ${report.parseError.line}`;
  const count = report.findings.length;
  return `${count} ${count === 1 ? 'finding' : 'findings'}`;
}
