import type { Finding, Severity } from '../analyzer/types';

export const SEVERITY_COLORS: Record<Severity, string> = {
  error: '#ff4d6a',
  warning: '#ffa726',
  info: '#42a5f5',
};

export const SEVERITY_ICONS: Record<Severity, string> = {
  error: '✘',
  warning: '⚠',
  info: 'ℹ',
};

export const SEVERITY_LABELS: Record<Severity, string> = {
  error: 'Error',
  warning: 'Warning',
  info: 'Info',
};

const RANK: Record<Severity, number> = { error: 0, warning: 1, info: 2 };

export function worstSeverity(findings: readonly Finding[]): Severity {
  let worst: Severity = 'info';
  for (const f of findings) {
    if (RANK[f.severity] < RANK[worst]) worst = f.severity;
  }
  return worst;
}

export function groupByLine(findings: readonly Finding[]): Map<number, Finding[]> {
  const byLine = new Map<number, Finding[]>();
  for (const f of findings) {
    const group = byLine.get(f.line);
    if (group) group.push(f);
    else byLine.set(f.line, [f]);
  }
  return byLine;
}
