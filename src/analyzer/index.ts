import { lineCount } from './lines';
import { parseSource } from './parser';
import { scan } from './scanner';
import type { ScanOptions } from './scanner';
import type { AnalysisResult } from './types';

/**
 * Parse and scan Python source. A syntax error stops the pipeline before
 * scanning: there is no tree to walk.
 */
export function analyzeSource(source: string, options: Omit<ScanOptions, 'maxLine'> = {}): AnalysisResult {
  if (!source.trim()) {
    return { findings: [], parseError: null };
  }

  const parsed = parseSource(source);
  if (!parsed.ok) {
    return { findings: [], parseError: parsed.error };
  }

  const findings = scan(parsed.tree, { ...options, maxLine: lineCount(source) });
  return { findings, parseError: null };
}
