import { analyzeSource } from './analyzer';
import type { ScanOptions } from './analyzer/scanner';
import { MAX_REQUEST_FINDINGS, explanationFailure } from './explain/types';
import type { ExplanationRequest, ExplanationResult } from './explain/types';
import { assembleReport } from './report/report';
import type { Report } from './report/report';

export type Explainer = (request: ExplanationRequest, signal?: AbortSignal) => Promise<ExplanationResult>;

export interface AnalysisInput {
  source: string;
  errorMessage?: string | null;
}

export interface RunOptions {
  signal?: AbortSignal;
  now?: () => Date;
  onRuleError?: ScanOptions['onRuleError'];
}

/**
 * One analysis request: parse and scan locally, ask for an explanation, then
 * assemble the report. The report is only built once the explanation (or its
 * failure) is in.
 */
export async function runAnalysis(
  input: AnalysisInput,
  explain: Explainer,
  options: RunOptions = {},
): Promise<Report> {
  const analysis = analyzeSource(input.source, { onRuleError: options.onRuleError });
  const listed = analysis.findings.slice(0, MAX_REQUEST_FINDINGS);

  let explanation: ExplanationResult;
  try {
    explanation = await explain(
      {
        source: input.source,
        findings: listed,
        omittedFindings: analysis.findings.length - listed.length,
        parseError: analysis.parseError,
        errorMessage: input.errorMessage,
      },
      options.signal,
    );
  } catch (err) {
    explanation = explanationFailure(
      'unknown',
      `Failed to query the explanation service: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return assembleReport(
    { source: input.source, errorMessage: input.errorMessage, analysis, explanation },
    options.now ? options.now() : new Date(),
  );
}
