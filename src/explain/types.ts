import type { Finding, ParseError } from '../analyzer/types';

/** Findings listed in one explanation request; the rest are only counted. */
export const MAX_REQUEST_FINDINGS = 200;

export interface ExplanationRequest {
  source: string;
  findings: readonly Finding[];
  /** Findings left out of `findings` to keep the request bounded */
  omittedFindings?: number;
  parseError?: ParseError | null;
  /** Error message or traceback pasted by the user */
  errorMessage?: string | null;
}

export type ExplanationResult =
  | { success: true; text: string; modelUsed: string }
  | { success: false; text: ''; modelUsed: string; errorMessage: string };

export function explanationFailure(modelUsed: string, errorMessage: string): ExplanationResult {
  return { success: false, text: '', modelUsed, errorMessage };
}

export interface ExplanationSections {
  explanation: string;
  suggestedFix: string;
  tips: string;
}
