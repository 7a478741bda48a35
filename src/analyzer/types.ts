export type Severity = 'error' | 'warning' | 'info';

export const RULE_IDS = [
  'UNUSED_VARIABLE',
  'BARE_EXCEPT',
  'SWALLOWED_EXCEPTION',
  'EMPTY_FUNCTION',
  'DEBUG_PRINT',
  'UNUSUAL_LOOP_TARGET',
  'MUTABLE_DEFAULT_ARGUMENT',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export interface Finding {
  ruleId: RuleId;
  severity: Severity;
  title: string;
  /** 1-based line in the submitted source */
  line: number;
  message: string;
  suggestion: string;
}

export interface ParseError {
  line: number;
  column: number;
  message: string;
}

export interface AnalysisResult {
  findings: Finding[];
  parseError: ParseError | null;
}
