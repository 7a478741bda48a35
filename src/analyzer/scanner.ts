import { ScanRuleError } from '../errors';
import { RULES } from './rules';
import type { Rule } from './rules';
import { walk } from './syntax';
import type { SyntaxTree } from './syntax';
import type { Finding, RuleId } from './types';

export interface ScanOptions {
  rules?: readonly Rule[];
  /** Highest valid line; findings past it are dropped. */
  maxLine?: number;
  onRuleError?: (error: ScanRuleError) => void;
}

function reportRuleError(error: ScanRuleError): void {
  console.warn(error.message);
}

/**
 * Apply every rule to every node in one pre-order walk. A rule that throws is
 * dropped and everything it found is discarded; the other rules carry on.
 */
export function scan(tree: SyntaxTree, options: ScanOptions = {}): Finding[] {
  const rules = options.rules ?? RULES;
  const onRuleError = options.onRuleError ?? reportRuleError;
  const failed = new Set<RuleId>();
  const findings: Finding[] = [];

  walk(tree, (node) => {
    for (const rule of rules) {
      if (failed.has(rule.id)) continue;
      try {
        findings.push(...rule.check(node));
      } catch (err) {
        failed.add(rule.id);
        onRuleError(new ScanRuleError(rule.id, err));
      }
    }
  });

  // Findings are per line: two hits of one rule on a line, `print(print(1))`, report once.
  const seen = new Set<string>();
  return findings.filter((f) => {
    if (failed.has(f.ruleId)) return false;
    if (f.line < 1 || (options.maxLine !== undefined && f.line > options.maxLine)) return false;
    const key = `${f.ruleId}:${f.line}:${f.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
