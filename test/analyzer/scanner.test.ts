import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseSource } from '../../src/analyzer/parser';
import { RULES } from '../../src/analyzer/rules';
import type { Rule } from '../../src/analyzer/rules';
import { scan } from '../../src/analyzer/scanner';
import type { SyntaxTree } from '../../src/analyzer/syntax';
import type { Finding, RuleId } from '../../src/analyzer/types';
import { ScanRuleError } from '../../src/errors';

// ============================================================================
// Helpers
// ============================================================================

function treeOf(source: string): SyntaxTree {
  const result = parseSource(source);
  if (!result.ok) throw new Error(`unexpected parse error: ${result.error.message}`);
  return result.tree;
}

function stubFinding(ruleId: RuleId, line: number, message = 'stub'): Finding {
  return { ruleId, severity: 'info', title: 'Stub', line, message, suggestion: 'none' };
}

function rule(id: RuleId): Rule {
  const found = RULES.find((r) => r.id === id);
  if (!found) throw new Error(`no rule ${id}`);
  return found;
}

const SOURCE = "def test():\n    print('debug')\n    return 42\n";

// ============================================================================
// Tests
// ============================================================================

describe('scan', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the same findings on every run', () => {
    const tree = treeOf("def f(a=[]):\n    x = 1\n    print(a)\n");
    const first = scan(tree);
    expect(first.length).toBeGreaterThan(0);
    expect(scan(tree)).toEqual(first);
  });

  it('keeps other rules running when one throws', () => {
    const onRuleError = vi.fn();
    const broken: Rule = {
      id: 'BARE_EXCEPT',
      check: () => {
        throw new Error('boom');
      },
    };

    const findings = scan(treeOf(SOURCE), { rules: [broken, rule('DEBUG_PRINT')], onRuleError });

    expect(findings.map((f) => [f.ruleId, f.line])).toEqual([['DEBUG_PRINT', 2]]);
    expect(onRuleError).toHaveBeenCalledTimes(1);
    const error: unknown = onRuleError.mock.calls[0][0];
    expect(error).toBeInstanceOf(ScanRuleError);
    if (!(error instanceof ScanRuleError)) return;
    expect(error.ruleId).toBe('BARE_EXCEPT');
    expect(error.message).toBe('Rule BARE_EXCEPT failed: boom');
  });

  it('discards findings from a rule that fails later in the walk', () => {
    const flaky: Rule = {
      id: 'EMPTY_FUNCTION',
      check: (node) => {
        if (node.kind === 'Module') return [stubFinding('EMPTY_FUNCTION', 1)];
        if (node.kind === 'Call') throw new Error('late failure');
        return [];
      },
    };

    const findings = scan(treeOf(SOURCE), { rules: [flaky], onRuleError: () => {} });
    expect(findings).toEqual([]);
  });

  it('logs rule failures by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken: Rule = {
      id: 'DEBUG_PRINT',
      check: () => {
        throw new Error('boom');
      },
    };

    scan(treeOf(SOURCE), { rules: [broken] });
    expect(warn).toHaveBeenCalledWith('Rule DEBUG_PRINT failed: boom');
  });

  it('drops findings outside the source lines', () => {
    const wild: Rule = {
      id: 'DEBUG_PRINT',
      check: (node) =>
        node.kind === 'Module' ? [stubFinding('DEBUG_PRINT', 0), stubFinding('DEBUG_PRINT', 3), stubFinding('DEBUG_PRINT', 4)] : [],
    };

    const findings = scan(treeOf(SOURCE), { rules: [wild], maxLine: 3 });
    expect(findings.map((f) => f.line)).toEqual([3]);
  });

  it('reports a repeated finding once', () => {
    const noisy: Rule = { id: 'DEBUG_PRINT', check: () => [stubFinding('DEBUG_PRINT', 1)] };
    expect(scan(treeOf(SOURCE), { rules: [noisy] })).toEqual([stubFinding('DEBUG_PRINT', 1)]);
  });
});
