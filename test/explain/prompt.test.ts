import { describe, it, expect } from 'vitest';
import type { Finding } from '../../src/analyzer/types';
import { buildPrompt, codeFence, formatFindingsList, parseExplanation } from '../../src/explain/prompt';

const FINDING: Finding = {
  ruleId: 'DEBUG_PRINT',
  severity: 'info',
  title: 'print() call',
  line: 2,
  message: 'Potential debug print statement.',
  suggestion: 'Remove it.',
};

describe('codeFence', () => {
  it('uses three backticks for ordinary code', () => {
    expect(codeFence('x = 1')).toBe('```');
  });

  it('outgrows backtick runs inside the code', () => {
    expect(codeFence('doc = """```python"""')).toBe('````');
  });
});

describe('formatFindingsList', () => {
  it('says None when there are no findings', () => {
    expect(formatFindingsList([])).toBe('None');
  });

  it('numbers findings with their line and rule', () => {
    expect(formatFindingsList([FINDING, { ...FINDING, line: 5 }])).toBe(
      '1. Line 2 [DEBUG_PRINT] Potential debug print statement.\n' +
        '2. Line 5 [DEBUG_PRINT] Potential debug print statement.',
    );
  });

  it('counts the findings left out of the list', () => {
    expect(formatFindingsList([FINDING], 1000)).toBe(
      '1. Line 2 [DEBUG_PRINT] Potential debug print statement.\n...and 1000 more',
    );
  });
});

describe('buildPrompt', () => {
  it('embeds the code, findings and placeholders for missing context', () => {
    const prompt = buildPrompt({ source: 'x = 1\nprint(x)', findings: [FINDING] });
    expect(prompt).toContain('Code:\n```python\nx = 1\nprint(x)\n```\n');
    expect(prompt).toContain('Static analysis findings:\n1. Line 2 [DEBUG_PRINT] Potential debug print statement.\n');
    expect(prompt).toContain('Syntax error:\nNone\n');
    expect(prompt).toContain('Error message:\nN/A\n');
    expect(prompt).toContain('### Suggested Fix');
  });

  it('includes the syntax error and the pasted error message', () => {
    const prompt = buildPrompt({
      source: 'def f(:',
      findings: [],
      parseError: { line: 1, column: 7, message: 'invalid syntax near ":"' },
      errorMessage: '  SyntaxError: invalid syntax\n',
    });
    expect(prompt).toContain('Static analysis findings:\nNone\n');
    expect(prompt).toContain('Syntax error:\nLine 1, column 7: invalid syntax near ":"\n');
    expect(prompt).toContain('Error message:\nSyntaxError: invalid syntax\n');
  });
});

describe('parseExplanation', () => {
  it('splits a well-formed response into sections', () => {
    const text = [
      '### Explanation',
      'The divisor is zero.',
      '',
      '### Suggested Fix',
      '```python',
      'y = 1',
      'print(x / y)',
      '```',
      '',
      '### Tips',
      'Check inputs.',
    ].join('\n');

    expect(parseExplanation(text)).toEqual({
      explanation: 'The divisor is zero.',
      suggestedFix: 'y = 1\nprint(x / y)',
      tips: 'Check inputs.',
    });
  });

  it('matches headings case-insensitively', () => {
    expect(parseExplanation('### EXPLANATION\nShort.\n').explanation).toBe('Short.');
  });

  it('keeps an unstructured response as the explanation', () => {
    expect(parseExplanation('  Just text.\n')).toEqual({ explanation: 'Just text.', suggestedFix: '', tips: '' });
  });
});
