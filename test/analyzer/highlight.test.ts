import { describe, it, expect } from 'vitest';
import { highlightLines } from '../../src/analyzer/highlight';

function lineText(tokens: { text: string }[]): string {
  return tokens.map((t) => t.text).join('');
}

describe('highlightLines', () => {
  it('produces one entry per source line', () => {
    const lines = highlightLines('x = 1\nprint(x)\n');
    expect(lines).toHaveLength(2);
    expect(lines.map(lineText)).toEqual(['x = 1', 'print(x)']);
  });

  it('keeps blank lines in the middle of the source', () => {
    const lines = highlightLines('a = 1\n\nb = 2');
    expect(lines.map(lineText)).toEqual(['a = 1', '', 'b = 2']);
  });

  it('tags tokens with highlighter classes', () => {
    const [first] = highlightLines('x = 1\n');
    expect(first.find((t) => t.text === '1')?.className).toBe('tok-number');
  });

  it('still highlights code that does not parse', () => {
    const lines = highlightLines('def f(:\n    pass\n');
    expect(lines.map(lineText)).toEqual(['def f(:', '    pass']);
  });
});
