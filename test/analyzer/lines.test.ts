import { describe, it, expect } from 'vitest';
import { LineIndex, clampLine, lineCount, lineStarts } from '../../src/analyzer/lines';

describe('lineCount', () => {
  it('counts an empty document as one line', () => {
    expect(lineCount('')).toBe(1);
  });

  it('does not count a trailing newline as a line', () => {
    expect(lineCount('a\nb')).toBe(2);
    expect(lineCount('a\nb\n')).toBe(2);
    expect(lineCount('a\nb\n\n')).toBe(3);
  });
});

describe('lineStarts', () => {
  it('lists the offset of every line start', () => {
    expect(lineStarts('ab\ncd\n')).toEqual([0, 3, 6]);
  });
});

describe('clampLine', () => {
  it('keeps lines within the document', () => {
    expect(clampLine(0, 'a\nb')).toBe(1);
    expect(clampLine(2, 'a\nb')).toBe(2);
    expect(clampLine(9, 'a\nb\n')).toBe(2);
  });
});

describe('LineIndex', () => {
  const index = new LineIndex('def f(:\n    pass\n');

  it('maps offsets to 1-based lines and columns', () => {
    expect(index.lineAt(0)).toBe(1);
    expect(index.lineAt(8)).toBe(2);
    expect(index.columnAt(6)).toBe(7);
    expect(index.columnAt(12)).toBe(5);
  });

  it('clamps offsets past the final newline to the last line', () => {
    expect(index.lineAt(17)).toBe(3);
    expect(index.clampedLineAt(17)).toBe(2);
    expect(index.locate(17)).toEqual({ line: 2, column: 9 });
  });

  it('locates ordinary offsets without clamping', () => {
    expect(index.locate(6)).toEqual({ line: 1, column: 7 });
  });
});
