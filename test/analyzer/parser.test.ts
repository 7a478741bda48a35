import { describe, it, expect } from 'vitest';
import { lineCount } from '../../src/analyzer/lines';
import { parseSource } from '../../src/analyzer/parser';
import type { ParseError } from '../../src/analyzer/types';
import { walk } from '../../src/analyzer/syntax';
import type { PyNode, SyntaxTree } from '../../src/analyzer/syntax';

function parseOk(source: string): SyntaxTree {
  const result = parseSource(source);
  if (!result.ok) throw new Error(`unexpected parse error: ${result.error.message}`);
  return result.tree;
}

function parseFail(source: string): ParseError {
  const result = parseSource(source);
  if (result.ok) throw new Error(`expected a parse error for ${JSON.stringify(source)}`);
  return result.error;
}

function nodesOf(tree: SyntaxTree, kind: PyNode['kind']): PyNode[] {
  const out: PyNode[] = [];
  walk(tree, (node) => {
    if (node.kind === kind) out.push(node);
  });
  return out;
}

describe('parseSource', () => {
  it('accepts valid code', () => {
    const result = parseSource('x = 1\ny = 0\nprint(x / y)\n');
    expect(result.ok).toBe(true);
  });

  it('accepts an empty document', () => {
    expect(parseSource('').ok).toBe(true);
  });

  it('reports a syntax error inside the document', () => {
    const result = parseSource('def f(:\n');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.line).toBe(1);
    expect(result.error.column).toBeGreaterThanOrEqual(1);
    expect(result.error.message.startsWith('invalid syntax')).toBe(true);
  });

  it('keeps error lines within the source', () => {
    const result = parseSource("def foo()\n    print('Hello')");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.line).toBeGreaterThanOrEqual(1);
    expect(result.error.line).toBeLessThanOrEqual(2);
  });

  it.each([
    'def f(:\n',
    "def foo()\n    print('Hello')",
    'x = (\n',
    'if x:\n',
    ')\n',
    "s = '''open\n",
    'print "hi"',
    '\n\n  x\n',
    'total = 1\n\nfor 1 in range(3):\n    pass\n',
  ])('reports a line inside the source for %j', (source) => {
    const { line } = parseFail(source);
    expect(line).toBeGreaterThanOrEqual(1);
    expect(line).toBeLessThanOrEqual(lineCount(source));
  });
});

// ============================================================================
// Invalid code the grammar lets through
// ============================================================================

describe('language checks', () => {
  const PRINT = "Missing parentheses in call to 'print'. Did you mean print(...)?";

  it('rejects a print statement with a string', () => {
    expect(parseFail('print "hi"\n')).toEqual({ line: 1, column: 1, message: PRINT });
  });

  it('rejects a print statement with a name', () => {
    expect(parseFail('print x\n')).toEqual({ line: 1, column: 1, message: PRINT });
  });

  it('rejects an indented line that opens no block', () => {
    expect(parseFail('x = 1\n    y = 2\n')).toEqual({ line: 2, column: 5, message: 'unexpected indent' });
  });

  it('rejects an indented first line', () => {
    expect(parseFail('  x = 1\n')).toEqual({ line: 1, column: 3, message: 'unexpected indent' });
  });

  it('rejects a block mixing tab and space indentation', () => {
    expect(parseFail('if ready:\n\tgo()\n        stop()\n')).toEqual({
      line: 3,
      column: 9,
      message: 'inconsistent use of tabs and spaces in indentation',
    });
  });

  it('rejects a dedent to a level that was never opened', () => {
    expect(parseFail('if ready:\n        go()\n    stop()\n')).toEqual({
      line: 3,
      column: 5,
      message: 'unindent does not match any outer indentation level',
    });
  });

  it('rejects a string that runs to the end of the line', () => {
    expect(parseFail("x = 'abc\n")).toEqual({ line: 1, column: 5, message: 'unterminated string literal' });
  });

  it('rejects assignment to a literal', () => {
    expect(parseFail('1 = x\n')).toEqual({ line: 1, column: 1, message: 'cannot assign to literal' });
  });

  it('rejects assignment to an arithmetic expression', () => {
    expect(parseFail('x + 1 = 2\n')).toEqual({ line: 1, column: 1, message: 'cannot assign to expression' });
  });

  it('rejects assignment to a call', () => {
    expect(parseFail('f() = 1\n')).toEqual({ line: 1, column: 1, message: 'cannot assign to function call' });
  });

  it('rejects a literal loop target', () => {
    expect(parseFail('for 1 in x:\n    pass\n')).toEqual({ line: 1, column: 5, message: 'cannot assign to literal' });
  });

  it('rejects deleting a literal', () => {
    expect(parseFail('del 1\n')).toEqual({ line: 1, column: 5, message: 'cannot delete literal' });
  });

  it('rejects augmented assignment to a tuple', () => {
    expect(parseFail('a, b += 1\n')).toEqual({
      line: 1,
      column: 1,
      message: "'tuple' is an illegal expression for augmented assignment",
    });
  });

  it('rejects a positional argument after a keyword argument', () => {
    expect(parseFail('f(x=1, 2)\n')).toEqual({
      line: 1,
      column: 8,
      message: 'positional argument follows keyword argument',
    });
  });

  it('rejects a legacy octal literal', () => {
    expect(parseFail('x = 08\n')).toEqual({
      line: 1,
      column: 5,
      message: 'leading zeros in decimal integer literals are not permitted; use an 0o prefix for octal integers',
    });
  });

  it.each([
    'f(2, x=1, *rest, **opts)\n',
    'x = 0\ny = 00\nz = 0.5\nw = 0o17\n',
    'a, *b = items\n',
    'obj.attrs[0] += 1\n',
    'for i, (key, value) in enumerate(pairs):\n    pass\n',
    'del cache[key], obj.attr\n',
    'if ready:\n\tgo()\n\tstop()\n',
    'total = (1 +\n        2)\n',
    'value = 1 + \\\n    2\n',
    'text = """it\'s\n"quoted"\n"""\n',
    "x = 1  # it's fine\n",
  ])('accepts %j', (source) => {
    expect(parseSource(source).ok).toBe(true);
  });
});

// ============================================================================
// Grammar limits
// ============================================================================

// Valid code the grammar cannot parse; listed in DESIGN.md.
describe('grammar limits', () => {
  it('rejects a parenthesized yield used as a value', () => {
    expect(parseSource('def g():\n    x = (yield)\n').ok).toBe(false);
  });

  it('rejects parenthesized with items', () => {
    expect(parseSource('with (open(a) as f, open(b) as g):\n    pass\n').ok).toBe(false);
  });
});

describe('tree conversion', () => {
  it('builds function definitions with parameters and defaults', () => {
    const tree = parseOk('def add(item, bucket=[]):\n    return bucket\n');
    const [fn] = tree.body;
    expect(fn.kind).toBe('FunctionDef');
    if (fn.kind !== 'FunctionDef') return;
    expect(fn.name).toBe('add');
    expect(fn.line).toBe(1);
    expect(fn.params.map((p) => p.name)).toEqual(['item', 'bucket']);
    expect(fn.params[0].default).toBeNull();
    expect(fn.params[1].default?.kind).toBe('Collection');
    expect(fn.body.map((s) => s.kind)).toEqual(['Return']);
  });

  it('marks assignment targets as stores and everything else as loads', () => {
    const tree = parseOk('total = price + tax\n');
    const names = nodesOf(tree, 'Name').flatMap((n) => (n.kind === 'Name' ? [`${n.id}:${n.ctx}`] : []));
    expect(names).toEqual(['total:store', 'price:load', 'tax:load']);
  });

  it('records the line of each statement', () => {
    const tree = parseOk('a = 1\n\nb = 2\n');
    expect(tree.body.map((s) => s.line)).toEqual([1, 3]);
  });

  it('splits try statements into body and handlers', () => {
    const tree = parseOk('try:\n    run()\nexcept ValueError:\n    pass\nfinally:\n    done()\n');
    const [stmt] = tree.body;
    expect(stmt.kind).toBe('Try');
    if (stmt.kind !== 'Try') return;
    expect(stmt.body.map((s) => s.kind)).toEqual(['ExprStmt']);
    expect(stmt.handlers).toHaveLength(1);
    expect(stmt.handlers[0].line).toBe(3);
    expect(stmt.handlers[0].type.map((t) => t.kind)).toEqual(['Name']);
    expect(stmt.handlers[0].body.map((s) => s.kind)).toEqual(['Pass']);
    expect(stmt.finalbody.map((s) => s.kind)).toEqual(['ExprStmt']);
  });

  it('keeps unrecognized constructs reachable through Other nodes', () => {
    const tree = parseOk('if ready:\n    launch()\n');
    const calls = nodesOf(tree, 'Call');
    expect(calls).toHaveLength(1);
    expect(calls[0].line).toBe(2);
  });
});
