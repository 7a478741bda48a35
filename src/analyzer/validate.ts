import type { SyntaxNode, Tree } from '@lezer/common';

/** A syntax problem at a source offset. */
export interface SyntaxIssue {
  from: number;
  message: string;
}

const LITERALS = new Set(['Number', 'String', 'FormatString', 'ContinuedString', 'Boolean', 'None', 'Ellipsis']);
const TARGET_GROUPS = new Set(['TupleExpression', 'ArrayExpression', 'ParenthesizedExpression']);
const COMPREHENSIONS = new Set([
  'ComprehensionExpression',
  'ArrayComprehensionExpression',
  'DictionaryComprehensionExpression',
  'SetComprehensionExpression',
]);
const ARGUMENT_PUNCTUATION = new Set(['(', ')', ',', 'Comment']);
const LEGACY_OCTAL_MESSAGE =
  'leading zeros in decimal integer literals are not permitted; use an 0o prefix for octal integers';

function kids(node: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) out.push(child);
  return out;
}

/** Expression children: keywords, punctuation, operators and comments dropped. */
function operands(nodes: readonly SyntaxNode[]): SyntaxNode[] {
  return nodes.filter((n) => /^[A-Z]/.test(n.name) && n.name !== 'Comment' && !n.name.endsWith('Op'));
}

function issueAt(node: SyntaxNode, message: string): SyntaxIssue {
  return { from: node.from, message };
}

/** How an expression that cannot be a target is named in the message. */
function describe(node: SyntaxNode): string {
  if (LITERALS.has(node.name)) return 'literal';
  if (COMPREHENSIONS.has(node.name)) return 'comprehension';
  switch (node.name) {
    case 'CallExpression':
      return 'function call';
    case 'LambdaExpression':
      return 'lambda';
    case 'ConditionalExpression':
      return 'conditional expression';
    case 'AwaitExpression':
      return 'await expression';
    case 'YieldExpression':
      return 'yield expression';
    case 'DictionaryExpression':
      return 'dict literal';
    case 'SetExpression':
      return 'set display';
    case 'TupleExpression':
      return 'tuple';
    default:
      return 'expression';
  }
}

/** First part of `node` that cannot be stored to, or null. */
function badTarget(node: SyntaxNode): SyntaxNode | null {
  if (node.name === 'VariableName' || node.name === 'MemberExpression') return null;
  if (!TARGET_GROUPS.has(node.name)) return node;
  for (const child of operands(kids(node))) {
    const bad = badTarget(child);
    if (bad) return bad;
  }
  return null;
}

function unwrapParens(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.name === 'ParenthesizedExpression') {
    const inner = operands(kids(current));
    if (inner.length !== 1) break;
    current = inner[0];
  }
  return current;
}

function checkAssign(node: SyntaxNode): SyntaxIssue | null {
  const segments: SyntaxNode[][] = [[]];
  for (const child of kids(node)) {
    if (child.name === 'AssignOp') segments.push([]);
    else segments[segments.length - 1].push(child);
  }
  // the last segment is the value
  segments.pop();
  for (const segment of segments) {
    for (const target of operands(segment)) {
      if (target.name === 'TypeDef') continue;
      const bad = badTarget(target);
      if (bad) return issueAt(bad, `cannot assign to ${describe(bad)}`);
    }
  }
  return null;
}

function checkUpdate(node: SyntaxNode): SyntaxIssue | null {
  const children = kids(node);
  const op = children.findIndex((c) => c.name === 'UpdateOp');
  if (op === -1) return null;
  const before = children.slice(0, op);
  const targets = operands(before);
  if (targets.length !== 1 || before.some((c) => c.name === ',' || c.name === '*')) {
    return issueAt(node, "'tuple' is an illegal expression for augmented assignment");
  }
  const target = unwrapParens(targets[0]);
  if (target.name === 'VariableName' || target.name === 'MemberExpression') return null;
  return issueAt(target, `'${describe(target)}' is an illegal expression for augmented assignment`);
}

function checkDelete(node: SyntaxNode): SyntaxIssue | null {
  for (const target of operands(kids(node))) {
    const bad = badTarget(target);
    if (bad) return issueAt(bad, `cannot delete ${describe(bad)}`);
  }
  return null;
}

/** Targets between each `for` and its `in`, in loops and comprehensions alike. */
function checkLoopTargets(node: SyntaxNode): SyntaxIssue | null {
  let targets: SyntaxNode[] | null = null;
  for (const child of kids(node)) {
    if (child.name === 'for') {
      targets = [];
    } else if (child.name === 'in' && targets) {
      for (const target of operands(targets)) {
        const bad = badTarget(target);
        if (bad) return issueAt(bad, `cannot assign to ${describe(bad)}`);
      }
      targets = null;
    } else if (targets) {
      targets.push(child);
    }
  }
  return null;
}

function checkArguments(node: SyntaxNode, source: string): SyntaxIssue | null {
  const args = kids(node).filter((c) => !ARGUMENT_PUNCTUATION.has(c.name));
  // a generator argument has its own rules
  if (args.some((c) => c.name === 'for')) return null;

  let keyword = false;
  let unpacked = false;
  for (let i = 0; i < args.length; ) {
    const arg = args[i];
    if (arg.name === '**') {
      unpacked = true;
      i += 2;
      continue;
    }
    if (arg.name === '*') {
      if (unpacked) return issueAt(arg, 'iterable argument unpacking follows keyword argument unpacking');
      i += 2;
      continue;
    }
    const op = args[i + 1];
    if (arg.name === 'VariableName' && op && op.name === 'AssignOp' && source.slice(op.from, op.to) === '=') {
      keyword = true;
      i += 3;
      continue;
    }
    if (unpacked) return issueAt(arg, 'positional argument follows keyword argument unpacking');
    if (keyword) return issueAt(arg, 'positional argument follows keyword argument');
    // `name := value` spans three children
    i += arg.name === 'VariableName' && op && op.name === 'AssignOp' ? 3 : 1;
  }
  return null;
}

function checkNumber(node: SyntaxNode, source: string): SyntaxIssue | null {
  const text = source.slice(node.from, node.to);
  if (/^0[0-9_]*$/.test(text) && /[1-9]/.test(text)) return issueAt(node, LEGACY_OCTAL_MESSAGE);
  return null;
}

function checkNode(node: SyntaxNode, source: string): SyntaxIssue | null {
  switch (node.name) {
    case 'PrintStatement':
      return issueAt(node, "Missing parentheses in call to 'print'. Did you mean print(...)?");
    case 'AssignStatement':
      return checkAssign(node);
    case 'UpdateStatement':
      return checkUpdate(node);
    case 'DeleteStatement':
      return checkDelete(node);
    case 'ForStatement':
      return checkLoopTargets(node);
    case 'ArgList':
      return checkArguments(node, source) ?? checkLoopTargets(node);
    case 'Number':
      return checkNumber(node, source);
  }
  if (COMPREHENSIONS.has(node.name)) return checkLoopTargets(node);
  return null;
}

/**
 * Constructs the grammar accepts but the language does not: statement-form
 * print, stores to non-targets, argument order, legacy octal literals.
 * Returns the earliest one.
 */
export function findTreeIssue(tree: Tree, source: string): SyntaxIssue | null {
  const issues: SyntaxIssue[] = [];
  tree.iterate({
    enter(ref) {
      if (ref.type.isError) return false;
      const issue = checkNode(ref.node, source);
      if (issue) issues.push(issue);
      return undefined;
    },
  });
  return issues.reduce<SyntaxIssue | null>((first, issue) => (first && first.from <= issue.from ? first : issue), null);
}
