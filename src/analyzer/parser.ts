import { parser as pythonParser } from '@lezer/python';
import type { SyntaxNode, Tree } from '@lezer/common';
import { findLayoutIssue } from './layout';
import { LineIndex } from './lines';
import { findTreeIssue } from './validate';
import type { SyntaxIssue } from './validate';
import type { ParseError } from './types';
import type {
  ExceptHandlerNode,
  ModuleNode,
  NameNode,
  Param,
  PyNode,
  SyntaxTree,
} from './syntax';

export type ParseResult =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; error: ParseError };

/** Parse with the Python grammar; error recovery inserts error nodes instead of throwing. */
export function parsePython(source: string): Tree {
  return pythonParser.parse(source);
}

export function parseSource(source: string): ParseResult {
  const tree = parsePython(source);
  const lines = new LineIndex(source);

  // On the same line, the more specific message wins.
  const issues: SyntaxIssue[] = [];
  const layout = findLayoutIssue(source);
  if (layout) issues.push(layout);
  const invalid = findTreeIssue(tree, source);
  if (invalid) issues.push(invalid);
  const broken = firstErrorNode(tree);
  if (broken) issues.push({ from: broken.from, message: describeError(source, broken.from, broken.to) });

  let error: ParseError | null = null;
  for (const issue of issues) {
    const { line, column } = lines.locate(issue.from);
    if (!error || line < error.line) error = { line, column, message: issue.message };
  }
  if (error) return { ok: false, error };

  return { ok: true, tree: new TreeConverter(source, lines).module(tree.topNode) };
}

function firstErrorNode(tree: Tree): { from: number; to: number } | null {
  let found: { from: number; to: number } | null = null;
  tree.iterate({
    enter(node) {
      if (found) return false;
      if (node.type.isError) {
        found = { from: node.from, to: node.to };
        return false;
      }
      return undefined;
    },
  });
  return found;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function describeError(source: string, from: number, to: number): string {
  // Skipped input is wrapped by the error node; an inserted token leaves it empty.
  let near = source.slice(from, to).split('\n')[0].trim();
  if (!near) {
    const next = /\S+/.exec(source.slice(from));
    near = next ? next[0] : '';
  }
  if (!near) return 'invalid syntax: unexpected end of input';
  return `invalid syntax near "${truncate(near, 20)}"`;
}

// ---------------------------------------------------------------------------
// Concrete tree -> PyNode
// ---------------------------------------------------------------------------

const ASSIGN_OPS = new Set(['AssignOp', '=']);
const TARGET_GROUPS = new Set(['TupleExpression', 'ArrayExpression', 'ParenthesizedExpression']);
const FSTRING_PREFIX = /^(?:[rRbB]?[fF]|[fF][rR])["']/;
const FSTRING_FIELD = /(?<!\{)\{\s*([A-Za-z_][A-Za-z0-9_]*)/g;

function kids(node: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) out.push(child);
  return out;
}

/** Grammar nodes are capitalized; keywords and punctuation are not. */
function isSyntaxNode(node: SyntaxNode): boolean {
  return /^[A-Z]/.test(node.name) && node.name !== 'Comment' && !node.name.endsWith('Op');
}

class TreeConverter {
  constructor(
    private readonly source: string,
    private readonly lines: LineIndex,
  ) {}

  module(top: SyntaxNode): ModuleNode {
    return { kind: 'Module', line: 1, body: this.convertAll(kids(top)) };
  }

  private text(node: SyntaxNode): string {
    return this.source.slice(node.from, node.to);
  }

  private line(node: SyntaxNode): number {
    return this.lines.clampedLineAt(node.from);
  }

  private convertAll(nodes: SyntaxNode[]): PyNode[] {
    const out: PyNode[] = [];
    for (const node of nodes) {
      if (node.name === 'Body') {
        out.push(...this.body(node));
        continue;
      }
      const converted = this.convert(node);
      if (converted) out.push(converted);
    }
    return out;
  }

  private body(node: SyntaxNode): PyNode[] {
    return this.convertAll(kids(node));
  }

  private name(node: SyntaxNode, ctx: NameNode['ctx']): NameNode {
    return { kind: 'Name', line: this.line(node), id: this.text(node), ctx };
  }

  convert(node: SyntaxNode): PyNode | null {
    if (!isSyntaxNode(node)) return null;
    const line = this.line(node);

    switch (node.name) {
      case 'FunctionDefinition':
        return this.functionDef(node);
      case 'LambdaExpression': {
        const children = kids(node);
        const paramList = children.find((c) => c.name === 'ParamList');
        return {
          kind: 'Lambda',
          line,
          params: paramList ? this.params(paramList) : [],
          body: this.convertAll(children.filter((c) => c !== paramList)),
        };
      }
      case 'ClassDefinition': {
        const children = kids(node);
        const nameNode = children.find((c) => c.name === 'VariableName');
        const argList = children.find((c) => c.name === 'ArgList');
        const body = children.find((c) => c.name === 'Body');
        return {
          kind: 'ClassDef',
          line,
          name: nameNode ? this.text(nameNode) : '',
          bases: argList ? this.callArgs(argList) : [],
          body: body ? this.body(body) : [],
        };
      }
      case 'AssignStatement':
        return this.assign(node);
      case 'UpdateStatement': {
        const children = kids(node);
        const op = children.findIndex((c) => c.name === 'UpdateOp');
        if (op === -1) break;
        return {
          kind: 'AugAssign',
          line,
          target: this.convertAll(children.slice(0, op)),
          value: this.convertAll(children.slice(op + 1)),
        };
      }
      case 'ForStatement':
        return this.forStatement(node);
      case 'TryStatement':
        return this.tryStatement(node);
      case 'ScopeStatement':
        return {
          kind: 'Global',
          line,
          names: kids(node)
            .filter((c) => c.name === 'VariableName')
            .map((c) => this.text(c)),
        };
      case 'ReturnStatement':
        return { kind: 'Return', line, value: this.convertAll(kids(node)) };
      case 'PassStatement':
        return { kind: 'Pass', line };
      case 'ExpressionStatement':
        return { kind: 'ExprStmt', line, value: this.convertAll(kids(node)) };
      case 'CallExpression': {
        const children = kids(node).filter(isSyntaxNode);
        const argList = children.find((c) => c.name === 'ArgList');
        const callee = children.find((c) => c !== argList);
        const func = callee ? this.convert(callee) : null;
        if (!func) break;
        return { kind: 'Call', line, func, args: argList ? this.callArgs(argList) : [] };
      }
      case 'VariableName':
        return this.name(node, 'load');
      case 'MemberExpression':
        return { kind: 'Member', line, children: this.convertAll(kids(node)) };
      case 'TupleExpression':
        return { kind: 'Tuple', line, elts: this.convertAll(kids(node)) };
      case 'ArrayExpression':
        return { kind: 'Collection', line, type: 'list', elts: this.convertAll(kids(node)) };
      case 'DictionaryExpression':
        return { kind: 'Collection', line, type: 'dict', elts: this.convertAll(kids(node)) };
      case 'SetExpression':
        return { kind: 'Collection', line, type: 'set', elts: this.convertAll(kids(node)) };
      case 'String':
      case 'FormatString':
        return { kind: 'Constant', line, type: 'string', refs: this.stringRefs(node) };
      case 'Number':
        return { kind: 'Constant', line, type: 'number', refs: [] };
      case 'Ellipsis':
        return { kind: 'Constant', line, type: 'ellipsis', refs: [] };
      case 'None':
        return { kind: 'Constant', line, type: 'none', refs: [] };
      case 'Boolean':
        return { kind: 'Constant', line, type: 'bool', refs: [] };
      case 'PropertyName':
        return null;
    }

    return { kind: 'Other', line, label: node.name, children: this.convertAll(kids(node)) };
  }

  private functionDef(node: SyntaxNode): PyNode {
    const children = kids(node);
    const nameNode = children.find((c) => c.name === 'VariableName');
    const paramList = children.find((c) => c.name === 'ParamList');
    const body = children.find((c) => c.name === 'Body');
    return {
      kind: 'FunctionDef',
      line: this.line(node),
      name: nameNode ? this.text(nameNode) : '',
      params: paramList ? this.params(paramList) : [],
      body: body ? this.body(body) : [],
    };
  }

  private params(node: SyntaxNode): Param[] {
    const params: Param[] = [];
    let expectDefault = false;
    for (const child of kids(node)) {
      if (ASSIGN_OPS.has(child.name)) {
        expectDefault = true;
      } else if (expectDefault && isSyntaxNode(child)) {
        const last = params[params.length - 1];
        if (last) last.default = this.convert(child);
        expectDefault = false;
      } else if (child.name === 'VariableName') {
        params.push({ name: this.text(child), line: this.line(child), default: null });
      }
    }
    return params;
  }

  /** Call arguments; keyword argument names are not reads. */
  private callArgs(node: SyntaxNode): PyNode[] {
    const children = kids(node);
    const out: PyNode[] = [];
    children.forEach((child, i) => {
      const next = children[i + 1];
      if (child.name === 'VariableName' && next && ASSIGN_OPS.has(next.name)) return;
      const converted = this.convert(child);
      if (converted) out.push(converted);
    });
    return out;
  }

  private target(node: SyntaxNode): PyNode | null {
    if (node.name === 'VariableName') return this.name(node, 'store');
    if (TARGET_GROUPS.has(node.name)) {
      const elts: PyNode[] = [];
      for (const child of kids(node)) {
        const converted = this.target(child);
        if (converted) elts.push(converted);
      }
      return { kind: 'Tuple', line: this.line(node), elts };
    }
    return this.convert(node);
  }

  private targets(nodes: SyntaxNode[]): PyNode[] {
    const out: PyNode[] = [];
    for (const node of nodes) {
      if (node.name === 'TypeDef') continue;
      const converted = this.target(node);
      if (converted) out.push(converted);
    }
    return out;
  }

  private assign(node: SyntaxNode): PyNode {
    const segments: SyntaxNode[][] = [[]];
    for (const child of kids(node)) {
      if (ASSIGN_OPS.has(child.name)) segments.push([]);
      else segments[segments.length - 1].push(child);
    }
    const line = this.line(node);
    if (segments.length < 2) {
      // bare annotation, `x: int`
      return { kind: 'Other', line, label: node.name, children: this.convertAll(kids(node)) };
    }
    const value = segments.pop() ?? [];
    return {
      kind: 'Assign',
      line,
      targets: segments.map((segment) => this.targets(segment)),
      value: this.convertAll(value),
    };
  }

  private forStatement(node: SyntaxNode): PyNode {
    const target: SyntaxNode[] = [];
    const iter: SyntaxNode[] = [];
    let body: PyNode[] = [];
    let orelse: PyNode[] = [];
    let state: 'start' | 'target' | 'iter' | 'else' = 'start';

    for (const child of kids(node)) {
      if (child.name === 'for') state = 'target';
      else if (child.name === 'in' && state === 'target') state = 'iter';
      else if (child.name === 'else') state = 'else';
      else if (child.name === 'Body') {
        if (state === 'else') orelse = this.body(child);
        else body = this.body(child);
      } else if (state === 'target') target.push(child);
      else if (state === 'iter') iter.push(child);
    }

    return {
      kind: 'For',
      line: this.line(node),
      target: this.targets(target),
      iter: this.convertAll(iter),
      body,
      orelse,
    };
  }

  private tryStatement(node: SyntaxNode): PyNode {
    let body: PyNode[] = [];
    let orelse: PyNode[] = [];
    let finalbody: PyNode[] = [];
    const handlers: ExceptHandlerNode[] = [];

    let state: 'try' | 'except-type' | 'except-name' | 'else' | 'finally' = 'try';
    let handler: { line: number; type: SyntaxNode[]; name: string | null } | null = null;

    for (const child of kids(node)) {
      switch (child.name) {
        case 'try':
          state = 'try';
          continue;
        case 'except':
          state = 'except-type';
          handler = { line: this.line(child), type: [], name: null };
          continue;
        case 'as':
        case ',':
          if (state === 'except-type') state = 'except-name';
          continue;
        case 'else':
          state = 'else';
          continue;
        case 'finally':
          state = 'finally';
          continue;
        case 'Body': {
          const block = this.body(child);
          if (handler && (state === 'except-type' || state === 'except-name')) {
            handlers.push({
              kind: 'ExceptHandler',
              line: handler.line,
              type: this.convertAll(handler.type),
              name: handler.name,
              body: block,
            });
            handler = null;
          } else if (state === 'else') {
            orelse = block;
          } else if (state === 'finally') {
            finalbody = block;
          } else {
            body = block;
          }
          continue;
        }
      }

      if (!handler) continue;
      if (state === 'except-type') handler.type.push(child);
      else if (state === 'except-name' && child.name === 'VariableName') handler.name = this.text(child);
    }

    return { kind: 'Try', line: this.line(node), body, handlers, orelse, finalbody };
  }

  /** Names read inside f-string replacement fields. */
  private stringRefs(node: SyntaxNode): NameNode[] {
    const refs: NameNode[] = [];
    const cursor = node.cursor();
    const end = node.to;
    while (cursor.next() && cursor.from < end) {
      if (cursor.name === 'VariableName') {
        refs.push({
          kind: 'Name',
          line: this.lines.clampedLineAt(cursor.from),
          id: this.source.slice(cursor.from, cursor.to),
          ctx: 'load',
        });
      }
    }
    if (refs.length > 0) return refs;

    // Grammar versions that keep f-strings as a single token.
    const text = this.text(node);
    if (!FSTRING_PREFIX.test(text)) return refs;
    for (const match of text.matchAll(FSTRING_FIELD)) {
      refs.push({ kind: 'Name', line: this.line(node), id: match[1], ctx: 'load' });
    }
    return refs;
  }
}
