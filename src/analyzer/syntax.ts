/**
 * The closed set of Python node kinds the scanner understands.
 *
 * Constructs the rules do not care about (if/while/with, comprehensions,
 * operators...) become `Other` nodes that still carry their children, so
 * every name in the source stays reachable from the root.
 */

export interface Param {
  name: string;
  line: number;
  default: PyNode | null;
}

export interface ModuleNode {
  kind: 'Module';
  line: number;
  body: PyNode[];
}

export interface FunctionDefNode {
  kind: 'FunctionDef';
  line: number;
  name: string;
  params: Param[];
  body: PyNode[];
}

export interface LambdaNode {
  kind: 'Lambda';
  line: number;
  params: Param[];
  body: PyNode[];
}

export interface ClassDefNode {
  kind: 'ClassDef';
  line: number;
  name: string;
  bases: PyNode[];
  body: PyNode[];
}

export interface AssignNode {
  kind: 'Assign';
  line: number;
  /** One entry per `=`; `a = b = 1` has two target lists */
  targets: PyNode[][];
  value: PyNode[];
}

export interface AugAssignNode {
  kind: 'AugAssign';
  line: number;
  target: PyNode[];
  value: PyNode[];
}

export interface ForNode {
  kind: 'For';
  line: number;
  target: PyNode[];
  iter: PyNode[];
  body: PyNode[];
  orelse: PyNode[];
}

export interface ExceptHandlerNode {
  kind: 'ExceptHandler';
  line: number;
  /** Empty for a bare `except:` */
  type: PyNode[];
  name: string | null;
  body: PyNode[];
}

export interface TryNode {
  kind: 'Try';
  line: number;
  body: PyNode[];
  handlers: ExceptHandlerNode[];
  orelse: PyNode[];
  finalbody: PyNode[];
}

export interface GlobalNode {
  kind: 'Global';
  line: number;
  names: string[];
}

export interface ReturnNode {
  kind: 'Return';
  line: number;
  value: PyNode[];
}

export interface PassNode {
  kind: 'Pass';
  line: number;
}

export interface ExprStmtNode {
  kind: 'ExprStmt';
  line: number;
  value: PyNode[];
}

export interface CallNode {
  kind: 'Call';
  line: number;
  func: PyNode;
  args: PyNode[];
}

export interface NameNode {
  kind: 'Name';
  line: number;
  id: string;
  ctx: 'load' | 'store';
}

export interface TupleNode {
  kind: 'Tuple';
  line: number;
  elts: PyNode[];
}

/** Attribute access or subscript: `a.b`, `a[b]` */
export interface MemberNode {
  kind: 'Member';
  line: number;
  children: PyNode[];
}

export interface CollectionNode {
  kind: 'Collection';
  line: number;
  type: 'list' | 'dict' | 'set';
  elts: PyNode[];
}

export interface ConstantNode {
  kind: 'Constant';
  line: number;
  type: 'string' | 'number' | 'ellipsis' | 'none' | 'bool';
  /** Names referenced from f-string replacement fields */
  refs: NameNode[];
}

export interface OtherNode {
  kind: 'Other';
  line: number;
  /** Grammar node name, e.g. `IfStatement` */
  label: string;
  children: PyNode[];
}

export type PyNode =
  | ModuleNode
  | FunctionDefNode
  | LambdaNode
  | ClassDefNode
  | AssignNode
  | AugAssignNode
  | ForNode
  | TryNode
  | ExceptHandlerNode
  | GlobalNode
  | ReturnNode
  | PassNode
  | ExprStmtNode
  | CallNode
  | NameNode
  | TupleNode
  | MemberNode
  | CollectionNode
  | ConstantNode
  | OtherNode;

export type SyntaxTree = ModuleNode;

function paramDefaults(params: Param[]): PyNode[] {
  const defaults: PyNode[] = [];
  for (const p of params) {
    if (p.default) defaults.push(p.default);
  }
  return defaults;
}

/** Direct children of a node, in source order. */
export function childrenOf(node: PyNode): PyNode[] {
  switch (node.kind) {
    case 'Module':
      return node.body;
    case 'FunctionDef':
    case 'Lambda':
      return [...paramDefaults(node.params), ...node.body];
    case 'ClassDef':
      return [...node.bases, ...node.body];
    case 'Assign':
      return [...node.targets.flat(), ...node.value];
    case 'AugAssign':
      return [...node.target, ...node.value];
    case 'For':
      return [...node.target, ...node.iter, ...node.body, ...node.orelse];
    case 'Try':
      return [...node.body, ...node.handlers, ...node.orelse, ...node.finalbody];
    case 'ExceptHandler':
      return [...node.type, ...node.body];
    case 'Return':
    case 'ExprStmt':
      return node.value;
    case 'Call':
      return [node.func, ...node.args];
    case 'Tuple':
    case 'Collection':
      return node.elts;
    case 'Constant':
      return node.refs;
    case 'Member':
    case 'Other':
      return node.children;
    case 'Global':
    case 'Pass':
    case 'Name':
      return [];
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

/**
 * Pre-order walk. Returning `false` from `visit` skips the node's children.
 */
export function walk(node: PyNode, visit: (node: PyNode) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of childrenOf(node)) {
    walk(child, visit);
  }
}

/** True for scopes of their own: names bound inside do not belong to the parent. */
export function isScope(node: PyNode): node is FunctionDefNode | LambdaNode | ClassDefNode {
  return node.kind === 'FunctionDef' || node.kind === 'Lambda' || node.kind === 'ClassDef';
}
