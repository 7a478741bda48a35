import { isScope, walk } from './syntax';
import type { PyNode } from './syntax';
import type { Finding, RuleId, Severity } from './types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function finding(
  ruleId: RuleId,
  severity: Severity,
  title: string,
  line: number,
  message: string,
  suggestion: string,
): Finding {
  return { ruleId, severity, title, line, message, suggestion };
}

/** `pass`, `...` or a lone string literal: statements that do nothing. */
function isNoOp(stmt: PyNode): boolean {
  if (stmt.kind === 'Pass') return true;
  if (stmt.kind !== 'ExprStmt' || stmt.value.length !== 1) return false;
  const value = stmt.value[0];
  return value.kind === 'Constant' && (value.type === 'ellipsis' || value.type === 'string');
}

/** Walk a scope's own statements without entering nested functions, lambdas or classes. */
function walkScope(body: PyNode[], visit: (node: PyNode) => void): void {
  for (const stmt of body) {
    walk(stmt, (node) => {
      visit(node);
      return !isScope(node);
    });
  }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export type Rule = {
  id: RuleId;
  /** Pure predicate over one node; must not depend on other rules. */
  check: (node: PyNode) => Finding[];
};

function checkUnusedVariable(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'FunctionDef') return findings;

  const assigned = new Map<string, number>();
  const declared = new Set<string>();
  walkScope(node.body, (n) => {
    if (n.kind === 'Global') n.names.forEach((name) => declared.add(name));
    if (n.kind !== 'Assign') return;
    for (const target of n.targets) {
      const only = target.length === 1 ? target[0] : null;
      if (only?.kind === 'Name' && !assigned.has(only.id)) assigned.set(only.id, only.line);
    }
  });
  if (assigned.size === 0) return findings;

  // Reads anywhere below, nested scopes included: closures count as uses.
  const read = new Set<string>();
  for (const stmt of node.body) {
    walk(stmt, (n) => {
      if (n.kind === 'Name' && n.ctx === 'load') read.add(n.id);
    });
  }
  if (read.has('locals')) return findings;

  for (const [name, line] of assigned) {
    if (name.startsWith('_') || read.has(name) || declared.has(name)) continue;
    findings.push(
      finding(
        'UNUSED_VARIABLE',
        'warning',
        'Unused local variable',
        line,
        `Local variable '${name}' is assigned but never used in '${node.name}'.`,
        `Remove the assignment, use the value, or rename it to '_${name}' if it is intentionally ignored.`,
      ),
    );
  }
  return findings;
}

function checkBareExcept(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'ExceptHandler' || node.type.length > 0) return findings;

  findings.push(
    finding(
      'BARE_EXCEPT',
      'warning',
      "Bare 'except:' clause",
      node.line,
      "A bare 'except:' catches every exception, including KeyboardInterrupt and SystemExit, and hides the real cause of failures.",
      "Catch the specific exceptions you expect, e.g. 'except ValueError:', or at least 'except Exception:'.",
    ),
  );
  return findings;
}

function checkSwallowedException(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'ExceptHandler' || !node.body.every(isNoOp)) return findings;

  findings.push(
    finding(
      'SWALLOWED_EXCEPTION',
      'warning',
      'Exception silently ignored',
      node.line,
      'This except clause does nothing with the exception, so errors disappear without a trace.',
      'Log the exception, re-raise it, or handle it explicitly. If ignoring it is intended, use contextlib.suppress() to say so.',
    ),
  );
  return findings;
}

function checkEmptyFunction(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'FunctionDef' || !node.body.every(isNoOp)) return findings;

  findings.push(
    finding(
      'EMPTY_FUNCTION',
      'info',
      'Function has no body',
      node.line,
      `Function '${node.name}' only contains placeholders and does nothing when called.`,
      "Implement the function, or raise NotImplementedError so callers fail loudly.",
    ),
  );
  return findings;
}

function checkDebugPrint(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'Call' || node.func.kind !== 'Name' || node.func.id !== 'print') return findings;

  findings.push(
    finding(
      'DEBUG_PRINT',
      'info',
      'print() call',
      node.line,
      'Potential debug print statement.',
      'Remove leftover debug output or switch to the logging module.',
    ),
  );
  return findings;
}

function isPlainTarget(node: PyNode): boolean {
  if (node.kind === 'Name') return true;
  if (node.kind === 'Tuple') return node.elts.every(isPlainTarget);
  return false;
}

function checkUnusualLoopTarget(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'For' || node.target.every(isPlainTarget)) return findings;

  findings.push(
    finding(
      'UNUSUAL_LOOP_TARGET',
      'warning',
      'Unusual for-loop target',
      node.line,
      'The loop variable is an attribute or subscript, so every iteration overwrites it as a side effect.',
      'Loop over a plain local name and assign to the attribute or item explicitly inside the loop body.',
    ),
  );
  return findings;
}

function checkMutableDefault(node: PyNode): Finding[] {
  const findings: Finding[] = [];
  if (node.kind !== 'FunctionDef' && node.kind !== 'Lambda') return findings;

  for (const param of node.params) {
    const value = param.default;
    if (value?.kind !== 'Collection') continue;
    findings.push(
      finding(
        'MUTABLE_DEFAULT_ARGUMENT',
        'warning',
        'Mutable default argument',
        param.line,
        `Parameter '${param.name}' defaults to a ${value.type} that is created once and shared by every call.`,
        `Default to None and create the ${value.type} inside the function body.`,
      ),
    );
  }
  return findings;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export const RULES: readonly Rule[] = [
  { id: 'UNUSED_VARIABLE', check: checkUnusedVariable },
  { id: 'BARE_EXCEPT', check: checkBareExcept },
  { id: 'SWALLOWED_EXCEPTION', check: checkSwallowedException },
  { id: 'EMPTY_FUNCTION', check: checkEmptyFunction },
  { id: 'DEBUG_PRINT', check: checkDebugPrint },
  { id: 'UNUSUAL_LOOP_TARGET', check: checkUnusualLoopTarget },
  { id: 'MUTABLE_DEFAULT_ARGUMENT', check: checkMutableDefault },
];
