/**
 * Expression traversal
 */

import type { Expr, MapEntry } from './types.js';

/**
 * Rebuild an expression bottom-up, applying `visit` to every node after
 * its children have been rebuilt
 */
export function mapExpr(expr: Expr, visit: (node: Expr) => Expr): Expr {
  const recurse = (node: Expr): Expr => mapExpr(node, visit);
  const entries = (items: readonly MapEntry[]): MapEntry[] =>
    items.map(({ key, value }) => ({
      key: typeof key === 'string' ? key : recurse(key),
      value: recurse(value),
    }));

  switch (expr.type) {
    case 'binding':
    case 'field':
    case 'literal':
    case 'param':
    case 'subset':
      return visit(expr);
    case 'compare':
    case 'arithmetic':
    case 'in':
      return visit({ ...expr, left: recurse(expr.left), right: recurse(expr.right) });
    case 'and':
    case 'or':
      return visit({ ...expr, conditions: expr.conditions.map(recurse) });
    case 'not':
    case 'is_nil':
      return visit({ ...expr, expr: recurse(expr.expr) });
    case 'fragment':
      return visit({ ...expr, args: expr.args.map(recurse) });
    case 'list':
      return visit({ ...expr, items: expr.items.map(recurse) });
    case 'map':
    case 'struct':
      return visit({ ...expr, entries: entries(expr.entries) });
    case 'map_update':
      return visit({ ...expr, base: recurse(expr.base), entries: entries(expr.entries) });
    case 'merge':
      return visit({ ...expr, left: recurse(expr.left), right: recurse(expr.right) });
    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Move every placeholder of a clause from one offset to another
 */
export function shiftParams(expr: Expr, from: number, to: number): Expr {
  if (from === to) {
    return expr;
  }
  return mapExpr(expr, (node) =>
    node.type === 'param' ? { type: 'param', index: node.index - from + to } : node
  );
}
