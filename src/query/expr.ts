/**
 * Expression Builder
 *
 * Structured constructors for expression nodes. Plain strings, numbers,
 * booleans and null are accepted wherever an operand is expected and
 * become literal nodes.
 *
 * Example:
 *   and(eq(p.field('title'), pin('hello')), not(isNil(p.field('text'))))
 */

import type {
  ArithmeticExpr,
  ArithmeticOperator,
  BindingExpr,
  ComparisonExpr,
  ComparisonOperator,
  Expr,
  FieldExpr,
  FragmentExpr,
  InExpr,
  IsNilExpr,
  ListExpr,
  LiteralExpr,
  LiteralValue,
  LogicalExpr,
  MapEntry,
  MapExpr,
  MapUpdateExpr,
  MergeExpr,
  NotExpr,
  StructExpr,
  SubsetExpr,
} from './types.js';

/**
 * Operand - an expression or a literal value
 */
export type Operand = Expr | LiteralValue;

export function toExpr(operand: Operand): Expr {
  if (operand !== null && typeof operand === 'object') {
    return operand;
  }
  return lit(operand);
}

export function lit(value: LiteralValue): LiteralExpr {
  return { type: 'literal', value };
}

export function binding(index: number): BindingExpr {
  return { type: 'binding', index };
}

export function field(index: number, name: string): FieldExpr {
  return { type: 'field', index, name };
}

function compare(operator: ComparisonOperator, left: Operand, right: Operand): ComparisonExpr {
  return { type: 'compare', operator, left: toExpr(left), right: toExpr(right) };
}

export function eq(left: Operand, right: Operand): ComparisonExpr {
  return compare('==', left, right);
}

export function neq(left: Operand, right: Operand): ComparisonExpr {
  return compare('!=', left, right);
}

export function lt(left: Operand, right: Operand): ComparisonExpr {
  return compare('<', left, right);
}

export function lte(left: Operand, right: Operand): ComparisonExpr {
  return compare('<=', left, right);
}

export function gt(left: Operand, right: Operand): ComparisonExpr {
  return compare('>', left, right);
}

export function gte(left: Operand, right: Operand): ComparisonExpr {
  return compare('>=', left, right);
}

function arithmetic(operator: ArithmeticOperator, left: Operand, right: Operand): ArithmeticExpr {
  return { type: 'arithmetic', operator, left: toExpr(left), right: toExpr(right) };
}

export function add(left: Operand, right: Operand): ArithmeticExpr {
  return arithmetic('+', left, right);
}

export function sub(left: Operand, right: Operand): ArithmeticExpr {
  return arithmetic('-', left, right);
}

export function mul(left: Operand, right: Operand): ArithmeticExpr {
  return arithmetic('*', left, right);
}

export function div(left: Operand, right: Operand): ArithmeticExpr {
  return arithmetic('/', left, right);
}

/**
 * AND combination of conditions
 */
export function and(...conditions: Operand[]): LogicalExpr {
  if (conditions.length === 0) {
    throw new Error('AND requires at least one condition');
  }
  return { type: 'and', conditions: conditions.map(toExpr) };
}

/**
 * OR combination of conditions
 */
export function or(...conditions: Operand[]): LogicalExpr {
  if (conditions.length === 0) {
    throw new Error('OR requires at least one condition');
  }
  return { type: 'or', conditions: conditions.map(toExpr) };
}

export function not(expr: Operand): NotExpr {
  return { type: 'not', expr: toExpr(expr) };
}

export function isNil(expr: Operand): IsNilExpr {
  return { type: 'is_nil', expr: toExpr(expr) };
}

/**
 * `left in right`; an array becomes a list literal
 */
export function inList(left: Operand, right: Expr | readonly Operand[]): InExpr {
  return {
    type: 'in',
    left: toExpr(left),
    right: isOperandList(right) ? list(right) : right,
  };
}

function isOperandList(value: Expr | readonly Operand[]): value is readonly Operand[] {
  return Array.isArray(value);
}

export function list(items: readonly Operand[]): ListExpr {
  return { type: 'list', items: items.map(toExpr) };
}

/**
 * Fragment with `?` placeholders, one per argument
 */
export function fragment(sql: string, ...args: Operand[]): FragmentExpr {
  const parts = sql.split('?');
  if (parts.length - 1 !== args.length) {
    throw new Error(
      `fragment(...) expects ${parts.length - 1} arguments for "${sql}", got ${args.length}`
    );
  }
  return { type: 'fragment', parts, args: args.map(toExpr) };
}

function entriesOf(fields: Readonly<Record<string, Operand>>): MapEntry[] {
  return Object.entries(fields).map(([key, value]) => ({ key, value: toExpr(value) }));
}

/**
 * Map literal with atom keys, in property order
 */
export function map(fields: Readonly<Record<string, Operand>> = {}): MapExpr {
  return { type: 'map', entries: entriesOf(fields) };
}

/**
 * Map literal with arbitrary keys (`%{p.id => p.title}`)
 */
export function mapOf(entries: ReadonlyArray<readonly [string | Expr, Operand]>): MapExpr {
  return {
    type: 'map',
    entries: entries.map(([key, value]) => ({ key, value: toExpr(value) })),
  };
}

export function struct(schema: string, fields: Readonly<Record<string, Operand>> = {}): StructExpr {
  return { type: 'struct', schema, entries: entriesOf(fields) };
}

/**
 * Map update (`%{p | text: p.title}`)
 */
export function update(base: Expr, fields: Readonly<Record<string, Operand>>): MapUpdateExpr {
  return { type: 'map_update', base, entries: entriesOf(fields) };
}

export function merge(left: Expr, right: Expr): MergeExpr {
  return { type: 'merge', left, right };
}

export function subset(index: number, fields: readonly string[], kind: 'struct' | 'map' = 'struct'): SubsetExpr {
  return { type: 'subset', kind, index, fields };
}
