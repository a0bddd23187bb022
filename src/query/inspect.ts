/**
 * Query Inspector
 *
 * Renders queries and expressions in a readable keyword form, e.g.
 *
 *   from p in Post,
 *     join: c in assoc(p, :comments),
 *     where: p.title == ^"hello",
 *     select: p
 *
 * Used by every error message that carries query context.
 */

import { inspectValue } from '../errors/index.js';
import { RENDER_INDENT } from '../utils/constants.js';
import type {
  Expr,
  JoinExpr,
  MapEntry,
  Param,
  Query,
  QueryExpr,
  Source,
  UpdateItem,
} from './types.js';

/**
 * Binding names and clause params an expression is rendered against
 */
export interface RenderContext {
  readonly names: readonly string[];
  readonly params?: readonly Param[];
  readonly paramOffset?: number;
}

/**
 * Render an expression. Without names, bindings render positionally (`&0`).
 */
export function renderExpr(expr: Expr, context: RenderContext = { names: [] }): string {
  const render = (node: Expr): string => renderExpr(node, context);
  const nested = (node: Expr): string =>
    node.type === 'and' || node.type === 'or' ? `(${render(node)})` : render(node);

  switch (expr.type) {
    case 'binding':
      return bindingName(expr.index, context.names);
    case 'field':
      return `${bindingName(expr.index, context.names)}.${expr.name}`;
    case 'literal':
      return inspectValue(expr.value);
    case 'param': {
      const param = context.params?.[expr.index - (context.paramOffset ?? 0)];
      return param ? `^${inspectValue(param.value)}` : `^${expr.index}`;
    }
    case 'compare':
    case 'arithmetic':
      return `${nested(expr.left)} ${expr.operator} ${nested(expr.right)}`;
    case 'and':
    case 'or':
      return expr.conditions.map(nested).join(` ${expr.type} `);
    case 'not':
      return `not(${render(expr.expr)})`;
    case 'is_nil':
      return `is_nil(${render(expr.expr)})`;
    case 'in':
      return `${nested(expr.left)} in ${render(expr.right)}`;
    case 'fragment':
      return `fragment(${[JSON.stringify(expr.parts.join('?')), ...expr.args.map(render)].join(', ')})`;
    case 'list':
      return `[${expr.items.map(render).join(', ')}]`;
    case 'map':
      return `%{${renderEntries(expr.entries, context)}}`;
    case 'struct':
      return `%${expr.schema}{${renderEntries(expr.entries, context)}}`;
    case 'map_update':
      return `%{${render(expr.base)} | ${renderEntries(expr.entries, context)}}`;
    case 'merge':
      return `merge(${render(expr.left)}, ${render(expr.right)})`;
    case 'subset':
      return `${expr.kind}(${bindingName(expr.index, context.names)}, [${expr.fields
        .map((name) => `:${name}`)
        .join(', ')}])`;
    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function bindingName(index: number, names: readonly string[]): string {
  return names[index] ?? `&${index}`;
}

function renderEntries(entries: readonly MapEntry[], context: RenderContext): string {
  return entries
    .map(({ key, value }) =>
      typeof key === 'string'
        ? `${key}: ${renderExpr(value, context)}`
        : `${renderExpr(key, context)} => ${renderExpr(value, context)}`
    )
    .join(', ');
}

/**
 * Binding names of a query, by source position
 */
export function bindingNames(query: Query): string[] {
  return [query.from.as, ...query.joins.map((join) => join.as)];
}

export function renderSource(source: Source): string {
  switch (source.kind) {
    case 'table':
      return JSON.stringify(source.table);
    case 'schema':
      return source.schema;
    case 'subquery':
      return `subquery(${renderQuery(source.subquery.compiled?.query ?? source.subquery.query)})`;
    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function clauseContext(names: readonly string[], clause: QueryExpr<unknown>): RenderContext {
  return { names, params: clause.params, paramOffset: clause.paramOffset };
}

function renderJoin(join: JoinExpr, names: readonly string[]): string {
  const keyword = join.qual === 'inner' ? 'join' : `${join.qual}_join`;
  const target = join.assoc
    ? `assoc(${bindingName(join.assoc.parent, names)}, :${join.assoc.name})`
    : join.source
      ? renderSource(join.source)
      : '?';
  const on =
    join.on.expr.type === 'literal' && join.on.expr.value === true
      ? ''
      : `, on: ${renderExpr(join.on.expr, clauseContext(names, join.on))}`;
  return `${keyword}: ${join.as} in ${target}${on}`;
}

function renderUpdates(items: readonly UpdateItem[], context: RenderContext): string {
  const byOperator = new Map<string, string[]>();
  for (const item of items) {
    const rendered = byOperator.get(item.operator) ?? [];
    rendered.push(`${item.field}: ${renderExpr(item.value, context)}`);
    byOperator.set(item.operator, rendered);
  }
  return `[${[...byOperator].map(([operator, fields]) => `${operator}: [${fields.join(', ')}]`).join(', ')}]`;
}

/**
 * Render a whole query, one clause per line
 */
export function renderQuery(query: Query): string {
  const names = bindingNames(query);
  const lines: string[] = [`from ${query.from.as} in ${renderSource(query.from.source)}`];

  for (const join of query.joins) {
    lines.push(renderJoin(join, names));
  }

  for (const where of query.wheres) {
    const keyword = where.op === 'or' ? 'or_where' : 'where';
    lines.push(`${keyword}: ${renderExpr(where.expr, clauseContext(names, where))}`);
  }

  for (const groupBy of query.groupBys) {
    const context = clauseContext(names, groupBy);
    lines.push(`group_by: [${groupBy.expr.map((expr) => renderExpr(expr, context)).join(', ')}]`);
  }

  for (const having of query.havings) {
    const keyword = having.op === 'or' ? 'or_having' : 'having';
    lines.push(`${keyword}: ${renderExpr(having.expr, clauseContext(names, having))}`);
  }

  for (const orderBy of query.orderBys) {
    const context = clauseContext(names, orderBy);
    const items = orderBy.expr.map((item) => `${item.direction}: ${renderExpr(item.expr, context)}`);
    lines.push(`order_by: [${items.join(', ')}]`);
  }

  if (query.limit) {
    lines.push(`limit: ${renderExpr(query.limit.expr, clauseContext(names, query.limit))}`);
  }

  if (query.offset) {
    lines.push(`offset: ${renderExpr(query.offset.expr, clauseContext(names, query.offset))}`);
  }

  if (query.distinct) {
    lines.push('distinct: true');
  }

  for (const update of query.updates) {
    lines.push(`update: ${renderUpdates(update.expr, clauseContext(names, update))}`);
  }

  if (query.preloads.length > 0) {
    const preloads = query.preloads.map((preload) => {
      const path = preload.path.join('.');
      return preload.binding === null
        ? `:${path}`
        : `${path}: ${bindingName(preload.binding, names)}`;
    });
    lines.push(`preload: [${preloads.join(', ')}]`);
  }

  if (query.select) {
    lines.push(`select: ${renderExpr(query.select.expr, clauseContext(names, query.select))}`);
  }

  return lines.join(`,\n${RENDER_INDENT}`);
}
