/**
 * Query Normalization
 *
 * Runs on a prepared query: defaults the select, moves every clause's
 * placeholders to their global positions (subqueries included, at the
 * offset where they are reached) and expands the select into the flat
 * list of fields it reads.
 */

import { CannotSubsetSubqueryStructError, UnsupportedSelectError } from '../errors/index.js';
import { binding, field } from '../query/expr.js';
import { bindingNames } from '../query/inspect.js';
import type { Expr, Operation, Query, QueryExpr, Source, SubsetExpr } from '../query/types.js';
import { shiftParams } from '../query/walk.js';
import type { PlanContext } from './context.js';
import { compiledOf, fieldType, queryContext, schemaFields, sourceAt } from './context.js';
import { validateOperation } from './prepare.js';
import { normalizeSubquery } from './subquery.js';
import { TRAVERSAL_ORDER } from './traversal.js';

export function normalize(
  query: Query,
  operation: Operation,
  context: PlanContext,
  paramBase = 0
): Query {
  validateOperation(query, operation);

  const selected = ensureSelect(query, operation);
  const renumbered = new Renumberer(paramBase, context).run(selected, operation);
  return expandSelect(renumbered, context);
}

/**
 * `all` queries without a select return their `from` source
 */
function ensureSelect(query: Query, operation: Operation): Query {
  if (query.select || operation !== 'all') {
    return query;
  }
  return { ...query, select: { expr: binding(0), params: [], paramOffset: 0, fields: null } };
}

/**
 * Assigns global offsets in traversal order. A clause's placeholders are
 * rewritten relative to the offset it was last given, so renumbering an
 * already normalized query is a no-op at the same base.
 */
class Renumberer {
  private counter: number;

  constructor(
    paramBase: number,
    private readonly context: PlanContext
  ) {
    this.counter = paramBase;
  }

  run(query: Query, operation: Operation): Query {
    let result = query;

    for (const slot of TRAVERSAL_ORDER[operation]) {
      switch (slot) {
        case 'select':
          if (result.select) {
            const select = result.select;
            result = { ...result, select: this.shift(select, (move) => move(select.expr)) };
          }
          break;

        case 'from':
          result = { ...result, from: { ...result.from, source: this.source(result.from.source) } };
          break;

        case 'joins':
          result = {
            ...result,
            joins: result.joins.map((join) => {
              const source = join.source ? this.source(join.source) : null;
              return { ...join, source, on: this.shift(join.on, (move) => move(join.on.expr)) };
            }),
          };
          break;

        case 'wheres':
          result = {
            ...result,
            wheres: result.wheres.map((where) => this.shift(where, (move) => move(where.expr))),
          };
          break;

        case 'group_bys':
          result = {
            ...result,
            groupBys: result.groupBys.map((groupBy) =>
              this.shift(groupBy, (move) => groupBy.expr.map(move))
            ),
          };
          break;

        case 'havings':
          result = {
            ...result,
            havings: result.havings.map((having) => this.shift(having, (move) => move(having.expr))),
          };
          break;

        case 'order_bys':
          result = {
            ...result,
            orderBys: result.orderBys.map((orderBy) =>
              this.shift(orderBy, (move) =>
                orderBy.expr.map((item) => ({ ...item, expr: move(item.expr) }))
              )
            ),
          };
          break;

        case 'limit':
          if (result.limit) {
            const limit = result.limit;
            result = { ...result, limit: this.shift(limit, (move) => move(limit.expr)) };
          }
          break;

        case 'offset':
          if (result.offset) {
            const offset = result.offset;
            result = { ...result, offset: this.shift(offset, (move) => move(offset.expr)) };
          }
          break;

        case 'updates':
          result = {
            ...result,
            updates: result.updates.map((update) =>
              this.shift(update, (move) =>
                update.expr.map((item) => ({ ...item, value: move(item.value) }))
              )
            ),
          };
          break;

        default: {
          const _exhaustive: never = slot;
          throw new Error(`Unknown clause: ${String(_exhaustive)}`);
        }
      }
    }

    return result;
  }

  private shift<C extends QueryExpr<unknown>>(
    clause: C,
    rewrite: (move: (expr: Expr) => Expr) => C['expr']
  ): C {
    const offset = this.counter;
    this.counter += clause.params.length;
    const move = (expr: Expr): Expr => shiftParams(expr, clause.paramOffset, offset);
    return { ...clause, expr: rewrite(move), paramOffset: offset };
  }

  private source(source: Source): Source {
    if (source.kind !== 'subquery') {
      return source;
    }
    const offset = this.counter;
    this.counter += compiledOf(source.subquery).params.length;
    return { kind: 'subquery', subquery: normalizeSubquery(source.subquery, offset, this.context) };
  }
}

function expandSelect(query: Query, context: PlanContext): Query {
  if (!query.select) {
    return query;
  }
  const fields = selectFields(query.select.expr, query, context);
  return { ...query, select: { ...query.select, fields } };
}

/**
 * Fields a select reads, in order. Composite literals contribute their
 * leaves; constant literals read nothing.
 */
function selectFields(expr: Expr, query: Query, context: PlanContext): Expr[] {
  const recurse = (node: Expr): Expr[] => selectFields(node, query, context);

  switch (expr.type) {
    case 'binding':
      return bindingFields(expr.index, query, context);
    case 'field':
      return [expr];
    case 'subset':
      return subsetFields(expr, query, context);
    case 'map':
    case 'struct':
      return expr.entries.flatMap(({ value }) => recurse(value));
    case 'map_update':
      return [...recurse(expr.base), ...expr.entries.flatMap(({ value }) => recurse(value))];
    case 'merge':
      return [...recurse(expr.left), ...recurse(expr.right)];
    case 'list':
      return expr.items.flatMap(recurse);
    case 'literal':
      return [];
    default:
      return [expr];
  }
}

function bindingFields(index: number, query: Query, context: PlanContext): Expr[] {
  const source = sourceAt(query, index);

  switch (source.kind) {
    case 'schema':
      return schemaFields(source.schema, query, context).map((info) => field(index, info.name));
    case 'subquery':
      return compiledOf(source.subquery).shape.fields.map((shapeField) =>
        field(index, shapeField.name)
      );
    case 'table': {
      const name = bindingNames(query)[index] ?? `&${index}`;
      throw new UnsupportedSelectError(
        `cannot select the whole source \`${name}\` of schemaless table "${source.table}", select individual fields instead`,
        queryContext(query)
      );
    }
    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * `struct(p, [:id, :title])` / `map(p, [...])`: the named fields, each
 * checked against the source. Subqueries exposing a map or struct of
 * several fields cannot be narrowed this way.
 */
function subsetFields(subset: SubsetExpr, query: Query, context: PlanContext): Expr[] {
  const source = sourceAt(query, subset.index);

  if (source.kind === 'subquery') {
    const shape = compiledOf(source.subquery).shape;
    if (shape.kind !== 'row' && shape.fields.length > 1) {
      throw new CannotSubsetSubqueryStructError(queryContext(query));
    }
  }

  return subset.fields.map((name) => {
    fieldType(query, subset.index, name, 'select', context);
    return field(subset.index, name);
  });
}
