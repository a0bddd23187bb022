/**
 * Cache Keys
 *
 * Structural fingerprints of prepared queries. Parameter values never
 * appear in a key, only placeholder positions, so queries differing only
 * in pinned values share a key.
 */

import { createHash } from 'crypto';
import type {
  CacheKey,
  CacheKeyPart,
  Expr,
  MapEntry,
  Operation,
  Query,
  QueryExpr,
  Source,
} from '../query/types.js';
import { CACHE_KEY_HASH_ALGORITHM } from '../utils/constants.js';
import { typeName } from '../types/index.js';
import type { PlanContext } from './context.js';
import { compiledOf } from './context.js';

export function exprKey(expr: Expr): CacheKeyPart {
  switch (expr.type) {
    case 'binding':
      return ['&', expr.index];
    case 'field':
      return ['.', expr.index, expr.name];
    case 'literal':
      return expr.value;
    case 'param':
      return ['^', expr.index];
    case 'compare':
    case 'arithmetic':
      return [expr.operator, exprKey(expr.left), exprKey(expr.right)];
    case 'and':
    case 'or':
      return [expr.type, expr.conditions.map(exprKey)];
    case 'not':
    case 'is_nil':
      return [expr.type, exprKey(expr.expr)];
    case 'in':
      return ['in', exprKey(expr.left), exprKey(expr.right)];
    case 'fragment':
      return ['fragment', [...expr.parts], expr.args.map(exprKey)];
    case 'list':
      return ['list', expr.items.map(exprKey)];
    case 'map':
      return ['%{}', entriesKey(expr.entries)];
    case 'struct':
      return ['%', expr.schema, entriesKey(expr.entries)];
    case 'map_update':
      return ['|', exprKey(expr.base), entriesKey(expr.entries)];
    case 'merge':
      return ['merge', exprKey(expr.left), exprKey(expr.right)];
    case 'subset':
      return [expr.kind, expr.index, [...expr.fields]];
    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function entriesKey(entries: readonly MapEntry[]): CacheKeyPart {
  return entries.map(({ key, value }) => [
    typeof key === 'string' ? key : exprKey(key),
    exprKey(value),
  ]);
}

/**
 * Short stable hash of a schema's storage layout
 */
export function schemaHash(schema: string, context: PlanContext): string {
  const fields = context.resolver.fields(schema) ?? [];
  const layout = fields.map((info) => `${info.name}:${info.source}:${typeName(info.type)}`);
  return createHash(CACHE_KEY_HASH_ALGORITHM)
    .update(`${context.resolver.source(schema) ?? ''}|${layout.join(',')}`)
    .digest('hex')
    .slice(0, 12);
}

export function sourceKey(source: Source, context: PlanContext): CacheKeyPart {
  switch (source.kind) {
    case 'table':
      return [source.table, null, null];
    case 'schema':
      return [source.table, source.schema, schemaHash(source.schema, context)];
    case 'subquery':
      return compiledOf(source.subquery).cacheKey;
    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function clauseKey(clause: QueryExpr<Expr>): CacheKeyPart {
  return exprKey(clause.expr);
}

/**
 * Key of a prepared query:
 * `[operation, paramBase, paramCount, ...clauseKeys, fromKey]`
 */
export function buildCacheKey(
  query: Query,
  operation: Operation,
  paramBase: number,
  paramCount: number,
  context: PlanContext
): CacheKey {
  const parts: CacheKeyPart[] = [operation, paramBase, paramCount];

  if (query.distinct) {
    parts.push(['distinct', true]);
  }

  if (query.select) {
    parts.push(['select', clauseKey(query.select)]);
  }

  if (query.joins.length > 0) {
    parts.push([
      'join',
      query.joins.map((join) => [
        join.qual,
        join.source ? sourceKey(join.source, context) : null,
        clauseKey(join.on),
      ]),
    ]);
  }

  if (query.wheres.length > 0) {
    parts.push(['where', query.wheres.map((where) => [where.op, clauseKey(where)])]);
  }

  if (query.groupBys.length > 0) {
    parts.push(['group_by', query.groupBys.map((groupBy) => groupBy.expr.map(exprKey))]);
  }

  if (query.havings.length > 0) {
    parts.push(['having', query.havings.map((having) => [having.op, clauseKey(having)])]);
  }

  if (query.orderBys.length > 0) {
    parts.push([
      'order_by',
      query.orderBys.map((orderBy) =>
        orderBy.expr.map((item) => [item.direction, exprKey(item.expr)])
      ),
    ]);
  }

  if (query.limit) {
    parts.push(['limit', clauseKey(query.limit)]);
  }

  if (query.offset) {
    parts.push(['offset', clauseKey(query.offset)]);
  }

  if (query.updates.length > 0) {
    parts.push([
      'update',
      query.updates.map((update) =>
        update.expr.map((item) => [item.operator, item.field, exprKey(item.value)])
      ),
    ]);
  }

  if (query.preloads.length > 0) {
    parts.push(['preload', query.preloads.map((preload) => [[...preload.path], preload.binding])]);
  }

  parts.push(sourceKey(query.from.source, context));
  return parts;
}

/**
 * Hex digest of a cache key, for use as a map key
 */
export function cacheKeyFingerprint(key: CacheKey): string {
  return createHash(CACHE_KEY_HASH_ALGORITHM).update(JSON.stringify(key)).digest('hex');
}
