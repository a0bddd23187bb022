/**
 * Query Preparation
 *
 * Resolves sources (schemas, association joins, subqueries), infers a
 * type for every pinned parameter from where it is used, casts and dumps
 * the values into one flat list, and computes the cache key.
 */

import {
  AssociationRequiresSourceSchemaError,
  CastError,
  IllegalUpdateError,
  SubqueryNotAllowedInBulkFromError,
  UnknownAssociationError,
  UnknownBindingError,
  UnknownSchemaError,
} from '../errors/index.js';
import { and, eq, field } from '../query/expr.js';
import type {
  CacheKey,
  Expr,
  JoinExpr,
  MapEntry,
  Operation,
  Query,
  QueryExpr,
  Source,
} from '../query/types.js';
import { castValue, dumpValue, typeName } from '../types/index.js';
import type { FieldType } from '../types/index.js';
import { BULK_OPERATIONS } from '../utils/constants.js';
import { buildCacheKey, cacheKeyFingerprint } from './cache-key.js';
import type { PlanContext } from './context.js';
import { compiledOf, fieldType, queryContext, sourceAt } from './context.js';
import { compileSubquery, subqueryError } from './subquery.js';
import { TRAVERSAL_ORDER } from './traversal.js';

export interface PreparedQuery {
  /** Query with every source resolved and every subquery compiled */
  readonly query: Query;
  /** Cast and dumped parameter values in traversal order */
  readonly params: readonly unknown[];
  readonly cacheKey: CacheKey;
}

function isBulkOperation(operation: Operation): boolean {
  return BULK_OPERATIONS.some((bulk) => bulk === operation);
}

/**
 * Operation-level legality, checked before anything is resolved
 */
export function validateOperation(query: Query, operation: Operation): void {
  if (isBulkOperation(operation) && query.from.source.kind === 'subquery') {
    throw new SubqueryNotAllowedInBulkFromError(operation, queryContext(query));
  }

  if (operation === 'update_all' && query.updates.length === 0) {
    throw new IllegalUpdateError(
      '`update_all` requires at least one field to be updated',
      queryContext(query)
    );
  }

  if (operation !== 'update_all' && query.updates.length > 0) {
    throw new IllegalUpdateError(
      `\`${operation}\` does not allow \`update\` expressions`,
      queryContext(query)
    );
  }
}

export function prepare(
  query: Query,
  operation: Operation,
  context: PlanContext,
  paramBase = 0
): PreparedQuery {
  validateOperation(query, operation);

  const resolved = prepareSources(query, context);
  validatePreloads(resolved, context);

  const params = new ParamCollector(resolved, context).collect(operation);
  const cacheKey = buildCacheKey(resolved, operation, paramBase, params.length, context);

  if (context.debug) {
    context.logger.debug(`[planner] prepared ${operation} query`, {
      params: params.length,
      cacheKey: cacheKeyFingerprint(cacheKey),
    });
  }

  return { query: resolved, params, cacheKey };
}

/**
 * Resolve `from` and every join in order, so that an association join
 * sees its parent already resolved
 */
function prepareSources(query: Query, context: PlanContext): Query {
  let current: Query = {
    ...query,
    from: { ...query.from, source: prepareSource(query.from.source, query, context) },
  };

  query.joins.forEach((join, position) => {
    const prepared = join.assoc
      ? expandAssocJoin(join, join.assoc.parent, join.assoc.name, current, context)
      : { ...join, source: prepareJoinSource(join, current, context) };

    current = {
      ...current,
      joins: current.joins.map((existing, index) => (index === position ? prepared : existing)),
    };
  });

  return current;
}

function prepareJoinSource(join: JoinExpr, query: Query, context: PlanContext): Source {
  if (!join.source) {
    throw new UnknownBindingError(join.ix, queryContext(query));
  }
  return prepareSource(join.source, query, context);
}

function prepareSource(source: Source, outer: Query, context: PlanContext): Source {
  switch (source.kind) {
    case 'table':
      return source;

    case 'schema': {
      const table = context.resolver.source(source.schema);
      if (table === null) {
        throw new UnknownSchemaError(source.schema, queryContext(outer));
      }
      return { ...source, table };
    }

    case 'subquery': {
      const result = compileSubquery(source.subquery, context);
      if (!result.ok) {
        throw subqueryError(result.error, outer);
      }
      return { kind: 'subquery', subquery: { query: source.subquery.query, compiled: result.value } };
    }

    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Schema owning the associations of a source. Subqueries qualify only
 * when they expose a whole row or struct of a schema.
 */
function associationOwner(
  parent: number,
  association: string,
  query: Query
): string {
  const source = sourceAt(query, parent);

  switch (source.kind) {
    case 'schema':
      return source.schema;
    case 'subquery': {
      const shape = compiledOf(source.subquery).shape;
      if (shape.kind === 'map') {
        throw new AssociationRequiresSourceSchemaError(association, queryContext(query));
      }
      return shape.schema;
    }
    case 'table':
      throw new AssociationRequiresSourceSchemaError(association, queryContext(query));
    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * `join c in assoc(p, :comments)` becomes a join on the related schema
 * with `on: c.<relatedKey> == p.<ownerKey>`, AND-ed with any explicit `on`
 */
function expandAssocJoin(
  join: JoinExpr,
  parent: number,
  association: string,
  query: Query,
  context: PlanContext
): JoinExpr {
  const owner = associationOwner(parent, association, query);
  const spec = context.resolver.association(owner, association);
  if (!spec) {
    throw new UnknownAssociationError(association, owner, queryContext(query));
  }

  const table = context.resolver.source(spec.related);
  if (table === null) {
    throw new UnknownSchemaError(spec.related, queryContext(query));
  }

  const condition = eq(field(join.ix, spec.relatedKey), field(parent, spec.ownerKey));
  const explicit = join.on.expr;
  const on =
    explicit.type === 'literal' && explicit.value === true ? condition : and(condition, explicit);

  return {
    ...join,
    source: { kind: 'schema', schema: spec.related, table },
    assoc: null,
    on: { ...join.on, expr: on },
  };
}

/**
 * Every preload path must walk associations from the `from` schema, and
 * a preload binding must be a join
 */
function validatePreloads(query: Query, context: PlanContext): void {
  for (const preload of query.preloads) {
    if (preload.binding !== null && (preload.binding < 1 || preload.binding > query.joins.length)) {
      throw new UnknownBindingError(preload.binding, queryContext(query));
    }

    const root = query.from.source;
    let schema: string | null = root.kind === 'schema' ? root.schema : null;
    if (root.kind === 'subquery') {
      const shape = compiledOf(root.subquery).shape;
      schema = shape.kind === 'map' ? null : shape.schema;
    }
    if (schema === null) {
      throw new AssociationRequiresSourceSchemaError(preload.path.join('.'), queryContext(query));
    }

    for (const name of preload.path) {
      const spec = context.resolver.association(schema, name);
      if (!spec) {
        throw new UnknownAssociationError(name, schema, queryContext(query));
      }
      schema = spec.related;
    }
  }
}

/**
 * Infers parameter types inside one clause. Each side of a comparison
 * takes the type of the other; `in` lists take the element type.
 */
class TypeInference {
  private readonly types = new Map<number, FieldType>();

  constructor(
    private readonly query: Query,
    private readonly clause: string,
    private readonly paramOffset: number,
    private readonly context: PlanContext
  ) {}

  /** Inferred type of a clause-local parameter */
  typeOf(local: number): FieldType | undefined {
    return this.types.get(local);
  }

  walk(expr: Expr, expected: FieldType | null): void {
    switch (expr.type) {
      case 'binding':
        sourceAt(this.query, expr.index);
        return;

      case 'field':
        fieldType(this.query, expr.index, expr.name, this.clause, this.context);
        return;

      case 'literal':
        this.checkLiteral(expr.value, expected);
        return;

      case 'param': {
        const local = expr.index - this.paramOffset;
        if (expected !== null && !this.types.has(local)) {
          this.types.set(local, expected);
        }
        return;
      }

      case 'compare':
      case 'arithmetic': {
        const left = this.exprType(expr.left);
        const right = this.exprType(expr.right);
        this.walk(expr.left, right);
        this.walk(expr.right, left);
        return;
      }

      case 'in': {
        const element = this.exprType(expr.left);
        this.walk(expr.left, null);
        if (expr.right.type === 'list') {
          expr.right.items.forEach((item) => this.walk(item, element));
        } else if (expr.right.type === 'param') {
          this.walk(expr.right, element === null ? null : { array: element });
        } else {
          this.walk(expr.right, null);
        }
        return;
      }

      case 'and':
      case 'or':
        expr.conditions.forEach((condition) => this.walk(condition, null));
        return;

      case 'not':
      case 'is_nil':
        this.walk(expr.expr, null);
        return;

      case 'fragment':
        expr.args.forEach((arg) => this.walk(arg, null));
        return;

      case 'list':
        expr.items.forEach((item) => this.walk(item, null));
        return;

      case 'map':
        this.walkEntries(expr.entries, () => null);
        return;

      case 'struct': {
        const schema = expr.schema;
        this.walkEntries(
          expr.entries,
          (key) => this.context.resolver.field(schema, key)?.type ?? null
        );
        return;
      }

      case 'map_update': {
        this.walk(expr.base, null);
        const base = expr.base;
        this.walkEntries(expr.entries, (key) =>
          base.type === 'binding' ? this.exposedType(base.index, key) : null
        );
        return;
      }

      case 'merge':
        this.walk(expr.left, null);
        this.walk(expr.right, null);
        return;

      case 'subset':
        sourceAt(this.query, expr.index);
        return;

      default: {
        const _exhaustive: never = expr;
        throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  private walkEntries(
    entries: readonly MapEntry[],
    typeOfKey: (key: string) => FieldType | null
  ): void {
    for (const { key, value } of entries) {
      if (typeof key === 'string') {
        this.walk(value, typeOfKey(key));
      } else {
        this.walk(key, null);
        this.walk(value, null);
      }
    }
  }

  /** Static type of an expression, when it has one */
  private exprType(expr: Expr): FieldType | null {
    switch (expr.type) {
      case 'field':
        return fieldType(this.query, expr.index, expr.name, this.clause, this.context);
      case 'arithmetic':
        return this.exprType(expr.left) ?? this.exprType(expr.right);
      default:
        return null;
    }
  }

  /**
   * Type of a field a binding exposes, without failing on unknown
   * names; map updates report those themselves
   */
  private exposedType(index: number, name: string): FieldType | null {
    const source = sourceAt(this.query, index);
    switch (source.kind) {
      case 'schema':
        return this.context.resolver.field(source.schema, name)?.type ?? null;
      case 'subquery':
        return (
          compiledOf(source.subquery).shape.fields.find((shapeField) => shapeField.name === name)
            ?.type ?? null
        );
      case 'table':
        return null;
      default: {
        const _exhaustive: never = source;
        throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  private checkLiteral(value: unknown, expected: FieldType | null): void {
    if (expected === null || expected === 'any') {
      return;
    }
    if (!castValue(expected, value).ok) {
      throw new CastError(value, typeName(expected), this.clause, queryContext(this.query));
    }
  }
}

/**
 * Walks clauses in traversal order, producing the flat parameter list.
 * Subquery sources contribute their already cast parameters at the
 * point they are reached.
 */
class ParamCollector {
  private readonly params: unknown[] = [];

  constructor(
    private readonly query: Query,
    private readonly context: PlanContext
  ) {}

  collect(operation: Operation): unknown[] {
    const query = this.query;

    for (const slot of TRAVERSAL_ORDER[operation]) {
      switch (slot) {
        case 'select':
          if (query.select) {
            const select = query.select;
            this.clause(select, 'select', (types) => types.walk(select.expr, null));
          }
          break;

        case 'from':
          this.source(query.from.source);
          break;

        case 'joins':
          for (const join of query.joins) {
            if (join.source) {
              this.source(join.source);
            }
            this.clause(join.on, 'join', (types) => types.walk(join.on.expr, null));
          }
          break;

        case 'wheres':
          for (const where of query.wheres) {
            this.clause(where, 'where', (types) => types.walk(where.expr, null));
          }
          break;

        case 'group_bys':
          for (const groupBy of query.groupBys) {
            this.clause(groupBy, 'group_by', (types) =>
              groupBy.expr.forEach((expr) => types.walk(expr, null))
            );
          }
          break;

        case 'havings':
          for (const having of query.havings) {
            this.clause(having, 'having', (types) => types.walk(having.expr, null));
          }
          break;

        case 'order_bys':
          for (const orderBy of query.orderBys) {
            this.clause(orderBy, 'order_by', (types) =>
              orderBy.expr.forEach((item) => types.walk(item.expr, null))
            );
          }
          break;

        case 'limit':
          if (query.limit) {
            const limit = query.limit;
            this.clause(limit, 'limit', (types) => types.walk(limit.expr, 'integer'));
          }
          break;

        case 'offset':
          if (query.offset) {
            const offset = query.offset;
            this.clause(offset, 'offset', (types) => types.walk(offset.expr, 'integer'));
          }
          break;

        case 'updates':
          for (const update of query.updates) {
            this.clause(update, 'update', (types) =>
              update.expr.forEach((item) =>
                types.walk(
                  item.value,
                  fieldType(query, 0, item.field, 'update', this.context)
                )
              )
            );
          }
          break;

        default: {
          const _exhaustive: never = slot;
          throw new Error(`Unknown clause: ${String(_exhaustive)}`);
        }
      }
    }

    return this.params;
  }

  private source(source: Source): void {
    if (source.kind === 'subquery') {
      this.params.push(...compiledOf(source.subquery).params);
    }
  }

  private clause<T>(
    clause: QueryExpr<T>,
    name: string,
    walk: (types: TypeInference) => void
  ): void {
    const types = new TypeInference(this.query, name, clause.paramOffset, this.context);
    walk(types);

    clause.params.forEach((param, local) => {
      const type = param.type ?? types.typeOf(local) ?? 'any';
      this.params.push(this.castParam(param.value, type, name));
    });
  }

  /**
   * Cast to the field type, dump to its storage form, then hand to the
   * adapter; a failure at any step is a cast error
   */
  private castParam(value: unknown, type: FieldType, clause: string): unknown {
    const cast = castValue(type, value);
    const dumped = cast.ok ? dumpValue(type, cast.value) : cast;
    const stored = dumped.ok ? this.context.adapter.dump(type, dumped.value) : dumped;

    if (!stored.ok) {
      throw new CastError(value, typeName(type), clause, queryContext(this.query));
    }
    return stored.value;
  }
}
