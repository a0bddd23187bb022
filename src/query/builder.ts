/**
 * Query Builder
 *
 * Immutable, fluent construction of Query trees. Every clause callback
 * receives the bindings declared so far (by name) and a `pin` function that
 * registers a parameter on that clause and returns its placeholder, so
 * placeholders are numbered in first-occurrence order within the clause.
 *
 * Example:
 *   const posts = from(schema('Post'), 'p')
 *     .where(({ p }, pin) => eq(p.field('title'), pin('hello')));
 *
 *   const query = from(schema('Comment'), 'c')
 *     .join('inner', subquery(posts), 'p', ({ c, p }) => eq(c.field('post_id'), p.field('id')));
 */

import { DEFAULT_BINDING_NAME } from '../utils/constants.js';
import type { FieldType } from '../types/index.js';
import { binding, field, subset, toExpr } from './expr.js';
import type { Operand } from './expr.js';
import type {
  BindingExpr,
  BooleanExpr,
  Expr,
  FieldExpr,
  JoinQualifier,
  OrderByItem,
  OrderDirection,
  Param,
  ParamExpr,
  Query,
  QueryExpr,
  SchemaSource,
  SelectExpr,
  Source,
  SubsetExpr,
  SubquerySource,
  TableSource,
  UpdateItem,
} from './types.js';

/**
 * A named source position, handed to clause callbacks
 */
export class BindingRef {
  constructor(
    public readonly index: number,
    public readonly name: string
  ) {}

  /** The whole bound row */
  get row(): BindingExpr {
    return binding(this.index);
  }

  field(name: string): FieldExpr {
    return field(this.index, name);
  }

  /** `struct(p, [...fields])` / `map(p, [...fields])` */
  subset(fields: readonly string[], kind: 'struct' | 'map' = 'struct'): SubsetExpr {
    return subset(this.index, fields, kind);
  }
}

export type Bindings = Readonly<Record<string, BindingRef>>;

export type Pin = (value: unknown, type?: FieldType) => ParamExpr;

export type ClauseFn<T> = (bindings: Bindings, pin: Pin) => T;

export type OrderByInput = Expr | readonly (readonly [OrderDirection, Operand])[];

export function schema(name: string): SchemaSource {
  return { kind: 'schema', schema: name, table: null };
}

export function table(name: string): TableSource {
  return { kind: 'table', table: name };
}

/**
 * Wrap a query (or a schema name, meaning "all rows of it") as a subquery source
 */
export function subquery(query: Query | QueryBuilder | string): SubquerySource {
  const inner =
    typeof query === 'string'
      ? from(schema(query), DEFAULT_BINDING_NAME).build()
      : query instanceof QueryBuilder
        ? query.build()
        : query;
  return { kind: 'subquery', subquery: { query: inner, compiled: null } };
}

export function set(fieldName: string, value: Operand): UpdateItem {
  return { operator: 'set', field: fieldName, value: toExpr(value) };
}

export function inc(fieldName: string, value: Operand): UpdateItem {
  return { operator: 'inc', field: fieldName, value: toExpr(value) };
}

export function from(source: Source | QueryBuilder | Query, as: string = DEFAULT_BINDING_NAME): QueryBuilder {
  const resolved: Source =
    source instanceof QueryBuilder || !('kind' in source) ? subquery(source) : source;

  return new QueryBuilder({
    from: { source: resolved, as },
    joins: [],
    wheres: [],
    groupBys: [],
    havings: [],
    orderBys: [],
    select: null,
    limit: null,
    offset: null,
    distinct: false,
    updates: [],
    preloads: [],
  });
}

/**
 * Run a clause callback, collecting the params it pins
 */
function clause<T>(names: readonly string[], fn: ClauseFn<T>): QueryExpr<T> {
  const params: Param[] = [];
  const pin: Pin = (value, type) => {
    params.push(type === undefined ? { value } : { value, type });
    return { type: 'param', index: params.length - 1 };
  };
  const bindings: Record<string, BindingRef> = {};
  names.forEach((name, index) => {
    bindings[name] = new BindingRef(index, name);
  });

  const expr = fn(bindings, pin);
  return { expr, params, paramOffset: 0 };
}

export class QueryBuilder {
  constructor(private readonly query: Query) {}

  private get names(): string[] {
    return [this.query.from.as, ...this.query.joins.map((join) => join.as)];
  }

  private with(changes: Partial<Query>): QueryBuilder {
    return new QueryBuilder({ ...this.query, ...changes });
  }

  private bindingIndex(name: string): number {
    const index = this.names.indexOf(name);
    if (index === -1) {
      throw new Error(`Unknown binding '${name}'`);
    }
    return index;
  }

  private assertNewBinding(as: string): void {
    if (this.names.includes(as)) {
      throw new Error(`Binding '${as}' is already in use`);
    }
  }

  /**
   * Join a source. Without `on`, the join condition is `true`.
   */
  join(
    qual: JoinQualifier,
    source: Source | QueryBuilder,
    as: string,
    on?: ClauseFn<Operand>
  ): QueryBuilder {
    this.assertNewBinding(as);
    const resolved = source instanceof QueryBuilder ? subquery(source) : source;
    const names = [...this.names, as];
    const onExpr = clause(names, (bindings, pin) => toExpr(on ? on(bindings, pin) : true));

    return this.with({
      joins: [
        ...this.query.joins,
        { qual, source: resolved, assoc: null, on: onExpr, as, ix: names.length - 1 },
      ],
    });
  }

  /**
   * Join an association of an existing binding (`join c in assoc(p, :comments)`)
   */
  joinAssoc(
    qual: JoinQualifier,
    parent: string,
    association: string,
    as: string,
    on?: ClauseFn<Operand>
  ): QueryBuilder {
    this.assertNewBinding(as);
    const parentIndex = this.bindingIndex(parent);
    const names = [...this.names, as];
    const onExpr = clause(names, (bindings, pin) => toExpr(on ? on(bindings, pin) : true));

    return this.with({
      joins: [
        ...this.query.joins,
        {
          qual,
          source: null,
          assoc: { parent: parentIndex, name: association },
          on: onExpr,
          as,
          ix: names.length - 1,
        },
      ],
    });
  }

  where(fn: ClauseFn<Operand>): QueryBuilder {
    return this.with({ wheres: [...this.query.wheres, this.booleanClause('and', fn)] });
  }

  orWhere(fn: ClauseFn<Operand>): QueryBuilder {
    return this.with({ wheres: [...this.query.wheres, this.booleanClause('or', fn)] });
  }

  having(fn: ClauseFn<Operand>): QueryBuilder {
    return this.with({ havings: [...this.query.havings, this.booleanClause('and', fn)] });
  }

  orHaving(fn: ClauseFn<Operand>): QueryBuilder {
    return this.with({ havings: [...this.query.havings, this.booleanClause('or', fn)] });
  }

  /**
   * Select clause; a query has at most one
   */
  select(fn: ClauseFn<Operand>): QueryBuilder {
    if (this.query.select) {
      throw new Error('Only one select expression is allowed in query');
    }
    const expr = clause(this.names, (bindings, pin) => toExpr(fn(bindings, pin)));
    const select: SelectExpr = { ...expr, fields: null };
    return this.with({ select });
  }

  /**
   * Order by; a bare expression sorts ascending
   */
  orderBy(fn: ClauseFn<OrderByInput>): QueryBuilder {
    const expr = clause(this.names, (bindings, pin): readonly OrderByItem[] => {
      const input = fn(bindings, pin);
      if (isOrderByList(input)) {
        return input.map(([direction, value]) => ({ direction, expr: toExpr(value) }));
      }
      return [{ direction: 'asc', expr: input }];
    });
    return this.with({ orderBys: [...this.query.orderBys, expr] });
  }

  groupBy(fn: ClauseFn<readonly Operand[]>): QueryBuilder {
    const expr = clause(this.names, (bindings, pin) => fn(bindings, pin).map(toExpr));
    return this.with({ groupBys: [...this.query.groupBys, expr] });
  }

  limit(value: number | ClauseFn<Operand>): QueryBuilder {
    return this.with({ limit: this.scalarClause(value) });
  }

  offset(value: number | ClauseFn<Operand>): QueryBuilder {
    return this.with({ offset: this.scalarClause(value) });
  }

  distinct(value = true): QueryBuilder {
    return this.with({ distinct: value });
  }

  /**
   * Preload an association path, optionally from a join binding
   */
  preload(path: string | readonly string[], joinBinding?: string): QueryBuilder {
    const segments = typeof path === 'string' ? [path] : [...path];
    const bindingIndex = joinBinding === undefined ? null : this.bindingIndex(joinBinding);
    return this.with({
      preloads: [...this.query.preloads, { path: segments, binding: bindingIndex }],
    });
  }

  /**
   * Update clause for `update_all` (`update: [set: [title: nil]]`)
   */
  update(fn: ClauseFn<readonly UpdateItem[]>): QueryBuilder {
    const expr = clause(this.names, fn);
    return this.with({ updates: [...this.query.updates, expr] });
  }

  build(): Query {
    return this.query;
  }

  private booleanClause(op: 'and' | 'or', fn: ClauseFn<Operand>): BooleanExpr {
    return { ...clause(this.names, (bindings, pin) => toExpr(fn(bindings, pin))), op };
  }

  private scalarClause(value: number | ClauseFn<Operand>): QueryExpr {
    if (typeof value === 'number') {
      return { expr: toExpr(value), params: [], paramOffset: 0 };
    }
    return clause(this.names, (bindings, pin) => toExpr(value(bindings, pin)));
  }
}

function isOrderByList(input: OrderByInput): input is readonly (readonly [OrderDirection, Operand])[] {
  return Array.isArray(input);
}
