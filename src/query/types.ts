/**
 * AST Type Definitions for nestplan queries
 *
 * A query is an immutable tree. Sources live in an arena indexed 0..n-1
 * (0 is `from`, i is join i-1) and every expression that touches a source
 * stores that numeric index instead of a reference.
 */

import type { FieldType } from '../types/index.js';

/**
 * Operation a query is planned for
 */
export type Operation = 'all' | 'update_all' | 'delete_all' | 'insert_all';

/**
 * Comparison and arithmetic operators
 */
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type ArithmeticOperator = '+' | '-' | '*' | '/';

/**
 * Expression nodes
 */
export type Expr =
  | BindingExpr
  | FieldExpr
  | LiteralExpr
  | ParamExpr
  | ComparisonExpr
  | ArithmeticExpr
  | LogicalExpr
  | NotExpr
  | IsNilExpr
  | InExpr
  | FragmentExpr
  | ListExpr
  | MapExpr
  | StructExpr
  | MapUpdateExpr
  | MergeExpr
  | SubsetExpr;

/** The whole row bound at a source position (`p`) */
export type BindingExpr = {
  readonly type: 'binding';
  readonly index: number;
};

/** Field access on a bound source (`p.title`) */
export type FieldExpr = {
  readonly type: 'field';
  readonly index: number;
  readonly name: string;
};

export type LiteralValue = string | number | boolean | null;

export type LiteralExpr = {
  readonly type: 'literal';
  readonly value: LiteralValue;
};

/**
 * Parameter placeholder (`^value`). The index is local to the clause that
 * owns it until normalization, where it becomes the position in the flat
 * parameter list.
 */
export type ParamExpr = {
  readonly type: 'param';
  readonly index: number;
};

export type ComparisonExpr = {
  readonly type: 'compare';
  readonly operator: ComparisonOperator;
  readonly left: Expr;
  readonly right: Expr;
};

export type ArithmeticExpr = {
  readonly type: 'arithmetic';
  readonly operator: ArithmeticOperator;
  readonly left: Expr;
  readonly right: Expr;
};

export type LogicalExpr = {
  readonly type: 'and' | 'or';
  readonly conditions: readonly Expr[];
};

export type NotExpr = {
  readonly type: 'not';
  readonly expr: Expr;
};

export type IsNilExpr = {
  readonly type: 'is_nil';
  readonly expr: Expr;
};

/** `left in right`, where right is a list or a single param holding a list */
export type InExpr = {
  readonly type: 'in';
  readonly left: Expr;
  readonly right: Expr;
};

/** Raw adapter-specific expression with `?` placeholders */
export type FragmentExpr = {
  readonly type: 'fragment';
  readonly parts: readonly string[];
  readonly args: readonly Expr[];
};

export type ListExpr = {
  readonly type: 'list';
  readonly items: readonly Expr[];
};

/**
 * Map literal. Keys are either atoms (plain field names) or arbitrary
 * expressions; only atom keys are selectable in subqueries.
 */
export type MapKey = string | Expr;

export type MapEntry = {
  readonly key: MapKey;
  readonly value: Expr;
};

export type MapExpr = {
  readonly type: 'map';
  readonly entries: readonly MapEntry[];
};

/** Struct literal (`%Post{text: p.text}`) */
export type StructExpr = {
  readonly type: 'struct';
  readonly schema: string;
  readonly entries: readonly MapEntry[];
};

/** Map update (`%{p | text: p.title}`) */
export type MapUpdateExpr = {
  readonly type: 'map_update';
  readonly base: Expr;
  readonly entries: readonly MapEntry[];
};

export type MergeExpr = {
  readonly type: 'merge';
  readonly left: Expr;
  readonly right: Expr;
};

/** Subset of a bound source (`struct(p, [:title])` or `map(p, [:title])`) */
export type SubsetExpr = {
  readonly type: 'subset';
  readonly kind: 'struct' | 'map';
  readonly index: number;
  readonly fields: readonly string[];
};

/**
 * A pinned value owned by a clause
 */
export type Param = {
  readonly value: unknown;
  /** Explicit type given when pinning; otherwise inferred from context */
  readonly type?: FieldType;
};

/**
 * Clause expression with its own parameters
 */
export type QueryExpr<T = Expr> = {
  readonly expr: T;
  readonly params: readonly Param[];
  /** First global parameter index of this clause, 0 until normalized */
  readonly paramOffset: number;
};

export type BooleanExpr = QueryExpr & {
  readonly op: 'and' | 'or';
};

export type OrderDirection = 'asc' | 'desc';

export type OrderByItem = {
  readonly direction: OrderDirection;
  readonly expr: Expr;
};

export type UpdateOperator = 'set' | 'inc';

export type UpdateItem = {
  readonly operator: UpdateOperator;
  readonly field: string;
  readonly value: Expr;
};

export type SelectExpr = QueryExpr & {
  /** Expanded field list, filled in by normalization */
  readonly fields: readonly Expr[] | null;
};

/**
 * Sources
 */
export type Source = TableSource | SchemaSource | SubquerySource;

/** Schemaless table (`from p in "posts"`) */
export type TableSource = {
  readonly kind: 'table';
  readonly table: string;
};

/** Schema-backed source; `table` is filled in by prepare */
export type SchemaSource = {
  readonly kind: 'schema';
  readonly schema: string;
  readonly table: string | null;
};

export type SubquerySource = {
  readonly kind: 'subquery';
  readonly subquery: Subquery;
};

export type FromExpr = {
  readonly source: Source;
  /** Binding name used for rendering */
  readonly as: string;
};

export type JoinQualifier = 'inner' | 'left' | 'right' | 'full' | 'cross';

/** Association reference resolved by prepare */
export type AssocRef = {
  readonly parent: number;
  readonly name: string;
};

export type JoinExpr = {
  readonly qual: JoinQualifier;
  readonly source: Source | null;
  readonly assoc: AssocRef | null;
  readonly on: QueryExpr;
  readonly as: string;
  /** Source position of this join (1 + position in `joins`) */
  readonly ix: number;
};

/** Preload of an association path, optionally fed by a join binding */
export type PreloadExpr = {
  readonly path: readonly string[];
  readonly binding: number | null;
};

/**
 * Root query node
 */
export type Query = {
  readonly from: FromExpr;
  readonly joins: readonly JoinExpr[];
  readonly wheres: readonly BooleanExpr[];
  readonly groupBys: readonly QueryExpr<readonly Expr[]>[];
  readonly havings: readonly BooleanExpr[];
  readonly orderBys: readonly QueryExpr<readonly OrderByItem[]>[];
  readonly select: SelectExpr | null;
  readonly limit: QueryExpr | null;
  readonly offset: QueryExpr | null;
  readonly distinct: boolean;
  readonly updates: readonly QueryExpr<readonly UpdateItem[]>[];
  readonly preloads: readonly PreloadExpr[];
};

/**
 * Output shape of a select
 */
export type SelectShape = RowShape | MapShape | StructShape;

export type ShapeField = {
  readonly name: string;
  readonly type: FieldType;
};

/** Whole schema entity */
export type RowShape = {
  readonly kind: 'row';
  readonly schema: string;
  readonly fields: readonly ShapeField[];
};

export type MapShape = {
  readonly kind: 'map';
  readonly fields: readonly ShapeField[];
};

export type StructShape = {
  readonly kind: 'struct';
  readonly schema: string;
  readonly fields: readonly ShapeField[];
};

/**
 * Structural fingerprint of a prepared query
 */
export type CacheKey = readonly CacheKeyPart[];
export type CacheKeyPart = string | number | boolean | null | readonly CacheKeyPart[];

/**
 * Sealed result of compiling a subquery. The inner query keeps
 * clause-relative parameter indices; offsets are applied on attachment.
 */
export type CompiledSubquery = {
  readonly query: Query;
  readonly params: readonly unknown[];
  readonly shape: SelectShape;
  readonly cacheKey: CacheKey;
};

export type Subquery = {
  readonly query: Query;
  readonly compiled: CompiledSubquery | null;
};
