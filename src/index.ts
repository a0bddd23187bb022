/**
 * nestplan
 *
 * A strongly-typed query planner: composes queries with nested
 * subqueries and compiles them into validated, parameter-indexed,
 * field-resolved plans.
 */

// Export planner
export {
  Planner,
  createContext,
  prepare,
  normalize,
  validateOperation,
  compileSubquery,
  normalizeSubquery,
  compileSubquerySelect,
  buildCacheKey,
  cacheKeyFingerprint,
  TRAVERSAL_ORDER,
} from './planner/index.js';
export type {
  QueryPlan,
  PlanContext,
  PlannerOptions,
  PreparedQuery,
  SubquerySelect,
  ClauseSlot,
} from './planner/index.js';

// Export query building
export { from, schema, table, subquery, set, inc, QueryBuilder, BindingRef } from './query/builder.js';
export type { Bindings, Pin, ClauseFn, OrderByInput } from './query/builder.js';
export * from './query/expr.js';
export { renderExpr, renderQuery, renderSource, bindingNames } from './query/inspect.js';
export type { RenderContext } from './query/inspect.js';
export { mapExpr, shiftParams } from './query/walk.js';
export type * from './query/types.js';

// Export schemas
export {
  defineSchema,
  belongsTo,
  hasMany,
  hasOne,
  underscore,
  StaticSchemaResolver,
} from './schema/index.js';
export type {
  Schema,
  SchemaDefinition,
  FieldDefinition,
  FieldOptions,
  AssociationDefinition,
  AssociationCardinality,
  AssociationSpec,
  FieldInfo,
  SchemaResolver,
} from './schema/index.js';
export { SqliteSchemaResolver } from './schema/sqlite.js';
export type { ForeignKeyInfo, SqliteSchemaResolverOptions } from './schema/sqlite.js';

// Export types
export {
  castValue,
  dumpValue,
  typeName,
  baseType,
  literalType,
  isArrayType,
  isCustomType,
  isPrimitiveType,
} from './types/index.js';
export type { FieldType, PrimitiveType, ArrayType, CustomType, CastResult } from './types/index.js';

// Export adapters
export { passthroughAdapter, sqliteAdapter } from './adapter/index.js';
export type { PlannerAdapter } from './adapter/index.js';

// Export errors
export * from './errors/index.js';

// Export logging
export { consoleLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export type { Result } from './utils/result.js';
