/**
 * Query Planner
 *
 * Compiles a built query into a validated, parameter-indexed,
 * field-resolved plan in two stages: prepare, then normalize.
 */

import type { Operation, Query } from '../query/types.js';
import { DEFAULT_OPERATION, DEFAULT_PARAM_BASE } from '../utils/constants.js';
import { createContext } from './context.js';
import type { PlanContext, PlannerOptions } from './context.js';
import { normalize } from './normalize.js';
import { prepare } from './prepare.js';
import type { PreparedQuery } from './prepare.js';

export interface QueryPlan extends PreparedQuery {
  readonly operation: Operation;
}

/**
 * Main planner class
 */
export class Planner {
  private readonly context: PlanContext;

  constructor(options: PlannerOptions) {
    this.context = createContext(options);
  }

  /**
   * Resolve sources, compile subqueries, cast parameters and compute the
   * cache key
   */
  prepare(
    query: Query,
    operation: Operation = DEFAULT_OPERATION,
    paramBase: number = DEFAULT_PARAM_BASE
  ): PreparedQuery {
    return prepare(query, operation, this.context, paramBase);
  }

  /**
   * Renumber placeholders and expand the select of a prepared query
   */
  normalize(
    query: Query,
    operation: Operation = DEFAULT_OPERATION,
    paramBase: number = DEFAULT_PARAM_BASE
  ): Query {
    return normalize(query, operation, this.context, paramBase);
  }

  /**
   * Prepare and normalize in one step
   */
  plan(
    query: Query,
    operation: Operation = DEFAULT_OPERATION,
    paramBase: number = DEFAULT_PARAM_BASE
  ): QueryPlan {
    const prepared = this.prepare(query, operation, paramBase);
    return {
      ...prepared,
      query: this.normalize(prepared.query, operation, paramBase),
      operation,
    };
  }
}

export { createContext } from './context.js';
export type { PlanContext, PlannerOptions } from './context.js';
export { prepare, validateOperation } from './prepare.js';
export type { PreparedQuery } from './prepare.js';
export { normalize } from './normalize.js';
export { compileSubquery, normalizeSubquery } from './subquery.js';
export { compileSubquerySelect } from './select.js';
export type { SubquerySelect } from './select.js';
export { buildCacheKey, cacheKeyFingerprint } from './cache-key.js';
export { TRAVERSAL_ORDER } from './traversal.js';
export type { ClauseSlot } from './traversal.js';
