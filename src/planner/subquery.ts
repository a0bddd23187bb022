/**
 * Subquery Compiler
 *
 * Compiles the inner query of a subquery source into a sealed unit: the
 * prepared query with a canonical select, its cast parameters, the shape
 * it exposes and its cache key. Failures come back as a result value so
 * the enclosing prepare can wrap them with the outer query.
 */

import {
  CompileError,
  IllegalPreloadInSubqueryError,
  IllegalUpdateInSubqueryError,
  SubQueryError,
} from '../errors/index.js';
import { renderQuery } from '../query/inspect.js';
import type { CompiledSubquery, Query, Subquery } from '../query/types.js';
import type { Result } from '../utils/result.js';
import type { PlanContext } from './context.js';
import { compiledOf, queryContext } from './context.js';
import { normalize } from './normalize.js';
import { prepare } from './prepare.js';
import { compileSubquerySelect } from './select.js';

export function compileSubquery(
  subquery: Subquery,
  context: PlanContext
): Result<CompiledSubquery, CompileError> {
  if (subquery.compiled) {
    return { ok: true, value: subquery.compiled };
  }

  try {
    return { ok: true, value: compileInner(subquery.query, context) };
  } catch (error) {
    if (error instanceof CompileError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function compileInner(inner: Query, context: PlanContext): CompiledSubquery {
  if (inner.updates.length > 0) {
    throw new IllegalUpdateInSubqueryError(queryContext(inner));
  }
  if (inner.preloads.length > 0) {
    throw new IllegalPreloadInSubqueryError(queryContext(inner));
  }

  const prepared = prepare(inner, 'all', context, 0);
  const select = compileSubquerySelect(prepared.query, context);

  const query: Query = {
    ...prepared.query,
    select: {
      expr: select.expr,
      params: prepared.query.select?.params ?? [],
      paramOffset: prepared.query.select?.paramOffset ?? 0,
      fields: null,
    },
  };

  if (context.debug) {
    context.logger.debug(
      `[planner] compiled subquery exposing ${select.shape.kind} of ${select.shape.fields.length} field(s)`,
      { params: prepared.params.length }
    );
  }

  return {
    query,
    params: prepared.params,
    shape: select.shape,
    cacheKey: prepared.cacheKey,
  };
}

/**
 * Raise a subquery failure against the query it was found in
 */
export function subqueryError(error: CompileError, outer: Query): SubQueryError {
  return new SubQueryError(error, renderQuery(outer));
}

/**
 * Renumber a compiled subquery for attachment at a global offset. The
 * original inner query is kept as built.
 */
export function normalizeSubquery(
  subquery: Subquery,
  offset: number,
  context: PlanContext
): Subquery {
  const compiled = compiledOf(subquery);
  return {
    query: subquery.query,
    compiled: { ...compiled, query: normalize(compiled.query, 'all', context, offset) },
  };
}
