/**
 * Planning Context
 *
 * Collaborators shared by every stage of a compilation, and the lookups
 * that resolve source positions and field types against them.
 */

import { passthroughAdapter } from '../adapter/index.js';
import type { PlannerAdapter } from '../adapter/index.js';
import {
  UnknownBindingError,
  UnknownFieldError,
  UnknownFieldInSubqueryError,
  UnknownSchemaError,
  VirtualFieldError,
} from '../errors/index.js';
import { renderQuery } from '../query/inspect.js';
import type { CompiledSubquery, Query, Source, Subquery } from '../query/types.js';
import type { FieldInfo, SchemaResolver } from '../schema/types.js';
import type { FieldType } from '../types/index.js';
import { consoleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

/**
 * Planner configuration
 */
export interface PlannerOptions {
  readonly resolver: SchemaResolver;
  /** Value dumping of the target storage (default: passthrough) */
  readonly adapter?: PlannerAdapter;
  /** Default: console */
  readonly logger?: Logger;
  /** Log a debug line per prepared query and compiled subquery */
  readonly debug?: boolean;
}

export interface PlanContext {
  readonly resolver: SchemaResolver;
  readonly adapter: PlannerAdapter;
  readonly logger: Logger;
  readonly debug: boolean;
}

export function createContext(options: PlannerOptions): PlanContext {
  return {
    resolver: options.resolver,
    adapter: options.adapter ?? passthroughAdapter,
    logger: options.logger ?? consoleLogger,
    debug: options.debug ?? false,
  };
}

/**
 * Error context rendering the query being compiled
 */
export function queryContext(query: Query): { query: string } {
  return { query: renderQuery(query) };
}

/**
 * Source at an arena position (0 = from, i = join i-1)
 */
export function sourceAt(query: Query, index: number): Source {
  const source = index === 0 ? query.from.source : query.joins[index - 1]?.source;
  if (!source) {
    throw new UnknownBindingError(index, queryContext(query));
  }
  return source;
}

/**
 * Compiled form of a subquery source; prepare compiles every subquery
 * before anything looks one up
 */
export function compiledOf(subquery: Subquery): CompiledSubquery {
  if (!subquery.compiled) {
    throw new Error('Subquery has not been compiled, prepare the enclosing query first');
  }
  return subquery.compiled;
}

/**
 * Non-virtual fields of a schema, failing for unknown schemas
 */
export function schemaFields(schema: string, query: Query, context: PlanContext): readonly FieldInfo[] {
  const fields = context.resolver.fields(schema);
  if (!fields) {
    throw new UnknownSchemaError(schema, queryContext(query));
  }
  return fields;
}

/**
 * Type of `binding.field`, validating that the field exists
 *
 * Schemaless tables accept any field as `any`; subquery sources answer
 * from their cached shape.
 */
export function fieldType(
  query: Query,
  index: number,
  name: string,
  clause: string,
  context: PlanContext
): FieldType {
  const source = sourceAt(query, index);

  switch (source.kind) {
    case 'table':
      return 'any';
    case 'schema': {
      const info = context.resolver.field(source.schema, name);
      if (!info) {
        throw new UnknownFieldError(name, source.schema, clause, queryContext(query));
      }
      if (info.virtual) {
        throw new VirtualFieldError(name, source.schema, clause, queryContext(query));
      }
      return info.type;
    }
    case 'subquery': {
      const found = compiledOf(source.subquery).shape.fields.find(
        (shapeField) => shapeField.name === name
      );
      if (!found) {
        throw new UnknownFieldInSubqueryError(name, queryContext(query));
      }
      return found.type;
    }
    default: {
      const _exhaustive: never = source;
      throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
