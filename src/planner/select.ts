/**
 * Select Compiler
 *
 * Turns the select of a subquery into the shape it exposes to the outer
 * query (row, map or struct) and rewrites it into a canonical map or
 * struct literal of the exposed fields.
 */

import {
  IllegalMergeTargetError,
  InvalidMapKeyError,
  UnsupportedSubquerySelectError,
} from '../errors/index.js';
import { binding, field, lit } from '../query/expr.js';
import { bindingNames, renderExpr } from '../query/inspect.js';
import type { Expr, MapEntry, Param, Query, SelectShape, ShapeField } from '../query/types.js';
import { literalType } from '../types/index.js';
import type { FieldType } from '../types/index.js';
import type { PlanContext } from './context.js';
import { compiledOf, fieldType, queryContext, schemaFields, sourceAt } from './context.js';

/**
 * Field exposed by a select, with the expression feeding it
 */
interface SelectEntry {
  readonly name: string;
  readonly expr: Expr;
  readonly type: FieldType;
}

type CompiledSelect =
  | { readonly kind: 'row' | 'struct'; readonly schema: string; readonly entries: readonly SelectEntry[] }
  | { readonly kind: 'map'; readonly entries: readonly SelectEntry[] };

export interface SubquerySelect {
  /** Canonical map/struct literal */
  readonly expr: Expr;
  readonly shape: SelectShape;
}

/**
 * Compile the select of a prepared subquery. Without a select, the
 * subquery selects its `from` source.
 */
export function compileSubquerySelect(query: Query, context: PlanContext): SubquerySelect {
  const compiler = new SelectCompiler(query, query.select?.params ?? [], context);
  const compiled = compiler.compile(query.select?.expr ?? binding(0));
  return { expr: canonicalExpr(compiled), shape: toShape(compiled) };
}

function canonicalExpr(compiled: CompiledSelect): Expr {
  const entries: MapEntry[] = compiled.entries.map((entry) => ({ key: entry.name, value: entry.expr }));
  return compiled.kind === 'map'
    ? { type: 'map', entries }
    : { type: 'struct', schema: compiled.schema, entries };
}

function toShape(compiled: CompiledSelect): SelectShape {
  const fields: ShapeField[] = compiled.entries.map(({ name, type }) => ({ name, type }));
  switch (compiled.kind) {
    case 'row':
      return { kind: 'row', schema: compiled.schema, fields };
    case 'struct':
      return { kind: 'struct', schema: compiled.schema, fields };
    case 'map':
      return { kind: 'map', fields };
    default: {
      const _exhaustive: never = compiled;
      throw new Error(`Unknown select kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Replace entries by name, appending names not present yet
 */
function mergeEntries(
  base: readonly SelectEntry[],
  overrides: readonly SelectEntry[]
): SelectEntry[] {
  const merged = [...base];
  for (const entry of overrides) {
    const position = merged.findIndex((existing) => existing.name === entry.name);
    if (position === -1) {
      merged.push(entry);
    } else {
      merged[position] = entry;
    }
  }
  return merged;
}

class SelectCompiler {
  private readonly names: readonly string[];

  constructor(
    private readonly query: Query,
    private readonly params: readonly Param[],
    private readonly context: PlanContext
  ) {
    this.names = bindingNames(query);
  }

  compile(expr: Expr): CompiledSelect {
    switch (expr.type) {
      case 'binding':
        return this.compileBinding(expr.index);

      case 'field':
        return {
          kind: 'map',
          entries: [{ name: expr.name, expr, type: this.valueType(expr) }],
        };

      case 'map':
        return { kind: 'map', entries: mergeEntries([], this.atomEntries(expr.entries)) };

      case 'struct':
        return this.compileStruct(expr.schema, expr.entries);

      case 'map_update':
        return this.compileMapUpdate(expr.base, expr.entries);

      case 'merge':
        return this.compileMerge(this.compile(expr.left), this.compile(expr.right));

      default:
        throw new UnsupportedSubquerySelectError(this.render(expr), queryContext(this.query));
    }
  }

  /**
   * A whole source: its schema fields, or what a subquery source exposes
   */
  private compileBinding(index: number): CompiledSelect {
    const source = sourceAt(this.query, index);

    switch (source.kind) {
      case 'schema':
        return {
          kind: 'row',
          schema: source.schema,
          entries: schemaFields(source.schema, this.query, this.context).map((info) => ({
            name: info.name,
            expr: field(index, info.name),
            type: info.type,
          })),
        };

      case 'subquery': {
        const shape = compiledOf(source.subquery).shape;
        const entries = shape.fields.map((shapeField) => ({
          name: shapeField.name,
          expr: field(index, shapeField.name),
          type: shapeField.type,
        }));
        return shape.kind === 'map'
          ? { kind: 'map', entries }
          : { kind: shape.kind, schema: shape.schema, entries };
      }

      case 'table':
        // A schemaless table exposes no known fields
        throw new UnsupportedSubquerySelectError(
          this.render(binding(index)),
          queryContext(this.query)
        );

      default: {
        const _exhaustive: never = source;
        throw new Error(`Unknown source kind: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  /**
   * Struct literal: the full field set of the schema, explicit entries
   * substituted, the rest read through from the first binding of that
   * schema (or nil when the query has none)
   */
  private compileStruct(schema: string, entries: readonly MapEntry[]): CompiledSelect {
    const fields = schemaFields(schema, this.query, this.context);
    const explicit = new Map(this.atomEntries(entries).map((entry) => [entry.name, entry]));

    for (const name of explicit.keys()) {
      if (!fields.some((info) => info.name === name)) {
        throw new InvalidMapKeyError(
          name,
          `invalid key \`:${name}\` for struct ${schema} in subquery`,
          queryContext(this.query)
        );
      }
    }

    const readThrough = this.bindingOfSchema(schema);

    return {
      kind: 'struct',
      schema,
      entries: fields.map((info) => ({
        name: info.name,
        expr:
          explicit.get(info.name)?.expr ??
          (readThrough === -1 ? lit(null) : field(readThrough, info.name)),
        type: info.type,
      })),
    };
  }

  /**
   * `%{p | key: value}`: the base must be a bound source, keys must be
   * fields it exposes
   */
  private compileMapUpdate(base: Expr, entries: readonly MapEntry[]): CompiledSelect {
    if (base.type !== 'binding') {
      throw new UnsupportedSubquerySelectError(this.render(base), queryContext(this.query));
    }

    const compiled = this.compileBinding(base.index);

    // Updated fields keep the type the source declares for them
    const updates = this.atomEntries(entries).map((update) => {
      const existing = compiled.entries.find((entry) => entry.name === update.name);
      if (!existing) {
        throw new InvalidMapKeyError(
          update.name,
          `invalid key \`:${update.name}\` on map update in subquery`,
          queryContext(this.query)
        );
      }
      return compiled.kind === 'map' ? update : { ...update, type: existing.type };
    });

    const merged = mergeEntries(compiled.entries, updates);
    return compiled.kind === 'map'
      ? { kind: 'map', entries: merged }
      : { kind: 'struct', schema: compiled.schema, entries: merged };
  }

  /**
   * Key union, right side wins. A map cannot absorb a struct and structs
   * of different schemas cannot be combined.
   */
  private compileMerge(left: CompiledSelect, right: CompiledSelect): CompiledSelect {
    if (left.kind === 'map') {
      if (right.kind !== 'map') {
        throw new IllegalMergeTargetError(
          `cannot merge because the left side is a map and the right side is a ${right.schema} struct`,
          queryContext(this.query)
        );
      }
      return { kind: 'map', entries: mergeEntries(left.entries, right.entries) };
    }

    if (right.kind !== 'map' && right.schema !== left.schema) {
      throw new IllegalMergeTargetError(
        `cannot merge because the left side is a ${left.schema} struct and the right side is a ${right.schema} struct`,
        queryContext(this.query)
      );
    }

    return {
      kind: 'struct',
      schema: left.schema,
      entries: mergeEntries(left.entries, right.entries),
    };
  }

  /**
   * Entries of a map literal; every key must be an atom
   */
  private atomEntries(entries: readonly MapEntry[]): SelectEntry[] {
    return entries.map(({ key, value }) => {
      if (typeof key !== 'string') {
        const rendered = this.render(key);
        throw new InvalidMapKeyError(
          rendered,
          `only atom keys are allowed in maps in subquery, got: \`${rendered}\``,
          queryContext(this.query)
        );
      }
      return { name: key, expr: value, type: this.valueType(value) };
    });
  }

  private valueType(expr: Expr): FieldType {
    switch (expr.type) {
      case 'field':
        return fieldType(this.query, expr.index, expr.name, 'select', this.context);
      case 'param':
        return this.params[expr.index]?.type ?? 'any';
      case 'literal':
        return literalType(expr.value);
      default:
        return 'any';
    }
  }

  private bindingOfSchema(schema: string): number {
    return this.names.findIndex((_name, index) => {
      const source = sourceAt(this.query, index);
      return source.kind === 'schema' && source.schema === schema;
    });
  }

  private render(expr: Expr): string {
    return renderExpr(expr, { names: this.names, params: this.params });
  }
}
