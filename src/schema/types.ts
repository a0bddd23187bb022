/**
 * Schema Resolver Type Definitions
 *
 * The planner never owns schema metadata; it reads it through a
 * SchemaResolver supplied by the caller.
 */

import type { FieldType } from '../types/index.js';

export interface FieldInfo {
  readonly name: string;
  readonly type: FieldType;
  /** Column name in storage */
  readonly source: string;
  /** Virtual fields exist on the entity but never in storage */
  readonly virtual: boolean;
}

export type AssociationCardinality = 'belongs_to' | 'has_many' | 'has_one';

export interface AssociationSpec {
  readonly name: string;
  readonly cardinality: AssociationCardinality;
  /** Schema the association points to */
  readonly related: string;
  /** Field on the owner side of the join condition */
  readonly ownerKey: string;
  /** Field on the related side of the join condition */
  readonly relatedKey: string;
}

/**
 * Read-only schema metadata lookups. Every lookup may fail, reported
 * as `null` rather than thrown.
 */
export interface SchemaResolver {
  /** Storage table for a schema */
  source(schema: string): string | null;

  /** Non-virtual fields in declaration order, primary key first */
  fields(schema: string): readonly FieldInfo[] | null;

  /** Any field, including virtual ones */
  field(schema: string, name: string): FieldInfo | null;

  primaryKey(schema: string): string | null;

  association(schema: string, name: string): AssociationSpec | null;
}
