/**
 * Static Schemas
 *
 * Declares schemas in code and serves them through the SchemaResolver
 * interface.
 *
 * Example:
 *   const Post = defineSchema({
 *     name: 'Post',
 *     source: 'posts',
 *     fields: { title: { type: 'string', source: 'post_title' }, text: 'string' },
 *     associations: { comments: hasMany('Comment') },
 *   });
 */

import { DEFAULT_PRIMARY_KEY, DEFAULT_PRIMARY_KEY_TYPE } from '../utils/constants.js';
import type { FieldType } from '../types/index.js';
import type { AssociationSpec, FieldInfo, SchemaResolver } from './types.js';

export type { AssociationCardinality, AssociationSpec, FieldInfo, SchemaResolver } from './types.js';

export interface FieldOptions {
  readonly type: FieldType;
  readonly source?: string;
  readonly virtual?: boolean;
}

export type FieldDefinition = FieldType | FieldOptions;

/**
 * Association declared on a schema, resolved against the owner on definition
 */
export interface AssociationDefinition {
  readonly cardinality: AssociationSpec['cardinality'];
  readonly related: string;
  readonly foreignKey?: string;
  readonly references?: string;
}

export interface SchemaDefinition {
  readonly name: string;
  readonly source: string;
  /** `false` for schemas without a primary key */
  readonly primaryKey?: false | { readonly name: string; readonly type: FieldType };
  readonly fields: Readonly<Record<string, FieldDefinition>>;
  readonly associations?: Readonly<Record<string, AssociationDefinition>>;
}

export interface Schema {
  readonly name: string;
  readonly source: string;
  readonly primaryKey: string | null;
  /** All fields, virtual included, in declaration order */
  readonly fields: readonly FieldInfo[];
  readonly associations: ReadonlyMap<string, AssociationSpec>;
}

export function belongsTo(
  related: string,
  options: { foreignKey?: string; references?: string } = {}
): AssociationDefinition {
  return { cardinality: 'belongs_to', related, ...options };
}

export function hasMany(
  related: string,
  options: { foreignKey?: string; references?: string } = {}
): AssociationDefinition {
  return { cardinality: 'has_many', related, ...options };
}

export function hasOne(
  related: string,
  options: { foreignKey?: string; references?: string } = {}
): AssociationDefinition {
  return { cardinality: 'has_one', related, ...options };
}

/**
 * Convert a schema name to its underscored form (BlogPost → blog_post)
 */
export function underscore(name: string): string {
  return name
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

function isFieldOptions(definition: FieldDefinition): definition is FieldOptions {
  return typeof definition === 'object' && 'type' in definition;
}

/**
 * Build a schema from its definition
 *
 * Field order: primary key, declared fields, then one foreign key field
 * per `belongsTo` association.
 */
export function defineSchema(definition: SchemaDefinition): Schema {
  const fields: FieldInfo[] = [];
  const seen = new Set<string>();

  const addField = (name: string, field: FieldDefinition): void => {
    if (seen.has(name)) {
      throw new Error(`Field '${name}' is defined more than once on schema ${definition.name}`);
    }
    seen.add(name);
    const options: FieldOptions = isFieldOptions(field) ? field : { type: field };
    fields.push({
      name,
      type: options.type,
      source: options.source ?? name,
      virtual: options.virtual ?? false,
    });
  };

  const primaryKey =
    definition.primaryKey === false
      ? null
      : definition.primaryKey ?? { name: DEFAULT_PRIMARY_KEY, type: DEFAULT_PRIMARY_KEY_TYPE };

  if (primaryKey) {
    addField(primaryKey.name, primaryKey.type);
  }

  for (const [name, field] of Object.entries(definition.fields)) {
    addField(name, field);
  }

  const associations = new Map<string, AssociationSpec>();
  const ownerPrimaryKey = primaryKey?.name ?? DEFAULT_PRIMARY_KEY;

  for (const [name, assoc] of Object.entries(definition.associations ?? {})) {
    if (assoc.cardinality === 'belongs_to') {
      const foreignKey = assoc.foreignKey ?? `${name}_id`;
      if (!seen.has(foreignKey)) {
        addField(foreignKey, DEFAULT_PRIMARY_KEY_TYPE);
      }
      associations.set(name, {
        name,
        cardinality: 'belongs_to',
        related: assoc.related,
        ownerKey: foreignKey,
        relatedKey: assoc.references ?? DEFAULT_PRIMARY_KEY,
      });
    } else {
      associations.set(name, {
        name,
        cardinality: assoc.cardinality,
        related: assoc.related,
        ownerKey: assoc.references ?? ownerPrimaryKey,
        relatedKey: assoc.foreignKey ?? `${underscore(definition.name)}_id`,
      });
    }
  }

  return {
    name: definition.name,
    source: definition.source,
    primaryKey: primaryKey?.name ?? null,
    fields,
    associations,
  };
}

/**
 * SchemaResolver over schemas declared with defineSchema
 */
export class StaticSchemaResolver implements SchemaResolver {
  private readonly schemas = new Map<string, Schema>();

  constructor(schemas: readonly Schema[] = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  register(schema: Schema): this {
    this.schemas.set(schema.name, schema);
    return this;
  }

  get(schema: string): Schema | null {
    return this.schemas.get(schema) ?? null;
  }

  source(schema: string): string | null {
    return this.get(schema)?.source ?? null;
  }

  fields(schema: string): readonly FieldInfo[] | null {
    const found = this.get(schema);
    return found ? found.fields.filter((field) => !field.virtual) : null;
  }

  field(schema: string, name: string): FieldInfo | null {
    return this.get(schema)?.fields.find((field) => field.name === name) ?? null;
  }

  primaryKey(schema: string): string | null {
    return this.get(schema)?.primaryKey ?? null;
  }

  association(schema: string, name: string): AssociationSpec | null {
    return this.get(schema)?.associations.get(name) ?? null;
  }
}
