/**
 * Schema Introspection for SQLite
 *
 * Reads table structure, columns, and foreign key relationships from a
 * SQLite database and serves them as schemas. Each table becomes a schema
 * named after the table; every foreign key becomes a `belongs_to`
 * association on the referencing table and a `has_many` association on
 * the referenced one.
 */

import type Database from 'better-sqlite3';
import { DEFAULT_PRIMARY_KEY } from '../utils/constants.js';
import { escapeIdentifier } from '../utils/identifier.js';
import { consoleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { PrimitiveType } from '../types/index.js';
import { StaticSchemaResolver } from './index.js';
import type { Schema } from './index.js';
import type { AssociationSpec, FieldInfo, SchemaResolver } from './types.js';

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

interface ForeignKeyRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  to: string | null;
  on_update: string;
  on_delete: string;
  match: string;
}

export interface ForeignKeyInfo {
  readonly fromTable: string;
  readonly fromColumn: string;
  readonly toTable: string;
  readonly toColumn: string;
}

/**
 * Declared SQLite column types mapped by affinity keyword
 */
const TYPE_RULES: ReadonlyArray<readonly [RegExp, PrimitiveType]> = [
  [/BOOL/, 'boolean'],
  [/DATETIME|TIMESTAMP/, 'datetime'],
  [/DATE/, 'date'],
  [/INT/, 'integer'],
  [/CHAR|CLOB|TEXT/, 'string'],
  [/BLOB/, 'binary'],
  [/REAL|FLOA|DOUB/, 'float'],
  [/NUMERIC|DECIMAL/, 'decimal'],
  [/JSON/, 'map'],
];

export interface SqliteSchemaResolverOptions {
  /** Receives introspection warnings (default: console) */
  readonly logger?: Logger;
}

/**
 * Introspect a SQLite database into a SchemaResolver
 *
 * A `belongs_to` association is named after its foreign key column with a
 * trailing `_id` removed, so `post_id` yields `post` while `author_key`
 * stays `author_key`. Pass that name to `joinAssoc`.
 */
export class SqliteSchemaResolver implements SchemaResolver {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly resolver: StaticSchemaResolver;

  constructor(db: Database.Database, options: SqliteSchemaResolverOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? consoleLogger;
    this.resolver = new StaticSchemaResolver(this.introspect());
  }

  source(schema: string): string | null {
    return this.resolver.source(schema);
  }

  fields(schema: string): readonly FieldInfo[] | null {
    return this.resolver.fields(schema);
  }

  field(schema: string, name: string): FieldInfo | null {
    return this.resolver.field(schema, name);
  }

  primaryKey(schema: string): string | null {
    return this.resolver.primaryKey(schema);
  }

  association(schema: string, name: string): AssociationSpec | null {
    return this.resolver.association(schema, name);
  }

  /**
   * Read complete database schema
   */
  private introspect(): Schema[] {
    const tableNames = this.getTableNames();
    const foreignKeys = tableNames.flatMap((tableName) => this.getForeignKeys(tableName));

    return tableNames.map((tableName) => {
      const columns = this.getColumns(tableName);
      const pkColumns = columns.filter((column) => column.pk > 0);

      if (pkColumns.length !== 1) {
        this.logger.warn(
          `Table '${tableName}' has ${pkColumns.length === 0 ? 'no' : 'a composite'} primary key, ` +
            'association joins against it need explicit keys'
        );
      }

      const primaryKey = pkColumns.length === 1 ? pkColumns[0]?.name ?? null : null;

      const fields: FieldInfo[] = columns.map((column) => {
        const type = this.mapType(tableName, column);
        return {
          name: column.name,
          // INTEGER PRIMARY KEY is the rowid alias
          type: column.name === primaryKey && type === 'integer' ? 'id' : type,
          source: column.name,
          virtual: false,
        };
      });

      return {
        name: tableName,
        source: tableName,
        primaryKey,
        fields,
        associations: this.buildAssociations(tableName, foreignKeys),
      };
    });
  }

  /**
   * Foreign keys pointing out of a table become belongs_to, foreign keys
   * pointing into it become has_many named after the referencing table
   */
  private buildAssociations(
    tableName: string,
    foreignKeys: readonly ForeignKeyInfo[]
  ): Map<string, AssociationSpec> {
    const associations = new Map<string, AssociationSpec>();

    for (const fk of foreignKeys) {
      if (fk.fromTable === tableName) {
        const name = fk.fromColumn.replace(/_id$/, '');
        associations.set(name, {
          name,
          cardinality: 'belongs_to',
          related: fk.toTable,
          ownerKey: fk.fromColumn,
          relatedKey: fk.toColumn,
        });
      }

      if (fk.toTable === tableName && !associations.has(fk.fromTable)) {
        associations.set(fk.fromTable, {
          name: fk.fromTable,
          cardinality: 'has_many',
          related: fk.fromTable,
          ownerKey: fk.toColumn,
          relatedKey: fk.fromColumn,
        });
      }
    }

    return associations;
  }

  /**
   * Get all table names (excluding sqlite_* internal tables)
   */
  private getTableNames(): string[] {
    const stmt = this.db.prepare<[], { name: string }>(`
      SELECT name FROM sqlite_master
      WHERE type = 'table'
      AND name NOT LIKE 'sqlite_%'
      ORDER BY name
    `);

    return stmt.all().map((row) => row.name);
  }

  /**
   * Get column information for a table
   */
  private getColumns(tableName: string): TableInfoRow[] {
    const stmt = this.db.prepare<[], TableInfoRow>(
      `PRAGMA table_info(${escapeIdentifier(tableName)})`
    );
    return stmt.all();
  }

  /**
   * Get foreign key relationships for a table
   */
  private getForeignKeys(tableName: string): ForeignKeyInfo[] {
    const stmt = this.db.prepare<[], ForeignKeyRow>(
      `PRAGMA foreign_key_list(${escapeIdentifier(tableName)})`
    );

    return stmt.all().map((row) => ({
      fromTable: tableName,
      fromColumn: row.from,
      toTable: row.table,
      toColumn: row.to ?? this.referencedKey(row.table),
    }));
  }

  /**
   * A foreign key without a column list references the parent's primary key
   */
  private referencedKey(tableName: string): string {
    const pkColumns = this.getColumns(tableName).filter((column) => column.pk > 0);
    const [pkColumn] = pkColumns;
    return pkColumns.length === 1 && pkColumn ? pkColumn.name : DEFAULT_PRIMARY_KEY;
  }

  private mapType(tableName: string, column: TableInfoRow): PrimitiveType {
    const declared = column.type.toUpperCase();
    if (declared === '') {
      return 'any';
    }

    const rule = TYPE_RULES.find(([pattern]) => pattern.test(declared));
    if (!rule) {
      this.logger.warn(
        `Column '${tableName}.${column.name}' has unmapped type '${column.type}', treating it as any`
      );
      return 'any';
    }
    return rule[1];
  }
}
