/**
 * Test Suite: SQLite Schema Introspection
 *
 * Runs against an in-memory database.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { Planner } from '../../src/planner/index.js';
import { eq, field } from '../../src/query/expr.js';
import { from, schema } from '../../src/query/builder.js';
import { SqliteSchemaResolver } from '../../src/schema/sqlite.js';
import type { Logger } from '../../src/utils/logger.js';
import { silentLogger } from '../../src/utils/logger.js';

describe('SqliteSchemaResolver', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec(`
      CREATE TABLE posts (
        id INTEGER PRIMARY KEY,
        title TEXT NOT NULL,
        body TEXT,
        published BOOLEAN,
        inserted_at DATETIME
      );
      CREATE TABLE comments (
        id INTEGER PRIMARY KEY,
        post_id INTEGER REFERENCES posts(id),
        text VARCHAR(255),
        score REAL
      );
      CREATE TABLE tags (
        name TEXT,
        weight NUMERIC,
        shape GEOMETRY
      );
    `);
  });

  afterEach(() => {
    db.close();
  });

  test('maps declared column types', () => {
    const resolver = new SqliteSchemaResolver(db, { logger: silentLogger });

    expect(resolver.fields('posts')?.map((info) => [info.name, info.type])).toEqual([
      ['id', 'id'],
      ['title', 'string'],
      ['body', 'string'],
      ['published', 'boolean'],
      ['inserted_at', 'datetime'],
    ]);
    expect(resolver.field('comments', 'score')?.type).toBe('float');
    expect(resolver.field('tags', 'weight')?.type).toBe('decimal');
  });

  test('serves tables as schemas of the same name', () => {
    const resolver = new SqliteSchemaResolver(db, { logger: silentLogger });

    expect(resolver.source('comments')).toBe('comments');
    expect(resolver.primaryKey('posts')).toBe('id');
    expect(resolver.primaryKey('tags')).toBeNull();
    expect(resolver.source('missing')).toBeNull();
  });

  test('turns foreign keys into associations both ways', () => {
    const resolver = new SqliteSchemaResolver(db, { logger: silentLogger });

    expect(resolver.association('comments', 'post')).toEqual({
      name: 'post',
      cardinality: 'belongs_to',
      related: 'posts',
      ownerKey: 'post_id',
      relatedKey: 'id',
    });
    expect(resolver.association('posts', 'comments')).toEqual({
      name: 'comments',
      cardinality: 'has_many',
      related: 'comments',
      ownerKey: 'id',
      relatedKey: 'post_id',
    });
  });

  test('resolves foreign keys without a column list to the parent primary key', () => {
    const library = new Database(':memory:');
    library.exec(`
      CREATE TABLE authors (author_key INTEGER PRIMARY KEY, name TEXT);
      CREATE TABLE books (id INTEGER PRIMARY KEY, author_key INTEGER REFERENCES authors);
    `);
    const resolver = new SqliteSchemaResolver(library, { logger: silentLogger });

    expect(resolver.association('books', 'author_key')).toEqual({
      name: 'author_key',
      cardinality: 'belongs_to',
      related: 'authors',
      ownerKey: 'author_key',
      relatedKey: 'author_key',
    });
    expect(resolver.association('authors', 'books')?.ownerKey).toBe('author_key');

    const plan = new Planner({ resolver, logger: silentLogger }).plan(
      from(schema('books'), 'b').joinAssoc('inner', 'b', 'author_key', 'a').build()
    );
    expect(plan.query.joins[0]?.on.expr).toEqual(eq(field(1, 'author_key'), field(0, 'author_key')));

    library.close();
  });

  test('warns about missing primary keys and unmapped types', () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
    new SqliteSchemaResolver(db, { logger });

    expect(logger.warn).toHaveBeenCalledWith(
      "Table 'tags' has no primary key, association joins against it need explicit keys"
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "Column 'tags.shape' has unmapped type 'GEOMETRY', treating it as any"
    );
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  test('plans association joins over introspected schemas', () => {
    const planner = new Planner({
      resolver: new SqliteSchemaResolver(db, { logger: silentLogger }),
      logger: silentLogger,
    });
    const query = from(schema('comments'), 'c')
      .joinAssoc('inner', 'c', 'post', 'p')
      .where(({ p }, pin) => eq(p.field('published'), pin('true')))
      .build();

    const plan = planner.plan(query);

    expect(plan.params).toEqual([true]);
    expect(plan.query.joins[0]?.on.expr).toEqual(eq(field(1, 'id'), field(0, 'post_id')));
  });
});
