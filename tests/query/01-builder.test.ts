/**
 * Test Suite: Query Builder
 *
 * Clause callbacks, per-clause parameter pinning and binding bookkeeping.
 */

import { describe, test, expect } from 'vitest';
import { and, eq, field, fragment, inList, lit, map } from '../../src/query/expr.js';
import { from, inc, schema, set, subquery, table } from '../../src/query/builder.js';

describe('Query builder', () => {
  describe('from()', () => {
    test('starts an empty query over a source', () => {
      const query = from(schema('Post'), 'p').build();

      expect(query).toEqual({
        from: { source: { kind: 'schema', schema: 'Post', table: null }, as: 'p' },
        joins: [],
        wheres: [],
        groupBys: [],
        havings: [],
        orderBys: [],
        select: null,
        limit: null,
        offset: null,
        distinct: false,
        updates: [],
        preloads: [],
      });
    });

    test('wraps a builder as a subquery source', () => {
      const inner = from(schema('Post'), 'p');
      const query = from(inner).build();

      expect(query.from.as).toBe('x');
      expect(query.from.source).toEqual({
        kind: 'subquery',
        subquery: { query: inner.build(), compiled: null },
      });
    });

    test('subquery() of a schema name selects all of its rows', () => {
      expect(subquery('Comment').subquery.query.from.source).toEqual({
        kind: 'schema',
        schema: 'Comment',
        table: null,
      });
    });
  });

  describe('parameters', () => {
    test('numbers pinned values per clause', () => {
      const query = from(schema('Post'), 'p')
        .where(({ p }, pin) => and(eq(p.field('title'), pin('a')), eq(p.field('text'), pin('b'))))
        .where(({ p }, pin) => eq(p.field('id'), pin(1, 'integer')))
        .build();

      expect(query.wheres[0]?.params).toEqual([{ value: 'a' }, { value: 'b' }]);
      expect(query.wheres[0]?.expr).toEqual(
        and(eq(field(0, 'title'), { type: 'param', index: 0 }), eq(field(0, 'text'), { type: 'param', index: 1 }))
      );
      expect(query.wheres[1]?.params).toEqual([{ value: 1, type: 'integer' }]);
      expect(query.wheres[1]?.paramOffset).toBe(0);
    });

    test('tags or_where clauses', () => {
      const query = from(schema('Post'), 'p')
        .where(({ p }) => eq(p.field('id'), 1))
        .orWhere(({ p }) => eq(p.field('id'), 2))
        .build();

      expect(query.wheres.map((where) => where.op)).toEqual(['and', 'or']);
    });
  });

  describe('joins', () => {
    test('joins default to a true condition', () => {
      const query = from(schema('Post'), 'p').join('left', table('comments'), 'c').build();

      expect(query.joins[0]).toEqual({
        qual: 'left',
        source: { kind: 'table', table: 'comments' },
        assoc: null,
        on: { expr: lit(true), params: [], paramOffset: 0 },
        as: 'c',
        ix: 1,
      });
    });

    test('association joins record their parent binding', () => {
      const query = from(schema('Comment'), 'c').joinAssoc('inner', 'c', 'post', 'p').build();

      expect(query.joins[0]?.assoc).toEqual({ parent: 0, name: 'post' });
      expect(query.joins[0]?.source).toBeNull();
    });

    test('rejects reused binding names', () => {
      expect(() => from(schema('Post'), 'p').join('inner', schema('Comment'), 'p')).toThrow(
        "Binding 'p' is already in use"
      );
    });

    test('rejects unknown parent bindings', () => {
      expect(() => from(schema('Post'), 'p').joinAssoc('inner', 'q', 'comments', 'c')).toThrow(
        "Unknown binding 'q'"
      );
    });
  });

  describe('other clauses', () => {
    test('allows a single select', () => {
      const builder = from(schema('Post'), 'p').select(({ p }) => p.row);

      expect(() => builder.select(({ p }) => p.field('id'))).toThrow(
        'Only one select expression is allowed in query'
      );
    });

    test('order_by accepts a bare expression or direction pairs', () => {
      const query = from(schema('Post'), 'p')
        .orderBy(({ p }) => p.field('title'))
        .orderBy(({ p }) => [['desc', p.field('id')], ['asc', p.field('text')]])
        .build();

      expect(query.orderBys.map((orderBy) => orderBy.expr)).toEqual([
        [{ direction: 'asc', expr: field(0, 'title') }],
        [
          { direction: 'desc', expr: field(0, 'id') },
          { direction: 'asc', expr: field(0, 'text') },
        ],
      ]);
    });

    test('records preloads with their join binding', () => {
      const query = from(schema('Post'), 'p')
        .joinAssoc('inner', 'p', 'comments', 'c')
        .preload('comments', 'c')
        .preload(['comments', 'post'])
        .build();

      expect(query.preloads).toEqual([
        { path: ['comments'], binding: 1 },
        { path: ['comments', 'post'], binding: null },
      ]);
    });

    test('builds update clauses', () => {
      const query = from(schema('Post'), 'p')
        .update((_bindings, pin) => [set('title', pin('x')), inc('id', 1)])
        .build();

      expect(query.updates[0]?.expr).toEqual([
        { operator: 'set', field: 'title', value: { type: 'param', index: 0 } },
        { operator: 'inc', field: 'id', value: lit(1) },
      ]);
    });
  });
});

describe('Expression constructors', () => {
  test('turn plain values into literals', () => {
    expect(map({ a: 1, b: null })).toEqual({
      type: 'map',
      entries: [
        { key: 'a', value: lit(1) },
        { key: 'b', value: lit(null) },
      ],
    });
  });

  test('inList turns arrays into list literals', () => {
    expect(inList(field(0, 'id'), [1, 2]).right).toEqual({ type: 'list', items: [lit(1), lit(2)] });
  });

  test('fragment checks its argument count', () => {
    expect(() => fragment('lower(?)')).toThrow('fragment(...) expects 1 arguments for "lower(?)", got 0');
    expect(fragment('lower(?)', field(0, 'title')).parts).toEqual(['lower(', ')']);
  });

  test('and requires a condition', () => {
    expect(() => and()).toThrow('AND requires at least one condition');
  });
});
