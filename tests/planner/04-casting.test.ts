/**
 * Test Suite 4: Parameter Casting and Validation
 *
 * Parameter types are inferred from the field they meet; values are cast,
 * dumped and handed to the adapter in traversal order.
 */

import { describe, test, expect } from 'vitest';
import { sqliteAdapter } from '../../src/adapter/index.js';
import {
  CastError,
  IllegalUpdateError,
  SubqueryNotAllowedInBulkFromError,
  UnknownAssociationError,
  UnknownBindingError,
  UnknownFieldError,
  UnknownSchemaError,
  VirtualFieldError,
} from '../../src/errors/index.js';
import { eq, field, gt, inList, isNil, map, not } from '../../src/query/expr.js';
import { from, inc, schema, set, subquery, table } from '../../src/query/builder.js';
import type { Query } from '../../src/query/types.js';
import { captureError, createPlanner } from '../helpers/planner.js';

describe('Parameter casting', () => {
  const planner = createPlanner();

  test('casts comparison parameters to the field type', () => {
    const query = from(schema('Post'), 'p').where(({ p }, pin) => eq(p.field('id'), pin('7-lucky')));

    expect(planner.prepare(query.build()).params).toEqual([7]);
  });

  test('infers the type from either side of a comparison', () => {
    const query = from(schema('Comment'), 'c').where(({ c }, pin) => gt(pin('3'), c.field('post_id')));

    expect(planner.prepare(query.build()).params).toEqual([3]);
  });

  test('casts a list parameter to an array of the element type', () => {
    const query = from(schema('Comment'), 'c').where(({ c }, pin) => inList(c.field('post_id'), pin([1, '2'])));

    expect(planner.prepare(query.build()).params).toEqual([[1, 2]]);
  });

  test('casts each parameter of a literal list', () => {
    const query = from(schema('Comment'), 'c').where(({ c }, pin) => inList(c.field('id'), [pin('4'), pin(5)]));

    expect(planner.prepare(query.build()).params).toEqual([4, 5]);
  });

  test('casts limit and offset to integers', () => {
    const query = from(schema('Post'), 'p')
      .limit((_bindings, pin) => pin('10'))
      .offset((_bindings, pin) => pin(20));

    expect(planner.prepare(query.build()).params).toEqual([10, 20]);
  });

  test('casts update values to the updated field type', () => {
    const query = from(schema('Comment'), 'c').update((_bindings, pin) => [
      set('text', pin('edited')),
      inc('post_id', pin('1')),
    ]);

    expect(planner.prepare(query.build(), 'update_all').params).toEqual(['edited', 1]);
  });

  test('prefers an explicit parameter type', () => {
    const query = from(schema('Post'), 'p').where(({ p }, pin) => eq(p.field('title'), pin('true', 'boolean')));

    expect(planner.prepare(query.build()).params).toEqual([true]);
  });

  test('passes untyped parameters through', () => {
    const query = from(table('posts'), 'p').where(({ p }, pin) => eq(p.field('anything'), pin({ a: 1 })));

    expect(planner.prepare(query.build()).params).toEqual([{ a: 1 }]);
  });

  test('accepts nil for any type', () => {
    const query = from(schema('Post'), 'p').where(({ p }, pin) => not(eq(p.field('title'), pin(null))));

    expect(planner.prepare(query.build()).params).toEqual([null]);
  });

  test('dumps through the adapter', () => {
    const sqlitePlanner = createPlanner({ adapter: sqliteAdapter });
    const query = from(schema('Post'), 'p')
      .where(({ p }, pin) => eq(p.field('title'), pin(true, 'boolean')))
      .where(({ p }, pin) => eq(p.field('text'), pin(new Date('2024-01-02T03:04:05.000Z'), 'date')));

    expect(sqlitePlanner.prepare(query.build()).params).toEqual([1, '2024-01-02']);
  });

  describe('failures', () => {
    test('reports values that cannot be cast', () => {
      const query = from(schema('Post'), 'p').where(({ p }, pin) => eq(p.field('id'), pin('not-a-permalink')));

      const error = captureError(() => planner.prepare(query.build()), CastError);
      expect(error.message).toBe(
        'value `"not-a-permalink"` in `where` cannot be cast to type Permalink in query:\n\n' +
          'from p in Post,\n' +
          '  where: p.id == ^"not-a-permalink"'
      );
    });

    test('reports integer strings that would lose precision', () => {
      const query = from(schema('Comment'), 'c').where(({ c }, pin) => eq(c.field('post_id'), pin('9007199254740993')));

      const error = captureError(() => planner.prepare(query.build()), CastError);
      expect(error.reason).toBe('value `"9007199254740993"` in `where` cannot be cast to type id');
    });

    test('checks literals compared to typed fields', () => {
      const query = from(schema('Post'), 'p').where(({ p }) => eq(p.field('title'), 1));

      const error = captureError(() => planner.prepare(query.build()), CastError);
      expect(error.reason).toBe('value `1` in `where` cannot be cast to type string');
    });

    test('checks values compared to fields a subquery exposes', () => {
      const inner = from(schema('Post'), 'p').select(({ p }) => map({ title: p.field('title') }));
      const literal = from(subquery(inner), 's').where(({ s }) => eq(s.field('title'), 1));
      const pinned = from(subquery(inner), 's').where(({ s }, pin) => eq(s.field('title'), pin(1)));

      expect(captureError(() => planner.prepare(literal.build()), CastError).reason).toBe(
        'value `1` in `where` cannot be cast to type string'
      );
      expect(captureError(() => planner.prepare(pinned.build()), CastError).reason).toBe(
        'value `1` in `where` cannot be cast to type string'
      );
    });

    test('names the clause of update failures', () => {
      const query = from(schema('Post'), 'p').update((_bindings, pin) => [set('text', pin(5))]);

      const error = captureError(() => planner.prepare(query.build(), 'update_all'), CastError);
      expect(error.clause).toBe('update');
      expect(error.type).toBe('string');
    });

    test('rejects unknown fields', () => {
      const query = from(schema('Post'), 'p').where(({ p }) => isNil(p.field('nope')));

      const error = captureError(() => planner.prepare(query.build()), UnknownFieldError);
      expect(error.reason).toBe('field `nope` in `where` does not exist in schema Post');
    });

    test('rejects virtual fields', () => {
      const query = from(schema('Comment'), 'c').where(({ c }) => isNil(c.field('temp')));

      const error = captureError(() => planner.prepare(query.build()), VirtualFieldError);
      expect(error.reason).toBe('field `temp` in `where` is a virtual field in schema Comment');
    });

    test('rejects unknown schemas', () => {
      const error = captureError(() => planner.prepare(from(schema('Nope'), 'n').build()), UnknownSchemaError);

      expect(error.schema).toBe('Nope');
    });

    test('rejects unknown associations', () => {
      const query = from(schema('Post'), 'p').joinAssoc('inner', 'p', 'authors', 'a');

      const error = captureError(() => planner.prepare(query.build()), UnknownAssociationError);
      expect(error.reason).toBe('could not find association `authors` on schema Post');
    });

    test('rejects unknown preload paths', () => {
      const query = from(schema('Comment'), 'c').preload(['post', 'tags']);

      const error = captureError(() => planner.prepare(query.build()), UnknownAssociationError);
      expect(error.reason).toBe('could not find association `tags` on schema Post');
    });

    test('rejects references to bindings that do not exist', () => {
      const query: Query = {
        ...from(schema('Post'), 'p').build(),
        wheres: [{ op: 'and', expr: eq(field(3, 'id'), 1), params: [], paramOffset: 0 }],
      };

      const error = captureError(() => planner.prepare(query), UnknownBindingError);
      expect(error.reason).toBe('could not find binding at position 3');
    });
  });

  describe('operations', () => {
    test('rejects subqueries in the from of bulk operations', () => {
      const query = from(subquery('Post'), 'p')
        .update((_bindings, pin) => [set('title', pin('x'))])
        .build();

      const error = captureError(() => planner.prepare(query, 'update_all'), SubqueryNotAllowedInBulkFromError);
      expect(error.reason).toBe('`update_all` does not allow subqueries in `from`');
    });

    test('rejects subqueries in the from of delete_all', () => {
      const error = captureError(
        () => planner.prepare(from(subquery('Post'), 'p').build(), 'delete_all'),
        SubqueryNotAllowedInBulkFromError
      );

      expect(error.operation).toBe('delete_all');
    });

    test('requires updates in update_all', () => {
      const error = captureError(
        () => planner.prepare(from(schema('Post'), 'p').build(), 'update_all'),
        IllegalUpdateError
      );

      expect(error.reason).toBe('`update_all` requires at least one field to be updated');
    });

    test('rejects updates outside update_all', () => {
      const query = from(schema('Post'), 'p').update((_bindings, pin) => [set('title', pin('x'))]);

      const error = captureError(() => planner.prepare(query.build(), 'all'), IllegalUpdateError);
      expect(error.reason).toBe('`all` does not allow `update` expressions');
    });
  });
});
