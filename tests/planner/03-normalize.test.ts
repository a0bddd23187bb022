/**
 * Test Suite 3: Normalization
 *
 * Placeholder renumbering across subquery boundaries, select defaults and
 * select field expansion.
 */

import { describe, test, expect } from 'vitest';
import {
  CannotSubsetSubqueryStructError,
  UnsupportedSelectError,
} from '../../src/errors/index.js';
import { eq, field, list, lit, map, update } from '../../src/query/expr.js';
import { from, schema, subquery, table } from '../../src/query/builder.js';
import type { ParamExpr } from '../../src/query/types.js';
import { captureError, compiledSource, createPlanner } from '../helpers/planner.js';

const param = (index: number): ParamExpr => ({ type: 'param', index });

describe('Normalization', () => {
  const planner = createPlanner();

  describe('parameter renumbering', () => {
    const inner = from(schema('Post'), 'p').where(({ p }, pin) => eq(p.field('title'), pin('hello')));
    const query = from(schema('Comment'), 'c')
      .join('inner', subquery(inner), 'p', ({ p }, pin) => eq(p.field('text'), pin('world')))
      .where(({ c }, pin) => eq(c.field('text'), pin('last')))
      .select(({ c }, pin) => list([c.field('text'), pin('first')]))
      .build();

    test('numbers placeholders globally in traversal order', () => {
      const plan = planner.plan(query);

      expect(plan.params).toEqual(['first', 'hello', 'world', 'last']);
      expect(plan.query.select?.expr).toEqual(list([field(0, 'text'), param(0)]));
      expect(plan.query.joins[0]?.on.expr).toEqual(eq(field(1, 'text'), param(2)));
      expect(plan.query.wheres[0]?.expr).toEqual(eq(field(0, 'text'), param(3)));
    });

    test('offsets subquery placeholders to where the subquery is reached', () => {
      const plan = planner.plan(query);
      const compiled = compiledSource(plan.query.joins[0]?.source ?? null);

      expect(compiled.query.wheres[0]?.expr).toEqual(eq(field(0, 'title'), param(1)));
      expect(compiled.query.wheres[0]?.paramOffset).toBe(1);
    });

    test('is idempotent', () => {
      const plan = planner.plan(query);

      expect(planner.normalize(plan.query)).toEqual(plan.query);
    });

    test('starts from the given parameter base', () => {
      const plan = planner.plan(query, 'all', 5);

      expect(plan.query.select?.expr).toEqual(list([field(0, 'text'), param(5)]));
      expect(plan.query.wheres[0]?.expr).toEqual(eq(field(0, 'text'), param(8)));
    });

    test('numbers update clauses first in update_all', () => {
      const bulk = from(schema('Post'), 'p')
        .where(({ p }, pin) => eq(p.field('text'), pin('old')))
        .update((_bindings, pin) => [{ operator: 'set', field: 'title', value: pin('new') }])
        .build();

      const plan = planner.plan(bulk, 'update_all');

      expect(plan.params).toEqual(['new', 'old']);
      expect(plan.query.updates[0]?.expr[0]?.value).toEqual(param(0));
      expect(plan.query.wheres[0]?.expr).toEqual(eq(field(0, 'text'), param(1)));
    });
  });

  describe('select defaults', () => {
    test('selects the whole subquery when no select is given', () => {
      const plan = planner.plan(from(subquery('Post'), 'p').build());

      expect(plan.query.select?.expr).toEqual({ type: 'binding', index: 0 });
      expect(plan.query.select?.fields).toEqual([
        field(0, 'id'),
        field(0, 'title'),
        field(0, 'text'),
      ]);
    });

    test('leaves bulk operations without a select', () => {
      const plan = planner.plan(from(schema('Post'), 'p').build(), 'delete_all');

      expect(plan.query.select).toBeNull();
    });
  });

  describe('select fields', () => {
    test('expands the exposed fields of a map subquery', () => {
      const inner = from(schema('Post'), 'p').select(({ p }) => map({ t: p.field('title'), x: p.field('text') }));
      const plan = planner.plan(from(subquery(inner), 'p').build());

      expect(plan.query.select?.fields).toEqual([field(0, 't'), field(0, 'x')]);
    });

    test('collects the leaves of composite selects and drops constants', () => {
      const query = from(schema('Post'), 'p')
        .select(({ p }) => map({ title: p.field('title'), tag: 'fixed', ids: list([p.field('id')]) }))
        .build();

      expect(planner.plan(query).query.select?.fields).toEqual([field(0, 'title'), field(0, 'id')]);
    });

    test('keeps parameters as read fields', () => {
      const query = from(schema('Post'), 'p')
        .select(({ p }, pin) => list([p.field('id'), pin('tag')]))
        .build();

      expect(planner.plan(query).query.select?.fields).toEqual([field(0, 'id'), param(0)]);
    });

    test('expands map updates to the base fields then the overrides', () => {
      const query = from(schema('Post'), 'p')
        .select(({ p }) => update(p.row, { text: lit('x') }))
        .build();

      expect(planner.plan(query).query.select?.fields).toEqual([
        field(0, 'id'),
        field(0, 'title'),
        field(0, 'text'),
      ]);
    });

    test('subsets a row subquery by field', () => {
      const query = from(subquery('Post'), 'p')
        .select(({ p }) => p.subset(['title']))
        .build();

      expect(planner.plan(query).query.select?.fields).toEqual([field(0, 'title')]);
    });

    test('refuses to subset a map subquery of several fields', () => {
      const inner = from(schema('Post'), 'p').select(({ p }) => map({ id: p.field('id'), title: p.field('title') }));
      const query = from(subquery(inner), 'p')
        .select(({ p }) => p.subset(['title'], 'map'))
        .build();

      const error = captureError(() => planner.plan(query), CannotSubsetSubqueryStructError);
      expect(error.reason).toBe(
        'it is not possible to return a map/struct subset of a subquery, ' +
          'you must explicitly select the whole subquery or individual fields only'
      );
    });

    test('refuses to select a whole schemaless table', () => {
      const query = from(table('posts'), 'p').build();

      const error = captureError(() => planner.plan(query), UnsupportedSelectError);
      expect(error.reason).toBe(
        'cannot select the whole source `p` of schemaless table "posts", select individual fields instead'
      );
    });
  });
});
