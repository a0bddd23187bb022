/**
 * Test Suite: Planner Adapters
 */

import { describe, test, expect } from 'vitest';
import { passthroughAdapter, sqliteAdapter } from '../../src/adapter/index.js';
import { Permalink } from '../fixtures/schemas.js';

describe('passthroughAdapter', () => {
  test('returns values unchanged', () => {
    const value = { nested: [1] };

    expect(passthroughAdapter.dump('map', value)).toEqual({ ok: true, value });
  });
});

describe('sqliteAdapter', () => {
  test('stores booleans as integers', () => {
    expect(sqliteAdapter.dump('boolean', false)).toEqual({ ok: true, value: 0 });
  });

  test('stores dates as ISO-8601 text', () => {
    const moment = new Date('2024-03-04T05:06:07.000Z');

    expect(sqliteAdapter.dump('datetime', moment)).toEqual({ ok: true, value: '2024-03-04T05:06:07.000Z' });
    expect(sqliteAdapter.dump('date', moment)).toEqual({ ok: true, value: '2024-03-04' });
  });

  test('stores maps and arrays as JSON', () => {
    expect(sqliteAdapter.dump('map', { a: 1 })).toEqual({ ok: true, value: '{"a":1}' });
    expect(sqliteAdapter.dump({ array: 'integer' }, [1, 2])).toEqual({ ok: true, value: '[1,2]' });
  });

  test('uses the base type of custom types', () => {
    expect(sqliteAdapter.dump(Permalink, 3)).toEqual({ ok: true, value: 3 });
  });

  test('keeps nil', () => {
    expect(sqliteAdapter.dump('map', null)).toEqual({ ok: true, value: null });
  });
});
