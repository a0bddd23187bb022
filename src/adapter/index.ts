/**
 * Planner Adapters
 *
 * The storage adapter that eventually runs a plan is out of scope; the
 * planner only needs to know how it stores values, so every cast
 * parameter goes through `dump` before landing in the flat parameter list.
 */

import { baseType, isArrayType } from '../types/index.js';
import type { CastResult, FieldType } from '../types/index.js';

export interface PlannerAdapter {
  readonly name: string;
  dump(type: FieldType, value: unknown): CastResult;
}

/**
 * Hands values to storage unchanged
 */
export const passthroughAdapter: PlannerAdapter = {
  name: 'passthrough',
  dump: (_type, value) => ({ ok: true, value }),
};

/**
 * Storage conventions of better-sqlite3: booleans as 0/1, dates as
 * ISO-8601 text, maps and arrays as JSON text
 */
export const sqliteAdapter: PlannerAdapter = {
  name: 'sqlite',
  dump(type, value) {
    if (value === null) {
      return { ok: true, value: null };
    }

    const storage = baseType(type);

    if (isArrayType(storage) || storage === 'map') {
      return { ok: true, value: JSON.stringify(value) };
    }

    if (typeof value === 'boolean') {
      return { ok: true, value: value ? 1 : 0 };
    }

    if (value instanceof Date) {
      const iso = value.toISOString();
      return { ok: true, value: storage === 'date' ? iso.slice(0, 10) : iso };
    }

    return { ok: true, value };
  },
};
