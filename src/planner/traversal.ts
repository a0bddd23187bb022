/**
 * Clause traversal orders
 *
 * Parameters are collected, and later renumbered, by walking clauses in
 * the order the operation lists them. Both stages must agree, so the
 * order lives here.
 */

import type { Operation } from '../query/types.js';

export type ClauseSlot =
  | 'select'
  | 'from'
  | 'joins'
  | 'wheres'
  | 'group_bys'
  | 'havings'
  | 'order_bys'
  | 'limit'
  | 'offset'
  | 'updates';

const QUERY_ORDER: readonly ClauseSlot[] = [
  'select',
  'from',
  'joins',
  'wheres',
  'group_bys',
  'havings',
  'order_bys',
  'limit',
  'offset',
];

export const TRAVERSAL_ORDER: Readonly<Record<Operation, readonly ClauseSlot[]>> = {
  all: QUERY_ORDER,
  update_all: ['updates', 'from', 'joins', 'wheres', 'select'],
  delete_all: ['from', 'joins', 'wheres', 'select'],
  insert_all: ['from', 'joins', 'wheres', 'select'],
};
