import type { StoredValue } from '../types/schema';

/**
 * Total order over stored values: nulls first, then strings, numbers and
 * booleans, then by value.
 */
export function compareStored(a: StoredValue, b: StoredValue): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;

  if (typeof a !== typeof b) {
    return rank(a) - rank(b);
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Cross-type rank, the order Postgres gives JSONB scalars */
function rank(value: string | number | boolean): number {
  if (typeof value === 'string') return 1;
  if (typeof value === 'number') return 2;
  return 3;
}
