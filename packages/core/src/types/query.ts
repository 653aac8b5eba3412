/**
 * Query Types: filters and scan options
 *
 * Callers write a FilterCriteria; the engine compiles it into a ScanFilter,
 * which backends either evaluate in process (`test`) or push down
 * (`conditions`).
 */

import type { FieldType, FieldValue, RecordId, StoredValue, StoredValues } from './schema';

/** Comparison operators */
export type FilterOperator = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte' | 'in';

export const FILTER_OPERATORS: readonly FilterOperator[] = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in'];

/** Operator form of a single field condition */
export type FieldCondition = {
  readonly [Op in FilterOperator]?: Op extends 'in' ? readonly FieldValue[] : FieldValue;
};

/**
 * Structured filter: field → value (shorthand for `eq`) or field → operators.
 *
 * ```typescript
 * { status: 'active', age: { gt: 20, lte: 65 }, role: { in: ['admin', 'owner'] } }
 * ```
 */
export type FilterCriteria = { readonly [field: string]: FieldValue | FieldCondition };

/** One compiled condition, values already in canonical stored form */
export interface FilterCondition {
  readonly field: string;
  /** True when `field` is the model's identifier */
  readonly identifier: boolean;
  readonly type: FieldType;
  readonly op: FilterOperator;
  readonly value: StoredValue | readonly StoredValue[];
}

/** A stored row as backends hand it around */
export interface StoredRow {
  readonly id: RecordId;
  readonly values: StoredValues;
}

/** Compiled filter handed to StorageBackend.scan */
export interface ScanFilter {
  /** All conditions must hold */
  readonly conditions: readonly FilterCondition[];
  /** Evaluate the conditions against a stored row */
  test(row: StoredRow): boolean;
}

export type SortDirection = 'asc' | 'desc';

export interface OrderBy {
  readonly field: string;
  readonly direction: SortDirection;
}

/** Caller-side query options */
export interface QueryOptions {
  readonly orderBy?: OrderBy;
  readonly limit?: number;
  readonly offset?: number;
}

/** Backend-side scan options; orderBy resolved against the schema */
export interface ScanOptions {
  readonly orderBy?: OrderBy & { readonly identifier: boolean };
  readonly limit?: number;
  readonly offset?: number;
}
