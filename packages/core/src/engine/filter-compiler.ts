/**
 * Filter compilation turns caller-side FilterCriteria and QueryOptions into
 * the ScanFilter / ScanOptions a backend consumes, checking fields and
 * values against the model schema first.
 */

import type { FieldSchema, ModelSchema, StoredValue } from '../types/schema';
import type {
  FieldCondition,
  FilterCondition,
  FilterCriteria,
  FilterOperator,
  QueryOptions,
  ScanFilter,
  ScanOptions,
  StoredRow,
} from '../types/query';
import { FILTER_OPERATORS } from '../types/query';
import { QueryError, TypeMismatchError, UnknownFieldError } from '../types/errors';
import { describeValue, toStoredValue } from '../utils/field-values';
import { compareStored } from '../utils/compare';

function isFilterOperator(op: string): op is FilterOperator {
  return FILTER_OPERATORS.some(o => o === op);
}

function isFieldCondition(value: unknown): value is FieldCondition {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function findField(schema: ModelSchema, name: string): FieldSchema {
  const field = schema.fields.find(f => f.name === name);
  if (!field) throw new UnknownFieldError(schema.name, name);
  return field;
}

/** Filter value → stored form; null only where the operator allows it */
function filterValue(schema: ModelSchema, field: FieldSchema, op: FilterOperator, value: unknown): StoredValue {
  if (value === null) {
    if (op === 'eq' || op === 'neq' || op === 'in') return null;
    throw new QueryError(schema.name, field.name, `"${op}" cannot compare with null`);
  }
  const stored = toStoredValue(field.type, value);
  if (stored === undefined) {
    throw new TypeMismatchError(schema.name, field.name, field.type, describeValue(value));
  }
  return stored;
}

function compileCondition(schema: ModelSchema, field: FieldSchema, op: FilterOperator, value: unknown): FilterCondition {
  const base = { field: field.name, identifier: field.role === 'identifier', type: field.type, op };

  if (op === 'in') {
    if (!Array.isArray(value)) {
      throw new QueryError(schema.name, field.name, '"in" requires an array');
    }
    const values: StoredValue[] = value.map((v: unknown) => filterValue(schema, field, op, v));
    return { ...base, value: values };
  }

  if (field.type === 'boolean' && op !== 'eq' && op !== 'neq') {
    throw new QueryError(schema.name, field.name, `"${op}" is not defined for boolean fields`);
  }

  return { ...base, value: filterValue(schema, field, op, value) };
}

/** True for the operand list of an `in` condition */
export function isValueList(value: StoredValue | readonly StoredValue[]): value is readonly StoredValue[] {
  return Array.isArray(value);
}

/** Stored value of a condition's field on a row; missing fields read as null */
export function readCondition(row: StoredRow, condition: FilterCondition): StoredValue {
  return condition.identifier ? row.id : row.values[condition.field] ?? null;
}

export function matchCondition(row: StoredRow, condition: FilterCondition): boolean {
  const actual = readCondition(row, condition);
  const expected = condition.value;

  if (isValueList(expected)) {
    return condition.op === 'in' && expected.includes(actual);
  }

  switch (condition.op) {
    case 'eq': return actual === expected;
    case 'neq': return actual !== expected;
    case 'gt': return actual !== null && typeof actual === typeof expected && compareStored(actual, expected) > 0;
    case 'gte': return actual !== null && typeof actual === typeof expected && compareStored(actual, expected) >= 0;
    case 'lt': return actual !== null && typeof actual === typeof expected && compareStored(actual, expected) < 0;
    case 'lte': return actual !== null && typeof actual === typeof expected && compareStored(actual, expected) <= 0;
    default: return false;
  }
}

/**
 * Compile criteria into a ScanFilter.
 *
 * `{ age: 30 }` is shorthand for `{ age: { eq: 30 } }`; several operators on
 * one field must all hold.
 */
export function compileFilter(schema: ModelSchema, criteria: FilterCriteria = {}): ScanFilter {
  const conditions: FilterCondition[] = [];

  for (const [name, criterion] of Object.entries(criteria)) {
    const field = findField(schema, name);

    if (!isFieldCondition(criterion)) {
      conditions.push(compileCondition(schema, field, 'eq', criterion));
      continue;
    }

    for (const [op, value] of Object.entries(criterion)) {
      if (!isFilterOperator(op)) {
        throw new QueryError(schema.name, name, `unknown operator "${op}"`);
      }
      conditions.push(compileCondition(schema, field, op, value));
    }
  }

  return {
    conditions,
    test: row => conditions.every(c => matchCondition(row, c)),
  };
}

/** Check query options against the schema */
export function compileScanOptions(schema: ModelSchema, options: QueryOptions = {}): ScanOptions {
  for (const key of ['limit', 'offset'] as const) {
    const n = options[key];
    if (n !== undefined && !(Number.isSafeInteger(n) && n >= 0)) {
      throw new QueryError(schema.name, key, `must be a non-negative integer, got ${describeValue(n)}`);
    }
  }

  if (!options.orderBy) {
    return { limit: options.limit, offset: options.offset };
  }

  const { field: name, direction } = options.orderBy;
  const field = findField(schema, name);
  if (direction !== 'asc' && direction !== 'desc') {
    throw new QueryError(schema.name, name, `direction must be "asc" or "desc"`);
  }

  return {
    orderBy: { field: name, direction, identifier: field.role === 'identifier' },
    limit: options.limit,
    offset: options.offset,
  };
}
