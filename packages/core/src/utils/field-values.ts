/**
 * Field value checks and conversions between Record values and the canonical
 * form backends store (timestamps as epoch ms, everything else as-is).
 * Timestamps are accepted as a Date, epoch ms or an ISO-8601 string.
 */

import type { FieldSchema, FieldType, FieldValue, StoredValue } from '../types/schema';
import { TypeMismatchError } from '../types/errors';

/** Short description of a runtime value, used in mismatch messages */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'invalid date' : 'date';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return 'infinity';
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  return typeof value;
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2}))?$/;

/** Epoch ms of an ISO-8601 date or date-time, the form Records take in JSON */
function parseIsoTimestamp(value: string): number | undefined {
  if (!ISO_TIMESTAMP.test(value)) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

/**
 * Convert a non-null value to its canonical stored form, or undefined when it
 * does not match the type.
 */
export function toStoredValue(type: FieldType, value: unknown): StoredValue | undefined {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value) ? value : undefined;

    case 'float':
      return typeof value === 'number' && Number.isFinite(value) ? value : undefined;

    case 'text':
      return typeof value === 'string' ? value : undefined;

    case 'boolean':
      return typeof value === 'boolean' ? value : undefined;

    case 'timestamp':
      if (value instanceof Date) {
        const ms = value.getTime();
        return Number.isNaN(ms) ? undefined : ms;
      }
      if (typeof value === 'string') return parseIsoTimestamp(value);
      return typeof value === 'number' && Number.isSafeInteger(value) ? value : undefined;

    case 'identifier':
      if (typeof value === 'string') return value.length > 0 ? value : undefined;
      return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  }
}

/**
 * Check a supplied value against its field and return the stored form.
 * Throws TypeMismatchError, including for null on a non-nullable field.
 */
export function coerceFieldValue(modelName: string, field: FieldSchema, value: unknown): StoredValue {
  if (value === null) {
    if (field.nullable) return null;
    throw new TypeMismatchError(modelName, field.name, field.type, 'null');
  }

  const stored = toStoredValue(field.type, value);
  if (stored === undefined) {
    throw new TypeMismatchError(modelName, field.name, field.type, describeValue(value));
  }
  return stored;
}

/** Convert a stored value back to what a Record exposes */
export function fromStoredValue(type: FieldType, stored: StoredValue): FieldValue {
  if (stored === null) return null;
  if (type === 'timestamp' && typeof stored === 'number') return new Date(stored);
  return stored;
}
