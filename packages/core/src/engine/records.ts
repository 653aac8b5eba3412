import type { FieldValues, ModelSchema, StoredValue } from '../types/schema';
import type { StoredRow } from '../types/query';
import type { ModelRecord } from '../types/record';
import { fromStoredValue } from '../utils/field-values';

/**
 * Wrap a stored row as a frozen Record. Every schema field is present;
 * fields missing from the row resolve to their default, else null. A stored
 * null stays null.
 */
export function toRecord<T extends object = FieldValues>(schema: ModelSchema, row: StoredRow): ModelRecord<T> {
  const values: FieldValues = {};

  for (const field of schema.fields) {
    let stored: StoredValue;
    if (field.role === 'identifier') stored = row.id;
    else if (field.name in row.values) stored = row.values[field.name] ?? null;
    else stored = field.default ?? null;
    values[field.name] = fromStoredValue(field.type, stored);
  }

  Object.defineProperties(values, {
    $model: { value: schema.name, enumerable: false },
    $id: { value: row.id, enumerable: false },
  });

  return Object.freeze(values) as ModelRecord<T>;
}

