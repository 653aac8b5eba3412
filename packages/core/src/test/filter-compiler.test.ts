import { describe, it, expect } from 'vitest';
import { compileFilter, compileScanOptions } from '../engine/filter-compiler';
import { buildModelSchema } from '../utils/validation';
import { QueryError, TypeMismatchError } from '../types/errors';
import type { StoredRow } from '../types/query';
import type { StoredValues } from '../types/schema';

const schema = buildModelSchema({
  name: 'events',
  fields: [
    { name: 'title', type: 'text' },
    { name: 'size', type: 'integer', nullable: true },
    { name: 'weight', type: 'float' },
    { name: 'open', type: 'boolean' },
    { name: 'at', type: 'timestamp' },
  ],
});

function row(values: StoredValues, id = 1): StoredRow {
  return { id, values };
}

describe('compileFilter', () => {
  it('compiles shorthand to eq with stored values', () => {
    const filter = compileFilter(schema, { title: 'launch', at: new Date(1_500) });

    expect(filter.conditions).toEqual([
      { field: 'title', identifier: false, type: 'text', op: 'eq', value: 'launch' },
      { field: 'at', identifier: false, type: 'timestamp', op: 'eq', value: 1_500 },
    ]);
    expect(filter.test(row({ title: 'launch', at: 1_500 }))).toBe(true);
    expect(filter.test(row({ title: 'launch', at: 1_501 }))).toBe(false);
  });

  it('requires every operator on a field to hold', () => {
    const filter = compileFilter(schema, { weight: { gte: 1.5, lt: 3 } });

    expect(filter.test(row({ weight: 1.5 }))).toBe(true);
    expect(filter.test(row({ weight: 2.9 }))).toBe(true);
    expect(filter.test(row({ weight: 3 }))).toBe(false);
  });

  it('never matches null in range comparisons', () => {
    const filter = compileFilter(schema, { size: { lte: 10 } });

    expect(filter.test(row({ size: null }))).toBe(false);
    expect(filter.test(row({}))).toBe(false);
    expect(filter.test(row({ size: 4 }))).toBe(true);
  });

  it('reads missing values as null', () => {
    const isNull = compileFilter(schema, { size: null });
    const notNull = compileFilter(schema, { size: { neq: null } });

    expect(isNull.test(row({}))).toBe(true);
    expect(notNull.test(row({}))).toBe(false);
    expect(notNull.test(row({ size: 0 }))).toBe(true);
  });

  it('matches membership, including null', () => {
    const filter = compileFilter(schema, { size: { in: [1, null] } });

    expect(filter.test(row({ size: 1 }))).toBe(true);
    expect(filter.test(row({ size: null }))).toBe(true);
    expect(filter.test(row({ size: 2 }))).toBe(false);
  });

  it('reads the identifier from the row id', () => {
    const filter = compileFilter(schema, { id: { in: [2, 3] } });

    expect(filter.conditions[0].identifier).toBe(true);
    expect(filter.test(row({}, 2))).toBe(true);
    expect(filter.test(row({}, 1))).toBe(false);
  });

  it('matches everything when empty', () => {
    expect(compileFilter(schema).test(row({}))).toBe(true);
  });

  it('rejects values of the wrong type', () => {
    expect(() => compileFilter(schema, { size: 1.5 })).toThrow(TypeMismatchError);
    expect(() => compileFilter(schema, { size: { in: [1, 'two'] } })).toThrow(
      'Field "events.size": expected integer, got string'
    );
  });

  it('rejects range comparisons with null', () => {
    expect(() => compileFilter(schema, { size: { gt: null } })).toThrow(
      'Invalid query on "events.size": "gt" cannot compare with null'
    );
  });

  it('allows only equality on booleans', () => {
    expect(compileFilter(schema, { open: { neq: true } }).test(row({ open: false }))).toBe(true);
    expect(() => compileFilter(schema, { open: { lte: false } })).toThrow(QueryError);
  });
});

describe('compileScanOptions', () => {
  it('resolves the order field against the schema', () => {
    expect(compileScanOptions(schema, { orderBy: { field: 'id', direction: 'desc' }, limit: 5 })).toEqual({
      orderBy: { field: 'id', direction: 'desc', identifier: true },
      limit: 5,
      offset: undefined,
    });
  });

  it('rejects negative or fractional paging', () => {
    expect(() => compileScanOptions(schema, { offset: -1 })).toThrow(QueryError);
    expect(() => compileScanOptions(schema, { limit: 2.5 })).toThrow(
      'Invalid query on "events.limit": must be a non-negative integer, got float'
    );
  });

  it('rejects an unknown direction', () => {
    const options = JSON.parse('{"orderBy":{"field":"title","direction":"up"}}');
    expect(() => compileScanOptions(schema, options)).toThrow(QueryError);
  });
});
