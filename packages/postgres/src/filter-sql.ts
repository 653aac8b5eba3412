/**
 * Translate compiled filter conditions into SQL over the JSONB `data` column.
 *
 * Values are compared as JSONB, so numbers compare numerically and strings
 * by collation. Range operators also require the stored value to have the
 * JSON type of the operand, which keeps nulls and missing fields out.
 */

import { isValueList, type FilterCondition, type OrderBy, type StoredValue } from '@automap/core';

/** Positional parameter collector: each add() returns the next `$n` */
export class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

const RANGE_OPERATORS = {
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
} as const;

function jsonParam(params: SqlParams, value: StoredValue): string {
  return `${params.add(JSON.stringify(value))}::jsonb`;
}

/** JSONB expression for a field; missing keys read as JSON null */
export function fieldExpression(params: SqlParams, field: string, identifier: boolean): string {
  return identifier ? 'id' : `COALESCE(data->${params.add(field)}, 'null'::jsonb)`;
}

export function conditionSql(params: SqlParams, condition: FilterCondition): string {
  const expr = fieldExpression(params, condition.field, condition.identifier);
  const { value } = condition;

  if (isValueList(value)) {
    return `${expr} = ANY(${params.add(value.map(v => JSON.stringify(v)))}::jsonb[])`;
  }

  switch (condition.op) {
    case 'eq':
      return `${expr} = ${jsonParam(params, value)}`;
    case 'neq':
      return `${expr} <> ${jsonParam(params, value)}`;
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return `(jsonb_typeof(${expr}) = ${params.add(typeof value)} AND ${expr} ${RANGE_OPERATORS[condition.op]} ${jsonParam(params, value)})`;
    case 'in':
      return 'FALSE';
  }
}

/** AND of every condition, or TRUE for none */
export function whereSql(params: SqlParams, conditions: readonly FilterCondition[]): string {
  if (conditions.length === 0) return 'TRUE';
  return conditions.map(c => conditionSql(params, c)).join(' AND ');
}

/** ORDER BY clause body, ties broken by insertion order */
export function orderSql(params: SqlParams, orderBy: OrderBy & { identifier: boolean }): string {
  const expr = fieldExpression(params, orderBy.field, orderBy.identifier);
  const dir = orderBy.direction === 'asc' ? 'ASC NULLS FIRST' : 'DESC NULLS LAST';
  return `${expr} ${dir}, seq ASC`;
}
