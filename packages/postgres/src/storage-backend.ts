import {
  DuplicateKeyError,
  NotFoundError,
  type RecordId,
  type ScanFilter,
  type ScanOptions,
  type StorageBackend,
  type StoredRow,
  type StoredValue,
  type StoredValues,
} from '@automap/core';
import type { PoolLike } from './pool';
import { tableNames, type TableNames } from './schema';
import { SqlParams, orderSql, whereSql } from './filter-sql';

export interface PgStorageOptions {
  /** Prefix of the records and sequences tables */
  tablePrefix?: string;
  /** Rows fetched per round trip by an unordered scan */
  batchSize?: number;
}

export const DEFAULT_PG_OPTIONS = {
  tablePrefix: 'am_',
  batchSize: 100,
} as const;

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredValue(value: unknown): value is StoredValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** `data` may arrive as text when the JSONB type parser is overridden */
function parseJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function toRecordId(value: unknown): RecordId {
  if (typeof value === 'string' || typeof value === 'number') return value;
  throw new Error(`Unexpected record id ${JSON.stringify(value)}`);
}

function toStoredValues(value: unknown): StoredValues {
  if (!isObject(value)) throw new Error('Record data is not an object');
  const values: StoredValues = {};
  for (const [key, v] of Object.entries(value)) {
    if (!isStoredValue(v)) throw new Error(`Record field "${key}" holds a nested value`);
    values[key] = v;
  }
  return values;
}

/** BIGINT columns come back as strings */
function readInteger(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isSafeInteger(n)) {
    throw new Error(`Expected an integer, got ${JSON.stringify(value)}`);
  }
  return n;
}

function readRow(row: unknown): { row: StoredRow; seq: number } {
  if (!isObject(row)) throw new Error('Malformed record row');
  return {
    row: { id: toRecordId(row.id), values: toStoredValues(parseJson(row.data)) },
    seq: readInteger(row.seq),
  };
}

/**
 * PgStorageBackend: Postgres-backed record storage.
 *
 * Stores every model of every namespace in one shared records table with
 * the field values in a JSONB column. Filters, ordering and paging are
 * pushed down as SQL.
 *
 * ```typescript
 * const pool = new Pool({ connectionString });
 * await applySchema(pool);
 * const engine = new DataEngine(new PgStorageBackend(pool), models);
 * ```
 */
export class PgStorageBackend implements StorageBackend {
  private readonly tables: TableNames;
  private readonly batchSize: number;

  constructor(
    private readonly pool: PoolLike,
    options: PgStorageOptions = {}
  ) {
    this.tables = tableNames(options.tablePrefix ?? DEFAULT_PG_OPTIONS.tablePrefix);
    this.batchSize = options.batchSize ?? DEFAULT_PG_OPTIONS.batchSize;
    if (!Number.isSafeInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  async insert(namespace: string, model: string, values: StoredValues, id?: RecordId): Promise<RecordId> {
    const rowId = id ?? (await this.nextId(namespace, model));

    const { rowCount } = await this.pool.query(
      `INSERT INTO ${this.tables.records} (namespace, model, id, data)
       VALUES ($1, $2, $3::jsonb, $4::jsonb)
       ON CONFLICT DO NOTHING`,
      [namespace, model, JSON.stringify(rowId), JSON.stringify(values)]
    );
    if (!rowCount) throw new DuplicateKeyError(model, undefined, rowId);

    if (id !== undefined && typeof id === 'number' && Number.isSafeInteger(id)) {
      await this.pool.query(
        `INSERT INTO ${this.tables.sequences} (namespace, model, last_id)
         VALUES ($1, $2, $3)
         ON CONFLICT (namespace, model) DO UPDATE
           SET last_id = GREATEST(${this.tables.sequences}.last_id, EXCLUDED.last_id)`,
        [namespace, model, id]
      );
    }

    return rowId;
  }

  async fetch(namespace: string, model: string, id: RecordId): Promise<StoredRow | undefined> {
    const { rows } = await this.pool.query(
      `SELECT id, data, seq FROM ${this.tables.records}
       WHERE namespace = $1 AND model = $2 AND id = $3::jsonb`,
      [namespace, model, JSON.stringify(id)]
    );
    if (rows.length === 0) return undefined;
    return readRow(rows[0]).row;
  }

  async update(namespace: string, model: string, id: RecordId, changes: StoredValues): Promise<StoredRow> {
    const { rows } = await this.pool.query(
      `UPDATE ${this.tables.records}
       SET data = data || $4::jsonb
       WHERE namespace = $1 AND model = $2 AND id = $3::jsonb
       RETURNING id, data, seq`,
      [namespace, model, JSON.stringify(id), JSON.stringify(changes)]
    );
    if (rows.length === 0) throw new NotFoundError(model, id);
    return readRow(rows[0]).row;
  }

  async delete(namespace: string, model: string, id: RecordId): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `DELETE FROM ${this.tables.records}
       WHERE namespace = $1 AND model = $2 AND id = $3::jsonb`,
      [namespace, model, JSON.stringify(id)]
    );
    return (rowCount ?? 0) > 0;
  }

  async *scan(namespace: string, model: string, filter: ScanFilter, options: ScanOptions = {}): AsyncIterable<StoredRow> {
    if (!options.orderBy && options.limit === undefined && options.offset === undefined) {
      yield* this.scanBatches(namespace, model, filter);
      return;
    }

    const params = new SqlParams();
    const scope = `namespace = ${params.add(namespace)} AND model = ${params.add(model)}`;
    const where = whereSql(params, filter.conditions);
    const order = options.orderBy ? orderSql(params, options.orderBy) : 'seq ASC';

    let paging = '';
    if (options.limit !== undefined) paging += ` LIMIT ${params.add(options.limit)}`;
    if (options.offset !== undefined) paging += ` OFFSET ${params.add(options.offset)}`;

    const { rows } = await this.pool.query(
      `SELECT id, data, seq FROM ${this.tables.records}
       WHERE ${scope} AND ${where}
       ORDER BY ${order}${paging}`,
      params.values
    );

    for (const raw of rows) {
      yield readRow(raw).row;
    }
  }

  async count(namespace: string, model: string, filter: ScanFilter): Promise<number> {
    const params = new SqlParams();
    const scope = `namespace = ${params.add(namespace)} AND model = ${params.add(model)}`;
    const where = whereSql(params, filter.conditions);

    const { rows } = await this.pool.query(
      `SELECT count(*)::int AS total FROM ${this.tables.records} WHERE ${scope} AND ${where}`,
      params.values
    );
    const first = rows[0];
    return isObject(first) ? readInteger(first.total) : 0;
  }

  async namespaces(): Promise<string[]> {
    const { rows } = await this.pool.query(
      `SELECT DISTINCT namespace FROM ${this.tables.records} ORDER BY namespace`
    );
    return rows.flatMap(r => (isObject(r) && typeof r.namespace === 'string' ? [r.namespace] : []));
  }

  async dropNamespace(namespace: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `DELETE FROM ${this.tables.records} WHERE namespace = $1`,
      [namespace]
    );
    await this.pool.query(`DELETE FROM ${this.tables.sequences} WHERE namespace = $1`, [namespace]);
    return (rowCount ?? 0) > 0;
  }

  // --- Private ---

  /** Next generated identifier for (namespace, model), starting at 1 */
  private async nextId(namespace: string, model: string): Promise<number> {
    const { rows } = await this.pool.query(
      `INSERT INTO ${this.tables.sequences} (namespace, model, last_id)
       VALUES ($1, $2, 1)
       ON CONFLICT (namespace, model) DO UPDATE
         SET last_id = ${this.tables.sequences}.last_id + 1
       RETURNING last_id`,
      [namespace, model]
    );
    const first = rows[0];
    if (!isObject(first)) throw new Error(`No identifier generated for "${model}"`);
    return readInteger(first.last_id);
  }

  /** Keyset walk over insertion order, one batch per query */
  private async *scanBatches(namespace: string, model: string, filter: ScanFilter): AsyncIterable<StoredRow> {
    let after = 0;

    while (true) {
      const params = new SqlParams();
      const scope = `namespace = ${params.add(namespace)} AND model = ${params.add(model)}`;
      const where = whereSql(params, filter.conditions);
      const cursor = params.add(after);
      const limit = params.add(this.batchSize);

      const { rows } = await this.pool.query(
        `SELECT id, data, seq FROM ${this.tables.records}
         WHERE ${scope} AND ${where} AND seq > ${cursor}
         ORDER BY seq ASC LIMIT ${limit}`,
        params.values
      );

      for (const raw of rows) {
        const { row, seq } = readRow(raw);
        after = seq;
        yield row;
      }

      if (rows.length < this.batchSize) return;
    }
  }
}
