/**
 * In-memory StorageBackend, the reference backend, for tests and
 * single-instance use.
 */

import type { RecordId, StoredValues } from '../types/schema';
import type { ScanFilter, ScanOptions, StoredRow } from '../types/query';
import type { StorageBackend } from '../interfaces/storage-backend';
import { DuplicateKeyError, NotFoundError } from '../types/errors';
import { compareStored } from '../utils/compare';

/** Rows and id counter of one model in one namespace */
interface ModelTable {
  rows: Map<RecordId, StoredValues>;
  lastId: number;
}

/**
 * Stores rows in nested Maps: namespace → model → id → values.
 * Generated identifiers count up from 1 per (namespace, model).
 */
export class MemoryStorageBackend implements StorageBackend {
  private data = new Map<string, Map<string, ModelTable>>();

  async insert(namespace: string, model: string, values: StoredValues, id?: RecordId): Promise<RecordId> {
    const table = this.table(namespace, model, true);

    let rowId: RecordId;
    if (id === undefined) {
      rowId = ++table.lastId;
    } else {
      if (table.rows.has(id)) throw new DuplicateKeyError(model, undefined, id);
      rowId = id;
      if (typeof id === 'number' && id > table.lastId) table.lastId = id;
    }

    table.rows.set(rowId, { ...values });
    return rowId;
  }

  async fetch(namespace: string, model: string, id: RecordId): Promise<StoredRow | undefined> {
    const values = this.table(namespace, model)?.rows.get(id);
    return values ? { id, values: { ...values } } : undefined;
  }

  async update(namespace: string, model: string, id: RecordId, changes: StoredValues): Promise<StoredRow> {
    const rows = this.table(namespace, model)?.rows;
    const current = rows?.get(id);
    if (!rows || !current) throw new NotFoundError(model, id);

    const merged = { ...current, ...changes };
    rows.set(id, merged);
    return { id, values: { ...merged } };
  }

  async delete(namespace: string, model: string, id: RecordId): Promise<boolean> {
    return this.table(namespace, model)?.rows.delete(id) ?? false;
  }

  async *scan(namespace: string, model: string, filter: ScanFilter, options: ScanOptions = {}): AsyncIterable<StoredRow> {
    const table = this.table(namespace, model);
    if (!table) return;

    // Without ordering or paging, walk the live map: each row reflects the
    // store at the moment it is reached.
    if (!options.orderBy && options.offset === undefined && options.limit === undefined) {
      for (const [id, values] of table.rows) {
        const row = { id, values: { ...values } };
        if (filter.test(row)) yield row;
      }
      return;
    }

    let rows = Array.from(table.rows, ([id, values]) => ({ id, values: { ...values } })).filter(r => filter.test(r));

    if (options.orderBy) {
      const { field, direction, identifier } = options.orderBy;
      const sign = direction === 'asc' ? 1 : -1;
      rows.sort((a, b) => {
        const va = identifier ? a.id : a.values[field] ?? null;
        const vb = identifier ? b.id : b.values[field] ?? null;
        return sign * compareStored(va, vb);
      });
    }

    const offset = options.offset ?? 0;
    const limit = options.limit ?? rows.length;
    rows = rows.slice(offset, offset + limit);

    yield* rows;
  }

  async count(namespace: string, model: string, filter: ScanFilter): Promise<number> {
    const table = this.table(namespace, model);
    if (!table) return 0;
    let total = 0;
    for (const [id, values] of table.rows) {
      if (filter.test({ id, values })) total++;
    }
    return total;
  }

  async namespaces(): Promise<string[]> {
    return [...this.data.keys()].sort();
  }

  async dropNamespace(namespace: string): Promise<boolean> {
    return this.data.delete(namespace);
  }

  /** Clear all data (for testing) */
  clear(): void {
    this.data.clear();
  }

  // --- Private ---

  private table(namespace: string, model: string, create: true): ModelTable;
  private table(namespace: string, model: string, create?: boolean): ModelTable | undefined;
  private table(namespace: string, model: string, create = false): ModelTable | undefined {
    let models = this.data.get(namespace);
    if (!models) {
      if (!create) return undefined;
      models = new Map();
      this.data.set(namespace, models);
    }

    let table = models.get(model);
    if (!table && create) {
      table = { rows: new Map(), lastId: 0 };
      models.set(model, table);
    }
    return table;
  }
}
