/**
 * StorageBackend: the persistence contract every backend implements.
 *
 * The engine validates against the schema before calling in; backends only
 * keep rows and enforce identifier uniqueness. Rows go in and come out as
 * copies, never as live handles on backend state.
 *
 * Memory implementation lives in core/impl, Postgres in packages/postgres.
 */

import type { RecordId, StoredValues } from '../types/schema';
import type { ScanFilter, ScanOptions, StoredRow } from '../types/query';

export interface StorageBackend {
  /**
   * Persist a new row. Assigns an identifier when `id` is omitted.
   * Throws DuplicateKeyError when `id` is already taken.
   */
  insert(namespace: string, model: string, values: StoredValues, id?: RecordId): Promise<RecordId>;

  /** Stored row, or undefined when absent */
  fetch(namespace: string, model: string, id: RecordId): Promise<StoredRow | undefined>;

  /** Merge `changes` into a stored row. Throws NotFoundError. */
  update(namespace: string, model: string, id: RecordId, changes: StoredValues): Promise<StoredRow>;

  /** Remove a row; false when there was none */
  delete(namespace: string, model: string, id: RecordId): Promise<boolean>;

  /**
   * Rows matching `filter`. Each call starts a fresh scan; order is stable
   * across scans of an unmodified store.
   */
  scan(namespace: string, model: string, filter: ScanFilter, options?: ScanOptions): AsyncIterable<StoredRow>;

  /** Number of rows matching `filter` */
  count(namespace: string, model: string, filter: ScanFilter): Promise<number>;

  /** Namespaces holding at least one model's rows */
  namespaces(): Promise<string[]>;

  /** Remove every row in a namespace; false when it did not exist */
  dropNamespace(namespace: string): Promise<boolean>;
}
