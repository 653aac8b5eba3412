/**
 * EventEmittingStorage: decorator that wraps any StorageBackend
 * and emits record-level events (insert, update, delete) on every mutation.
 *
 * Usage:
 * ```typescript
 * const raw = new MemoryStorageBackend();
 * const storage = new EventEmittingStorage(raw, eventBus);
 * // All mutations through `storage` now emit onRecordInserted/Updated/Deleted
 * ```
 */

import type { RecordId, StoredValues } from '../types/schema';
import type { ScanFilter, ScanOptions, StoredRow } from '../types/query';
import type { StorageBackend } from '../interfaces/storage-backend';
import type { EventBus } from '../interfaces/event-bus';

export class EventEmittingStorage implements StorageBackend {
  constructor(
    private readonly inner: StorageBackend,
    private readonly events: EventBus
  ) {}

  async insert(namespace: string, model: string, values: StoredValues, id?: RecordId): Promise<RecordId> {
    const rowId = await this.inner.insert(namespace, model, values, id);
    this.events.onRecordInserted?.({ namespace, model, id: rowId, values });
    return rowId;
  }

  async fetch(namespace: string, model: string, id: RecordId): Promise<StoredRow | undefined> {
    return this.inner.fetch(namespace, model, id);
  }

  async update(namespace: string, model: string, id: RecordId, changes: StoredValues): Promise<StoredRow> {
    const row = await this.inner.update(namespace, model, id, changes);
    this.events.onRecordUpdated?.({ namespace, model, id, changes });
    return row;
  }

  async delete(namespace: string, model: string, id: RecordId): Promise<boolean> {
    const ok = await this.inner.delete(namespace, model, id);
    if (ok) {
      this.events.onRecordDeleted?.({ namespace, model, id });
    }
    return ok;
  }

  scan(namespace: string, model: string, filter: ScanFilter, options?: ScanOptions): AsyncIterable<StoredRow> {
    return this.inner.scan(namespace, model, filter, options);
  }

  async count(namespace: string, model: string, filter: ScanFilter): Promise<number> {
    return this.inner.count(namespace, model, filter);
  }

  async namespaces(): Promise<string[]> {
    return this.inner.namespaces();
  }

  async dropNamespace(namespace: string): Promise<boolean> {
    return this.inner.dropNamespace(namespace);
  }
}
