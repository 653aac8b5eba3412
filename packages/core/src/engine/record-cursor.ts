import type { FieldValues } from '../types/schema';
import type { StoredRow } from '../types/query';
import type { ModelRecord } from '../types/record';

/**
 * Lazy result of a query. Every iteration opens a fresh backend scan, so a
 * cursor can be walked more than once and sees the store as it is then.
 */
export class RecordCursor<T extends object = FieldValues> implements AsyncIterable<ModelRecord<T>> {
  constructor(
    private readonly open: () => AsyncIterable<StoredRow>,
    private readonly wrap: (row: StoredRow) => ModelRecord<T>
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<ModelRecord<T>> {
    for await (const row of this.open()) {
      yield this.wrap(row);
    }
  }

  /** Drain the cursor */
  async toArray(): Promise<ModelRecord<T>[]> {
    const records: ModelRecord<T>[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }

  /** First matching record; stops the scan after it */
  async first(): Promise<ModelRecord<T> | undefined> {
    for await (const record of this) {
      return record;
    }
    return undefined;
  }
}
