import type { FieldValues, RecordId } from './schema';

/** Members every Record carries besides its fields (non-enumerable) */
export interface RecordMeta {
  /** Name of the model the record belongs to */
  readonly $model: string;
  /** Value of the model's identifier field */
  readonly $id: RecordId;
}

/**
 * A typed, frozen record returned by the engine.
 * Fields are read by name: `user.name`, `user.age`.
 */
export type ModelRecord<T extends object = FieldValues> = Readonly<T> & RecordMeta;

/** Timestamps may also be written as epoch ms */
type InputValue<V> = V extends Date ? Date | number : V;

/** Values accepted on create: every field optional, checked at runtime */
export type CreateInput<T extends object> = { [K in keyof T]?: InputValue<T[K]> };

/** Values accepted on update */
export type UpdateInput<T extends object> = CreateInput<T>;
