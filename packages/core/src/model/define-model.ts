import type { InferValues, ModelDefinition } from '../types/schema';

/**
 * A model definition tagged with the TypeScript type of its records.
 * Pass it to the engine in place of a model name to get typed records back.
 */
export class ModelHandle<T extends object> {
  /** Type-level only; never assigned */
  declare readonly __values?: T;

  constructor(readonly definition: ModelDefinition) {}

  get name(): string {
    return this.definition.name;
  }
}

/**
 * Declare a model with inferred field types. Write the definition `as const`
 * so names, types and flags stay literal:
 *
 * ```typescript
 * const User = defineModel({
 *   name: 'users',
 *   fields: [
 *     { name: 'name', type: 'text', unique: true },
 *     { name: 'age', type: 'integer' },
 *     { name: 'bio', type: 'text', nullable: true },
 *   ],
 * } as const);
 *
 * const alice = await engine.create(User, { name: 'Alice', age: 30 });
 * alice.age; // number
 * alice.bio; // string | null
 * alice.id;  // RecordId
 * ```
 */
export function defineModel<D extends ModelDefinition>(definition: D): ModelHandle<InferValues<D>> {
  return new ModelHandle<InferValues<D>>(definition);
}
