import type { ModelDefinition, ModelSchema } from '../types/schema';
import type { ModelRegistry } from '../interfaces/model-registry';
import type { SchemaIssue } from '../types/errors';
import { SchemaError, UnknownModelError } from '../types/errors';
import { buildModelSchema, validateModelDefinition } from '../utils/validation';

export class DefaultModelRegistry implements ModelRegistry {
  /** Replaced wholesale on load, never mutated in place */
  private models: ReadonlyMap<string, ModelSchema> = new Map();

  constructor(definitions: readonly ModelDefinition[] = []) {
    if (definitions.length > 0) this.load(definitions);
  }

  load(definitions: readonly ModelDefinition[]): void {
    const next = new Map<string, ModelSchema>();

    for (const def of definitions) {
      const schema = buildModelSchema(def);
      if (next.has(schema.name)) {
        throw new SchemaError(schema.name, [
          { path: 'name', message: `Model "${schema.name}" defined more than once`, severity: 'error' },
        ]);
      }
      next.set(schema.name, schema);
    }

    this.models = next;
  }

  resolve(modelName: string): ModelSchema {
    const schema = this.models.get(modelName);
    if (!schema) throw new UnknownModelError(modelName);
    return schema;
  }

  has(modelName: string): boolean {
    return this.models.has(modelName);
  }

  modelNames(): string[] {
    return [...this.models.keys()];
  }

  schemas(): ModelSchema[] {
    return [...this.models.values()];
  }

  validate(definition: ModelDefinition): SchemaIssue[] {
    return validateModelDefinition(definition);
  }
}
