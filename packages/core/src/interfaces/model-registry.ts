import type { ModelDefinition, ModelSchema } from '../types/schema';
import type { SchemaIssue } from '../types/errors';

/**
 * Registry of validated model schemas.
 * Read-only between loads; a load replaces the whole mapping or nothing.
 */
export interface ModelRegistry {
  /** Validate every definition and swap in the new mapping. Throws SchemaError. */
  load(definitions: readonly ModelDefinition[]): void;

  /** Schema for a model. Throws UnknownModelError. */
  resolve(modelName: string): ModelSchema;

  has(modelName: string): boolean;

  modelNames(): string[];

  schemas(): ModelSchema[];

  /** Structural issues for a definition, without loading it */
  validate(definition: ModelDefinition): SchemaIssue[];
}
