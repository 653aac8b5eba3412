import type { RecordId } from './schema';

/**
 * Base error for all automap errors.
 */
export class AutomapError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'AutomapError';
  }
}

export interface SchemaIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

/**
 * Model definition is malformed. Raised at load; the registry keeps its prior state.
 */
export class SchemaError extends AutomapError {
  constructor(
    public readonly modelName: string,
    public readonly issues: SchemaIssue[]
  ) {
    super('SCHEMA_INVALID', `Model "${modelName}" is invalid: ${issues[0]?.path}: ${issues[0]?.message}`);
    this.name = 'SchemaError';
  }
}

/**
 * Operation references a model the registry does not know.
 */
export class UnknownModelError extends AutomapError {
  constructor(public readonly modelName: string) {
    super('UNKNOWN_MODEL', `Model "${modelName}" is not registered`);
    this.name = 'UnknownModelError';
  }
}

/**
 * A problem with one field of one model.
 */
export class FieldError extends AutomapError {
  constructor(
    code: string,
    public readonly modelName: string,
    public readonly field: string,
    message: string
  ) {
    super(code, message);
    this.name = 'FieldError';
  }
}

/**
 * Required field absent on create, with no default.
 */
export class MissingFieldError extends FieldError {
  constructor(modelName: string, field: string) {
    super('MISSING_FIELD', modelName, field, `Field "${modelName}.${field}" is required`);
    this.name = 'MissingFieldError';
  }
}

/**
 * Supplied value does not match the declared field type.
 */
export class TypeMismatchError extends FieldError {
  constructor(
    modelName: string,
    field: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super('TYPE_MISMATCH', modelName, field, `Field "${modelName}.${field}": expected ${expected}, got ${actual}`);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Values or filter name a field the schema does not declare.
 */
export class UnknownFieldError extends FieldError {
  constructor(modelName: string, field: string) {
    super('UNKNOWN_FIELD', modelName, field, `Model "${modelName}" has no field "${field}"`);
    this.name = 'UnknownFieldError';
  }
}

/**
 * Caller tried to write the identifier on update, or an engine-managed timestamp.
 */
export class ReadOnlyFieldError extends FieldError {
  constructor(modelName: string, field: string) {
    super('READ_ONLY_FIELD', modelName, field, `Field "${modelName}.${field}" cannot be written`);
    this.name = 'ReadOnlyFieldError';
  }
}

/**
 * Uniqueness violation, from the engine pre-check or the backend.
 * `field` is undefined when the backend rejected a duplicate identifier.
 */
export class DuplicateKeyError extends AutomapError {
  constructor(
    public readonly modelName: string,
    public readonly field: string | undefined,
    public readonly value: unknown
  ) {
    super(
      'DUPLICATE_KEY',
      field
        ? `Duplicate value ${JSON.stringify(value)} for unique field "${modelName}.${field}"`
        : `Duplicate identifier ${JSON.stringify(value)} in model "${modelName}"`
    );
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Update target does not exist.
 */
export class NotFoundError extends AutomapError {
  constructor(
    public readonly modelName: string,
    public readonly id: RecordId
  ) {
    super('NOT_FOUND', `Record ${JSON.stringify(id)} not found in model "${modelName}"`);
    this.name = 'NotFoundError';
  }
}

/**
 * Namespace name is empty or not an identifier.
 */
export class InvalidNamespaceError extends AutomapError {
  constructor(public readonly namespace: string) {
    super('INVALID_NAMESPACE', `Invalid namespace ${JSON.stringify(namespace)}`);
    this.name = 'InvalidNamespaceError';
  }
}

/**
 * Filter or query options cannot be compiled.
 */
export class QueryError extends AutomapError {
  constructor(
    public readonly modelName: string,
    public readonly field: string,
    reason: string
  ) {
    super('INVALID_QUERY', `Invalid query on "${modelName}.${field}": ${reason}`);
    this.name = 'QueryError';
  }
}
