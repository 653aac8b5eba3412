// Types
export type {
  FieldType,
  FieldTypeMap,
  FieldValue,
  FieldValues,
  StoredValue,
  StoredValues,
  RecordId,
  FieldDefinition,
  ModelDefinition,
  FieldRole,
  FieldSchema,
  ModelSchema,
  InferValues,
} from './types/schema';
export {
  FIELD_TYPES,
  IDENTIFIER_TYPES,
  DEFAULT_IDENTIFIER_FIELD,
  CREATED_AT_FIELD,
  UPDATED_AT_FIELD,
} from './types/schema';
export type { ModelRecord, RecordMeta, CreateInput, UpdateInput } from './types/record';
export type {
  FilterOperator,
  FieldCondition,
  FilterCriteria,
  FilterCondition,
  StoredRow,
  ScanFilter,
  SortDirection,
  OrderBy,
  QueryOptions,
  ScanOptions,
} from './types/query';
export { FILTER_OPERATORS } from './types/query';
export {
  AutomapError,
  SchemaError,
  UnknownModelError,
  FieldError,
  MissingFieldError,
  TypeMismatchError,
  UnknownFieldError,
  ReadOnlyFieldError,
  DuplicateKeyError,
  NotFoundError,
  InvalidNamespaceError,
  QueryError,
} from './types/errors';
export type { SchemaIssue } from './types/errors';

// Interfaces
export type { ModelRegistry } from './interfaces/model-registry';
export type { StorageBackend } from './interfaces/storage-backend';
export type { EventBus } from './interfaces/event-bus';

// Models
export { ModelHandle, defineModel } from './model/define-model';

// Engine
export {
  DataEngine,
  EngineScope,
  DEFAULT_ENGINE_OPTIONS,
  assertNamespace,
  type EngineOptions,
  type DataOperations,
  type ModelRef,
  type ModelSource,
  type FieldInput,
  type EngineRequest,
  type EngineAction,
  type EngineResponse,
} from './engine/data-engine';
export { RecordCursor } from './engine/record-cursor';
export { toRecord } from './engine/records';
export { compileFilter, compileScanOptions, matchCondition, isValueList } from './engine/filter-compiler';

// Implementations
export { DefaultModelRegistry } from './impl/model-registry';
export { MemoryStorageBackend } from './impl/memory-storage';
export { EventEmittingStorage } from './impl/event-emitting-storage';
export {
  loadModelDefinitions,
  deriveModelName,
  DEFAULT_LOAD_OPTIONS,
  type LoadOptions,
} from './impl/directory-loader';

// Event Dispatcher
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type EventType,
  type DispatchedEvent,
  type EventListener,
} from './impl/event-dispatcher';

// Utils
export { now } from './utils';
export { validateModelDefinition, buildModelSchema, NAME_PATTERN } from './utils/validation';
export { compareStored } from './utils/compare';
export { describeValue, toStoredValue, coerceFieldValue, fromStoredValue } from './utils/field-values';
