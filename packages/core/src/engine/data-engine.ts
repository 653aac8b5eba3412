import type { FieldSchema, FieldValues, ModelDefinition, ModelSchema, RecordId, StoredValues } from '../types/schema';
import type { FilterCriteria, QueryOptions } from '../types/query';
import type { CreateInput, ModelRecord, UpdateInput } from '../types/record';
import type { ModelRegistry } from '../interfaces/model-registry';
import type { StorageBackend } from '../interfaces/storage-backend';
import type { EventBus } from '../interfaces/event-bus';
import {
  DuplicateKeyError,
  InvalidNamespaceError,
  MissingFieldError,
  NotFoundError,
  ReadOnlyFieldError,
  SchemaError,
  TypeMismatchError,
  UnknownFieldError,
} from '../types/errors';
import { DefaultModelRegistry } from '../impl/model-registry';
import { loadModelDefinitions, type LoadOptions } from '../impl/directory-loader';
import { ModelHandle } from '../model/define-model';
import { coerceFieldValue, describeValue } from '../utils/field-values';
import { now } from '../utils';
import { compileFilter, compileScanOptions } from './filter-compiler';
import { RecordCursor } from './record-cursor';
import { toRecord } from './records';

// === Constants ===

const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export interface EngineOptions {
  /** Namespace active until `use` is called (default: 'default') */
  defaultNamespace?: string;
  /** Receives registry and namespace events */
  events?: EventBus;
  /** Epoch ms source for managed timestamps (default: Date.now) */
  clock?: () => number;
}

export const DEFAULT_ENGINE_OPTIONS = {
  defaultNamespace: 'default',
} as const;

/** A model named directly, or through a typed handle from defineModel */
export type ModelRef<T extends object = FieldValues> = string | ModelHandle<T>;

/** What the engine accepts as a model declaration */
export type ModelSource = ModelDefinition | ModelHandle<object>;

/** Untyped field values, as they arrive over the wire */
export type FieldInput = { readonly [field: string]: unknown };

// === Unified dispatch ===

interface RequestBase {
  model: string;
  /** Overrides the active namespace for this request */
  namespace?: string;
}

export type EngineRequest =
  | (RequestBase & { action: 'create'; values: FieldInput })
  | (RequestBase & { action: 'get'; id: RecordId })
  | (RequestBase & { action: 'update'; id: RecordId; values: FieldInput })
  | (RequestBase & { action: 'delete'; id: RecordId })
  | (RequestBase & { action: 'query'; filter?: FilterCriteria; options?: QueryOptions })
  | (RequestBase & { action: 'count'; filter?: FilterCriteria });

export type EngineAction = EngineRequest['action'];

export type EngineResponse =
  | { action: 'create'; record: ModelRecord }
  | { action: 'get'; record: ModelRecord | undefined }
  | { action: 'update'; record: ModelRecord }
  | { action: 'delete'; deleted: boolean }
  | { action: 'query'; records: ModelRecord[] }
  | { action: 'count'; count: number };

/**
 * CRUD and query surface shared by DataEngine and EngineScope.
 * Pass a string model name for untyped records, or a ModelHandle for typed ones.
 */
export interface DataOperations {
  create<T extends object = FieldValues>(model: ModelRef<T>, values: NoInfer<CreateInput<T>>): Promise<ModelRecord<T>>;
  get<T extends object = FieldValues>(model: ModelRef<T>, id: RecordId): Promise<ModelRecord<T> | undefined>;
  update<T extends object = FieldValues>(
    model: ModelRef<T>,
    id: RecordId,
    values: NoInfer<UpdateInput<T>>
  ): Promise<ModelRecord<T>>;
  delete(model: ModelRef<object>, id: RecordId): Promise<boolean>;
  query<T extends object = FieldValues>(
    model: ModelRef<T>,
    filter?: FilterCriteria,
    options?: QueryOptions
  ): RecordCursor<T>;
  count(model: ModelRef<object>, filter?: FilterCriteria): Promise<number>;
  execute(request: EngineRequest): Promise<EngineResponse>;
}

// === Helpers ===

export function assertNamespace(namespace: string): string {
  if (typeof namespace !== 'string' || !NAMESPACE_PATTERN.test(namespace)) {
    throw new InvalidNamespaceError(namespace);
  }
  return namespace;
}

function modelName(model: ModelRef<object>): string {
  return typeof model === 'string' ? model : model.name;
}

function toDefinition(source: ModelSource): ModelDefinition {
  return source instanceof ModelHandle ? source.definition : source;
}

function identifierField(schema: ModelSchema): FieldSchema {
  const field = schema.fields.find(f => f.role === 'identifier');
  if (!field) {
    throw new SchemaError(schema.name, [{ path: 'fields', message: 'No identifier field', severity: 'error' }]);
  }
  return field;
}

/** Supplied values by field name; undefined counts as absent */
function suppliedValues(schema: ModelSchema, values: object): Map<string, unknown> {
  const supplied = new Map<string, unknown>();
  for (const [name, value] of Object.entries(values)) {
    if (!schema.fields.some(f => f.name === name)) {
      throw new UnknownFieldError(schema.name, name);
    }
    if (value !== undefined) supplied.set(name, value);
  }
  return supplied;
}

// === Core ===

/**
 * Operations with the namespace passed explicitly. DataEngine and
 * EngineScope capture their namespace and delegate here.
 */
export class EngineCore {
  constructor(
    readonly registry: ModelRegistry,
    readonly backend: StorageBackend,
    private readonly clock: () => number
  ) {}

  schema(model: ModelRef<object>): ModelSchema {
    return this.registry.resolve(modelName(model));
  }

  async create<T extends object>(namespace: string, model: ModelRef<T>, values: object): Promise<ModelRecord<T>> {
    const schema = this.schema(model);
    const supplied = suppliedValues(schema, values);
    const timestamp = this.clock();
    const stored: StoredValues = {};
    let id: RecordId | undefined;

    for (const field of schema.fields) {
      const value = supplied.get(field.name);

      switch (field.role) {
        case 'identifier':
          if (value !== undefined) {
            id = this.coerceId(schema, value);
          } else if (field.type === 'text') {
            // backends only generate numeric identifiers
            throw new MissingFieldError(schema.name, field.name);
          }
          break;

        case 'created-at':
        case 'updated-at':
          if (value !== undefined) throw new ReadOnlyFieldError(schema.name, field.name);
          stored[field.name] = timestamp;
          break;

        case 'data':
          if (value !== undefined) {
            stored[field.name] = coerceFieldValue(schema.name, field, value);
          } else if (field.default !== undefined) {
            stored[field.name] = field.default;
          } else if (field.nullable) {
            stored[field.name] = null;
          } else {
            throw new MissingFieldError(schema.name, field.name);
          }
          break;
      }
    }

    await this.checkUnique(namespace, schema, stored);
    const rowId = await this.backend.insert(namespace, schema.name, stored, id);
    return toRecord<T>(schema, { id: rowId, values: stored });
  }

  async get<T extends object>(namespace: string, model: ModelRef<T>, id: unknown): Promise<ModelRecord<T> | undefined> {
    const schema = this.schema(model);
    const row = await this.backend.fetch(namespace, schema.name, this.coerceId(schema, id));
    return row ? toRecord<T>(schema, row) : undefined;
  }

  async update<T extends object>(
    namespace: string,
    model: ModelRef<T>,
    id: unknown,
    values: object
  ): Promise<ModelRecord<T>> {
    const schema = this.schema(model);
    const rowId = this.coerceId(schema, id);
    const supplied = suppliedValues(schema, values);
    const changes: StoredValues = {};

    for (const field of schema.fields) {
      const value = supplied.get(field.name);

      if (field.role === 'updated-at') {
        if (value !== undefined) throw new ReadOnlyFieldError(schema.name, field.name);
        changes[field.name] = this.clock();
      } else if (value === undefined) {
        continue;
      } else if (field.role === 'created-at') {
        throw new ReadOnlyFieldError(schema.name, field.name);
      } else if (field.role === 'identifier') {
        // restating the current identifier is allowed
        if (this.coerceId(schema, value) !== rowId) throw new ReadOnlyFieldError(schema.name, field.name);
      } else {
        changes[field.name] = coerceFieldValue(schema.name, field, value);
      }
    }

    const current = await this.backend.fetch(namespace, schema.name, rowId);
    if (!current) throw new NotFoundError(schema.name, rowId);

    await this.checkUnique(namespace, schema, changes, rowId);
    const row = await this.backend.update(namespace, schema.name, rowId, changes);
    return toRecord<T>(schema, row);
  }

  async delete(namespace: string, model: ModelRef<object>, id: unknown): Promise<boolean> {
    const schema = this.schema(model);
    return this.backend.delete(namespace, schema.name, this.coerceId(schema, id));
  }

  query<T extends object>(
    namespace: string,
    model: ModelRef<T>,
    filter?: FilterCriteria,
    options?: QueryOptions
  ): RecordCursor<T> {
    const schema = this.schema(model);
    const scanFilter = compileFilter(schema, filter);
    const scanOptions = compileScanOptions(schema, options);

    return new RecordCursor<T>(
      () => this.backend.scan(namespace, schema.name, scanFilter, scanOptions),
      row => toRecord<T>(schema, row)
    );
  }

  async count(namespace: string, model: ModelRef<object>, filter?: FilterCriteria): Promise<number> {
    const schema = this.schema(model);
    return this.backend.count(namespace, schema.name, compileFilter(schema, filter));
  }

  async execute(namespace: string, request: EngineRequest): Promise<EngineResponse> {
    const ns = request.namespace === undefined ? namespace : assertNamespace(request.namespace);

    switch (request.action) {
      case 'create':
        return { action: 'create', record: await this.create<FieldValues>(ns, request.model, request.values) };
      case 'get':
        return { action: 'get', record: await this.get<FieldValues>(ns, request.model, request.id) };
      case 'update':
        return {
          action: 'update',
          record: await this.update<FieldValues>(ns, request.model, request.id, request.values),
        };
      case 'delete':
        return { action: 'delete', deleted: await this.delete(ns, request.model, request.id) };
      case 'query':
        return {
          action: 'query',
          records: await this.query<FieldValues>(ns, request.model, request.filter, request.options).toArray(),
        };
      case 'count':
        return { action: 'count', count: await this.count(ns, request.model, request.filter) };
    }
  }

  // --- Private ---

  private coerceId(schema: ModelSchema, id: unknown): RecordId {
    const field = identifierField(schema);
    const stored = coerceFieldValue(schema.name, field, id);
    if (typeof stored === 'string' || typeof stored === 'number') return stored;
    throw new TypeMismatchError(schema.name, field.name, field.type, describeValue(id));
  }

  /**
   * Reject values already held by another row in a unique field.
   * Not atomic against concurrent writers.
   */
  private async checkUnique(
    namespace: string,
    schema: ModelSchema,
    values: StoredValues,
    ownId?: RecordId
  ): Promise<void> {
    for (const field of schema.fields) {
      if (!field.unique || field.role !== 'data') continue;

      const value = values[field.name];
      if (value === undefined || value === null) continue;

      const filter = compileFilter(schema, { [field.name]: value });
      for await (const row of this.backend.scan(namespace, schema.name, filter, { limit: 2 })) {
        if (row.id !== ownId) throw new DuplicateKeyError(schema.name, field.name, value);
      }
    }
  }
}

// === Scope ===

/**
 * Engine operations bound to one namespace. Immutable: `use` on the engine
 * does not affect an existing scope.
 */
export class EngineScope implements DataOperations {
  /** @internal */
  constructor(
    private readonly core: EngineCore,
    readonly namespace: string
  ) {}

  create<T extends object = FieldValues>(model: ModelRef<T>, values: NoInfer<CreateInput<T>>): Promise<ModelRecord<T>> {
    return this.core.create(this.namespace, model, values);
  }

  get<T extends object = FieldValues>(model: ModelRef<T>, id: RecordId): Promise<ModelRecord<T> | undefined> {
    return this.core.get(this.namespace, model, id);
  }

  update<T extends object = FieldValues>(
    model: ModelRef<T>,
    id: RecordId,
    values: NoInfer<UpdateInput<T>>
  ): Promise<ModelRecord<T>> {
    return this.core.update(this.namespace, model, id, values);
  }

  delete(model: ModelRef<object>, id: RecordId): Promise<boolean> {
    return this.core.delete(this.namespace, model, id);
  }

  query<T extends object = FieldValues>(
    model: ModelRef<T>,
    filter?: FilterCriteria,
    options?: QueryOptions
  ): RecordCursor<T> {
    return this.core.query(this.namespace, model, filter, options);
  }

  count(model: ModelRef<object>, filter?: FilterCriteria): Promise<number> {
    return this.core.count(this.namespace, model, filter);
  }

  execute(request: EngineRequest): Promise<EngineResponse> {
    return this.core.execute(this.namespace, request);
  }
}

// === Engine ===

/**
 * Data engine.
 * Validates every request against the model registry, dispatches it to the
 * storage backend under the active namespace, and wraps results as Records.
 *
 * ```typescript
 * const engine = new DataEngine(new MemoryStorageBackend(), [usersDefinition]);
 * const alice = await engine.create('users', { name: 'Alice', age: 30 });
 * for await (const user of engine.query('users', { age: { gt: 20 } })) {
 *   console.log(user.name);
 * }
 * ```
 */
export class DataEngine implements DataOperations {
  private readonly core: EngineCore;
  private readonly events?: EventBus;
  private _namespace: string;

  constructor(
    backend: StorageBackend,
    models: ModelRegistry | readonly ModelSource[] = [],
    options: EngineOptions = {}
  ) {
    const registry = isRegistry(models) ? models : new DefaultModelRegistry(models.map(toDefinition));
    this.core = new EngineCore(registry, backend, options.clock ?? now);
    this.events = options.events;
    this._namespace = assertNamespace(options.defaultNamespace ?? DEFAULT_ENGINE_OPTIONS.defaultNamespace);
  }

  /**
   * Load every model definition file in `dir` and build an engine over them.
   */
  static fromDirectory(
    dir: string,
    backend: StorageBackend,
    options: EngineOptions & { load?: LoadOptions } = {}
  ): DataEngine {
    const { load, ...engineOptions } = options;
    return new DataEngine(backend, loadModelDefinitions(dir, load), engineOptions);
  }

  /** Access to the model registry. */
  get registry(): ModelRegistry {
    return this.core.registry;
  }

  /** Access to the storage backend. */
  get backend(): StorageBackend {
    return this.core.backend;
  }

  /** Active namespace */
  get namespace(): string {
    return this._namespace;
  }

  /**
   * Switch the active namespace. Namespaces come into existence on first write.
   * Operations already started keep the namespace they began with.
   */
  use(namespace: string): this {
    const next = assertNamespace(namespace);
    const previous = this._namespace;
    this._namespace = next;
    if (previous !== next) {
      this.events?.onNamespaceChanged?.({ from: previous, to: next });
    }
    return this;
  }

  /** Operations bound to `namespace`, independent of `use` */
  in(namespace: string): EngineScope {
    return new EngineScope(this.core, assertNamespace(namespace));
  }

  /**
   * Replace the loaded models. On SchemaError the previous models stay active.
   */
  reload(models: readonly ModelSource[]): void {
    try {
      this.core.registry.load(models.map(toDefinition));
    } catch (err) {
      if (err instanceof SchemaError) {
        this.events?.onModelsRejected?.({ model: err.modelName, issues: err.issues });
      }
      throw err;
    }
    this.events?.onModelsLoaded?.({ models: this.core.registry.modelNames() });
  }

  create<T extends object = FieldValues>(model: ModelRef<T>, values: NoInfer<CreateInput<T>>): Promise<ModelRecord<T>> {
    return this.core.create(this._namespace, model, values);
  }

  get<T extends object = FieldValues>(model: ModelRef<T>, id: RecordId): Promise<ModelRecord<T> | undefined> {
    return this.core.get(this._namespace, model, id);
  }

  update<T extends object = FieldValues>(
    model: ModelRef<T>,
    id: RecordId,
    values: NoInfer<UpdateInput<T>>
  ): Promise<ModelRecord<T>> {
    return this.core.update(this._namespace, model, id, values);
  }

  delete(model: ModelRef<object>, id: RecordId): Promise<boolean> {
    return this.core.delete(this._namespace, model, id);
  }

  /**
   * Matching records, as a cursor that rescans on every iteration.
   * The filter is checked now; the backend is not touched until iteration.
   */
  query<T extends object = FieldValues>(
    model: ModelRef<T>,
    filter?: FilterCriteria,
    options?: QueryOptions
  ): RecordCursor<T> {
    return this.core.query(this._namespace, model, filter, options);
  }

  count(model: ModelRef<object>, filter?: FilterCriteria): Promise<number> {
    return this.core.count(this._namespace, model, filter);
  }

  /** Run a create/get/update/delete/query/count described as data */
  execute(request: EngineRequest): Promise<EngineResponse> {
    return this.core.execute(this._namespace, request);
  }
}

function isRegistry(models: ModelRegistry | readonly ModelSource[]): models is ModelRegistry {
  return !Array.isArray(models);
}
