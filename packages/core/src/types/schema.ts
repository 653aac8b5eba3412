/**
 * Schema Types: model definitions and validated schemas
 *
 * A ModelDefinition is the plain data a discovery collaborator hands the
 * registry. A ModelSchema is the validated, frozen form the engine works with.
 */

// ── Field types ─────────────────────────────────────────────────

/** Closed set of declared field types */
export type FieldType = 'integer' | 'float' | 'text' | 'boolean' | 'timestamp' | 'identifier';

export const FIELD_TYPES: readonly FieldType[] = [
  'integer',
  'float',
  'text',
  'boolean',
  'timestamp',
  'identifier',
];

/** Types an identifier field may be declared with */
export const IDENTIFIER_TYPES: readonly FieldType[] = ['identifier', 'integer', 'text'];

/** Record identifier as handed to and returned by backends */
export type RecordId = string | number;

/** Runtime value of each declared type, as seen on a Record */
export interface FieldTypeMap {
  integer: number;
  float: number;
  text: string;
  boolean: boolean;
  timestamp: Date;
  identifier: RecordId;
}

/** Any value a Record field can hold */
export type FieldValue = FieldTypeMap[FieldType] | null;

/** Field name → value, the untyped shape of Record data */
export type FieldValues = { [field: string]: FieldValue };

/** Canonical value kept by backends (timestamps are epoch ms) */
export type StoredValue = string | number | boolean | null;

/** Field name → canonical value */
export type StoredValues = { [field: string]: StoredValue };

// ── Definitions (input) ─────────────────────────────────────────

/** A field as declared by a model definition */
export interface FieldDefinition {
  readonly name: string;
  /** Declared type tag, checked against FIELD_TYPES at load */
  readonly type: string;
  readonly nullable?: boolean;
  /** Applied on create when the field is absent */
  readonly default?: string | number | boolean | null;
  readonly unique?: boolean;
  /** Marks the primary identifier */
  readonly primary?: boolean;
}

/** A model as supplied by the discovery collaborator */
export interface ModelDefinition {
  readonly name: string;
  readonly fields: readonly FieldDefinition[];
  /** Adds engine-managed createdAt / updatedAt timestamps */
  readonly timestamps?: boolean;
}

// ── Schema (validated) ──────────────────────────────────────────

/** How a field's value is produced */
export type FieldRole = 'data' | 'identifier' | 'created-at' | 'updated-at';

export interface FieldSchema {
  readonly name: string;
  readonly type: FieldType;
  readonly nullable: boolean;
  /** Canonical default, undefined when none was declared */
  readonly default?: StoredValue;
  readonly unique: boolean;
  readonly role: FieldRole;
}

export interface ModelSchema {
  readonly name: string;
  /** Ordered as declared; an auto-assigned identifier comes first */
  readonly fields: readonly FieldSchema[];
  /** Name of the primary identifier field */
  readonly identifier: string;
  readonly timestamps: boolean;
}

export const DEFAULT_IDENTIFIER_FIELD = 'id';
export const CREATED_AT_FIELD = 'createdAt';
export const UPDATED_AT_FIELD = 'updatedAt';

// ── Type inference for typed definitions ────────────────────────

type DeclaredField<D extends ModelDefinition> = D['fields'][number];

type ValueOf<F extends FieldDefinition> = F['type'] extends FieldType
  ? F extends { readonly nullable: true }
    ? FieldTypeMap[F['type']] | null
    : FieldTypeMap[F['type']]
  : FieldValue;

type DeclaredValues<D extends ModelDefinition> = {
  [F in DeclaredField<D> as F['name']]: ValueOf<F>;
};

type HasIdentifier<D extends ModelDefinition> = [Extract<DeclaredField<D>, { readonly primary: true }>] extends [never]
  ? 'id' extends DeclaredField<D>['name']
    ? true
    : false
  : true;

type IdentifierValues<D extends ModelDefinition> = HasIdentifier<D> extends true ? unknown : { id: RecordId };

type TimestampValues<D extends ModelDefinition> = D extends { readonly timestamps: true }
  ? { createdAt: Date; updatedAt: Date }
  : unknown;

/**
 * Field values inferred from a definition written `as const`.
 *
 * ```typescript
 * const def = { name: 'users', fields: [{ name: 'name', type: 'text' }] } as const;
 * type User = InferValues<typeof def>; // { name: string; id: RecordId }
 * ```
 */
export type InferValues<D extends ModelDefinition> = DeclaredValues<D> & IdentifierValues<D> & TimestampValues<D>;
