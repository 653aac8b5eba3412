import type { FieldDefinition, FieldSchema, FieldType, ModelDefinition, ModelSchema } from '../types/schema';
import type { SchemaIssue } from '../types/errors';
import {
  CREATED_AT_FIELD,
  DEFAULT_IDENTIFIER_FIELD,
  FIELD_TYPES,
  IDENTIFIER_TYPES,
  UPDATED_AT_FIELD,
} from '../types/schema';
import { SchemaError } from '../types/errors';
import { describeValue, toStoredValue } from './field-values';

/** Model, field and namespace names */
export const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isFieldType(type: string): type is FieldType {
  return FIELD_TYPES.some(t => t === type);
}

/** The declared field acting as identifier, if any */
function findIdentifier(def: ModelDefinition): FieldDefinition | undefined {
  const primary = def.fields.filter(f => f.primary);
  if (primary.length > 0) return primary[0];
  return def.fields.find(f => f.name === DEFAULT_IDENTIFIER_FIELD);
}

export function validateModelDefinition(def: ModelDefinition): SchemaIssue[] {
  const issues: SchemaIssue[] = [];

  if (!def.name) {
    issues.push({ path: 'name', message: 'Required', severity: 'error' });
  } else if (!NAME_PATTERN.test(def.name)) {
    issues.push({ path: 'name', message: `"${def.name}" is not a valid model name`, severity: 'error' });
  }

  if (!Array.isArray(def.fields) || def.fields.length === 0) {
    issues.push({ path: 'fields', message: 'At least one field required', severity: 'error' });
    return issues;
  }

  const seen = new Set<string>();
  def.fields.forEach((field, i) => {
    const path = `fields[${i}]`;

    if (!field.name) {
      issues.push({ path: `${path}.name`, message: 'Required', severity: 'error' });
    } else if (!NAME_PATTERN.test(field.name)) {
      issues.push({ path: `${path}.name`, message: `"${field.name}" is not a valid field name`, severity: 'error' });
    } else if (seen.has(field.name)) {
      issues.push({ path: `${path}.name`, message: `Duplicate field "${field.name}"`, severity: 'error' });
    }
    seen.add(field.name);

    if (!isFieldType(field.type)) {
      issues.push({ path: `${path}.type`, message: `Unsupported type "${field.type}"`, severity: 'error' });
      return;
    }

    if (field.default !== undefined) {
      if (field.default === null) {
        if (!field.nullable) {
          issues.push({ path: `${path}.default`, message: 'null default on a non-nullable field', severity: 'error' });
        }
      } else if (toStoredValue(field.type, field.default) === undefined) {
        issues.push({
          path: `${path}.default`,
          message: `Default must be ${field.type}, got ${describeValue(field.default)}`,
          severity: 'error',
        });
      }
    }
  });

  const primary = def.fields.filter(f => f.primary);
  if (primary.length > 1) {
    issues.push({
      path: 'fields',
      message: `Multiple primary fields: ${primary.map(f => f.name).join(', ')}`,
      severity: 'error',
    });
  }

  const identifier = findIdentifier(def);
  if (identifier) {
    const path = `fields[${def.fields.indexOf(identifier)}]`;
    if (!IDENTIFIER_TYPES.some(t => t === identifier.type)) {
      issues.push({
        path: `${path}.type`,
        message: `Identifier "${identifier.name}" must be one of ${IDENTIFIER_TYPES.join(', ')}`,
        severity: 'error',
      });
    }
    if (identifier.nullable) {
      issues.push({ path: `${path}.nullable`, message: `Identifier "${identifier.name}" cannot be nullable`, severity: 'error' });
    }
    if (identifier.default !== undefined) {
      issues.push({ path: `${path}.default`, message: `Identifier "${identifier.name}" cannot have a default`, severity: 'error' });
    }
    if (identifier.unique) {
      issues.push({ path: `${path}.unique`, message: 'Identifiers are always unique', severity: 'warning' });
    }
  }

  if (def.timestamps) {
    for (const managed of [CREATED_AT_FIELD, UPDATED_AT_FIELD]) {
      if (seen.has(managed)) {
        issues.push({ path: 'timestamps', message: `Field "${managed}" clashes with managed timestamps`, severity: 'error' });
      }
    }
  }

  return issues;
}

/**
 * Validate a definition and derive its frozen schema.
 * Throws SchemaError when any issue has error severity.
 */
export function buildModelSchema(def: ModelDefinition): ModelSchema {
  const issues = validateModelDefinition(def);
  if (issues.some(i => i.severity === 'error')) {
    throw new SchemaError(def.name || '<unnamed>', issues.filter(i => i.severity === 'error'));
  }

  const identifier = findIdentifier(def);
  const fields: FieldSchema[] = [];

  if (!identifier) {
    fields.push(
      Object.freeze({ name: DEFAULT_IDENTIFIER_FIELD, type: 'identifier', nullable: false, unique: true, role: 'identifier' } satisfies FieldSchema)
    );
  }

  for (const field of def.fields) {
    const { type } = field;
    if (!isFieldType(type)) continue;
    const isId = field === identifier;
    fields.push(
      Object.freeze({
        name: field.name,
        type,
        nullable: isId ? false : field.nullable ?? false,
        default: field.default === undefined || field.default === null ? field.default : toStoredValue(type, field.default),
        unique: isId || (field.unique ?? false),
        role: isId ? 'identifier' : 'data',
      } satisfies FieldSchema)
    );
  }

  if (def.timestamps) {
    fields.push(
      Object.freeze({ name: CREATED_AT_FIELD, type: 'timestamp', nullable: false, unique: false, role: 'created-at' } satisfies FieldSchema),
      Object.freeze({ name: UPDATED_AT_FIELD, type: 'timestamp', nullable: false, unique: false, role: 'updated-at' } satisfies FieldSchema)
    );
  }

  return Object.freeze({
    name: def.name,
    fields: Object.freeze(fields),
    identifier: identifier?.name ?? DEFAULT_IDENTIFIER_FIELD,
    timestamps: def.timestamps ?? false,
  });
}
