import { describe, it, expect, beforeEach } from 'vitest';
import { DefaultModelRegistry } from '../impl/model-registry';
import { validateModelDefinition, buildModelSchema } from '../utils/validation';
import { SchemaError, UnknownModelError } from '../types/errors';
import type { ModelDefinition } from '../types/schema';
import { usersModel, postsModel, accountsModel } from './models';

describe('DefaultModelRegistry', () => {
  let registry: DefaultModelRegistry;

  beforeEach(() => {
    registry = new DefaultModelRegistry();
  });

  it('loads and resolves models', () => {
    registry.load([usersModel, postsModel]);

    expect(registry.has('users')).toBe(true);
    expect(registry.modelNames()).toEqual(['users', 'posts']);
    expect(registry.resolve('users').fields.map(f => f.name)).toEqual(['id', 'name', 'age']);
  });

  it('throws UnknownModelError for unregistered models', () => {
    expect(() => registry.resolve('ghosts')).toThrow(UnknownModelError);
    expect(() => registry.resolve('ghosts')).toThrow('Model "ghosts" is not registered');
  });

  it('freezes schemas', () => {
    registry.load([usersModel]);
    const schema = registry.resolve('users');

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields[1])).toBe(true);
  });

  it('replaces the whole mapping on load', () => {
    registry.load([usersModel]);
    registry.load([postsModel]);

    expect(registry.modelNames()).toEqual(['posts']);
  });

  it('keeps the prior mapping when any definition fails', () => {
    registry.load([usersModel]);

    expect(() => registry.load([postsModel, { name: 'broken', fields: [{ name: 'x', type: 'uuid' }] }])).toThrow(
      SchemaError
    );
    expect(registry.modelNames()).toEqual(['users']);
  });

  it('rejects a model defined twice', () => {
    expect(() => registry.load([usersModel, usersModel])).toThrow('Model "users" defined more than once');
  });

  it('accepts definitions in the constructor', () => {
    const prepared = new DefaultModelRegistry([accountsModel]);
    expect(prepared.schemas().map(s => s.name)).toEqual(['accounts']);
  });

  it('validate() reports issues without loading', () => {
    const issues = registry.validate({ name: 'things', fields: [{ name: 'id', type: 'integer', unique: true }] });

    expect(issues).toEqual([{ path: 'fields[0].unique', message: 'Identifiers are always unique', severity: 'warning' }]);
    expect(registry.has('things')).toBe(false);
  });
});

describe('buildModelSchema', () => {
  it('adds an identifier when none is declared', () => {
    const schema = buildModelSchema(usersModel);

    expect(schema.identifier).toBe('id');
    expect(schema.fields[0]).toEqual({ name: 'id', type: 'identifier', nullable: false, unique: true, role: 'identifier' });
  });

  it('uses a field named id as identifier', () => {
    const schema = buildModelSchema({ name: 'codes', fields: [{ name: 'id', type: 'integer' }, { name: 'label', type: 'text' }] });

    expect(schema.identifier).toBe('id');
    expect(schema.fields.map(f => f.role)).toEqual(['identifier', 'data']);
  });

  it('prefers a primary field', () => {
    const schema = buildModelSchema(accountsModel);

    expect(schema.identifier).toBe('handle');
    expect(schema.fields.map(f => f.name)).toEqual(['handle', 'plan']);
    expect(schema.fields[1].default).toBe('free');
  });

  it('appends managed timestamps', () => {
    const schema = buildModelSchema(postsModel);

    expect(schema.timestamps).toBe(true);
    expect(schema.fields.slice(-2).map(f => [f.name, f.type, f.role])).toEqual([
      ['createdAt', 'timestamp', 'created-at'],
      ['updatedAt', 'timestamp', 'updated-at'],
    ]);
  });

  it('carries every error issue on SchemaError', () => {
    const def: ModelDefinition = {
      name: 'bad',
      fields: [
        { name: 'a', type: 'text' },
        { name: 'a', type: 'integer' },
      ],
    };

    try {
      buildModelSchema(def);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({
        code: 'SCHEMA_INVALID',
        modelName: 'bad',
        issues: [{ path: 'fields[1].name', message: 'Duplicate field "a"', severity: 'error' }],
      });
    }
  });
});

describe('validateModelDefinition', () => {
  function messages(def: ModelDefinition): string[] {
    return validateModelDefinition(def).map(i => `${i.path}: ${i.message}`);
  }

  it('accepts a well-formed definition', () => {
    expect(validateModelDefinition(usersModel)).toEqual([]);
  });

  it('checks names', () => {
    expect(messages({ name: '', fields: [{ name: 'a', type: 'text' }] })).toEqual(['name: Required']);
    expect(messages({ name: 'my-model', fields: [{ name: '9a', type: 'text' }] })).toEqual([
      'name: "my-model" is not a valid model name',
      'fields[0].name: "9a" is not a valid field name',
    ]);
  });

  it('requires at least one field', () => {
    expect(messages({ name: 'empty', fields: [] })).toEqual(['fields: At least one field required']);
  });

  it('rejects unsupported types', () => {
    expect(messages({ name: 'm', fields: [{ name: 'a', type: 'decimal' }] })).toEqual([
      'fields[0].type: Unsupported type "decimal"',
    ]);
  });

  it('checks defaults against the declared type', () => {
    expect(
      messages({
        name: 'm',
        fields: [
          { name: 'a', type: 'integer', default: 'one' },
          { name: 'b', type: 'text', default: null },
          { name: 'c', type: 'text', nullable: true, default: null },
        ],
      })
    ).toEqual(['fields[0].default: Default must be integer, got string', 'fields[1].default: null default on a non-nullable field']);
  });

  it('checks the identifier', () => {
    expect(
      messages({
        name: 'm',
        fields: [
          { name: 'a', type: 'text', primary: true },
          { name: 'b', type: 'text', primary: true },
        ],
      })
    ).toEqual(['fields: Multiple primary fields: a, b']);

    expect(messages({ name: 'm', fields: [{ name: 'key', type: 'boolean', primary: true, nullable: true }] })).toEqual([
      'fields[0].type: Identifier "key" must be one of identifier, integer, text',
      'fields[0].nullable: Identifier "key" cannot be nullable',
    ]);

    expect(messages({ name: 'm', fields: [{ name: 'id', type: 'integer', default: 1 }] })).toEqual([
      'fields[0].default: Identifier "id" cannot have a default',
    ]);
  });

  it('rejects fields clashing with managed timestamps', () => {
    expect(messages({ name: 'm', timestamps: true, fields: [{ name: 'createdAt', type: 'timestamp' }] })).toEqual([
      'timestamps: Field "createdAt" clashes with managed timestamps',
    ]);
  });
});
