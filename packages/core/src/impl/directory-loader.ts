/**
 * Directory loader: reads model definition files from disk.
 *
 * Each `*.json` file holds one ModelDefinition. Files whose name starts with
 * `_` are skipped. A definition without `name` takes one derived from the
 * file stem (`User.json` → `users`).
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, basename, join } from 'node:path';
import Ajv from 'ajv';
import type { ModelDefinition } from '../types/schema';
import type { SchemaIssue } from '../types/errors';
import { SchemaError } from '../types/errors';

export interface LoadOptions {
  /** File extensions to read (default: ['.json']) */
  extensions?: string[];
}

export const DEFAULT_LOAD_OPTIONS: Required<LoadOptions> = {
  extensions: ['.json'],
};

/** Shape of a definition file; `name` may be left to the file stem */
type DefinitionFile = Omit<ModelDefinition, 'name'> & { name?: string };

const definitionFileSchema = {
  type: 'object',
  required: ['fields'],
  additionalProperties: false,
  properties: {
    name: { type: 'string' },
    timestamps: { type: 'boolean' },
    fields: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'type'],
        additionalProperties: false,
        properties: {
          name: { type: 'string' },
          type: { type: 'string' },
          nullable: { type: 'boolean' },
          default: { type: ['string', 'number', 'boolean', 'null'] },
          unique: { type: 'boolean' },
          primary: { type: 'boolean' },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateFile = ajv.compile<DefinitionFile>(definitionFileSchema);

/**
 * Model name for a file stem: lower-cased and pluralised.
 * `User` → `users`, `Company` → `companies`, `Class` → `classes`.
 */
export function deriveModelName(stem: string): string {
  const lower = stem.toLowerCase();
  if (lower.endsWith('y')) return `${lower.slice(0, -1)}ies`;
  if (lower.endsWith('s')) return `${lower}es`;
  return `${lower}s`;
}

/**
 * Read every definition file in `dir`, in file name order.
 * Throws SchemaError for a file that is not valid JSON or not definition-shaped.
 */
export function loadModelDefinitions(dir: string, options: LoadOptions = {}): ModelDefinition[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new Error(`Model directory not found: ${dir}`);
  }

  const extensions = options.extensions ?? DEFAULT_LOAD_OPTIONS.extensions;
  const files = readdirSync(dir)
    .filter(file => !file.startsWith('_') && extensions.includes(extname(file)))
    .sort();

  return files.map(file => loadFile(join(dir, file)));
}

function loadFile(path: string): ModelDefinition {
  const file = basename(path);
  const stem = basename(path, extname(path));

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new SchemaError(file, [
      { path: file, message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, severity: 'error' },
    ]);
  }

  if (!validateFile(parsed)) {
    const issues: SchemaIssue[] = (validateFile.errors ?? []).map(e => ({
      path: e.instancePath ? `${file}${e.instancePath.replace(/\//g, '.')}` : file,
      message: e.message ?? e.keyword,
      severity: 'error' as const,
    }));
    throw new SchemaError(file, issues);
  }

  return { ...parsed, name: parsed.name ?? deriveModelName(stem) };
}
