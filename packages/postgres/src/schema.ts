import type { PoolLike } from './pool';

export const SCHEMA_VERSION = '0.1.0';

const PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface TableNames {
  records: string;
  sequences: string;
}

/**
 * Table names for a prefix. Throws when the prefix is not a plain identifier,
 * since it is spliced into SQL.
 */
export function tableNames(prefix: string): TableNames {
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new Error(`Invalid table prefix "${prefix}"`);
  }
  return { records: `${prefix}records`, sequences: `${prefix}sequences` };
}

/**
 * DDL for the shared record tables.
 *
 * Every model of every namespace lives in one `records` table, keyed by
 * (namespace, model, id) with the field values in a JSONB column. `seq`
 * gives a stable scan order. `sequences` holds the last generated
 * identifier per (namespace, model).
 */
export function createSchema(prefix = 'am_'): string {
  const t = tableNames(prefix);
  return `
-- ============================================
-- automap Postgres Schema v${SCHEMA_VERSION}
-- ============================================

CREATE TABLE IF NOT EXISTS ${t.records} (
  namespace   TEXT NOT NULL,
  model       TEXT NOT NULL,
  id          JSONB NOT NULL,
  data        JSONB NOT NULL DEFAULT '{}',
  seq         BIGSERIAL,
  PRIMARY KEY (namespace, model, id)
);

CREATE INDEX IF NOT EXISTS idx_${t.records}_seq ON ${t.records}(namespace, model, seq);

CREATE TABLE IF NOT EXISTS ${t.sequences} (
  namespace   TEXT NOT NULL,
  model       TEXT NOT NULL,
  last_id     BIGINT NOT NULL,
  PRIMARY KEY (namespace, model)
);
`;
}

/**
 * Apply schema to database.
 */
export async function applySchema(pool: PoolLike, prefix = 'am_'): Promise<void> {
  await pool.query(createSchema(prefix));
}
