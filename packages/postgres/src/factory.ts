import pg from 'pg';
import type { Pool } from 'pg';
import { applySchema } from './schema';
import { PgStorageBackend, DEFAULT_PG_OPTIONS, type PgStorageOptions } from './storage-backend';

export interface PgBackendConfig extends PgStorageOptions {
  /** Existing pool; takes precedence over connectionString */
  pool?: Pool;
  connectionString?: string;
  /** Create the tables before returning. Default true. */
  applySchema?: boolean;
}

export interface PgBackend {
  backend: PgStorageBackend;
  pool: Pool;
  /** Ends the pool when the factory created it */
  close(): Promise<void>;
}

/**
 * Create a Postgres backend from a pool or a connection string.
 */
export async function createPgBackend(config: PgBackendConfig = {}): Promise<PgBackend> {
  const owned = !config.pool;
  const pool = config.pool ?? new pg.Pool({ connectionString: config.connectionString });

  if (config.applySchema ?? true) {
    try {
      await applySchema(pool, config.tablePrefix ?? DEFAULT_PG_OPTIONS.tablePrefix);
    } catch (err) {
      if (owned) await pool.end();
      throw err;
    }
  }

  return {
    backend: new PgStorageBackend(pool, config),
    pool,
    close: async () => {
      if (owned) await pool.end();
    },
  };
}
