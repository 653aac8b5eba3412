// Schema
export { createSchema, tableNames, SCHEMA_VERSION, applySchema, type TableNames } from './schema';

// Storage
export { PgStorageBackend, DEFAULT_PG_OPTIONS, type PgStorageOptions } from './storage-backend';
export { SqlParams, conditionSql, whereSql, orderSql, fieldExpression } from './filter-sql';
export type { PoolLike } from './pool';
export { createPgBackend, type PgBackendConfig, type PgBackend } from './factory';
