/**
 * Minimal Postgres pool interface. A `pg` Pool satisfies it; tests pass a fake.
 */
export interface PoolLike {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}
