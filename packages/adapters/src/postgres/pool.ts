import pg from 'pg';

const { Pool } = pg;

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number | null;
}

/** The part of pg's Pool/PoolClient the repositories use. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlExecutor {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlClient>;
}

let _pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: Number(process.env['PG_POOL_MAX'] ?? 10),
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'fleetwatch-engine',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  fn: (client: SqlExecutor) => Promise<T>,
  pool: SqlPool = getPool(),
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/** Postgres unique_violation. */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}
