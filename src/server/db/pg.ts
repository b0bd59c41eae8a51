/**
 * PostgreSQL pool for the shared session store
 * Opened on first use; only the postgres state repository reaches it
 */

import pg from 'pg';

let pool: pg.Pool | null = null;

/**
 * True when DATABASE_URL is set, so the postgres storage driver can be used
 */
export function isPostgresConfigured(): boolean {
  return Boolean(process.env.DATABASE_URL);
}

/**
 * Pool for session state queries. Throws without DATABASE_URL.
 */
export function getPool(): pg.Pool {
  if (pool) return pool;

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is not configured');
  }

  // Session reads and writes are single short statements
  pool = new pg.Pool({
    connectionString,
    application_name: 'graph-auth-session',
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    console.error('[session-store] Idle database client failed:', err.message);
  });

  console.log('[session-store] Database pool opened');
  return pool;
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<{ rows: T[]; rowCount: number | null }> {
  const { rows, rowCount } = await getPool().query<T>(text, params);
  return { rows, rowCount };
}

/** First row of a session_state lookup, or null */
export async function queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<T | null> {
  const { rows } = await query<T>(text, params);
  return rows[0] ?? null;
}

/**
 * Release the pool on shutdown
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
  console.log('[session-store] Database pool closed');
}
