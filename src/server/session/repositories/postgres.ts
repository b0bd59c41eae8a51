/**
 * PostgreSQL session state repository
 * Used when several processes share one session store
 *
 * Schema (created by ensureSessionStateSchema):
 *
 * CREATE TABLE session_state (
 *   session_key TEXT PRIMARY KEY,  -- e.g. "state.json" or "state-<id>.json"
 *   data JSONB NOT NULL,
 *   updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
 * );
 */

import { query, queryOne } from '../../db/pg.js';
import type { PersistedSessionState } from '../state.js';
import type { SessionStateRepository } from './types.js';

export async function ensureSessionStateSchema(): Promise<void> {
  await query(
    `CREATE TABLE IF NOT EXISTS session_state (
       session_key TEXT PRIMARY KEY,
       data JSONB NOT NULL,
       updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );
}

export class PostgresSessionStateRepository implements SessionStateRepository {
  async exists(key: string): Promise<boolean> {
    const row = await queryOne<{ found: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM session_state WHERE session_key = $1) AS found',
      [key]
    );
    return row?.found === true;
  }

  async read(key: string): Promise<unknown> {
    const row = await queryOne<{ data: unknown }>(
      'SELECT data FROM session_state WHERE session_key = $1',
      [key]
    );
    return row ? row.data : null;
  }

  async write(key: string, record: PersistedSessionState): Promise<void> {
    // Single-statement upsert: readers see the old row or the new one
    await query(
      `INSERT INTO session_state (session_key, data, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (session_key) DO UPDATE SET
         data = EXCLUDED.data,
         updated_at = EXCLUDED.updated_at`,
      [key, JSON.stringify(record)]
    );
  }

  async delete(key: string): Promise<void> {
    await query('DELETE FROM session_state WHERE session_key = $1', [key]);
  }
}
