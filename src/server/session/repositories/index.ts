/**
 * Session State Repository Factory
 *
 * Provides the appropriate repository implementation based on configuration.
 * - SESSION_STORAGE_DRIVER=postgres: PostgreSQL table (needs DATABASE_URL)
 * - SESSION_STORAGE_DRIVER=memory: in-process only, nothing survives a restart
 * - SESSION_STORAGE_DRIVER=file (or unset): JSON files in the state directory
 */

import { isPostgresConfigured } from '../../db/pg.js';
import { FileSessionStateRepository } from './file.js';
import { InMemorySessionStateRepository } from './inMemory.js';
import { PostgresSessionStateRepository } from './postgres.js';
import type { SessionStateRepository, StorageDriver } from './types.js';

export type { SessionStateRepository, StorageDriver } from './types.js';
export { FileSessionStateRepository } from './file.js';
export { InMemorySessionStateRepository } from './inMemory.js';
export { PostgresSessionStateRepository, ensureSessionStateSchema } from './postgres.js';

/**
 * Get the configured storage driver
 */
export function getStorageDriver(): StorageDriver {
  const driver = process.env.SESSION_STORAGE_DRIVER;

  if (driver === 'postgres') {
    if (!isPostgresConfigured()) {
      console.warn('[session] SESSION_STORAGE_DRIVER=postgres but DATABASE_URL not set, falling back to file');
      return 'file';
    }
    return 'postgres';
  }

  if (driver === 'memory') {
    return 'memory';
  }

  return 'file';
}

/**
 * Create a repository for the given driver
 */
export function createSessionStateRepository(
  driver: StorageDriver,
  options: { stateDir: string }
): SessionStateRepository {
  console.log(`[session] Initializing session state repository with driver: ${driver}`);

  switch (driver) {
    case 'postgres':
      return new PostgresSessionStateRepository();
    case 'memory':
      return new InMemorySessionStateRepository();
    case 'file':
      return new FileSessionStateRepository(options.stateDir);
  }
}
