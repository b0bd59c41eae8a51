/**
 * Repository interface for durable session state
 *
 * One record per key, one owner per record. Writers must replace the
 * record atomically so readers never observe a partial write.
 */

import type { PersistedSessionState } from '../state.js';

export interface SessionStateRepository {
  exists(key: string): Promise<boolean>;
  /** Raw stored record, or null when there is none. Validation is the caller's job. */
  read(key: string): Promise<unknown>;
  write(key: string, record: PersistedSessionState): Promise<void>;
  delete(key: string): Promise<void>;
}

export type StorageDriver = 'file' | 'memory' | 'postgres';
