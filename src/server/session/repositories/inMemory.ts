/**
 * In-memory session state repository
 * Used for testing and development when nothing should touch disk
 */

import type { PersistedSessionState } from '../state.js';
import type { SessionStateRepository } from './types.js';

export class InMemorySessionStateRepository implements SessionStateRepository {
  // Serialized so callers never share a reference with the store
  private records = new Map<string, string>();

  async exists(key: string): Promise<boolean> {
    return this.records.has(key);
  }

  async read(key: string): Promise<unknown> {
    const raw = this.records.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async write(key: string, record: PersistedSessionState): Promise<void> {
    this.records.set(key, JSON.stringify(record));
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  /** Seed a raw record, bypassing the typed write path (for tests) */
  seed(key: string, record: unknown): void {
    this.records.set(key, JSON.stringify(record));
  }
}
