/**
 * Session registry
 * One independently owned GraphSession per external session id
 */

import { ConfigurationError } from './errors.js';
import { GraphSession, type GraphSessionDeps } from './graphSession.js';
import type { SessionConfig } from './sessionConfig.js';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function stateKeyFor(sessionId: string): string {
  return `state-${sessionId}.json`;
}

export class SessionRegistry {
  // Promises, so concurrent lookups of a new id open it once
  private sessions = new Map<string, Promise<GraphSession>>();

  constructor(
    private readonly config: SessionConfig,
    private readonly deps: GraphSessionDeps,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  async get(sessionId: string): Promise<GraphSession> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new ConfigurationError(`Invalid session id: ${sessionId}`);
    }

    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const config: SessionConfig = Object.freeze({ ...this.config, stateKey: stateKeyFor(sessionId) });
    const opening = GraphSession.open(config, this.deps);
    this.sessions.set(sessionId, opening);

    try {
      return await opening;
    } catch (error) {
      this.sessions.delete(sessionId);
      throw error;
    }
  }

  /**
   * Log the session out and forget it. Returns false for unknown ids.
   */
  async drop(sessionId: string): Promise<boolean> {
    const pending = this.sessions.get(sessionId);
    if (!pending) return false;

    this.sessions.delete(sessionId);
    const session = await pending;
    await session.logout();
    return true;
  }
}
