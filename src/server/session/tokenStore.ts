/**
 * Token Store
 *
 * Owns the session state record: writes token responses into it, and
 * saves/restores its durable subset through a SessionStateRepository.
 */

import { z } from 'zod';
import type { SessionConfig } from './sessionConfig.js';
import type { SessionStateRepository } from './repositories/types.js';
import {
  createLoggedOutState,
  fromPersistedState,
  nowInSeconds,
  persistedSessionStateSchema,
  toPersistedState,
  type SessionState,
} from './state.js';
import { verifyScopes } from './scopes.js';
import { isOAuthErrorBody } from './tokenClient.js';
import { logSessionEvent, tokenPreview } from './logger.js';

const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  scope: z.string().optional(),
  refresh_token: z.string().optional(),
});

function expiresInSeconds(value: number | string | undefined): number {
  const seconds = Math.floor(Number(value));
  // Missing or garbled lifetimes count as already expired
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

export class TokenStore {
  private current: SessionState = createLoggedOutState();

  constructor(
    private readonly config: SessionConfig,
    private readonly repository: SessionStateRepository,
  ) {}

  get state(): Readonly<SessionState> {
    return this.current;
  }

  /**
   * Store the fields of a token endpoint response.
   * A response without an access token logs the session out.
   */
  async save(body: unknown): Promise<boolean> {
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      logSessionEvent('token_exchange_failed', {
        error: isOAuthErrorBody(body) ? body.error : 'no_access_token',
        error_description: isOAuthErrorBody(body) ? body.error_description : undefined,
      });
      await this.reset();
      return false;
    }

    const token = parsed.data;
    const grantedScope = token.scope ?? '';
    verifyScopes(this.config.scopes, grantedScope);

    this.current.tokenScope = grantedScope;
    this.current.accessToken = token.access_token;
    this.current.tokenExpiresAt = nowInSeconds() + expiresInSeconds(token.expires_in);
    // An omitted refresh_token keeps the one already held
    if (token.refresh_token !== undefined) {
      this.current.refreshToken = token.refresh_token;
    }
    this.current.loggedIn = true;

    logSessionEvent('token_saved', {
      access_token: tokenPreview(token.access_token),
      expires_at: this.current.tokenExpiresAt,
      refresh_token_rotated: token.refresh_token !== undefined,
      scope: grantedScope,
    });
    return true;
  }

  /**
   * Write the durable subset of the state, if caching is enabled.
   */
  async persist(): Promise<void> {
    if (!this.config.cacheState) return;
    await this.repository.write(this.config.stateKey, toPersistedState(this.current));
    logSessionEvent('session_persisted', { key: this.config.stateKey });
  }

  /**
   * Load persisted state. Returns true when a record was restored.
   * With caching disabled, any leftover record is removed instead.
   */
  async restore(): Promise<boolean> {
    const key = this.config.stateKey;

    if (!this.config.cacheState) {
      if (await this.repository.exists(key)) {
        await this.repository.delete(key);
        logSessionEvent('session_cleared', { key, reason: 'cache_disabled' });
      }
      return false;
    }

    const record = await this.repository.read(key);
    if (record === null) return false;

    const parsed = persistedSessionStateSchema.safeParse(record);
    if (!parsed.success) {
      console.warn(`[session] Discarding malformed session state record "${key}"`);
      await this.repository.delete(key);
      logSessionEvent('session_cleared', { key, reason: 'malformed_record' });
      return false;
    }

    this.current = fromPersistedState(parsed.data);
    logSessionEvent('session_restored', {
      key,
      logged_in: this.current.loggedIn,
      expires_at: this.current.tokenExpiresAt,
    });
    return true;
  }

  /**
   * Back to the logged-out default; the durable copy is removed too.
   */
  async reset(): Promise<void> {
    this.current = createLoggedOutState();
    const key = this.config.stateKey;
    if (await this.repository.exists(key)) {
      await this.repository.delete(key);
      logSessionEvent('session_cleared', { key, reason: 'logout' });
    }
  }

  beginAuthorization(nonce: string, authorizationUrl: string): void {
    this.current.authorizationNonce = nonce;
    this.current.authorizationUrl = authorizationUrl;
  }

  clearNonce(): void {
    this.current.authorizationNonce = null;
  }
}
