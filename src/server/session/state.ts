/**
 * Session state model
 *
 * Only the fields of PersistedSessionState ever leave the process.
 * The authorization nonce is request-scoped and is never persisted.
 */

import { z } from 'zod';

export interface SessionState {
  accessToken: string | null;
  refreshToken: string | null;
  /** Epoch seconds; 0 means no valid token */
  tokenExpiresAt: number;
  /** Space-delimited scopes as granted by the provider */
  tokenScope: string;
  loggedIn: boolean;
  /** Nonce sent as `state` by the pending login, single use */
  authorizationNonce: string | null;
  /** Last authorization URL built by login(), kept for diagnostics */
  authorizationUrl: string;
}

export const persistedSessionStateSchema = z.object({
  access_token: z.string().nullable(),
  refresh_token: z.string().nullable(),
  token_expires_at: z.number().int().nonnegative(),
  token_scope: z.string(),
  loggedin: z.boolean(),
});

export type PersistedSessionState = z.infer<typeof persistedSessionStateSchema>;

export function createLoggedOutState(): SessionState {
  return {
    accessToken: null,
    refreshToken: null,
    tokenExpiresAt: 0,
    tokenScope: '',
    loggedIn: false,
    authorizationNonce: null,
    authorizationUrl: '',
  };
}

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Seconds until the current access token expires; 0 if there is none.
 */
export function secondsUntilExpiry(state: Pick<SessionState, 'accessToken' | 'tokenExpiresAt'>): number {
  const now = nowInSeconds();
  if (state.accessToken === null || now >= state.tokenExpiresAt) {
    return 0;
  }
  return state.tokenExpiresAt - now;
}

export function toPersistedState(state: SessionState): PersistedSessionState {
  return {
    access_token: state.accessToken,
    refresh_token: state.refreshToken,
    token_expires_at: state.tokenExpiresAt,
    token_scope: state.tokenScope,
    loggedin: state.loggedIn,
  };
}

/**
 * Rebuild in-memory state from a persisted record.
 * Any nonce from before the restart is dropped.
 */
export function fromPersistedState(record: PersistedSessionState): SessionState {
  return {
    ...createLoggedOutState(),
    accessToken: record.access_token,
    refreshToken: record.refresh_token,
    tokenExpiresAt: record.token_expires_at,
    tokenScope: record.token_scope,
    loggedIn: record.loggedin && record.access_token !== null,
  };
}
