/**
 * GraphSession - OAuth 2.0 Authorization Code Grant session
 *
 * Drives the redirect dance (login -> provider callback -> token exchange),
 * keeps the access token fresh with the refresh grant, and builds the
 * headers and URLs for authenticated calls to the protected API.
 *
 * One instance per logical user session. Only one login flow can be
 * pending at a time; the pending nonce has a single slot.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { NotLoggedInError, StateMismatchError } from './errors.js';
import { logSessionEvent, tokenPreview } from './logger.js';
import type { SessionStateRepository } from './repositories/types.js';
import { resolveEndpoint, type SessionConfig } from './sessionConfig.js';
import { secondsUntilExpiry, type SessionState } from './state.js';
import { isOAuthErrorBody, type TokenEndpointClient } from './tokenClient.js';
import { TokenStore } from './tokenStore.js';

export const DEFAULT_MIN_SECONDS_REMAINING = 5;

export interface GraphSessionDeps {
  tokenClient: TokenEndpointClient;
  stateRepository: SessionStateRepository;
  /** Source of authorization nonces and request correlation ids */
  generateId?: () => string;
}

/** Where the user agent should go next */
export interface Redirect {
  location: string;
  status: 302;
}

/** Query parameters the provider appends to the redirect URI */
export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

export type CallbackResult =
  | { ok: true; redirect: Redirect }
  | { ok: false; reason: string };

export interface SilentSsoResult {
  /** A cached token was usable or a refresh was attempted */
  available: boolean;
  /** Logged-in state after any refresh; check this before trusting the session */
  loggedIn: boolean;
}

export type SessionPhase = 'LoggedOut' | 'AwaitingCallback' | 'LoggedIn';

export class GraphSession {
  private loginRedirect = '/';

  private constructor(
    readonly config: SessionConfig,
    private readonly store: TokenStore,
    private readonly tokenClient: TokenEndpointClient,
    private readonly generateId: () => string,
  ) {}

  /**
   * Create a session, restoring cached state when caching is enabled.
   * A restored token close to expiry is refreshed before first use.
   */
  static async open(config: SessionConfig, deps: GraphSessionDeps): Promise<GraphSession> {
    const store = new TokenStore(config, deps.stateRepository);
    const session = new GraphSession(config, store, deps.tokenClient, deps.generateId ?? uuidv4);

    if (await store.restore()) {
      await session.ensureValid();
    }
    return session;
  }

  /** True only while the access token is present and unexpired */
  get isLoggedIn(): boolean {
    return this.store.state.loggedIn && this.secondsUntilExpiry() > 0;
  }

  get grantedScope(): string {
    return this.store.state.tokenScope;
  }

  get authorizationUrl(): string {
    return this.store.state.authorizationUrl;
  }

  get phase(): SessionPhase {
    if (this.store.state.authorizationNonce !== null) return 'AwaitingCallback';
    return this.isLoggedIn ? 'LoggedIn' : 'LoggedOut';
  }

  /** Copy of the current state, for inspection */
  snapshot(): SessionState {
    return { ...this.store.state };
  }

  /**
   * Start an interactive login, or skip it when the cached session is usable.
   * @param postLoginRoute route to send the user to once authenticated
   */
  async login(postLoginRoute?: string): Promise<Redirect> {
    if (postLoginRoute) {
      this.loginRedirect = postLoginRoute;
    }

    if (this.config.cacheState) {
      const sso = await this.attemptSilentSSO();
      if (sso.loggedIn) {
        logSessionEvent('login_silent_sso', { redirect: this.loginRedirect });
        return { location: this.loginRedirect, status: 302 };
      }
    }

    const nonce = this.generateId();
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      scope: this.config.scopes.join(' '),
      state: nonce,
      prompt: 'select_account',
    });
    const authorizationUrl = `${this.config.authEndpoint}?${params.toString()}`;
    this.store.beginAuthorization(nonce, authorizationUrl);

    logSessionEvent('login_redirect', {
      client_id: this.config.clientId,
      auth_endpoint: this.config.authEndpoint,
      scope: this.config.scopes.join(' '),
    });
    return { location: authorizationUrl, status: 302 };
  }

  /**
   * Handle the provider's redirect back to the configured redirect URI.
   * Throws StateMismatchError (leaving the session untouched) when `state`
   * does not match the pending nonce.
   */
  async handleCallback(params: CallbackParams): Promise<CallbackResult> {
    const expected = this.store.state.authorizationNonce;
    const received = params.state ?? null;

    if (expected === null || received !== expected) {
      logSessionEvent('callback_state_mismatch', {
        pending: expected !== null,
        received: tokenPreview(received),
      });
      throw new StateMismatchError(expected, received);
    }

    // Single use: a replayed callback can never match again
    this.store.clearNonce();

    if (params.error || !params.code) {
      const reason = params.error_description ?? params.error ?? 'missing_code';
      logSessionEvent('token_exchange_failed', { error: params.error ?? 'missing_code' });
      await this.store.reset();
      return { ok: false, reason };
    }

    const body = await this.tokenClient.postForm(this.config.tokenEndpoint, {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: 'authorization_code',
      code: params.code,
      redirect_uri: this.config.redirectUri,
    });

    if (!(await this.store.save(body))) {
      return { ok: false, reason: isOAuthErrorBody(body) ? body.error : 'no_access_token' };
    }

    await this.store.persist();
    return { ok: true, redirect: { location: this.loginRedirect, status: 302 } };
  }

  /**
   * Clear the session and its durable copy.
   * Returns a redirect only when a target is given.
   */
  async logout(redirectTo?: string): Promise<Redirect | null> {
    await this.store.reset();
    logSessionEvent('logout', { redirect: redirectTo ?? null });
    return redirectTo ? { location: redirectTo, status: 302 } : null;
  }

  /**
   * Reuse the current token, or refresh it, to avoid an interactive login.
   * `available` is true as soon as a refresh was attempted; `loggedIn`
   * reports whether that refresh actually produced a token.
   */
  async attemptSilentSSO(): Promise<SilentSsoResult> {
    if (this.secondsUntilExpiry() > 0) {
      return { available: true, loggedIn: this.isLoggedIn };
    }

    if (this.store.state.refreshToken !== null) {
      await this.refresh();
      return { available: true, loggedIn: this.isLoggedIn };
    }

    return { available: false, loggedIn: false };
  }

  /**
   * Exchange the refresh token for a new access token.
   * Returns false (and logs out) when the provider returns no token.
   */
  async refresh(): Promise<boolean> {
    const refreshToken = this.store.state.refreshToken;

    if (refreshToken === null) {
      logSessionEvent('token_refresh_skipped', { reason: 'no_refresh_token' });
      // An expired token that cannot be renewed is a logged-out session
      if (this.store.state.accessToken !== null) {
        await this.store.reset();
      }
      return false;
    }

    const body = await this.tokenClient.postForm(this.config.tokenEndpoint, {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });

    const saved = await this.store.save(body);
    if (saved) {
      await this.store.persist();
    }
    logSessionEvent('token_refresh', { success: saved });
    return saved;
  }

  /**
   * Make sure the access token is good for at least `minSecondsRemaining`,
   * refreshing it when refresh is enabled. Call before authenticated requests.
   */
  async ensureValid(minSecondsRemaining: number = DEFAULT_MIN_SECONDS_REMAINING): Promise<void> {
    if (this.secondsUntilExpiry() < minSecondsRemaining && this.config.refreshEnable) {
      await this.refresh();
    }
  }

  secondsUntilExpiry(): number {
    return secondsUntilExpiry(this.store.state);
  }

  buildApiUrl(url: string): string {
    return resolveEndpoint(this.config, url);
  }

  /**
   * Headers for a call to the protected API, with a fresh correlation id.
   * @param headers additional headers, or overrides for the defaults
   */
  authorizedHeaders(headers: Record<string, string> = {}): Record<string, string> {
    const token = this.store.state.accessToken;
    if (token === null) {
      throw new NotLoggedInError();
    }

    return {
      'User-Agent': 'graph-auth-session',
      'Authorization': `Bearer ${token}`,
      'Accept': 'application/json',
      'Content-Type': 'application/json',
      'SdkVersion': 'graph-auth-session',
      'x-client-sku': 'graph-auth-session',
      'client-request-id': this.generateId(),
      'return-client-request-id': 'true',
      ...headers,
    };
  }

  /**
   * Claims of the current access token, decoded without verification.
   * Null when logged out or when the token is not a JWT.
   */
  accessTokenClaims(): jwt.JwtPayload | null {
    const token = this.store.state.accessToken;
    if (token === null) return null;

    const decoded = jwt.decode(token, { json: true });
    return decoded ?? null;
  }

  toString(): string {
    return `<GraphSession(loggedin=${this.isLoggedIn ? 'True' : 'False'}, client_id=${this.config.clientId})>`;
  }
}
