/**
 * Session configuration
 *
 * Settings are fixed once the session is constructed. Overrides are merged
 * onto the defaults below; unknown keys are reported but never rejected.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { logSessionEvent } from './logger.js';

export const REFRESH_SCOPE = 'offline_access';

export const DEFAULT_RESOURCE = 'https://graph.microsoft.com/';
export const DEFAULT_API_VERSION = 'v1.0';
export const DEFAULT_AUTHORITY_URL = 'https://login.microsoftonline.com/common';
export const DEFAULT_STATE_KEY = 'state.json';

const AUTH_ENDPOINT_PATH = '/oauth2/v2.0/authorize';
const TOKEN_ENDPOINT_PATH = '/oauth2/v2.0/token';

export interface SessionConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  readonly scopes: readonly string[];
  /** Persist session state between process restarts (enables silent SSO) */
  readonly cacheState: boolean;
  /** Refresh expiring tokens; adds offline_access to the requested scopes */
  readonly refreshEnable: boolean;
  readonly resource: string;
  readonly apiVersion: string;
  readonly authorityUrl: string;
  readonly authEndpoint: string;
  readonly tokenEndpoint: string;
  /** Name of the durable record holding this session's state */
  readonly stateKey: string;
}

const sessionConfigShape = {
  clientId: z.string(),
  clientSecret: z.string(),
  redirectUri: z.string().url(),
  scopes: z.array(z.string().min(1)),
  cacheState: z.boolean(),
  refreshEnable: z.boolean(),
  resource: z.string().url(),
  apiVersion: z.string().min(1),
  authorityUrl: z.string().url(),
  authEndpoint: z.string().url(),
  tokenEndpoint: z.string().url(),
  stateKey: z.string().min(1),
} as const satisfies Record<keyof SessionConfig, z.ZodTypeAny>;

const overridesValidator = z.object(sessionConfigShape).partial();

export type SessionConfigOverrides = z.input<typeof overridesValidator>;

const REQUIRED_KEYS = ['clientId', 'clientSecret', 'redirectUri'] as const;

/**
 * Apply the refresh policy to a scope list.
 * offline_access is present iff refresh is enabled, whatever the caller listed.
 */
export function normalizeScopes(scopes: readonly string[], refreshEnable: boolean): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const scope of scopes) {
    const key = scope.toLowerCase();
    if (key === REFRESH_SCOPE || seen.has(key)) continue;
    seen.add(key);
    normalized.push(scope);
  }

  if (refreshEnable) {
    normalized.push(REFRESH_SCOPE);
  }
  return normalized;
}

/**
 * Build a session configuration from user-supplied overrides.
 * Accepts loosely typed input (env, JSON) so that typos can be reported.
 */
export function createSessionConfig(overrides: Record<string, unknown>): SessionConfig {
  for (const key of Object.keys(overrides)) {
    if (!Object.hasOwn(sessionConfigShape, key)) {
      console.warn(`[config] WARNING: unknown "${key}" setting passed to session config`);
      logSessionEvent('config_unknown_key', { key });
    }
  }

  const parsed = overridesValidator.safeParse(overrides);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid session config: ${details}`);
  }

  const settings = parsed.data;
  for (const key of REQUIRED_KEYS) {
    if (!settings[key]) {
      throw new ConfigurationError(`Missing required session setting: ${key}`);
    }
  }

  const authorityUrl = (settings.authorityUrl ?? DEFAULT_AUTHORITY_URL).replace(/\/+$/, '');
  const refreshEnable = settings.refreshEnable ?? true;

  return Object.freeze({
    clientId: settings.clientId ?? '',
    clientSecret: settings.clientSecret ?? '',
    redirectUri: settings.redirectUri ?? '',
    scopes: Object.freeze(normalizeScopes(settings.scopes ?? [], refreshEnable)),
    cacheState: settings.cacheState ?? false,
    refreshEnable,
    resource: settings.resource ?? DEFAULT_RESOURCE,
    apiVersion: settings.apiVersion ?? DEFAULT_API_VERSION,
    authorityUrl,
    authEndpoint: settings.authEndpoint ?? `${authorityUrl}${AUTH_ENDPOINT_PATH}`,
    tokenEndpoint: settings.tokenEndpoint ?? `${authorityUrl}${TOKEN_ENDPOINT_PATH}`,
    stateKey: settings.stateKey ?? DEFAULT_STATE_KEY,
  });
}

/**
 * Convert a relative endpoint (e.g. 'me') to a full API URL.
 * Absolute http(s) URLs are returned unchanged.
 */
export function resolveEndpoint(config: Pick<SessionConfig, 'resource' | 'apiVersion'>, url: string): string {
  if (/^https?:\/\//i.test(url)) {
    return url;
  }
  return new URL(url.replace(/^\/+/, ''), `${config.resource}${config.apiVersion}/`).toString();
}
