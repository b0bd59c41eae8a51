/**
 * Server configuration
 * Read from the environment; test mode supplies placeholder credentials
 */

import path from 'path';

// Validate required environment variables (skip in test mode)
const requiredEnvVars = [
  'OAUTH_CLIENT_ID',
  'OAUTH_CLIENT_SECRET',
  'OAUTH_REDIRECT_URI',
];

if (process.env.NODE_ENV !== 'test') {
  for (const envVar of requiredEnvVars) {
    if (!process.env[envVar]) {
      throw new Error(`Missing required environment variable: ${envVar}`);
    }
  }
}

// Test mode defaults
const isTest = process.env.NODE_ENV === 'test';
const testDefaults = {
  OAUTH_CLIENT_ID: 'test-client-id',
  OAUTH_CLIENT_SECRET: 'test-secret',
  OAUTH_REDIRECT_URI: 'http://localhost:5000/login/authorized',
};

function envFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
}

export const config = {
  // Server configuration
  server: {
    port: parseInt(process.env.PORT || '5000'),
    nodeEnv: process.env.NODE_ENV || 'development',
    logRequests: process.env.LOG_REQUESTS !== 'false',
  },

  // OAuth client registration and session policy
  oauth: {
    clientId: process.env.OAUTH_CLIENT_ID ?? (isTest ? testDefaults.OAUTH_CLIENT_ID : ''),
    clientSecret: process.env.OAUTH_CLIENT_SECRET ?? (isTest ? testDefaults.OAUTH_CLIENT_SECRET : ''),
    redirectUri: process.env.OAUTH_REDIRECT_URI ?? (isTest ? testDefaults.OAUTH_REDIRECT_URI : ''),
    scopes: (process.env.OAUTH_SCOPES ?? 'User.Read').split(' ').filter(Boolean),
    authorityUrl: process.env.OAUTH_AUTHORITY_URL || undefined,
    resource: process.env.API_RESOURCE || undefined,
    apiVersion: process.env.API_VERSION || undefined,
    cacheState: envFlag('CACHE_STATE', false),
    refreshEnable: envFlag('REFRESH_ENABLE', true),
  },

  // Outbound request timeouts
  http: {
    tokenRequestTimeoutMs: Number(process.env.TOKEN_REQUEST_TIMEOUT_MS ?? '10000'),
    apiRequestTimeoutMs: Number(process.env.API_REQUEST_TIMEOUT_MS ?? '30000'),
  },

  // Session state storage (driver: see session/repositories/index.ts)
  sessionStorage: {
    stateDir: path.resolve(process.env.SESSION_STATE_DIR ?? '.'),
  },
} as const;

// Helper to check if we're in production
export const isProduction = config.server.nodeEnv === 'production';
