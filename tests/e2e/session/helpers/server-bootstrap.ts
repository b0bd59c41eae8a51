/**
 * Server bootstrap helper for E2E session tests
 * Starts the real Express app against the fake identity provider
 */

import type { Server } from 'http';
import { createApp } from '../../../../src/server/app.js';
import { GraphSession } from '../../../../src/server/session/graphSession.js';
import { createSessionConfig } from '../../../../src/server/session/sessionConfig.js';
import { FetchTokenEndpointClient } from '../../../../src/server/session/tokenClient.js';
import {
  InMemorySessionStateRepository,
  type SessionStateRepository,
} from '../../../../src/server/session/repositories/index.js';
import { getProviderBaseUrl, VALID_CODE } from './fake-identity-provider.js';

export interface TestServer {
  baseUrl: string;
  session: GraphSession;
  stateRepository: SessionStateRepository;
  close: () => Promise<void>;
}

export interface TestServerOptions {
  cacheState?: boolean;
  refreshEnable?: boolean;
  scopes?: string[];
  stateRepository?: SessionStateRepository;
}

export const REDIRECT_URI = 'http://localhost/login/authorized';

export async function startTestServer(options: TestServerOptions = {}): Promise<TestServer> {
  const providerUrl = getProviderBaseUrl();
  const config = createSessionConfig({
    clientId: 'test-client-id',
    clientSecret: 'test-secret',
    redirectUri: REDIRECT_URI,
    scopes: options.scopes ?? ['User.Read', 'Mail.Read'],
    cacheState: options.cacheState ?? false,
    refreshEnable: options.refreshEnable ?? true,
    authorityUrl: `${providerUrl}/common`,
    resource: `${providerUrl}/`,
  });

  const stateRepository = options.stateRepository ?? new InMemorySessionStateRepository();
  const session = await GraphSession.open(config, {
    tokenClient: new FetchTokenEndpointClient(5000),
    stateRepository,
  });

  const app = createApp(session, { apiTimeoutMs: 5000 });
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, () => resolve(listening));
    listening.on('error', reject);
  });
  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Failed to get server address');
  }

  return {
    baseUrl: `http://localhost:${address.port}`,
    session,
    stateRepository,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    }),
  };
}

/**
 * GET without following redirects
 */
export function get(server: TestServer, path: string): Promise<Response> {
  return fetch(`${server.baseUrl}${path}`, { redirect: 'manual' });
}

/**
 * Drive /login and the provider callback; returns both responses
 */
export async function runLoginFlow(server: TestServer, options: { route?: string; code?: string } = {}) {
  const loginPath = options.route ? `/login?redirect=${encodeURIComponent(options.route)}` : '/login';
  const login = await get(server, loginPath);
  const authorizeUrl = new URL(login.headers.get('location') ?? '');
  const state = authorizeUrl.searchParams.get('state') ?? '';

  const callback = await get(
    server,
    `/login/authorized?code=${encodeURIComponent(options.code ?? VALID_CODE)}&state=${encodeURIComponent(state)}`
  );

  return { login, authorizeUrl, state, callback };
}
