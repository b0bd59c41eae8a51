/**
 * E2E: callback, token endpoint and API error handling
 */

import { createServer } from 'http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startTestServer, runLoginFlow, get, type TestServer } from '../helpers/server-bootstrap.js';
import {
  failNextTokenRequest,
  getTokenRequests,
  setAccessTokenLifetime,
} from '../helpers/fake-identity-provider.js';

describe('Callback and token errors', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it('rejects a callback whose state does not match', async () => {
    await get(server, '/login');

    const response = await get(server, '/login/authorized?code=test-auth-code&state=forged');
    const body = await response.json();

    expect(response.status).toBe(400);
    expect(body.error).toBe('state_mismatch');
    expect(server.session.phase).toBe('AwaitingCallback');
    expect(getTokenRequests()).toHaveLength(0);
  });

  it('rejects a callback when no login is pending', async () => {
    const response = await get(server, '/login/authorized?code=test-auth-code&state=anything');

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('state_mismatch');
  });

  it('rejects a replayed callback', async () => {
    const { state } = await runLoginFlow(server);

    const replay = await get(server, `/login/authorized?code=test-auth-code&state=${encodeURIComponent(state)}`);

    expect(replay.status).toBe(400);
    expect((await replay.json()).error).toBe('state_mismatch');
    expect(server.session.isLoggedIn).toBe(true);
    expect(getTokenRequests()).toHaveLength(1);
  });

  it('answers 401 for an authorization code the provider rejects', async () => {
    const { callback } = await runLoginFlow(server, { code: 'bad-code' });

    expect(callback.status).toBe(401);
    expect(await callback.json()).toEqual({
      error: 'token_exchange_failed',
      error_description: 'invalid_grant',
    });
    expect(server.session.phase).toBe('LoggedOut');
  });

  it('answers 401 without a token request when the provider returns an error', async () => {
    const login = await get(server, '/login');
    const state = new URL(login.headers.get('location') ?? '').searchParams.get('state') ?? '';

    const response = await get(
      server,
      `/login/authorized?error=access_denied&error_description=User%20cancelled&state=${encodeURIComponent(state)}`
    );

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: 'token_exchange_failed',
      error_description: 'User cancelled',
    });
    expect(getTokenRequests()).toHaveLength(0);
  });

  it('answers 502 when the token endpoint fails outright', async () => {
    failNextTokenRequest(500, 'Internal failure');

    const { callback } = await runLoginFlow(server);

    expect(callback.status).toBe(502);
    expect((await callback.json()).error).toBe('upstream_unavailable');
    expect(server.session.isLoggedIn).toBe(false);
  });

  it('answers 401 for the API before any login', async () => {
    const response = await get(server, '/me');

    expect(response.status).toBe(401);
    expect((await response.json()).error).toBe('login_required');
    expect(getTokenRequests()).toHaveLength(0);
  });

  it('refuses to relay API calls to another host', async () => {
    const captured: Array<string | undefined> = [];
    const capture = createServer((req, res) => {
      captured.push(req.headers.authorization);
      res.end('{}');
    });
    await new Promise<void>((resolve) => capture.listen(0, resolve));
    const address = capture.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    try {
      await runLoginFlow(server);

      const response = await get(server, `/api/http://127.0.0.1:${port}/steal`);

      expect(response.status).toBe(400);
      expect((await response.json()).error).toBe('invalid_request');
      expect(captured).toHaveLength(0);
    } finally {
      await new Promise<void>((resolve) => capture.close(() => resolve()));
    }
  });

  it('logs the session out when the refresh grant is rejected', async () => {
    setAccessTokenLifetime(3);
    await runLoginFlow(server);
    failNextTokenRequest(400, { error: 'invalid_grant' });

    const response = await get(server, '/me');

    expect(response.status).toBe(401);
    expect((await response.json()).error).toBe('login_required');
    expect(server.session.isLoggedIn).toBe(false);
  });
});
