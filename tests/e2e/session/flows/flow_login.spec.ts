/**
 * E2E: interactive login through the provider redirect
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startTestServer, runLoginFlow, get, REDIRECT_URI, type TestServer } from '../helpers/server-bootstrap.js';
import { getProviderBaseUrl, getTokenRequests, VALID_CODE } from '../helpers/fake-identity-provider.js';

describe('Login flow', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it('redirects /login to the provider authorization endpoint', async () => {
    const response = await get(server, '/login');

    expect(response.status).toBe(302);
    const location = new URL(response.headers.get('location') ?? '');
    expect(`${location.origin}${location.pathname}`).toBe(`${getProviderBaseUrl()}/common/oauth2/v2.0/authorize`);
    expect(location.searchParams.get('response_type')).toBe('code');
    expect(location.searchParams.get('client_id')).toBe('test-client-id');
    expect(location.searchParams.get('redirect_uri')).toBe(REDIRECT_URI);
    expect(location.searchParams.get('scope')).toBe('User.Read Mail.Read offline_access');
    expect(location.searchParams.get('prompt')).toBe('select_account');
    expect(location.searchParams.get('state')).toBeTruthy();
    expect(server.session.phase).toBe('AwaitingCallback');
  });

  it('exchanges the code and redirects to the post-login route', async () => {
    const { callback } = await runLoginFlow(server, { route: '/inbox' });

    expect(callback.status).toBe(302);
    expect(callback.headers.get('location')).toBe('/inbox');
    expect(server.session.phase).toBe('LoggedIn');

    const requests = getTokenRequests();
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      grant_type: 'authorization_code',
      code: VALID_CODE,
      redirect_uri: REDIRECT_URI,
    });
  });

  it('ignores post-login routes that leave the site', async () => {
    const { callback } = await runLoginFlow(server, { route: '//evil.example/path' });

    expect(callback.status).toBe(302);
    expect(callback.headers.get('location')).toBe('/');
  });

  it('reports the logged-in session on the status page', async () => {
    await runLoginFlow(server);

    const response = await get(server, '/');
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.loggedIn).toBe(true);
    expect(body.scope).toBe('User.Read Mail.Read');
    expect(body.secondsUntilExpiry).toBeGreaterThan(3500);
  });

  it('calls the protected API with the bearer token', async () => {
    await runLoginFlow(server);

    const response = await get(server, '/me');
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.id).toBe('user-1');
    expect(body.displayName).toBe('Test User');
    expect(typeof body.requestId).toBe('string');
  });

  it('relays other API paths under /api', async () => {
    await runLoginFlow(server);

    const response = await get(server, '/api/me');

    expect(response.status).toBe(200);
    expect((await response.json()).displayName).toBe('Test User');
  });

  it('logs out with 204 when no redirect is given', async () => {
    await runLoginFlow(server);

    const response = await get(server, '/logout');

    expect(response.status).toBe(204);
    expect(server.session.isLoggedIn).toBe(false);
  });

  it('logs out and redirects to a relative route', async () => {
    await runLoginFlow(server);

    const response = await get(server, '/logout?redirect=%2Fgoodbye');

    expect(response.status).toBe(302);
    expect(response.headers.get('location')).toBe('/goodbye');
    expect(server.session.isLoggedIn).toBe(false);
  });
});
