/**
 * Unit tests for the protected API relay target check
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { resolveRelayTarget } from '../../src/server/api/backend.js';
import { ConfigurationError } from '../../src/server/session/errors.js';
import { GraphSession } from '../../src/server/session/graphSession.js';
import { InMemorySessionStateRepository } from '../../src/server/session/repositories/inMemory.js';
import { createSessionConfig } from '../../src/server/session/sessionConfig.js';
import { FakeTokenEndpointClient, TEST_SETTINGS } from './helpers/fakeTokenClient.js';

describe('resolveRelayTarget', () => {
  let session: GraphSession;

  beforeEach(async () => {
    session = await GraphSession.open(createSessionConfig({ ...TEST_SETTINGS }), {
      tokenClient: new FakeTokenEndpointClient(),
      stateRepository: new InMemorySessionStateRepository(),
    });
  });

  it('resolves relative endpoints against the API version', () => {
    expect(resolveRelayTarget(session, 'me/messages')).toBe('https://graph.microsoft.com/v1.0/me/messages');
  });

  it('accepts absolute URLs on the API origin', () => {
    expect(resolveRelayTarget(session, 'https://graph.microsoft.com/beta/me')).toBe('https://graph.microsoft.com/beta/me');
  });

  it('keeps protocol-relative input on the API origin', () => {
    expect(resolveRelayTarget(session, '//attacker.example/x')).toBe('https://graph.microsoft.com/v1.0/attacker.example/x');
  });

  it('refuses absolute URLs on other hosts', () => {
    expect(() => resolveRelayTarget(session, 'http://attacker.example/x')).toThrow(ConfigurationError);
    expect(() => resolveRelayTarget(session, 'HTTPS://attacker.example/x')).toThrow(
      'API endpoint must be on https://graph.microsoft.com'
    );
  });
});
