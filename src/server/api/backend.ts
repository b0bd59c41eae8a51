/**
 * Protected API Integration
 * Calls the resource API with the session's bearer token
 */

import { ConfigurationError, TransportError } from '../session/errors.js';
import type { GraphSession } from '../session/graphSession.js';

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiRequestOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Resolve a relayed endpoint, refusing anything outside the API's origin
 * so the bearer token never leaves for another host.
 */
export function resolveRelayTarget(session: GraphSession, endpoint: string): string {
  const allowed = new URL(session.config.resource).origin;
  let target: URL;
  try {
    target = new URL(session.buildApiUrl(endpoint));
  } catch {
    throw new ConfigurationError(`Invalid API endpoint: ${endpoint}`);
  }
  if (target.origin !== allowed) {
    throw new ConfigurationError(`API endpoint must be on ${allowed}`);
  }
  return target.toString();
}

/**
 * Call the protected API on behalf of the session
 * @param endpoint - relative endpoint (e.g. 'me/messages') or absolute URL
 */
export async function callProtectedApi(
  session: GraphSession,
  endpoint: string,
  options: ApiRequestOptions = {}
): Promise<ApiResponse> {
  await session.ensureValid();

  const url = session.buildApiUrl(endpoint);
  const headers = session.authorizedHeaders(options.headers);

  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers,
    body: options.body,
    signal: AbortSignal.timeout(options.timeoutMs ?? 30000),
  }).catch((error: unknown) => {
    console.error(`Protected API call failed (${endpoint}):`, error);
    throw new TransportError(`Protected API request failed: ${url}`, { cause: error });
  });

  // Handle different content types
  const text = await response.text();
  const contentType = response.headers.get('content-type');
  if (contentType?.includes('application/json') && text) {
    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch (error) {
      throw new TransportError(`Protected API returned malformed JSON (status ${response.status})`, {
        status: response.status,
        cause: error,
      });
    }
  }

  return { status: response.status, body: text };
}
