/**
 * Token endpoint client
 * POSTs form-encoded grants to the provider and returns the parsed JSON body
 */

import { TransportError } from './errors.js';

export type TokenRequestForm = Record<string, string>;

export interface TokenEndpointClient {
  /**
   * Resolves with the parsed JSON body, including OAuth error bodies
   * (`{"error": "invalid_grant"}`) so they can degrade to a logout.
   * Rejects with TransportError for anything that is not a usable answer.
   */
  postForm(url: string, form: TokenRequestForm): Promise<unknown>;
}

export function isOAuthErrorBody(body: unknown): body is { error: string; error_description?: string } {
  return typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FetchTokenEndpointClient implements TokenEndpointClient {
  constructor(private readonly timeoutMs: number = 10000) {}

  async postForm(url: string, form: TokenRequestForm): Promise<unknown> {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Accept': 'application/json',
      },
      body: new URLSearchParams(form),
      signal: AbortSignal.timeout(this.timeoutMs),
    }).catch((error: unknown) => {
      throw new TransportError(`Token endpoint request failed: ${describeError(error)}`, { cause: error });
    });

    const text = await response.text().catch((error: unknown) => {
      throw new TransportError(`Token endpoint response could not be read: ${describeError(error)}`, {
        status: response.status,
        cause: error,
      });
    });

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new TransportError(`Token endpoint returned malformed JSON (status ${response.status})`, {
        status: response.status,
        cause: error,
      });
    }

    if (!response.ok && !isOAuthErrorBody(body)) {
      throw new TransportError(`Token endpoint returned ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    return body;
  }
}
