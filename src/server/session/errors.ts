/**
 * Session errors
 *
 * Token exchange failures are not errors: they force a logout and are
 * reported through the return value of the flow step.
 */

/** Base error for all session failures. */
export class SessionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionError';
  }
}

/** Settings passed to the session have the wrong shape. */
export class ConfigurationError extends SessionError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The callback `state` parameter does not match the nonce issued by login().
 * The flow is aborted and the session is left untouched.
 */
export class StateMismatchError extends SessionError {
  readonly expected: string | null;
  readonly received: string | null;

  constructor(expected: string | null, received: string | null) {
    super(
      expected === null
        ? 'STATE MISMATCH: no authorization request is pending'
        : 'STATE MISMATCH: callback state does not match the authorization request',
    );
    this.name = 'StateMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

/** The token endpoint or protected API could not be reached or answered garbage. */
export class TransportError extends SessionError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

/** An authenticated call was attempted without an access token. */
export class NotLoggedInError extends SessionError {
  constructor(message = 'No access token is available; login is required') {
    super(message);
    this.name = 'NotLoggedInError';
  }
}
