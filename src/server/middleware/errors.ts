/**
 * Error middleware
 * Maps session errors onto HTTP responses
 */

import type { NextFunction, Request, Response } from 'express';
import {
  ConfigurationError,
  NotLoggedInError,
  StateMismatchError,
  TransportError,
} from '../session/errors.js';

export function sessionErrorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof StateMismatchError) {
    return res.status(400).json({
      error: 'state_mismatch',
      error_description: error.message,
    });
  }

  if (error instanceof NotLoggedInError) {
    return res.status(401).json({
      error: 'login_required',
      error_description: error.message,
    });
  }

  if (error instanceof TransportError) {
    console.error(`[session] ${req.method} ${req.path} upstream failure:`, error.message);
    return res.status(502).json({
      error: 'upstream_unavailable',
      error_description: error.message,
    });
  }

  if (error instanceof ConfigurationError) {
    return res.status(400).json({
      error: 'invalid_request',
      error_description: error.message,
    });
  }

  console.error(`${req.method} ${req.path} error:`, error);
  res.status(500).json({
    error: 'server_error',
    error_description: 'An error occurred',
  });
}
