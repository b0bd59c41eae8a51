/**
 * Express app
 * Wires a GraphSession to the login/callback/logout routes and
 * relays authenticated calls to the protected API
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { callProtectedApi, resolveRelayTarget } from './api/backend.js';
import { sessionErrorHandler } from './middleware/errors.js';
import type { GraphSession } from './session/graphSession.js';
import { createSessionRouter } from './session/router.js';

export interface AppOptions {
  logRequests?: boolean;
  apiTimeoutMs?: number;
}

export function createApp(session: GraphSession, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  if (options.logRequests) {
    app.use((req, res, next) => {
      console.log(`${req.method} ${req.path}`);
      next();
    });
  }

  // Session status (unauthenticated)
  app.get('/', (_req, res) => {
    res.json({
      loggedIn: session.isLoggedIn,
      secondsUntilExpiry: session.secondsUntilExpiry(),
      scope: session.grantedScope,
    });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createSessionRouter(session));

  app.get('/me', async (_req, res, next) => {
    try {
      const result = await callProtectedApi(session, 'me', { timeoutMs: options.apiTimeoutMs });
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  // Relay GET /api/<endpoint> to the protected API, same origin only
  app.get('/api/*', async (req, res, next) => {
    try {
      const target = resolveRelayTarget(session, req.originalUrl.replace(/^\/api\//, ''));
      const result = await callProtectedApi(session, target, { timeoutMs: options.apiTimeoutMs });
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  app.use(sessionErrorHandler);

  return app;
}
