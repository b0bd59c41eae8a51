/**
 * Session routes
 * Binds login, the provider callback and logout to a GraphSession
 *
 * GET /login?redirect=/route     -> provider authorization URL (or route, via silent SSO)
 * GET <redirect URI path>        -> token exchange, then the post-login route
 * GET /logout?redirect=/route    -> clears the session
 */

import { Router } from 'express';
import type { CallbackParams, GraphSession } from './graphSession.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Only same-site paths are accepted as post-login/logout targets
 */
export function safeRelativeRoute(value: unknown): string | undefined {
  const route = queryString(value);
  if (!route || !route.startsWith('/') || route.startsWith('//') || route.includes('\\')) {
    return undefined;
  }
  return route;
}

export function callbackParamsFrom(query: Record<string, unknown>): CallbackParams {
  return {
    code: queryString(query.code),
    state: queryString(query.state),
    error: queryString(query.error),
    error_description: queryString(query.error_description),
  };
}

export function createSessionRouter(session: GraphSession): Router {
  const router = Router();
  const callbackPath = new URL(session.config.redirectUri).pathname;

  router.get('/login', async (req, res, next) => {
    try {
      const redirect = await session.login(safeRelativeRoute(req.query.redirect));
      res.redirect(redirect.status, redirect.location);
    } catch (error) {
      next(error);
    }
  });

  router.get(callbackPath, async (req, res, next) => {
    try {
      const result = await session.handleCallback(callbackParamsFrom(req.query));
      if (!result.ok) {
        return res.status(401).json({
          error: 'token_exchange_failed',
          error_description: result.reason,
        });
      }
      res.redirect(result.redirect.status, result.redirect.location);
    } catch (error) {
      next(error);
    }
  });

  router.get('/logout', async (req, res, next) => {
    try {
      const redirect = await session.logout(safeRelativeRoute(req.query.redirect));
      if (!redirect) {
        return res.status(204).end();
      }
      res.redirect(redirect.status, redirect.location);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
