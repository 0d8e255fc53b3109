/**
 * Gateway HTTP Surface
 *
 * The browser-facing session relay. The gateway keeps the session token
 * server-side, verifies it with the auth service on every protected request
 * and forwards API calls to the resource service as a bearer credential. It
 * never signs tokens.
 */

import express, { type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import type { AuditService } from '../core/audit-service.js';
import type { SessionUser } from '../core/session-user.js';
import { SecurityErrors, type SecurityError } from '../utils/errors.js';
import { firstString, isRecord } from '../utils/guards.js';
import { asyncHandler, jsonErrorHandler } from '../utils/http-server.js';
import {
  ServiceUnavailableError,
  type AuthServiceClient,
  type ResourceServiceClient,
} from './service-clients.js';
import type { GatewaySession, SessionStore } from './session-store.js';

export const SESSION_COOKIE = 'relay_session';

const AUTH_SERVICE_ERROR_PATH = '/login?error=auth_service_error';

/**
 * Human-readable text for the error codes that reach /login
 */
export const LOGIN_ERROR_MESSAGES: Record<string, string> = {
  state_mismatch: 'Authentication failed due to security check. Please try again.',
  no_code: 'Authentication was cancelled or failed.',
  token_exchange_failed: 'Failed to complete authentication with the identity provider.',
  invalid_token: 'Authentication token is invalid.',
  internal_error: 'An internal error occurred during authentication.',
  auth_service_error: 'The authentication service is unavailable. Please try again.',
  no_token: 'No authentication token was received.',
  session_expired: 'Your session has expired. Please log in again.',
};

/**
 * Gateway API path → resource service path
 */
export const RELAYED_ROUTES: Record<string, string> = {
  '/api/user/resources': '/resources/user',
  '/api/user/profile': '/user/profile',
  '/api/admin/resources': '/resources/admin',
  '/api/admin/stats': '/admin/stats',
  '/api/admin/users': '/admin/users',
};

export interface GatewayAppOptions {
  authClient: AuthServiceClient;
  resourceClient: ResourceServiceClient;
  sessions: SessionStore;
  cookieSecret: string;
  cookieSecure?: boolean;
  /** Session cookie lifetime in milliseconds */
  sessionMaxAgeMs: number;
  auditService?: AuditService;
}

export function createGatewayApp(options: GatewayAppOptions): express.Application {
  const { authClient, resourceClient, sessions } = options;
  const app = express();

  app.use(cookieParser(options.cookieSecret));

  const cookieOptions = {
    signed: true,
    httpOnly: true,
    sameSite: 'lax' as const,
    secure: options.cookieSecure ?? false,
    path: '/',
  };

  const currentSession = (req: Request): GatewaySession | undefined => {
    const signed: unknown = req.signedCookies;
    const sessionId = isRecord(signed) ? signed[SESSION_COOKIE] : undefined;
    return typeof sessionId === 'string' ? sessions.get(sessionId) : undefined;
  };

  const endSession = (res: Response, session: GatewaySession, reason: string): void => {
    sessions.destroy(session.sessionId);
    res.clearCookie(SESSION_COOKIE, { path: cookieOptions.path });
    console.log(`[Gateway] Session ended (${reason}) for ${session.user.email}`);
    options.auditService?.record({
      source: 'gateway:session',
      userId: session.user.sub,
      action: 'session_end',
      success: true,
      reason,
    });
  };

  const logUpstreamFailure = (error: ServiceUnavailableError): void => {
    console.error(`[Gateway] Upstream failure: ${error.message}`);
  };

  const upstreamFailure = (error: ServiceUnavailableError): SecurityError => {
    logUpstreamFailure(error);
    return SecurityErrors.UPSTREAM_FAILURE('Service', { service: error.service, status: error.status });
  };

  /**
   * Session whose token the auth service still accepts; a rejected session is
   * ended on the way. An auth service outage propagates as
   * ServiceUnavailableError and leaves the session in place.
   */
  const verifiedSession = async (req: Request, res: Response): Promise<GatewaySession | undefined> => {
    const session = currentSession(req);
    if (!session) {
      return undefined;
    }

    const user = await authClient.verify(session.token);
    if (!user) {
      endSession(res, session, 'verification_failed');
      return undefined;
    }

    sessions.touch(session.sessionId, { user });
    return { ...session, user };
  };

  app.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      try {
        const session = await verifiedSession(req, res);
        res.redirect(session ? '/dashboard' : '/login');
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          logUpstreamFailure(error);
          res.redirect(AUTH_SERVICE_ERROR_PATH);
          return;
        }
        throw error;
      }
    })
  );

  app.get('/login', (req: Request, res: Response) => {
    const error = firstString(req.query.error) ?? null;
    res.json({
      authenticated: false,
      error,
      message: error ? (LOGIN_ERROR_MESSAGES[error] ?? '') : '',
      login_url: '/auth/initiate',
    });
  });

  app.get(
    '/auth/initiate',
    asyncHandler(async (_req: Request, res: Response) => {
      try {
        const { authUrl, setCookies } = await authClient.beginLogin();
        for (const cookie of setCookies) {
          res.append('Set-Cookie', cookie);
        }
        res.redirect(authUrl);
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          res.redirect(AUTH_SERVICE_ERROR_PATH);
          return;
        }
        throw error;
      }
    })
  );

  app.get(
    '/auth/success',
    asyncHandler(async (req: Request, res: Response) => {
      const token = firstString(req.query.token);
      if (!token) {
        res.redirect('/login?error=no_token');
        return;
      }

      let user: SessionUser | null;
      try {
        user = await authClient.verify(token);
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          logUpstreamFailure(error);
          res.redirect(AUTH_SERVICE_ERROR_PATH);
          return;
        }
        throw error;
      }
      if (!user) {
        res.redirect('/login?error=invalid_token');
        return;
      }

      // A fresh id on every login; any session the browser already had is dropped
      const previous = currentSession(req);
      if (previous) {
        sessions.destroy(previous.sessionId);
      }

      const session = sessions.create(token, user);
      res.cookie(SESSION_COOKIE, session.sessionId, { ...cookieOptions, maxAge: options.sessionMaxAgeMs });

      console.log(`[Gateway] Session started for ${user.email} (${user.role})`);
      options.auditService?.record({
        source: 'gateway:session',
        userId: user.sub,
        action: 'session_start',
        success: true,
        metadata: { role: user.role },
      });

      res.redirect('/dashboard');
    })
  );

  app.get(
    '/dashboard',
    asyncHandler(async (req: Request, res: Response) => {
      if (!currentSession(req)) {
        res.redirect('/login');
        return;
      }

      let session: GatewaySession | undefined;
      try {
        session = await verifiedSession(req, res);
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          logUpstreamFailure(error);
          res.redirect(AUTH_SERVICE_ERROR_PATH);
          return;
        }
        throw error;
      }
      if (!session) {
        res.redirect('/login?error=session_expired');
        return;
      }

      res.json({ user: session.user });
    })
  );

  app.post(
    '/auth/refresh',
    asyncHandler(async (req: Request, res: Response) => {
      const session = currentSession(req);
      if (!session) {
        res.status(401).json({ error: 'Not authenticated' });
        return;
      }

      let token: string | null;
      try {
        token = await authClient.refresh(session.token);
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          throw upstreamFailure(error);
        }
        throw error;
      }
      if (!token) {
        endSession(res, session, 'refresh_failed');
        res.status(401).json({ error: 'Invalid or expired token' });
        return;
      }

      sessions.touch(session.sessionId, { token });
      res.cookie(SESSION_COOKIE, session.sessionId, { ...cookieOptions, maxAge: options.sessionMaxAgeMs });
      res.json({ refreshed: true });
    })
  );

  for (const [gatewayPath, upstreamPath] of Object.entries(RELAYED_ROUTES)) {
    app.get(
      gatewayPath,
      asyncHandler(async (req: Request, res: Response) => {
        try {
          const session = await verifiedSession(req, res);
          if (!session) {
            res.status(401).json({ error: 'Not authenticated' });
            return;
          }

          const relayed = await resourceClient.get(upstreamPath, session.token);
          res.status(relayed.status).json(relayed.body);
        } catch (error) {
          if (error instanceof ServiceUnavailableError) {
            throw upstreamFailure(error);
          }
          throw error;
        }
      })
    );
  }

  app.get('/logout', (req: Request, res: Response) => {
    const session = currentSession(req);
    if (session) {
      endSession(res, session, 'logout');
    } else {
      res.clearCookie(SESSION_COOKIE, { path: cookieOptions.path });
    }
    res.redirect('/login');
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: 'gateway', activeSessions: sessions.size() });
  });

  app.use(jsonErrorHandler('Gateway'));

  return app;
}
