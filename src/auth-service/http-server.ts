/**
 * Auth Service HTTP Surface
 *
 * Routes:
 * - GET  /auth/login     begin a login, answer `{ auth_url }`
 * - GET  /auth/callback  provider redirect target; redirects the browser to the
 *                        gateway with `?token=` or `?error=<reason>`
 * - POST /auth/verify    `{ token }` → `{ valid, user }`
 * - POST /auth/refresh   `{ token }` → `{ token }`
 * - GET  /auth/config    public OAuth client settings
 * - GET  /health
 */

import express, { type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import { z } from 'zod';
import type { StateStore } from '../core/state-store.js';
import type { TokenCodec } from '../core/token-codec.js';
import { toSessionUser } from '../core/session-user.js';
import type { IdentityExchange } from '../oauth/identity-exchange.js';
import type { IdentityProviderSettings, RejectReason, StateEcho } from '../oauth/types.js';
import { SecurityErrors } from '../utils/errors.js';
import { firstString, isRecord } from '../utils/guards.js';
import { asyncHandler, corsHeaders, jsonErrorHandler } from '../utils/http-server.js';

export const STATE_COOKIE = 'relay_state';
const STATE_COOKIE_PATH = '/auth';

/**
 * Error codes placed on the gateway's /login redirect
 */
export const CALLBACK_ERROR_CODES: Record<RejectReason, string> = {
  state_mismatch: 'state_mismatch',
  missing_code: 'no_code',
  exchange_failed: 'token_exchange_failed',
  invalid_identity: 'invalid_token',
  internal_error: 'internal_error',
};

const StateEchoSchema = z.object({
  state: z.string().min(1),
  issuedAt: z.number().int(),
});

export interface AuthAppOptions {
  identityExchange: IdentityExchange;
  tokenCodec: TokenCodec;
  stateStore: StateStore;
  settings: IdentityProviderSettings;
  /** Public gateway URL; callback redirects land here */
  frontendUrl: string;
  /** Signs the state echo cookie */
  cookieSecret: string;
  cookieSecure?: boolean;
  /** Lifetime of the state echo cookie (the state validity window) */
  stateTtlMs: number;
}

export function createAuthApp(options: AuthAppOptions): express.Application {
  const { identityExchange, tokenCodec, stateStore, settings, frontendUrl } = options;
  const app = express();

  app.use(express.json());
  app.use(cookieParser(options.cookieSecret));
  app.use(corsHeaders({ origin: frontendUrl, credentials: true }));

  app.get(
    '/auth/login',
    asyncHandler(async (_req: Request, res: Response) => {
      const { authUrl, state, issuedAt } = await identityExchange.begin();

      if (settings.allowStateCookieFallback) {
        const echo: StateEcho = { state, issuedAt };
        res.cookie(STATE_COOKIE, echo, {
          signed: true,
          httpOnly: true,
          sameSite: 'lax',
          secure: options.cookieSecure ?? false,
          maxAge: options.stateTtlMs,
          path: STATE_COOKIE_PATH,
        });
      }

      res.json({ auth_url: authUrl });
    })
  );

  app.get(
    '/auth/callback',
    asyncHandler(async (req: Request, res: Response) => {
      const stateEcho = settings.allowStateCookieFallback ? readStateEcho(req) : undefined;
      res.clearCookie(STATE_COOKIE, { path: STATE_COOKIE_PATH });

      const providerError = firstString(req.query.error);
      if (providerError) {
        console.log(`[AuthService] Provider returned error: ${providerError}`);
      }

      const result = await identityExchange.login({
        state: firstString(req.query.state),
        code: firstString(req.query.code),
        stateEcho,
      });

      if (!result.ok) {
        res.redirect(`${frontendUrl}/login?error=${CALLBACK_ERROR_CODES[result.reason]}`);
        return;
      }

      res.redirect(`${frontendUrl}/auth/success?token=${encodeURIComponent(result.token)}`);
    })
  );

  app.post(
    '/auth/verify',
    asyncHandler(async (req: Request, res: Response) => {
      const token = tokenFromBody(req.body);
      const result = await tokenCodec.verify(token);

      if (!result.valid) {
        const error = SecurityErrors.INVALID_TOKEN();
        res.status(error.statusCode).json({ valid: false, error: error.message, code: error.code });
        return;
      }

      res.json({ valid: true, user: toSessionUser(result.claims) });
    })
  );

  app.post(
    '/auth/refresh',
    asyncHandler(async (req: Request, res: Response) => {
      const token = tokenFromBody(req.body);
      const refreshed = await tokenCodec.refresh(token);

      if (!refreshed) {
        throw SecurityErrors.INVALID_TOKEN();
      }

      res.json({ token: refreshed });
    })
  );

  app.get('/auth/config', (_req: Request, res: Response) => {
    res.json({
      client_id: settings.clientId,
      redirect_uri: settings.redirectUri,
      authorization_endpoint: settings.authorizeEndpoint,
      token_endpoint: settings.tokenEndpoint,
      jwks_uri: settings.jwksUri,
      scopes: settings.scopes,
      frontend_url: frontendUrl,
    });
  });

  app.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const metrics = await stateStore.getMetrics();
      res.json({
        status: 'healthy',
        service: 'auth-service',
        timestamp: new Date().toISOString(),
        activeLoginAttempts: metrics.activeAttempts,
      });
    })
  );

  app.use(jsonErrorHandler('AuthService'));

  return app;
}

/**
 * @throws {SecurityError} MISSING_PARAMETER when the body carries no token
 */
function tokenFromBody(body: unknown): string {
  const token = isRecord(body) ? body.token : undefined;
  if (typeof token !== 'string' || token.length === 0) {
    throw SecurityErrors.MISSING_PARAMETER('token');
  }
  return token;
}

/**
 * cookie-parser reports a cookie with a bad signature as `false`, which the
 * schema rejects along with any other shape.
 */
function readStateEcho(req: Request): StateEcho | undefined {
  const signed: unknown = req.signedCookies;
  if (!isRecord(signed)) {
    return undefined;
  }

  const parsed = StateEchoSchema.safeParse(signed[STATE_COOKIE]);
  return parsed.success ? parsed.data : undefined;
}
