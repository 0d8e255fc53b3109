/**
 * Request Guards - Bearer Authentication and Role Checks
 *
 * Every protected route is wrapped in {@link withAuth}. The handler receives a
 * {@link VerifiedRequestContext}, which only this module can construct and
 * only after TokenCodec.verify accepted the presented token, so no handler is
 * reachable with unverified claims. The role check runs before the handler;
 * a denied request never reaches business logic.
 */

import type { Request, RequestHandler, Response } from 'express';
import type { AuditService } from '../core/audit-service.js';
import { decide } from '../core/access-policy.js';
import type { TokenCodec } from '../core/token-codec.js';
import type { AccessDecision, RequiredRole, SessionClaims } from '../core/types.js';
import { SecurityErrors } from '../utils/errors.js';
import { firstString } from '../utils/guards.js';
import { asyncHandler } from '../utils/http-server.js';

const guardKey: unique symbol = Symbol('VerifiedRequestContext');

export class VerifiedRequestContext {
  constructor(
    key: typeof guardKey,
    public readonly claims: SessionClaims,
    public readonly decision: AccessDecision
  ) {
    if (key !== guardKey) {
      throw new Error('VerifiedRequestContext can only be created by withAuth');
    }
  }
}

export type GuardedHandler = (
  req: Request,
  res: Response,
  ctx: VerifiedRequestContext
) => void | Promise<void>;

export interface GuardOptions {
  auditService?: AuditService;
}

/**
 * Extract the token from `Authorization: Bearer <token>`
 *
 * @returns Token, or null when the header is absent or not a bearer credential
 */
export function extractBearerToken(header: unknown): string | null {
  const value = firstString(header);
  if (!value) {
    return null;
  }

  const bearerMatch = /^Bearer\s+(\S+)\s*$/i.exec(value);
  return bearerMatch ? bearerMatch[1] : null;
}

/**
 * Wrap a handler with token verification and an AccessPolicy check
 *
 * - no bearer token → 401 MISSING_TOKEN
 * - token fails verification (forged, malformed, expired) → 401 INVALID_TOKEN
 * - role insufficient → 403 INSUFFICIENT_ROLE
 */
export function withAuth(
  tokenCodec: TokenCodec,
  requiredRole: RequiredRole,
  handler: GuardedHandler,
  options: GuardOptions = {}
): RequestHandler {
  const contextFor = guardFor(tokenCodec, requiredRole, options);

  return asyncHandler(async (req, res) => {
    const ctx = await contextFor(req);
    await handler(req, res, ctx);
  });
}

function guardFor(tokenCodec: TokenCodec, requiredRole: RequiredRole, options: GuardOptions) {
  return async (req: Request): Promise<VerifiedRequestContext> => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw SecurityErrors.MISSING_TOKEN();
    }

    const result = await tokenCodec.verify(token);
    if (!result.valid) {
      throw SecurityErrors.INVALID_TOKEN();
    }

    const decision = decide(result.claims, requiredRole);
    if (!decision.allowed) {
      console.log(
        `[ResourceGuard] Access denied: ${req.method} ${req.path} requires ${requiredRole}, role=${result.claims.role}`
      );
      options.auditService?.record({
        source: 'resource:guard',
        userId: result.claims.subjectId,
        action: 'access_denied',
        success: false,
        reason: `requires_${requiredRole}`,
        metadata: { path: req.path },
      });
      throw SecurityErrors.INSUFFICIENT_ROLE(requiredRole);
    }

    return new VerifiedRequestContext(guardKey, result.claims, decision);
  };
}
