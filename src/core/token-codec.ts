/**
 * Token Codec - Session Token Issuance and Verification
 *
 * Session tokens are HS256-signed JWTs carrying the identity and role:
 *
 *   { sub, email, name, role, picture?, iat, exp }   with exp = iat + 8h
 *
 * The codec is the only holder of the signing secret. verify() reports one
 * INVALID outcome for forged, malformed and expired tokens alike; the
 * category is only visible in the server log.
 *
 * Responsibilities:
 * - Token signing (issue, refresh)
 * - Signature, structure and expiry checks (verify)
 *
 * NOT responsible for:
 * - Role derivation (RoleMapper)
 * - Authorization (AccessPolicy)
 */

import { SignJWT, jwtVerify, errors } from 'jose';
import { z } from 'zod';
import type { AuditService } from './audit-service.js';
import { systemClock, type Clock } from './clock.js';
import type { Identity, SessionClaims, TokenVerification } from './types.js';
import { SecurityErrors } from '../utils/errors.js';

export const SESSION_TOKEN_TTL_SECONDS = 8 * 60 * 60;
export const MIN_SECRET_LENGTH = 32;

const ALGORITHM = 'HS256';

/**
 * Claim set of a session token after signature verification
 */
const SessionTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  name: z.string(),
  role: z.string().min(1),
  picture: z.string().optional(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export interface TokenCodecOptions {
  /** Symmetric signing secret (at least 32 characters) */
  secret: string;
  clock?: Clock;
  /** Token lifetime in seconds (default: 8 hours) */
  ttlSeconds?: number;
  auditService?: AuditService;
}

type RejectionCategory = 'expired' | 'bad_signature' | 'malformed';

export class TokenCodec {
  private readonly key: Uint8Array;
  private readonly clock: Clock;
  private readonly ttlSeconds: number;
  private readonly auditService?: AuditService;

  /**
   * @throws {SecurityError} CONFIGURATION_ERROR when the secret is missing or too short
   */
  constructor(options: TokenCodecOptions) {
    if (!options.secret || options.secret.length < MIN_SECRET_LENGTH) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `session token secret must be at least ${MIN_SECRET_LENGTH} characters`
      );
    }

    this.key = new TextEncoder().encode(options.secret);
    this.clock = options.clock ?? systemClock;
    this.ttlSeconds = options.ttlSeconds ?? SESSION_TOKEN_TTL_SECONDS;
    this.auditService = options.auditService;
  }

  /**
   * Issue a session token for a verified identity
   */
  async issue(identity: Identity): Promise<string> {
    const token = await this.sign(identity, this.clock.now());
    this.auditService?.record({
      source: 'auth:token-codec',
      userId: identity.subjectId,
      action: 'token_issue',
      success: true,
      metadata: { role: identity.role },
    });
    return token;
  }

  /**
   * Verify a serialized session token
   */
  async verify(token: string): Promise<TokenVerification> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: new Date(this.clock.now()),
        requiredClaims: ['sub', 'iat', 'exp'],
      });

      const parsed = SessionTokenPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        return this.reject('malformed');
      }

      const claims: SessionClaims = {
        subjectId: parsed.data.sub,
        email: parsed.data.email,
        displayName: parsed.data.name,
        role: parsed.data.role,
        ...(parsed.data.picture ? { avatarUrl: parsed.data.picture } : {}),
        issuedAt: parsed.data.iat * 1000,
        expiresAt: parsed.data.exp * 1000,
      };

      if (this.clock.now() >= claims.expiresAt) {
        return this.reject('expired');
      }

      return { valid: true, claims };
    } catch (error) {
      return this.reject(this.categorize(error));
    }
  }

  /**
   * Sliding-session extension: verify, then re-issue the same identity with a
   * fresh window. The new issue time is strictly later than the old one.
   *
   * @returns New token, or null when the presented token does not verify
   */
  async refresh(token: string): Promise<string | null> {
    const result = await this.verify(token);
    if (!result.valid) {
      return null;
    }

    const { issuedAt, expiresAt: _expiresAt, ...identity } = result.claims;
    const refreshedAt = Math.max(this.clock.now(), issuedAt + 1000);

    this.auditService?.record({
      source: 'auth:token-codec',
      userId: identity.subjectId,
      action: 'token_refresh',
      success: true,
    });

    return this.sign(identity, refreshedAt);
  }

  private async sign(identity: Identity, issuedAtMs: number): Promise<string> {
    const iat = Math.floor(issuedAtMs / 1000);

    return new SignJWT({
      email: identity.email,
      name: identity.displayName,
      role: identity.role,
      ...(identity.avatarUrl ? { picture: identity.avatarUrl } : {}),
    })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(identity.subjectId)
      .setIssuedAt(iat)
      .setExpirationTime(iat + this.ttlSeconds)
      .sign(this.key);
  }

  private categorize(error: unknown): RejectionCategory {
    if (error instanceof errors.JWTExpired) {
      return 'expired';
    }
    if (error instanceof errors.JWSSignatureVerificationFailed) {
      return 'bad_signature';
    }
    return 'malformed';
  }

  private reject(category: RejectionCategory): TokenVerification {
    console.log(`[TokenCodec] Token rejected: ${category}`);
    this.auditService?.record({
      source: 'auth:token-codec',
      action: 'token_verify',
      success: false,
      reason: category,
    });
    return { valid: false };
  }
}
