/**
 * ID Token Verifier - Identity Assertion Validation
 *
 * Verifies the provider's id_token:
 * - RS256 signature against the provider's published JWKS
 * - `iss` among the configured issuers
 * - `aud` equal to the registered client identifier
 * - `exp`/`nbf`/`iat` with a small clock-skew allowance (60 s by default)
 * - `azp`, when present, equal to the client identifier
 * - `sub` and `email` present
 *
 * NOT responsible for:
 * - Role derivation (RoleMapper)
 * - Session token issuance (TokenCodec)
 */

import { createRemoteJWKSet, jwtVerify, errors, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import { systemClock, type Clock } from '../core/clock.js';
import type { IdentityAssertion, IdentityProviderSettings } from './types.js';

export const DEFAULT_CLOCK_TOLERANCE_SECONDS = 60;

export class IdTokenVerificationError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'IdTokenVerificationError';
  }
}

export interface IdTokenVerifierOptions {
  /** Key resolver; defaults to a cached remote JWKS at `settings.jwksUri` */
  keySet?: JWTVerifyGetKey;
  clock?: Clock;
}

export class IdTokenVerifier {
  private readonly keySet: JWTVerifyGetKey;
  private readonly clock: Clock;

  constructor(
    private readonly settings: IdentityProviderSettings,
    options: IdTokenVerifierOptions = {}
  ) {
    this.keySet =
      options.keySet ??
      createRemoteJWKSet(new URL(settings.jwksUri), {
        timeoutDuration: settings.timeoutMs ?? 5000,
        cooldownDuration: 30000,
        cacheMaxAge: 600000, // 10 minutes
      });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Verify an id_token and extract the identity assertion
   *
   * @throws {IdTokenVerificationError} If the token is not acceptable
   */
  async verify(idToken: string): Promise<IdentityAssertion> {
    let payload: JWTPayload;

    try {
      const result = await jwtVerify(idToken, this.keySet, {
        issuer: this.settings.issuers,
        audience: this.settings.clientId,
        algorithms: ['RS256'],
        clockTolerance: this.settings.clockToleranceSeconds ?? DEFAULT_CLOCK_TOLERANCE_SECONDS,
        currentDate: new Date(this.clock.now()),
      });
      payload = result.payload;
    } catch (error) {
      throw this.translate(error);
    }

    if (payload.azp !== undefined && payload.azp !== this.settings.clientId) {
      throw new IdTokenVerificationError('AZP_MISMATCH', 'Authorized party claim is invalid');
    }

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw new IdTokenVerificationError('MISSING_SUBJECT', 'Missing required claim: sub');
    }

    if (typeof payload.email !== 'string' || payload.email.length === 0) {
      throw new IdTokenVerificationError('MISSING_EMAIL', 'Missing required claim: email');
    }

    return {
      subject: payload.sub,
      email: payload.email,
      name: typeof payload.name === 'string' ? payload.name : undefined,
      picture: typeof payload.picture === 'string' ? payload.picture : undefined,
    };
  }

  private translate(error: unknown): IdTokenVerificationError {
    if (error instanceof errors.JWTExpired) {
      return new IdTokenVerificationError('TOKEN_EXPIRED', 'ID token has expired');
    }

    if (error instanceof errors.JWTClaimValidationFailed) {
      return new IdTokenVerificationError(
        'INVALID_CLAIMS',
        `ID token claim check failed: ${error.claim}`
      );
    }

    if (error instanceof errors.JWSSignatureVerificationFailed) {
      return new IdTokenVerificationError('INVALID_SIGNATURE', 'ID token signature is invalid');
    }

    if (error instanceof errors.JWKSNoMatchingKey) {
      return new IdTokenVerificationError('UNKNOWN_KEY', 'No provider key matches the ID token');
    }

    return new IdTokenVerificationError(
      'ID_TOKEN_INVALID',
      `ID token validation failed: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}
