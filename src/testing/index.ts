/**
 * Testing Utilities
 *
 * Deterministic time, an in-process identity provider (RSA key, local JWKS,
 * id_token signer) and a ready-made relay configuration.
 *
 * Usage:
 *   const clock = new ManualClock(Date.UTC(2025, 0, 1));
 *   const idp = await TestIdentityProvider.create();
 *   const config = createTestConfig({ roles: { mappings: { 'admin@example.com': 'admin' } } });
 *   const { app } = createAuthService(config, { clock, keySet: idp.keySet, fetchImpl });
 */

import { SignJWT, createLocalJWKSet, exportJWK, generateKeyPair, type JWTVerifyGetKey, type KeyLike } from 'jose';
import { RelayConfigSchema, type RelayConfig, type RelayConfigInput } from '../config/schemas/index.js';
import type { Clock } from '../core/clock.js';
import type { Identity } from '../core/types.js';

export const TEST_ISSUER = 'https://idp.test';
export const TEST_CLIENT_ID = 'relay-test-client';
export const TEST_TOKEN_SECRET = 'test-token-secret-0123456789abcdef';
export const TEST_COOKIE_SECRET = 'test-cookie-secret-0123456789abcdef';

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  constructor(private current: number = Date.UTC(2025, 0, 1, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(epochMs: number): void {
    this.current = epochMs;
  }
}

export interface IdTokenClaims {
  sub: string;
  email?: string;
  name?: string;
  picture?: string;
  azp?: string;
}

export interface SignIdTokenOptions {
  /** Issue time in epoch milliseconds (default: Date.now()) */
  issuedAt?: number;
  expiresInSeconds?: number;
  audience?: string;
  issuer?: string;
  /** Sign with a key the JWKS does not publish */
  foreignKey?: boolean;
}

/**
 * In-process stand-in for the external OpenID Connect provider
 */
export class TestIdentityProvider {
  private constructor(
    private readonly privateKey: KeyLike,
    private readonly foreignKey: KeyLike,
    public readonly keySet: JWTVerifyGetKey,
    public readonly issuer: string,
    public readonly clientId: string
  ) {}

  static async create(issuer = TEST_ISSUER, clientId = TEST_CLIENT_ID): Promise<TestIdentityProvider> {
    const { publicKey, privateKey } = await generateKeyPair('RS256');
    const foreign = await generateKeyPair('RS256');

    const jwk = await exportJWK(publicKey);
    const keySet = createLocalJWKSet({ keys: [{ ...jwk, kid: 'test-key', alg: 'RS256', use: 'sig' }] });

    return new TestIdentityProvider(privateKey, foreign.privateKey, keySet, issuer, clientId);
  }

  async signIdToken(claims: IdTokenClaims, options: SignIdTokenOptions = {}): Promise<string> {
    const iat = Math.floor((options.issuedAt ?? Date.now()) / 1000);
    const { sub, ...rest } = claims;

    return new SignJWT({ ...rest })
      .setProtectedHeader({ alg: 'RS256', kid: 'test-key' })
      .setSubject(sub)
      .setIssuer(options.issuer ?? this.issuer)
      .setAudience(options.audience ?? this.clientId)
      .setIssuedAt(iat)
      .setExpirationTime(iat + (options.expiresInSeconds ?? 3600))
      .sign(options.foreignKey ? this.foreignKey : this.privateKey);
  }
}

/**
 * JSON Response for fake transports
 */
export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

type ConfigOverrides = {
  [K in keyof RelayConfigInput]?: Partial<Exclude<RelayConfigInput[K], undefined>>;
};

/**
 * Valid relay configuration with test placeholders, section-wise overridable
 */
export function createTestConfig(overrides: ConfigOverrides = {}): RelayConfig {
  return RelayConfigSchema.parse({
    security: {
      tokenSecret: TEST_TOKEN_SECRET,
      cookieSecret: TEST_COOKIE_SECRET,
      ...overrides.security,
    },
    identityProvider: {
      clientId: TEST_CLIENT_ID,
      clientSecret: 'test-client-secret',
      authorizeEndpoint: `${TEST_ISSUER}/authorize`,
      tokenEndpoint: `${TEST_ISSUER}/token`,
      jwksUri: `${TEST_ISSUER}/jwks`,
      issuers: [TEST_ISSUER],
      redirectUri: 'http://auth.test/auth/callback',
      ...overrides.identityProvider,
    },
    roles: {
      mappings: { 'admin@example.com': 'admin' },
      ...overrides.roles,
    },
    services: {
      frontendUrl: 'http://gateway.test',
      authServiceUrl: 'http://auth.test',
      resourceServiceUrl: 'http://resources.test',
      ...overrides.services,
    },
    audit: { ...overrides.audit },
  });
}

export function createTestIdentity(overrides: Partial<Identity> = {}): Identity {
  return {
    subjectId: 'subject-123',
    email: 'user1@example.com',
    displayName: 'Regular User',
    role: 'user',
    ...overrides,
  };
}

/**
 * `name=value` of the named cookie in a Set-Cookie header (string or list)
 */
export function cookiePair(setCookieHeader: unknown, name: string): string | undefined {
  const cookies: unknown[] = Array.isArray(setCookieHeader) ? setCookieHeader : [setCookieHeader];
  const match = cookies.find(
    (cookie): cookie is string => typeof cookie === 'string' && cookie.startsWith(`${name}=`)
  );
  return match?.split(';')[0];
}
