/**
 * Unit Tests for Configuration Schemas
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  IdentityProviderConfigSchema,
  RelayConfigSchema,
  RoleMappingSchema,
  SecurityConfigSchema,
  ServicesConfigSchema,
} from '../../../src/config/schemas/index.js';

const SECRET_A = 'test-token-secret-0123456789abcdef';
const SECRET_B = 'test-cookie-secret-0123456789abcdef';

const provider = {
  clientId: 'relay-test-client',
  clientSecret: 'test-client-secret',
  authorizeEndpoint: 'https://idp.test/authorize',
  tokenEndpoint: 'https://idp.test/token',
  jwksUri: 'https://idp.test/jwks',
  issuers: ['https://idp.test'],
  redirectUri: 'http://localhost:5001/auth/callback',
};

describe('SecurityConfigSchema', () => {
  it('should require both secrets', () => {
    expect(SecurityConfigSchema.safeParse({ tokenSecret: SECRET_A }).success).toBe(false);
    expect(SecurityConfigSchema.safeParse({ cookieSecret: SECRET_B }).success).toBe(false);
  });

  it('should default the lifetimes to 8 hours and 10 minutes', () => {
    const parsed = SecurityConfigSchema.parse({ tokenSecret: SECRET_A, cookieSecret: SECRET_B });

    expect(parsed.tokenTTLSeconds).toBe(28800);
    expect(parsed.stateTTLSeconds).toBe(600);
    expect(parsed.cookieSecure).toBe(false);
  });

  it('should bound the state window', () => {
    const result = SecurityConfigSchema.safeParse({
      tokenSecret: SECRET_A,
      cookieSecret: SECRET_B,
      stateTTLSeconds: 7200,
    });

    expect(result.success).toBe(false);
  });
});

describe('RoleMappingSchema', () => {
  it('should default to no mappings and the user role', () => {
    expect(RoleMappingSchema.parse({})).toEqual({ mappings: {}, defaultRole: 'user' });
  });

  it('should reject unknown roles', () => {
    expect(RoleMappingSchema.safeParse({ mappings: { 'a@example.com': 'root' } }).success).toBe(false);
  });
});

describe('IdentityProviderConfigSchema', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should apply authorization defaults', () => {
    const parsed = IdentityProviderConfigSchema.parse(provider);

    expect(parsed.scopes).toEqual(['openid', 'email', 'profile']);
    expect(parsed.extraAuthorizeParams).toEqual({ access_type: 'offline', prompt: 'consent' });
    expect(parsed.clockToleranceSeconds).toBe(60);
    expect(parsed.timeoutMs).toBe(5000);
    expect(parsed.allowStateCookieFallback).toBe(false);
  });

  it('should require at least one issuer', () => {
    expect(IdentityProviderConfigSchema.safeParse({ ...provider, issuers: [] }).success).toBe(false);
  });

  it('should cap the clock tolerance at 5 minutes', () => {
    expect(
      IdentityProviderConfigSchema.safeParse({ ...provider, clockToleranceSeconds: 301 }).success
    ).toBe(false);
  });

  it('should allow plain HTTP provider endpoints only outside production', () => {
    const insecure = { ...provider, tokenEndpoint: 'http://idp.test/token' };
    expect(IdentityProviderConfigSchema.safeParse(insecure).success).toBe(true);

    vi.stubEnv('NODE_ENV', 'production');
    const result = IdentityProviderConfigSchema.safeParse(insecure);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        'Token endpoint must use HTTPS (HTTP allowed in development/test)'
      );
    }
  });
});

describe('ServicesConfigSchema', () => {
  it('should default ports and timeout', () => {
    const parsed = ServicesConfigSchema.parse({
      frontendUrl: 'http://localhost:3000',
      authServiceUrl: 'http://localhost:5001',
      resourceServiceUrl: 'http://localhost:5002',
    });

    expect([parsed.gatewayPort, parsed.authServicePort, parsed.resourceServicePort]).toEqual([
      3000, 5001, 5002,
    ]);
    expect(parsed.requestTimeoutMs).toBe(5000);
  });

  it('should reject an invalid URL', () => {
    expect(
      ServicesConfigSchema.safeParse({
        frontendUrl: 'not a url',
        authServiceUrl: 'http://localhost:5001',
        resourceServiceUrl: 'http://localhost:5002',
      }).success
    ).toBe(false);
  });
});

describe('RelayConfigSchema', () => {
  it('should default roles and audit sections', () => {
    const parsed = RelayConfigSchema.parse({
      security: { tokenSecret: SECRET_A, cookieSecret: SECRET_B },
      identityProvider: provider,
      services: {
        frontendUrl: 'http://localhost:3000',
        authServiceUrl: 'http://localhost:5001',
        resourceServiceUrl: 'http://localhost:5002',
      },
    });

    expect(parsed.roles).toEqual({ mappings: {}, defaultRole: 'user' });
    expect(parsed.audit).toEqual({ enabled: false, maxEntries: 10000 });
  });

  it('should reject a configuration without the identity provider', () => {
    expect(
      RelayConfigSchema.safeParse({
        security: { tokenSecret: SECRET_A, cookieSecret: SECRET_B },
        services: {
          frontendUrl: 'http://localhost:3000',
          authServiceUrl: 'http://localhost:5001',
          resourceServiceUrl: 'http://localhost:5002',
        },
      }).success
    ).toBe(false);
  });
});
