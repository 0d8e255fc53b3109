/**
 * Auth service assembly: builds the protocol core from a validated
 * RelayConfig and mounts it on the Express app.
 */

import type express from 'express';
import type { JWTVerifyGetKey } from 'jose';
import type { RelayConfig } from '../config/schemas/index.js';
import { AuditService } from '../core/audit-service.js';
import type { Clock } from '../core/clock.js';
import { RoleMapper } from '../core/role-mapper.js';
import { StateStore, type StateStorage } from '../core/state-store.js';
import { TokenCodec } from '../core/token-codec.js';
import { IdTokenVerifier } from '../oauth/id-token-verifier.js';
import { IdentityExchange } from '../oauth/identity-exchange.js';
import { ProviderClient } from '../oauth/provider-client.js';
import type { FetchLike } from '../oauth/types.js';
import { createAuthApp } from './http-server.js';

export { createAuthApp, STATE_COOKIE, CALLBACK_ERROR_CODES, type AuthAppOptions } from './http-server.js';

export interface AuthServiceOverrides {
  clock?: Clock;
  /** Transport for the provider token endpoint */
  fetchImpl?: FetchLike;
  /** Provider signing keys (defaults to the remote JWKS) */
  keySet?: JWTVerifyGetKey;
  stateStorage?: StateStorage;
  auditService?: AuditService;
}

export interface AuthService {
  app: express.Application;
  stateStore: StateStore;
  tokenCodec: TokenCodec;
  identityExchange: IdentityExchange;
  auditService: AuditService;
}

/**
 * @throws {SecurityError} CONFIGURATION_ERROR when the signing secret is unusable
 */
export function createAuthService(config: RelayConfig, overrides: AuthServiceOverrides = {}): AuthService {
  const auditService =
    overrides.auditService ??
    new AuditService({ enabled: config.audit.enabled, maxEntries: config.audit.maxEntries });

  const settings = config.identityProvider;
  const stateTtlMs = config.security.stateTTLSeconds * 1000;

  const stateStore = new StateStore({
    storage: overrides.stateStorage,
    clock: overrides.clock,
    ttlMs: stateTtlMs,
    auditService,
  });

  const tokenCodec = new TokenCodec({
    secret: config.security.tokenSecret,
    clock: overrides.clock,
    ttlSeconds: config.security.tokenTTLSeconds,
    auditService,
  });

  const identityExchange = new IdentityExchange({
    settings,
    stateStore,
    providerClient: new ProviderClient(settings, overrides.fetchImpl),
    idTokenVerifier: new IdTokenVerifier(settings, { keySet: overrides.keySet, clock: overrides.clock }),
    roleMapper: new RoleMapper(config.roles),
    tokenCodec,
    auditService,
  });

  const app = createAuthApp({
    identityExchange,
    tokenCodec,
    stateStore,
    settings,
    frontendUrl: config.services.frontendUrl,
    cookieSecret: config.security.cookieSecret,
    cookieSecure: config.security.cookieSecure,
    stateTtlMs,
  });

  return { app, stateStore, tokenCodec, identityExchange, auditService };
}
