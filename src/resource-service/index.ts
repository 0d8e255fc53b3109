import type express from 'express';
import type { RelayConfig } from '../config/schemas/index.js';
import { AuditService } from '../core/audit-service.js';
import type { Clock } from '../core/clock.js';
import { TokenCodec } from '../core/token-codec.js';
import { createResourceApp } from './http-server.js';

export { createResourceApp, type ResourceAppOptions, type ApiEnvelope } from './http-server.js';
export { withAuth, extractBearerToken, VerifiedRequestContext, type GuardedHandler } from './guards.js';

export interface ResourceService {
  app: express.Application;
  tokenCodec: TokenCodec;
  auditService: AuditService;
}

/**
 * The resource service verifies tokens locally with the shared signing secret.
 *
 * @throws {SecurityError} CONFIGURATION_ERROR when the signing secret is unusable
 */
export function createResourceService(
  config: RelayConfig,
  overrides: { clock?: Clock; auditService?: AuditService } = {}
): ResourceService {
  const auditService =
    overrides.auditService ??
    new AuditService({ enabled: config.audit.enabled, maxEntries: config.audit.maxEntries });

  const tokenCodec = new TokenCodec({
    secret: config.security.tokenSecret,
    clock: overrides.clock,
    ttlSeconds: config.security.tokenTTLSeconds,
    auditService,
  });

  const app = createResourceApp({ tokenCodec, clock: overrides.clock, auditService });

  return { app, tokenCodec, auditService };
}
