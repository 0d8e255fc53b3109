import type express from 'express';
import type { RelayConfig } from '../config/schemas/index.js';
import { AuditService } from '../core/audit-service.js';
import type { Clock } from '../core/clock.js';
import type { FetchLike } from '../core/types.js';
import { createGatewayApp } from './http-server.js';
import { AuthServiceClient, ResourceServiceClient } from './service-clients.js';
import { SessionStore } from './session-store.js';

export {
  createGatewayApp,
  SESSION_COOKIE,
  LOGIN_ERROR_MESSAGES,
  RELAYED_ROUTES,
  type GatewayAppOptions,
} from './http-server.js';
export {
  AuthServiceClient,
  ResourceServiceClient,
  ServiceUnavailableError,
  type RelayedResponse,
  type ServiceClientOptions,
} from './service-clients.js';
export { SessionStore, type GatewaySession, type SessionStoreOptions } from './session-store.js';

export interface Gateway {
  app: express.Application;
  sessions: SessionStore;
  auditService: AuditService;
}

export function createGateway(
  config: RelayConfig,
  overrides: { clock?: Clock; fetchImpl?: FetchLike; auditService?: AuditService } = {}
): Gateway {
  const auditService =
    overrides.auditService ??
    new AuditService({ enabled: config.audit.enabled, maxEntries: config.audit.maxEntries });

  const clientOptions = {
    timeoutMs: config.services.requestTimeoutMs,
    fetchImpl: overrides.fetchImpl,
  };
  const sessionMaxAgeMs = config.security.tokenTTLSeconds * 1000;
  const sessions = new SessionStore({ clock: overrides.clock, maxIdleMs: sessionMaxAgeMs });

  const app = createGatewayApp({
    authClient: new AuthServiceClient(config.services.authServiceUrl, clientOptions),
    resourceClient: new ResourceServiceClient(config.services.resourceServiceUrl, clientOptions),
    sessions,
    cookieSecret: config.security.cookieSecret,
    cookieSecure: config.security.cookieSecure,
    sessionMaxAgeMs,
    auditService,
  });

  return { app, sessions, auditService };
}
