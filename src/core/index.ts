/**
 * Core Module Public API
 *
 * The protocol core has no HTTP dependencies. Dependency direction:
 * Core → OAuth → services (auth-service, resource-service, gateway)
 */

export { StateStore, InMemoryStateStorage, DEFAULT_STATE_TTL_MS } from './state-store.js';
export type { StateStorage, StateStoreOptions, ConsumeOutcome } from './state-store.js';

export { TokenCodec, SESSION_TOKEN_TTL_SECONDS, MIN_SECRET_LENGTH } from './token-codec.js';
export type { TokenCodecOptions } from './token-codec.js';

export { RoleMapper } from './role-mapper.js';
export type { RoleMappingConfig } from './role-mapper.js';

export { authorize, decide } from './access-policy.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { systemClock, type Clock } from './clock.js';

export { SessionUserSchema, toSessionUser, type SessionUser } from './session-user.js';

export { ROLE_ADMIN, ROLE_USER } from './types.js';
export type {
  Role,
  RequiredRole,
  Identity,
  SessionClaims,
  TokenVerification,
  AccessDecision,
  LoginAttempt,
  AuditEntry,
  FetchLike,
} from './types.js';
