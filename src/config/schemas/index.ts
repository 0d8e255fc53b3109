/**
 * Relay Configuration Schema
 *
 * One configuration file serves all three services.
 *
 * @example
 * ```json
 * {
 *   "security": {
 *     "tokenSecret": { "$secret": "SESSION_TOKEN_SECRET" },
 *     "cookieSecret": { "$secret": "COOKIE_SECRET" }
 *   },
 *   "identityProvider": {
 *     "clientId": "relay-client",
 *     "clientSecret": { "$secret": "OAUTH_CLIENT_SECRET" },
 *     ...
 *   },
 *   "roles": { "mappings": { "admin@example.com": "admin" } },
 *   "services": { "frontendUrl": "http://localhost:3000", ... }
 * }
 * ```
 */

import { z } from 'zod';
import { AuditConfigSchema, RoleMappingSchema, SecurityConfigSchema } from './core.js';
import { IdentityProviderConfigSchema } from './identity-provider.js';
import { ServicesConfigSchema } from './services.js';

export {
  SecurityConfigSchema,
  RoleMappingSchema,
  AuditConfigSchema,
  type SecurityConfig,
  type RoleMapping,
  type AuditConfig,
} from './core.js';

export {
  IdentityProviderConfigSchema,
  type IdentityProviderConfig,
} from './identity-provider.js';

export { ServicesConfigSchema, type ServicesConfig } from './services.js';

export const RelayConfigSchema = z.object({
  security: SecurityConfigSchema,
  identityProvider: IdentityProviderConfigSchema,
  roles: RoleMappingSchema.default({}),
  services: ServicesConfigSchema,
  audit: AuditConfigSchema.default({}),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/**
 * Input shape (before defaults are applied)
 */
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;
