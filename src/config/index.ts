/**
 * Configuration Module - Public API
 */

export { ConfigManager, DEFAULT_CONFIG_PATH, type ConfigManagerOptions } from './manager.js';

export {
  RelayConfigSchema,
  SecurityConfigSchema,
  RoleMappingSchema,
  AuditConfigSchema,
  IdentityProviderConfigSchema,
  ServicesConfigSchema,
  type RelayConfig,
  type RelayConfigInput,
  type SecurityConfig,
  type RoleMapping,
  type AuditConfig,
  type IdentityProviderConfig,
  type ServicesConfig,
} from './schemas/index.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  type ISecretProvider,
  type SecretResolverConfig,
} from './secrets/index.js';
