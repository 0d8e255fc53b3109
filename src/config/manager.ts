import { readFile } from 'fs/promises';
import { RelayConfigSchema, type RelayConfig } from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';

export const DEFAULT_CONFIG_PATH = './config/relay.json';

export interface ConfigManagerOptions {
  /** AuditService instance for logging secret access */
  auditService?: AuditService;
  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;
  /** Environment used for CONFIG_PATH and the env secret provider (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: RelayConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options.auditService,
      failFast: true,
    });

    // Mounted secret files win over environment variables
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<RelayConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;

    try {
      const configFile = await readFile(path, 'utf-8');
      const rawConfig: unknown = JSON.parse(configFile);

      // Descriptors must be replaced before validation sees them
      console.log('[ConfigManager] Resolving secrets...');
      await this.secretResolver.resolveSecrets(rawConfig);
      console.log('[ConfigManager] Secrets resolved successfully');

      const config = RelayConfigSchema.parse(rawConfig);
      this.validateSecurityRequirements(config);
      this.config = config;

      console.log(`[ConfigManager] Configuration loaded and validated from ${path}`);
      return config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  getConfig(): RelayConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getSecurityConfig(): RelayConfig['security'] {
    return this.getConfig().security;
  }

  getIdentityProviderConfig(): RelayConfig['identityProvider'] {
    return this.getConfig().identityProvider;
  }

  getRoleMappingConfig(): RelayConfig['roles'] {
    return this.getConfig().roles;
  }

  getServicesConfig(): RelayConfig['services'] {
    return this.getConfig().services;
  }

  getAuditConfig(): RelayConfig['audit'] {
    return this.getConfig().audit;
  }

  private validateSecurityRequirements(config: RelayConfig): void {
    if (config.security.tokenSecret === config.security.cookieSecret) {
      throw new Error('security.tokenSecret and security.cookieSecret must differ');
    }

    if (this.isSecureEnvironment() && !config.security.cookieSecure) {
      console.warn('[ConfigManager] security.cookieSecure is off in production; cookies will be sent over plain HTTP');
    }

    if (config.identityProvider.allowStateCookieFallback) {
      console.warn('[ConfigManager] State cookie fallback is enabled');
    }
  }

  async reloadConfig(configPath?: string): Promise<RelayConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }
}
