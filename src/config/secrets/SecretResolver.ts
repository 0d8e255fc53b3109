/**
 * Secret Resolver
 *
 * Walks a raw configuration object and replaces every {"$secret": "NAME"}
 * descriptor with the value returned by the first provider that knows NAME.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const raw: unknown = JSON.parse(await fs.readFile('relay.json', 'utf-8'));
 * await resolver.resolveSecrets(raw); // in place
 * ```
 *
 * With failFast (the default) an unresolvable secret throws, which aborts
 * startup: a service never runs with a missing signing secret.
 */

import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';
import { isRecord } from '../../utils/guards.js';

export interface SecretResolverConfig {
  /** Optional audit service for logging secret access */
  auditService?: AuditService;

  /** Throw when a secret cannot be resolved (default: true) */
  failFast?: boolean;
}

type SecretDescriptor = { $secret: string };

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider to the chain. Providers are queried in insertion order.
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve all descriptors in place
   *
   * @throws {Error} When failFast is set and a secret cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const child: unknown = node[i];
        const childPath = `${path}[${i}]`;
        if (isSecretDescriptor(child)) {
          const value = await this.resolveDescriptor(child, childPath);
          if (value !== undefined) {
            node[i] = value;
          }
        } else {
          await this.resolveNode(child, childPath);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    const record = node;
    for (const key of Object.keys(record)) {
      const child = record[key];
      const childPath = `${path}.${key}`;

      if (isSecretDescriptor(child)) {
        const value = await this.resolveDescriptor(child, childPath);
        if (value !== undefined) {
          record[key] = value;
        }
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(
    descriptor: SecretDescriptor,
    path: string
  ): Promise<string | undefined> {
    const value = await this.resolveSecret(descriptor.$secret, path);

    if (value === undefined) {
      const message = `Secret "${descriptor.$secret}" at path "${path}" could not be resolved by any provider.`;
      if (this.failFast) {
        throw new Error(`[SecretResolver] ${message}`);
      }
      console.warn(`[SecretResolver] ${message}`);
    }

    return value;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          await this.auditService?.log({
            source: 'config:secret-resolution',
            timestamp: new Date(),
            userId: 'system',
            action: `resolve:${logicalName}`,
            success: true,
            metadata: {
              provider: provider.constructor.name,
              configPath: path,
            },
          });
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.auditService?.log({
      source: 'config:secret-resolution',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      metadata: {
        provider: 'none',
        configPath: path,
      },
    });

    return undefined;
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  public clearProviders(): void {
    this.providers = [];
  }
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    '$secret' in value &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}
