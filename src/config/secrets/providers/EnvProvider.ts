/**
 * Environment Variable Secret Provider
 *
 * Resolves secrets from process.env, typically populated from a .env file by
 * `import 'dotenv/config'` in the service entry point. Use it as the fallback
 * after FileSecretProvider.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * @returns The trimmed value of `env[logicalName]`, or undefined when unset or empty
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value.trim() === '') {
      return undefined;
    }

    return value.trim();
  }
}
