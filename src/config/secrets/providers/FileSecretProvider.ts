/**
 * File-Based Secret Provider
 *
 * Resolves secrets from files in a mounted secrets directory (Docker secrets,
 * Kubernetes secret volumes). Recommended for production.
 *
 * ```typescript
 * const provider = new FileSecretProvider('/run/secrets');
 * await provider.resolve('SESSION_TOKEN_SECRET'); // contents of /run/secrets/SESSION_TOKEN_SECRET
 * ```
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  constructor(private readonly secretDir: string = '/run/secrets') {}

  /**
   * Read `{secretDir}/{logicalName}`. Names that would leave the directory
   * resolve to undefined.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const normalizedSecretDir = path.resolve(this.secretDir);
    const filePath = path.resolve(normalizedSecretDir, logicalName);

    if (!filePath.startsWith(normalizedSecretDir + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');
      // Files usually end with a newline
      return secretValue.trim();
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return undefined;
      }
      throw error;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
