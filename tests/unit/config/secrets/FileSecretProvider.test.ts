/**
 * Unit Tests for FileSecretProvider
 *
 * Mounted-file secret resolution: trimming, missing files, path escapes and
 * unexpected I/O failures.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileSecretProvider } from '../../../../src/config/secrets/providers/FileSecretProvider.js';

describe('FileSecretProvider', () => {
  let tempDir: string;
  let provider: FileSecretProvider;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-secrets-'));
    provider = new FileSecretProvider(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should default to /run/secrets', () => {
      expect(new FileSecretProvider().getSecretDir()).toBe('/run/secrets');
    });
  });

  describe('resolve', () => {
    it('should return the trimmed file content', async () => {
      await fs.writeFile(path.join(tempDir, 'SESSION_TOKEN_SECRET'), '  test-secret-value  \n');

      expect(await provider.resolve('SESSION_TOKEN_SECRET')).toBe('test-secret-value');
    });

    it('should return undefined for a missing file', async () => {
      expect(await provider.resolve('NOT_THERE')).toBeUndefined();
    });

    it('should return undefined when the directory does not exist', async () => {
      const missingDir = new FileSecretProvider(path.join(tempDir, 'nope'));

      expect(await missingDir.resolve('ANY')).toBeUndefined();
    });

    it.each(['../etc/passwd', '/etc/passwd', 'a/../../b'])(
      'should refuse %j without reading it',
      async (name) => {
        expect(await provider.resolve(name)).toBeUndefined();
      }
    );

    it('should rethrow failures other than a missing file', async () => {
      // A directory in place of the file makes readFile fail with EISDIR
      await fs.mkdir(path.join(tempDir, 'IS_A_DIR'));

      await expect(provider.resolve('IS_A_DIR')).rejects.toThrow();
    });
  });
});
