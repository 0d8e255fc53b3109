/**
 * Secret Provider Interface
 *
 * A provider resolves a logical secret name (e.g. "SESSION_TOKEN_SECRET")
 * from one source. Providers are chained by SecretResolver in priority order.
 */

export interface ISecretProvider {
  /**
   * Resolve a logical secret name.
   *
   * Return undefined when the secret is not found so the next provider is
   * tried. Throw only for unexpected failures (permission denied, I/O errors).
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
