/**
 * Secret Management Module
 *
 * Replaces {"$secret": "NAME"} descriptors in configuration with values from
 * a provider chain, so no secret has to live in the config file.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
