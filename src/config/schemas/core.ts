/**
 * Core Configuration Schemas
 *
 * Signing material, role mapping and audit settings used by the protocol
 * core (TokenCodec, StateStore, RoleMapper, AuditService).
 */

import { z } from 'zod';

// ============================================================================
// Security
// ============================================================================

/**
 * Secrets and cookie settings
 *
 * Both secrets are REQUIRED: there are no defaults, and a missing value
 * aborts startup.
 */
export const SecurityConfigSchema = z.object({
  tokenSecret: z
    .string()
    .min(32, 'tokenSecret must be at least 32 characters')
    .describe('HS256 secret for session tokens'),
  cookieSecret: z
    .string()
    .min(32, 'cookieSecret must be at least 32 characters')
    .describe('Secret for signed cookies (gateway session, state echo)'),
  cookieSecure: z
    .boolean()
    .default(false)
    .describe('Set the Secure attribute on cookies (enable behind HTTPS)'),
  tokenTTLSeconds: z
    .number()
    .int()
    .min(60)
    .max(86400)
    .default(28800)
    .describe('Session token lifetime in seconds (default: 8 hours)'),
  stateTTLSeconds: z
    .number()
    .int()
    .min(60)
    .max(3600)
    .default(600)
    .describe('Login state validity window in seconds (default: 10 minutes)'),
});

// ============================================================================
// Role Mapping
// ============================================================================

/**
 * Static email to role mapping with a lowest-privilege default
 */
export const RoleMappingSchema = z.object({
  mappings: z
    .record(z.enum(['admin', 'user']))
    .default({})
    .describe('Email address to role'),
  defaultRole: z.enum(['admin', 'user']).default('user').describe('Role for unmapped addresses'),
});

// ============================================================================
// Audit
// ============================================================================

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false).describe('Enable the in-memory audit trail'),
  maxEntries: z
    .number()
    .int()
    .min(100)
    .max(1000000)
    .default(10000)
    .describe('Entries kept before the oldest is discarded'),
});

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;
export type RoleMapping = z.infer<typeof RoleMappingSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
