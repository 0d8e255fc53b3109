/**
 * Identity Provider Configuration Schema
 *
 * OAuth client registration for the external OpenID Connect provider.
 */

import { z } from 'zod';

/**
 * HTTPS is required outside development/test
 */
const secureUrl = (label: string) =>
  z
    .string()
    .url()
    .refine(
      (url) => {
        const isDev = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
        return isDev || url.startsWith('https://');
      },
      { message: `${label} must use HTTPS (HTTP allowed in development/test)` }
    );

export const IdentityProviderConfigSchema = z.object({
  clientId: z.string().min(1).describe('Registered OAuth client identifier (id_token audience)'),
  clientSecret: z.string().min(1).describe('OAuth client secret'),
  authorizeEndpoint: secureUrl('Authorization endpoint').describe('Provider authorization URL'),
  tokenEndpoint: secureUrl('Token endpoint').describe('Provider token exchange URL'),
  jwksUri: secureUrl('JWKS URI').describe('Provider signing keys'),
  issuers: z.array(z.string().min(1)).min(1).describe('Accepted id_token issuers'),
  redirectUri: z.string().url().describe('Callback URI registered with the provider'),
  scopes: z.array(z.string().min(1)).min(1).default(['openid', 'email', 'profile']),
  extraAuthorizeParams: z
    .record(z.string())
    .default({ access_type: 'offline', prompt: 'consent' })
    .describe('Additional authorization request parameters'),
  clockToleranceSeconds: z
    .number()
    .min(0)
    .max(300)
    .default(60)
    .describe('id_token clock skew allowance (max 5 minutes)'),
  timeoutMs: z.number().int().min(100).max(60000).default(5000),
  allowStateCookieFallback: z
    .boolean()
    .default(false)
    .describe('Accept a signed httpOnly state cookie when the state store lost the record'),
});

export type IdentityProviderConfig = z.infer<typeof IdentityProviderConfigSchema>;
