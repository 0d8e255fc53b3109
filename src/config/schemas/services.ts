/**
 * Service Topology Schema
 *
 * Where the gateway, auth service and resource service live, and the bound
 * on calls between them.
 */

import { z } from 'zod';

const port = z.number().int().min(1).max(65535);

export const ServicesConfigSchema = z.object({
  frontendUrl: z.string().url().describe('Public gateway URL (login redirects land here)'),
  authServiceUrl: z.string().url().describe('Auth service base URL'),
  resourceServiceUrl: z.string().url().describe('Resource service base URL'),
  gatewayPort: port.default(3000),
  authServicePort: port.default(5001),
  resourceServicePort: port.default(5002),
  requestTimeoutMs: z
    .number()
    .int()
    .min(100)
    .max(60000)
    .default(5000)
    .describe('Timeout for calls between services'),
});

export type ServicesConfig = z.infer<typeof ServicesConfigSchema>;
