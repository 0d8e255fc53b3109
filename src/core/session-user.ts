/**
 * Wire form of verified session claims, as returned by the auth service's
 * verification endpoint and held by the gateway session.
 */

import { z } from 'zod';
import type { SessionClaims } from './types.js';

export const SessionUserSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  name: z.string(),
  role: z.string().min(1),
  picture: z.string().default(''),
});

export type SessionUser = z.infer<typeof SessionUserSchema>;

export function toSessionUser(claims: SessionClaims): SessionUser {
  return {
    sub: claims.subjectId,
    email: claims.email,
    name: claims.displayName,
    role: claims.role,
    picture: claims.avatarUrl ?? '',
  };
}
