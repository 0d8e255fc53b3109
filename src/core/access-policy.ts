/**
 * Access Policy
 *
 * Pure role check for protected operations:
 * - 'authenticated': any verified token suffices
 * - 'admin': the claims must carry the admin role
 *
 * Role values other than 'user' and 'admin' are reserved; they never grant
 * admin rights.
 */

import { ROLE_ADMIN } from './types.js';
import type { AccessDecision, Identity, RequiredRole } from './types.js';

export function authorize(claims: Identity, requiredRole: RequiredRole): boolean {
  if (requiredRole === 'authenticated') {
    return true;
  }

  return claims.role === ROLE_ADMIN;
}

export function decide(claims: Identity, requiredRole: RequiredRole): AccessDecision {
  return {
    subjectClaims: claims,
    requiredRole,
    allowed: authorize(claims, requiredRole),
  };
}
