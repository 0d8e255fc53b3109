/**
 * Core Types
 *
 * Shared type definitions for the protocol core (state store, token codec,
 * role mapping, access policy).
 *
 * Architectural Rule: Core → OAuth → Services
 * Files in src/core/ MUST NOT import from src/oauth/ or the service layers.
 */

// ============================================================================
// Role Constants
// ============================================================================

export const ROLE_ADMIN = 'admin';
export const ROLE_USER = 'user';

/**
 * Known roles. Tokens may carry other values (reserved for future roles);
 * those are never treated as admin.
 */
export type Role = typeof ROLE_ADMIN | typeof ROLE_USER;

/**
 * Role requirement attached to a protected operation
 */
export type RequiredRole = 'authenticated' | 'admin';

// ============================================================================
// Identity & Session Claims
// ============================================================================

/**
 * Verified identity produced by the identity exchange (never persisted)
 */
export interface Identity {
  subjectId: string;
  email: string;
  displayName: string;
  avatarUrl?: string;
  /** Role string as carried in the token; see {@link Role} for known values */
  role: string;
}

/**
 * Claims of a verified session token
 */
export interface SessionClaims extends Identity {
  /** Issue time (epoch milliseconds) */
  issuedAt: number;
  /** Expiry time (epoch milliseconds) */
  expiresAt: number;
}

/**
 * Outcome of TokenCodec.verify(). Deliberately carries no failure reason.
 */
export type TokenVerification =
  | { valid: true; claims: SessionClaims }
  | { valid: false };

/**
 * Per-request authorization outcome (never stored)
 */
export interface AccessDecision {
  subjectClaims: Identity;
  requiredRole: RequiredRole;
  allowed: boolean;
}

// ============================================================================
// Login Attempts
// ============================================================================

/**
 * In-flight login attempt tracked by the StateStore
 */
export interface LoginAttempt {
  stateToken: string;
  /** Creation time (epoch milliseconds) */
  createdAt: number;
  consumed: boolean;
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field (e.g. 'auth:state-store',
 * 'auth:identity-exchange', 'resource:guard').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Subject associated with the event (if known) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Reason code for the result */
  reason?: string;

  /** Error message if the action failed (never sent to clients) */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

/**
 * Outbound HTTP transport (global fetch by default; replaced in tests)
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
