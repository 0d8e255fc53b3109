/**
 * Identity provider types
 *
 * Architecture: Core → OAuth → Services
 * The OAuth layer may import from Core, never from the service layers.
 */

import type { Identity } from '../core/types.js';

/**
 * Registered OAuth client settings for the external identity provider
 */
export interface IdentityProviderSettings {
  clientId: string;
  clientSecret: string;
  authorizeEndpoint: string;
  tokenEndpoint: string;
  jwksUri: string;
  /** Accepted `iss` values of the id_token */
  issuers: string[];
  /** Callback URI registered with the provider */
  redirectUri: string;
  scopes: string[];
  /** Extra authorization request parameters (e.g. access_type, prompt) */
  extraAuthorizeParams?: Record<string, string>;
  /** id_token clock skew allowance in seconds (default: 60) */
  clockToleranceSeconds?: number;
  /** Timeout for provider calls in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Accept a signed, httpOnly cookie echo of the state when the store lost the record */
  allowStateCookieFallback?: boolean;
}

/**
 * Tokens returned by the provider's token endpoint
 */
export interface ProviderTokens {
  idToken: string;
  accessToken?: string;
  expiresIn?: number;
}

/**
 * Identity assertion after id_token verification
 */
export interface IdentityAssertion {
  subject: string;
  email: string;
  name?: string;
  picture?: string;
}

/**
 * Why a login attempt was rejected
 */
export type RejectReason =
  | 'state_mismatch'
  | 'missing_code'
  | 'exchange_failed'
  | 'invalid_identity'
  | 'internal_error';

/**
 * Login attempt phases; TOKEN_ISSUED and REJECTED are terminal
 */
export type LoginPhase =
  | 'INITIATED'
  | 'CALLBACK_RECEIVED'
  | 'STATE_VALIDATED'
  | 'CODE_EXCHANGED'
  | 'IDENTITY_VERIFIED'
  | 'TOKEN_ISSUED'
  | 'REJECTED';

/**
 * Server-set, signature-checked copy of the issued state
 */
export interface StateEcho {
  state: string;
  /** Issue time (epoch milliseconds) */
  issuedAt: number;
}

export interface CallbackParams {
  state?: string;
  code?: string;
  /** Only pass an echo whose integrity the transport has already checked */
  stateEcho?: StateEcho;
}

export interface Rejection {
  ok: false;
  reason: RejectReason;
}

export type CompletionResult = { ok: true; identity: Identity } | Rejection;

export type LoginResult = { ok: true; identity: Identity; token: string } | Rejection;

export type { FetchLike } from '../core/types.js';
