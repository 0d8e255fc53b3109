/**
 * Identity Exchange - Authorization Code Flow Against the Identity Provider
 *
 * Flow:
 * 1. begin(): issue a state token, build the provider authorization URL
 * 2. User authenticates at the provider
 * 3. Provider redirects to the callback with `code` and `state`
 * 4. complete(): check the code is present, consume the state, exchange the
 *    code, verify the id_token, derive the role
 * 5. login(): complete() followed by session token issuance
 *
 * Phases: INITIATED → CALLBACK_RECEIVED → STATE_VALIDATED → CODE_EXCHANGED →
 * IDENTITY_VERIFIED → [TOKEN_ISSUED], or [REJECTED(reason)] from any phase.
 *
 * Rejections carry a reason code only. Provider error bodies and exception
 * messages stay in the server log.
 *
 * Authorization codes are single-use at the provider. A repeated callback with
 * a code that already succeeded fails there and comes back as
 * `exchange_failed`; nothing is cached.
 */

import type { AuditService } from '../core/audit-service.js';
import type { RoleMapper } from '../core/role-mapper.js';
import type { StateStore } from '../core/state-store.js';
import type { TokenCodec } from '../core/token-codec.js';
import type { Identity } from '../core/types.js';
import { IdTokenVerificationError, type IdTokenVerifier } from './id-token-verifier.js';
import { ProviderExchangeError, type ProviderClient } from './provider-client.js';
import type {
  CallbackParams,
  CompletionResult,
  IdentityProviderSettings,
  LoginPhase,
  LoginResult,
  RejectReason,
  Rejection,
  StateEcho,
} from './types.js';

export interface IdentityExchangeDeps {
  settings: IdentityProviderSettings;
  stateStore: StateStore;
  providerClient: ProviderClient;
  idTokenVerifier: IdTokenVerifier;
  roleMapper: RoleMapper;
  tokenCodec: TokenCodec;
  auditService?: AuditService;
}

export interface BeginResult {
  authUrl: string;
  state: string;
  /** Creation time of the login attempt (epoch milliseconds) */
  issuedAt: number;
}

export class IdentityExchange {
  constructor(private readonly deps: IdentityExchangeDeps) {}

  /**
   * Start a login attempt
   */
  async begin(): Promise<BeginResult> {
    const { stateToken: state, createdAt } = await this.deps.stateStore.issueAttempt();
    const { settings } = this.deps;

    const params = new URLSearchParams({
      response_type: 'code',
      client_id: settings.clientId,
      redirect_uri: settings.redirectUri,
      scope: settings.scopes.join(' '),
      state,
      ...settings.extraAuthorizeParams,
    });

    this.transition('INITIATED');
    this.audit('login_initiated', true);

    return {
      authUrl: `${settings.authorizeEndpoint}?${params.toString()}`,
      state,
      issuedAt: createdAt,
    };
  }

  /**
   * Resume a login attempt from the provider callback
   */
  async complete(params: CallbackParams): Promise<CompletionResult> {
    this.transition('CALLBACK_RECEIVED');

    try {
      if (!params.code) {
        return this.reject('missing_code');
      }

      if (!(await this.validateState(params.state, params.stateEcho))) {
        return this.reject('state_mismatch');
      }
      this.transition('STATE_VALIDATED');

      let idToken: string;
      try {
        ({ idToken } = await this.deps.providerClient.exchangeCode(params.code));
      } catch (error) {
        if (error instanceof ProviderExchangeError) {
          return this.reject('exchange_failed', error);
        }
        throw error;
      }
      this.transition('CODE_EXCHANGED');

      let identity: Identity;
      try {
        const assertion = await this.deps.idTokenVerifier.verify(idToken);
        identity = {
          subjectId: assertion.subject,
          email: assertion.email,
          displayName: assertion.name ?? assertion.email,
          ...(assertion.picture ? { avatarUrl: assertion.picture } : {}),
          role: this.deps.roleMapper.roleFor(assertion.email),
        };
      } catch (error) {
        if (error instanceof IdTokenVerificationError) {
          return this.reject('invalid_identity', error);
        }
        throw error;
      }
      this.transition('IDENTITY_VERIFIED', identity.email);

      return { ok: true, identity };
    } catch (error) {
      return this.reject('internal_error', error);
    }
  }

  /**
   * complete() followed by session token issuance
   */
  async login(params: CallbackParams): Promise<LoginResult> {
    const result = await this.complete(params);
    if (!result.ok) {
      return result;
    }

    try {
      const token = await this.deps.tokenCodec.issue(result.identity);
      this.transition('TOKEN_ISSUED', result.identity.email);
      this.audit('login_complete', true, undefined, result.identity.subjectId);
      return { ok: true, identity: result.identity, token };
    } catch (error) {
      return this.reject('internal_error', error);
    }
  }

  /**
   * The store is authoritative. The signed echo is consulted only when the
   * store has no record at all (e.g. after a restart), never for consumed or
   * expired records, and the attempt is then recorded as consumed.
   */
  private async validateState(state: string | undefined, echo: StateEcho | undefined): Promise<boolean> {
    if (!state) {
      return false;
    }

    const outcome = await this.deps.stateStore.consumeWithOutcome(state);
    if (outcome === 'accepted') {
      return true;
    }

    if (outcome !== 'not_found' || !this.deps.settings.allowStateCookieFallback || !echo) {
      return false;
    }

    if (echo.state !== state || !this.deps.stateStore.isWithinWindow(echo.issuedAt)) {
      return false;
    }

    const restored = await this.deps.stateStore.restoreConsumed(state, echo.issuedAt);
    if (restored) {
      console.warn('[IdentityExchange] State accepted through signed cookie fallback');
      this.audit('state_cookie_fallback', true);
    }
    return restored;
  }

  private reject(reason: RejectReason, error?: unknown): Rejection {
    const detail = error instanceof Error ? error.message : undefined;
    console.log(`[IdentityExchange] REJECTED(${reason})${detail ? `: ${detail}` : ''}`);
    this.audit('login_rejected', false, reason, undefined, detail);
    return { ok: false, reason };
  }

  private transition(phase: LoginPhase, subject?: string): void {
    console.log(`[IdentityExchange] ${phase}${subject ? ` (${subject})` : ''}`);
  }

  private audit(
    action: string,
    success: boolean,
    reason?: RejectReason,
    userId?: string,
    error?: string
  ): void {
    this.deps.auditService?.record({
      source: 'auth:identity-exchange',
      action,
      success,
      reason,
      userId,
      error,
    });
  }
}
