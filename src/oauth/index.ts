export { IdentityExchange, type IdentityExchangeDeps, type BeginResult } from './identity-exchange.js';
export { ProviderClient, ProviderExchangeError, DEFAULT_PROVIDER_TIMEOUT_MS } from './provider-client.js';
export {
  IdTokenVerifier,
  IdTokenVerificationError,
  DEFAULT_CLOCK_TOLERANCE_SECONDS,
  type IdTokenVerifierOptions,
} from './id-token-verifier.js';
export type {
  IdentityProviderSettings,
  ProviderTokens,
  IdentityAssertion,
  RejectReason,
  LoginPhase,
  StateEcho,
  CallbackParams,
  CompletionResult,
  LoginResult,
  Rejection,
} from './types.js';
