/**
 * Identity Provider Client - Authorization Code Exchange
 *
 * Exchanges a single-use authorization code at the provider's token endpoint.
 * One attempt per call with a bounded timeout; the end user drives retries.
 */

import { isRecord } from '../utils/guards.js';
import type { FetchLike, IdentityProviderSettings, ProviderTokens } from './types.js';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 5000;

/**
 * Raised for transport failures, non-success responses and unusable token
 * responses. The message may contain provider detail and is for logs only.
 */
export class ProviderExchangeError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderExchangeError';
  }
}

export class ProviderClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly settings: IdentityProviderSettings,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Exchange an authorization code for provider tokens
   *
   * @throws {ProviderExchangeError} On any failure
   */
  async exchangeCode(code: string): Promise<ProviderTokens> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      redirect_uri: this.settings.redirectUri,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.settings.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.settings.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS),
      });
    } catch (error) {
      throw new ProviderExchangeError(
        `Token endpoint unreachable: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new ProviderExchangeError(
        `Token exchange failed: ${response.status} ${response.statusText} - ${errorText}`,
        response.status
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new ProviderExchangeError('Token response is not valid JSON', response.status);
    }

    if (!isRecord(data) || typeof data.id_token !== 'string' || data.id_token.length === 0) {
      throw new ProviderExchangeError('Token response has no id_token', response.status);
    }

    return {
      idToken: data.id_token,
      accessToken: typeof data.access_token === 'string' ? data.access_token : undefined,
      expiresIn: typeof data.expires_in === 'number' ? data.expires_in : undefined,
    };
  }
}

