/**
 * Clients for the auth service and the resource service
 *
 * One attempt per call, bounded by `timeoutMs`. Transport failures and
 * unexpected upstream statuses raise {@link ServiceUnavailableError}; the
 * gateway routes decide what the browser sees.
 */

import { z } from 'zod';
import { SessionUserSchema, type SessionUser } from '../core/session-user.js';
import type { FetchLike } from '../core/types.js';
import { isRecord } from '../utils/guards.js';

export const DEFAULT_SERVICE_TIMEOUT_MS = 5000;

export class ServiceUnavailableError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}

export interface ServiceClientOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const LoginResponseSchema = z.object({ auth_url: z.string().url() });
const VerifyResponseSchema = z.object({ valid: z.literal(true), user: SessionUserSchema });
const RefreshResponseSchema = z.object({ token: z.string().min(1) });

// 400 and 401 are the auth service's answers about the token itself
function isRejection(response: Response): boolean {
  return response.status === 400 || response.status === 401;
}

abstract class ServiceClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    protected readonly service: string,
    private readonly baseUrl: string,
    options: ServiceClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SERVICE_TIMEOUT_MS;
  }

  protected async request(path: string, init: RequestInit = {}): Promise<Response> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}${path}`;

    try {
      return await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`[${this.service}] ${init.method ?? 'GET'} ${path} failed: ${message}`);
      throw new ServiceUnavailableError(this.service, `${this.service} unreachable: ${message}`);
    }
  }

  protected async readJson(response: Response, path: string): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch {
      throw new ServiceUnavailableError(
        this.service,
        `${this.service} returned a non-JSON body for ${path}`,
        response.status
      );
    }
  }
}

export class AuthServiceClient extends ServiceClient {
  constructor(baseUrl: string, options: ServiceClientOptions = {}) {
    super('AuthServiceClient', baseUrl, options);
  }

  /**
   * Ask the auth service to begin a login
   *
   * @returns Provider URL and any cookies the auth service set (state echo)
   * @throws {ServiceUnavailableError}
   */
  async beginLogin(): Promise<{ authUrl: string; setCookies: string[] }> {
    const response = await this.request('/auth/login');
    this.expectOk(response, '/auth/login');

    const parsed = LoginResponseSchema.safeParse(await this.readJson(response, '/auth/login'));
    if (!parsed.success) {
      throw new ServiceUnavailableError(this.service, '/auth/login returned no auth_url', response.status);
    }

    return { authUrl: parsed.data.auth_url, setCookies: response.headers.getSetCookie() };
  }

  /**
   * Verify a session token with the single signing authority
   *
   * @returns Verified user, or null when the auth service rejects the token
   * @throws {ServiceUnavailableError} when the auth service cannot answer
   */
  async verify(token: string): Promise<SessionUser | null> {
    const response = await this.postToken('/auth/verify', token);
    if (isRejection(response)) {
      return null;
    }
    this.expectOk(response, '/auth/verify');

    const body = await this.readJson(response, '/auth/verify');
    if (isRecord(body) && body.valid === false) {
      return null;
    }

    const parsed = VerifyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ServiceUnavailableError(this.service, '/auth/verify returned no user', response.status);
    }
    return parsed.data.user;
  }

  /**
   * @returns Replacement token, or null when the auth service rejects the token
   * @throws {ServiceUnavailableError} when the auth service cannot answer
   */
  async refresh(token: string): Promise<string | null> {
    const response = await this.postToken('/auth/refresh', token);
    if (isRejection(response)) {
      return null;
    }
    this.expectOk(response, '/auth/refresh');

    const parsed = RefreshResponseSchema.safeParse(await this.readJson(response, '/auth/refresh'));
    if (!parsed.success) {
      throw new ServiceUnavailableError(this.service, '/auth/refresh returned no token', response.status);
    }
    return parsed.data.token;
  }

  private expectOk(response: Response, path: string): void {
    if (!response.ok) {
      throw new ServiceUnavailableError(this.service, `${path} returned ${response.status}`, response.status);
    }
  }

  private postToken(path: string, token: string): Promise<Response> {
    return this.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({ token }),
    });
  }
}

export interface RelayedResponse {
  status: number;
  body: unknown;
}

export class ResourceServiceClient extends ServiceClient {
  constructor(baseUrl: string, options: ServiceClientOptions = {}) {
    super('ResourceServiceClient', baseUrl, options);
  }

  /**
   * GET a resource service path with the session token as bearer credential.
   * 2xx, 401 and 403 answers are returned as they are.
   *
   * @throws {ServiceUnavailableError} For any other outcome
   */
  async get(path: string, token: string): Promise<RelayedResponse> {
    const response = await this.request(path, {
      headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' },
    });

    if (!response.ok && response.status !== 401 && response.status !== 403) {
      throw new ServiceUnavailableError(this.service, `${path} returned ${response.status}`, response.status);
    }

    return { status: response.status, body: await this.readJson(response, path) };
  }
}
