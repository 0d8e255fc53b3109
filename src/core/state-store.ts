/**
 * State Store - Anti-Replay State for In-Flight Logins
 *
 * Issues opaque, single-use state tokens that correlate a login initiation
 * with its callback. A token is accepted at most once, and only within the
 * validity window (10 minutes by default) of its creation.
 *
 * Storage is pluggable through {@link StateStorage}: the default keeps
 * attempts in a process-local Map; a multi-instance deployment supplies a
 * shared backend instead. Every StateStore operation runs under a
 * serializing lock, so consume() stays atomic for asynchronous backends too.
 *
 * Expired attempts are swept lazily on issue(); there is no background timer.
 */

import crypto from 'crypto';
import type { AuditService } from './audit-service.js';
import { systemClock, type Clock } from './clock.js';
import type { LoginAttempt } from './types.js';

export const DEFAULT_STATE_TTL_MS = 10 * 60 * 1000;

// ============================================================================
// Storage
// ============================================================================

/**
 * Backing store for login attempts
 */
export interface StateStorage {
  get(stateToken: string): Promise<LoginAttempt | undefined> | LoginAttempt | undefined;

  /**
   * Store (or overwrite) an attempt. `ttlMs` is a hint for backends with
   * native expiry; the StateStore enforces the window itself regardless.
   */
  put(attempt: LoginAttempt, ttlMs: number): Promise<void> | void;

  delete(stateToken: string): Promise<void> | void;

  list(): Promise<LoginAttempt[]> | LoginAttempt[];
}

/**
 * Process-local storage for single-instance deployments
 */
export class InMemoryStateStorage implements StateStorage {
  private readonly attempts = new Map<string, LoginAttempt>();

  get(stateToken: string): LoginAttempt | undefined {
    const attempt = this.attempts.get(stateToken);
    return attempt ? { ...attempt } : undefined;
  }

  put(attempt: LoginAttempt): void {
    this.attempts.set(attempt.stateToken, { ...attempt });
  }

  delete(stateToken: string): void {
    this.attempts.delete(stateToken);
  }

  list(): LoginAttempt[] {
    return [...this.attempts.values()].map((attempt) => ({ ...attempt }));
  }
}

// ============================================================================
// State Store
// ============================================================================

export interface StateStoreOptions {
  storage?: StateStorage;
  clock?: Clock;
  /** Validity window in milliseconds (default: 10 minutes) */
  ttlMs?: number;
  auditService?: AuditService;
}

/**
 * Internal classification of a consume() call. Only logged; callers of
 * consume() see a boolean.
 */
export type ConsumeOutcome = 'accepted' | 'not_found' | 'already_consumed' | 'expired';

export class StateStore {
  private readonly storage: StateStorage;
  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly auditService?: AuditService;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: StateStoreOptions = {}) {
    this.storage = options.storage ?? new InMemoryStateStorage();
    this.clock = options.clock ?? systemClock;
    this.ttlMs = options.ttlMs ?? DEFAULT_STATE_TTL_MS;
    this.auditService = options.auditService;
  }

  /**
   * Issue a new state token (64 hex characters, 256 bits of entropy)
   */
  async issue(): Promise<string> {
    return (await this.issueAttempt()).stateToken;
  }

  /**
   * issue() returning the whole recorded attempt
   */
  async issueAttempt(): Promise<LoginAttempt> {
    return this.exclusive(async () => {
      await this.sweepUnlocked();

      const attempt: LoginAttempt = {
        stateToken: crypto.randomBytes(32).toString('hex'),
        createdAt: this.clock.now(),
        consumed: false,
      };
      await this.storage.put(attempt, this.ttlMs);

      return { ...attempt };
    });
  }

  /**
   * Consume a state token. True exactly once per issued token, within the
   * validity window; false for unknown, reused and expired tokens alike.
   */
  async consume(stateToken: string): Promise<boolean> {
    return (await this.consumeWithOutcome(stateToken)) === 'accepted';
  }

  /**
   * consume() with the rejection category exposed, for server-side
   * diagnostics and the signed-cookie fallback (which is only allowed for
   * records this store no longer has).
   */
  async consumeWithOutcome(stateToken: string): Promise<ConsumeOutcome> {
    const outcome = await this.exclusive(async (): Promise<ConsumeOutcome> => {
      if (!stateToken) {
        return 'not_found';
      }

      const attempt = await this.storage.get(stateToken);
      if (!attempt) {
        return 'not_found';
      }

      if (attempt.consumed) {
        return 'already_consumed';
      }

      if (this.isExpired(attempt)) {
        await this.storage.delete(stateToken);
        return 'expired';
      }

      await this.storage.put({ ...attempt, consumed: true }, this.remainingTtl(attempt));
      return 'accepted';
    });

    if (outcome !== 'accepted') {
      console.log(`[StateStore] State rejected: ${outcome}`);
    }

    this.auditService?.record({
      source: 'auth:state-store',
      action: 'state_consume',
      success: outcome === 'accepted',
      reason: outcome,
    });

    return outcome;
  }

  /**
   * Record an attempt, validated elsewhere, as already consumed. Returns false
   * if the store already knows the token.
   */
  async restoreConsumed(stateToken: string, createdAt: number): Promise<boolean> {
    return this.exclusive(async () => {
      if (await this.storage.get(stateToken)) {
        return false;
      }

      const attempt: LoginAttempt = { stateToken, createdAt, consumed: true };
      await this.storage.put(attempt, this.remainingTtl(attempt));
      return true;
    });
  }

  /**
   * Remove attempts past the validity window. Idempotent.
   *
   * @returns Number of attempts removed
   */
  async sweep(): Promise<number> {
    return this.exclusive(() => this.sweepUnlocked());
  }

  /**
   * Whether a creation time is still inside the validity window
   */
  isWithinWindow(createdAt: number): boolean {
    return this.clock.now() - createdAt <= this.ttlMs;
  }

  async getMetrics(): Promise<{ activeAttempts: number; oldestAttemptAge: number }> {
    return this.exclusive(async () => {
      const now = this.clock.now();
      const attempts = await this.storage.list();
      const oldest = attempts.reduce((age, attempt) => Math.max(age, now - attempt.createdAt), 0);

      return {
        activeAttempts: attempts.length,
        oldestAttemptAge: Math.floor(oldest / 1000),
      };
    });
  }

  private async sweepUnlocked(): Promise<number> {
    let removed = 0;

    for (const attempt of await this.storage.list()) {
      if (this.isExpired(attempt)) {
        await this.storage.delete(attempt.stateToken);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[StateStore] Swept ${removed} expired login attempt(s)`);
    }

    return removed;
  }

  private isExpired(attempt: LoginAttempt): boolean {
    return !this.isWithinWindow(attempt.createdAt);
  }

  private remainingTtl(attempt: LoginAttempt): number {
    return Math.max(0, attempt.createdAt + this.ttlMs - this.clock.now());
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The chain must survive a failed task; the failure still reaches the caller through `run`
    this.queue = run.catch(() => undefined);
    return run;
  }
}
