/**
 * Gateway Session Store
 *
 * Server-side sessions referenced by a random id in a signed cookie. A
 * session holds the serialized session token and the user it was last
 * verified for; it never holds signing material.
 *
 * Sessions idle for longer than `maxIdleMs` are swept lazily on create().
 */

import crypto from 'crypto';
import { systemClock, type Clock } from '../core/clock.js';
import type { SessionUser } from '../core/session-user.js';

export interface GatewaySession {
  sessionId: string;
  token: string;
  user: SessionUser;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds of the last successful verification */
  lastSeenAt: number;
}

export interface SessionStoreOptions {
  clock?: Clock;
  /** Idle lifetime in milliseconds (default: 8 hours) */
  maxIdleMs?: number;
}

export const DEFAULT_SESSION_IDLE_MS = 8 * 60 * 60 * 1000;

export class SessionStore {
  private readonly sessions = new Map<string, GatewaySession>();
  private readonly clock: Clock;
  private readonly maxIdleMs: number;

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxIdleMs = options.maxIdleMs ?? DEFAULT_SESSION_IDLE_MS;
  }

  create(token: string, user: SessionUser): GatewaySession {
    this.sweep();

    const now = this.clock.now();
    const session: GatewaySession = {
      sessionId: crypto.randomBytes(32).toString('hex'),
      token,
      user,
      createdAt: now,
      lastSeenAt: now,
    };

    this.sessions.set(session.sessionId, session);
    return { ...session };
  }

  get(sessionId: string): GatewaySession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }

    if (this.isIdle(session)) {
      this.sessions.delete(sessionId);
      return undefined;
    }

    return { ...session };
  }

  /**
   * Record a successful verification, optionally replacing the token
   */
  touch(sessionId: string, update: { token?: string; user?: SessionUser } = {}): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }

    this.sessions.set(sessionId, {
      ...session,
      token: update.token ?? session.token,
      user: update.user ?? session.user,
      lastSeenAt: this.clock.now(),
    });
  }

  destroy(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  sweep(): number {
    let removed = 0;
    for (const session of this.sessions.values()) {
      if (this.isIdle(session)) {
        this.sessions.delete(session.sessionId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }

  private isIdle(session: GatewaySession): boolean {
    return this.clock.now() - session.lastSeenAt > this.maxIdleMs;
  }
}
