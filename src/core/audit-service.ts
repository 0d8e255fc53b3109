/**
 * Audit Service - Security Event Trail with Null Object Pattern
 *
 * Records login, token and access events. Disabled by default: an
 * unconfigured AuditService accepts entries and drops them, so callers never
 * need a null check.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default storage (default: 10000) */
  maxEntries?: number;

  /** Invoked with every retained entry when the default storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Write-only storage for audit entries. Querying belongs to whatever indexed
 * store a deployment plugs in here.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      // Hand over everything before the oldest entry is discarded
      if (this.onOverflow) {
        this.onOverflow([...this.entries]);
      }
      this.entries.shift();
    }
  }

  /**
   * @internal test access only
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal test access only
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

/**
 * Centralized audit logging service
 *
 * ```typescript
 * const audit = new AuditService({ enabled: true });
 * await audit.log({
 *   timestamp: new Date(),
 *   source: 'auth:identity-exchange',
 *   action: 'login_complete',
 *   success: false,
 *   reason: 'state_mismatch',
 * });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Log an audit entry
   *
   * @throws {Error} If the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log(entry);
  }

  /**
   * Fire-and-forget variant for request paths. Storage failures are reported
   * on the console and never reach the caller.
   */
  record(entry: Omit<AuditEntry, 'timestamp'>): void {
    this.log({ timestamp: new Date(), ...entry }).catch((error: unknown) => {
      console.error(
        '[AuditService] Failed to write audit entry:',
        error instanceof Error ? error.message : error
      );
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal test access only
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

export { InMemoryAuditStorage };
