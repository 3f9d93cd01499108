import { getLogger, type Logger } from '@steady/logger';

import type { HttpEffects } from './core/types.js';

/**
 * Creates and disposes the per-host transport (an undici Agent in production)
 */
export interface TransportFactory<T> {
  close(transport: T): Promise<void>;
  create(hostKey: string): T;
}

export interface SessionLease<T> {
  readonly hostKey: string;
  readonly transport: T;
  /** Safe to call more than once */
  release(): Promise<void>;
}

export interface SessionPoolOptions {
  maxSessions: number;
}

interface SessionEntry<T> {
  activeLeases: number;
  hostKey: string;
  lastUsedAt: number;
  /** Evicted while leased; closed when the last lease is released */
  retired: boolean;
  transport: T;
}

/**
 * Bounded LRU of transports keyed by scheme://host[:port].
 * Map insertion order is the recency order: a hit is deleted and re-inserted.
 */
export class SessionPool<T> {
  private readonly entries = new Map<string, SessionEntry<T>>();
  private readonly logger: Logger;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private readonly retired = new Set<SessionEntry<T>>();

  private closePromise: Promise<void> | undefined;
  private isClosed = false;

  constructor(
    private readonly factory: TransportFactory<T>,
    options: SessionPoolOptions,
    effects: Partial<Pick<HttpEffects, 'now'>> = {}
  ) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions < 1) {
      throw new Error(`Invalid session pool configuration: maxSessions must be a positive integer, got ${options.maxSessions}`);
    }
    this.maxSessions = options.maxSessions;
    this.now = effects.now ?? (() => Date.now());
    this.logger = getLogger('SessionPool');
  }

  get closed(): boolean {
    return this.isClosed || this.closePromise !== undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  has(hostKey: string): boolean {
    return this.entries.has(hostKey);
  }

  /**
   * Host keys from least to most recently used
   */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  async lease(hostKey: string): Promise<SessionLease<T>> {
    if (this.closed) {
      throw new Error('Session pool is closed');
    }

    let entry = this.entries.get(hostKey);
    let evicted: SessionEntry<T> | undefined;

    if (entry) {
      this.entries.delete(hostKey);
    } else {
      entry = {
        activeLeases: 0,
        hostKey,
        lastUsedAt: this.now(),
        retired: false,
        transport: this.factory.create(hostKey),
      };
      if (this.entries.size >= this.maxSessions) {
        evicted = this.evictLeastRecentlyUsed();
      }
      this.logger.debug({ hostKey, size: this.entries.size + 1 }, 'Created session');
    }

    entry.activeLeases += 1;
    entry.lastUsedAt = this.now();
    this.entries.set(hostKey, entry);

    const lease = this.createLease(entry);

    if (evicted && evicted.activeLeases === 0) {
      await this.closeEntry(evicted);
    }

    return lease;
  }

  /**
   * Close every transport, including retired ones still out on lease.
   * Idempotent: later calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      const all = [...this.entries.values(), ...this.retired];
      this.entries.clear();
      this.retired.clear();

      this.logger.debug({ sessions: all.length }, 'Closing session pool');
      await Promise.all(all.map((entry) => this.closeEntry(entry)));
      this.isClosed = true;
    })();

    return this.closePromise;
  }

  private evictLeastRecentlyUsed(): SessionEntry<T> | undefined {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return undefined;
    }

    const entry = this.entries.get(oldest.value);
    this.entries.delete(oldest.value);
    if (!entry) {
      return undefined;
    }

    this.logger.debug({ activeLeases: entry.activeLeases, hostKey: entry.hostKey }, 'Evicted session');
    if (entry.activeLeases > 0) {
      entry.retired = true;
      this.retired.add(entry);
    }
    return entry;
  }

  private createLease(entry: SessionEntry<T>): SessionLease<T> {
    let released = false;

    return {
      hostKey: entry.hostKey,
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        entry.activeLeases -= 1;

        if (entry.retired && entry.activeLeases === 0 && this.retired.delete(entry)) {
          await this.closeEntry(entry);
        }
      },
      transport: entry.transport,
    };
  }

  private async closeEntry(entry: SessionEntry<T>): Promise<void> {
    try {
      await this.factory.close(entry.transport);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error({ hostKey: entry.hostKey }, `Failed to close session: ${errorMessage}`);
    }
  }
}
