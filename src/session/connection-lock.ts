/**
 * Connection Lock - mutual exclusion around the shared transport.
 *
 * The exchange path and the liveness monitor both need the socket. Whoever
 * holds the lock is the only one reading, peeking or writing; waiters are
 * served in arrival order.
 */

/** Maximum time to hold the lock before warning (30 seconds). */
export const LOCK_HOLD_WARNING_MS = 30000;

/**
 * A lock handle that must be released after use.
 */
export interface ConnectionLockHandle {
  holder: string;
  acquiredAt: number;
  release: () => void;
}

export interface ConnectionLockOptions {
  /** Warn when a holder keeps the lock longer than this (default: 30000ms). */
  holdWarningMs?: number;
  /** Receives the long-hold warning (default: console.warn). */
  warn?: (message: string) => void;
}

/**
 * FIFO mutex for a single resource.
 *
 * Usage:
 * ```typescript
 * const lock = new ConnectionLock();
 * const response = await lock.runExclusive('exchange', async () => {
 *   await transport.write('*IDN?\n');
 *   return transport.readLine(5000);
 * });
 * ```
 */
export class ConnectionLock {
  private current: { holder: string; acquiredAt: number } | null = null;
  private queue: Array<{ holder: string; grant: (handle: ConnectionLockHandle) => void }> = [];
  private readonly holdWarningMs: number;
  private readonly warn: (message: string) => void;

  constructor(options: ConnectionLockOptions = {}) {
    this.holdWarningMs =
      typeof options.holdWarningMs === 'number' && options.holdWarningMs > 0
        ? options.holdWarningMs
        : LOCK_HOLD_WARNING_MS;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  get warningThresholdMs(): number {
    return this.holdWarningMs;
  }

  /**
   * Wait for the lock. The returned handle must be released exactly once.
   */
  acquire(holder: string): Promise<ConnectionLockHandle> {
    if (!this.current) {
      return Promise.resolve(this.grant(holder));
    }

    return new Promise((resolve) => {
      this.queue.push({ holder, grant: resolve });
    });
  }

  /**
   * Run fn while holding the lock, releasing it however fn settles.
   */
  async runExclusive<T>(holder: string, fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquire(holder);
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  isLocked(): boolean {
    return this.current !== null;
  }

  get holder(): string | null {
    return this.current?.holder ?? null;
  }

  get waiting(): number {
    return this.queue.length;
  }

  private grant(holder: string): ConnectionLockHandle {
    const state = { holder, acquiredAt: Date.now() };
    this.current = state;

    const warningTimer = setTimeout(() => {
      this.warn(`[ConnectionLock] Lock held > ${this.holdWarningMs}ms by ${holder}`);
    }, this.holdWarningMs);
    warningTimer.unref();

    let released = false;
    return {
      holder,
      acquiredAt: state.acquiredAt,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        clearTimeout(warningTimer);
        this.release(state);
      },
    };
  }

  private release(state: { holder: string; acquiredAt: number }): void {
    if (this.current !== state) {
      return;
    }
    this.current = null;

    const next = this.queue.shift();
    if (next) {
      next.grant(this.grant(next.holder));
    }
  }
}
