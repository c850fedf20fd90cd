import type { Transport } from '../transport/transport.js';
import { ConnectionLock, LOCK_HOLD_WARNING_MS, type ConnectionLockOptions } from './connection-lock.js';

/** Slack on top of the response deadline before a held lock looks stuck */
export const LOCK_HOLD_MARGIN_MS = 5000;

export interface SharedConnectionOptions extends ConnectionLockOptions {
  /**
   * Query response deadline. An exchange may hold the lock that long, so the
   * hold warning moves past it unless holdWarningMs is given.
   */
  responseTimeoutMs?: number;
}

export function holdWarningFor(responseTimeoutMs: number): number {
  return Math.max(LOCK_HOLD_WARNING_MS, responseTimeoutMs + LOCK_HOLD_MARGIN_MS);
}

/**
 * The one transport of a session together with the lock that serializes it.
 *
 * Code outside this class reaches the transport only through withTransport(),
 * so a peek can never land between a command write and its response read.
 */
export class SharedConnection {
  readonly lock: ConnectionLock;

  constructor(private readonly transport: Transport, options: SharedConnectionOptions = {}) {
    const { responseTimeoutMs, ...lockOptions } = options;
    this.lock = new ConnectionLock({
      ...lockOptions,
      holdWarningMs:
        lockOptions.holdWarningMs ?? (responseTimeoutMs === undefined ? undefined : holdWarningFor(responseTimeoutMs)),
    });
  }

  withTransport<T>(holder: string, fn: (transport: Transport) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(holder, () => fn(this.transport));
  }

  isOpen(): boolean {
    return this.transport.isOpen();
  }

  close(): Promise<void> {
    return this.withTransport('close', (transport) => transport.close());
  }
}
