import { ConnectionClosedError, ResponseTimeoutError } from '../errors.js';

/**
 * Result of a non-consuming probe of the connection.
 *
 * - readable: bytes are buffered and a read would return at once
 * - pending: connection open, nothing arrived within the poll window
 * - closed: the peer ended the stream or the socket failed
 */
export type PeekState = 'readable' | 'pending' | 'closed';

/**
 * Transport interface for instrument communication.
 *
 * Implementations:
 * - SocketTransport: Uses Node.js net.Socket for direct TCP
 */
export interface Transport {
  /**
   * Initialize the transport (open connection, configure socket, etc.)
   */
  init(): Promise<void>;

  /**
   * Write text to the remote end exactly as given (no terminator added)
   */
  write(data: string): Promise<void>;

  /**
   * Wait up to timeoutMs for one newline-terminated line and consume it.
   * The returned text still carries its terminator.
   */
  readLine(timeoutMs: number): Promise<string>;

  /**
   * Report whether a read would return data, hit end-of-stream, or block,
   * without consuming anything.
   */
  peek(pollMs: number): Promise<PeekState>;

  /**
   * Close the transport
   */
  close(): Promise<void>;

  /**
   * Check if transport is open/active
   */
  isOpen(): boolean;
}

/**
 * Base class holding the line buffer shared by every transport.
 *
 * Subclasses feed received text through receive() and report stream state
 * through markEnded() and markFailed(). Reads and peeks wake on any of them.
 */
export abstract class BaseTransport implements Transport {
  protected buffer: string = '';
  protected _isOpen: boolean = false;
  protected ended: boolean = false;
  protected failure: Error | null = null;
  private waiters = new Set<() => void>();

  abstract init(): Promise<void>;
  abstract write(data: string): Promise<void>;
  abstract close(): Promise<void>;

  async readLine(timeoutMs: number): Promise<string> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const newline = this.buffer.indexOf('\n');
      if (newline !== -1) {
        const line = this.buffer.slice(0, newline + 1);
        this.buffer = this.buffer.slice(newline + 1);
        return line;
      }

      if (this.ended || this.failure) {
        // A partial line left behind by a closing peer is still a line
        if (this.buffer.length > 0) {
          const rest = this.buffer;
          this.buffer = '';
          return rest;
        }
        if (this.failure) {
          throw this.failure;
        }
        throw new ConnectionClosedError();
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ResponseTimeoutError(timeoutMs);
      }

      await this.waitForActivity(remaining);
    }
  }

  async peek(pollMs: number): Promise<PeekState> {
    let state = this.peekState();
    if (state === 'pending' && pollMs > 0) {
      await this.waitForActivity(pollMs);
      state = this.peekState();
    }
    return state;
  }

  isOpen(): boolean {
    return this._isOpen;
  }

  protected receive(text: string): void {
    this.buffer += text;
    this.notify();
  }

  protected markEnded(): void {
    this._isOpen = false;
    this.ended = true;
    this.notify();
  }

  protected markFailed(error: Error): void {
    this._isOpen = false;
    this.failure = error;
    this.notify();
  }

  protected delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private peekState(): PeekState {
    if (this.buffer.length > 0) {
      return 'readable';
    }
    if (this.ended || this.failure) {
      return 'closed';
    }
    return 'pending';
  }

  /**
   * Resolve on the next receive/end/failure, or after ms, whichever is first.
   */
  private waitForActivity(ms: number): Promise<void> {
    return new Promise(resolve => {
      const wake = () => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.waiters.add(wake);
    });
  }

  private notify(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }
}
