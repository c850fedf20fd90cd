/**
 * Session loop: take a command, exchange it, print the reply, repeat.
 *
 * Batch sessions walk a fixed list of commands. Interactive sessions pull
 * lines from a CommandSource until it runs dry, with a LivenessMonitor
 * watching the socket in the background.
 *
 * States:
 *   connecting -> ready <-> exchanging
 *   ready -> terminated            (input ended, batch done)
 *   ready|exchanging -> terminated (connection lost, fatal error)
 */

import type { ConnectionLostError } from '../errors.js';
import { config } from '../config.js';
import { consoleDiagnostics, type Diagnostics } from './diagnostics.js';
import { exchange } from './exchange.js';
import { LivenessMonitor, type LivenessMonitorOptions } from './liveness-monitor.js';
import { LossLatch } from './loss-latch.js';
import type { SharedConnection } from './shared-connection.js';

export type SessionState = 'connecting' | 'ready' | 'exchanging' | 'terminated';

export type SessionOutcome =
  | { kind: 'input-ended' }
  | { kind: 'connection-lost'; error: ConnectionLostError };

/**
 * Supplier of interactive command lines.
 */
export interface CommandSource {
  /** Next line typed by the user, or null once input has ended */
  next(): Promise<string | null>;
  addHistory(line: string): void;
  close(): void;
}

export interface SessionOptions {
  /** Query response deadline in milliseconds (default: config.scpi.timeout seconds) */
  timeoutMs?: number;
  heartbeat?: LivenessMonitorOptions;
  diagnostics?: Diagnostics;
  /** Receives every response line (default: console.log) */
  output?: (line: string) => void;
  onStateChange?: (next: SessionState, previous: SessionState) => void;
}

export class Session {
  private _state: SessionState = 'connecting';
  private readonly timeoutMs: number;
  private readonly heartbeat: LivenessMonitorOptions;
  private readonly diagnostics: Diagnostics;
  private readonly output: (line: string) => void;
  private readonly onStateChange?: (next: SessionState, previous: SessionState) => void;

  constructor(private readonly connection: SharedConnection, options: SessionOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.scpi.timeout * 1000;
    this.heartbeat = options.heartbeat ?? {};
    this.diagnostics = options.diagnostics ?? consoleDiagnostics;
    this.output = options.output ?? ((line) => console.log(line));
    this.onStateChange = options.onStateChange;
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Exchange each command in order and print the replies. No liveness
   * monitor runs: the process is done as soon as the list is.
   */
  async runBatch(commands: readonly string[]): Promise<void> {
    this.begin();
    try {
      for (const command of commands) {
        const response = await this.send(command);
        if (response !== null) {
          this.output(response);
        }
      }
    } finally {
      this.transition('terminated');
    }
  }

  /**
   * Prompt for commands until the source ends or the monitor finds the
   * connection dead, whichever comes first.
   */
  async runInteractive(source: CommandSource): Promise<SessionOutcome> {
    this.begin();

    const latch = new LossLatch();
    const monitor = new LivenessMonitor(this.connection, {
      ...this.heartbeat,
      onLost: (error) => {
        latch.trip(error);
        this.heartbeat.onLost?.(error);
      },
    });
    monitor.start();

    try {
      for (;;) {
        const input = await latch.race(source.next());
        if ('kind' in input) {
          return input;
        }
        if (!input.ok) {
          throw input.error;
        }
        if (input.value === null) {
          return { kind: 'input-ended' };
        }

        const line = input.value;
        source.addHistory(line);

        const result = await latch.race(this.send(line));
        if ('kind' in result) {
          return result;
        }
        if (!result.ok) {
          throw result.error;
        }
        if (result.value !== null) {
          this.output(result.value);
        }
      }
    } finally {
      this.transition('terminated');
      await monitor.stop();
    }
  }

  private begin(): void {
    if (this._state !== 'connecting') {
      throw new Error(`Session cannot start from state '${this._state}'`);
    }
    this.transition('ready');
  }

  private async send(command: string): Promise<string | null> {
    this.transition('exchanging');
    try {
      return await this.connection.withTransport('exchange', transport =>
        exchange(transport, command, this.timeoutMs, this.diagnostics)
      );
    } finally {
      // A lost connection may have terminated the session mid-exchange
      if (this._state === 'exchanging') {
        this.transition('ready');
      }
    }
  }

  private transition(next: SessionState): void {
    const previous = this._state;
    if (previous === next || previous === 'terminated') {
      return;
    }
    this._state = next;
    this.onStateChange?.(next, previous);
  }
}
