/**
 * Liveness Monitor
 *
 * While the interactive prompt waits on keystrokes nothing touches the
 * socket, so a peer that hangs up would only be noticed on the next command.
 * The monitor probes the connection on a timer and reports the first
 * end-of-stream through whenLost(). It never ends the process itself; the
 * session decides what to do with the loss.
 */

import { ConnectionLostError, errorMessage } from '../errors.js';
import { config } from '../config.js';
import type { SharedConnection } from './shared-connection.js';

export interface LivenessMonitorOptions {
  /** Pause between probes (default: config.heartbeat.interval) */
  intervalMs?: number;
  /** How long one probe waits for activity (default: config.heartbeat.poll) */
  pollMs?: number;
  /** Called once, when the loss is declared */
  onLost?: (error: ConnectionLostError) => void;
}

export class LivenessMonitor {
  private readonly intervalMs: number;
  private readonly pollMs: number;
  private active = false;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeSleeper: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private lostError: ConnectionLostError | null = null;
  private readonly lost: Promise<ConnectionLostError>;
  private resolveLost: (error: ConnectionLostError) => void = () => {};
  private probeCount = 0;
  private readonly onLost?: (error: ConnectionLostError) => void;

  constructor(
    private readonly connection: SharedConnection,
    options: LivenessMonitorOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? config.heartbeat.interval;
    this.pollMs = options.pollMs ?? config.heartbeat.poll;
    this.onLost = options.onLost;
    this.lost = new Promise(resolve => {
      this.resolveLost = resolve;
    });
  }

  /**
   * Begin probing. The first probe runs immediately.
   */
  start(): void {
    if (this.active || this.lostError) {
      return;
    }
    this.active = true;
    this.loop = this.run().catch((error: unknown) => {
      this.declareLost(new ConnectionLostError(`Connection check failed: ${errorMessage(error)}`, { cause: error }));
    });
  }

  /**
   * Stop probing. Resolves once any in-flight probe has released the connection.
   */
  async stop(): Promise<void> {
    this.active = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wakeSleeper?.();
    this.wakeSleeper = null;

    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
    }
  }

  /**
   * Resolves with the loss once the connection is found dead. Never rejects.
   */
  whenLost(): Promise<ConnectionLostError> {
    return this.lost;
  }

  isRunning(): boolean {
    return this.active;
  }

  get probes(): number {
    return this.probeCount;
  }

  private async run(): Promise<void> {
    while (this.active) {
      // The lock is held for exactly one probe and released before sleeping
      const state = await this.connection.withTransport('liveness', transport => transport.peek(this.pollMs));
      this.probeCount++;

      if (state === 'closed') {
        this.declareLost(new ConnectionLostError());
        return;
      }
      if (!this.active) {
        return;
      }

      await this.sleep(this.intervalMs);
    }
  }

  private declareLost(error: ConnectionLostError): void {
    if (this.lostError) {
      return;
    }
    this.active = false;
    this.lostError = error;
    this.resolveLost(error);
    this.onLost?.(error);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wakeSleeper = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeSleeper = null;
        resolve();
      }, ms);
    });
  }
}
