import type { ConnectionLostError } from '../errors.js';

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type LostOutcome = { kind: 'connection-lost'; error: ConnectionLostError };

export function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then<Settled<T>, Settled<T>>(
    value => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error })
  );
}

/**
 * Latches the first connection loss and cuts short whichever step is
 * waiting when it happens.
 *
 * Only the step in flight is listening, and it stops listening once it
 * settles, so a long session does not pile up handlers.
 */
export class LossLatch {
  private outcome: LostOutcome | null = null;
  private interrupt: ((outcome: LostOutcome) => void) | null = null;

  trip(error: ConnectionLostError): void {
    if (this.outcome) {
      return;
    }
    const outcome: LostOutcome = { kind: 'connection-lost', error };
    this.outcome = outcome;
    this.interrupt?.(outcome);
  }

  get tripped(): LostOutcome | null {
    return this.outcome;
  }

  /** True while a step is waiting on the latch */
  get listening(): boolean {
    return this.interrupt !== null;
  }

  async race<T>(step: Promise<T>): Promise<Settled<T> | LostOutcome> {
    if (this.outcome) {
      return this.outcome;
    }
    try {
      return await new Promise<Settled<T> | LostOutcome>(resolve => {
        this.interrupt = resolve;
        void settle(step).then(resolve);
      });
    } finally {
      this.interrupt = null;
    }
  }
}
