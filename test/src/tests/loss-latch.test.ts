/**
 * Connection-loss latch used by interactive sessions
 */

import { ConnectionLostError } from '../../../src/errors.js';
import { LossLatch } from '../../../src/session/loss-latch.js';

describe('LossLatch', () => {
  it('passes a step result through when nothing is lost', async () => {
    const latch = new LossLatch();

    expect(await latch.race(Promise.resolve('1.25'))).toEqual({ ok: true, value: '1.25' });
    expect(await latch.race(Promise.reject(new Error('boom')))).toEqual({ ok: false, error: new Error('boom') });
  });

  it('stops listening once each step settles', async () => {
    const latch = new LossLatch();

    for (let i = 0; i < 500; i++) {
      const step = latch.race(Promise.resolve(i));
      expect(latch.listening).toBe(true);
      await step;
      expect(latch.listening).toBe(false);
    }
  });

  it('interrupts the step in flight when the connection is lost', async () => {
    const latch = new LossLatch();
    const error = new ConnectionLostError();
    const pending = latch.race(new Promise<string>(() => {}));

    latch.trip(error);

    expect(await pending).toEqual({ kind: 'connection-lost', error });
    expect(latch.listening).toBe(false);
  });

  it('answers later steps with the first loss', async () => {
    const latch = new LossLatch();
    const first = new ConnectionLostError();
    latch.trip(first);
    latch.trip(new ConnectionLostError('second'));

    expect(latch.tripped).toEqual({ kind: 'connection-lost', error: first });
    expect(await latch.race(Promise.resolve('ignored'))).toEqual({ kind: 'connection-lost', error: first });
  });
});
