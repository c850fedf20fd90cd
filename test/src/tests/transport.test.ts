/**
 * Line buffer and probe behaviour shared by all transports
 */

import { ConnectionClosedError, ResponseTimeoutError } from '../../../src/errors.js';
import { ScriptedTransport } from '../helpers/scripted-transport.js';
import { delay } from '../helpers/line-server.js';

async function openTransport(): Promise<ScriptedTransport> {
  const transport = new ScriptedTransport();
  await transport.init();
  return transport;
}

describe('BaseTransport.readLine', () => {
  it('returns a buffered line with its terminator', async () => {
    const transport = await openTransport();
    transport.inject('1.0\nrest');

    expect(await transport.readLine(100)).toBe('1.0\n');
  });

  it('waits for a line that arrives in pieces', async () => {
    const transport = await openTransport();
    const pending = transport.readLine(1000);

    transport.inject('12');
    await delay(5);
    transport.inject('34\n');

    expect(await pending).toBe('1234\n');
  });

  it('times out when no terminator arrives', async () => {
    const transport = await openTransport();
    transport.inject('partial');

    await expect(transport.readLine(20)).rejects.toBeInstanceOf(ResponseTimeoutError);
    // The partial text is still there for the next read
    transport.inject('\n');
    expect(await transport.readLine(20)).toBe('partial\n');
  });

  it('fails with ConnectionClosedError once the stream ends empty', async () => {
    const transport = await openTransport();
    const pending = transport.readLine(1000);

    transport.hangUp();

    await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(transport.isOpen()).toBe(false);
  });
});

describe('BaseTransport.peek', () => {
  it('reports pending on an idle open connection', async () => {
    const transport = await openTransport();

    expect(await transport.peek(5)).toBe('pending');
  });

  it('reports readable without consuming', async () => {
    const transport = await openTransport();
    transport.inject('7\n');

    expect(await transport.peek(5)).toBe('readable');
    expect(await transport.peek(5)).toBe('readable');
    expect(await transport.readLine(10)).toBe('7\n');
  });

  it('reports closed after the peer hangs up', async () => {
    const transport = await openTransport();
    transport.hangUp();

    expect(await transport.peek(5)).toBe('closed');
  });

  it('wakes early when the peer hangs up during the poll', async () => {
    const transport = await openTransport();
    const started = Date.now();
    const probe = transport.peek(2000);

    transport.hangUp();

    expect(await probe).toBe('closed');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('reports readable while unread data remains after the peer hangs up', async () => {
    const transport = await openTransport();
    transport.inject('last\n');
    transport.hangUp();

    expect(await transport.peek(5)).toBe('readable');
    expect(await transport.readLine(10)).toBe('last\n');
    expect(await transport.peek(5)).toBe('closed');
  });
});
