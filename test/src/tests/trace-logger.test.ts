/**
 * Raw IO trace files
 */

import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TransportTraceLogger, hexPreview, showTerminators } from '../../../src/transport/trace-logger.js';

describe('TransportTraceLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scpi-trace-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes nothing unless SCPI_TRACE is set', async () => {
    const trace = new TransportTraceLogger('socket-bench-5025', { SCPI_TRACE_DIR: dir });
    trace.logSend('*IDN?\n');
    await trace.close();

    expect(trace.filePath).toBeNull();
    expect(readdirSync(dir)).toEqual([]);
  });

  it('records sends and receives with visible terminators', async () => {
    const trace = new TransportTraceLogger('socket-bench-5025', { SCPI_TRACE: '1', SCPI_TRACE_DIR: dir });
    trace.logSend('OK\n');
    trace.logReceive('1\r\n2\n');
    trace.logError(new Error('boom'));
    trace.logInfo('connected');
    await trace.close();

    const lines = readFileSync(String(trace.filePath), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(6);
    expect(lines[0]).toMatch(/^# Trace start .* \(socket-bench-5025\)$/);
    expect(lines[1]).toMatch(/\] \[socket-bench-5025\] SEND bytes=3 lines=1 "OK<LF>" hex=4f4b0a$/);
    expect(lines[2]).toMatch(/\] \[socket-bench-5025\] RECV bytes=5 lines=2 "1<CR><LF>2<LF>" hex=310d0a320a$/);
    expect(lines[3]).toMatch(/\] \[socket-bench-5025\] ERROR Error: boom$/);
    expect(lines[4]).toMatch(/\] \[socket-bench-5025\] INFO connected$/);
    expect(lines[5]).toMatch(/^# Trace end /);
  });

  it('counts multi-byte characters by their encoded size', async () => {
    const trace = new TransportTraceLogger('socket-bench-5025', { SCPI_TRACE: '1', SCPI_TRACE_DIR: dir });
    trace.logReceive('25.0 °C\n');
    await trace.close();

    const lines = readFileSync(String(trace.filePath), 'utf-8').trimEnd().split('\n');
    expect(lines[1]).toMatch(/RECV bytes=9 lines=1 "25\.0 °C<LF>" hex=32352e3020c2b0430a$/);
  });

  it('keeps host names with separators out of the file path', async () => {
    const trace = new TransportTraceLogger('socket-fe80::1-9001', { SCPI_TRACE: '1', SCPI_TRACE_DIR: dir });
    await trace.close();

    expect(readdirSync(dir)).toHaveLength(1);
    expect(readdirSync(dir)[0]).toMatch(/^scpi-trace-socket-fe80__1-9001-/);
  });

  describe('showTerminators', () => {
    it('names line terminators and other control characters', () => {
      expect(showTerminators('A\tB\r\n')).toBe('A<TAB>B<CR><LF>');
      expect(showTerminators('\x1b[0m')).toBe('<0x1b>[0m');
    });
  });

  describe('hexPreview', () => {
    it('shows short payloads in full', () => {
      expect(hexPreview(Buffer.from('OK\n'))).toBe('4f4b0a');
    });

    it('cuts long payloads and reports what was left out', () => {
      expect(hexPreview(Buffer.from('ABCDEF'), 4)).toBe('41424344…(+2 bytes)');
    });
  });
});
