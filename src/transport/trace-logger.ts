import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

export type TraceEvent = 'SEND' | 'RECV' | 'INFO' | 'ERROR';

/** Bytes of hex shown per SEND/RECV entry; the rest is summarized */
export const TRACE_HEX_LIMIT = 32;

const CONTROL_NAMES: Record<string, string> = { '\n': '<LF>', '\r': '<CR>', '\t': '<TAB>' };

/**
 * Render line data with its terminators visible, so a missing or doubled
 * `\n` shows up in the trace.
 */
export function showTerminators(text: string): string {
  return text.replace(/[\x00-\x1f\x7f]/g, (ch) =>
    CONTROL_NAMES[ch] ?? `<0x${ch.charCodeAt(0).toString(16).padStart(2, '0')}>`
  );
}

export function hexPreview(bytes: Buffer, limit: number = TRACE_HEX_LIMIT): string {
  if (bytes.length <= limit) {
    return bytes.toString('hex');
  }
  return `${bytes.subarray(0, limit).toString('hex')}…(+${bytes.length - limit} bytes)`;
}

/**
 * Records raw line traffic when SCPI_TRACE is set.
 *
 * SEND/RECV entries look like
 * `[2026-01-01T00:00:00.000Z] [socket-bench-5025] RECV bytes=3 lines=1 "OK<LF>" hex=4f4b0a`
 */
export class TransportTraceLogger {
  private readonly enabled: boolean;
  private stream: WriteStream | null = null;
  readonly filePath: string | null = null;

  constructor(private readonly context: string, env: NodeJS.ProcessEnv = process.env) {
    this.enabled = Boolean(env.SCPI_TRACE);
    if (!this.enabled) {
      return;
    }

    const dir = env.SCPI_TRACE_DIR ?? join(process.cwd(), 'logs');
    mkdirSync(dir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const id = randomUUID().split('-')[0];
    // Host names may carry characters that are not safe in file names
    const safeContext = context.replace(/[^A-Za-z0-9_.-]/g, '_');
    this.filePath = join(dir, `scpi-trace-${safeContext}-${timestamp}-${id}.log`);
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
    this.stream.write(`# Trace start ${new Date().toISOString()} (${context})\n`);
  }

  logSend(data: string): void {
    this.write('SEND', this.describe(data));
  }

  logReceive(data: string): void {
    this.write('RECV', this.describe(data));
  }

  logInfo(message: string): void {
    this.write('INFO', message);
  }

  logError(error: unknown): void {
    this.write('ERROR', error instanceof Error ? `${error.name}: ${error.message}` : String(error));
  }

  /**
   * Finish the trace file. Resolves once everything is flushed.
   */
  close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return Promise.resolve();
    }
    this.stream = null;
    stream.write(`# Trace end ${new Date().toISOString()}\n`);
    return new Promise(resolve => stream.end(() => resolve()));
  }

  private describe(text: string): string {
    const bytes = Buffer.from(text, 'utf8');
    const lines = text.split('\n').length - 1;
    return `bytes=${bytes.length} lines=${lines} "${showTerminators(text)}" hex=${hexPreview(bytes)}`;
  }

  private write(type: TraceEvent, detail: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`[${new Date().toISOString()}] [${this.context}] ${type} ${detail}\n`);
  }
}
