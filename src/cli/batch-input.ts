/**
 * Assembly of batch-mode commands from -c text or redirected stdin.
 */

/**
 * Split batch text into command lines. A `\r` before each `\n` is dropped,
 * as is the empty line after a final terminator.
 */
export function splitCommandLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }

  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export async function readAll(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface BatchInputSource {
  /** Text given with -c, if any */
  command?: string;
  stdin: AsyncIterable<string | Buffer> & { isTTY?: boolean };
}

/**
 * Decide between batch and interactive mode. Piped or redirected stdin wins
 * over -c. Returns null when the session should be interactive.
 */
export async function collectBatchCommands(source: BatchInputSource): Promise<string[] | null> {
  if (!source.stdin.isTTY) {
    return splitCommandLines(await readAll(source.stdin));
  }
  if (source.command !== undefined) {
    return splitCommandLines(source.command);
  }
  return null;
}
