import type { Transport } from '../transport/transport.js';
import { ResponseTimeoutError, WriteError, errorMessage } from '../errors.js';
import { consoleDiagnostics, type Diagnostics } from './diagnostics.js';
import { isQuery } from './query.js';

/**
 * Ensure a command ends with exactly the terminator it was given, or one `\n`.
 */
export function normalizeCommand(command: string): string {
  return command.endsWith('\n') ? command : `${command}\n`;
}

/**
 * Send a command and, if it is a query, wait for its one-line reply.
 *
 * Write failures reject with WriteError: the session cannot go on without an
 * outbound path. A missing reply (timeout, read error, peer closing before
 * the line) is reported through diagnostics and resolves null so the operator
 * can retry.
 *
 * The caller must hold exclusive access to the transport for the whole call.
 */
export async function exchange(
  transport: Transport,
  command: string,
  deadlineMs: number,
  diagnostics: Diagnostics = consoleDiagnostics
): Promise<string | null> {
  const payload = normalizeCommand(command);

  try {
    await transport.write(payload);
  } catch (error) {
    throw new WriteError(`Failed to send command: ${errorMessage(error)}`, { cause: error });
  }

  if (!isQuery(command)) {
    return null;
  }

  try {
    const line = await transport.readLine(deadlineMs);
    return line.trim();
  } catch (error) {
    diagnostics.report({
      kind: error instanceof ResponseTimeoutError ? 'timeout' : 'read-error',
      message: errorMessage(error),
      command,
    });
    return null;
  }
}
