/**
 * Decide whether a command expects a reply.
 *
 * Only the first token counts, and tokens are split on the space character
 * alone: `DIAG:DEB:REG? 0x200` is a query, `HELLO:WORLD "GOODBYE?"` is not.
 */
export function isQuery(command: string): boolean {
  if (command.length === 0) {
    return false;
  }

  const [head = ''] = command.split(' ');
  return head.trim().endsWith('?');
}
