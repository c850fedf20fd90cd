/**
 * Error types for scpi-shell.
 *
 * `fatal` marks errors that end the session. Recoverable ones are reported as
 * diagnostics by the exchange path and never reach the session loop.
 */
export class ScpiError extends Error {
  readonly fatal: boolean;

  constructor(message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.fatal = fatal;
  }
}

/**
 * The initial TCP connection could not be established.
 */
export class ConnectError extends ScpiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
  }
}

/**
 * Writing a command to the connection failed.
 */
export class WriteError extends ScpiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
  }
}

/**
 * The liveness monitor found the peer gone.
 */
export class ConnectionLostError extends ScpiError {
  constructor(message = 'Connection lost.', options?: { cause?: unknown }) {
    super(message, true, options);
  }
}

export class ResponseTimeoutError extends ScpiError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('Timed out waiting for query response', false);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The stream ended while a read was waiting for a line.
 */
export class ConnectionClosedError extends ScpiError {
  constructor(message = 'Connection closed by peer') {
    super(message, false);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
