/**
 * scpi-shell Public API
 *
 * This module exports all public APIs for use as a library.
 *
 * @example
 * ```typescript
 * import { SocketTransport, SharedConnection, Session } from 'scpi-shell';
 *
 * const transport = new SocketTransport('192.168.1.20', 5025);
 * await transport.init();
 * const session = new Session(new SharedConnection(transport), { timeoutMs: 2000 });
 * await session.runBatch(['*RST', '*IDN?']);
 * await transport.close();
 * ```
 */

// =============================================================================
// Transport Layer
// =============================================================================

export type { Transport, PeekState } from './transport/transport.js';
export { BaseTransport } from './transport/transport.js';
export { SocketTransport } from './transport/socket-transport.js';
export type { SocketTransportOptions } from './transport/socket-transport.js';
export { TransportTraceLogger } from './transport/trace-logger.js';

// =============================================================================
// Session
// =============================================================================

export { isQuery } from './session/query.js';
export { exchange, normalizeCommand } from './session/exchange.js';
export { ConnectionLock } from './session/connection-lock.js';
export type { ConnectionLockHandle, ConnectionLockOptions } from './session/connection-lock.js';
export { SharedConnection, holdWarningFor, type SharedConnectionOptions } from './session/shared-connection.js';
export { LivenessMonitor } from './session/liveness-monitor.js';
export type { LivenessMonitorOptions } from './session/liveness-monitor.js';
export { Session } from './session/session.js';
export type {
  CommandSource,
  SessionOptions,
  SessionOutcome,
  SessionState,
} from './session/session.js';
export { consoleDiagnostics } from './session/diagnostics.js';
export type { Diagnostic, DiagnosticKind, Diagnostics } from './session/diagnostics.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ScpiError,
  ConnectError,
  WriteError,
  ConnectionLostError,
  ResponseTimeoutError,
  ConnectionClosedError,
} from './errors.js';

// =============================================================================
// Configuration
// =============================================================================

export { config } from './config.js';
export type { Config } from './config.js';
