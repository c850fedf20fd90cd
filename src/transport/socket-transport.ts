/**
 * Transport implementation using Node.js net.Socket for direct TCP connection.
 *
 * Received bytes are decoded as UTF-8 and appended to the line buffer of
 * BaseTransport; nothing is consumed until a read asks for a line.
 */

import * as net from 'node:net';
import { BaseTransport } from './transport.js';
import { config } from '../config.js';
import { ConnectError, errorMessage } from '../errors.js';
import { TransportTraceLogger } from './trace-logger.js';

export interface SocketTransportOptions {
  connectTimeout?: number;
  /** Idle time before the first keepalive probe; 0 disables keepalive */
  keepAliveIdle?: number;
}

export class SocketTransport extends BaseTransport {
  private host: string;
  private port: number;
  private socket: net.Socket | null = null;
  private connectTimeout: number;
  private keepAliveIdle: number;
  private trace: TransportTraceLogger;

  constructor(
    host: string,
    port: number = config.scpi.port,
    options: SocketTransportOptions = {}
  ) {
    super();
    this.host = host;
    this.port = port;
    this.connectTimeout = options.connectTimeout ?? config.timeouts.connect;
    this.keepAliveIdle = options.keepAliveIdle ?? config.socket.keepAliveIdle;
    this.trace = new TransportTraceLogger(`socket-${host}-${port}`);
  }

  async init(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      let connected = false;

      const timeout = setTimeout(() => {
        socket.destroy();
        this.socket = null;
        reject(new ConnectError(`Connection to ${this.host}:${this.port} timed out after ${this.connectTimeout}ms`));
      }, this.connectTimeout);

      this.socket = socket;
      this.trace.logInfo(`connecting to ${this.host}:${this.port}`);

      socket.on('connect', () => {
        clearTimeout(timeout);
        connected = true;
        this._isOpen = true;
        // Let the OS notice a dead peer even while nothing is being sent.
        // Node only exposes the idle time; interval and probe count stay at OS defaults.
        if (this.keepAliveIdle > 0) {
          socket.setKeepAlive(true, this.keepAliveIdle);
        }
        this.trace.logInfo('connected');
        resolve();
      });

      // A multi-byte character may straddle two segments; the socket's decoder holds the partial bytes
      socket.setEncoding('utf8');
      socket.on('data', (data: string) => {
        this.trace.logReceive(data);
        this.receive(data);
      });

      socket.on('error', (err: Error) => {
        clearTimeout(timeout);
        this.trace.logError(err);
        if (!connected) {
          socket.destroy();
          this.socket = null;
          reject(new ConnectError(`Could not connect to ${this.host}:${this.port}: ${err.message}`, { cause: err }));
          return;
        }
        this.markFailed(new Error(`Socket error: ${err.message}`, { cause: err }));
      });

      socket.on('end', () => {
        this.trace.logInfo('socket ended');
        this.markEnded();
      });

      socket.on('close', () => {
        this.trace.logInfo('socket closed');
        if (connected && !this.ended && !this.failure) {
          this.markEnded();
        }
      });

      socket.connect(this.port, this.host);
    });
  }

  async write(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket || !this._isOpen) {
      throw new Error('Transport not open');
    }

    return new Promise((resolve, reject) => {
      this.trace.logSend(data);
      socket.write(data, 'utf-8', (err) => {
        if (err) {
          this.trace.logError(err);
          reject(new Error(`Send error: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (socket) {
      // Try graceful disconnect
      try {
        socket.end();
        await this.delay(50);
      } catch (error) {
        this.trace.logInfo(`ignoring error while ending socket: ${errorMessage(error)}`);
      }

      socket.destroy();
      this.socket = null;
    }
    this._isOpen = false;
    this.buffer = '';
    this.trace.logInfo('transport closed');
    await this.trace.close();
  }
}
