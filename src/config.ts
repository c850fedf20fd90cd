/**
 * Central configuration for scpi-shell
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values. Command-line options take
 * precedence over everything here.
 *
 * Usage:
 *   import { config } from './config.js';
 *   const transport = new SocketTransport(host, config.scpi.port);
 */
import { config as loadDotenv } from 'dotenv';

// Load .env file (no-op if doesn't exist, quiet suppresses promotional message)
loadDotenv({ quiet: true });

export const config = Object.freeze({
  // Instrument connection defaults
  scpi: {
    port: parseInt(process.env.SCPI_PORT ?? '9001', 10),
    /** Seconds to wait for a query response */
    timeout: Number(process.env.SCPI_TIMEOUT ?? '5'),
  },

  // Socket-level settings
  socket: {
    /** Idle time before the first TCP keepalive probe */
    keepAliveIdle: parseInt(process.env.SCPI_KEEPALIVE_IDLE ?? '4000', 10),
  },

  // Liveness monitor
  heartbeat: {
    /** Pause between two probes of the connection */
    interval: parseInt(process.env.SCPI_HEARTBEAT_INTERVAL ?? '5000', 10),
    /** How long a single probe waits for activity before reporting "pending" */
    poll: parseInt(process.env.SCPI_HEARTBEAT_POLL ?? '10', 10),
  },

  // Timeout defaults (milliseconds)
  timeouts: {
    /** Timeout for initial socket connection */
    connect: parseInt(process.env.SCPI_TIMEOUT_CONNECT ?? '10000', 10),
  },

  // Interactive prompt
  repl: {
    historySize: parseInt(process.env.SCPI_HISTORY_SIZE ?? '1000', 10),
  },
});

export type Config = typeof config;
