#!/usr/bin/env node
/**
 * scpi CLI Entry Point
 *
 * Connects to an instrument and either runs a batch of commands (from -c or
 * piped stdin) or opens an interactive prompt.
 *
 * @example
 * ```bash
 * # Interactive prompt
 * scpi 192.168.1.20
 *
 * # One-shot query with a 2 second deadline
 * scpi 192.168.1.20 5025 -t 2 -c "*IDN?"
 *
 * # Commands from a file
 * scpi 192.168.1.20 < setup.txt
 * ```
 */

import { SocketTransport } from './transport/socket-transport.js';
import { SharedConnection } from './session/shared-connection.js';
import { Session, type CommandSource } from './session/session.js';
import type { LivenessMonitorOptions } from './session/liveness-monitor.js';
import { ReadlineSource } from './cli/readline-source.js';
import { collectBatchCommands, type BatchInputSource } from './cli/batch-input.js';
import { parseCliArgs, USAGE } from './cli/options.js';
import { errorMessage } from './errors.js';
import { packageVersion } from './version.js';

// =============================================================================
// Library API Re-exports (for direct imports from 'scpi-shell')
// =============================================================================

export * from './lib.js';

// =============================================================================
// CLI
// =============================================================================

/**
 * What main() talks to besides the network. Tests swap these out.
 */
export interface MainDependencies {
  stdin?: BatchInputSource['stdin'];
  createSource?: (prompt: string) => CommandSource;
  heartbeat?: LivenessMonitorOptions;
}

/**
 * Run the client and return the process exit status. Fatal errors reject.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  deps: MainDependencies = {}
): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'version') {
    console.log(`scpi ${packageVersion()}`);
    return 0;
  }

  const { host, port, timeout, command } = parsed.options;
  const timeoutMs = timeout * 1000;
  const batch = await collectBatchCommands({ command, stdin: deps.stdin ?? process.stdin });

  const transport = new SocketTransport(host, port);
  await transport.init();

  const connection = new SharedConnection(transport, { responseTimeoutMs: timeoutMs });
  const session = new Session(connection, { timeoutMs, heartbeat: deps.heartbeat });

  try {
    if (batch) {
      await session.runBatch(batch);
      return 0;
    }

    const createSource = deps.createSource ?? ((prompt: string) => new ReadlineSource(prompt));
    const source = createSource(`${host}> `);
    // Closing the prompt restores the terminal whether the session ended cleanly or not
    const outcome = await session.runInteractive(source).finally(() => source.close());

    if (outcome.kind === 'connection-lost') {
      console.error(`\n${outcome.error.message}`);
      return 1;
    }

    console.log('Exiting.');
    return 0;
  } finally {
    await connection.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`ERROR: ${errorMessage(error)}`);
      process.exit(1);
    }
  );
}
