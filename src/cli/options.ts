/**
 * Command-line option parsing for scpi.
 *
 * parseArgs does the splitting; zod checks that the values make sense and
 * turns them into numbers.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { config } from '../config.js';

export const cliOptionsSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.coerce
    .number({ invalid_type_error: 'port must be a number' })
    .int('port must be an integer')
    .min(1, 'port must be between 1 and 65535')
    .max(65535, 'port must be between 1 and 65535'),
  timeout: z.coerce
    .number({ invalid_type_error: 'timeout must be a number' })
    .positive('timeout must be a positive number of seconds'),
  command: z.string().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: CliOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
scpi - A lightweight interactive SCPI client that handles basic commands and queries.
Also accepts piped input or input redirected from a file (one command per line).

Usage:
  scpi <host> [port] [options]

Arguments:
  host                    The host to connect to
  port                    The port to use (default: ${config.scpi.port})

Options:
  -t, --timeout <secs>    Seconds to wait for a query response (default: ${config.scpi.timeout})
  -c, --command <text>    A command/query to run and immediately exit
  -V, --version           Print the version
  --help                  Show this help

Examples:
  # Interactive session
  scpi 192.168.1.20

  # One-shot query
  scpi 192.168.1.20 5025 -c "*IDN?"

  # Commands from a file
  scpi 192.168.1.20 < setup.txt
`;

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        timeout: {
          type: 'string',
          short: 't',
          default: String(config.scpi.timeout),
        },
        command: {
          type: 'string',
          short: 'c',
        },
        help: {
          type: 'boolean',
        },
        version: {
          type: 'boolean',
          short: 'V',
        },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node/script entries) into validated options.
 * Throws UsageError on anything malformed.
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parseRaw(argv);
  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  if (positionals.length > 2) {
    throw new UsageError(`unexpected argument '${positionals[2]}'`);
  }

  const [host = '', port = String(config.scpi.port)] = positionals;
  const result = cliOptionsSchema.safeParse({
    host,
    port,
    timeout: values.timeout,
    command: values.command,
  });

  if (!result.success) {
    throw new UsageError(result.error.issues.map(issue => issue.message).join('; '));
  }

  return { kind: 'run', options: result.data };
}
