/**
 * Command-line front end
 *
 * Usage:
 *   hirez ping                      # API version and server time
 *   hirez session                   # Create a session, print its id
 *   hirez call <method> [args...]   # Call any method, print JSON
 *   hirez help
 *
 * Configuration comes from HIREZ_* environment variables (see config/env.ts).
 * picocolors provides terminal coloring.
 */

import pc from 'picocolors';
import { withClient, type ClientOptions } from '../client.js';
import { loadConfig, type Env } from '../config/env.js';
import { formatApiError } from '../errors.js';
import type { FetchFn } from '../transport/http.js';

export interface CliIo {
  env: Env;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Replaces the global fetch (tests) */
  fetchFn?: FetchFn;
}

const USAGE = `${pc.bold('hirez')} - Hi-Rez API client

${pc.bold('Commands')}
  ping                      Check the API is reachable
  session                   Create a session and print its id
  call <method> [args...]   Call a method and print the JSON result
  help                      Show this message

${pc.bold('Environment')}
  HIREZ_DEV_ID, HIREZ_AUTH_KEY       credentials (required)
  HIREZ_PLATFORM                     smite-pc (default), smite-xbox, smite-ps4,
                                     paladins-pc, paladins-xbox, paladins-ps4
  HIREZ_BASE_URL                     explicit endpoint
  HIREZ_SESSION_TTL_MINUTES          default 15
  HIREZ_TIMEOUT_MS                   default 10000`;

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    io.stdout(USAGE);
    return command ? 0 : 2;
  }

  if (command !== 'ping' && command !== 'session' && command !== 'call') {
    io.stderr(pc.red(`Unknown command: ${command}`));
    io.stderr(USAGE);
    return 2;
  }

  if (command === 'call' && !rest[0]) {
    io.stderr(pc.red('Usage: hirez call <method> [args...]'));
    return 2;
  }

  try {
    const options: ClientOptions = { ...loadConfig(io.env), fetchFn: io.fetchFn };

    await withClient(options, async (api) => {
      switch (command) {
        case 'ping': {
          io.stdout(await api.ping());
          break;
        }
        case 'session': {
          const session = await api.createSession();
          io.stdout(`${pc.green('✓')} session ${session.id}`);
          io.stdout(pc.dim(`expires ${session.expiresAt.toISOString()}`));
          break;
        }
        case 'call': {
          const [method, ...args] = rest;
          const result = await api.callMethod(method, args);
          io.stdout(JSON.stringify(result, null, 2));
          break;
        }
      }
    });
    return 0;
  } catch (error) {
    io.stderr(pc.red(formatApiError(error)));
    return 1;
  }
}
