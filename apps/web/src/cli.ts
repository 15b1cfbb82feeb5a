// Command-line flags for the server entry point

import { parsePort, type AppConfig } from '@tunescope/config';

export const USAGE = `Usage: tunescope [options]

Options:
  -p, --port <port>     Ephemeral TCP port for the web server (49152-65535)
  --no-store            Erase the cache and disable memoization
  -h, --help            Show this help

Environment:
  CACHE_DIR             Cache root (default: ./cache)
  CREDENTIALS_PATH      Client credentials JSON (default: ./credentials.json)
  TOKEN_PATH            Persisted token file (default: <CACHE_DIR>/token.json)
  PORT                  Same as --port
  MEMOIZE               Set to false for the same effect as --no-store`;

export type CliResult = { kind: 'help' } | { kind: 'run'; config: AppConfig };

/**
 * Apply flags on top of the environment-derived config. Throws on a bad flag.
 */
export function parseCliArgs(args: string[], base: AppConfig): CliResult {
  const config = { ...base };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--no-store':
        config.memoize = false;
        break;
      case '-p':
      case '--port': {
        const value = args[++i];
        if (value === undefined) {
          throw new Error(`${arg} requires a value`);
        }
        config.port = parsePort(value);
        break;
      }
      default:
        if (arg.startsWith('--port=')) {
          config.port = parsePort(arg.slice('--port='.length));
          break;
        }
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { kind: 'run', config };
}
