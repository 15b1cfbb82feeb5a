import { isAbsolute, join } from 'node:path';
import { CACHE_CONFIG } from './cache';

export const DEFAULT_PORT = 50861;
export const PORT_RANGE = { min: 49152, max: 65535 } as const;

export interface AppConfig {
  /** Root directory of the signature cache */
  cacheDir: string;
  /** Persisted token file; lives under the cache root unless overridden */
  tokenPath: string;
  /** Operator-supplied `{ client_id, client_secret }` JSON file */
  credentialsPath: string;
  /** Port for the HTTP server (ephemeral range only) */
  port: number;
  /** When false the cache is cleared at startup and never written */
  memoize: boolean;
}

/**
 * Validate a port number against the ephemeral range.
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < PORT_RANGE.min || port > PORT_RANGE.max) {
    throw new Error(`Port must be an integer in ${PORT_RANGE.min}-${PORT_RANGE.max}, got "${value}"`);
  }
  return port;
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new Error(`Invalid boolean for ${key}: "${value}"`);
  }
}

export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): AppConfig {
  const resolve = (path: string): string => (isAbsolute(path) ? path : join(cwd, path));

  const cacheDir = resolve(env.CACHE_DIR || CACHE_CONFIG.directory);

  return {
    cacheDir,
    tokenPath: env.TOKEN_PATH ? resolve(env.TOKEN_PATH) : join(cacheDir, CACHE_CONFIG.tokenFile),
    credentialsPath: resolve(env.CREDENTIALS_PATH || CACHE_CONFIG.credentialsFile),
    port: env.PORT ? parsePort(env.PORT) : DEFAULT_PORT,
    memoize: env.MEMOIZE ? parseBoolean('MEMOIZE', env.MEMOIZE) : true,
  };
}
