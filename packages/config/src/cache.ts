// Centralized cache configuration for all services

export const CACHE_CONFIG = {
  // Entries never expire and the store is unbounded; clearing is all-or-nothing.
  policy: 'permanent',

  // On-disk layout, relative to the working directory unless overridden
  directory: 'cache',
  entryExtension: '.json',
  tokenFile: 'token.json',
  credentialsFile: 'credentials.json',

  // Signature filenames: readable slug prefix + digest of the full signature
  slugMaxLength: 96,
  digestLength: 16,

  // HTTP cache headers for responses
  http: {
    dynamic: { maxAge: 300, staleWhileRevalidate: 60 }, // 5 min
    noCache: { maxAge: 0, staleWhileRevalidate: 0 },
  },
} as const;

export const SPOTIFY_CONFIG = {
  apiBase: 'https://api.spotify.com/v1',
  tokenUrl: 'https://accounts.spotify.com/api/token',
  // Refresh this long before the reported expiry
  tokenRefreshBufferMs: 60_000,
} as const;

/**
 * Get HTTP cache header string
 */
export function getCacheHeader(type: keyof typeof CACHE_CONFIG.http): string {
  const config = CACHE_CONFIG.http[type];
  if (config.maxAge === 0) {
    return 'no-cache, no-store, must-revalidate';
  }
  return `public, max-age=${config.maxAge}, stale-while-revalidate=${config.staleWhileRevalidate}`;
}
