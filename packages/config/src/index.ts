// Main entry point for @tunescope/config package

export * from './cache';
export * from './env';
export * from './timeouts';

// Site-wide constants
export const SITE_CONFIG = {
  name: 'Tunescope',
  description: 'Browse artists, albums and tracks from the Spotify catalog as JSON.',
  version: '1.0.0',
} as const;
