/**
 * Default timeouts for outbound calls (in milliseconds)
 */
export const TIMEOUTS = {
  /** Catalog API reads (10 seconds) */
  fast: 10_000,
  /** Token endpoint and other slower calls (30 seconds) */
  slow: 30_000,
} as const;

export type TimeoutPreset = keyof typeof TIMEOUTS;
