/**
 * Global limits for giftcheck.
 * Timing values mirror what the remote endpoint tolerates in practice.
 */
export const LIMITS = {
  // Request
  /** Per-request timeout (10 seconds) */
  REQUEST_TIMEOUT_MS: 10_000,
  /** Attempts per lookup, first request included */
  MAX_RETRIES_DEFAULT: 3,
  /** Upper bound accepted for --max-retries */
  MAX_RETRIES_MAX: 10,

  // Backoff on 429
  /** Wait used when the server sends no Retry-After header */
  RATE_LIMIT_DEFAULT_WAIT_SECONDS: 3,
  /** Cap for a single rate-limit wait */
  RATE_LIMIT_MAX_WAIT_SECONDS: 30,

  // Backoff on transport failure
  /** Base wait after a connection error or timeout */
  NETWORK_BASE_WAIT_SECONDS: 2,
  /** Cap for a single network-failure wait */
  NETWORK_MAX_WAIT_SECONDS: 10,

  // Batch pacing
  /** Default pause between batch lookups */
  BATCH_DELAY_DEFAULT_SECONDS: 2.5,
  /** Largest accepted batch delay */
  BATCH_DELAY_MAX_SECONDS: 60,
  /** Pause after each interactive lookup */
  INTERACTIVE_PAUSE_MS: 500,
} as const;

// Code patterns
export const CODE_LENGTH = { min: 16, max: 25 } as const;

/**
 * Gift link patterns, checked in order; the first match wins.
 * Each captures the code in group 1. A code running past 25 characters
 * does not match.
 */
export const GIFT_LINK_PATTERNS: readonly RegExp[] = [
  /discord\.gift\/([A-Za-z0-9]{16,25})(?![A-Za-z0-9])/,
  /discord\.com\/gifts\/([A-Za-z0-9]{16,25})(?![A-Za-z0-9])/,
  /discordapp\.com\/gifts\/([A-Za-z0-9]{16,25})(?![A-Za-z0-9])/,
  /promos\.discord\.gg\/([A-Za-z0-9]{16,25})(?![A-Za-z0-9])/,
];

/** A bare code on its own */
export const BARE_CODE_PATTERN = /^[A-Za-z0-9]{16,25}$/;

// URL constants
export { URLS } from './urls.js';

// Branding constants
export {
  APP_NAME,
  PLATFORM_NAME,
  ASCII_WORDMARK,
  BRAND_ACCENT_HEX,
  splitWordmarkLines,
  TAGLINE,
  WORDMARK_SPLIT_COL,
} from './branding.js';
export type { WordmarkLine } from './branding.js';
