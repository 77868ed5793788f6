/**
 * URL Constants for giftcheck
 *
 * Single source of truth for the remote endpoints the CLI talks to.
 * Import from @giftcheck/shared instead of hardcoding URLs.
 */

/**
 * Production URLs
 */
export const URLS = {
  /** Entitlement API base (versioned) */
  API: 'https://discord.com/api/v9',
} as const;

