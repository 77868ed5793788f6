import { EntitlementClient, type RetryEvent } from '../../api/index.js';
import type { Settings } from '../../config/index.js';
import { formatSeconds, warn } from '../../utils.js';

export interface LookupClientOptions {
  /** Print each backoff wait; a function is asked before every print */
  verbose?: boolean | (() => boolean);
}

export function describeRetry(event: RetryEvent): string {
  const what = event.reason === 'rate_limited' ? 'Rate limited' : 'Network error';
  return `${what}, waiting ${formatSeconds(event.waitSeconds)} before retry ${String(event.attempt + 1)}/${String(event.maxRetries)}...`;
}

/**
 * Build the entitlement client for the resolved settings.
 */
export function createLookupClient(settings: Settings, opts: LookupClientOptions = {}): EntitlementClient {
  const verbose = opts.verbose ?? false;
  return new EntitlementClient({
    baseUrl: settings.apiUrl,
    timeoutMs: settings.timeoutMs,
    maxRetries: settings.maxRetries,
    onRetry: (event: RetryEvent) => {
      if (typeof verbose === 'function' ? verbose() : verbose) {
        warn(describeRetry(event));
      }
    },
  });
}
