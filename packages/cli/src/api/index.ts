/**
 * API module barrel export.
 * Re-exports the lookup client, its transport and public types.
 */
export { EntitlementClient, interpretGiftCode } from './client.js';
export { FetchTransport, buildHeaders, buildUrl } from './transport.js';
export { computeBackoff, parseRetryAfter, sleep } from './backoff.js';
export type * from './types.js';
