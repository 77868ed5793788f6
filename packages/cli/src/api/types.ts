/**
 * Lookup outcome types shared by the client, the batch runner and the commands.
 */

/** Classification of a single lookup */
export type OutcomeKind = 'CLAIMABLE' | 'CLAIMED' | 'INVALID' | 'RATE_LIMITED' | 'ERROR';

/** Status marker printed in front of outcome messages */
export type OutcomeMarker = '✅' | '❌' | '⚠️' | '⏳';

export interface LookupOutcome {
  readonly code: string;
  readonly kind: OutcomeKind;
  /** True only when the endpoint answered 200 */
  readonly valid: boolean;
  readonly marker: OutcomeMarker;
  readonly message: string;
  /** Subscription plan name; null when the endpoint did not describe the code */
  readonly plan: string | null;
  readonly uses: number;
  readonly maxUses: number;
  /** Requests made for this lookup, retries included */
  readonly attempts: number;
  /** Unmodified response body, only in diagnostic mode */
  readonly raw?: unknown;
}

export interface CheckOptions {
  /** Keep the raw response body on the outcome */
  diagnostic?: boolean;
  /** Total attempts, first request included */
  maxRetries?: number;
}

/** Reported before each backoff sleep */
export interface RetryEvent {
  code: string;
  /** Zero-based index of the attempt that failed */
  attempt: number;
  maxRetries: number;
  waitSeconds: number;
  reason: 'rate_limited' | 'network_error';
}

export interface EntitlementClientOptions {
  /** API base, e.g. https://discord.com/api/v9 */
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
}

/** Anything that can answer a lookup; the batch runner and session depend on this */
export interface GiftCodeLookup {
  check(code: string, options?: CheckOptions): Promise<LookupOutcome>;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names */
  headers: Readonly<Record<string, string>>;
  /** Parsed JSON body, or null when the body is empty or not JSON */
  body: unknown;
}

export interface TransportRequestOptions {
  timeoutMs: number;
}

/**
 * Performs one GET. Resolves for every HTTP status; rejects with
 * TransportError on connection failure or timeout.
 */
export interface HttpTransport {
  performGet(
    url: string,
    params: Readonly<Record<string, string>>,
    options: TransportRequestOptions
  ): Promise<TransportResponse>;
}
