/**
 * Entitlement API client.
 * Looks up gift codes without redeeming them and folds every failure into a
 * LookupOutcome.
 */
import {
  ENTITLEMENT_ROUTES,
  GIFT_CODE_LOOKUP_QUERY,
  LIMITS,
  apiErrorBodySchema,
  giftCodeResponseSchema,
} from '@giftcheck/shared';

import { computeBackoff, parseRetryAfter, sleep as defaultSleep } from './backoff.js';
import { FetchTransport } from './transport.js';
import type {
  CheckOptions,
  EntitlementClientOptions,
  GiftCodeLookup,
  HttpTransport,
  LookupOutcome,
  RetryEvent,
  TransportResponse,
} from './types.js';

type Step =
  | { done: true; outcome: LookupOutcome }
  | { done: false; waitSeconds: number; reason: RetryEvent['reason'] };

export class EntitlementClient implements GiftCodeLookup {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onRetry: ((event: RetryEvent) => void) | undefined;

  constructor(options: EntitlementClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? LIMITS.REQUEST_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? LIMITS.MAX_RETRIES_DEFAULT;
    this.transport = options.transport ?? new FetchTransport();
    this.sleep = options.sleep ?? defaultSleep;
    this.onRetry = options.onRetry;
  }

  lookupUrl(code: string): string {
    return `${this.baseUrl}${ENTITLEMENT_ROUTES.giftCode(code)}`;
  }

  async check(code: string, options: CheckOptions = {}): Promise<LookupOutcome> {
    const diagnostic = options.diagnostic ?? false;
    const maxRetries = options.maxRetries ?? this.maxRetries;
    const url = this.lookupUrl(code);

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const isLast = attempt === maxRetries - 1;
      const step = await this.attempt(url, code, { attempt, isLast, diagnostic });

      if (step.done) {
        return step.outcome;
      }

      this.onRetry?.({
        code,
        attempt,
        maxRetries,
        waitSeconds: step.waitSeconds,
        reason: step.reason,
      });
      await this.sleep(step.waitSeconds * 1000);
    }

    return failure(code, Math.max(maxRetries, 0), '❌ Max retries exceeded');
  }

  private async attempt(
    url: string,
    code: string,
    ctx: { attempt: number; isLast: boolean; diagnostic: boolean }
  ): Promise<Step> {
    const attempts = ctx.attempt + 1;
    let response: TransportResponse;

    try {
      response = await this.transport.performGet(url, GIFT_CODE_LOOKUP_QUERY, {
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (!ctx.isLast) {
        return {
          done: false,
          waitSeconds: computeBackoff(
            ctx.attempt,
            LIMITS.NETWORK_BASE_WAIT_SECONDS,
            LIMITS.NETWORK_MAX_WAIT_SECONDS
          ),
          reason: 'network_error',
        };
      }
      const description = err instanceof Error ? err.message : String(err);
      return { done: true, outcome: failure(code, attempts, `❌ Network error: ${description}`) };
    }

    switch (response.status) {
      case 200:
        return { done: true, outcome: interpretGiftCode(code, response.body, attempts, ctx.diagnostic) };
      case 404:
        return {
          done: true,
          outcome: {
            ...baseOutcome(code, attempts),
            kind: 'INVALID',
            marker: '⚠️',
            message: '⚠️ Code is INVALID (Unknown Gift Code)',
          },
        };
      case 429: {
        if (!ctx.isLast) {
          const retryAfter = parseRetryAfter(
            response.headers['retry-after'],
            LIMITS.RATE_LIMIT_DEFAULT_WAIT_SECONDS
          );
          return {
            done: false,
            waitSeconds: computeBackoff(ctx.attempt, retryAfter, LIMITS.RATE_LIMIT_MAX_WAIT_SECONDS),
            reason: 'rate_limited',
          };
        }
        return {
          done: true,
          outcome: {
            ...baseOutcome(code, attempts),
            kind: 'RATE_LIMITED',
            marker: '⏳',
            message: '⏳ Rate limited - Try again later or increase delay',
          },
        };
      }
      default: {
        const parsed = apiErrorBodySchema.safeParse(response.body);
        const message = parsed.success ? parsed.data.message ?? 'Unknown error' : 'Unknown error';
        return { done: true, outcome: failure(code, attempts, `❌ Error checking code: ${message}`) };
      }
    }
  }
}

function baseOutcome(code: string, attempts: number): Omit<LookupOutcome, 'kind' | 'marker' | 'message'> {
  return {
    code,
    valid: false,
    plan: null,
    uses: 0,
    maxUses: 1,
    attempts,
  };
}

function failure(code: string, attempts: number, message: string): LookupOutcome {
  return { ...baseOutcome(code, attempts), kind: 'ERROR', marker: '❌', message };
}

/**
 * Classifies a 200 body. A code is claimed once redeemed or out of uses;
 * missing counters default to 0 uses out of 1.
 */
export function interpretGiftCode(
  code: string,
  body: unknown,
  attempts: number,
  diagnostic: boolean
): LookupOutcome {
  const parsed = giftCodeResponseSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ...failure(code, attempts, '❌ Error checking code: Unexpected response body'),
      ...(diagnostic ? { raw: body } : {}),
    };
  }

  const data = parsed.data;
  const uses = data.uses ?? 0;
  const maxUses = data.max_uses ?? 1;
  const plan = data.subscription_plan?.name ?? 'Unknown';
  const claimed = data.redeemed === true || uses >= maxUses;
  const kind = claimed ? 'CLAIMED' : 'CLAIMABLE';
  const marker = claimed ? '❌' : '✅';
  const usage = uses > 0 || maxUses > 1 ? ` (Uses: ${String(uses)}/${String(maxUses)})` : '';

  return {
    code,
    kind,
    valid: true,
    marker,
    message: `${marker} Code is ${kind} - ${plan}${usage}`,
    plan,
    uses,
    maxUses,
    attempts,
    ...(diagnostic ? { raw: body } : {}),
  };
}
