/**
 * Sequential batch lookups with a fixed pause between requests.
 */
import { sleep as defaultSleep } from '../api/backoff.js';
import type { GiftCodeLookup, LookupOutcome, OutcomeKind } from '../api/types.js';

/** Report sections, in report order */
export const OUTCOME_CATEGORIES = ['claimable', 'claimed', 'invalid', 'rate_limited', 'error'] as const;

export type OutcomeCategory = (typeof OUTCOME_CATEGORIES)[number];

/** Outcomes grouped by category, each list in check order */
export type BatchReport = Readonly<Record<OutcomeCategory, readonly LookupOutcome[]>>;

export interface BatchCheckEvent {
  /** 1-based position of the code in the batch */
  index: number;
  total: number;
  code: string;
}

export interface BatchProgressEvent extends BatchCheckEvent {
  outcome: LookupOutcome;
}

export interface BatchRunnerOptions {
  sleep?: (ms: number) => Promise<void>;
  /** Called before each lookup starts */
  onCheckStart?: (event: BatchCheckEvent) => void;
  /** Called after each lookup with its outcome */
  onProgress?: (event: BatchProgressEvent) => void;
}

export interface BatchSummary {
  counts: Record<OutcomeCategory, number>;
  total: number;
  /** Set when any lookup ended rate limited */
  hint: string | null;
}

export const RATE_LIMIT_HINT = '💡 TIP: Increase delay between checks to avoid rate limiting.';

const CATEGORY_BY_KIND: Record<OutcomeKind, OutcomeCategory> = {
  CLAIMABLE: 'claimable',
  CLAIMED: 'claimed',
  INVALID: 'invalid',
  RATE_LIMITED: 'rate_limited',
  ERROR: 'error',
};

export function categoryOf(kind: OutcomeKind): OutcomeCategory {
  return CATEGORY_BY_KIND[kind];
}

export function createEmptyReport(): Record<OutcomeCategory, LookupOutcome[]> {
  return {
    claimable: [],
    claimed: [],
    invalid: [],
    rate_limited: [],
    error: [],
  };
}

export class BatchRunner {
  private readonly client: GiftCodeLookup;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onCheckStart: ((event: BatchCheckEvent) => void) | undefined;
  private readonly onProgress: ((event: BatchProgressEvent) => void) | undefined;

  constructor(client: GiftCodeLookup, options: BatchRunnerOptions = {}) {
    this.client = client;
    this.sleep = options.sleep ?? defaultSleep;
    this.onCheckStart = options.onCheckStart;
    this.onProgress = options.onProgress;
  }

  async run(codes: readonly string[], delaySeconds: number): Promise<BatchReport> {
    const report = createEmptyReport();
    const total = codes.length;

    for (const [i, code] of codes.entries()) {
      const position = { index: i + 1, total, code };
      this.onCheckStart?.(position);
      const outcome = await this.client.check(code, { diagnostic: false });
      report[categoryOf(outcome.kind)].push(outcome);
      this.onProgress?.({ ...position, outcome });

      if (i < total - 1 && delaySeconds > 0) {
        await this.sleep(delaySeconds * 1000);
      }
    }

    return freezeReport(report);
  }
}

function freezeReport(report: Record<OutcomeCategory, LookupOutcome[]>): BatchReport {
  for (const category of OUTCOME_CATEGORIES) {
    Object.freeze(report[category]);
  }
  return Object.freeze(report);
}

export function summarizeReport(report: BatchReport): BatchSummary {
  const counts = createCounts(report);
  const total = OUTCOME_CATEGORIES.reduce((sum, category) => sum + counts[category], 0);
  return {
    counts,
    total,
    hint: counts.rate_limited > 0 ? RATE_LIMIT_HINT : null,
  };
}

function createCounts(report: BatchReport): Record<OutcomeCategory, number> {
  return {
    claimable: report.claimable.length,
    claimed: report.claimed.length,
    invalid: report.invalid.length,
    rate_limited: report.rate_limited.length,
    error: report.error.length,
  };
}
