import type { Command } from 'commander';
import { LIMITS } from '@giftcheck/shared';
import type { LookupOutcome } from '../api/index.js';
import {
  BatchRunner,
  OUTCOME_CATEGORIES,
  loadCodeList,
  resolveReportPath,
  summarizeReport,
  writeReport,
  type BatchCheckEvent,
  type BatchReport,
  type BatchSummary,
  type MalformedLine,
  type OutcomeCategory,
} from '../batch/index.js';
import { createCommandContext, getDelaySeconds } from '../config/index.js';
import {
  exitWithValidationError,
  formatSeconds,
  header,
  info,
  keyValue,
  output,
  success,
  warn,
  type OutputOptions,
} from '../utils.js';
import {
  createLookupClient,
  parseBoundedIntOption,
  parseDelayValue,
  runCommandAction,
} from './_runtime/index.js';

interface BatchCommandOptions extends OutputOptions {
  delay?: string;
  output?: string;
  save?: boolean;
  maxRetries?: string;
}

export interface BatchRequest extends OutputOptions {
  /** File path, or "-" for stdin */
  source: string;
  /** Raw delay input; empty or missing means the configured default */
  delay?: string;
  output?: string;
  save?: boolean;
  maxRetries?: number;
}

export interface BatchResult {
  report: BatchReport;
  summary: BatchSummary;
  malformed: MalformedLine[];
  reportPath: string | null;
}

const SUMMARY_LABELS: Record<OutcomeCategory, string> = {
  claimable: '✅ Claimable',
  claimed: '❌ Claimed',
  invalid: '⚠️ Invalid',
  rate_limited: '⏳ Rate Limited',
  error: '❌ Errors',
};

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Check every code listed in a file and write a report')
    .argument('<file>', 'Text file with one code or gift link per line ("-" reads stdin)')
    .option('--delay <seconds>', `Pause between checks (0-${String(LIMITS.BATCH_DELAY_MAX_SECONDS)})`)
    .option('-o, --output <file>', 'Report file (default: results_<timestamp>.txt)')
    .option('--no-save', 'Do not write a report file')
    .option('-r, --max-retries <n>', `Attempts per code (1-${String(LIMITS.MAX_RETRIES_MAX)})`)
    .option('--json', 'Output as JSON')
    .addHelpText('after', `

Examples:
  Check codes from a file:
    $ giftcheck batch codes.txt

  Slow down to avoid rate limits:
    $ giftcheck batch codes.txt --delay 4

  Choose the report file:
    $ giftcheck batch codes.txt --output report.txt

  Read codes from stdin, print JSON, skip the report file:
    $ cat codes.txt | giftcheck batch - --json --no-save

Lines that are blank or start with # are ignored.
  `)
    .action(async (file: string, options: BatchCommandOptions) => {
      await runCommandAction(options, async () => {
        const maxRetries = parseBoundedIntOption({
          value: options.maxRetries,
          defaultValue: LIMITS.MAX_RETRIES_DEFAULT,
          min: 1,
          max: LIMITS.MAX_RETRIES_MAX,
          optionName: '--max-retries',
          options,
        });
        await executeBatch({
          source: file,
          ...(options.delay != null ? { delay: options.delay } : {}),
          ...(options.output != null ? { output: options.output } : {}),
          ...(options.save != null ? { save: options.save } : {}),
          ...(options.maxRetries != null ? { maxRetries } : {}),
          ...(options.json != null ? { json: options.json } : {}),
        });
      });
    });
}

/**
 * Start of a progress line, written before the lookup: "[2/5] Checking: <code>... "
 */
export function formatCheckingPrefix(event: BatchCheckEvent): string {
  return `[${String(event.index)}/${String(event.total)}] Checking: ${event.code}... `;
}

/** Rest of the progress line once the outcome is known */
export function formatOutcomeStatus(outcome: LookupOutcome): string {
  switch (outcome.kind) {
    case 'CLAIMABLE':
    case 'CLAIMED':
      return `${outcome.marker} ${outcome.kind} - ${outcome.plan ?? 'Unknown'}`;
    case 'INVALID':
      return '⚠️ INVALID';
    case 'RATE_LIMITED':
      return '⏳ RATE LIMITED';
    case 'ERROR':
      return '❌ ERROR';
  }
}

/**
 * Run a batch from a file or stdin: read, check, summarize and save.
 */
export async function executeBatch(request: BatchRequest): Promise<BatchResult> {
  const json = request.json === true;
  const { config, settings } = createCommandContext(
    request.maxRetries != null ? { maxRetries: request.maxRetries } : {}
  );

  const { delay, warning } = parseDelayValue(request.delay, getDelaySeconds(config));
  if (warning != null && !json) {
    warn(warning);
  }

  const { codes, malformed } = await loadCodeList(request.source);

  if (!json) {
    for (const line of malformed) {
      warn(`Line ${String(line.line)}: no recognizable code in "${line.text}"`);
    }
  }

  if (codes.length === 0) {
    exitWithValidationError({
      message: 'No valid codes found in the file!',
      options: { json },
    });
  }

  if (!json) {
    header(`Bulk Code Check - Found ${String(codes.length)} codes`);
    info(`Delay between checks: ${formatSeconds(delay)}`);
    console.log();
  }

  const client = createLookupClient(settings);
  const runner = new BatchRunner(client, {
    onCheckStart: (event) => {
      if (!json) process.stdout.write(formatCheckingPrefix(event));
    },
    onProgress: (event) => {
      if (!json) console.log(formatOutcomeStatus(event.outcome));
    },
  });

  const report = await runner.run(codes, delay);
  const summary = summarizeReport(report);

  let reportPath: string | null = null;
  if (request.save !== false) {
    const now = new Date();
    reportPath = resolveReportPath(request.output, settings.outputDir, now);
    writeReport(report, reportPath, now);
  }

  const result: BatchResult = { report, summary, malformed, reportPath };

  output({
    data: result,
    options: { json },
    formatter: (data) => {
      header('Summary');
      for (const category of OUTCOME_CATEGORIES) {
        keyValue(SUMMARY_LABELS[category], String(data.summary.counts[category]));
      }
      if (data.summary.hint != null) {
        console.log();
        console.log(data.summary.hint);
      }
      if (data.reportPath != null) {
        console.log();
        success(`Results saved to: ${data.reportPath}`);
      }
    },
  });

  return result;
}
