import type { Command } from 'commander';
import { LIMITS } from '@giftcheck/shared';
import { sleep, type LookupOutcome } from '../api/index.js';
import { createCommandContext } from '../config/index.js';
import { extractGiftCode } from '../extract.js';
import { displayOutcome } from '../session.js';
import { exitWithValidationError, header, output, warn, type OutputOptions } from '../utils.js';
import { createLookupClient, parseBoundedIntOption, runCommandAction } from './_runtime/index.js';

interface CheckCommandOptions extends OutputOptions {
  debug?: boolean;
  maxRetries?: string;
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check gift codes or gift links without claiming them')
    .argument('<input...>', 'Gift codes or gift links')
    .option('-d, --debug', 'Include the raw API response')
    .option('-r, --max-retries <n>', `Attempts per code (1-${String(LIMITS.MAX_RETRIES_MAX)})`)
    .option('--json', 'Output as JSON')
    .addHelpText('after', `

Examples:
  Check a bare code:
    $ giftcheck check AbCdEfGhIjKlMnOpQrSt

  Check a gift link:
    $ giftcheck check https://discord.gift/AbCdEfGhIjKlMnOpQrSt

  Show the raw API response:
    $ giftcheck check AbCdEfGhIjKlMnOpQrSt --debug

  Output as JSON:
    $ giftcheck check AbCdEfGhIjKlMnOpQrSt --json
  `)
    .action(async (inputs: string[], options: CheckCommandOptions) => {
      await runCommandAction(options, () => runCheck(inputs, options));
    });
}

async function runCheck(inputs: string[], options: CheckCommandOptions): Promise<void> {
  const maxRetries = parseBoundedIntOption({
    value: options.maxRetries,
    defaultValue: LIMITS.MAX_RETRIES_DEFAULT,
    min: 1,
    max: LIMITS.MAX_RETRIES_MAX,
    optionName: '--max-retries',
    options,
  });

  const codes: string[] = [];
  const malformed: string[] = [];
  for (const input of inputs) {
    const code = extractGiftCode(input);
    if (code != null) {
      codes.push(code);
    } else {
      malformed.push(input);
    }
  }

  if (codes.length === 0) {
    exitWithValidationError({
      message: 'Invalid format. Please enter a valid promo code or gift URL.',
      options,
    });
  }

  const debug = options.debug === true;
  const { settings } = createCommandContext(
    options.maxRetries != null ? { maxRetries } : {}
  );
  const client = createLookupClient(settings, { verbose: debug && options.json !== true });

  if (options.json !== true) {
    for (const input of malformed) {
      warn(`Skipping "${input}": no recognizable code`);
    }
  }

  const results: LookupOutcome[] = [];
  for (const [i, code] of codes.entries()) {
    if (i > 0) {
      await sleep(LIMITS.INTERACTIVE_PAUSE_MS);
    }
    results.push(await client.check(code, { diagnostic: debug }));
  }

  output({
    data: { results, malformed },
    options,
    formatter: (data) => {
      for (const result of data.results) {
        header(`Checking code: ${result.code}`);
        displayOutcome(result);
      }
    },
  });
}
