import type { Command } from 'commander';
import { LIMITS } from '@giftcheck/shared';
import { createCommandContext } from '../config/index.js';
import { InteractiveSession } from '../session.js';
import { info, success, type OutputOptions } from '../utils.js';
import {
  createLookupClient,
  createPrompter,
  parseBoundedIntOption,
  runCommandAction,
  type Prompter,
} from './_runtime/index.js';

interface InteractiveCommandOptions extends OutputOptions {
  debug?: boolean;
  maxRetries?: string;
}

export interface InteractiveRequest {
  debug?: boolean;
  maxRetries?: number;
  /** Reuse an open prompter; one is created and closed otherwise */
  prompter?: Prompter;
}

export function registerInteractiveCommand(program: Command): void {
  program
    .command('interactive')
    .alias('i')
    .description('Check codes one at a time from a prompt')
    .option('-d, --debug', 'Start with debug mode on (raw API responses)')
    .option('-r, --max-retries <n>', `Attempts per code (1-${String(LIMITS.MAX_RETRIES_MAX)})`)
    .addHelpText('after', `

Examples:
  Start a session:
    $ giftcheck interactive

  Start with raw API responses shown:
    $ giftcheck i --debug

Inside the session, type "debug" to toggle debug mode and "quit" to leave.
  `)
    .action(async (options: InteractiveCommandOptions) => {
      await runCommandAction(options, async () => {
        const maxRetries = parseBoundedIntOption({
          value: options.maxRetries,
          defaultValue: LIMITS.MAX_RETRIES_DEFAULT,
          min: 1,
          max: LIMITS.MAX_RETRIES_MAX,
          optionName: '--max-retries',
          options,
        });
        await runInteractive({
          debug: options.debug === true,
          ...(options.maxRetries != null ? { maxRetries } : {}),
        });
      });
    });
}

export async function runInteractive(request: InteractiveRequest = {}): Promise<number> {
  const { settings } = createCommandContext(
    request.maxRetries != null ? { maxRetries: request.maxRetries } : {}
  );

  info('This tool checks promo/gift codes WITHOUT claiming them.');
  info("Type 'debug' to toggle debug mode, 'quit' to exit.");
  info('The API may not always report claimed status accurately. If a code shows');
  info("as CLAIMABLE but is claimed, turn on debug mode to see the raw API response.");
  console.log();

  const prompter = request.prompter ?? createPrompter();
  let session: InteractiveSession | undefined;
  const client = createLookupClient(settings, {
    verbose: () => session?.diagnosticEnabled === true,
  });
  session = new InteractiveSession({
    client,
    ask: (question) => prompter.ask(question),
    diagnostic: request.debug === true,
  });

  try {
    const lookups = await session.run();
    success(`Checked ${String(lookups)} code${lookups === 1 ? '' : 's'}.`);
    return lookups;
  } finally {
    if (request.prompter == null) {
      prompter.close();
    }
  }
}
