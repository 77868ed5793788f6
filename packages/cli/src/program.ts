import { Command } from 'commander';
import { TAGLINE } from '@giftcheck/shared';
import { renderAsciiWordmark } from './utils.js';
import { registerAllCommands, runMenu } from './commands/index.js';
import { runCommandAction } from './commands/_runtime/index.js';

export const VERSION = '0.1.0';

/**
 * Build the CLI program. `configure` runs before any command is added, so
 * settings such as exitOverride reach every subcommand.
 */
export function createProgram(configure?: (program: Command) => void): Command {
  const program = new Command();
  configure?.(program);

  program
    .name('giftcheck')
    .description(`Command-line gift code checker - ${TAGLINE}`)
    .version(VERSION)
    .allowExcessArguments(false)
    .addHelpText('beforeAll', renderAsciiWordmark() + '\n')
    .addHelpText('after', `

Examples:
  Pick a mode from a menu:
    $ giftcheck

  Check a single code or gift link:
    $ giftcheck check https://discord.gift/AbCdEfGhIjKlMnOpQrSt

  Check a list of codes with a 3 second pause:
    $ giftcheck batch codes.txt --delay 3

  Check codes one by one at a prompt:
    $ giftcheck interactive
  `)
    .action(async () => {
      await runCommandAction({}, () => runMenu());
    });

  registerAllCommands(program);

  return program;
}
