import { APP_NAME } from '@giftcheck/shared';
import { error, header, info } from '../utils.js';
import { createPrompter, type Prompter } from './_runtime/index.js';
import { executeBatch } from './batch.js';
import { runInteractive } from './interactive.js';

export type MenuChoice = 'interactive' | 'batch' | 'invalid';

export function parseMenuChoice(answer: string | null): MenuChoice {
  switch (answer?.trim()) {
    case '1':
      return 'interactive';
    case '2':
      return 'batch';
    default:
      return 'invalid';
  }
}

/**
 * Mode menu shown when the CLI runs without a command.
 */
export async function runMenu(prompter: Prompter = createPrompter()): Promise<void> {
  try {
    header(`${APP_NAME} - Gift Code Checker`);
    console.log('Choose a mode:');
    console.log('  1. Interactive Mode - Check codes one by one');
    console.log('  2. Bulk Mode - Check codes from a text file');
    console.log();

    const choice = parseMenuChoice(await prompter.ask('Enter your choice (1 or 2): '));

    switch (choice) {
      case 'interactive':
        header('Interactive Mode');
        await runInteractive({ prompter });
        return;
      case 'batch': {
        header('Bulk Mode');
        const source = (await prompter.ask('Enter the filename with codes (e.g., codes.txt): '))?.trim() ?? '';
        info('Recommended delay: 2-3 seconds to avoid rate limiting');
        const delay = await prompter.ask('Delay between checks in seconds (leave empty for default): ');
        await executeBatch({ source, ...(delay != null ? { delay } : {}) });
        return;
      }
      case 'invalid':
        error('Invalid choice. Exiting...');
        return;
    }
  } finally {
    prompter.close();
  }
}
