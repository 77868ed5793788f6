/**
 * Interactive lookup session: one code per line until quit or end of input.
 */
import { CODE_LENGTH, LIMITS } from '@giftcheck/shared';
import { sleep as defaultSleep, type GiftCodeLookup, type LookupOutcome } from './api/index.js';
import { extractGiftCode } from './extract.js';
import { header, info, keyValue, warn } from './utils.js';

export const QUIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);
export const DEBUG_COMMAND = 'debug';
export const SESSION_PROMPT = "Enter promo code or URL (or 'quit'): ";

export interface InteractiveSessionOptions {
  client: GiftCodeLookup;
  /** Resolves with the next input line, or null at end of input */
  ask: (prompt: string) => Promise<string | null>;
  sleep?: (ms: number) => Promise<void>;
  diagnostic?: boolean;
  maxRetries?: number;
}

export class InteractiveSession {
  private readonly client: GiftCodeLookup;
  private readonly ask: (prompt: string) => Promise<string | null>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxRetries: number | undefined;
  private diagnostic: boolean;
  private lookups = 0;

  constructor(options: InteractiveSessionOptions) {
    this.client = options.client;
    this.ask = options.ask;
    this.sleep = options.sleep ?? defaultSleep;
    this.diagnostic = options.diagnostic ?? false;
    this.maxRetries = options.maxRetries;
  }

  get diagnosticEnabled(): boolean {
    return this.diagnostic;
  }

  /**
   * Run until quit or end of input. Resolves with the number of lookups made.
   */
  async run(): Promise<number> {
    for (;;) {
      const line = await this.ask(SESSION_PROMPT);
      if (line == null) {
        break;
      }
      if (!(await this.handle(line))) {
        break;
      }
    }
    return this.lookups;
  }

  /**
   * Handle one input line. Resolves false when the session should end.
   */
  async handle(line: string): Promise<boolean> {
    const input = line.trim();
    const command = input.toLowerCase();

    if (QUIT_COMMANDS.has(command)) {
      info('Exiting... Goodbye!');
      return false;
    }

    if (command === DEBUG_COMMAND) {
      this.diagnostic = !this.diagnostic;
      info(`Debug mode ${this.diagnostic ? 'enabled' : 'disabled'}`);
      return true;
    }

    if (input === '') {
      return true;
    }

    const code = extractGiftCode(input);
    if (code == null) {
      warn('Invalid format. Please enter a valid promo code or gift URL.');
      info(
        `Codes are ${String(CODE_LENGTH.min)}-${String(CODE_LENGTH.max)} letters and digits, or a gift link containing one.`
      );
      return true;
    }

    header(`Checking code: ${code}`);
    const outcome = await this.client.check(code, {
      diagnostic: this.diagnostic,
      ...(this.maxRetries != null ? { maxRetries: this.maxRetries } : {}),
    });
    this.lookups++;
    displayOutcome(outcome);
    await this.sleep(LIMITS.INTERACTIVE_PAUSE_MS);
    return true;
  }
}

/**
 * Print one lookup result.
 */
export function displayOutcome(outcome: LookupOutcome): void {
  keyValue('Code', outcome.code);
  keyValue('Status', outcome.message);
  if (outcome.valid && outcome.plan != null) {
    keyValue('Plan', outcome.plan);
  }
  if (outcome.raw !== undefined) {
    keyValue('Raw response', JSON.stringify(outcome.raw, null, 2));
  }
  console.log();
}
