/**
 * giftcheck Branding Constants
 *
 * Shared branding assets used in CLI help output and report headers.
 */

/**
 * Application name (lowercase)
 */
export const APP_NAME = 'giftcheck';

/** Platform whose gift codes are looked up */
export const PLATFORM_NAME = 'Discord';

export const BRAND_ACCENT_HEX = '#5865f2';
export const WORDMARK_SPLIT_COL = 16;

export interface WordmarkLine {
  accent: string;
  base: string;
}

/**
 * ASCII art wordmark for giftcheck
 * Printed above the CLI help output. "gift" is drawn in the accent colour.
 *
 * @example
 * ```ts
 * console.log(ASCII_WORDMARK)
 * ```
 */
export const ASCII_WORDMARK = [
  '       _  __ _       _               _    ',
  '  __ _(_)/ _| |_ ___| |__   ___  ___| | __',
  ' / _` | | |_| __/ __| \'_ \\ / _ \\/ __| |/ /',
  '| (_| | |  _| || (__| | | |  __/ (__|   < ',
  ' \\__, |_|_|  \\__\\___|_| |_|\\___|\\___|_|\\_\\',
  ' |___/                                    ',
].join('\n');

export function splitWordmarkLines(
  wordmark: string = ASCII_WORDMARK,
  splitCol: number = WORDMARK_SPLIT_COL
): WordmarkLine[] {
  return wordmark.split('\n').map((line) => ({
    accent: line.slice(0, splitCol),
    base: line.slice(splitCol),
  }));
}

/**
 * Core proposition copy
 */
export const TAGLINE = 'Check gift codes without claiming them.';
