/**
 * Console output for the CLI. Status lines, key/value rows, JSON output and
 * fatal errors all go through these helpers.
 */
import chalk from 'chalk';
import { text } from 'node:stream/consumers';
import { BRAND_ACCENT_HEX, splitWordmarkLines } from '@giftcheck/shared';

export interface OutputOptions {
  json?: boolean;
}

type StatusKind = 'success' | 'error' | 'warn' | 'info';

// error goes to stderr; everything else to stdout
const STATUS_MARKS: Record<StatusKind, { symbol: string; toStderr: boolean }> = {
  success: { symbol: chalk.green('✓'), toStderr: false },
  error: { symbol: chalk.red('✗'), toStderr: true },
  warn: { symbol: chalk.yellow('⚠'), toStderr: false },
  info: { symbol: chalk.cyan('ℹ'), toStderr: false },
};

function status(kind: StatusKind, message: string): void {
  const mark = STATUS_MARKS[kind];
  if (mark.toStderr) {
    console.error(mark.symbol, message);
  } else {
    console.log(mark.symbol, message);
  }
}

export const success = (message: string): void => status('success', message);
export const error = (message: string): void => status('error', message);
export const warn = (message: string): void => status('warn', message);
export const info = (message: string): void => status('info', message);

export function renderAsciiWordmark(): string {
  const accent = chalk.hex(BRAND_ACCENT_HEX);
  return splitWordmarkLines()
    .map((line) => accent(line.accent) + chalk.white(line.base))
    .join('\n');
}

/** Indented "Key: value" row */
export function keyValue(key: string, value: string): void {
  console.log(`  ${chalk.gray(`${key}:`)} ${value}`);
}

/** Blank line, bold title, then a rule as wide as the title */
export function header(title: string): void {
  for (const line of ['', chalk.bold(title), chalk.gray('─'.repeat(title.length))]) {
    console.log(line);
  }
}

/**
 * Print `data` as pretty JSON under --json, otherwise hand it to `formatter`.
 */
export function output<T>(opts: { data: T; options: OutputOptions; formatter: (data: T) => void }): void {
  if (opts.options.json !== true) {
    opts.formatter(opts.data);
    return;
  }
  console.log(JSON.stringify(opts.data, null, 2));
}

/** Single-line JSON error on stderr; prints nothing outside --json */
function outputError(body: Record<string, unknown>, options: OutputOptions): void {
  if (options.json === true) {
    console.error(JSON.stringify(body));
  }
}

function fail(message: string, options: OutputOptions, hint?: string): never {
  if (options.json === true) {
    outputError({ error: message }, options);
  } else {
    error(message);
    if (hint != null && hint !== '') info(hint);
  }
  process.exit(1);
}

/**
 * Report bad user input and exit 1.
 */
export function exitWithValidationError(opts: {
  message: string;
  options: OutputOptions;
  helpText?: string;
}): never {
  fail(opts.message, opts.options, opts.helpText);
}

/**
 * Report an error raised by a command and exit 1. The hint is shown only for
 * Error instances and only outside --json.
 */
export function handleError(err: unknown, options: OutputOptions, hint?: string): never {
  if (err instanceof Error) {
    fail(err.message, options, hint);
  }
  fail(options.json === true ? 'Unknown error' : 'An unknown error occurred', options);
}

/**
 * Read all of stdin as UTF-8, trimmed.
 */
export async function readStdin(): Promise<string> {
  return (await text(process.stdin)).trim();
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Local "YYYY-MM-DD HH:MM:SS"
 */
export function formatReportTimestamp(date: Date): string {
  const day = [date.getFullYear(), pad2(date.getMonth() + 1), pad2(date.getDate())].join('-');
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad2).join(':');
  return `${day} ${time}`;
}

/**
 * Local "YYYYMMDD_HHMMSS", used in report file names
 */
export function formatCompactTimestamp(date: Date): string {
  return formatReportTimestamp(date).replace(/[-:]/g, '').replace(' ', '_');
}

/** 2.5 -> "2.5s", 3 -> "3s" */
export function formatSeconds(seconds: number): string {
  return `${Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1)}s`;
}
