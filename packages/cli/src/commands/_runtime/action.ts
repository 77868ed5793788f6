import { ConfigError, InputFileError } from '../../errors.js';
import { handleError, type OutputOptions } from '../../utils.js';

function hintFor(err: unknown): string | undefined {
  if (err instanceof ConfigError) {
    return 'Fix the value or run "giftcheck config set <key> <value>".';
  }
  if (err instanceof InputFileError) {
    return 'Pass a text file with one code or gift link per line, or "-" to read from stdin.';
  }
  return undefined;
}

export async function runCommandAction(
  options: OutputOptions,
  fn: () => void | Promise<void>
): Promise<void> {
  try {
    await fn();
  } catch (err) {
    handleError(err, options, hintFor(err));
  }
}
