import { LIMITS } from '@giftcheck/shared';
import { exitWithValidationError, type OutputOptions } from '../../utils.js';

export interface ParseBoundedIntOptions<TOptions extends OutputOptions> {
  value: string | undefined;
  defaultValue: number;
  min: number;
  max: number;
  optionName: string;
  options: TOptions;
}

export function parseBoundedIntOption<TOptions extends OutputOptions>(
  opts: ParseBoundedIntOptions<TOptions>
): number {
  if (opts.value == null) {
    return opts.defaultValue;
  }

  const parsed = Number(opts.value);

  if (!Number.isInteger(parsed)) {
    exitWithValidationError({
      message: `${opts.optionName} must be a valid integer`,
      options: opts.options,
    });
  }

  if (parsed < opts.min || parsed > opts.max) {
    exitWithValidationError({
      message: `${opts.optionName} must be between ${String(opts.min)} and ${String(opts.max)}`,
      options: opts.options,
    });
  }

  return parsed;
}

export interface ParsedDelay {
  delay: number;
  /** Set when the input was replaced or clamped */
  warning: string | null;
}

/**
 * Parse a delay in seconds. Bad input falls back to the default and values
 * above the maximum are clamped; both come with a warning.
 */
export function parseDelayValue(value: string | undefined, defaultDelay: number): ParsedDelay {
  if (value == null || value.trim() === '') {
    return { delay: defaultDelay, warning: null };
  }

  const parsed = Number(value.trim());
  const max = LIMITS.BATCH_DELAY_MAX_SECONDS;

  if (!Number.isFinite(parsed)) {
    return { delay: defaultDelay, warning: `Invalid delay value, using default: ${String(defaultDelay)} seconds` };
  }
  if (parsed < 0) {
    return { delay: defaultDelay, warning: `Delay cannot be negative, using default: ${String(defaultDelay)} seconds` };
  }
  if (parsed > max) {
    return { delay: max, warning: `Delay too large (max ${String(max)}s), using ${String(max)} seconds` };
  }
  return { delay: parsed, warning: null };
}
