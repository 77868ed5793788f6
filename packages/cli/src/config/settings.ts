/**
 * Settings resolution: flags > environment > config file > defaults.
 * Only maxRetries has a flag.
 */
import * as path from 'node:path';
import { LIMITS, URLS } from '@giftcheck/shared';
import { ConfigError } from '../errors.js';
import type { CliConfig, Settings, SettingsOverrides } from './types.js';

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value != null && value !== '' ? value : undefined;
}

/**
 * Get API URL from environment or config
 */
export function getApiUrl(config: CliConfig): string {
  return (readEnv('GIFTCHECK_API_URL') ?? config.apiUrl ?? URLS.API).replace(/\/$/, '');
}

/**
 * Get the batch delay from environment or config. Read only by batch runs.
 */
export function getDelaySeconds(config: CliConfig): number {
  const raw = readEnv('GIFTCHECK_DELAY');
  if (raw == null) {
    return config.delaySeconds ?? LIMITS.BATCH_DELAY_DEFAULT_SECONDS;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > LIMITS.BATCH_DELAY_MAX_SECONDS) {
    throw new ConfigError(
      'GIFTCHECK_DELAY',
      `expected a number of seconds between 0 and ${String(LIMITS.BATCH_DELAY_MAX_SECONDS)}`
    );
  }
  return parsed;
}

export function resolveSettings(config: CliConfig, overrides: SettingsOverrides = {}): Settings {
  return {
    apiUrl: getApiUrl(config),
    maxRetries: overrides.maxRetries ?? config.maxRetries ?? LIMITS.MAX_RETRIES_DEFAULT,
    timeoutMs: config.timeoutMs ?? LIMITS.REQUEST_TIMEOUT_MS,
    outputDir: path.resolve(config.outputDir ?? process.cwd()),
  };
}
