/**
 * Config load/save operations.
 */
import * as fs from 'node:fs';
import { cliConfigSchema, type ConfigKey } from '@giftcheck/shared';
import { ConfigError } from '../errors.js';
import type { CliConfig } from './types.js';
import {
  getGlobalConfigDir,
  getGlobalConfigPath,
  getRepoLocalConfigDir,
  getRepoLocalConfigPath,
} from './paths.js';

function parseConfig(configPath: string, data: unknown): CliConfig {
  const result = cliConfigSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue != null && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(configPath, `${field}${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}

/**
 * Load config from a specific file path.
 * Returns null when the file does not exist; throws ConfigError when it is invalid.
 */
export function loadConfigFromPath(configPath: string): CliConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : 'not valid JSON');
  }
  return parseConfig(configPath, data);
}

/**
 * Save CLI config to global or repo-local location
 */
export function saveConfig(config: CliConfig, repoLocal = false): string {
  const configPath = repoLocal ? getRepoLocalConfigPath() : getGlobalConfigPath();
  const configDir = repoLocal ? getRepoLocalConfigDir() : getGlobalConfigDir();

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }

  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return configPath;
}

const NUMERIC_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(['delaySeconds', 'maxRetries', 'timeoutMs']);

/**
 * Set one key in the global or repo-local config file, validating the result.
 * Returns the path written.
 */
export function setConfigValue(key: ConfigKey, rawValue: string, repoLocal = false): string {
  const configPath = repoLocal ? getRepoLocalConfigPath() : getGlobalConfigPath();
  const current = loadConfigFromPath(configPath) ?? {};
  const value: string | number = NUMERIC_KEYS.has(key) ? Number(rawValue) : rawValue;
  const next = parseConfig(configPath, { ...current, [key]: value });
  return saveConfig(next, repoLocal);
}
