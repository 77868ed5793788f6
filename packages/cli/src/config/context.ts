/**
 * Command context.
 */
import type { CommandContext, SettingsOverrides } from './types.js';
import { findConfigPath } from './paths.js';
import { loadConfigFromPath } from './store.js';
import { resolveSettings } from './settings.js';

/**
 * Create command context with config and settings resolved.
 */
export function createCommandContext(overrides: SettingsOverrides = {}): CommandContext {
  const configPath = findConfigPath();
  const config = configPath != null ? loadConfigFromPath(configPath) ?? {} : {};
  return { configPath, config, settings: resolveSettings(config, overrides) };
}
