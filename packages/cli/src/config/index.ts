export type {
  CliConfig,
  CommandContext,
  Settings,
  SettingsOverrides,
} from './types.js';

export {
  getGlobalConfigDir,
  getGlobalConfigPath,
  getRepoLocalConfigDir,
  getRepoLocalConfigPath,
  findConfigPath,
} from './paths.js';

export { loadConfigFromPath, saveConfig, setConfigValue } from './store.js';

export { getApiUrl, getDelaySeconds, resolveSettings } from './settings.js';

export { createCommandContext } from './context.js';
