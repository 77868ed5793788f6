import type { Command } from 'commander';
import { CONFIG_KEYS, type ConfigKey } from '@giftcheck/shared';
import {
  createCommandContext,
  getDelaySeconds,
  getGlobalConfigDir,
  getRepoLocalConfigDir,
  setConfigValue,
  type CliConfig,
} from '../config/index.js';
import { ConfigError } from '../errors.js';
import {
  exitWithValidationError,
  formatSeconds,
  header,
  keyValue,
  output,
  success,
  warn,
  type OutputOptions,
} from '../utils.js';
import { runCommandAction } from './_runtime/index.js';

type ConfigShowOptions = OutputOptions;

interface ConfigSetOptions extends OutputOptions {
  local?: boolean;
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show or change CLI settings')
    .addHelpText('after', `

Examples:
  Show resolved settings:
    $ giftcheck config

  Raise the default batch delay:
    $ giftcheck config set delaySeconds 4

  Write to ./.giftcheck/config.json instead of the global file:
    $ giftcheck config set outputDir ./reports --local

Keys: ${CONFIG_KEYS.join(', ')}
  `);

  config
    .command('show', { isDefault: true })
    .description('Show resolved settings and where they come from')
    .option('--json', 'Output as JSON')
    .action(async (options: ConfigShowOptions) => {
      await runCommandAction(options, () => {
        runConfigShow(options);
      });
    });

  config
    .command('set')
    .description('Set a value in the config file')
    .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
    .argument('<value>', 'New value')
    .option('--local', 'Write the repo-local config (./.giftcheck/config.json)')
    .option('--json', 'Output as JSON')
    .action(async (key: string, value: string, options: ConfigSetOptions) => {
      await runCommandAction(options, () => {
        runConfigSet(key, value, options);
      });
    });
}

/** The batch delay, or null (with a warning) when GIFTCHECK_DELAY is unusable */
function readBatchDelay(config: CliConfig, options: ConfigShowOptions): number | null {
  try {
    return getDelaySeconds(config);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    if (options.json !== true) warn(err.message);
    return null;
  }
}

function runConfigShow(options: ConfigShowOptions): void {
  const { configPath, config, settings } = createCommandContext();
  const delaySeconds = readBatchDelay(config, options);

  output({
    data: { configPath, config, settings: { ...settings, delaySeconds } },
    options,
    formatter: (data) => {
      header('Settings');
      keyValue('API URL', data.settings.apiUrl);
      const delay = data.settings.delaySeconds;
      keyValue('Batch Delay', delay != null ? formatSeconds(delay) : '(invalid)');
      keyValue('Max Retries', String(data.settings.maxRetries));
      keyValue('Timeout', `${String(data.settings.timeoutMs)}ms`);
      keyValue('Output Dir', data.settings.outputDir);

      header('Configuration Locations');
      keyValue('Config File', data.configPath ?? '(not found)');
      keyValue('Global Config', getGlobalConfigDir());
      keyValue('Repo-Local Config', getRepoLocalConfigDir());
    },
  });
}

function runConfigSet(key: string, value: string, options: ConfigSetOptions): void {
  if (!isConfigKey(key)) {
    exitWithValidationError({
      message: `Unknown config key "${key}"`,
      options,
      helpText: `Valid keys: ${CONFIG_KEYS.join(', ')}`,
    });
  }

  const configPath = setConfigValue(key, value, options.local === true);

  output({
    data: { key, value, configPath },
    options,
    formatter: (data) => {
      success(`Set ${data.key} in ${data.configPath}`);
    },
  });
}
