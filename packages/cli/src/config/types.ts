/**
 * CLI configuration types.
 */
import type { CliConfigFile } from '@giftcheck/shared';

/** Contents of config.json */
export type CliConfig = CliConfigFile;

/** Fully resolved settings a command runs with */
export interface Settings {
  apiUrl: string;
  maxRetries: number;
  timeoutMs: number;
  outputDir: string;
}

/** Values given on the command line; they win over env and file */
export interface SettingsOverrides {
  maxRetries?: number;
}

export interface CommandContext {
  configPath: string | null;
  config: CliConfig;
  settings: Settings;
}
