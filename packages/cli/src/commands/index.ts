import type { Command } from 'commander';
import { registerBatchCommand } from './batch.js';
import { registerCheckCommand } from './check.js';
import { registerConfigCommand } from './config.js';
import { registerInteractiveCommand } from './interactive.js';

export function registerAllCommands(program: Command): void {
  registerCheckCommand(program);
  registerBatchCommand(program);
  registerInteractiveCommand(program);
  registerConfigCommand(program);
}

export { runMenu, parseMenuChoice, type MenuChoice } from './menu.js';
export {
  executeBatch,
  formatCheckingPrefix,
  formatOutcomeStatus,
  type BatchRequest,
  type BatchResult,
} from './batch.js';
export { runInteractive, type InteractiveRequest } from './interactive.js';
