export { runCommandAction } from './action.js';
export {
  parseBoundedIntOption,
  parseDelayValue,
  type ParseBoundedIntOptions,
  type ParsedDelay,
} from './options.js';
export { createLookupClient, describeRetry, type LookupClientOptions } from './client.js';
export { createPrompter, type Prompter } from './prompt.js';
