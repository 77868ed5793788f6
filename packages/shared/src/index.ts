// Limits, code patterns and timing constants.
// Example: import { LIMITS, GIFT_LINK_PATTERNS } from '@giftcheck/shared';
export {
  LIMITS,
  CODE_LENGTH,
  GIFT_LINK_PATTERNS,
  BARE_CODE_PATTERN,
  // URL constants
  URLS,
  // Branding constants
  APP_NAME,
  PLATFORM_NAME,
  ASCII_WORDMARK,
  BRAND_ACCENT_HEX,
  splitWordmarkLines,
  TAGLINE,
  WORDMARK_SPLIT_COL,
} from './constants/index.js';
export type { WordmarkLine } from './constants/index.js';

// Route path builders for the entitlement API.
// Example: import { ENTITLEMENT_ROUTES } from '@giftcheck/shared';
export {
  ENTITLEMENT_ROUTES,
  GIFT_CODE_LOOKUP_QUERY,
} from './routes/index.js';

// Zod schemas for remote bodies and the config file.
// Example: import { giftCodeResponseSchema } from '@giftcheck/shared';
export {
  giftCodeResponseSchema,
  apiErrorBodySchema,
  cliConfigSchema,
  CONFIG_KEYS,
} from './schemas/index.js';
export type {
  GiftCodeResponse,
  ApiErrorBody,
  CliConfigFile,
  ConfigKey,
} from './schemas/index.js';
