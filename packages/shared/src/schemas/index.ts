import { z } from 'zod';

// Response bodies of the entitlement API. Only the fields the CLI reads are
// declared; everything else passes through untouched for diagnostic output.

/**
 * Body of a 200 gift-code lookup.
 *
 * @example
 * ```typescript
 * import { giftCodeResponseSchema } from '@giftcheck/shared';
 * giftCodeResponseSchema.parse({ redeemed: false, uses: 0, max_uses: 1 }); // OK
 * ```
 */
export const giftCodeResponseSchema = z
  .object({
    code: z.string().optional(),
    redeemed: z.boolean().optional(),
    uses: z.number().int().nonnegative().optional(),
    max_uses: z.number().int().optional(),
    expires_at: z.string().nullable().optional(),
    subscription_plan: z
      .object({
        id: z.string().optional(),
        name: z.string().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export type GiftCodeResponse = z.infer<typeof giftCodeResponseSchema>;

/**
 * Body of an error response (any non-2xx status).
 */
export const apiErrorBodySchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    retry_after: z.number().optional(),
  })
  .passthrough();

export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;

/**
 * CLI configuration file (`config.json`).
 *
 * @example
 * ```typescript
 * import { cliConfigSchema } from '@giftcheck/shared';
 * cliConfigSchema.parse({ delaySeconds: 3 }); // OK
 * cliConfigSchema.parse({ delaySeconds: -1 }); // throws
 * ```
 */
export const cliConfigSchema = z
  .object({
    apiUrl: z.string().url().optional(),
    delaySeconds: z.number().min(0).max(60).optional(),
    maxRetries: z.number().int().min(1).max(10).optional(),
    timeoutMs: z.number().int().positive().optional(),
    outputDir: z.string().min(1).optional(),
  })
  .strict();

export type CliConfigFile = z.infer<typeof cliConfigSchema>;

/** Keys accepted by `giftcheck config set` */
export const CONFIG_KEYS = cliConfigSchema.keyof().options;
export type ConfigKey = (typeof CONFIG_KEYS)[number];
