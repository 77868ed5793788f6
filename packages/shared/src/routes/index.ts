/**
 * API Route Builders
 *
 * Single source of truth for the entitlement routes the CLI calls.
 *
 * Route categories:
 * - ENTITLEMENT_ROUTES: /entitlements/* lookup routes
 *
 * @module routes
 */

export const ENTITLEMENT_ROUTES = {
  giftCode: (code: string) =>
    `/entitlements/gift-codes/${encodeURIComponent(code)}` as const,
} as const;

/**
 * Query flags sent with every gift-code lookup: include the subscription
 * plan, leave out the application object.
 */
export const GIFT_CODE_LOOKUP_QUERY = {
  with_application: 'false',
  with_subscription_plan: 'true',
} as const;

