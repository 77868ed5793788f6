/**
 * Gift code extraction from pasted text.
 */
import { BARE_CODE_PATTERN, GIFT_LINK_PATTERNS } from '@giftcheck/shared';

/**
 * Extract a gift code from a gift link or a bare code.
 * Link patterns are tried first, in order; the first match wins.
 * Returns null when the text holds no recognizable code.
 */
export function extractGiftCode(text: string): string | null {
  for (const pattern of GIFT_LINK_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] != null) {
      return match[1];
    }
  }

  const trimmed = text.trim();
  if (BARE_CODE_PATTERN.test(trimmed)) {
    return trimmed;
  }

  return null;
}
