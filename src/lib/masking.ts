/**
 * Helpers for putting sensitive values into log lines without leaking them
 */

/**
 * Mask a card number down to its last four characters
 */
export function maskCardNumber(cardNumber: string): string {
  if (cardNumber.length < 4) {
    return '****';
  }
  return `****${cardNumber.slice(-4)}`;
}

/**
 * Shorten a hex string for display, keeping the first `chars` characters
 */
export function previewHex(hex: string, chars = 40): string {
  if (hex.length <= chars) {
    return hex;
  }
  return `${hex.slice(0, chars)}...`;
}
