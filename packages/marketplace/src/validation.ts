import { SoulRelayError, SoulRelayErrorCode } from '@soulrelay/types';

export const DEFAULT_MAX_PRICE = 1_000_000_000;

const CATEGORY = /^[A-Za-z0-9._-]{1,64}$/;
const PRICE_TEXT = /^(?:0|[1-9]\d*)(?:\.\d{1,8})?$/;

export function isValidCategory(category: string): boolean {
  return CATEGORY.test(category);
}

/**
 * A price is a positive finite amount with at most 8 fractional digits,
 * not above `maxPrice`.
 */
export function isValidPrice(price: number, maxPrice: number = DEFAULT_MAX_PRICE): boolean {
  return (
    Number.isFinite(price) &&
    price > 0 &&
    price <= maxPrice &&
    Number(price.toFixed(8)) === price
  );
}

/**
 * @throws {SoulRelayError} INVALID_CATEGORY
 */
export function assertCategory(category: string): void {
  if (!isValidCategory(category)) {
    throw new SoulRelayError(
      SoulRelayErrorCode.INVALID_CATEGORY,
      `Invalid category "${category}"`,
      { hint: 'Categories are 1-64 characters of letters, digits, ".", "_" or "-".' },
    );
  }
}

/**
 * @throws {SoulRelayError} INVALID_PRICE
 */
export function assertPrice(price: number, maxPrice: number = DEFAULT_MAX_PRICE): void {
  if (!isValidPrice(price, maxPrice)) {
    throw new SoulRelayError(
      SoulRelayErrorCode.INVALID_PRICE,
      `Invalid price ${String(price)}`,
      { hint: `Prices are positive, at most ${maxPrice}, with up to 8 decimal places.` },
    );
  }
}

/**
 * Parse a wire price such as `12` or `0.25`. Exponents, signs and leading
 * zeros are refused.
 *
 * @throws {SoulRelayError} INVALID_PRICE
 */
export function parsePrice(text: string, maxPrice: number = DEFAULT_MAX_PRICE): number {
  const price = PRICE_TEXT.test(text) ? Number(text) : Number.NaN;
  assertPrice(price, maxPrice);
  return price;
}

/** Render a price without exponent notation or trailing zeros. */
export function formatPrice(price: number): string {
  return price.toFixed(8).replace(/\.?0+$/, '');
}
