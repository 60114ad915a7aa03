import { InvalidPriceError } from "../utils/errors";

/**
 * Convert a volatility reading into a USD trade notional.
 *
 * sizeFactor = max(minUsd / scaleFactor, volatility / referencePrice)
 * notional   = scaleFactor * sizeFactor
 *
 * When the floor wins, `minUsd` is returned as-is so that a zero-volatility
 * reading sizes to exactly the minimum trade.
 */
export function tradeNotional(
  volatility: number,
  referencePrice: number,
  minUsd: number,
  scaleFactor: number
): number {
  if (!Number.isFinite(referencePrice) || referencePrice <= 0) {
    throw new InvalidPriceError("reference", "sizer", referencePrice);
  }
  if (scaleFactor <= 0) {
    throw new RangeError(`Scale factor must be positive, got ${scaleFactor}`);
  }

  const floorFactor = minUsd / scaleFactor;
  const volatilityFactor = volatility / referencePrice;

  if (volatilityFactor <= floorFactor) {
    return minUsd;
  }
  return Math.max(minUsd, scaleFactor * volatilityFactor);
}
