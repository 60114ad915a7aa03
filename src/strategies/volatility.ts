import { PriceHistoryBuffer } from "../history/priceHistory";
import { Result, ok, insufficientHistory } from "../utils/errors";

/**
 * Average true range over single-tick samples.
 *
 * With one price per tick there is no high/low, so the true range of a tick
 * is just |price - previous price|. The result is the simple mean of the
 * latest `period` such deltas, which needs `period + 1` samples.
 */
export class VolatilityEstimator {
  constructor(private readonly history: PriceHistoryBuffer) {}

  trueRangeAverage(asset: string, venue: string, period: number): Result<number> {
    if (!Number.isInteger(period) || period < 1) {
      throw new RangeError(`ATR period must be a positive integer, got ${period}`);
    }

    const required = period + 1;
    const samples = this.history.recent(asset, venue, required);
    if (samples.length < required) {
      return insufficientHistory(samples.length, required);
    }

    let sum = 0;
    for (let i = 1; i < samples.length; i++) {
      sum += Math.abs(samples[i].price - samples[i - 1].price);
    }
    return ok(sum / period);
  }
}
