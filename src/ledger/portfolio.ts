import { PriceFeed } from "../feeds/priceFeed";
import { CASH, LedgerSnapshot } from "./hedgeLedger";

export interface PortfolioValuation {
  totalUsd: number;
  cashUsd: number;
  holdingsUsd: number;
  /** Held assets no venue could price; left out of the total. */
  unpriced: string[];
}

/**
 * Marks holdings at the best price any venue quotes. Prices observed during
 * the cycle are reused; anything else is looked up through the feed.
 */
export class PortfolioValuer {
  constructor(
    private readonly feed: PriceFeed,
    private readonly venues: readonly string[]
  ) {}

  async value(
    snapshot: LedgerSnapshot,
    quotes: Map<string, Map<string, number>> = new Map()
  ): Promise<PortfolioValuation> {
    let cashUsd = 0;
    const held = new Map<string, number>();

    for (const entry of snapshot) {
      if (entry.account === CASH) {
        cashUsd += entry.amount;
      } else if (entry.amount > 0) {
        held.set(entry.account, (held.get(entry.account) ?? 0) + entry.amount);
      }
    }

    const assets = Array.from(held.keys());
    const prices = await Promise.all(assets.map((asset) => this.bestPrice(asset, quotes.get(asset))));

    let holdingsUsd = 0;
    const unpriced: string[] = [];
    assets.forEach((asset, i) => {
      const price = prices[i];
      if (price === null) {
        unpriced.push(asset);
        return;
      }
      holdingsUsd += (held.get(asset) ?? 0) * price;
    });

    return { totalUsd: cashUsd + holdingsUsd, cashUsd, holdingsUsd, unpriced };
  }

  private async bestPrice(asset: string, observed?: Map<string, number>): Promise<number | null> {
    let candidates: number[];
    if (observed && observed.size > 0) {
      candidates = Array.from(observed.values());
    } else {
      const fetched = await Promise.all(
        this.venues.map((venue) => this.feed.currentPrice(asset, venue))
      );
      candidates = fetched.filter((p): p is number => p !== null && p > 0);
    }
    return candidates.length > 0 ? Math.max(...candidates) : null;
  }
}
