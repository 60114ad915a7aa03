import { TrackedPair } from "../config";
import { PriceFeed } from "../feeds/priceFeed";
import { PriceHistoryBuffer } from "../history/priceHistory";
import { HedgeLedger, LedgerSnapshot } from "../ledger/hedgeLedger";
import { tradeNotional } from "../strategies/positionSizer";
import { VolatilityEstimator } from "../strategies/volatility";
import { HistoryStore, TradeLog, TradeRecord } from "../storage/types";
import {
  InsufficientFundsError,
  InsufficientHoldingError,
  InvalidPriceError,
  errorMessage,
  isContractViolation,
} from "../utils/errors";
import { Logger } from "../utils/logger";

export interface HedgeEngineSettings {
  /** Reference venue: its history drives volatility and its price drives sizing. */
  venueA: string;
  venueB: string;
  takerFeeRate: number;
  minTradeUsd: number;
  tradeSizeFactor: number;
  atrPeriod: number;
}

export interface HedgeEngineDeps {
  feed: PriceFeed;
  history: PriceHistoryBuffer;
  ledger: HedgeLedger;
  tradeLog: TradeLog;
  historyStore?: HistoryStore;
  logger: Logger;
  now?: () => Date;
}

export type SkipReason =
  | "PRICE_UNAVAILABLE"
  | "INVALID_PRICE"
  | "BELOW_MINIMUM"
  | "NO_SPREAD"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_HOLDING"
  | "UNEXPECTED_ERROR";

export interface ExecutedHedge {
  asset: string;
  state: "EXECUTED";
  fundingVenue: string;
  counterVenue: string;
  fundingPrice: number;
  counterPrice: number;
  volatility: number;
  notional: number;
  fee: number;
  amount: number;
  trades: [TradeRecord, TradeRecord];
}

export interface SkippedHedge {
  asset: string;
  state: "SKIPPED";
  reason: SkipReason;
}

export type AssetOutcome = ExecutedHedge | SkippedHedge;

/** Valid prices observed this cycle: asset → venue → price. */
export type CycleQuotes = Map<string, Map<string, number>>;

export interface CycleResult {
  startedAt: Date;
  snapshot: LedgerSnapshot;
  trades: TradeRecord[];
  outcomes: AssetOutcome[];
  quotes: CycleQuotes;
}

interface PairPrices {
  a: number | null;
  b: number | null;
}

export class HedgeEngine {
  private readonly volatility: VolatilityEstimator;
  private readonly now: () => Date;

  constructor(
    private readonly settings: HedgeEngineSettings,
    private readonly deps: HedgeEngineDeps
  ) {
    this.volatility = new VolatilityEstimator(deps.history);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * One decision pass over every tracked pair. Failures are isolated per
   * asset; only a contract violation escapes.
   */
  async runCycle(pairs: TrackedPair[]): Promise<CycleResult> {
    const startedAt = this.now();
    const prices = await this.fetchPrices(pairs);

    const outcomes: AssetOutcome[] = [];
    const trades: TradeRecord[] = [];
    const quotes: CycleQuotes = new Map();

    for (const { asset } of pairs) {
      const pairPrices = prices.get(asset) ?? { a: null, b: null };
      const outcome = this.processAsset(asset, pairPrices, startedAt, quotes);
      outcomes.push(outcome);
      if (outcome.state === "EXECUTED") {
        trades.push(...outcome.trades);
      }
    }

    return {
      startedAt,
      snapshot: this.deps.ledger.snapshot(),
      trades,
      outcomes,
      quotes,
    };
  }

  /**
   * All lookups run concurrently and settle before any asset is sized.
   * A rejected lookup is treated as unavailable without touching its siblings.
   */
  private async fetchPrices(pairs: TrackedPair[]): Promise<Map<string, PairPrices>> {
    const { venueA, venueB } = this.settings;
    const lookups = pairs.map(async ({ asset }) => {
      const [a, b] = await Promise.all([
        this.lookup(asset, venueA),
        this.lookup(asset, venueB),
      ]);
      return [asset, { a, b }] as const;
    });
    return new Map(await Promise.all(lookups));
  }

  private async lookup(asset: string, venue: string): Promise<number | null> {
    try {
      return await this.deps.feed.currentPrice(asset, venue);
    } catch (error) {
      this.deps.logger.error("Price feed threw instead of reporting unavailable", {
        asset,
        venue,
        error: errorMessage(error),
      });
      return null;
    }
  }

  private processAsset(
    asset: string,
    prices: PairPrices,
    timestamp: Date,
    quotes: CycleQuotes
  ): AssetOutcome {
    try {
      return this.evaluate(asset, prices, timestamp, quotes);
    } catch (error) {
      if (isContractViolation(error)) {
        throw error;
      }
      if (error instanceof InsufficientFundsError) {
        this.deps.logger.warn("Hedge abandoned: insufficient funds", { asset, error: error.message });
        return skipped(asset, "INSUFFICIENT_FUNDS");
      }
      if (error instanceof InsufficientHoldingError) {
        this.deps.logger.warn("Hedge abandoned: insufficient holding", { asset, error: error.message });
        return skipped(asset, "INSUFFICIENT_HOLDING");
      }
      this.deps.logger.error("Unexpected error while processing asset", {
        asset,
        error: errorMessage(error),
      });
      return skipped(asset, "UNEXPECTED_ERROR");
    }
  }

  private evaluate(
    asset: string,
    prices: PairPrices,
    timestamp: Date,
    quotes: CycleQuotes
  ): AssetOutcome {
    const { venueA, venueB, atrPeriod, minTradeUsd, tradeSizeFactor } = this.settings;
    const { logger, ledger } = this.deps;

    // PRICED
    const validA = prices.a !== null && this.recordSample(asset, venueA, prices.a, timestamp, quotes);
    const validB = prices.b !== null && this.recordSample(asset, venueB, prices.b, timestamp, quotes);

    if (prices.a === null || prices.b === null) {
      logger.warn("Price unavailable, skipping asset", {
        asset,
        [venueA]: prices.a,
        [venueB]: prices.b,
      });
      return skipped(asset, "PRICE_UNAVAILABLE");
    }
    if (!validA || !validB) {
      return skipped(asset, "INVALID_PRICE");
    }
    const priceA = prices.a;
    const priceB = prices.b;

    // SIZED
    let volatility = 0;
    const atr = this.volatility.trueRangeAverage(asset, venueA, atrPeriod);
    if (atr.ok) {
      volatility = atr.value;
    } else {
      logger.info("Not enough history for ATR, sizing with zero volatility", {
        asset,
        venue: venueA,
        available: atr.available,
        required: atr.required,
      });
    }

    const notional = tradeNotional(volatility, priceA, minTradeUsd, tradeSizeFactor);
    if (notional < minTradeUsd) {
      logger.debug("Trade size below minimum", { asset, notional, minTradeUsd });
      return skipped(asset, "BELOW_MINIMUM");
    }

    // EXECUTED
    if (priceA === priceB) {
      logger.debug("No spread between venues", { asset, price: priceA });
      return skipped(asset, "NO_SPREAD");
    }

    const [fundingVenue, fundingPrice, counterVenue, counterPrice]: [string, number, string, number] =
      priceA < priceB
        ? [venueA, priceA, venueB, priceB]
        : [venueB, priceB, venueA, priceA];

    const available = ledger.cash(fundingVenue);
    if (available < notional) {
      logger.info("Insufficient cash on funding venue, skipping hedge", {
        asset,
        venue: fundingVenue,
        available,
        notional,
      });
      return skipped(asset, "INSUFFICIENT_FUNDS");
    }

    const hedge = ledger.atomically((): ExecutedHedge => {
      const amount = notional / fundingPrice;
      const fee = notional * this.settings.takerFeeRate;
      const netSpend = notional - fee;

      ledger.debitCash(fundingVenue, netSpend);
      ledger.adjustHolding(fundingVenue, asset, amount);
      const buy: TradeRecord = {
        timestamp,
        asset,
        side: "buy",
        amount,
        price: fundingPrice,
        venue: fundingVenue,
        notionalUsd: notional,
      };

      // Sold straight back out as cash; the counter venue never holds the asset.
      const proceeds = amount * counterPrice;
      ledger.creditCash(counterVenue, proceeds);
      const sell: TradeRecord = {
        timestamp,
        asset,
        side: "sell",
        amount: -amount,
        price: counterPrice,
        venue: counterVenue,
        notionalUsd: proceeds,
      };

      return {
        asset,
        state: "EXECUTED",
        fundingVenue,
        counterVenue,
        fundingPrice,
        counterPrice,
        volatility,
        notional,
        fee,
        amount,
        trades: [buy, sell],
      };
    });

    logger.info("Arbitrage: bought on funding venue", {
      asset,
      venue: fundingVenue,
      amount: hedge.amount.toFixed(10),
      price: fundingPrice,
      netSpend: (notional - hedge.fee).toFixed(2),
      fee: hedge.fee.toFixed(2),
    });
    logger.info("Arbitrage: sold on counter venue", {
      asset,
      venue: counterVenue,
      amount: hedge.amount.toFixed(10),
      price: counterPrice,
      proceeds: hedge.trades[1].notionalUsd.toFixed(2),
    });

    for (const trade of hedge.trades) {
      this.emitTrade(trade);
    }
    return hedge;
  }

  /**
   * Appends a fetched price to the buffer, and to the history store when the
   * buffer kept it. Returns false when the price itself is unusable.
   */
  private recordSample(
    asset: string,
    venue: string,
    price: number,
    timestamp: Date,
    quotes: CycleQuotes
  ): boolean {
    const { history, historyStore, logger } = this.deps;
    const sample = { timestamp, price };
    let accepted = true;

    try {
      history.append(asset, venue, sample);
    } catch (error) {
      if (error instanceof InvalidPriceError) {
        logger.warn("Rejected invalid price", { asset, venue, price });
        return false;
      }
      // Clock went backwards: the quote is still current, only history skips it.
      logger.warn("Price sample not recorded", { asset, venue, error: errorMessage(error) });
      accepted = false;
    }

    let venues = quotes.get(asset);
    if (!venues) {
      venues = new Map();
      quotes.set(asset, venues);
    }
    venues.set(venue, price);

    if (accepted && historyStore) {
      try {
        historyStore.append(asset, venue, sample);
      } catch (error) {
        logger.error("Failed to persist price sample", { asset, venue, error: errorMessage(error) });
      }
    }
    return true;
  }

  private emitTrade(trade: TradeRecord): void {
    try {
      this.deps.tradeLog.append(trade);
    } catch (error) {
      this.deps.logger.error("Failed to record trade", {
        asset: trade.asset,
        venue: trade.venue,
        side: trade.side,
        error: errorMessage(error),
      });
    }
  }
}

function skipped(asset: string, reason: SkipReason): SkippedHedge {
  return { asset, state: "SKIPPED", reason };
}
