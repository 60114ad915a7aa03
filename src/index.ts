import { BotConfig, loadConfig } from "./config";
import { createLogger, Logger } from "./utils/logger";
import { createPriceFeed, PriceFeed } from "./feeds";
import { PriceHistoryBuffer, PriceSample } from "./history/priceHistory";
import { HedgeLedger } from "./ledger/hedgeLedger";
import { PortfolioValuer } from "./ledger/portfolio";
import { CycleResult, HedgeEngine } from "./execution/hedgeEngine";
import { CycleRunner } from "./execution/cycleRunner";
import { BalanceStore, HistoryStore, TradeLog } from "./storage/types";
import { FileHistoryStore } from "./storage/fileHistoryStore";
import { FileBalanceStore } from "./storage/fileBalanceStore";
import { FileTradeLog } from "./storage/fileTradeLog";
import { errorMessage } from "./utils/errors";

export interface BotDependencies {
  config: BotConfig;
  logger: Logger;
  feed: PriceFeed;
  historyStore: HistoryStore;
  balanceStore: BalanceStore;
  tradeLog: TradeLog;
}

export function createDefaultDependencies(config: BotConfig = loadConfig()): BotDependencies {
  const logger = createLogger(config);
  return {
    config,
    logger,
    feed: createPriceFeed(config, logger),
    historyStore: new FileHistoryStore(config.dataDir, logger),
    balanceStore: new FileBalanceStore(
      config.dataDir,
      {
        venues: [config.venueA, config.venueB],
        startingCashUsd: config.startingCashUsd,
        assets: config.defaultAssets,
      },
      logger
    ),
    tradeLog: new FileTradeLog(config.dataDir),
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

class ArbitrageBot {
  private readonly config: BotConfig;
  private readonly logger: Logger;
  private readonly history: PriceHistoryBuffer;
  private readonly runner: CycleRunner;
  private readonly valuer: PortfolioValuer;
  private ledger: HedgeLedger | null = null;
  private engine: HedgeEngine | null = null;

  constructor(private readonly deps: BotDependencies) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.history = new PriceHistoryBuffer(
      Math.max(this.config.historyCapacity, this.config.atrPeriod + 1)
    );
    this.runner = new CycleRunner(this.logger);
    this.valuer = new PortfolioValuer(deps.feed, this.venues());
  }

  get isRunning(): boolean {
    return this.runner.isRunning;
  }

  getLedger(): HedgeLedger | null {
    return this.ledger;
  }

  getHistory(): PriceHistoryBuffer {
    return this.history;
  }

  async initialize(): Promise<void> {
    this.logger.info("Initializing cross-venue arbitrage bot...");
    this.logger.info(`Venues: ${this.config.venueA} (reference) / ${this.config.venueB}`);
    this.logger.info(
      `Tracked assets: ${this.config.trackedPairs.map((p) => `${p.asset}/${p.quote}`).join(", ")}`
    );

    const ledger = HedgeLedger.fromSnapshot(this.venues(), this.deps.balanceStore.load());
    this.ledger = ledger;
    this.logger.info("Balances loaded", {
      [this.config.venueA]: ledger.cash(this.config.venueA),
      [this.config.venueB]: ledger.cash(this.config.venueB),
    });

    this.rehydrateHistory();
    await this.warmUp();

    this.engine = new HedgeEngine(
      {
        venueA: this.config.venueA,
        venueB: this.config.venueB,
        takerFeeRate: this.config.takerFeeRate,
        minTradeUsd: this.config.minTradeUsd,
        tradeSizeFactor: this.config.tradeSizeFactor,
        atrPeriod: this.config.atrPeriod,
      },
      {
        feed: this.deps.feed,
        history: this.history,
        ledger,
        tradeLog: this.deps.tradeLog,
        historyStore: this.deps.historyStore,
        logger: this.logger,
      }
    );
  }

  async executeCycle(cycle: number): Promise<CycleResult> {
    if (!this.engine) {
      throw new Error("Bot is not initialized");
    }

    const result = await this.engine.runCycle(this.config.trackedPairs);
    this.deps.balanceStore.save(result.snapshot);

    const executed = result.outcomes.filter((o) => o.state === "EXECUTED").length;
    const skipped = result.outcomes.flatMap((o) =>
      o.state === "SKIPPED" ? [`${o.asset}:${o.reason}`] : []
    );

    const valuation = await this.valuer.value(result.snapshot, result.quotes);
    if (valuation.unpriced.length > 0) {
      this.logger.warn("Could not price some holdings", { assets: valuation.unpriced });
    }
    this.logger.info(`Total Portfolio Value in USD: ${valuation.totalUsd.toFixed(2)}`, {
      cycle,
      executed,
      skipped,
      cashUsd: valuation.cashUsd.toFixed(2),
      holdingsUsd: valuation.holdingsUsd.toFixed(2),
    });

    return result;
  }

  /**
   * Loops until `requestStop()`. The current cycle always completes first.
   */
  async start(): Promise<number> {
    if (!this.engine) {
      throw new Error("Bot is not initialized");
    }
    this.logger.info(`Starting bot with ${this.config.pollIntervalMs}ms polling interval`);
    return this.runner.run(async (cycle) => {
      await this.executeCycle(cycle);
    }, this.config.pollIntervalMs);
  }

  requestStop(): void {
    if (this.runner.isRunning) {
      this.logger.info("Stop requested, finishing current cycle...");
    }
    this.runner.stop();
  }

  async shutdown(): Promise<void> {
    this.logger.info("Shutting down bot...");
    this.requestStop();
    if (this.ledger) {
      this.deps.balanceStore.save(this.ledger.snapshot());
    }
    this.logger.info("Bot shutdown complete");
  }

  private venues(): string[] {
    return [this.config.venueA, this.config.venueB];
  }

  private rehydrateHistory(): void {
    for (const { asset } of this.config.trackedPairs) {
      for (const venue of this.venues()) {
        const samples = this.deps.historyStore.load(asset, venue);
        let loaded = 0;
        for (const sample of samples) {
          if (this.appendHistory(asset, venue, sample)) {
            loaded++;
          }
        }
        this.logger.debug("Price history loaded", { asset, venue, loaded, kept: this.history.size(asset, venue) });
      }
    }
  }

  /**
   * Poll the feed until every (asset, venue) has `warmupSamples` samples so
   * volatility sizing can kick in from the first cycle.
   */
  private async warmUp(): Promise<void> {
    const { warmupSamples, warmupIntervalMs } = this.config;
    const tasks: Promise<void>[] = [];

    for (const { asset } of this.config.trackedPairs) {
      for (const venue of this.venues()) {
        const missing = warmupSamples - this.history.size(asset, venue);
        if (missing <= 0) {
          continue;
        }
        this.logger.info(`Initializing price history for ${asset} on ${venue}`, { samples: missing });
        tasks.push(this.collectSamples(asset, venue, missing, warmupIntervalMs));
      }
    }

    await Promise.all(tasks);
  }

  private async collectSamples(asset: string, venue: string, attempts: number, intervalMs: number): Promise<void> {
    for (let i = 0; i < attempts; i++) {
      if (i > 0) {
        await sleep(intervalMs);
      }
      const price = await this.deps.feed.currentPrice(asset, venue);
      if (price === null) {
        continue;
      }
      const sample = { timestamp: new Date(), price };
      if (this.appendHistory(asset, venue, sample)) {
        try {
          this.deps.historyStore.append(asset, venue, sample);
        } catch (error) {
          this.logger.error("Failed to persist price sample", { asset, venue, error: errorMessage(error) });
        }
      }
    }
  }

  private appendHistory(asset: string, venue: string, sample: PriceSample): boolean {
    try {
      this.history.append(asset, venue, sample);
      return true;
    } catch (error) {
      this.logger.warn("Skipping price sample", { asset, venue, error: errorMessage(error) });
      return false;
    }
  }
}

async function main() {
  try {
    const bot = new ArbitrageBot(createDefaultDependencies());

    process.on("SIGINT", () => bot.requestStop());
    process.on("SIGTERM", () => bot.requestStop());

    await bot.initialize();
    await bot.start();
    await bot.shutdown();
    process.exit(0);
  } catch (error) {
    console.error("Bot halted:", error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export { ArbitrageBot };
